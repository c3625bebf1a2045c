export { createSessionController, createStorage, createSynthesizer } from './lib/bootstrap';
export { DEFAULT_CONFIG, loadConfig, type EngineConfig, type StorageBackend } from './lib/config';
export { Curriculum, TIERS, loadCurriculum, clearCurriculumCache, nextTier } from './lib/curriculum';
export { closeDb, getDb, openDb } from './lib/db';
export { PhonicsError, PhonicsErrorType, isPhonicsError } from './lib/errors';
export { ExerciseEngine, type ExerciseEngineOptions } from './lib/exercise/engine';
export { checkLevelUp, tierAverage } from './lib/levelUp';
export { getStatsSummary, categorizeLetters, type ConfidenceLevel, type MasterySummary } from './lib/masteryStats';
export { ProgressLedger, openLedger, type PersistResult } from './lib/progressLedger';
export {
  JsonFileProgressStorage,
  SqliteProgressStorage,
  type ProgressStorage,
} from './lib/progressStorage';
export type { PersistedProfile } from './lib/profileRecord';
export {
  Session,
  SessionController,
  persistWithRetry,
  type SessionEvents,
  type SessionSummary,
  type SessionWarning,
} from './lib/sessionController';
export { SpeechQueue } from './lib/speechQueue';
export { CommandSynthesizer, SilentSynthesizer, detectSpeechEngine } from './lib/synthesizers';
export type * from './types/curriculum';
export type * from './types/exercise';
export type * from './types/progress';
export type * from './types/speech';
