import type { Curriculum } from '../curriculum';
import type { EngineConfig } from '../config';
import { PhonicsError, PhonicsErrorType } from '../errors';
import type { ProgressLedger } from '../progressLedger';
import type { RandomSource } from '../selection';
import type { Tier } from '../../types/curriculum';
import type { Answer, ExerciseEvents, ExerciseItem, ExerciseMode, Feedback } from '../../types/exercise';
import type { SpeechRequest, Utterance, UtteranceHandle } from '../../types/speech';

/** What the engine lends to the mode that is running */
export interface ExerciseContext {
  readonly curriculum: Curriculum;
  readonly ledger: ProgressLedger;
  readonly config: Readonly<EngineConfig>;
  readonly random: RandomSource;
  readonly events: ExerciseEvents;
  tier(): Tier;
  say(request: SpeechRequest, options?: Omit<Utterance, 'request'>): UtteranceHandle;
  /** Silence everything queued or playing */
  interrupt(): void;
  present(item: ExerciseItem): void;
  /** Record a tested answer and report feedback */
  score(letterId: string, correct: boolean): Feedback;
  checkLevelUp(): void;
}

/** One exercise mode with its own private state */
export interface ModeRunner {
  readonly mode: ExerciseMode;
  readonly current: ExerciseItem | null;
  /** True while an item is half done and must not change tier */
  readonly inProgress: boolean;
  nextItem(): ExerciseItem;
  submitAnswer(answer: Answer): void;
  replay(): void;
}

export function invalidCommand(message: string): PhonicsError {
  return new PhonicsError(PhonicsErrorType.INVALID_COMMAND, message);
}

export function emptyTier(what: string, tier: Tier): PhonicsError {
  return new PhonicsError(PhonicsErrorType.CURRICULUM_CORRUPT, `No ${what} in tier "${tier}"`);
}
