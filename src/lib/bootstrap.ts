import path from 'path';
import { loadConfig, type EngineConfig } from './config';
import { loadCurriculum, type Curriculum } from './curriculum';
import { getDb } from './db';
import { JsonFileProgressStorage, SqliteProgressStorage, type ProgressStorage } from './progressStorage';
import { SessionController } from './sessionController';
import { SpeechQueue } from './speechQueue';
import { CommandSynthesizer, SilentSynthesizer, detectSpeechEngine, piperModelFor } from './synthesizers';
import type { Synthesizer } from '../types/speech';

export interface BootstrapOverrides {
  curriculum?: Curriculum;
  storage?: ProgressStorage;
  synthesizer?: Synthesizer;
}

export function createStorage(config: Readonly<EngineConfig>): ProgressStorage {
  if (config.storage === 'json') {
    return new JsonFileProgressStorage(path.join(config.dataDir, 'profiles'));
  }
  return new SqliteProgressStorage(getDb(path.join(config.dataDir, 'progress.db')));
}

/** Speaks with a voice for the curriculum's language */
export async function createSynthesizer(language: string): Promise<Synthesizer> {
  const engine = await detectSpeechEngine();
  if (!engine) {
    console.warn('[speech]', 'No TTS engine found (piper or espeak-ng); running without voice');
    return new SilentSynthesizer();
  }
  return new CommandSynthesizer({ engine, voice: language, piperModel: piperModelFor(language) });
}

/**
 * Production wiring: curriculum from disk, configured storage backend,
 * detected speech engine.
 */
export async function createSessionController(
  config: Readonly<EngineConfig> = loadConfig(),
  overrides: BootstrapOverrides = {}
): Promise<SessionController> {
  const curriculum = overrides.curriculum ?? loadCurriculum(config.curriculumPath);
  const storage = overrides.storage ?? createStorage(config);
  const synthesizer = overrides.synthesizer ?? (await createSynthesizer(curriculum.metadata.language));

  return new SessionController({
    curriculum,
    storage,
    speech: new SpeechQueue(synthesizer),
    config,
  });
}
