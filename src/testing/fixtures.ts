import { Curriculum } from '../lib/curriculum';
import { PhonicsError, PhonicsErrorType } from '../lib/errors';
import { parseProfileJson, type PersistedProfile } from '../lib/profileRecord';
import type { ProgressStorage } from '../lib/progressStorage';
import type { RandomSource } from '../lib/selection';
import type { CurriculumBank } from '../types/curriculum';
import type { SpeechRequest, Synthesizer } from '../types/speech';

/** A small English curriculum for tests */
export const TEST_BANK: CurriculumBank = {
  letters: [
    { id: 'A', soundId: 'aaa', glyph: 'A', name: 'ay', tier: 'easy' },
    { id: 'B', soundId: 'bbb', glyph: 'B', name: 'bee', tier: 'easy' },
    { id: 'C', soundId: 'kkk', glyph: 'C', name: 'see', tier: 'easy' },
    { id: 'O', soundId: 'ooo', glyph: 'O', name: 'oh', tier: 'easy' },
    { id: 'S', soundId: 'sss', glyph: 'S', name: 'ess', tier: 'easy' },
    { id: 'T', soundId: 'ttt', glyph: 'T', name: 'tee', tier: 'easy' },
    { id: 'D', soundId: 'ddd', glyph: 'D', name: 'dee', tier: 'medium' },
    { id: 'M', soundId: 'mmm', glyph: 'M', name: 'em', tier: 'medium' },
    { id: 'K', soundId: 'kkk', glyph: 'K', name: 'kay', tier: 'hard' },
  ],
  words: [
    { id: 'CAT', letters: ['C', 'A', 'T'], tier: 'easy', gloss: 'cat' },
    { id: 'SAT', letters: ['S', 'A', 'T'], tier: 'easy' },
    { id: 'BOT', letters: ['B', 'O', 'T'], tier: 'easy' },
    { id: 'MAD', letters: ['M', 'A', 'D'], tier: 'medium' },
    { id: 'DOT', letters: ['D', 'O', 'T'], tier: 'medium' },
    { id: 'KAT', letters: ['K', 'A', 'T'], tier: 'hard' },
  ],
  metadata: { language: 'en', source: 'test' },
};

export const EASY_IDS = ['A', 'B', 'C', 'O', 'S', 'T'];
export const MEDIUM_IDS = ['D', 'M'];

export function testCurriculum(): Curriculum {
  return Curriculum.fromBank(TEST_BANK);
}

export function constantRandom(value: number): RandomSource {
  return () => value;
}

/** Deterministic pseudo-random source (mulberry32) */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Let pending promise callbacks run */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

interface PendingSpeech {
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Records what it is asked to say. In 'auto' mode every utterance finishes
 * straight away; in 'manual' mode the test calls finishCurrent().
 */
export class FakeSynthesizer implements Synthesizer {
  readonly spoken: SpeechRequest[] = [];
  stopCount = 0;
  failWhen: ((request: SpeechRequest) => boolean) | null = null;
  private pending: PendingSpeech | null = null;

  constructor(private readonly mode: 'auto' | 'manual' = 'auto') {}

  get isSpeaking(): boolean {
    return this.pending !== null;
  }

  speak(request: SpeechRequest): Promise<void> {
    this.spoken.push(request);
    if (this.failWhen?.(request)) {
      return Promise.reject(new Error('voice crashed'));
    }
    if (this.mode === 'auto') {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve: () => resolve(), reject };
    });
  }

  stop(): void {
    this.stopCount++;
    const pending = this.pending;
    this.pending = null;
    pending?.reject(new Error('stopped'));
  }

  finishCurrent(): void {
    const pending = this.pending;
    this.pending = null;
    pending?.resolve();
  }
}

/** Keeps profiles as JSON strings, like a real backend would */
export class MemoryProgressStorage implements ProgressStorage {
  readonly records = new Map<string, string>();
  reads = 0;
  writeAttempts = 0;
  failNextWrites = 0;

  read(profileId: string): PersistedProfile {
    this.reads++;
    const json = this.records.get(profileId);
    if (json === undefined) {
      throw new PhonicsError(PhonicsErrorType.PROFILE_NOT_FOUND, `No profile "${profileId}"`);
    }
    return parseProfileJson(json, profileId);
  }

  write(record: PersistedProfile): void {
    this.writeAttempts++;
    if (this.failNextWrites > 0) {
      this.failNextWrites--;
      throw new PhonicsError(PhonicsErrorType.STORAGE_WRITE_FAILED, 'disk full');
    }
    this.records.set(record.profileId, JSON.stringify(record));
  }

  listProfiles(): string[] {
    return [...this.records.keys()].sort();
  }

  stored(profileId: string): unknown {
    const json = this.records.get(profileId);
    return json === undefined ? undefined : JSON.parse(json);
  }
}
