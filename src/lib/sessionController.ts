import { DEFAULT_CONFIG, type EngineConfig } from './config';
import type { Curriculum } from './curriculum';
import { PhonicsError, PhonicsErrorType } from './errors';
import { ExerciseEngine } from './exercise/engine';
import { WARNING_MESSAGES } from './messages';
import { openLedger, type PersistResult, type ProgressLedger } from './progressLedger';
import type { ProgressStorage } from './progressStorage';
import type { RandomSource } from './selection';
import type { SpeechQueue } from './speechQueue';
import type { Tier } from '../types/curriculum';
import type { ExerciseEvents, ExerciseMode } from '../types/exercise';

export type SessionStatus = 'active' | 'paused' | 'ended';

/** A recoverable problem, with a message fit to show a child */
export interface SessionWarning {
  type: PhonicsErrorType;
  message: string;
  error: PhonicsError;
}

export interface SessionEvents extends ExerciseEvents {
  onWarning?(warning: SessionWarning): void;
}

export interface SessionSummary {
  profileId: string;
  starsEarned: number;
  bestStreak: number;
  tier: Tier;
  totalStars: number;
  persisted: boolean;
}

export interface SessionControllerOptions {
  curriculum: Curriculum;
  storage: ProgressStorage;
  speech: SpeechQueue;
  config?: Readonly<EngineConfig>;
  random?: RandomSource;
  /** Waits between persist retries */
  delay?: (ms: number) => Promise<void>;
}

async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Persist, retrying up to maxRetries times with a growing pause between
 * tries. Returns the last result.
 */
export async function persistWithRetry(
  ledger: ProgressLedger,
  maxRetries: number,
  retryDelayMs: number,
  wait: (ms: number) => Promise<void> = delay
): Promise<PersistResult> {
  let result = ledger.persist();
  let attempt = 0;

  while (!result.ok && attempt < maxRetries) {
    attempt++;
    console.warn('[session]', `Retry ${attempt}/${maxRetries} saving profile "${ledger.profileId}"`);
    await wait(retryDelayMs * attempt);
    result = ledger.persist();
  }

  return result;
}

/**
 * One child's play session. Owns its engine; folds earned stars into the
 * ledger at every checkpoint.
 *
 * All sessions speak through the controller's one SpeechQueue, since there
 * is one speaker. Pausing a session, or moving it to its next item, cancels
 * whatever any session has queued or playing.
 */
export class Session {
  readonly engine: ExerciseEngine;
  readonly warnings: SessionWarning[] = [];
  private currentStatus: SessionStatus = 'active';
  private foldedStars = 0;
  private ending: Promise<SessionSummary> | null = null;

  constructor(
    readonly profileId: string,
    mode: ExerciseMode,
    private readonly ledger: ProgressLedger,
    speech: SpeechQueue,
    private readonly config: Readonly<EngineConfig>,
    private readonly options: {
      curriculum: Curriculum;
      events: SessionEvents;
      random?: RandomSource;
      wait: (ms: number) => Promise<void>;
      release: (session: Session) => void;
    }
  ) {
    const exerciseEvents: ExerciseEvents = options.events;
    this.engine = new ExerciseEngine({
      curriculum: options.curriculum,
      ledger,
      speech,
      mode,
      config,
      random: options.random,
      events: {
        ...exerciseEvents,
        onDegraded: (error) => {
          exerciseEvents.onDegraded?.(error);
          this.warn(error);
        },
      },
    });
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get progress(): ProgressLedger {
    return this.ledger;
  }

  /** Report a recoverable error to the UI */
  warn(error: PhonicsError): void {
    const warning: SessionWarning = {
      type: error.type,
      message: WARNING_MESSAGES[error.type],
      error,
    };
    this.warnings.push(warning);
    console.warn('[session]', `${this.profileId}: ${error.message}`);
    this.options.events.onWarning?.(warning);
  }

  switchMode(mode: ExerciseMode): void {
    this.ensureNotEnded();
    this.engine.switchMode(mode);
  }

  /**
   * Silence speech and save. The child may never come back, so a pause is
   * a full checkpoint. Resolves to whether the save succeeded.
   */
  async pause(): Promise<boolean> {
    if (this.currentStatus !== 'active') {
      return !this.ledger.isDirty;
    }
    this.currentStatus = 'paused';
    this.engine.suspend();
    return this.checkpoint();
  }

  /** Continue after pause() and replay the current prompt. */
  resume(): void {
    if (this.currentStatus !== 'paused') {
      return;
    }
    this.currentStatus = 'active';
    this.engine.resume();
    this.engine.replay();
  }

  /** Fold the session into the ledger, save, and free the profile. */
  end(): Promise<SessionSummary> {
    if (!this.ending) {
      this.ending = this.finish();
    }
    return this.ending;
  }

  private async finish(): Promise<SessionSummary> {
    this.currentStatus = 'ended';
    this.engine.suspend();

    try {
      const persisted = await this.checkpoint();
      const state = this.engine.state;
      return {
        profileId: this.profileId,
        starsEarned: state.starsEarned,
        bestStreak: state.bestStreak,
        tier: state.tier,
        totalStars: this.ledger.totalStars,
        persisted,
      };
    } finally {
      this.options.release(this);
    }
  }

  private async checkpoint(): Promise<boolean> {
    const state = this.engine.state;
    this.ledger.addStars(state.starsEarned - this.foldedStars);
    this.foldedStars = state.starsEarned;
    this.ledger.noteStreak(state.bestStreak);

    const result = await persistWithRetry(
      this.ledger,
      this.config.persistMaxRetries,
      this.config.persistRetryDelayMs,
      this.options.wait
    );
    if (!result.ok) {
      this.warn(result.error);
    }
    return result.ok;
  }

  private ensureNotEnded(): void {
    if (this.currentStatus === 'ended') {
      throw new PhonicsError(PhonicsErrorType.INVALID_COMMAND, 'The session has ended');
    }
  }
}

/**
 * Starts and tracks play sessions, at most one per profile.
 */
export class SessionController {
  private readonly active = new Map<string, Session>();
  private readonly config: Readonly<EngineConfig>;

  constructor(private readonly options: SessionControllerOptions) {
    this.config = options.config ?? DEFAULT_CONFIG;
  }

  get curriculum(): Curriculum {
    return this.options.curriculum;
  }

  isActive(profileId: string): boolean {
    return this.active.has(profileId);
  }

  activeProfiles(): string[] {
    return [...this.active.keys()];
  }

  startSession(profileId: string, mode: ExerciseMode, events: SessionEvents = {}): Session {
    if (this.active.has(profileId)) {
      throw new PhonicsError(
        PhonicsErrorType.SESSION_ALREADY_ACTIVE,
        `Profile "${profileId}" already has an active session`
      );
    }

    const { ledger, warning } = openLedger(this.options.storage, profileId, {
      exploreWeight: this.config.exploreWeight,
    });

    const session = new Session(profileId, mode, ledger, this.options.speech, this.config, {
      curriculum: this.options.curriculum,
      events,
      random: this.options.random,
      wait: this.options.delay ?? delay,
      release: (ended) => {
        if (this.active.get(profileId) === ended) {
          this.active.delete(profileId);
        }
      },
    });
    this.active.set(profileId, session);

    if (warning) {
      session.warn(warning);
    }
    return session;
  }
}
