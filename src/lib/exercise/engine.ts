import type { ExerciseContext, ModeRunner } from './context';
import { invalidCommand } from './context';
import { createModeRunner } from './modes';
import { DEFAULT_CONFIG, type EngineConfig } from '../config';
import type { Curriculum } from '../curriculum';
import { describeError } from '../errors';
import { checkLevelUp } from '../levelUp';
import { ENCOURAGEMENTS, TRY_AGAIN, pickMessage } from '../messages';
import type { ProgressLedger } from '../progressLedger';
import type { RandomSource } from '../selection';
import type { SpeechQueue } from '../speechQueue';
import type { Tier } from '../../types/curriculum';
import type {
  Answer,
  ExerciseEvents,
  ExerciseItem,
  ExerciseMode,
  Feedback,
  SessionState,
} from '../../types/exercise';
import type { SpeechRequest, Utterance, UtteranceHandle } from '../../types/speech';

export interface ExerciseEngineOptions {
  curriculum: Curriculum;
  ledger: ProgressLedger;
  speech: SpeechQueue;
  mode: ExerciseMode;
  config?: Readonly<EngineConfig>;
  events?: ExerciseEvents;
  random?: RandomSource;
}

/**
 * Drives one play session: picks items, scores answers, keeps the streak
 * and star count, and moves the child up a tier when a tier is mastered.
 */
export class ExerciseEngine {
  private readonly curriculum: Curriculum;
  private readonly ledger: ProgressLedger;
  private readonly speech: SpeechQueue;
  private readonly config: Readonly<EngineConfig>;
  private readonly events: ExerciseEvents;
  private readonly random: RandomSource;
  private readonly context: ExerciseContext;
  private runner: ModeRunner;
  private streak = 0;
  private bestStreak = 0;
  private starsEarned = 0;
  private suspended = false;

  constructor(options: ExerciseEngineOptions) {
    this.curriculum = options.curriculum;
    this.ledger = options.ledger;
    this.speech = options.speech;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.events = options.events ?? {};
    this.random = options.random ?? Math.random;

    this.context = {
      curriculum: this.curriculum,
      ledger: this.ledger,
      config: this.config,
      random: this.random,
      events: this.events,
      tier: () => this.ledger.currentTier,
      say: (request, utterance) => this.say(request, utterance),
      interrupt: () => this.speech.cancelAll(),
      present: (item) => this.events.onItemPresented?.(item),
      score: (letterId, correct) => this.score(letterId, correct),
      checkLevelUp: () => this.checkLevelUp(),
    };
    this.runner = createModeRunner(options.mode, this.context);
  }

  get mode(): ExerciseMode {
    return this.runner.mode;
  }

  get isSuspended(): boolean {
    return this.suspended;
  }

  get state(): SessionState {
    return {
      mode: this.runner.mode,
      item: this.runner.current,
      streak: this.streak,
      bestStreak: this.bestStreak,
      starsEarned: this.starsEarned,
      tier: this.ledger.currentTier,
    };
  }

  nextItem(): ExerciseItem {
    this.ensureActive();
    return this.runner.nextItem();
  }

  submitAnswer(answer: Answer): void {
    this.ensureActive();
    this.runner.submitAnswer(answer);
  }

  selectLetter(letterId: string): void {
    this.submitAnswer({ kind: 'select', letterId });
  }

  confirmLetterInWord(position: number, letterId: string): void {
    this.submitAnswer({ kind: 'confirm', position, letterId });
  }

  requestExplore(letterId: string): void {
    this.submitAnswer({ kind: 'explore', letterId });
  }

  /** Say the current prompt again */
  replay(): void {
    this.ensureActive();
    this.runner.replay();
  }

  /** Change mode; the streak and stars carry over. */
  switchMode(mode: ExerciseMode): void {
    this.ensureActive();
    this.speech.cancelAll();
    this.runner = createModeRunner(mode, this.context);
  }

  /** Explicit reset to an easier tier, e.g. by a parent. */
  resetTier(tier: Tier): void {
    this.ledger.resetTier(tier);
  }

  /** Stop speech and refuse commands until resume(). */
  suspend(): void {
    this.suspended = true;
    this.speech.cancelAll();
  }

  resume(): void {
    this.suspended = false;
  }

  private ensureActive(): void {
    if (this.suspended) {
      throw invalidCommand('The session is paused');
    }
  }

  private say(request: SpeechRequest, utterance: Omit<Utterance, 'request'> = {}): UtteranceHandle {
    const handle = this.speech.enqueue({ ...utterance, request });
    void handle.done.then((outcome) => {
      if (outcome.state !== 'failed' || !outcome.error) {
        return;
      }
      try {
        this.events.onDegraded?.(outcome.error);
      } catch (err) {
        console.warn('[exercise]', `onDegraded handler failed: ${describeError(err)}`);
      }
    });
    return handle;
  }

  private score(letterId: string, correct: boolean): Feedback {
    this.ledger.recordOutcome(letterId, correct);

    if (correct) {
      this.streak += 1;
      this.bestStreak = Math.max(this.bestStreak, this.streak);
      if (this.streak % this.config.starMilestone === 0) {
        this.starsEarned += 1;
      }
    } else {
      this.streak = 0;
    }

    const feedback: Feedback = {
      letterId,
      correct,
      streak: this.streak,
      starsEarned: this.starsEarned,
      message: pickMessage(correct ? ENCOURAGEMENTS : TRY_AGAIN, this.random),
    };
    this.events.onFeedback?.(feedback);
    return feedback;
  }

  private checkLevelUp(): void {
    if (this.runner.inProgress) {
      return;
    }
    const next = checkLevelUp(this.curriculum, this.ledger, this.ledger.currentTier, this.config);
    if (!next) {
      return;
    }
    const tier = this.ledger.advanceTier();
    this.events.onLevelUp?.(tier);
  }
}
