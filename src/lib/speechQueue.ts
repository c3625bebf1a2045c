import { PhonicsError, PhonicsErrorType, describeError } from './errors';
import type {
  SpeechRequest,
  Synthesizer,
  TerminalState,
  Utterance,
  UtteranceHandle,
  UtteranceOutcome,
  UtteranceState,
} from '../types/speech';

function describeRequest(request: SpeechRequest): string {
  return request.kind === 'text' ? `"${request.text}"` : `sound ${request.soundId}`;
}

class QueuedUtterance implements UtteranceHandle {
  state: UtteranceState = 'queued';
  readonly done: Promise<UtteranceOutcome>;
  private readonly resolveDone: (outcome: UtteranceOutcome) => void;

  constructor(
    readonly id: number,
    readonly utterance: Utterance
  ) {
    let resolveDone: (outcome: UtteranceOutcome) => void = () => undefined;
    this.done = new Promise((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
  }

  get isTerminal(): boolean {
    return this.state === 'completed' || this.state === 'cancelled' || this.state === 'failed';
  }

  settle(state: TerminalState, error?: PhonicsError): void {
    if (this.isTerminal) {
      return;
    }
    this.state = state;
    this.resolveDone(error ? { state, error } : { state });
  }
}

/**
 * Plays utterances one at a time in the order they were enqueued.
 *
 * Every state change happens synchronously inside enqueue, cancel,
 * cancelAll or the synthesizer's settle callback, so there is never more
 * than one mutation in flight. The entry in `current` keeps the slot until
 * the synthesizer settles, even after it was cancelled, so a stopped
 * utterance can never overlap the next one.
 */
export class SpeechQueue {
  private readonly queue: QueuedUtterance[] = [];
  private current: QueuedUtterance | null = null;
  private nextId = 1;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly synthesizer: Synthesizer) {}

  /** Number of utterances waiting, not counting the one playing */
  get pendingCount(): number {
    return this.queue.length;
  }

  get isIdle(): boolean {
    return this.current === null && this.queue.length === 0;
  }

  enqueue(utterance: Utterance): UtteranceHandle {
    const entry = new QueuedUtterance(this.nextId++, utterance);
    this.queue.push(entry);
    this.pump();
    return entry;
  }

  /**
   * Drop a queued utterance or stop the one playing. No-op once the
   * utterance has finished.
   */
  cancel(handle: UtteranceHandle): void {
    const index = this.queue.findIndex((entry) => entry.id === handle.id);
    if (index >= 0) {
      const [entry] = this.queue.splice(index, 1);
      entry.settle('cancelled');
      this.notifyIfIdle();
      return;
    }

    if (this.current && this.current.id === handle.id && !this.current.isTerminal) {
      this.current.settle('cancelled');
      this.stopSynthesizer();
    }
  }

  /** Clear the queue and stop whatever is playing. */
  cancelAll(): void {
    const dropped = this.queue.splice(0, this.queue.length);
    for (const entry of dropped) {
      entry.settle('cancelled');
    }

    if (this.current && !this.current.isTerminal) {
      this.current.settle('cancelled');
      this.stopSynthesizer();
    }
    this.notifyIfIdle();
  }

  /** Resolves once nothing is queued or playing. */
  idle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    if (this.current) {
      return;
    }

    const entry = this.queue.shift();
    if (!entry) {
      this.notifyIfIdle();
      return;
    }

    this.current = entry;
    entry.state = 'playing';

    if (entry.utterance.onStart) {
      try {
        entry.utterance.onStart();
      } catch (err) {
        console.warn('[speech]', `onStart handler failed: ${describeError(err)}`);
      }
      // The handler may have cancelled it; never start a cancelled utterance
      if (entry.isTerminal) {
        this.current = null;
        this.pump();
        return;
      }
    }

    let playback: Promise<void>;
    try {
      playback = this.synthesizer.speak(entry.utterance.request);
    } catch (err) {
      playback = Promise.reject(err);
    }

    // finish() never throws, so the chain cannot reject
    void playback.then(
      () => this.finish(entry, 'completed'),
      (err: unknown) => this.finish(entry, 'failed', err)
    );
  }

  private finish(entry: QueuedUtterance, state: 'completed' | 'failed', cause?: unknown): void {
    if (this.current !== entry) {
      return;
    }
    this.current = null;

    if (state === 'failed' && !entry.isTerminal) {
      const error = new PhonicsError(
        PhonicsErrorType.SYNTHESIS_FAILED,
        `Could not speak ${describeRequest(entry.utterance.request)}: ${describeError(cause)}`,
        { cause }
      );
      console.warn('[speech]', `(${entry.utterance.priority ?? 'prompt'}) ${error.message}`);
      entry.settle('failed', error);
    } else {
      entry.settle(state);
    }

    this.pump();
  }

  private stopSynthesizer(): void {
    try {
      this.synthesizer.stop();
    } catch (err) {
      console.warn('[speech]', `stop failed: ${describeError(err)}`);
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
