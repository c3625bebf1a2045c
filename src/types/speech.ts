/**
 * Types for the speech pipeline
 */

import type { PhonicsError } from '../lib/errors';

/** What to say: free text, or a letter's phoneme id */
export type SpeechRequest =
  | { kind: 'text'; text: string }
  | { kind: 'sound'; soundId: string };

/**
 * Any text-to-speech backend. `speak` settles when playback has finished;
 * `stop` interrupts the utterance currently playing.
 */
export interface Synthesizer {
  speak(request: SpeechRequest): Promise<void>;
  stop(): void;
}

export type UtterancePriority = 'prompt' | 'feedback';

export interface Utterance {
  request: SpeechRequest;
  priority?: UtterancePriority;
  /** Called when the utterance moves from queued to playing */
  onStart?: () => void;
}

export type UtteranceState = 'queued' | 'playing' | 'completed' | 'cancelled' | 'failed';

export type TerminalState = Extract<UtteranceState, 'completed' | 'cancelled' | 'failed'>;

export interface UtteranceOutcome {
  state: TerminalState;
  error?: PhonicsError;
}

export interface UtteranceHandle {
  readonly id: number;
  readonly state: UtteranceState;
  /** Resolves once the utterance reaches a terminal state. Never rejects. */
  readonly done: Promise<UtteranceOutcome>;
}
