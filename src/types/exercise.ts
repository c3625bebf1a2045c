/**
 * Types for exercises and the UI boundary
 */

import type { Letter, Tier, Word } from './curriculum';
import type { PhonicsError } from '../lib/errors';

export type ExerciseMode = 'explore' | 'find' | 'soundOut';

/** What the UI shows the child */
export type ExerciseItem =
  | { kind: 'letter'; letter: Letter }
  | { kind: 'findLetter'; target: Letter; choices: Letter[] }
  | { kind: 'word'; word: Word; letters: Letter[]; position: number };

/** Commands coming back from the UI */
export type Answer =
  | { kind: 'select'; letterId: string }
  | { kind: 'confirm'; position: number; letterId: string }
  | { kind: 'explore'; letterId: string };

export interface Feedback {
  letterId: string;
  correct: boolean;
  streak: number;
  /** Stars earned so far in this session */
  starsEarned: number;
  message: string;
}

export interface ExerciseEvents {
  onItemPresented?(item: ExerciseItem): void;
  onFeedback?(feedback: Feedback): void;
  onLevelUp?(tier: Tier): void;
  /** A letter of the current word started playing */
  onLetterHighlighted?(word: Word, position: number): void;
  onWordCompleted?(word: Word, correctCount: number): void;
  /** Speech failed; the exercise carries on visually */
  onDegraded?(error: PhonicsError): void;
}

/** Live state of one play session, owned by its engine */
export interface SessionState {
  mode: ExerciseMode;
  item: ExerciseItem | null;
  streak: number;
  bestStreak: number;
  starsEarned: number;
  tier: Tier;
}
