/**
 * Types for the phonics curriculum (alphabet and word lists)
 */

export type Tier = 'easy' | 'medium' | 'hard';

/** A single letter of the alphabet */
export interface Letter {
  readonly id: string;       // "A", "Å"
  readonly soundId: string;  // "aaa", elongated phoneme spoken inside words
  readonly glyph: string;    // "A"
  readonly name: string;     // "ah", spoken letter name
  readonly tier: Tier;
}

/** A word the child sounds out letter by letter */
export interface Word {
  readonly id: string;                 // "SOL"
  readonly letters: readonly string[]; // Letter ids in reading order
  readonly tier: Tier;
  readonly gloss?: string;             // Meaning shown as a hint
}

/** Feedback spoken aloud, in the curriculum's language */
export interface SpokenPhrases {
  cheers: string[];   // After a found letter
  wordDone: string;   // After a sounded-out word
}

/** The curriculum file structure (data/curriculum.json) */
export interface CurriculumBank {
  letters: Letter[];
  words: Word[];
  phrases?: SpokenPhrases;
  metadata: {
    language: string;
    source: string;
  };
}
