import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { PhonicsError, PhonicsErrorType, describeError } from './errors';
import { CHEERS, WORD_DONE } from './messages';
import type { CurriculumBank, Letter, Tier, Word } from '../types/curriculum';

export const TIERS: readonly Tier[] = ['easy', 'medium', 'hard'];

const DEFAULT_CURRICULUM_PATH = path.join(process.cwd(), 'data', 'curriculum.json');

const tierSchema = z.enum(['easy', 'medium', 'hard']);

const curriculumSchema = z.object({
  letters: z.array(
    z.object({
      id: z.string().min(1),
      soundId: z.string().min(1),
      glyph: z.string().min(1),
      name: z.string().min(1),
      tier: tierSchema,
    })
  ),
  words: z.array(
    z.object({
      id: z.string().min(1),
      letters: z.array(z.string()).min(1),
      tier: tierSchema,
      gloss: z.string().optional(),
    })
  ),
  phrases: z
    .object({
      cheers: z.array(z.string().min(1)).min(1),
      wordDone: z.string().min(1),
    })
    .optional(),
  metadata: z.object({
    language: z.string(),
    source: z.string(),
  }),
});

export interface CurriculumPhrases {
  readonly cheers: readonly string[];
  readonly wordDone: string;
}

export function nextTier(tier: Tier): Tier | null {
  const index = TIERS.indexOf(tier);
  return index >= 0 && index < TIERS.length - 1 ? TIERS[index + 1] : null;
}

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

function isSingleGrapheme(value: string): boolean {
  const segments = Array.from(new Intl.Segmenter().segment(value));
  return segments.length === 1;
}

function corrupt(message: string, cause?: unknown): PhonicsError {
  return new PhonicsError(PhonicsErrorType.CURRICULUM_CORRUPT, message, { cause });
}

/**
 * Read-only view over a validated curriculum.
 */
export class Curriculum {
  private readonly letters: readonly Letter[];
  private readonly words: readonly Word[];
  private readonly lettersById: ReadonlyMap<string, Letter>;
  private readonly wordsById: ReadonlyMap<string, Word>;
  readonly metadata: Readonly<CurriculumBank['metadata']>;
  /** English unless the bank ships its own */
  readonly phrases: CurriculumPhrases;

  private constructor(bank: CurriculumBank) {
    this.letters = Object.freeze(bank.letters.map((letter) => Object.freeze({ ...letter })));
    this.words = Object.freeze(
      bank.words.map((word) => Object.freeze({ ...word, letters: Object.freeze([...word.letters]) }))
    );
    this.lettersById = new Map(this.letters.map((letter) => [letter.id, letter]));
    this.wordsById = new Map(this.words.map((word) => [word.id, word]));
    this.metadata = Object.freeze({ ...bank.metadata });
    this.phrases = bank.phrases
      ? Object.freeze({ cheers: Object.freeze([...bank.phrases.cheers]), wordDone: bank.phrases.wordDone })
      : Object.freeze({ cheers: CHEERS, wordDone: WORD_DONE });
  }

  /**
   * Validate a bank and build the curriculum. Every word must spell with
   * known letters and every tier must hold at least one letter and one word.
   */
  static fromBank(bank: unknown): Curriculum {
    const parsed = curriculumSchema.safeParse(bank);
    if (!parsed.success) {
      throw corrupt(`Curriculum does not match the expected shape: ${parsed.error.issues[0].message}`);
    }
    const data = parsed.data;

    const letterIds = new Set<string>();
    for (const letter of data.letters) {
      if (!isSingleGrapheme(letter.id)) {
        throw corrupt(`Letter id "${letter.id}" is not a single grapheme`);
      }
      if (letterIds.has(letter.id)) {
        throw corrupt(`Duplicate letter "${letter.id}"`);
      }
      letterIds.add(letter.id);
    }

    const wordIds = new Set<string>();
    for (const word of data.words) {
      if (wordIds.has(word.id)) {
        throw corrupt(`Duplicate word "${word.id}"`);
      }
      wordIds.add(word.id);

      const unknown = word.letters.filter((id) => !letterIds.has(id));
      if (unknown.length > 0) {
        throw corrupt(`Word "${word.id}" uses unknown letters: ${unknown.join(', ')}`);
      }
    }

    for (const tier of TIERS) {
      if (!data.letters.some((letter) => letter.tier === tier)) {
        throw corrupt(`No letters in tier "${tier}"`);
      }
      if (!data.words.some((word) => word.tier === tier)) {
        throw corrupt(`No words in tier "${tier}"`);
      }
    }

    return new Curriculum(data);
  }

  lettersByDifficulty(tier: Tier): readonly Letter[] {
    return this.letters.filter((letter) => letter.tier === tier);
  }

  wordsByDifficulty(tier: Tier): readonly Word[] {
    return this.words.filter((word) => word.tier === tier);
  }

  allLetters(): readonly Letter[] {
    return this.letters;
  }

  allWords(): readonly Word[] {
    return this.words;
  }

  letter(id: string): Letter | undefined {
    return this.lettersById.get(id);
  }

  word(id: string): Word | undefined {
    return this.wordsById.get(id);
  }

  /** The letters of a word, in reading order */
  lettersOf(word: Word): Letter[] {
    return word.letters.map((id) => {
      const letter = this.lettersById.get(id);
      if (!letter) {
        throw corrupt(`Word "${word.id}" uses unknown letter "${id}"`);
      }
      return letter;
    });
  }
}

let curriculumCache: Curriculum | null = null;

function readCurriculumFile(filePath: string): Curriculum {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw corrupt(`Cannot read curriculum at ${filePath}: ${describeError(err)}`, err);
  }
  return Curriculum.fromBank(data);
}

/**
 * Load the curriculum from a file path or an in-memory bank. The default
 * file is read once and cached.
 */
export function loadCurriculum(source?: string | CurriculumBank): Curriculum {
  try {
    if (source === undefined) {
      if (!curriculumCache) {
        curriculumCache = readCurriculumFile(DEFAULT_CURRICULUM_PATH);
      }
      return curriculumCache;
    }
    return typeof source === 'string' ? readCurriculumFile(source) : Curriculum.fromBank(source);
  } catch (err) {
    console.error('[curriculum]', describeError(err));
    throw err;
  }
}

export function clearCurriculumCache(): void {
  curriculumCache = null;
}
