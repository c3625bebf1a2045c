import * as path from 'path';
import { TIERS, loadCurriculum, type Curriculum } from '../src/lib/curriculum';
import { describeError } from '../src/lib/errors';

const CURRICULUM_FILE = path.join(process.cwd(), 'data', 'curriculum.json');

/**
 * One line per tier plus totals, e.g.
 * `easy: 15 letters, 12 words (A B E ...)`
 */
export function summarizeCurriculum(curriculum: Curriculum): string[] {
  const lines: string[] = [];

  for (const tier of TIERS) {
    const letters = curriculum.lettersByDifficulty(tier);
    const words = curriculum.wordsByDifficulty(tier);
    lines.push(
      `${tier}: ${letters.length} letters, ${words.length} words (${letters.map((l) => l.glyph).join(' ')})`
    );
  }

  const usedLetters = new Set(curriculum.allWords().flatMap((word) => word.letters));
  const unused = curriculum.allLetters().filter((letter) => !usedLetters.has(letter.id));
  lines.push(`Total: ${curriculum.allLetters().length} letters, ${curriculum.allWords().length} words`);
  if (unused.length > 0) {
    lines.push(`Letters in no word: ${unused.map((l) => l.id).join(', ')}`);
  }

  return lines;
}

export function checkCurriculum(filePath: string): string[] {
  return summarizeCurriculum(loadCurriculum(filePath));
}

// CLI entry point
if (require.main === module) {
  const filePath = process.argv[2] ? path.resolve(process.argv[2]) : CURRICULUM_FILE;

  try {
    console.log(`Checking ${filePath}`);
    for (const line of checkCurriculum(filePath)) {
      console.log(line);
    }
    console.log('Curriculum OK');
  } catch (err) {
    console.error('Curriculum check failed:', describeError(err));
    process.exit(1);
  }
}
