import { invalidCommand, type ExerciseContext, type ModeRunner } from './context';
import type { Letter } from '../../types/curriculum';
import type { ExerciseItem } from '../../types/exercise';

type LetterItem = Extract<ExerciseItem, { kind: 'letter' }>;

/**
 * Explore: the child taps any letter and hears its name and sound.
 * Nothing is right or wrong; each visit counts as an exposure.
 */
export function createExploreMode(ctx: ExerciseContext): ModeRunner {
  let item: LetterItem | null = null;
  let cursor = 0;

  function speak(letter: Letter): void {
    ctx.say(
      { kind: 'text', text: `${letter.glyph}. ${letter.name}. ${letter.soundId}.` },
      { priority: 'prompt' }
    );
  }

  function explore(letter: Letter): LetterItem {
    const letters = ctx.curriculum.allLetters();
    cursor = (letters.indexOf(letter) + 1) % letters.length;

    item = { kind: 'letter', letter };
    ctx.ledger.recordExplored(letter.id);
    ctx.interrupt();
    ctx.present(item);
    speak(letter);
    return item;
  }

  return {
    mode: 'explore',
    get current() {
      return item;
    },
    get inProgress() {
      return false;
    },

    // Walks the alphabet in order
    nextItem() {
      const letters = ctx.curriculum.allLetters();
      return explore(letters[cursor % letters.length]);
    },

    submitAnswer(answer) {
      if (answer.kind !== 'explore') {
        throw invalidCommand(`Explore expects a letter to explore, got "${answer.kind}"`);
      }
      const letter = ctx.curriculum.letter(answer.letterId);
      if (!letter) {
        throw invalidCommand(`Unknown letter "${answer.letterId}"`);
      }
      explore(letter);
    },

    replay() {
      if (item) {
        speak(item.letter);
      }
    },
  };
}
