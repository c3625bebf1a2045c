import { invalidCommand, emptyTier, type ExerciseContext, type ModeRunner } from './context';
import { selectNext } from '../selection';
import type { Word } from '../../types/curriculum';
import type { ExerciseItem } from '../../types/exercise';

type WordItem = Extract<ExerciseItem, { kind: 'word' }>;

/**
 * Sound-Out-Words: the whole word plays, then each letter's sound in turn.
 * The child confirms every letter before the next one plays. A wrong
 * confirmation is scored and the word carries on to its last letter.
 */
export function createSoundOutMode(ctx: ExerciseContext): ModeRunner {
  let item: WordItem | null = null;
  let correctCount = 0;
  let finished = false;
  let previousId: string | null = null;

  function wordMastery(word: Word): number {
    const total = word.letters.reduce((sum, id) => sum + ctx.ledger.masteryScore(id), 0);
    return total / word.letters.length;
  }

  function speakWord(current: WordItem): void {
    ctx.say(
      { kind: 'text', text: current.letters.map((letter) => letter.glyph).join('') },
      { priority: 'prompt' }
    );
  }

  // The highlight follows playback, not the command that queued it
  function speakLetter(current: WordItem): void {
    const { word, position } = current;
    ctx.say(
      { kind: 'sound', soundId: current.letters[position].soundId },
      { priority: 'prompt', onStart: () => ctx.events.onLetterHighlighted?.(word, position) }
    );
  }

  return {
    mode: 'soundOut',
    get current() {
      return item;
    },
    get inProgress() {
      return item !== null && !finished;
    },

    nextItem() {
      const tier = ctx.tier();
      const word = selectNext(ctx.curriculum.wordsByDifficulty(tier), wordMastery, {
        previousId,
        minWeight: ctx.config.minSelectionWeight,
        random: ctx.random,
      });
      if (!word) {
        throw emptyTier('words', tier);
      }

      item = { kind: 'word', word, letters: ctx.curriculum.lettersOf(word), position: 0 };
      correctCount = 0;
      finished = false;
      previousId = word.id;

      ctx.interrupt();
      ctx.present(item);
      speakWord(item);
      speakLetter(item);
      return item;
    },

    submitAnswer(answer) {
      if (answer.kind !== 'confirm') {
        throw invalidCommand(`Sound-Out-Words expects a letter confirmation, got "${answer.kind}"`);
      }
      if (!item || finished) {
        throw invalidCommand('No word is being sounded out');
      }
      if (answer.position !== item.position) {
        throw invalidCommand(
          `Expected letter ${item.position} of "${item.word.id}", got position ${answer.position}`
        );
      }

      const target = item.letters[item.position];
      const correct = answer.letterId === target.id;
      ctx.score(target.id, correct);
      if (correct) {
        correctCount += 1;
      }

      item = { ...item, position: item.position + 1 };
      if (item.position < item.letters.length) {
        speakLetter(item);
        return;
      }

      finished = true;
      ctx.events.onWordCompleted?.(item.word, correctCount);
      ctx.say({ kind: 'text', text: ctx.curriculum.phrases.wordDone }, { priority: 'feedback' });
      ctx.checkLevelUp();
    },

    replay() {
      if (!item) {
        return;
      }
      if (finished) {
        speakWord(item);
      } else {
        speakLetter(item);
      }
    },
  };
}
