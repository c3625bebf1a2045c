import { invalidCommand, emptyTier, type ExerciseContext, type ModeRunner } from './context';
import { pickMessage } from '../messages';
import { selectNext, shuffle } from '../selection';
import type { Letter } from '../../types/curriculum';
import type { ExerciseItem } from '../../types/exercise';

type FindItem = Extract<ExerciseItem, { kind: 'findLetter' }>;

/**
 * Find-the-Letter: a sound plays and the child picks the letter that makes
 * it. A miss keeps the same target so the child can try again.
 */
export function createFindLetterMode(ctx: ExerciseContext): ModeRunner {
  let item: FindItem | null = null;
  let answered = false;
  let previousId: string | null = null;

  function speakTarget(target: Letter): void {
    ctx.say({ kind: 'sound', soundId: target.soundId }, { priority: 'prompt' });
  }

  function pickChoices(target: Letter): Letter[] {
    const distractors = shuffle(
      ctx.curriculum.allLetters().filter((letter) => letter.id !== target.id),
      ctx.random
    ).slice(0, Math.max(0, ctx.config.findChoiceCount - 1));
    return shuffle([target, ...distractors], ctx.random);
  }

  return {
    mode: 'find',
    get current() {
      return item;
    },
    get inProgress() {
      return false;
    },

    nextItem() {
      const tier = ctx.tier();
      const target = selectNext(
        ctx.curriculum.lettersByDifficulty(tier),
        (letter) => ctx.ledger.masteryScore(letter.id),
        { previousId, minWeight: ctx.config.minSelectionWeight, random: ctx.random }
      );
      if (!target) {
        throw emptyTier('letters', tier);
      }

      item = { kind: 'findLetter', target, choices: pickChoices(target) };
      answered = false;
      previousId = target.id;

      ctx.interrupt();
      ctx.present(item);
      speakTarget(target);
      return item;
    },

    submitAnswer(answer) {
      if (answer.kind !== 'select') {
        throw invalidCommand(`Find-the-Letter expects a letter selection, got "${answer.kind}"`);
      }
      if (!item) {
        throw invalidCommand('No letter has been presented yet');
      }
      if (answered) {
        throw invalidCommand(`"${item.target.id}" has already been found`);
      }

      const correct = answer.letterId === item.target.id;
      ctx.score(item.target.id, correct);

      if (correct) {
        answered = true;
        const cheer = pickMessage(ctx.curriculum.phrases.cheers, ctx.random);
        ctx.say({ kind: 'text', text: cheer }, { priority: 'feedback' });
      }
      ctx.checkLevelUp();
    },

    replay() {
      if (item) {
        speakTarget(item.target);
      }
    },
  };
}
