import type { ExerciseContext, ModeRunner } from './context';
import { createExploreMode } from './explore';
import { createFindLetterMode } from './findLetter';
import { createSoundOutMode } from './soundOut';
import type { ExerciseMode } from '../../types/exercise';

export function createModeRunner(mode: ExerciseMode, ctx: ExerciseContext): ModeRunner {
  switch (mode) {
    case 'explore':
      return createExploreMode(ctx);
    case 'find':
      return createFindLetterMode(ctx);
    case 'soundOut':
      return createSoundOutMode(ctx);
    default: {
      const unknown: never = mode;
      throw new Error(`Unknown exercise mode: ${String(unknown)}`);
    }
  }
}
