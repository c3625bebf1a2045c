import { nextTier, type Curriculum } from './curriculum';
import type { EngineConfig } from './config';
import type { MasteryReader } from './progressLedger';
import type { Tier } from '../types/curriculum';

export type LevelUpPolicy = Pick<EngineConfig, 'levelUpThreshold' | 'levelUpMinSamples'>;

/** Average mastery score across the letters of a tier (0 for an empty tier). */
export function tierAverage(curriculum: Curriculum, ledger: MasteryReader, tier: Tier): number {
  const letters = curriculum.lettersByDifficulty(tier);
  if (letters.length === 0) {
    return 0;
  }
  const sum = letters.reduce((total, letter) => total + ledger.masteryScore(letter.id), 0);
  return sum / letters.length;
}

/**
 * The tier to move up to, or null. A tier is done when every one of its
 * letters has been tested at least levelUpMinSamples times and the average
 * score reaches levelUpThreshold. Never skips a tier.
 */
export function checkLevelUp(
  curriculum: Curriculum,
  ledger: MasteryReader,
  tier: Tier,
  policy: LevelUpPolicy
): Tier | null {
  const next = nextTier(tier);
  if (!next) {
    return null;
  }

  const letters = curriculum.lettersByDifficulty(tier);
  if (letters.length === 0) {
    return null;
  }

  const sampled = letters.every((letter) => ledger.mastery(letter.id).attempts >= policy.levelUpMinSamples);
  if (!sampled) {
    return null;
  }

  return tierAverage(curriculum, ledger, tier) >= policy.levelUpThreshold ? next : null;
}
