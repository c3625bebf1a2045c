import type { MasteryReader } from './progressLedger';

export type ConfidenceLevel = 'unseen' | 'weak' | 'learning' | 'strong' | 'mastered';

export interface MasterySummary {
  total: number;
  unseen: number;
  weak: number;
  learning: number;
  strong: number;
  mastered: number;
  seenCount: number;
  seenPercentage: number;
}

/**
 * Compute confidence level for one letter.
 *
 * Levels:
 * - unseen: never tested nor explored
 * - mastered: score = 1 AND tested attempts >= masteredAfter
 * - weak: score < 0.5
 * - strong: score > 0.8 AND tested attempts >= 2
 * - learning: everything else
 */
export function computeConfidenceLevel(
  attempts: number,
  explored: number,
  score: number,
  masteredAfter: number = 3
): ConfidenceLevel {
  if (attempts === 0 && explored === 0) {
    return 'unseen';
  }

  if (score === 1 && attempts >= masteredAfter) {
    return 'mastered';
  }

  if (score < 0.5) {
    return 'weak';
  }

  if (score > 0.8 && attempts >= 2) {
    return 'strong';
  }

  return 'learning';
}

export function confidenceOf(letterId: string, ledger: MasteryReader, masteredAfter?: number): ConfidenceLevel {
  const { attempts, explored } = ledger.mastery(letterId);
  return computeConfidenceLevel(attempts, explored, ledger.masteryScore(letterId), masteredAfter);
}

/**
 * Categorize letters by confidence level.
 */
export function categorizeLetters(
  letterIds: readonly string[],
  ledger: MasteryReader,
  masteredAfter?: number
): Record<ConfidenceLevel, string[]> {
  const categories: Record<ConfidenceLevel, string[]> = {
    unseen: [],
    weak: [],
    learning: [],
    strong: [],
    mastered: [],
  };

  for (const letterId of letterIds) {
    categories[confidenceOf(letterId, ledger, masteredAfter)].push(letterId);
  }

  return categories;
}

/**
 * Get summary statistics for a set of letters, e.g. for a progress bar.
 */
export function getStatsSummary(
  letterIds: readonly string[],
  ledger: MasteryReader,
  masteredAfter?: number
): MasterySummary {
  const categories = categorizeLetters(letterIds, ledger, masteredAfter);

  const total = letterIds.length;
  const unseen = categories.unseen.length;
  const seenCount = total - unseen;
  const seenPercentage = total > 0 ? Math.round((seenCount / total) * 100) : 0;

  return {
    total,
    unseen,
    weak: categories.weak.length,
    learning: categories.learning.length,
    strong: categories.strong.length,
    mastered: categories.mastered.length,
    seenCount,
    seenPercentage,
  };
}
