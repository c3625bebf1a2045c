/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export interface WeightedEntry<T> {
  item: T;
  weight: number;
}

export interface SelectionOptions {
  /** Id of the item shown last; skipped when there is anything else to pick */
  previousId?: string | null;
  minWeight: number;
  random: RandomSource;
}

/**
 * Weighted random pick. Entries with zero weight are never chosen unless
 * every entry has zero weight, in which case the pick is uniform.
 */
export function pickWeighted<T>(pool: WeightedEntry<T>[], random: RandomSource): T | null {
  if (pool.length === 0) {
    return null;
  }

  const weighted = pool.filter((entry) => entry.weight > 0);
  if (weighted.length === 0) {
    return pool[Math.floor(random() * pool.length) % pool.length].item;
  }

  const totalWeight = weighted.reduce((sum, entry) => sum + entry.weight, 0);
  let remaining = random() * totalWeight;

  for (const entry of weighted) {
    remaining -= entry.weight;
    if (remaining <= 0) {
      return entry.item;
    }
  }

  // Floating point leftovers land on the last entry
  return weighted[weighted.length - 1].item;
}

/**
 * Select the next item to practise. Lower mastery means a higher chance of
 * being picked; the previous item is never repeated while another
 * candidate exists.
 */
export function selectNext<T extends { id: string }>(
  candidates: readonly T[],
  masteryOf: (item: T) => number,
  options: SelectionOptions
): T | null {
  const eligible =
    candidates.length >= 2 && options.previousId
      ? candidates.filter((item) => item.id !== options.previousId)
      : [...candidates];

  const pool = eligible.map((item) => ({
    item,
    weight: Math.max(options.minWeight, 1 - masteryOf(item)),
  }));

  return pickWeighted(pool, options.random);
}

/** Fisher-Yates shuffle into a new array */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}
