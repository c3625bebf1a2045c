/**
 * Types for per-child progress
 */

import type { Tier } from './curriculum';

/** Per-letter counters. `correct <= attempts` always holds. */
export interface MasteryRecord {
  attempts: number;
  correct: number;
  /** Exposures in Explore mode, kept apart from tested attempts */
  explored: number;
  lastSeen: string | null;
}

/** Read-only copy of a ledger's state */
export interface ProgressSnapshot {
  profileId: string;
  perLetterMastery: Record<string, MasteryRecord>;
  currentTier: Tier;
  totalStars: number;
  bestStreak: number;
  createdAt: string;
  updatedAt: string;
}
