import { DEFAULT_CONFIG } from './config';
import { tierRank, nextTier } from './curriculum';
import { PhonicsError, PhonicsErrorType, describeError, isPhonicsError } from './errors';
import type { PersistedMastery, PersistedProfile } from './profileRecord';
import type { ProgressStorage } from './progressStorage';
import type { Tier } from '../types/curriculum';
import type { MasteryRecord, ProgressSnapshot } from '../types/progress';

export type PersistResult = { ok: true } | { ok: false; error: PhonicsError };

export interface LedgerOptions {
  /** Weight of an Explore exposure in masteryScore; the engine default when unset */
  exploreWeight?: number;
}

/** Read access the selection and stats code needs */
export interface MasteryReader {
  mastery(letterId: string): MasteryRecord;
  masteryScore(letterId: string): number;
}

interface MasteryEntry {
  record: MasteryRecord;
  // Fields this version does not know about, written back untouched
  extras: Record<string, unknown>;
}

const EMPTY_RECORD: Readonly<MasteryRecord> = Object.freeze({
  attempts: 0,
  correct: 0,
  explored: 0,
  lastSeen: null,
});

function splitMastery(entry: PersistedMastery): MasteryEntry {
  const { attempts, correct, explored, lastSeen, ...extras } = entry;
  return { record: { attempts, correct, explored, lastSeen }, extras };
}

/**
 * In-memory progress of one child, backed by a ProgressStorage. Outcomes
 * update memory immediately; nothing reaches storage until persist().
 */
export class ProgressLedger implements MasteryReader {
  private readonly entries = new Map<string, MasteryEntry>();
  private tier: Tier;
  private stars: number;
  private streakRecord: number;
  private readonly createdAt: string;
  private updatedAt: string;
  private readonly extras: Record<string, unknown>;
  private readonly exploreWeight: number;
  private dirty: boolean;

  private constructor(
    private readonly storage: ProgressStorage,
    readonly profileId: string,
    record: PersistedProfile,
    dirty: boolean,
    options: LedgerOptions
  ) {
    const {
      profileId: _profileId,
      perLetterMastery,
      currentTier,
      totalStars,
      bestStreak,
      createdAt,
      updatedAt,
      ...extras
    } = record;

    for (const [letterId, entry] of Object.entries(perLetterMastery)) {
      this.entries.set(letterId, splitMastery(entry));
    }
    this.tier = currentTier;
    this.stars = totalStars;
    this.streakRecord = bestStreak;
    this.createdAt = createdAt;
    this.updatedAt = updatedAt;
    this.extras = extras;
    this.exploreWeight = options.exploreWeight ?? DEFAULT_CONFIG.exploreWeight;
    this.dirty = dirty;
  }

  /** Load a stored profile; fails with ProfileNotFound or StorageCorrupt. */
  static load(storage: ProgressStorage, profileId: string, options: LedgerOptions = {}): ProgressLedger {
    return new ProgressLedger(storage, profileId, storage.read(profileId), false, options);
  }

  /** A zeroed profile that has never been written. */
  static fresh(
    storage: ProgressStorage,
    profileId: string,
    options: LedgerOptions = {},
    now: Date = new Date()
  ): ProgressLedger {
    const timestamp = now.toISOString();
    const record: PersistedProfile = {
      profileId,
      perLetterMastery: {},
      currentTier: 'easy',
      totalStars: 0,
      bestStreak: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    return new ProgressLedger(storage, profileId, record, true, options);
  }

  get currentTier(): Tier {
    return this.tier;
  }

  get totalStars(): number {
    return this.stars;
  }

  get bestStreak(): number {
    return this.streakRecord;
  }

  /** True when memory holds changes storage has not seen */
  get isDirty(): boolean {
    return this.dirty;
  }

  private entryFor(letterId: string): MasteryEntry {
    let entry = this.entries.get(letterId);
    if (!entry) {
      entry = { record: { ...EMPTY_RECORD }, extras: {} };
      this.entries.set(letterId, entry);
    }
    return entry;
  }

  /** One real tested attempt at a letter. */
  recordOutcome(letterId: string, correct: boolean, at: Date = new Date()): void {
    const { record } = this.entryFor(letterId);
    record.attempts += 1;
    if (correct) {
      record.correct += 1;
    }
    record.lastSeen = at.toISOString();
    this.dirty = true;
  }

  /** An untested exposure from Explore mode. */
  recordExplored(letterId: string, at: Date = new Date()): void {
    const { record } = this.entryFor(letterId);
    record.explored += 1;
    record.lastSeen = at.toISOString();
    this.dirty = true;
  }

  mastery(letterId: string): MasteryRecord {
    const entry = this.entries.get(letterId);
    return entry ? { ...entry.record } : { ...EMPTY_RECORD };
  }

  /**
   * Share of correct answers in [0, 1]. Explore exposures count as correct
   * answers scaled by the explore weight. Unknown letters score 0.
   */
  masteryScore(letterId: string): number {
    const { attempts, correct, explored } = this.mastery(letterId);
    const exposure = this.exploreWeight * explored;
    const total = attempts + exposure;
    return total === 0 ? 0 : (correct + exposure) / total;
  }

  addStars(count: number): void {
    if (count > 0) {
      this.stars += count;
      this.dirty = true;
    }
  }

  noteStreak(streak: number): void {
    if (streak > this.streakRecord) {
      this.streakRecord = streak;
      this.dirty = true;
    }
  }

  /** Move up exactly one tier. */
  advanceTier(): Tier {
    const next = nextTier(this.tier);
    if (!next) {
      throw new PhonicsError(PhonicsErrorType.INVALID_COMMAND, `Already at the top tier "${this.tier}"`);
    }
    this.tier = next;
    this.dirty = true;
    return next;
  }

  /** Explicit external reset; the only way a tier goes down. */
  resetTier(tier: Tier): void {
    if (tierRank(tier) > tierRank(this.tier)) {
      throw new PhonicsError(
        PhonicsErrorType.INVALID_COMMAND,
        `Cannot reset from "${this.tier}" up to "${tier}"`
      );
    }
    if (tier !== this.tier) {
      this.tier = tier;
      this.dirty = true;
    }
  }

  snapshot(): ProgressSnapshot {
    const perLetterMastery: Record<string, MasteryRecord> = {};
    for (const [letterId, entry] of this.entries) {
      perLetterMastery[letterId] = { ...entry.record };
    }
    return {
      profileId: this.profileId,
      perLetterMastery,
      currentTier: this.tier,
      totalStars: this.stars,
      bestStreak: this.streakRecord,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  private toRecord(updatedAt: string): PersistedProfile {
    const perLetterMastery: Record<string, PersistedMastery> = {};
    for (const [letterId, entry] of this.entries) {
      perLetterMastery[letterId] = { ...entry.extras, ...entry.record };
    }
    return {
      ...this.extras,
      profileId: this.profileId,
      perLetterMastery,
      currentTier: this.tier,
      totalStars: this.stars,
      bestStreak: this.streakRecord,
      createdAt: this.createdAt,
      updatedAt,
    };
  }

  /** Write the whole profile to storage. */
  persist(now: Date = new Date()): PersistResult {
    const updatedAt = now.toISOString();
    try {
      this.storage.write(this.toRecord(updatedAt));
    } catch (err) {
      const error = isPhonicsError(err, PhonicsErrorType.STORAGE_WRITE_FAILED)
        ? err
        : new PhonicsError(
            PhonicsErrorType.STORAGE_WRITE_FAILED,
            `Could not save profile "${this.profileId}": ${describeError(err)}`,
            { cause: err }
          );
      console.warn('[ledger]', error.message);
      return { ok: false, error };
    }
    this.updatedAt = updatedAt;
    this.dirty = false;
    return { ok: true };
  }
}

export interface OpenedLedger {
  ledger: ProgressLedger;
  /** Set when a stored profile was unreadable and replaced by a fresh one */
  warning?: PhonicsError;
}

/**
 * Load a profile, falling back to a fresh one when it does not exist or
 * cannot be read.
 */
export function openLedger(
  storage: ProgressStorage,
  profileId: string,
  options: LedgerOptions = {}
): OpenedLedger {
  try {
    return { ledger: ProgressLedger.load(storage, profileId, options) };
  } catch (err) {
    if (isPhonicsError(err, PhonicsErrorType.PROFILE_NOT_FOUND)) {
      return { ledger: ProgressLedger.fresh(storage, profileId, options) };
    }
    if (isPhonicsError(err, PhonicsErrorType.STORAGE_CORRUPT)) {
      console.warn('[ledger]', `${err.message}; starting a fresh profile`);
      return { ledger: ProgressLedger.fresh(storage, profileId, options), warning: err };
    }
    throw err;
  }
}
