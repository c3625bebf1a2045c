import { z } from 'zod';
import { PhonicsError, PhonicsErrorType } from './errors';

// passthrough() keeps fields written by newer versions so they survive a rewrite
const masteryEntrySchema = z
  .object({
    attempts: z.number().int().nonnegative(),
    correct: z.number().int().nonnegative(),
    explored: z.number().int().nonnegative().default(0),
    lastSeen: z.string().nullable().default(null),
  })
  .passthrough()
  .refine((entry) => entry.correct <= entry.attempts, {
    message: 'correct exceeds attempts',
  });

export const persistedProfileSchema = z
  .object({
    profileId: z.string().min(1),
    perLetterMastery: z.record(z.string(), masteryEntrySchema),
    currentTier: z.enum(['easy', 'medium', 'hard']),
    totalStars: z.number().int().nonnegative(),
    bestStreak: z.number().int().nonnegative().default(0),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .passthrough();

/** One stored profile, as written to disk */
export type PersistedProfile = z.infer<typeof persistedProfileSchema>;
export type PersistedMastery = PersistedProfile['perLetterMastery'][string];

/**
 * Validate a raw stored value. Anything unreadable becomes StorageCorrupt.
 */
export function parseProfileRecord(raw: unknown, profileId: string): PersistedProfile {
  const parsed = persistedProfileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PhonicsError(
      PhonicsErrorType.STORAGE_CORRUPT,
      `Profile "${profileId}" is invalid at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }
  if (parsed.data.profileId !== profileId) {
    throw new PhonicsError(
      PhonicsErrorType.STORAGE_CORRUPT,
      `Profile "${profileId}" holds data for "${parsed.data.profileId}"`
    );
  }
  return parsed.data;
}

export function parseProfileJson(json: string, profileId: string): PersistedProfile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new PhonicsError(
      PhonicsErrorType.STORAGE_CORRUPT,
      `Profile "${profileId}" is not valid JSON`,
      { cause: err }
    );
  }
  return parseProfileRecord(raw, profileId);
}
