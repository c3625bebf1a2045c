import path from 'path';
import { z } from 'zod';
import { PhonicsError, PhonicsErrorType } from './errors';

export type StorageBackend = 'sqlite' | 'json';

export interface EngineConfig {
  /** Every Nth consecutive correct answer earns a star */
  starMilestone: number;
  /** Average mastery a tier must reach before moving up */
  levelUpThreshold: number;
  /** Tested attempts every letter of the tier needs before a level-up */
  levelUpMinSamples: number;
  /** Weight of an Explore exposure in the mastery score (0 ignores them) */
  exploreWeight: number;
  /** Selection weight floor, so well-known items still come back */
  minSelectionWeight: number;
  /** Letters shown in a Find-the-Letter round, target included */
  findChoiceCount: number;
  persistMaxRetries: number;
  persistRetryDelayMs: number;
  dataDir: string;
  curriculumPath: string;
  storage: StorageBackend;
}

const DATA_DIR = path.join(process.cwd(), 'data');

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  starMilestone: 5,
  levelUpThreshold: 0.8,
  levelUpMinSamples: 3,
  exploreWeight: 0.25,
  minSelectionWeight: 0.1,
  findChoiceCount: 6,
  persistMaxRetries: 3,
  persistRetryDelayMs: 200,
  dataDir: DATA_DIR,
  curriculumPath: path.join(DATA_DIR, 'curriculum.json'),
  storage: 'sqlite',
});

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  starMilestone: 'PHONICS_STAR_MILESTONE',
  levelUpThreshold: 'PHONICS_LEVEL_UP_THRESHOLD',
  levelUpMinSamples: 'PHONICS_LEVEL_UP_MIN_SAMPLES',
  exploreWeight: 'PHONICS_EXPLORE_WEIGHT',
  minSelectionWeight: 'PHONICS_MIN_SELECTION_WEIGHT',
  findChoiceCount: 'PHONICS_FIND_CHOICE_COUNT',
  persistMaxRetries: 'PHONICS_PERSIST_MAX_RETRIES',
  persistRetryDelayMs: 'PHONICS_PERSIST_RETRY_DELAY_MS',
  dataDir: 'PHONICS_DATA_DIR',
  curriculumPath: 'PHONICS_CURRICULUM_PATH',
  storage: 'PHONICS_STORAGE',
};

const configSchema = z.object({
  starMilestone: z.coerce.number().int().min(1),
  levelUpThreshold: z.coerce.number().min(0).max(1),
  levelUpMinSamples: z.coerce.number().int().min(1),
  exploreWeight: z.coerce.number().min(0).max(1),
  minSelectionWeight: z.coerce.number().min(0).max(1),
  findChoiceCount: z.coerce.number().int().min(2),
  persistMaxRetries: z.coerce.number().int().min(0),
  persistRetryDelayMs: z.coerce.number().int().min(0),
  dataDir: z.string().min(1),
  curriculumPath: z.string().min(1),
  storage: z.enum(['sqlite', 'json']),
});

/**
 * Build the engine configuration from defaults and PHONICS_* environment
 * variables. The curriculum path follows PHONICS_DATA_DIR unless it is set
 * on its own.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<EngineConfig> {
  const dataDir = env[ENV_KEYS.dataDir] || DEFAULT_CONFIG.dataDir;
  const raw: Record<string, unknown> = {
    ...DEFAULT_CONFIG,
    dataDir,
    curriculumPath: path.join(dataDir, 'curriculum.json'),
  };

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = String(issue.path[0]);
    const envName = Object.entries(ENV_KEYS).find(([key]) => key === field)?.[1] ?? field;
    throw new PhonicsError(
      PhonicsErrorType.CONFIG_INVALID,
      `Invalid value for ${envName}: ${issue.message}`
    );
  }

  return Object.freeze(parsed.data);
}
