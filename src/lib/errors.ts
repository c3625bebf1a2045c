// Error types for consistent handling across the engine
export enum PhonicsErrorType {
  CURRICULUM_CORRUPT = 'curriculum_corrupt',
  PROFILE_NOT_FOUND = 'profile_not_found',
  STORAGE_CORRUPT = 'storage_corrupt',
  STORAGE_WRITE_FAILED = 'storage_write_failed',
  SYNTHESIS_FAILED = 'synthesis_failed',
  SESSION_ALREADY_ACTIVE = 'session_already_active',
  INVALID_COMMAND = 'invalid_command',
  CONFIG_INVALID = 'config_invalid',
}

export class PhonicsError extends Error {
  readonly type: PhonicsErrorType;

  constructor(type: PhonicsErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PhonicsError';
    this.type = type;
  }
}

export function isPhonicsError(err: unknown, type?: PhonicsErrorType): err is PhonicsError {
  return err instanceof PhonicsError && (type === undefined || err.type === type);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
