import type { Database } from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { PhonicsError, PhonicsErrorType, describeError } from './errors';
import { parseProfileJson, type PersistedProfile } from './profileRecord';

/**
 * Durable home of profile records. Reads fail with ProfileNotFound or
 * StorageCorrupt; writes either land completely or fail with
 * StorageWriteFailed.
 */
export interface ProgressStorage {
  read(profileId: string): PersistedProfile;
  write(record: PersistedProfile): void;
  listProfiles(): string[];
}

function notFound(profileId: string): PhonicsError {
  return new PhonicsError(PhonicsErrorType.PROFILE_NOT_FOUND, `No profile "${profileId}"`);
}

function writeFailed(profileId: string, cause: unknown): PhonicsError {
  return new PhonicsError(
    PhonicsErrorType.STORAGE_WRITE_FAILED,
    `Could not save profile "${profileId}": ${describeError(cause)}`,
    { cause }
  );
}

interface ProfileRow {
  data: string;
}

export class SqliteProgressStorage implements ProgressStorage {
  constructor(private readonly db: Database) {}

  read(profileId: string): PersistedProfile {
    let row: ProfileRow | undefined;
    try {
      row = this.db
        .prepare<[string], ProfileRow>('SELECT data FROM profiles WHERE profile_id = ?')
        .get(profileId);
    } catch (err) {
      throw new PhonicsError(
        PhonicsErrorType.STORAGE_CORRUPT,
        `Could not read profile "${profileId}": ${describeError(err)}`,
        { cause: err }
      );
    }

    if (!row) {
      throw notFound(profileId);
    }
    return parseProfileJson(row.data, profileId);
  }

  write(record: PersistedProfile): void {
    try {
      const upsert = this.db.prepare<[string, string, string]>(`
        INSERT INTO profiles (profile_id, data, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(profile_id) DO UPDATE SET
          data = excluded.data,
          updated_at = excluded.updated_at
      `);
      const save = this.db.transaction((profile: PersistedProfile) => {
        upsert.run(profile.profileId, JSON.stringify(profile), profile.updatedAt);
      });
      save(record);
    } catch (err) {
      throw writeFailed(record.profileId, err);
    }
  }

  listProfiles(): string[] {
    return this.db
      .prepare<[], { profile_id: string }>('SELECT profile_id FROM profiles ORDER BY profile_id')
      .all()
      .map((row) => row.profile_id);
  }
}

/**
 * One `<profileId>.json` file per profile. Writes go to a temp file in the
 * same directory and are renamed over the target once flushed.
 */
export class JsonFileProgressStorage implements ProgressStorage {
  constructor(private readonly dir: string) {}

  private fileFor(profileId: string): string {
    return path.join(this.dir, `${encodeURIComponent(profileId)}.json`);
  }

  read(profileId: string): PersistedProfile {
    const filePath = this.fileFor(profileId);
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw notFound(profileId);
      }
      throw new PhonicsError(
        PhonicsErrorType.STORAGE_CORRUPT,
        `Could not read profile "${profileId}": ${describeError(err)}`,
        { cause: err }
      );
    }
    return parseProfileJson(content, profileId);
  }

  write(record: PersistedProfile): void {
    const target = this.fileFor(record.profileId);
    const tempFile = `${target}.${process.pid}-${Date.now()}.tmp`;

    try {
      fs.mkdirSync(this.dir, { recursive: true });
      const fd = fs.openSync(tempFile, 'w');
      try {
        fs.writeSync(fd, JSON.stringify(record, null, 2));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tempFile, target);
    } catch (err) {
      fs.rmSync(tempFile, { force: true });
      throw writeFailed(record.profileId, err);
    }
  }

  listProfiles(): string[] {
    if (!fs.existsSync(this.dir)) {
      return [];
    }
    return fs
      .readdirSync(this.dir)
      .filter((name) => name.endsWith('.json'))
      .map((name) => decodeURIComponent(name.slice(0, -'.json'.length)))
      .sort();
  }
}
