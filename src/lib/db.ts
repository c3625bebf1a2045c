import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

const DB_PATH = path.join(process.cwd(), 'data', 'progress.db');

// One shared connection per database file
const connections = new Map<string, Database.Database>();

/**
 * Get or create the shared connection for a database file.
 * Creates the database file and schema if they don't exist.
 */
export function getDb(dbPath: string = DB_PATH): Database.Database {
  const key = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);
  let db = connections.get(key);
  if (!db) {
    db = openDb(key);
    connections.set(key, db);
  }
  return db;
}

/**
 * Open a standalone connection. Pass ':memory:' for a throwaway database.
 */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);

  // Enable WAL mode for better performance
  database.pragma('journal_mode = WAL');

  initSchema(database);
  return database;
}

/**
 * Initialize the database schema.
 */
function initSchema(database: Database.Database): void {
  // One JSON record per child profile
  database.exec(`
    CREATE TABLE IF NOT EXISTS profiles (
      profile_id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);
}

/**
 * Close every shared connection.
 * Call this when shutting down the application.
 */
export function closeDb(): void {
  for (const db of connections.values()) {
    db.close();
  }
  connections.clear();
}
