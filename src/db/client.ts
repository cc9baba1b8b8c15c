import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { loadConfig, type AppConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';

export type DatabaseClient = Database.Database;

// Metadata only. No table has a column for a cookie value or payload.
const SCHEMA = `
CREATE TABLE IF NOT EXISTS targets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  url TEXT NOT NULL,
  relevance_score REAL NOT NULL DEFAULT 0,
  requires_cookies INTEGER NOT NULL DEFAULT 0,
  last_scanned_at TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS extractions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  target_id INTEGER NOT NULL REFERENCES targets(id),
  platform TEXT NOT NULL,
  artifact_count INTEGER NOT NULL DEFAULT 0,
  two_factor_detected INTEGER NOT NULL DEFAULT 0,
  succeeded INTEGER NOT NULL DEFAULT 0,
  error_message TEXT,
  extracted_at TEXT NOT NULL,
  expires_at TEXT
);

CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  target_name TEXT,
  platform TEXT,
  status TEXT NOT NULL,
  message TEXT,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS run_state (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  status TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

INSERT OR IGNORE INTO run_state (id, status, updated_at)
  VALUES (1, 'Idle', strftime('%Y-%m-%dT%H:%M:%fZ', 'now'));
`;

let db: DatabaseClient | undefined;

/** Opens (and migrates) a database. Use ':memory:' for an in-process store. */
export function openDatabase(filePath: string): DatabaseClient {
  if (filePath !== ':memory:') {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const conn = new Database(filePath);
  if (filePath !== ':memory:') {
    conn.pragma('journal_mode = WAL');
    try {
      fs.chmodSync(filePath, 0o600);
    } catch (err) {
      getLogger().warn({ err, filePath }, 'could not restrict database file permissions');
    }
  }
  conn.pragma('foreign_keys = ON');
  conn.pragma('busy_timeout = 5000');
  conn.exec(SCHEMA);
  return conn;
}

/** Process-wide connection, opened on first use from `cfg` (or the default config file). */
export function getDb(cfg?: Pick<AppConfig, 'storage'>): DatabaseClient {
  if (!db) {
    const { databasePath } = (cfg ?? loadConfig()).storage;
    db = openDatabase(databasePath);
    getLogger().debug({ path: databasePath }, 'database opened');
  }
  return db;
}

/** Replaces the process-wide connection (tests pass an in-memory one). */
export function setDb(conn: DatabaseClient): void {
  db = conn;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
