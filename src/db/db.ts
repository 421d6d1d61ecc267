import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';

export type DB = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    id               TEXT PRIMARY KEY,
    recipient        TEXT NOT NULL,
    cc               TEXT NOT NULL DEFAULT '[]',
    bcc              TEXT NOT NULL DEFAULT '[]',
    subject_template TEXT NOT NULL,
    body_template    TEXT NOT NULL,
    variables        TEXT NOT NULL DEFAULT '{}',
    attachments      TEXT NOT NULL DEFAULT '[]',
    not_before       TEXT NOT NULL,
    state            TEXT NOT NULL DEFAULT 'pending',
    attempt_count    INTEGER NOT NULL DEFAULT 0,
    last_error       TEXT,
    last_attempt_at  TEXT,
    message_id       TEXT,
    campaign_id      TEXT,
    created_at       TEXT NOT NULL,
    updated_at       TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_jobs_state_due ON jobs(state, not_before);
  CREATE INDEX IF NOT EXISTS idx_jobs_campaign ON jobs(campaign_id);

  CREATE TABLE IF NOT EXISTS config (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS locks (
    name        TEXT PRIMARY KEY,
    pid         INTEGER NOT NULL,
    acquired_at TEXT NOT NULL
  );
`;

/**
 * Open (and migrate) a job database. `:memory:` gives a private in-process store.
 */
export function openDB(file: string): DB {
  if (file !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }
  const db = new Database(file);
  if (file !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  return db;
}

let _db: DB | null = null;

export function getDB(file: string) {
  if (_db) return _db;
  _db = openDB(file);
  return _db;
}
