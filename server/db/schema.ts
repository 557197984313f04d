/**
 * SQLite Schema — modelhub
 *
 * Only state that must outlive the daemon lives here. Process handles,
 * statuses and activity timestamps are rebuilt live on every start.
 *
 * Tables:
 *   port_assignments — worker name → TCP port, so restarts keep advertised ports
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../lib/logger';

const log = createLogger('db');

export type HubDatabase = Database.Database;

export function openDb(dbPath: string): HubDatabase {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS port_assignments (
      name        TEXT    PRIMARY KEY,
      port        INTEGER NOT NULL UNIQUE,
      explicit    INTEGER NOT NULL DEFAULT 0 CHECK(explicit IN (0, 1)),
      updated_at  TEXT    NOT NULL DEFAULT (datetime('now'))
    );
  `);

  log.info(`SQLite initialised at ${dbPath === ':memory:' ? dbPath : path.resolve(dbPath)}`);
  return db;
}
