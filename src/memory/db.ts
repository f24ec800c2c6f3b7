import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';
import { z } from 'zod';

import { StorageCorruptError } from '../core/errors.js';

export const IN_MEMORY = ':memory:';

// (zone, timestamp) primary key doubles as the per-zone range index.
const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS observations (
    timestamp TEXT NOT NULL,
    zone TEXT NOT NULL,
    price REAL NOT NULL,
    load REAL NOT NULL,
    sentiment_score REAL,
    sentiment_category TEXT,
    PRIMARY KEY (zone, timestamp)
  ) WITHOUT ROWID;
`;

export const OBSERVATION_COLUMNS = [
  'timestamp',
  'zone',
  'price',
  'load',
  'sentiment_score',
  'sentiment_category',
] as const;

const TableInfoSchema = z.array(z.object({ name: z.string() }));

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function applySchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
}

function verifySchema(db: Database.Database, path: string): void {
  const check = db.pragma('quick_check', { simple: true });
  if (check !== 'ok') {
    throw new StorageCorruptError(path, `integrity check failed (${String(check)})`);
  }

  const info = TableInfoSchema.safeParse(db.prepare('PRAGMA table_info(observations)').all());
  if (!info.success) {
    throw new StorageCorruptError(path, 'observations table metadata is unreadable');
  }
  const present = new Set(info.data.map((column) => column.name));
  const missing = OBSERVATION_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new StorageCorruptError(path, `observations table is missing columns: ${missing.join(', ')}`);
  }
}

/**
 * Open (or create) an observation database. Each call returns a new connection owned by
 * the caller. A missing file yields an empty store; anything that cannot be read as one
 * raises StorageCorruptError.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    ensureDirectory(dbPath);
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new StorageCorruptError(dbPath, describe(error), { cause: error });
  }

  try {
    db.pragma('journal_mode = WAL');
    applySchema(db);
    verifySchema(db, dbPath);
  } catch (error) {
    db.close();
    if (error instanceof StorageCorruptError) {
      throw error;
    }
    throw new StorageCorruptError(dbPath, describe(error), { cause: error });
  }

  return db;
}
