import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const SCHEMA_PATH = join(dirname(fileURLToPath(import.meta.url)), 'schema.sql');
const connections = new Map<string, Database.Database>();

/** Explicit path, then `MARKET_INTEL_DB_PATH`, then `~/.market-intel/state.sqlite`. */
export function resolveDbPath(dbPath?: string): string {
  return dbPath ?? process.env.MARKET_INTEL_DB_PATH ?? join(homedir(), '.market-intel', 'state.sqlite');
}

/**
 * One connection per file. WAL lets `state --raw` read while a cycle
 * writes; FULL sync keeps a committed cycle on disk across a crash.
 */
export function openDatabase(dbPath?: string): Database.Database {
  const path = resolveDbPath(dbPath);
  const cached = connections.get(path);
  if (cached) return cached;

  mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = FULL');
  db.exec(readFileSync(SCHEMA_PATH, 'utf-8'));

  connections.set(path, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const path = resolveDbPath(dbPath);
  const db = connections.get(path);
  if (!db) return;
  connections.delete(path);
  db.close();
}
