import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.courier', 'courier.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? process.env.COURIER_DB_PATH ?? DEFAULT_DB_PATH;

  const existing = INSTANCES.get(resolvedPath);
  if (existing?.open) {
    return existing;
  }

  ensureDirectory(resolvedPath);

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = dbPath ?? process.env.COURIER_DB_PATH ?? DEFAULT_DB_PATH;
  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    INSTANCES.delete(resolvedPath);
    existing.close();
  }
}
