import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.ctflow', 'ctflow.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function ensureDirectory(path: string): void {
  if (path === ':memory:') return;
  mkdirSync(dirname(path), { recursive: true });
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? process.env.CTFLOW_DB_PATH ?? DEFAULT_DB_PATH;

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  ensureDirectory(resolvedPath);

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabases(): void {
  for (const db of INSTANCES.values()) {
    db.close();
  }
  INSTANCES.clear();
}
