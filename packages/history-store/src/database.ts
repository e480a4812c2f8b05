import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { migrateHistoryDatabase } from './migrations';

export const IN_MEMORY = ':memory:';

export const openHistoryDatabase = (
  dbPath: string = IN_MEMORY
): BetterSqlite3.Database => {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  migrateHistoryDatabase(db);
  return db;
};
