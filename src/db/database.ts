import Database from 'better-sqlite3';
import { applySchema } from './schema';

export type SqliteDatabase = Database.Database;

export function openDatabase(path: string): SqliteDatabase {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}

export function toSqliteBoolean(value: boolean): number {
  return value ? 1 : 0;
}

export function parseDate(value: string | null): Date | null {
  return value ? new Date(value) : null;
}
