import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';

export type Connection = Database.Database;

export interface OpenOptions {
  // Fail instead of creating an empty database file.
  mustExist?: boolean;
}

export const openDatabase = (filePath: string, options: OpenOptions = {}): Connection => {
  if (!options.mustExist) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  const db = new Database(filePath, { fileMustExist: options.mustExist ?? false });
  try {
    db.pragma('foreign_keys = ON');
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
};

/**
 * Opens a connection for a single unit of work and closes it afterwards,
 * whether the work returns or throws.
 */
export const withDatabase = <T>(filePath: string, work: (db: Connection) => T, options: OpenOptions = {}): T => {
  const db = openDatabase(filePath, options);
  try {
    return work(db);
  } finally {
    db.close();
  }
};
