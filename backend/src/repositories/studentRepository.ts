import type { Connection } from '../db/client';
import type { StudentRecord, StudentRow } from '../db/types';

export interface StudentInsert {
  lastName: string;
  firstName: string;
  birthDate: string;
}

const toRecord = (row: StudentRow): StudentRecord => ({
  id: row.id,
  lastName: row.last_name,
  firstName: row.first_name,
  birthDate: row.birth_date,
});

export const insertStudent = (db: Connection, data: StudentInsert): number => {
  const result = db
    .prepare<[string, string, string]>('INSERT INTO students (last_name, first_name, birth_date) VALUES (?, ?, ?)')
    .run(data.lastName, data.firstName, data.birthDate);
  if (result.changes !== 1) {
    throw new Error('Failed to insert student');
  }
  return Number(result.lastInsertRowid);
};

export const listStudents = (db: Connection): StudentRecord[] => {
  const rows = db.prepare<[], StudentRow>('SELECT * FROM students ORDER BY id ASC').all();
  return rows.map(toRecord);
};

export const deleteAllStudents = (db: Connection) => {
  db.prepare('DELETE FROM students').run();
};
