import fs from 'fs';
import { withDatabase, type Connection } from '../db/client';
import { ensureSchema, runInTransaction } from '../db/schema';
import { deleteAllExams, insertExam, listExamsForStudent } from '../repositories/examRepository';
import { deleteAllStudents, insertStudent, listStudents } from '../repositories/studentRepository';
import { Group } from '../models/group';
import { Student } from '../models/student';

export type LoadFailureReason = 'not_found' | 'permission_denied' | 'schema_mismatch' | 'corrupt';

export type LoadResult =
  | { status: 'loaded'; group: Group }
  | { status: 'empty' }
  | { status: 'failed'; reason: LoadFailureReason; message: string };

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'SQLITE_CANTOPEN', 'SQLITE_PERM', 'SQLITE_READONLY', 'SQLITE_AUTH']);

const errorCode = (error: unknown) => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const classifyLoadError = (error: unknown): LoadFailureReason => {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  if (code === 'ENOENT') return 'not_found';
  if (code && PERMISSION_CODES.has(code)) return 'permission_denied';
  if (/no such (table|column)/i.test(message)) return 'schema_mismatch';
  return 'corrupt';
};

/**
 * Replaces everything stored at `databasePath` with the contents of `group`.
 *
 * Tables are created on first use. Rows are deleted (exams first) and reinserted
 * in roster order inside one transaction; a failure rolls back and is rethrown.
 */
export const saveGroup = (group: Group, databasePath: string) => {
  withDatabase(databasePath, (db) => {
    runInTransaction(db, () => {
      ensureSchema(db);
      deleteAllExams(db);
      deleteAllStudents(db);
      group.students.forEach((student) => {
        const studentId = insertStudent(db, student);
        student.examEntries.forEach((entry) => {
          insertExam(db, studentId, entry);
        });
      });
    });
  });
};

const readGroup = (db: Connection): Group | undefined => {
  const records = listStudents(db);
  if (records.length === 0) {
    return undefined;
  }
  const group = new Group();
  records.forEach((record) => {
    const student = new Student(record.lastName, record.firstName, record.birthDate);
    listExamsForStudent(db, record.id).forEach((exam) => {
      student.addExam(exam.subject, exam.examDate, exam.teacherName);
    });
    group.addStudent(student);
  });
  return group;
};

/** Loads the stored roster, telling "nothing saved" apart from each kind of failure. */
export const loadGroupResult = (databasePath: string): LoadResult => {
  try {
    fs.accessSync(databasePath, fs.constants.R_OK);
    const group = withDatabase(databasePath, readGroup, { mustExist: true });
    return group ? { status: 'loaded', group } : { status: 'empty' };
  } catch (error) {
    return {
      status: 'failed',
      reason: classifyLoadError(error),
      message: error instanceof Error ? error.message : String(error),
    };
  }
};

// Collapses "no data" and every failure into undefined.
export const loadGroup = (databasePath: string): Group | undefined => {
  const result = loadGroupResult(databasePath);
  return result.status === 'loaded' ? result.group : undefined;
};
