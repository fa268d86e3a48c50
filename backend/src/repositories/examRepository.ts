import type { Connection } from '../db/client';
import type { ExamRecord, ExamRow } from '../db/types';

export interface ExamInsert {
  subject: string;
  examDate: string;
  teacherName: string;
}

const toRecord = (row: ExamRow): ExamRecord => ({
  id: row.id,
  studentId: row.student_id,
  subject: row.subject,
  examDate: row.exam_date,
  teacherName: row.teacher_name,
});

export const insertExam = (db: Connection, studentId: number, data: ExamInsert): number => {
  const result = db
    .prepare<[number, string, string, string]>(
      `INSERT INTO exams (student_id, subject, exam_date, teacher_name)
       VALUES (?, ?, ?, ?)`
    )
    .run(studentId, data.subject, data.examDate, data.teacherName);
  if (result.changes !== 1) {
    throw new Error('Failed to insert exam');
  }
  return Number(result.lastInsertRowid);
};

export const listExamsForStudent = (db: Connection, studentId: number): ExamRecord[] => {
  const rows = db.prepare<[number], ExamRow>('SELECT * FROM exams WHERE student_id = ? ORDER BY id ASC').all(studentId);
  return rows.map(toRecord);
};

// Must run before deleteAllStudents: exams reference students.
export const deleteAllExams = (db: Connection) => {
  db.prepare('DELETE FROM exams').run();
};
