import { Group } from '../models/group';
import { Student } from '../models/student';

export interface ExamPayload {
  subject: string;
  examDate: string;
  teacherName: string;
}

export interface StudentPayload {
  lastName: string;
  firstName: string;
  birthDate: string;
  exams: ExamPayload[];
}

export type ParseResult = { ok: true; group: Group } | { ok: false; error: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readText = (source: Record<string, unknown>, key: string, label: string) => {
  const value = source[key];
  return typeof value === 'string' ? value : new Error(`${label}.${key} must be a string`);
};

export const toStudentPayload = (student: Student): StudentPayload => ({
  lastName: student.lastName,
  firstName: student.firstName,
  birthDate: student.birthDate,
  exams: student.examEntries.map((entry) => ({
    subject: entry.subject,
    examDate: entry.examDate,
    teacherName: entry.teacherName,
  })),
});

export const toGroupPayload = (group: Group) => ({
  students: group.students.map(toStudentPayload),
});

const parseStudent = (value: unknown, label: string): Student | Error => {
  if (!isRecord(value)) {
    return new Error(`${label} must be an object`);
  }
  const lastName = readText(value, 'lastName', label);
  if (lastName instanceof Error) return lastName;
  const firstName = readText(value, 'firstName', label);
  if (firstName instanceof Error) return firstName;
  const birthDate = readText(value, 'birthDate', label);
  if (birthDate instanceof Error) return birthDate;

  const exams: unknown = value.exams ?? [];
  if (!Array.isArray(exams)) {
    return new Error(`${label}.exams must be an array`);
  }
  const student = new Student(lastName, firstName, birthDate);
  for (const [index, exam] of exams.entries()) {
    const examLabel = `${label}.exams[${index}]`;
    if (!isRecord(exam)) {
      return new Error(`${examLabel} must be an object`);
    }
    const subject = readText(exam, 'subject', examLabel);
    if (subject instanceof Error) return subject;
    const examDate = readText(exam, 'examDate', examLabel);
    if (examDate instanceof Error) return examDate;
    const teacherName = readText(exam, 'teacherName', examLabel);
    if (teacherName instanceof Error) return teacherName;
    student.addExam(subject, examDate, teacherName);
  }
  return student;
};

export const parseGroupPayload = (body: unknown): ParseResult => {
  if (!isRecord(body) || !Array.isArray(body.students)) {
    return { ok: false, error: 'students must be an array' };
  }
  const group = new Group();
  for (const [index, item] of body.students.entries()) {
    const student = parseStudent(item, `students[${index}]`);
    if (student instanceof Error) {
      return { ok: false, error: student.message };
    }
    group.addStudent(student);
  }
  return { ok: true, group };
};
