import fs from 'fs';
import os from 'os';
import path from 'path';
import { Group } from '../src/models/group';
import { Student } from '../src/models/student';

export const createTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'student-roster-'));

export const removeTempDir = (dir: string) => {
  fs.rmSync(dir, { recursive: true, force: true });
};

export const buildStudent = (
  lastName: string,
  firstName: string,
  birthDate: string,
  exams: Array<[string, string, string]> = []
) => {
  const student = new Student(lastName, firstName, birthDate);
  exams.forEach(([subject, examDate, teacherName]) => student.addExam(subject, examDate, teacherName));
  return student;
};

export const buildGroup = (...students: Student[]) => {
  const group = new Group();
  students.forEach((student) => group.addStudent(student));
  return group;
};

// Plain-data view of a roster for equality checks.
export const describeGroup = (group: Group) =>
  group.students.map((student) => ({
    lastName: student.lastName,
    firstName: student.firstName,
    birthDate: student.birthDate,
    exams: student.examEntries.map((entry) => [entry.subject, entry.examDate, entry.teacherName]),
  }));
