import { Group } from '../models/group';
import { Student } from '../models/student';
import { loadGroupResult, saveGroup } from '../services/rosterService';

export interface SessionIo {
  ask(question: string): Promise<string>;
  print(text: string): void;
}

export interface SessionOptions {
  databasePath: string;
  minExamCount: number;
  maxExamCount: number;
}

const MENU = ['', '1. Add students', '2. Show students', '3. Save to database', '4. Load from database', '0. Exit'].join(
  '\n'
);

class InputError extends Error {}

const parseCount = (raw: string, label: string) => {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(value)) {
    throw new InputError(`${label} must be a whole number, got "${raw}"`);
  }
  return value;
};

const isYes = (answer: string) => ['y', 'yes'].includes(answer.trim().toLowerCase());

const askExamCount = async (io: SessionIo, options: SessionOptions) => {
  const { minExamCount: min, maxExamCount: max } = options;
  const count = parseCount(await io.ask(`Number of exams per student (${min}-${max}): `), 'Exam count');
  if (count < min || count > max) {
    throw new InputError(`Exam count must be between ${min} and ${max}`);
  }
  if (count > min && !isYes(await io.ask(`Record ${count} exams, more than the usual ${min}? (y/n): `))) {
    throw new InputError('Exam count not confirmed');
  }
  return count;
};

const askStudent = async (io: SessionIo, position: number, examCount: number) => {
  io.print(`Student ${position}:`);
  const lastName = await io.ask('  Last name: ');
  const firstName = await io.ask('  First name: ');
  const birthDate = await io.ask('  Birth date (YYYY-MM-DD): ');
  const student = new Student(lastName.trim(), firstName.trim(), birthDate.trim());
  for (let exam = 1; exam <= examCount; exam += 1) {
    io.print(`  Exam ${exam}:`);
    const subject = await io.ask('    Subject: ');
    const examDate = await io.ask('    Date (YYYY-MM-DD): ');
    const teacherName = await io.ask('    Teacher: ');
    student.addExam(subject.trim(), examDate.trim(), teacherName.trim());
  }
  return student;
};

// Collects every student before touching the roster so an aborted entry leaves it unchanged.
const collectStudents = async (io: SessionIo, options: SessionOptions) => {
  const examCount = await askExamCount(io, options);
  const studentCount = parseCount(await io.ask('Number of students: '), 'Student count');
  if (studentCount < 1) {
    throw new InputError('Student count must be at least 1');
  }
  const students: Student[] = [];
  for (let position = 1; position <= studentCount; position += 1) {
    students.push(await askStudent(io, position, examCount));
  }
  return students;
};

/**
 * Runs the interactive menu until the user chooses to exit.
 * Save and load go to `options.databasePath`; the roster starts empty.
 */
export const runSession = async (io: SessionIo, options: SessionOptions) => {
  let group = new Group();

  for (;;) {
    io.print(MENU);
    const choice = (await io.ask('Choose an option: ')).trim();

    switch (choice) {
      case '1': {
        try {
          const students = await collectStudents(io, options);
          students.forEach((student) => group.addStudent(student));
          io.print(`Added ${students.length} student(s).`);
        } catch (error) {
          if (!(error instanceof InputError)) throw error;
          io.print(`Input error: ${error.message}. Nothing was added.`);
        }
        break;
      }
      case '2':
        if (group.size === 0) {
          io.print('The roster is empty.');
        } else {
          io.print('Students:');
          io.print(group.renderTable());
        }
        break;
      case '3':
        try {
          saveGroup(group, options.databasePath);
          io.print(`Saved ${group.size} student(s) to ${options.databasePath}.`);
        } catch (error) {
          io.print(`Save failed: ${error instanceof Error ? error.message : String(error)}`);
        }
        break;
      case '4': {
        const result = loadGroupResult(options.databasePath);
        if (result.status === 'loaded') {
          group = result.group;
          io.print(`Loaded ${group.size} student(s) from ${options.databasePath}.`);
        } else if (result.status === 'empty') {
          io.print(`No data found in ${options.databasePath}.`);
        } else {
          io.print(`Load failed (${result.reason}): ${result.message}`);
        }
        break;
      }
      case '0':
        io.print('Goodbye.');
        return;
      default:
        io.print(`Unknown option: ${choice}`);
    }
  }
};
