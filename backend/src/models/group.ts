import type { Student } from './student';

const SEPARATOR = '-'.repeat(50);

const formatRow = (index: string, lastName: string, firstName: string, birthDate: string) =>
  [index.padEnd(3), lastName.padEnd(15), firstName.padEnd(15), birthDate.padEnd(12)].join(' | ');

/** Ordered roster of students; insertion order is display order. */
export class Group {
  private readonly members: Student[] = [];

  get students(): readonly Student[] {
    return this.members;
  }

  get size() {
    return this.members.length;
  }

  addStudent(student: Student) {
    this.members.push(student);
  }

  renderTable() {
    const lines = [SEPARATOR, formatRow('#', 'Last name', 'First name', 'Birth date'), SEPARATOR];
    this.members.forEach((student, index) => {
      lines.push(formatRow(String(index + 1), student.lastName, student.firstName, student.birthDate));
    });
    lines.push(SEPARATOR);
    return lines.join('\n');
  }
}
