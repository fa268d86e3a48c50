export interface ExamEntry {
  readonly subject: string;
  readonly examDate: string;
  readonly teacherName: string;
}

/**
 * One student and their exam history ("record book").
 *
 * Identity fields are fixed at construction. Exam entries are only ever appended,
 * in the order they were taken.
 */
export class Student {
  private readonly entries: ExamEntry[] = [];

  constructor(
    readonly lastName: string,
    readonly firstName: string,
    readonly birthDate: string
  ) {}

  get examEntries(): readonly ExamEntry[] {
    return this.entries;
  }

  addExam(subject: string, examDate: string, teacherName: string) {
    this.entries.push(Object.freeze({ subject, examDate, teacherName }));
  }

  displayLabel() {
    return `${this.lastName} ${this.firstName} (${this.birthDate})`;
  }

  toString() {
    return this.displayLabel();
  }
}
