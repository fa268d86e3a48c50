export interface StudentRow {
  id: number;
  last_name: string;
  first_name: string;
  birth_date: string;
}

export interface ExamRow {
  id: number;
  student_id: number;
  subject: string;
  exam_date: string;
  teacher_name: string;
}

export interface StudentRecord {
  id: number;
  lastName: string;
  firstName: string;
  birthDate: string;
}

export interface ExamRecord {
  id: number;
  studentId: number;
  subject: string;
  examDate: string;
  teacherName: string;
}
