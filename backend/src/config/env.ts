import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

// Relative paths are taken from the working directory so the CLI finds the database where it runs.
const resolvePath = (filepath: string | undefined, fallback: string) => {
  const target = filepath ?? fallback;
  return path.isAbsolute(target) ? target : path.resolve(process.cwd(), target);
};

const readInteger = (key: string, fallback: number) => {
  const value = Number(process.env[key]);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

const resolveExamBounds = () => {
  const min = readInteger('EXAM_COUNT_MIN', 3);
  const max = readInteger('EXAM_COUNT_MAX', 5);
  if (max < min) {
    throw new Error(`EXAM_COUNT_MAX (${max}) must not be lower than EXAM_COUNT_MIN (${min})`);
  }
  return { min, max };
};

const examBounds = resolveExamBounds();

export const config = {
  port: Number(process.env.PORT) || 8000,
  databasePath: resolvePath(process.env.DATABASE_PATH, 'students.db'),
  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '1mb',
  minExamCount: examBounds.min,
  maxExamCount: examBounds.max,
};
