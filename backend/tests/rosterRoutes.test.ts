import fs from 'fs';
import path from 'path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { createTempDir, removeTempDir } from './helpers';

const ivanov = {
  lastName: 'Ivanov',
  firstName: 'Ivan',
  birthDate: '2000-01-01',
  exams: [
    { subject: 'Math', examDate: '2023-01-10', teacherName: 'Petrov' },
    { subject: 'Physics', examDate: '2023-01-15', teacherName: 'Sidorov' },
  ],
};

describe('roster routes', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = createTempDir();
    dbPath = path.join(dir, 'students.db');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('answers the health check', async () => {
    const response = await request(createApp({ databasePath: dbPath })).get('/health').expect(200);

    expect(response.body).toEqual({ status: 'ok' });
  });

  it('returns 404 before anything has been saved', async () => {
    const response = await request(createApp({ databasePath: dbPath })).get('/roster').expect(404);

    expect(response.body).toEqual({ error: 'No roster has been saved yet' });
  });

  it('saves a roster and reads it back', async () => {
    const app = createApp({ databasePath: dbPath });

    const saved = await request(app)
      .put('/roster')
      .send({ students: [ivanov, { lastName: 'Petrova', firstName: 'Maria', birthDate: '2001-02-03' }] })
      .expect(200);
    expect(saved.body).toEqual({ saved: 2 });

    const loaded = await request(app).get('/roster').expect(200);
    expect(loaded.body).toEqual({
      students: [ivanov, { lastName: 'Petrova', firstName: 'Maria', birthDate: '2001-02-03', exams: [] }],
    });
  });

  it('serves the roster as a plain-text table', async () => {
    const app = createApp({ databasePath: dbPath });
    await request(app).put('/roster').send({ students: [ivanov] }).expect(200);

    const response = await request(app).get('/roster/table').expect(200);

    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.text.split('\n')[3]).toBe('1   | Ivanov          | Ivan            | 2000-01-01  ');
  });

  it('treats a saved empty roster as no data', async () => {
    const app = createApp({ databasePath: dbPath });
    await request(app).put('/roster').send({ students: [] }).expect(200);

    await request(app).get('/roster').expect(404);
  });

  it('rejects malformed payloads', async () => {
    const app = createApp({ databasePath: dbPath });

    const missing = await request(app).put('/roster').send({}).expect(400);
    expect(missing.body).toEqual({ error: 'students must be an array' });

    const badField = await request(app)
      .put('/roster')
      .send({ students: [{ lastName: 'Ivanov', birthDate: '2000-01-01' }] })
      .expect(400);
    expect(badField.body).toEqual({ error: 'students[0].firstName must be a string' });

    const badExam = await request(app)
      .put('/roster')
      .send({ students: [{ ...ivanov, exams: [{ subject: 'Math', examDate: 20230110, teacherName: 'Petrov' }] }] })
      .expect(400);
    expect(badExam.body).toEqual({ error: 'students[0].exams[0].examDate must be a string' });
    expect(fs.existsSync(dbPath)).toBe(false);
  });

  it('reports a damaged database file as a server error with its reason', async () => {
    fs.writeFileSync(dbPath, 'this file holds plain text instead of a database\n'.repeat(20));

    const response = await request(createApp({ databasePath: dbPath })).get('/roster').expect(500);

    expect(response.body).toEqual({ error: 'Failed to load roster', reason: 'corrupt' });
  });
});
