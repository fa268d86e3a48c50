import cors from 'cors';
import express, { type ErrorRequestHandler } from 'express';
import { config } from './config/env';
import { createRosterRouter } from './routes/rosterRoutes';

export interface AppOptions {
  databasePath: string;
}

const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  console.error(err);
  const status = typeof err.status === 'number' ? err.status : 500;
  const message = status >= 500 ? 'Internal server error' : err.message;
  res.status(status).json({ error: message ?? 'Internal server error' });
};

export const createApp = (options: AppOptions = { databasePath: config.databasePath }) => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/roster', createRosterRouter(options.databasePath));

  app.use(errorHandler);

  return app;
};
