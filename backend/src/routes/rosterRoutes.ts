import { Router, type Response } from 'express';
import { loadGroupResult, saveGroup, type LoadResult } from '../services/rosterService';
import { parseGroupPayload, toGroupPayload } from '../services/rosterPayload';
import type { Group } from '../models/group';

// Sends the error response and returns undefined unless a roster was loaded.
const resolveLoaded = (result: LoadResult, res: Response): Group | undefined => {
  if (result.status === 'loaded') {
    return result.group;
  }
  if (result.status === 'empty' || result.reason === 'not_found') {
    res.status(404).json({ error: 'No roster has been saved yet' });
    return undefined;
  }
  console.warn(`Roster load failed (${result.reason}): ${result.message}`);
  res.status(500).json({ error: 'Failed to load roster', reason: result.reason });
  return undefined;
};

export const createRosterRouter = (databasePath: string) => {
  const router = Router();

  router.get('/', (_req, res) => {
    const group = resolveLoaded(loadGroupResult(databasePath), res);
    if (!group) return;
    res.json(toGroupPayload(group));
  });

  router.get('/table', (_req, res) => {
    const group = resolveLoaded(loadGroupResult(databasePath), res);
    if (!group) return;
    res.type('text/plain').send(group.renderTable());
  });

  router.put('/', (req, res) => {
    const body: unknown = req.body;
    const parsed = parseGroupPayload(body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    saveGroup(parsed.group, databasePath);
    res.json({ saved: parsed.group.size });
  });

  return router;
};
