// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health and mounts /sessions.

import { Router, Request, Response } from 'express';
import type { SessionStore } from '../services/session.js';
import { sessionsRouter } from './sessions.js';

export function createRouter(sessions: SessionStore): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.use('/sessions', sessionsRouter(sessions));

  return router;
}
