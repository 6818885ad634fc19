// src/app.ts
// What: Express application factory.
// How: Builds the app around an injected SessionStore (so tests can pass fakes), with a JSON body limit, the root
//      router and a centralized error handler returning { error: { message, code? } }. listen() resolves once the
//      port is bound and rejects on a bind error (EADDRINUSE, EACCES) instead of leaving it uncaught.

import type { Server } from 'http';
import express, { NextFunction, Request, Response } from 'express';
import defaultLogger, { type Logger } from './logging.js';
import { AppError } from './errors.js';
import { createRouter } from './routes/index.js';
import type { SessionStore } from './services/session.js';

export interface AppDeps {
  sessions: SessionStore;
  logger?: Logger;
}

export function createApp({ sessions, logger = defaultLogger }: AppDeps): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(sessions));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      if (err.status >= 500) logger.error({ err, code: err.code }, 'Request failed');
      res.status(err.status).json({ error: { message: err.message, code: err.code } });
      return;
    }
    // body-parser errors carry a status (e.g. 400 malformed JSON, 413 too large)
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500;
    const message = err instanceof Error && status < 500 ? err.message : 'Internal Server Error';
    logger.error({ err, status }, 'Unhandled error');
    res.status(status).json({ error: { message } });
  });

  return app;
}

export function listen(app: express.Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
  });
}
