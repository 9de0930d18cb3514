/**
 * @file app.ts
 * @description Express application: JSON body parsing and the three API routes.
 * Route logic lives in api/handlers.ts; this file only wires requests to it.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createLogger } from '../../shared/util/Logger.js';
import {
  handleHealth,
  handleSimulateMatch,
  handleSimulateRound,
  type ApiContext,
  type ApiResponse,
} from './api/handlers.js';

const log = createLogger('server');

function send(res: Response, result: ApiResponse): void {
  res.status(result.status).json(result.body);
}

export function createApp(ctx: ApiContext): Express {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  /** Health check endpoint for monitoring */
  app.get('/api/health', (_req, res) => {
    send(res, handleHealth(ctx));
  });

  app.post('/api/rounds/simulate', (req, res) => {
    send(res, handleSimulateRound(req.body, ctx));
  });

  app.post('/api/matches/simulate', (req, res) => {
    send(res, handleSimulateMatch(req.body, ctx));
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'NOT_FOUND' });
  });

  /* Body parser failures (malformed JSON) land here */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'REQUEST_INVALID', issues: [{ path: '', message: err.message }] });
      return;
    }
    log.error({ err }, 'Unhandled request failure');
    res.status(500).json({ error: 'INTERNAL', message: 'Request failed' });
  });

  return app;
}
