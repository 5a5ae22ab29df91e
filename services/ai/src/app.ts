import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { IllegalMoveError, InvalidBoardError } from '@noughts/engine';
import { analyzePosition, chooseMove } from './flows/move.js';
import type { FlowOptions } from './flows/move.js';

export function createApp(opts: FlowOptions = {}): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.post('/move', (req, res) => {
    res.json(chooseMove(req.body, opts));
  });

  app.post('/analyze', (req, res) => {
    res.json(analyzePosition(req.body));
  });

  app.use(handleError);

  return app;
}

function handleError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    console.warn('[server] Rejected invalid input', { path: req.path, issues: err.issues.length });
    res.status(400).json({ error: 'Invalid input', issues: err.issues });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
    return;
  }
  if (err instanceof IllegalMoveError) {
    res.status(422).json({ error: err.message, reason: err.reason });
    return;
  }
  if (err instanceof InvalidBoardError) {
    res.status(422).json({ error: err.message });
    return;
  }
  console.error('[server] Request failed', { path: req.path, err });
  res.status(500).json({ error: 'Internal error' });
}

// body parser errors such as 413 and 415 carry their own status
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return null;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}
