/**
 * Express app for the hub's Control/Status API.
 *
 * Kept apart from index.ts so tests can mount it on an ephemeral port.
 */

import express, { type ErrorRequestHandler } from 'express';
import type { HubRuntime } from './hub/runtime';
import { createAuth } from './middleware/auth';
import { hubRouter } from './routes/hub';
import type { IErrorResponse } from '../src/types';

export interface AppOptions {
  /** Enables bearer auth when set. */
  jwtSecret?: string | null;
}

export function createApp(hub: HubRuntime, opts: AppOptions = {}): express.Express {
  const app = express();
  app.use(express.json());

  app.use('/hub', hubRouter(hub, createAuth(opts.jwtSecret ?? null)));

  // Malformed JSON bodies and anything else thrown synchronously by middleware.
  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const body: IErrorResponse = { error: 'Internal', detail: String(err) };
    res.status(err instanceof SyntaxError ? 400 : 500).json(body);
  };
  app.use(onError);

  return app;
}
