/**
 * Hub Routes — /hub/*
 *
 * Control/Status API over HubRuntime. Every failure is answered as
 * `{ error: <kind>, detail }` with the kind's HTTP status.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { HubRuntime, StartResult } from '../hub/runtime';
import { isHubError } from '../hub/errors';
import type { AuthGuards } from '../middleware/auth';
import { createLogger } from '../lib/logger';
import type {
  IErrorResponse, IModelActionResponse, IOkResponse, IReloadResponse,
} from '../../src/types';

const log = createLogger('api');

const StopBody = z.object({ timeout_s: z.number().positive().optional() }).default({});

/** Optional `{ timeout_s }` body of stop/unload, in ms. */
function stopTimeoutMs(req: Request): number | undefined {
  const parsed = StopBody.safeParse(req.body ?? {});
  const seconds = parsed.success ? parsed.data.timeout_s : undefined;
  return seconds === undefined ? undefined : seconds * 1000;
}

/** `:name` of the /models/:name/* routes. */
function modelParam(req: Request): string {
  return req.params['name'] ?? '';
}

export function sendError(res: Response, err: unknown): void {
  if (isHubError(err)) {
    const body: IErrorResponse = { error: err.kind, detail: err.message };
    res.status(err.httpStatus).json(body);
    return;
  }
  log.error(`Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  const body: IErrorResponse = { error: 'Internal', detail: String(err) };
  res.status(500).json(body);
}

export function hubRouter(hub: HubRuntime, auth: AuthGuards): Router {
  const router = Router();
  const { requireAuth, requireAdmin } = auth;

  // Runs `op` and answers with the worker's fresh status.
  const modelAction = (res: Response, name: string, op: () => Promise<StartResult | null>) => {
    void (async () => {
      try {
        const result = await op();
        const body: IModelActionResponse = { ok: true, model: hub.describe(name) };
        if (result !== null) body.evicted = result.evicted;
        res.json(body);
      } catch (err) {
        sendError(res, err);
      }
    })();
  };

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  router.get('/health', (_req, res) => {
    const body: IOkResponse = { ok: true };
    res.json(body);
  });

  router.get('/status', requireAuth, (_req, res) => {
    res.json(hub.status());
  });

  // ---------------------------------------------------------------------------
  // Fleet
  // ---------------------------------------------------------------------------

  // Registered before /models/:name/* so 'stop-all' is never read as a name.
  router.post('/models/stop-all', requireAdmin, (_req, res) => {
    void (async () => {
      try {
        await hub.stopAll();
        res.json(hub.status());
      } catch (err) {
        sendError(res, err);
      }
    })();
  });

  router.post('/reload', requireAdmin, (_req, res) => {
    void (async () => {
      try {
        const actions = await hub.reload();
        const body: IReloadResponse = {
          ok:      true,
          actions: actions.map(a => ({ kind: a.kind, name: a.name })),
          status:  hub.status(),
        };
        res.json(body);
      } catch (err) {
        sendError(res, err);
      }
    })();
  });

  router.post('/shutdown', requireAdmin, (_req, res) => {
    const body: IOkResponse = { ok: true };
    // Answer first; the shutdown outlives this request.
    res.on('finish', () => {
      hub.shutdown().catch((err: unknown) => log.error(`Shutdown failed: ${String(err)}`));
    });
    res.json(body);
  });

  // ---------------------------------------------------------------------------
  // Workers
  // ---------------------------------------------------------------------------

  router.post('/models/:name/start', requireAdmin, (req, res) => {
    const name = modelParam(req);
    modelAction(res, name, () => hub.start(name));
  });

  router.post('/models/:name/load', requireAdmin, (req, res) => {
    const name = modelParam(req);
    modelAction(res, name, () => hub.load(name));
  });

  router.post('/models/:name/stop', requireAdmin, (req, res) => {
    const name = modelParam(req);
    const timeoutMs = stopTimeoutMs(req);
    modelAction(res, name, () => hub.stop(name, timeoutMs).then(() => null));
  });

  router.post('/models/:name/unload', requireAdmin, (req, res) => {
    const name = modelParam(req);
    const timeoutMs = stopTimeoutMs(req);
    modelAction(res, name, () => hub.unload(name, timeoutMs).then(() => null));
  });

  router.post('/models/:name/activity', requireAdmin, (req, res) => {
    const name = modelParam(req);
    try {
      hub.recordActivity(name);
      const body: IModelActionResponse = { ok: true, model: hub.describe(name) };
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
