/**
 * Readiness checks — decide when a Starting worker counts as Running.
 *
 * `health` polls the worker's HTTP endpoint; `grace` waits a fixed delay.
 * Both give up as soon as the process exits or a stop is requested.
 */

import { connectableHost } from '../lib/network';
import type { ReadinessSettings, WorkerProcess } from './types';

export interface ReadinessContext {
  name:      string;
  host:      string;
  port:      number;
  process:   WorkerProcess;
  cancelled: () => boolean;
}

export type ReadinessCheck = (ctx: ReadinessContext) => Promise<boolean>;

const PROBE_TIMEOUT_MS = 1_500;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function gaveUp(ctx: ReadinessContext): boolean {
  return ctx.cancelled() || ctx.process.exitCode() !== undefined;
}

export function httpReadiness(opts: { path: string; timeoutMs: number; intervalMs: number }): ReadinessCheck {
  return async (ctx) => {
    const url = `http://${connectableHost(ctx.host)}:${ctx.port}${opts.path}`;
    const deadline = Date.now() + opts.timeoutMs;
    while (Date.now() < deadline) {
      if (gaveUp(ctx)) return false;
      try {
        const res = await fetch(url, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
        if (res.ok) return !gaveUp(ctx);
      } catch { /* not listening yet */ }
      await sleep(opts.intervalMs);
    }
    return false;
  };
}

export function graceReadiness(graceMs: number, pollMs = 100): ReadinessCheck {
  return async (ctx) => {
    const deadline = Date.now() + graceMs;
    while (Date.now() < deadline) {
      if (gaveUp(ctx)) return false;
      await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())));
    }
    return !gaveUp(ctx);
  };
}

export function readinessFromSettings(settings: ReadinessSettings): ReadinessCheck {
  return settings.mode === 'grace'
    ? graceReadiness(settings.graceMs)
    : httpReadiness({ path: settings.path, timeoutMs: settings.timeoutMs, intervalMs: settings.intervalMs });
}
