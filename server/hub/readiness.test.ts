import express from 'express';
import { once } from 'events';
import type { Server } from 'http';
import { afterEach, describe, expect, it } from 'vitest';
import { graceReadiness, httpReadiness, type ReadinessContext } from './readiness';
import { FakeProcess } from './test-helpers';

function context(proc: FakeProcess, port = 1, cancelled = () => false): ReadinessContext {
  return { name: 'alpha', host: '0.0.0.0', port, process: proc, cancelled };
}

describe('graceReadiness', () => {
  it('is ready once the grace period passes with the process alive', async () => {
    expect(await graceReadiness(30, 5)(context(new FakeProcess(1)))).toBe(true);
  });

  it('fails as soon as the process exits', async () => {
    const proc = new FakeProcess(1);
    setTimeout(() => proc.exit(1), 10);
    expect(await graceReadiness(5_000, 5)(context(proc))).toBe(false);
  });

  it('gives up when a stop is requested', async () => {
    expect(await graceReadiness(5_000, 5)(context(new FakeProcess(1), 1, () => true))).toBe(false);
  });
});

describe('httpReadiness', () => {
  let server: Server | null = null;

  async function serve(healthy: () => boolean): Promise<number> {
    const app = express();
    app.get('/health', (_req, res) => {
      const ok = healthy();
      res.status(ok ? 200 : 503).json({ ok });
    });
    const listening = app.listen(0, '127.0.0.1');
    server = listening;
    await once(listening, 'listening');
    const address = listening.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    return address.port;
  }

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      current.closeAllConnections();
      await new Promise<void>(resolve => current.close(() => resolve()));
    }
  });

  it('polls the health path on loopback until it answers 200', async () => {
    let hits = 0;
    const port = await serve(() => ++hits >= 3);
    const ready = await httpReadiness({ path: '/health', timeoutMs: 2_000, intervalMs: 10 })(context(new FakeProcess(1), port));
    expect(ready).toBe(true);
    expect(hits).toBe(3);
  });

  it('times out while the worker keeps answering errors', async () => {
    const port = await serve(() => false);
    const ready = await httpReadiness({ path: '/health', timeoutMs: 100, intervalMs: 10 })(context(new FakeProcess(1), port));
    expect(ready).toBe(false);
  });

  it('stops polling once the process has exited', async () => {
    const proc = new FakeProcess(1);
    proc.exit(1);
    const ready = await httpReadiness({ path: '/health', timeoutMs: 2_000, intervalMs: 10 })(context(proc, 1));
    expect(ready).toBe(false);
  });
});
