/**
 * In-process stand-ins for worker processes, used by the hub's tests.
 */

import { parseHubConfig } from './config';
import type { LaunchRequest, ProcessLauncher } from './launcher';
import type { ReadinessCheck } from './readiness';
import type { PortAssignment, PortStore } from '../db/portStore';
import type { HubConfig, WorkerProcess } from './types';

const SIGNAL_CODES: Partial<Record<NodeJS.Signals, number>> = { SIGTERM: -15, SIGKILL: -9 };

export class FakeProcess implements WorkerProcess {
  readonly signals: NodeJS.Signals[] = [];
  private code: number | undefined;
  private waiters: Array<() => void> = [];

  constructor(
    readonly pid: number,
    /** When set, SIGTERM is recorded but ignored. */
    public ignoreTerm = false,
  ) {}

  exitCode(): number | undefined {
    return this.code;
  }

  signal(sig: NodeJS.Signals): void {
    this.signals.push(sig);
    if (sig === 'SIGTERM' && this.ignoreTerm) return;
    this.exit(SIGNAL_CODES[sig] ?? -1);
  }

  /** Simulate the process exiting on its own. */
  exit(code: number): void {
    if (this.code !== undefined) return;
    this.code = code;
    for (const wake of this.waiters.splice(0)) wake();
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.code !== undefined) return Promise.resolve(true);
    return new Promise(resolve => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      this.waiters.push(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}

export class FakeLauncher implements ProcessLauncher {
  readonly requests: LaunchRequest[] = [];
  readonly processes = new Map<string, FakeProcess>();
  /** Model names whose next launch throws. */
  readonly failing = new Set<string>();
  ignoreTerm = false;
  private nextPid = 1000;

  async launch(req: LaunchRequest): Promise<WorkerProcess> {
    this.requests.push(req);
    const name = modelNameOf(req);
    if (this.failing.has(name)) throw new Error(`ENOENT: ${req.command}`);
    const proc = new FakeProcess(this.nextPid++, this.ignoreTerm);
    this.processes.set(name, proc);
    return proc;
  }

  /** Most recent process launched for `name`. */
  proc(name: string): FakeProcess {
    const proc = this.processes.get(name);
    if (!proc) throw new Error(`'${name}' was never launched`);
    return proc;
  }

  launchCount(name: string): number {
    return this.requests.filter(r => modelNameOf(r) === name).length;
  }
}

/** Workers are launched with `--model-path /models/<name>` throughout the tests. */
function modelNameOf(req: LaunchRequest): string {
  const i = req.args.indexOf('--model-path');
  const path = i >= 0 ? req.args[i + 1] ?? '' : '';
  return path.slice(path.lastIndexOf('/') + 1);
}

/** Ready as soon as asked, unless the process already died or a stop arrived. */
export const instantReadiness: ReadinessCheck = async (ctx) =>
  ctx.process.exitCode() === undefined && !ctx.cancelled();

/** Readiness that resolves only when the test calls `release`. */
export function gatedReadiness(): { check: ReadinessCheck; release: (ready?: boolean) => void; entered: Promise<void> } {
  let open: (ready: boolean) => void = () => undefined;
  let signalEntered: () => void = () => undefined;
  const gate = new Promise<boolean>(resolve => { open = resolve; });
  const entered = new Promise<void>(resolve => { signalEntered = resolve; });
  return {
    check: async (ctx) => {
      signalEntered();
      const ready = await gate;
      return ready && ctx.process.exitCode() === undefined && !ctx.cancelled();
    },
    release: (ready = true) => open(ready),
    entered,
  };
}

export class MemoryPortStore implements PortStore {
  rows: PortAssignment[] = [];
  writes = 0;

  constructor(initial: PortAssignment[] = []) {
    this.rows = initial;
  }

  loadAll(): PortAssignment[] {
    return [...this.rows];
  }

  replaceAll(assignments: readonly PortAssignment[]): void {
    this.writes += 1;
    this.rows = [...assignments];
  }
}

export class FakeClock {
  constructor(public now = 1_700_000_000_000) {}

  readonly fn = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export const anyPortFree = async (): Promise<boolean> => true;

/** Build a HubConfig from a YAML-shaped object; models default to `/models/<name>`. */
export function testConfig(doc: Record<string, unknown>): HubConfig {
  const models = Array.isArray(doc['models']) ? doc['models'] : [];
  return parseHubConfig({
    log_path: '/tmp/modelhub-test-logs',
    stop_timeout_s: 0.05,
    ...doc,
    models: models.map((m: unknown) =>
      typeof m === 'object' && m !== null && 'name' in m && !('model_path' in m)
        ? { ...m, model_path: `/models/${String(m.name)}` }
        : m),
  }, '/');
}
