/**
 * MonitorLoop — the hub's only actor that moves workers without a request.
 *
 * Each tick, in order:
 *   1. poll live workers and record unsolicited exits as Crashed
 *   2. unload JIT workers idle past their group's trigger
 *   3. restart crashed always-on workers, with exponential backoff
 *
 * A failure for one worker is logged and never stops the tick for the others.
 */

import { createLogger } from '../lib/logger';
import type { KeyedMutex } from '../lib/mutex';
import type { GroupPolicy } from './groupPolicy';
import type { ModelRegistry } from './registry';
import type { ProcessSupervisor } from './supervisor';
import type { Clock, RestartSettings } from './types';

const log = createLogger('monitor');

export interface MonitorHooks {
  unloadIdle(name: string): Promise<void>;
  restartCrashed(name: string): Promise<void>;
  restartSettings(): RestartSettings;
}

export interface MonitorDeps {
  registry:   ModelRegistry;
  supervisor: ProcessSupervisor;
  policy:     GroupPolicy;
  locks:      KeyedMutex;
  hooks:      MonitorHooks;
  clock:      Clock;
  intervalMs: number;
}

export class MonitorLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly deps: MonitorDeps) {}

  setInterval(ms: number): void {
    this.deps.intervalMs = ms;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  /** Cancels the next tick and waits for the current one, if any. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  async tick(): Promise<void> {
    await this.pollWorkers();
    await this.unloadIdleWorkers();
    await this.restartCrashedWorkers();
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick()
        .catch((err: unknown) => log.error(`Monitor tick failed: ${String(err)}`))
        .finally(() => {
          this.inFlight = null;
          this.schedule();
        });
    }, this.deps.intervalMs);
  }

  private async pollWorkers(): Promise<void> {
    const { registry, supervisor, locks } = this.deps;
    for (const { spec, runtime } of registry.list()) {
      if (runtime.status !== 'Running') continue;
      // A busy worker is mid-transition under someone else's lock; next tick.
      if (locks.isLocked(spec.name)) continue;
      try {
        await locks.runExclusive(spec.name, () => {
          supervisor.poll(spec.name, runtime);
        });
      } catch (err) {
        log.error(`Poll failed for '${spec.name}': ${String(err)}`);
      }
    }
  }

  private async unloadIdleWorkers(): Promise<void> {
    const { policy, hooks, clock } = this.deps;
    for (const name of policy.idleCandidates(clock())) {
      try {
        await hooks.unloadIdle(name);
      } catch (err) {
        log.error(`Idle unload failed for '${name}': ${String(err)}`);
      }
    }
  }

  private async restartCrashedWorkers(): Promise<void> {
    const { registry, hooks, clock, locks } = this.deps;
    const { maxAttempts, backoffMs } = hooks.restartSettings();

    for (const { spec, runtime } of registry.list()) {
      if (runtime.status !== 'Crashed' || spec.jitEnabled) continue;
      if (runtime.restartAttempts >= maxAttempts) continue;
      if (locks.isLocked(spec.name)) continue;

      const now = clock();
      if (runtime.nextRestartAt === null) {
        runtime.nextRestartAt = now + backoffMs * 2 ** runtime.restartAttempts;
        log.info(`'${spec.name}' crashed; restart ${runtime.restartAttempts + 1}/${maxAttempts} in ${runtime.nextRestartAt - now} ms`);
        continue;
      }
      if (now < runtime.nextRestartAt) continue;

      runtime.restartAttempts += 1;
      runtime.nextRestartAt = null;
      try {
        await hooks.restartCrashed(spec.name);
      } catch (err) {
        log.error(`Restart ${runtime.restartAttempts}/${maxAttempts} of '${spec.name}' failed: ${String(err)}`);
        if (runtime.restartAttempts >= maxAttempts) {
          log.error(`Giving up on '${spec.name}' after ${maxAttempts} restart attempts`);
        }
      }
    }
  }
}
