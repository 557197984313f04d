/**
 * HubRuntime — the orchestration core behind the control API.
 *
 * Owns the registry, allocator, supervisor, group policy and monitor for the
 * daemon's lifetime. Every mutation of a worker happens under that worker's
 * lock; starts into a capped group are additionally serialized per group so
 * two admissions can never both take the last slot.
 */

import { join } from 'path';
import type { PortStore } from '../db/portStore';
import { createLogger } from '../lib/logger';
import { KeyedMutex, Mutex } from '../lib/mutex';
import type {
  IGroupStatus, IHubStatus, IModelStatus, IReconcileAction,
} from '../../src/types';
import { HubError, isHubError } from './errors';
import { GroupPolicy } from './groupPolicy';
import { ChildProcessLauncher, type ProcessLauncher } from './launcher';
import { MonitorLoop } from './monitor';
import { PortAllocator, type PortProbe } from './portAllocator';
import { readinessFromSettings, type ReadinessCheck } from './readiness';
import { reconcile, type ReconcileAction } from './reconciler';
import { ModelRegistry, freshRuntime } from './registry';
import { ProcessSupervisor } from './supervisor';
import { ACTIVE_STATUSES, type Clock, type HubConfig, type StopVia, type WorkerEntry } from './types';
import { isPortAvailable } from '../lib/network';

const log = createLogger('hub');
const reconcileLog = createLogger('reconcile');

export interface HubRuntimeOptions {
  config:       HubConfig;
  /** Re-reads the configuration on reload; throws `ConfigInvalid`. */
  configSource: () => Promise<HubConfig>;
  portStore:    PortStore;
  launcher?:    ProcessLauncher;
  /** Fixed readiness check; when omitted it follows `config.readiness`. */
  readiness?:   ReadinessCheck;
  portProbe?:   PortProbe;
  clock?:       Clock;
  /** Invoked once shutdown has stopped every worker. */
  onExit?:      () => void;
}

export interface StartResult {
  evicted: string | null;
}

interface StartOptions {
  /** `start` refuses a running worker; `load` treats it as success. */
  requireStopped: boolean;
  /** Monitor restarts only act on workers that are still Crashed. */
  onlyIfCrashed?: boolean;
  resetRestarts:  boolean;
}

export class HubRuntime {
  readonly registry = new ModelRegistry();
  readonly policy: GroupPolicy;
  readonly allocator: PortAllocator;
  readonly supervisor: ProcessSupervisor;
  readonly monitor: MonitorLoop;

  private config: HubConfig;
  private readonly configSource: () => Promise<HubConfig>;
  private readonly fixedReadiness: ReadinessCheck | undefined;
  private readonly portProbe: PortProbe;
  private readonly clock: Clock;
  private readonly onExit: () => void;
  private readonly locks = new KeyedMutex();
  private readonly groupLocks = new KeyedMutex();
  private readonly reloadLock = new Mutex();
  private readonly startedAt: number;
  private shutdownPromise: Promise<void> | null = null;

  constructor(opts: HubRuntimeOptions) {
    this.config         = opts.config;
    this.configSource   = opts.configSource;
    this.fixedReadiness = opts.readiness;
    this.portProbe      = opts.portProbe ?? isPortAvailable;
    this.clock          = opts.clock ?? Date.now;
    this.onExit         = opts.onExit ?? (() => undefined);
    this.startedAt      = this.clock();

    this.policy    = new GroupPolicy(this.registry);
    this.allocator = new PortAllocator(opts.config.modelStartingPort, opts.portStore, this.portProbe);
    this.supervisor = new ProcessSupervisor({
      launcher:      opts.launcher ?? new ChildProcessLauncher(),
      readiness:     this.fixedReadiness ?? readinessFromSettings(opts.config.readiness),
      workerCommand: opts.config.workerCommand,
      workerEnv:     opts.config.workerEnv,
      stopTimeoutMs: opts.config.stopTimeoutMs,
      clock:         this.clock,
    });
    this.monitor = new MonitorLoop({
      registry:   this.registry,
      supervisor: this.supervisor,
      policy:     this.policy,
      locks:      this.locks,
      clock:      this.clock,
      intervalMs: opts.config.pollIntervalMs,
      hooks: {
        unloadIdle:      (name) => this.unloadIdle(name),
        restartCrashed:  (name) => this.restartCrashed(name),
        restartSettings: () => this.config.restart,
      },
    });
  }

  get hubConfig(): HubConfig {
    return this.config;
  }

  get shuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  /** Resolve ports and register every configured worker. Starts nothing. */
  async init(): Promise<void> {
    await this.reloadLock.runExclusive(() => this.applyConfig(this.config, false));
  }

  /** Start every always-on worker that is currently stopped. */
  async startInitialModels(): Promise<void> {
    for (const { spec, runtime } of this.registry.list()) {
      if (spec.jitEnabled || runtime.status !== 'Stopped') continue;
      try {
        await this.admitAndStart(spec.name, { requireStopped: false, resetRestarts: true });
      } catch (err) {
        log.error(`Failed to start model '${spec.name}': ${String(err)}`);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Worker operations
  // ---------------------------------------------------------------------------

  async start(name: string): Promise<StartResult> {
    this.assertOpen();
    const { runtime } = this.registry.get(name);
    if (runtime.status === 'Running' || runtime.status === 'Starting') {
      throw new HubError('AlreadyRunning', `Model '${name}' is already ${runtime.status.toLowerCase()}`);
    }
    return this.admitAndStart(name, { requireStopped: true, resetRestarts: true });
  }

  async load(name: string): Promise<StartResult> {
    this.assertOpen();
    const { spec, runtime } = this.registry.get(name);
    if (!spec.jitEnabled) throw new HubError('NotJIT', `Model '${name}' is not JIT-enabled; use start`);
    if (runtime.status === 'Running') {
      this.registry.recordActivity(name, this.clock());
      return { evicted: null };
    }
    return this.admitAndStart(name, { requireStopped: false, resetRestarts: true });
  }

  async stop(name: string, timeoutMs?: number): Promise<void> {
    await this.stopWorker(name, 'Stopping', timeoutMs);
  }

  async unload(name: string, timeoutMs?: number): Promise<void> {
    const { spec } = this.registry.get(name);
    if (!spec.jitEnabled) throw new HubError('NotJIT', `Model '${name}' is not JIT-enabled; use stop`);
    await this.stopWorker(name, 'Unloading', timeoutMs);
  }

  /** Stop every worker; the daemon keeps running. */
  async stopAll(): Promise<void> {
    const results = await Promise.allSettled(
      this.registry.list()
        .filter(e => e.runtime.status !== 'Stopped')
        .map(e => this.stopWorker(e.spec.name, 'Stopping')),
    );
    for (const r of results) {
      if (r.status === 'rejected' && !isHubError(r.reason, 'NotRunning')) {
        log.error(`Stop failed during stop-all: ${String(r.reason)}`);
      }
    }
  }

  recordActivity(name: string, timestamp: number = this.clock()): void {
    this.registry.recordActivity(name, timestamp);
  }

  // ---------------------------------------------------------------------------
  // Fleet operations
  // ---------------------------------------------------------------------------

  /**
   * Re-read the configuration and reconcile the fleet against it. An invalid
   * configuration aborts before anything is touched.
   */
  reload(): Promise<ReconcileAction[]> {
    this.assertOpen();
    return this.reloadLock.runExclusive(async () => {
      const next = await this.configSource();
      const actions = await this.applyConfig(next, true);
      const summary = countBy(actions.map(a => a.kind));
      log.info(`Reloaded hub config: ${next.models.length} model(s), ${next.groups.length} group(s) ${JSON.stringify(summary)}`);
      return actions;
    });
  }

  /**
   * Stop the monitor, stop every worker within the shutdown timeout, then
   * hand control back through `onExit`. Repeated calls share one shutdown.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    this.shutdownPromise = (async () => {
      log.info('Shutdown requested; stopping all models');
      await this.monitor.stop();

      let timer: ReturnType<typeof setTimeout> | undefined;
      const deadline = new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(false), this.config.shutdownTimeoutMs);
      });
      // A reload in flight finishes first; its later starts then see the shutdown.
      const stopped = this.reloadLock.runExclusive(() => this.stopAll());
      const finished = await Promise.race([stopped.then(() => true), deadline]);
      clearTimeout(timer);
      if (!finished) {
        log.warn(`Workers still running after ${this.config.shutdownTimeoutMs} ms; killing them`);
        for (const { runtime } of this.registry.list()) runtime.process?.signal('SIGKILL');
      }
      log.info('Shutdown complete');
      this.onExit();
    })();
    return this.shutdownPromise;
  }

  status(): IHubStatus {
    const now = this.clock();
    return {
      host:              this.config.host,
      port:              this.config.port,
      modelStartingPort: this.config.modelStartingPort,
      enableStatusPage:  this.config.enableStatusPage,
      startedAt:         this.startedAt,
      uptimeSeconds:     (now - this.startedAt) / 1000,
      models:            this.registry.list().map(e => this.modelStatus(e, now)),
      groups:            this.registry.groups().map((g): IGroupStatus => ({
        name:                 g.name,
        maxLoaded:            g.maxLoaded,
        idleUnloadTriggerMin: g.idleUnloadTriggerMin,
        running:              this.policy.running(g.name).length,
        total:                this.registry.members(g.name).length,
        idleUnloadActive:     this.policy.idleUnloadActive(g),
      })),
    };
  }

  describe(name: string): IModelStatus {
    return this.modelStatus(this.registry.get(name), this.clock());
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private modelStatus({ spec, runtime }: WorkerEntry, now: number): IModelStatus {
    return {
      name:            spec.name,
      status:          runtime.status,
      host:            spec.host,
      port:            runtime.assignedPort,
      pid:             runtime.process?.pid ?? null,
      jitEnabled:      spec.jitEnabled,
      group:           spec.group,
      modelPath:       spec.modelPath,
      startedAt:       runtime.startedAt,
      lastActivityAt:  runtime.lastActivityAt,
      uptimeSeconds:   runtime.status === 'Running' && runtime.startedAt !== null ? (now - runtime.startedAt) / 1000 : null,
      lastExitCode:    runtime.lastExitCode,
      lastError:       runtime.lastError,
      logPath:         runtime.logPath,
      restartAttempts: runtime.restartAttempts,
    };
  }

  private assertOpen(): void {
    if (this.shuttingDown) throw new HubError('Busy', 'Hub is shutting down');
  }

  private logPathFor(name: string, config: HubConfig = this.config): string {
    return join(config.logPath, `${name}.supervisor.log`);
  }

  private async admitAndStart(name: string, opts: StartOptions): Promise<StartResult> {
    const { spec } = this.registry.get(name);
    const group = spec.group !== null ? this.registry.group(spec.group) : undefined;
    if (group && group.maxLoaded !== null) {
      return this.groupLocks.runExclusive(group.name, () => this.startWithAdmission(name, opts));
    }
    return this.startWithAdmission(name, opts);
  }

  private async startWithAdmission(name: string, opts: StartOptions): Promise<StartResult> {
    this.assertOpen();
    const decision = this.policy.admit(name);

    if (decision.kind === 'reject') throw new HubError('GroupCapacityExceeded', decision.reason);

    if (decision.kind === 'evict') {
      const victim = decision.victim;
      // Victim before requester: the one lock order every eviction uses.
      return this.locks.runExclusiveMany([victim, name], async () => {
        const target = this.registry.find(victim);
        if (target && target.runtime.status === 'Running') {
          log.info(`Group '${target.spec.group ?? '?'}' is at capacity; unloading '${victim}' before starting '${name}'`);
          await this.supervisor.stop(target.runtime, this.supervisor.defaultStopTimeoutMs, 'Unloading');
        }
        await this.startLocked(name, opts);
        return { evicted: victim };
      });
    }

    await this.locks.runExclusive(name, () => this.startLocked(name, opts));
    return { evicted: null };
  }

  /** Caller holds `name`'s lock. */
  private async startLocked(name: string, opts: StartOptions): Promise<void> {
    const entry = this.registry.find(name);
    if (!entry) throw new HubError('NotFound', `Unknown model '${name}'`);
    const { spec, runtime } = entry;

    if (opts.onlyIfCrashed && runtime.status !== 'Crashed') return;
    if (runtime.status === 'Running') {
      if (opts.requireStopped) throw new HubError('AlreadyRunning', `Model '${name}' is already running`);
      this.registry.recordActivity(name, this.clock());
      return;
    }
    if (ACTIVE_STATUSES.has(runtime.status)) {
      throw new HubError('Busy', `Model '${name}' is ${runtime.status.toLowerCase()}`);
    }

    if (!(await this.portProbe(spec.host, runtime.assignedPort))) {
      throw new HubError('PortConflict', `Port ${runtime.assignedPort} for '${name}' is in use by another process`);
    }
    // Shutdown may have begun while this start waited; it only stops workers it can see.
    this.assertOpen();

    if (opts.resetRestarts) {
      runtime.restartAttempts = 0;
      runtime.nextRestartAt   = null;
    }
    await this.supervisor.start(spec, runtime);
  }

  private async stopWorker(name: string, via: StopVia, timeoutMs?: number): Promise<void> {
    const { runtime } = this.registry.get(name);
    if (runtime.status === 'Stopped') throw new HubError('NotRunning', `Model '${name}' is not running`);

    // A stop always wins over an in-flight start: flag it, the start honours it.
    const interruptedStart = runtime.status === 'Starting';
    if (interruptedStart) runtime.stopRequested = via;

    await this.locks.runExclusive(name, async () => {
      const entry = this.registry.find(name);
      if (!entry) return;
      const current = entry.runtime;

      if (current.status === 'Stopped') {
        if (interruptedStart) return;
        throw new HubError('NotRunning', `Model '${name}' is not running`);
      }
      if (current.status === 'Crashed') {
        current.status        = 'Stopped';
        current.nextRestartAt = null;
        log.info(`Crash of '${name}' acknowledged; it will not be restarted`);
        return;
      }
      await this.supervisor.stop(current, timeoutMs ?? this.supervisor.defaultStopTimeoutMs, via);
      log.info(`${via === 'Unloading' ? 'Unloaded' : 'Stopped'} model '${name}'`);
    });
  }

  private async unloadIdle(name: string): Promise<void> {
    await this.locks.runExclusive(name, async () => {
      // Activity may have arrived while we waited for the lock.
      if (!this.policy.idleCandidates(this.clock()).includes(name)) return;
      const { runtime } = this.registry.get(name);
      log.info(`Auto-unloading idle model '${name}'`);
      await this.supervisor.stop(runtime, this.supervisor.defaultStopTimeoutMs, 'Unloading');
    });
  }

  private async restartCrashed(name: string): Promise<void> {
    log.info(`Restarting crashed model '${name}'`);
    await this.admitAndStart(name, { requireStopped: false, onlyIfCrashed: true, resetRestarts: false });
  }

  /**
   * Swap in a config snapshot. Ports are resolved first; a conflict there
   * is a `ConfigInvalid` and leaves everything as it was.
   */
  private async applyConfig(next: HubConfig, startNew: boolean): Promise<ReconcileAction[]> {
    const currentPorts = new Map(this.registry.list().map(e => [e.spec.name, e.runtime.assignedPort]));
    const currentSpecs = this.registry.list().map(e => e.spec);

    this.allocator.setStartingPort(next.modelStartingPort);
    let ports: Map<string, number>;
    try {
      ports = await this.allocator.resolveAll(next.models, { reserved: [next.port] });
    } catch (err) {
      this.allocator.setStartingPort(this.config.modelStartingPort);
      if (isHubError(err, 'PortConflict')) throw new HubError('ConfigInvalid', err.message, { cause: err });
      throw err;
    }

    const actions = reconcile({ specs: currentSpecs, ports: currentPorts }, { specs: next.models, ports });
    const specs = new Map(next.models.map(s => [s.name, s]));
    for (const action of actions) {
      if (action.kind !== 'keep') reconcileLog.info(`${action.kind} '${action.name}'${action.kind === 'restart' ? ` (${action.reason})` : ''}`);
    }

    this.config = next;
    this.registry.setGroups(next.groups);
    this.supervisor.configure({
      readiness:     this.fixedReadiness ?? readinessFromSettings(next.readiness),
      workerCommand: next.workerCommand,
      workerEnv:     next.workerEnv,
      stopTimeoutMs: next.stopTimeoutMs,
    });
    this.monitor.setInterval(next.pollIntervalMs);

    const toStart: string[] = [];
    for (const action of actions) {
      const spec = specs.get(action.name);
      const port = ports.get(action.name);
      switch (action.kind) {
        case 'remove':
          await this.locks.runExclusive(action.name, async () => {
            const entry = this.registry.find(action.name);
            if (entry && entry.runtime.process) {
              log.info(`Stopping removed model '${action.name}'`);
              await this.supervisor.stop(entry.runtime);
            }
            this.registry.remove(action.name);
          });
          break;

        case 'add':
          if (!spec || port === undefined) break;
          this.registry.upsertSpec(spec, () => freshRuntime(port, this.logPathFor(spec.name, next)));
          if (startNew && action.start) toStart.push(spec.name);
          break;

        case 'restart':
          if (!spec || port === undefined) break;
          await this.locks.runExclusive(action.name, async () => {
            const entry = this.registry.get(action.name);
            const wasActive = ACTIVE_STATUSES.has(entry.runtime.status);
            if (entry.runtime.process) {
              log.info(`Restarting model '${action.name}' (${action.reason} changed)`);
              await this.supervisor.stop(entry.runtime);
            }
            this.registry.upsertSpec(spec, () => entry.runtime);
            // Ports only move on a stopped worker; a crash is settled here, its exit code kept.
            this.registry.setRuntime(action.name, {
              ...entry.runtime,
              status:        'Stopped',
              assignedPort:  port,
              logPath:       this.logPathFor(spec.name, next),
              nextRestartAt: null,
            });
            if (startNew && (wasActive || !spec.jitEnabled)) toStart.push(spec.name);
          });
          break;

        case 'keep':
          if (!spec) break;
          this.registry.upsertSpec(spec, () => freshRuntime(port ?? 0, this.logPathFor(spec.name, next)));
          break;
      }
    }
    this.registry.reorder(next.models.map(m => m.name));

    for (const victim of this.policy.overCapacity()) {
      await this.locks.runExclusive(victim, async () => {
        const entry = this.registry.find(victim);
        if (!entry || entry.runtime.status !== 'Running') return;
        log.info(`Group '${entry.spec.group ?? '?'}' shrank; evicting '${victim}'`);
        await this.supervisor.stop(entry.runtime, this.supervisor.defaultStopTimeoutMs, 'Unloading');
      });
    }

    for (const name of toStart) {
      try {
        await this.admitAndStart(name, { requireStopped: false, resetRestarts: true });
      } catch (err) {
        log.error(`Failed to start model '${name}' after reload: ${String(err)}`);
      }
    }
    if (startNew) await this.startInitialModels();
    return actions;
  }
}

function countBy(kinds: readonly IReconcileAction['kind'][]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const kind of kinds) counts[kind] = (counts[kind] ?? 0) + 1;
  return counts;
}
