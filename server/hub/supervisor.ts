/**
 * ProcessSupervisor — one OS process per worker.
 *
 *   start: Stopped|Crashed → Starting → Running   (or → Crashed on failure)
 *   stop:  Starting|Running → Stopping|Unloading → Stopped
 *   poll:  Running → Crashed when the process died on its own
 *
 * Callers hold the worker's lock around every call.
 */

import { createLogger } from '../lib/logger';
import { HubError } from './errors';
import { buildLaunchArgs, type ProcessLauncher } from './launcher';
import type { ReadinessCheck } from './readiness';
import type { Clock, ModelSpec, RuntimeState, StopVia, WorkerStatus } from './types';

const log = createLogger('supervisor');

/** How long to wait after SIGKILL before giving up on the exit notification. */
const KILL_WAIT_MS = 5_000;

export interface SupervisorOptions {
  launcher:      ProcessLauncher;
  readiness:     ReadinessCheck;
  workerCommand: readonly string[];
  workerEnv?:    Readonly<Record<string, string>>;
  stopTimeoutMs: number;
  clock?:        Clock;
}

export class ProcessSupervisor {
  private readonly launcher: ProcessLauncher;
  private readiness: ReadinessCheck;
  private workerCommand: readonly string[];
  private workerEnv: Readonly<Record<string, string>>;
  private stopTimeoutMs: number;
  private readonly clock: Clock;

  constructor(opts: SupervisorOptions) {
    this.launcher      = opts.launcher;
    this.readiness     = opts.readiness;
    this.workerCommand = opts.workerCommand;
    this.workerEnv     = opts.workerEnv ?? {};
    this.stopTimeoutMs = opts.stopTimeoutMs;
    this.clock         = opts.clock ?? Date.now;
  }

  /** Apply launch settings from a reloaded config; affects later starts only. */
  configure(opts: Pick<SupervisorOptions, 'readiness' | 'workerCommand' | 'workerEnv' | 'stopTimeoutMs'>): void {
    this.readiness     = opts.readiness;
    this.workerCommand = opts.workerCommand;
    this.workerEnv     = opts.workerEnv ?? {};
    this.stopTimeoutMs = opts.stopTimeoutMs;
  }

  get defaultStopTimeoutMs(): number {
    return this.stopTimeoutMs;
  }

  async start(spec: ModelSpec, runtime: RuntimeState): Promise<RuntimeState> {
    if (runtime.status !== 'Stopped' && runtime.status !== 'Crashed') {
      throw new HubError('AlreadyRunning', `Model '${spec.name}' is ${runtime.status.toLowerCase()}`);
    }

    const [command, ...leading] = this.workerCommand;
    if (command === undefined) throw new HubError('SpawnFailed', 'worker_command is empty');

    runtime.status        = 'Starting';
    runtime.stopRequested = null;
    runtime.lastError     = null;
    runtime.lastExitCode  = null;
    runtime.startedAt     = null;

    const args = [...leading, ...buildLaunchArgs(spec, runtime.assignedPort)];
    log.info(`Starting '${spec.name}' on ${spec.host}:${runtime.assignedPort}: ${command} ${args.join(' ')}`);

    try {
      runtime.process = await this.launcher.launch({
        command,
        args,
        env:     { ...process.env, ...this.workerEnv, PYTHONUNBUFFERED: '1' },
        logPath: runtime.logPath,
      });
    } catch (err) {
      runtime.status    = 'Crashed';
      runtime.process   = null;
      runtime.lastError = `Spawn failed: ${String(err)}`;
      log.error(`Failed to spawn '${spec.name}': ${String(err)}`);
      throw new HubError('SpawnFailed', `Failed to start model '${spec.name}': ${String(err)}`, { cause: err });
    }

    const proc = runtime.process;
    const ready = await this.readiness({
      name:      spec.name,
      host:      spec.host,
      port:      runtime.assignedPort,
      process:   proc,
      cancelled: () => runtime.stopRequested !== null,
    });

    if (runtime.stopRequested !== null) {
      log.info(`Stop arrived while '${spec.name}' was starting; stopping it`);
      await this.stop(runtime, this.stopTimeoutMs, runtime.stopRequested);
      return runtime;
    }

    if (!ready) {
      const exited = proc.exitCode();
      if (exited === undefined) {
        log.warn(`'${spec.name}' did not become ready; terminating it`);
        await this.stop(runtime, this.stopTimeoutMs);
      }
      runtime.status       = 'Crashed';
      runtime.process      = null;
      runtime.lastExitCode = proc.exitCode() ?? null;
      runtime.lastError    = exited === undefined
        ? `Readiness check failed for '${spec.name}'`
        : `Process exited with code ${exited} during startup`;
      throw new HubError('SpawnFailed', runtime.lastError);
    }

    runtime.status         = 'Running';
    runtime.startedAt      = this.clock();
    runtime.lastActivityAt = runtime.startedAt;
    log.info(`'${spec.name}' is running on ${spec.host}:${runtime.assignedPort} (pid=${proc.pid ?? '?'})`);
    return runtime;
  }

  /**
   * Graceful stop: SIGTERM, wait up to `timeoutMs`, then SIGKILL.
   * The worker always ends Stopped with the exit code recorded.
   */
  async stop(runtime: RuntimeState, timeoutMs: number = this.stopTimeoutMs, via: StopVia = 'Stopping'): Promise<void> {
    const proc = runtime.process;
    if (proc === null) {
      runtime.status        = 'Stopped';
      runtime.stopRequested = null;
      return;
    }

    runtime.status = via;
    proc.signal('SIGTERM');
    let exited = await proc.waitForExit(timeoutMs);
    if (!exited) {
      log.warn(`ProcessUnresponsive: pid ${proc.pid ?? '?'} ignored SIGTERM for ${timeoutMs} ms; sending SIGKILL`);
      proc.signal('SIGKILL');
      exited = await proc.waitForExit(KILL_WAIT_MS);
      if (!exited) log.error(`pid ${proc.pid ?? '?'} did not report exit after SIGKILL`);
    }

    runtime.lastExitCode  = proc.exitCode() ?? null;
    runtime.process       = null;
    runtime.status        = 'Stopped';
    runtime.stopRequested = null;
    runtime.startedAt     = null;
  }

  /** Non-blocking liveness check. */
  poll(name: string, runtime: RuntimeState): WorkerStatus {
    const proc = runtime.process;
    if (runtime.status !== 'Running' || proc === null) return runtime.status;

    const code = proc.exitCode();
    if (code === undefined) return runtime.status;

    runtime.status       = 'Crashed';
    runtime.process      = null;
    runtime.lastExitCode = code;
    runtime.lastError    = `Process exited with code ${code}`;
    log.warn(`'${name}' exited unexpectedly with code ${code}`);
    return runtime.status;
  }
}
