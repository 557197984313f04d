/**
 * Hub core types — configuration snapshot, worker specs and runtime state.
 *
 * ModelSpec / GroupSpec / HubConfig are immutable snapshots produced by the
 * config loader. RuntimeState is the only mutable record and is owned by the
 * registry; the supervisor is the only component that touches `process`.
 */

import type { WorkerStatus } from '../../src/types';

export type LaunchOptionValue = string | number | boolean | null | ReadonlyArray<string | number>;

/** Pass-through worker flags, kept in file order and never interpreted. */
export type LaunchOptions = ReadonlyArray<readonly [key: string, value: LaunchOptionValue]>;

export interface ModelSpec {
  readonly name: string;
  readonly modelPath: string;
  readonly host: string;
  readonly port: number | null;
  readonly jitEnabled: boolean;
  readonly group: string | null;
  readonly options: LaunchOptions;
}

export interface GroupSpec {
  readonly name: string;
  readonly maxLoaded: number | null;
  readonly idleUnloadTriggerMin: number | null;
}

export type ReadinessMode = 'health' | 'grace';

export interface ReadinessSettings {
  readonly mode: ReadinessMode;
  readonly path: string;
  readonly timeoutMs: number;
  readonly intervalMs: number;
  readonly graceMs: number;
}

export interface RestartSettings {
  readonly maxAttempts: number;
  readonly backoffMs: number;
}

export interface HubConfig {
  readonly host: string;
  readonly port: number;
  readonly modelStartingPort: number;
  readonly enableStatusPage: boolean;
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
  readonly logPath: string;
  readonly workerCommand: readonly string[];
  readonly workerEnv: Readonly<Record<string, string>>;
  readonly pollIntervalMs: number;
  readonly stopTimeoutMs: number;
  readonly shutdownTimeoutMs: number;
  readonly readiness: ReadinessSettings;
  readonly restart: RestartSettings;
  readonly models: readonly ModelSpec[];
  readonly groups: readonly GroupSpec[];
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export type { WorkerStatus } from '../../src/types';

/** Handle on one spawned worker process. */
export interface WorkerProcess {
  readonly pid: number | undefined;
  /** `undefined` while the process is alive, the recorded exit code afterwards. */
  exitCode(): number | undefined;
  signal(sig: NodeJS.Signals): void;
  /** Resolves true once exited, false if `timeoutMs` elapsed first. */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

/** Transitional state a stop passes through. */
export type StopVia = 'Stopping' | 'Unloading';

export interface RuntimeState {
  status: WorkerStatus;
  process: WorkerProcess | null;
  assignedPort: number;
  startedAt: number | null;
  lastActivityAt: number | null;
  lastExitCode: number | null;
  lastError: string | null;
  logPath: string;
  /** Set by stop/unload while a start is in flight; the start finishes through it. */
  stopRequested: StopVia | null;
  restartAttempts: number;
  nextRestartAt: number | null;
}

export interface WorkerEntry {
  readonly spec: ModelSpec;
  readonly runtime: RuntimeState;
}

export type Clock = () => number;

export const ACTIVE_STATUSES: ReadonlySet<WorkerStatus> = new Set(['Starting', 'Running', 'Stopping', 'Unloading']);
