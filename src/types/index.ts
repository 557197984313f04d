/**
 * modelhub — Shared Type Definitions
 *
 * JSON shapes of the Control/Status API. The daemon produces them and
 * HubService (CLI, dashboard) consumes them. Timestamps are epoch ms.
 */

// ---------------------------------------------------------------------------
// Workers & Groups
// ---------------------------------------------------------------------------

export type WorkerStatus = 'Stopped' | 'Starting' | 'Running' | 'Stopping' | 'Crashed' | 'Unloading';

export interface IModelStatus {
  name:           string;
  status:         WorkerStatus;
  host:           string;
  port:           number;
  pid:            number | null;
  jitEnabled:     boolean;
  group:          string | null;
  modelPath:      string;
  startedAt:      number | null;
  lastActivityAt: number | null;
  uptimeSeconds:  number | null;
  lastExitCode:   number | null;
  lastError:      string | null;
  logPath:        string;
  restartAttempts: number;
}

export interface IGroupStatus {
  name:                 string;
  maxLoaded:            number | null;
  idleUnloadTriggerMin: number | null;
  running:              number;
  total:                number;
  /** False when a member is not JIT: idle timers are then never acted on. */
  idleUnloadActive:     boolean;
}

export interface IHubStatus {
  host:              string;
  port:              number;
  modelStartingPort: number;
  enableStatusPage:  boolean;
  startedAt:         number;
  uptimeSeconds:     number;
  models:            IModelStatus[];
  groups:            IGroupStatus[];
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export interface IModelActionResponse {
  ok:       true;
  model:    IModelStatus;
  /** Group member stopped to make room (start/load only). */
  evicted?: string | null;
}

export type ReconcileActionKind = 'add' | 'remove' | 'restart' | 'keep';

export interface IReconcileAction {
  kind: ReconcileActionKind;
  name: string;
}

export interface IReloadResponse {
  ok:      true;
  actions: IReconcileAction[];
  status:  IHubStatus;
}

export interface IOkResponse {
  ok: true;
}

export type HubErrorKind =
  | 'NotFound'
  | 'AlreadyRunning'
  | 'NotRunning'
  | 'NotJIT'
  | 'PortConflict'
  | 'SpawnFailed'
  | 'ConfigInvalid'
  | 'GroupCapacityExceeded'
  | 'ProcessUnresponsive'
  | 'Busy'
  | 'Unauthorized'
  | 'Forbidden'
  | 'Internal';

export interface IErrorResponse {
  error:  HubErrorKind;
  detail: string;
}

// ---------------------------------------------------------------------------
// Auth
// ---------------------------------------------------------------------------

export type HubRole = 'admin' | 'viewer';

// ---------------------------------------------------------------------------
// API
// ---------------------------------------------------------------------------

export interface IApiResult<T> {
  success:    boolean;
  data?:      T;
  error?:     string;
  errorKind?: HubErrorKind;
  latencyMs:  number;
}
