import type { HubErrorKind as ApiErrorKind } from '../../src/types';

/** Kinds raised by the hub core; auth and catch-all kinds belong to the HTTP layer. */
export type HubErrorKind = Exclude<ApiErrorKind, 'Unauthorized' | 'Forbidden' | 'Internal'>;

const HTTP_STATUS: Record<HubErrorKind, number> = {
  NotFound:              404,
  AlreadyRunning:        409,
  NotRunning:            409,
  NotJIT:                400,
  PortConflict:          409,
  SpawnFailed:           502,
  ConfigInvalid:         400,
  GroupCapacityExceeded: 409,
  ProcessUnresponsive:   500,
  Busy:                  409,
};

/** Failure surfaced through the control API with a stable `kind`. */
export class HubError extends Error {
  readonly kind: HubErrorKind;

  constructor(kind: HubErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HubError';
    this.kind = kind;
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.kind];
  }
}

export function isHubError(err: unknown, kind?: HubErrorKind): err is HubError {
  return err instanceof HubError && (kind === undefined || err.kind === kind);
}
