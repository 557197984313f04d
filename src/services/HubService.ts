/**
 * HubService — typed client for the hub's Control/Status API.
 *
 * Transport only: every call resolves to an IApiResult and never throws.
 * Failures carry the server's error kind when it sent one.
 */

import type {
  HubErrorKind, IApiResult, IErrorResponse, IHubStatus,
  IModelActionResponse, IOkResponse, IReloadResponse,
} from '../types';

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '']);

const ERROR_KINDS: ReadonlySet<string> = new Set<HubErrorKind>([
  'NotFound', 'AlreadyRunning', 'NotRunning', 'NotJIT', 'PortConflict', 'SpawnFailed',
  'ConfigInvalid', 'GroupCapacityExceeded', 'ProcessUnresponsive', 'Busy',
  'Unauthorized', 'Forbidden', 'Internal',
]);

function isErrorKind(value: unknown): value is HubErrorKind {
  return typeof value === 'string' && ERROR_KINDS.has(value);
}

function isErrorResponse(value: unknown): value is IErrorResponse {
  return typeof value === 'object' && value !== null
    && 'error' in value && isErrorKind(value.error)
    && 'detail' in value && typeof value.detail === 'string';
}

/** Base URL for a hub bound to `host:port`; wildcard binds are reached on loopback. */
export function hubBaseUrl(host: string, port: number): string {
  const target = WILDCARD_HOSTS.has(host) ? '127.0.0.1' : host;
  return `http://${target.includes(':') ? `[${target}]` : target}:${port}`;
}

export class HubService {
  constructor(
    private readonly baseUrl: string,
    private readonly token: string | null = null,
  ) {}

  // --- Status ---

  async health(): Promise<IApiResult<IOkResponse>> {
    return this.get('/hub/health');
  }

  async status(): Promise<IApiResult<IHubStatus>> {
    return this.get('/hub/status');
  }

  // --- Workers ---

  async start(name: string): Promise<IApiResult<IModelActionResponse>> {
    return this.post(`/hub/models/${encodeURIComponent(name)}/start`);
  }

  /** `timeoutS` overrides the hub's graceful-stop timeout for this call. */
  async stop(name: string, timeoutS?: number): Promise<IApiResult<IModelActionResponse>> {
    return this.post(`/hub/models/${encodeURIComponent(name)}/stop`, timeoutS === undefined ? undefined : { timeout_s: timeoutS });
  }

  async load(name: string): Promise<IApiResult<IModelActionResponse>> {
    return this.post(`/hub/models/${encodeURIComponent(name)}/load`);
  }

  async unload(name: string, timeoutS?: number): Promise<IApiResult<IModelActionResponse>> {
    return this.post(`/hub/models/${encodeURIComponent(name)}/unload`, timeoutS === undefined ? undefined : { timeout_s: timeoutS });
  }

  /** Report that `name` just served a request (resets its idle timer). */
  async recordActivity(name: string): Promise<IApiResult<IModelActionResponse>> {
    return this.post(`/hub/models/${encodeURIComponent(name)}/activity`);
  }

  // --- Fleet ---

  async stopAll(): Promise<IApiResult<IHubStatus>> {
    return this.post('/hub/models/stop-all');
  }

  async reload(): Promise<IApiResult<IReloadResponse>> {
    return this.post('/hub/reload');
  }

  async shutdown(): Promise<IApiResult<IOkResponse>> {
    return this.post('/hub/shutdown');
  }

  // --- Transport ---

  private async get<T>(path: string): Promise<IApiResult<T>> {
    return this.request<T>(path, { headers: this.authHeaders() });
  }

  private async post<T>(path: string, body?: unknown): Promise<IApiResult<T>> {
    return this.request<T>(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...this.authHeaders() },
      ...(body !== undefined && { body: JSON.stringify(body) }),
    });
  }

  private async request<T>(path: string, init: RequestInit): Promise<IApiResult<T>> {
    const start = performance.now();
    try {
      const res = await fetch(`${this.baseUrl}${path}`, init);
      const payload: unknown = await res.json().catch(() => null);
      const latencyMs = performance.now() - start;
      if (res.ok) return { success: true, data: payload as T, latencyMs };
      if (isErrorResponse(payload)) {
        return { success: false, error: payload.detail, errorKind: payload.error, latencyMs };
      }
      return { success: false, error: `HTTP ${res.status}`, latencyMs };
    } catch (err) {
      return { success: false, error: String(err), latencyMs: performance.now() - start };
    }
  }

  private authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }
}
