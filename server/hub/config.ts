/**
 * Hub configuration — hub.yaml → validated, immutable HubConfig snapshot.
 *
 * The file uses snake_case keys. Model entries may carry any number of extra
 * keys; those are worker launch options and are kept verbatim, in order.
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join, resolve } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { createLogger } from '../lib/logger';
import { HubError } from './errors';
import type { GroupSpec, HubConfig, LaunchOptionValue, ModelSpec } from './types';

const log = createLogger('config');

export const DEFAULT_BASE_PATH     = join(homedir(), '.modelhub');
export const DEFAULT_CONFIG_PATH   = join(DEFAULT_BASE_PATH, 'hub.yaml');
export const DEFAULT_STARTING_PORT = 5005;
export const DEFAULT_WORKER_COMMAND = ['mlx-openai-server', 'launch'] as const;

const RESERVED_MODEL_KEYS = new Set(['name', 'model_path', 'host', 'port', 'jit_enabled', 'group']);

const PortSchema = z.number().int().min(1).max(65535);

const LaunchOptionSchema: z.ZodType<LaunchOptionValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.union([z.string(), z.number()])),
]);

const ModelSchema = z.object({
  name:        z.string().regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, ".", "_" and "-"'),
  model_path:  z.string().min(1),
  host:        z.string().min(1).optional(),
  port:        PortSchema.nullish(),
  jit_enabled: z.boolean().default(false),
  group:       z.string().min(1).nullish(),
}).passthrough();

const GroupSchema = z.object({
  name:                    z.string().min(1),
  max_loaded:              z.number().int().positive().nullish(),
  idle_unload_trigger_min: z.number().positive().nullish(),
});

const HubSchema = z.object({
  host:                z.string().min(1).default('127.0.0.1'),
  port:                PortSchema.default(8000),
  model_starting_port: PortSchema.default(DEFAULT_STARTING_PORT),
  enable_status_page:  z.boolean().default(true),
  log_level:           z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  log_path:            z.string().min(1).optional(),
  worker_command:      z.array(z.string().min(1)).min(1).default([...DEFAULT_WORKER_COMMAND]),
  worker_env:          z.record(z.string(), z.string()).default({}),
  poll_interval_s:     z.number().positive().default(5),
  stop_timeout_s:      z.number().positive().default(10),
  shutdown_timeout_s:  z.number().positive().default(30),
  readiness: z.object({
    mode:       z.enum(['health', 'grace']).default('health'),
    path:       z.string().startsWith('/').default('/health'),
    timeout_s:  z.number().positive().default(120),
    interval_s: z.number().positive().default(1),
    grace_s:    z.number().nonnegative().default(2),
  }).default({}),
  restart: z.object({
    max_attempts: z.number().int().nonnegative().default(3),
    backoff_s:    z.number().nonnegative().default(2),
  }).default({}),
  models: z.array(ModelSchema).default([]),
  groups: z.array(GroupSchema).default([]),
});

type RawModel = z.infer<typeof ModelSchema>;

export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function toModelSpec(raw: RawModel, defaultHost: string): ModelSpec {
  const options: Array<readonly [string, LaunchOptionValue]> = [];
  for (const [key, value] of Object.entries(raw)) {
    if (RESERVED_MODEL_KEYS.has(key)) continue;
    const parsed = LaunchOptionSchema.safeParse(value);
    if (!parsed.success) {
      throw new HubError('ConfigInvalid', `Model '${raw.name}' option '${key}' must be a scalar or a list of scalars`);
    }
    options.push([key, parsed.data]);
  }

  return {
    name:       raw.name,
    modelPath:  raw.model_path,
    host:       raw.host ?? defaultHost,
    port:       raw.port ?? null,
    jitEnabled: raw.jit_enabled,
    group:      raw.group ?? null,
    options,
  };
}

/**
 * Validate an already-parsed document. `baseDir` anchors a relative
 * `log_path`. Throws `HubError('ConfigInvalid')`.
 */
export function parseHubConfig(raw: unknown, baseDir: string = process.cwd()): HubConfig {
  const parsed = HubSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new HubError('ConfigInvalid', `Invalid hub config: ${describeIssues(parsed.error)}`);
  }
  const doc = parsed.data;

  const groups: GroupSpec[] = [];
  const groupNames = new Set<string>();
  for (const g of doc.groups) {
    if (groupNames.has(g.name)) throw new HubError('ConfigInvalid', `Duplicate group name '${g.name}'`);
    groupNames.add(g.name);
    groups.push({
      name:                 g.name,
      maxLoaded:            g.max_loaded ?? null,
      idleUnloadTriggerMin: g.idle_unload_trigger_min ?? null,
    });
  }

  const models: ModelSpec[] = [];
  const modelNames = new Set<string>();
  const explicitPorts = new Map<number, string>();
  for (const rawModel of doc.models) {
    const spec = toModelSpec(rawModel, doc.host);
    if (modelNames.has(spec.name)) throw new HubError('ConfigInvalid', `Duplicate model name '${spec.name}'`);
    modelNames.add(spec.name);

    if (spec.group !== null && !groupNames.has(spec.group)) {
      throw new HubError('ConfigInvalid', `Model '${spec.name}' references unknown group '${spec.group}'`);
    }
    if (spec.port !== null) {
      const owner = explicitPorts.get(spec.port);
      if (owner !== undefined) {
        throw new HubError('ConfigInvalid', `Models '${owner}' and '${spec.name}' both request port ${spec.port}`);
      }
      if (spec.port === doc.port) {
        throw new HubError('ConfigInvalid', `Model '${spec.name}' requests port ${spec.port}, which the hub itself binds`);
      }
      explicitPorts.set(spec.port, spec.name);
    }
    models.push(spec);
  }

  for (const group of groups) {
    if (group.idleUnloadTriggerMin === null) continue;
    const mixed = models.some(m => m.group === group.name && !m.jitEnabled);
    if (mixed) {
      log.warn(`Group '${group.name}' has non-JIT members; idle unload will not be applied to it`);
    }
  }

  const logPath = doc.log_path !== undefined
    ? resolve(baseDir, expandHome(doc.log_path))
    : join(DEFAULT_BASE_PATH, 'logs');

  return {
    host:              doc.host,
    port:              doc.port,
    modelStartingPort: doc.model_starting_port,
    enableStatusPage:  doc.enable_status_page,
    logLevel:          doc.log_level,
    logPath,
    workerCommand:     doc.worker_command,
    workerEnv:         doc.worker_env,
    pollIntervalMs:    doc.poll_interval_s * 1000,
    stopTimeoutMs:     doc.stop_timeout_s * 1000,
    shutdownTimeoutMs: doc.shutdown_timeout_s * 1000,
    readiness: {
      mode:       doc.readiness.mode,
      path:       doc.readiness.path,
      timeoutMs:  doc.readiness.timeout_s * 1000,
      intervalMs: doc.readiness.interval_s * 1000,
      graceMs:    doc.readiness.grace_s * 1000,
    },
    restart: {
      maxAttempts: doc.restart.max_attempts,
      backoffMs:   doc.restart.backoff_s * 1000,
    },
    models,
    groups,
  };
}

/** Read and validate hub.yaml. Every failure is `ConfigInvalid`. */
export async function loadHubConfig(configPath: string): Promise<HubConfig> {
  const fullPath = resolve(expandHome(configPath));
  let text: string;
  try {
    text = await readFile(fullPath, 'utf-8');
  } catch (err) {
    throw new HubError('ConfigInvalid', `Cannot read hub config at ${fullPath}: ${String(err)}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new HubError('ConfigInvalid', `Hub config at ${fullPath} is not valid YAML: ${String(err)}`, { cause: err });
  }
  return parseHubConfig(raw, resolve(fullPath, '..'));
}

/** Canonical text of a spec; two specs are interchangeable iff these match. */
export function specFingerprint(spec: ModelSpec): string {
  return JSON.stringify([spec.name, spec.modelPath, spec.host, spec.port, spec.jitEnabled, spec.group, spec.options]);
}
