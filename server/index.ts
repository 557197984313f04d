/**
 * modelhub — daemon entry point
 *
 * Loads the hub configuration, restores persisted port assignments, starts
 * every always-on worker and serves the Control/Status API until SIGINT,
 * SIGTERM or POST /hub/shutdown.
 *
 * Environment:
 *   HUB_CONFIG      path to hub.yaml          (default ~/.modelhub/hub.yaml)
 *   HUB_DB_PATH     SQLite file               (default ~/.modelhub/modelhub.db)
 *   HUB_JWT_SECRET  enables bearer auth when set
 *   HUB_LOG_LEVEL   overrides log_level from hub.yaml
 */

import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { createApp } from './app';
import { openDb } from './db/schema';
import { SqlitePortStore } from './db/portStore';
import { DEFAULT_BASE_PATH, DEFAULT_CONFIG_PATH, expandHome, loadHubConfig } from './hub/config';
import { HubRuntime } from './hub/runtime';
import { createLogger, isLogLevel, setLogLevel } from './lib/logger';

const log = createLogger('hub');

// .env is loaded by hand; existing environment variables win
try {
  const envPath = resolve(process.cwd(), '.env');
  const lines = readFileSync(envPath, 'utf-8').split('\n');
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim();
    if (!(key in process.env)) process.env[key] = val;
  }
} catch { /* no .env: defaults apply */ }

function applyLogLevel(fromConfig: string): void {
  const override = process.env['HUB_LOG_LEVEL'];
  const level = override && isLogLevel(override) ? override : fromConfig;
  if (isLogLevel(level)) setLogLevel(level);
}

async function main(): Promise<void> {
  const configPath = process.env['HUB_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const dbPath     = expandHome(process.env['HUB_DB_PATH'] ?? join(DEFAULT_BASE_PATH, 'modelhub.db'));
  const jwtSecret  = process.env['HUB_JWT_SECRET'] || null;

  const config = await loadHubConfig(configPath);
  applyLogLevel(config.logLevel);

  const db = openDb(dbPath);
  const hub = new HubRuntime({
    config,
    configSource: async () => {
      const next = await loadHubConfig(configPath);
      applyLogLevel(next.logLevel);
      return next;
    },
    portStore: new SqlitePortStore(db),
    onExit: () => {
      server.close();
      db.close();
      process.exit(0);
    },
  });

  await hub.init();

  const app = createApp(hub, { jwtSecret });
  const server = app.listen(config.port, config.host, () => {
    log.info(`Control API listening on http://${config.host}:${config.port}/hub`);
    if (!jwtSecret) log.warn('HUB_JWT_SECRET is not set; the control API accepts unauthenticated requests');
  });
  server.on('error', (err) => {
    log.error(`Control API failed: ${String(err)}`);
    process.exit(1);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      log.info(`Received ${signal}`);
      hub.shutdown().catch((err: unknown) => {
        log.error(`Shutdown failed: ${String(err)}`);
        process.exit(1);
      });
    });
  }

  hub.monitor.start();
  await hub.startInitialModels();
  log.info(`Hub ready: ${config.models.length} model(s) configured`);
}

main().catch((err: unknown) => {
  log.error(`Startup failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
