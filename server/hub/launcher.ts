/**
 * Worker launch — command-line construction and the child_process launcher.
 */

import { spawn, type ChildProcess } from 'child_process';
import { closeSync, mkdirSync, openSync } from 'fs';
import { constants } from 'os';
import { dirname } from 'path';
import type { LaunchOptionValue, ModelSpec, WorkerProcess } from './types';

export interface LaunchRequest {
  command: string;
  args:    string[];
  env:     NodeJS.ProcessEnv;
  /** stdout and stderr are appended here. */
  logPath: string;
}

export interface ProcessLauncher {
  /** Resolves once the OS reports the process spawned; rejects if it could not be. */
  launch(req: LaunchRequest): Promise<WorkerProcess>;
}

function toFlag(key: string): string {
  return `--${key.replace(/_/g, '-')}`;
}

function optionArgs(key: string, value: LaunchOptionValue): string[] {
  if (value === null || value === false) return [];
  if (value === true) return [toFlag(key)];
  if (Array.isArray(value)) return value.length ? [toFlag(key), value.join(',')] : [];
  return [toFlag(key), String(value)];
}

/** Flags for one worker: identity flags first, then pass-through options in order. */
export function buildLaunchArgs(spec: ModelSpec, port: number): string[] {
  const args = ['--model-path', spec.modelPath, '--host', spec.host, '--port', String(port)];
  for (const [key, value] of spec.options) args.push(...optionArgs(key, value));
  return args;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Exit code as recorded in RuntimeState: signal deaths become negative signal numbers. */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return -(SIGNAL_NUMBERS.get(signal) ?? 1);
  return -1;
}

class ChildWorkerProcess implements WorkerProcess {
  private code: number | undefined;
  private readonly exited: Promise<void>;

  constructor(private readonly child: ChildProcess) {
    this.exited = new Promise<void>(resolve => {
      child.once('exit', (code, signal) => {
        this.code = exitCodeOf(code, signal);
        resolve();
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  exitCode(): number | undefined {
    return this.code;
  }

  signal(sig: NodeJS.Signals): void {
    if (this.code !== undefined) return;
    this.child.kill(sig);
  }

  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.code !== undefined) return true;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.exited.then(() => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export class ChildProcessLauncher implements ProcessLauncher {
  launch(req: LaunchRequest): Promise<WorkerProcess> {
    mkdirSync(dirname(req.logPath), { recursive: true });
    const fd = openSync(req.logPath, 'a');

    return new Promise<WorkerProcess>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(req.command, req.args, { stdio: ['ignore', fd, fd], env: req.env });
      } catch (err) {
        closeSync(fd);
        reject(err);
        return;
      }
      const handle = new ChildWorkerProcess(child);

      child.once('spawn', () => {
        closeSync(fd);
        resolve(handle);
      });
      child.once('error', (err) => {
        if (child.pid === undefined) {
          closeSync(fd);
          reject(err);
        }
      });
    });
  }
}
