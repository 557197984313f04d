import { beforeEach, describe, expect, it, vi } from 'vitest';
import { isHubError } from './errors';
import { freshRuntime } from './registry';
import type { ReadinessCheck } from './readiness';
import { ProcessSupervisor } from './supervisor';
import { FakeClock, FakeLauncher, gatedReadiness, instantReadiness } from './test-helpers';
import type { ModelSpec, RuntimeState } from './types';

const spec: ModelSpec = {
  name:       'alpha',
  modelPath:  '/models/alpha',
  host:       '127.0.0.1',
  port:       null,
  jitEnabled: false,
  group:      null,
  options:    [['context_length', 4096]],
};

describe('ProcessSupervisor', () => {
  let launcher: FakeLauncher;
  let clock: FakeClock;
  let runtime: RuntimeState;

  function supervisor(readiness: ReadinessCheck = instantReadiness, stopTimeoutMs = 50): ProcessSupervisor {
    return new ProcessSupervisor({
      launcher,
      readiness,
      workerCommand: ['mlx-openai-server', 'launch'],
      workerEnv:     { HF_HOME: '/cache/hf' },
      stopTimeoutMs,
      clock:         clock.fn,
    });
  }

  beforeEach(() => {
    launcher = new FakeLauncher();
    clock = new FakeClock(1_000);
    runtime = freshRuntime(5005, '/logs/alpha.supervisor.log');
  });

  describe('start', () => {
    it('launches the worker command and reaches Running', async () => {
      await supervisor().start(spec, runtime);

      expect(runtime.status).toBe('Running');
      expect(runtime.startedAt).toBe(1_000);
      expect(runtime.lastActivityAt).toBe(1_000);
      expect(runtime.process?.pid).toBe(1000);

      const [req] = launcher.requests;
      expect(req?.command).toBe('mlx-openai-server');
      expect(req?.args).toEqual([
        'launch', '--model-path', '/models/alpha', '--host', '127.0.0.1', '--port', '5005',
        '--context-length', '4096',
      ]);
      expect(req?.env['PYTHONUNBUFFERED']).toBe('1');
      expect(req?.env['HF_HOME']).toBe('/cache/hf');
      expect(req?.logPath).toBe('/logs/alpha.supervisor.log');
    });

    it('refuses a worker that is already running', async () => {
      const sup = supervisor();
      await sup.start(spec, runtime);
      const err = await sup.start(spec, runtime).catch((e: unknown) => e);
      expect(isHubError(err, 'AlreadyRunning')).toBe(true);
      expect(launcher.requests).toHaveLength(1);
    });

    it('marks a spawn failure as Crashed', async () => {
      launcher.failing.add('alpha');
      const err = await supervisor().start(spec, runtime).catch((e: unknown) => e);

      expect(isHubError(err, 'SpawnFailed')).toBe(true);
      expect(runtime.status).toBe('Crashed');
      expect(runtime.process).toBeNull();
      expect(runtime.lastError).toBe('Spawn failed: Error: ENOENT: mlx-openai-server');
    });

    it('marks a worker that exits during readiness as Crashed', async () => {
      const dies: ReadinessCheck = async (ctx) => {
        launcher.proc('alpha').exit(3);
        return !ctx.cancelled() && ctx.process.exitCode() === undefined;
      };
      const err = await supervisor(dies).start(spec, runtime).catch((e: unknown) => e);

      expect(isHubError(err, 'SpawnFailed')).toBe(true);
      expect(runtime.status).toBe('Crashed');
      expect(runtime.lastExitCode).toBe(3);
      expect(runtime.lastError).toBe('Process exited with code 3 during startup');
      expect(launcher.proc('alpha').signals).toEqual([]);
    });

    it('terminates a worker that never becomes ready', async () => {
      const never: ReadinessCheck = async () => false;
      const err = await supervisor(never).start(spec, runtime).catch((e: unknown) => e);

      expect(isHubError(err, 'SpawnFailed')).toBe(true);
      expect(runtime.status).toBe('Crashed');
      expect(runtime.lastExitCode).toBe(-15);
      expect(runtime.lastError).toBe("Readiness check failed for 'alpha'");
      expect(launcher.proc('alpha').signals).toEqual(['SIGTERM']);
    });

    it('stops instead of reaching Running when a stop arrives mid-start', async () => {
      const gate = gatedReadiness();
      const starting = supervisor(gate.check).start(spec, runtime);
      await gate.entered;
      expect(runtime.status).toBe('Starting');

      runtime.stopRequested = 'Stopping';
      gate.release();
      await starting;

      expect(runtime.status).toBe('Stopped');
      expect(runtime.stopRequested).toBeNull();
      expect(launcher.proc('alpha').signals).toEqual(['SIGTERM']);
    });

    it('passes through Unloading when an unload arrives mid-start', async () => {
      const gate = gatedReadiness();
      launcher.ignoreTerm = true;
      const starting = supervisor(gate.check, 5_000).start(spec, runtime);
      await gate.entered;

      runtime.stopRequested = 'Unloading';
      gate.release();
      await vi.waitFor(() => expect(launcher.proc('alpha').signals).toEqual(['SIGTERM']));
      expect(runtime.status).toBe('Unloading');

      launcher.proc('alpha').exit(0);
      await starting;

      expect(runtime.status).toBe('Stopped');
      expect(runtime.lastExitCode).toBe(0);
      expect(runtime.stopRequested).toBeNull();
    });
  });

  describe('stop', () => {
    it('terminates gracefully and records the exit code', async () => {
      const sup = supervisor();
      await sup.start(spec, runtime);
      await sup.stop(runtime);

      expect(runtime.status).toBe('Stopped');
      expect(runtime.process).toBeNull();
      expect(runtime.lastExitCode).toBe(-15);
      expect(runtime.startedAt).toBeNull();
    });

    it('escalates to SIGKILL when SIGTERM is ignored', async () => {
      launcher.ignoreTerm = true;
      const sup = supervisor();
      await sup.start(spec, runtime);
      const proc = launcher.proc('alpha');

      await sup.stop(runtime, 20);

      expect(proc.signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(runtime.status).toBe('Stopped');
      expect(runtime.lastExitCode).toBe(-9);
    });

    it('shows the Unloading state while an unload is in progress', async () => {
      launcher.ignoreTerm = true;
      const sup = supervisor();
      await sup.start(spec, runtime);

      const stopping = sup.stop(runtime, 20, 'Unloading');
      expect(runtime.status).toBe('Unloading');
      await stopping;
      expect(runtime.status).toBe('Stopped');
    });

    it('settles a worker with no process as Stopped', async () => {
      runtime.status = 'Crashed';
      await supervisor().stop(runtime);
      expect(runtime.status).toBe('Stopped');
    });
  });

  describe('poll', () => {
    it('detects an unsolicited exit', async () => {
      const sup = supervisor();
      await sup.start(spec, runtime);
      launcher.proc('alpha').exit(1);

      expect(sup.poll('alpha', runtime)).toBe('Crashed');
      expect(runtime.lastExitCode).toBe(1);
      expect(runtime.lastError).toBe('Process exited with code 1');
      expect(runtime.process).toBeNull();
    });

    it('treats a clean unsolicited exit as a crash too', async () => {
      const sup = supervisor();
      await sup.start(spec, runtime);
      launcher.proc('alpha').exit(0);
      expect(sup.poll('alpha', runtime)).toBe('Crashed');
    });

    it('leaves a live worker alone', async () => {
      const sup = supervisor();
      await sup.start(spec, runtime);
      expect(sup.poll('alpha', runtime)).toBe('Running');
    });
  });
});
