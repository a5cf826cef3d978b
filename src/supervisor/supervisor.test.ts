import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { spawn } from 'child_process';
import fs from 'fs';
import net from 'net';
import os from 'os';
import path from 'path';
import { pino } from 'pino';

import { CoreError } from '../errors.js';
import { PluginEventBus } from '../plugins/events.js';
import type { BusEvent } from '../plugins/types.js';
import { isGroupAlive, isProcessAlive, waitFor } from './probes.js';
import { StateStore } from './state-store.js';
import { ProcessSupervisor } from './supervisor.js';
import type { ServiceDefinition, SupervisorSettings } from './types.js';

const NODE = JSON.stringify(process.execPath);
const IDLE = `${NODE} -e "setInterval(() => {}, 1000)"`;
// `; true` keeps the shell around as group leader instead of exec'ing node
const WRAPPED_IDLE = `${IDLE}; true`;
const STUBBORN = `${NODE} -e "process.on('SIGTERM', () => {}); require('fs').writeFileSync('ready', ''); setInterval(() => {}, 1000)"; true`;

function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      server.close(() => resolve(port));
    });
  });
}

describe('ProcessSupervisor', () => {
  const logger = pino({ level: 'silent' });
  let tmpDir: string;
  let settings: SupervisorSettings;
  let bus: PluginEventBus;
  let events: BusEvent[];
  let supervisors: ProcessSupervisor[];

  function service(name: string, command: string, extra: Partial<ServiceDefinition> = {}): ServiceDefinition {
    return { name, command, workingDirectory: tmpDir, description: '', environment: {}, ...extra };
  }

  function createSupervisor(services: ServiceDefinition[], overrides: Partial<SupervisorSettings> = {}) {
    const supervisor = new ProcessSupervisor({ services, settings: { ...settings, ...overrides }, events: bus, logger });
    supervisors.push(supervisor);
    return supervisor;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'svcdeck-supervisor-'));
    settings = {
      stateDir: path.join(tmpDir, 'state'),
      logDir: path.join(tmpDir, 'logs'),
      host: '127.0.0.1',
      startupTimeoutMs: 5000,
      healthIntervalMs: 50,
      healthMaxIntervalMs: 200,
      stopGraceMs: 2000,
      killWaitMs: 1000,
    };
    bus = new PluginEventBus({ logger });
    events = [];
    bus.subscribe('*', (event) => {
      events.push(event);
    });
    supervisors = [];
  });

  afterEach(async () => {
    for (const supervisor of supervisors) {
      await supervisor.stopAll();
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('status()', () => {
    it('should report never-started services as stopped without a pid', () => {
      const supervisor = createSupervisor([service('dealer', IDLE, { port: 9001 }), service('lobby', IDLE)]);

      expect(supervisor.status()).toEqual([
        { name: 'dealer', status: 'stopped', port: 9001 },
        { name: 'lobby', status: 'stopped' },
      ]);
    });

    it('should reject unknown services', () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);

      expect(() => supervisor.status('ghost')).toThrow('Service "ghost" is not configured');
    });
  });

  describe('start() and stop()', () => {
    it('should start, report and stop a service', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);

      const started = await supervisor.start('dealer');
      expect(started.status).toBe('running');
      expect(started.pid).toBeGreaterThan(0);
      expect(started.startedAt).toBeDefined();
      expect(isProcessAlive(started.pid)).toBe(true);

      const running = supervisor.status('dealer');
      expect(running.status).toBe('running');
      expect(running.pid).toBe(started.pid);
      expect(running.uptimeMs).toBeGreaterThanOrEqual(0);

      const stopped = await supervisor.stop('dealer');
      expect(stopped.status).toBe('stopped');
      expect(stopped.pid).toBeUndefined();
      expect(stopped.startedAt).toBeUndefined();
      expect(isProcessAlive(started.pid)).toBe(false);

      expect(events.map((e) => e.name)).toEqual(['service.starting', 'service.started', 'service.stopped']);
      expect(events[1].payload).toEqual({ name: 'dealer', status: 'running', pid: started.pid });
    });

    it('should refuse a second start with AlreadyRunning', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);
      const { pid } = await supervisor.start('dealer');

      await expect(supervisor.start('dealer')).rejects.toMatchObject({ kind: 'AlreadyRunning' });
      expect(supervisor.status('dealer').pid).toBe(pid);
    });

    it('should treat stopping a stopped service as a no-op', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);

      const state = await supervisor.stop('dealer');
      expect(state).toEqual({ name: 'dealer', status: 'stopped' });
      expect(events).toEqual([]);
    });

    it('should reject unknown services', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);

      await expect(supervisor.start('ghost')).rejects.toMatchObject({ kind: 'UnknownService' });
      await expect(supervisor.stop('ghost')).rejects.toMatchObject({ kind: 'UnknownService' });
    });

    it('should pass environment variables and append output to the log file', async () => {
      const supervisor = createSupervisor([
        service('dealer', `echo "table=$TABLE_ID" && ${IDLE}`, { environment: { TABLE_ID: 'test-table' } }),
      ]);

      await supervisor.start('dealer');
      await waitFor(() => supervisor.logs('dealer', 10).length > 0, 2000);

      expect(supervisor.logs('dealer', 10)).toEqual(['table=test-table']);
    });

    it('should share state between supervisor instances', async () => {
      const first = createSupervisor([service('dealer', IDLE)]);
      const { pid } = await first.start('dealer');

      const second = createSupervisor([service('dealer', IDLE)]);
      expect(second.status('dealer')).toMatchObject({ status: 'running', pid });

      const stopped = await second.stop('dealer');
      expect(stopped.status).toBe('stopped');
      expect(first.status('dealer').status).toBe('stopped');
    });
  });

  describe('failures', () => {
    it('should report ProcessExitedEarly with the exit code', async () => {
      const supervisor = createSupervisor([service('dealer', 'exit 3')]);

      const err = await supervisor.start('dealer').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CoreError);
      expect(err).toMatchObject({
        kind: 'ProcessExitedEarly',
        message: 'Service "dealer" exited before becoming healthy (exit code 3)',
      });

      expect(supervisor.status('dealer')).toEqual({ name: 'dealer', status: 'failed', exitCode: 3 });
      expect(events.map((e) => e.name)).toEqual(['service.starting', 'service.failed']);
    });

    it('should allow starting again after a failure', async () => {
      const marker = path.join(tmpDir, 'attempted');
      // Fails on the first run, stays up on the second
      const supervisor = createSupervisor([
        service('dealer', `if [ -f attempted ]; then ${IDLE}; else touch attempted; exit 1; fi`),
      ]);

      await expect(supervisor.start('dealer')).rejects.toMatchObject({ kind: 'ProcessExitedEarly' });
      expect(fs.existsSync(marker)).toBe(true);

      const state = await supervisor.start('dealer');
      expect(state.status).toBe('running');
      expect(state.exitCode).toBeUndefined();
    });

    it('should mark an externally killed service as failed on the next status check', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);
      const { pid } = await supervisor.start('dealer');
      if (pid === undefined) throw new Error('expected a pid');

      process.kill(-pid, 'SIGKILL');
      expect(await waitFor(() => !isProcessAlive(pid), 2000)).toBe(true);

      const state = supervisor.status('dealer');
      expect(state.status).toBe('failed');
      expect(state.pid).toBeUndefined();

      const failed = events.find((e) => e.name === 'service.failed');
      expect(failed?.payload).toMatchObject({ name: 'dealer', status: 'failed', pid });
    });

    it('should fail with PortInUse before spawning anything', async () => {
      const port = await freePort();
      const blocker = net.createServer();
      await new Promise<void>((resolve) => blocker.listen(port, '127.0.0.1', resolve));

      try {
        const supervisor = createSupervisor([service('dealer', IDLE, { port })]);

        await expect(supervisor.start('dealer')).rejects.toMatchObject({ kind: 'PortInUse' });
        expect(supervisor.status('dealer').status).toBe('stopped');
        expect(fs.existsSync(supervisor.logPath('dealer'))).toBe(false);
        expect(events).toEqual([]);
      } finally {
        await new Promise<void>((resolve) => blocker.close(() => resolve()));
      }
    });

    it('should time out and kill a service that never becomes healthy', async () => {
      const port = await freePort();
      const supervisor = createSupervisor([service('dealer', IDLE, { port, healthCheck: '/health' })], {
        startupTimeoutMs: 400,
      });

      await expect(supervisor.start('dealer')).rejects.toMatchObject({
        kind: 'StartupTimeout',
        message: 'Service "dealer" did not become healthy within 400ms',
      });

      const starting = events.find((e) => e.name === 'service.starting');
      const pid = starting?.payload.pid;
      expect(typeof pid).toBe('number');
      expect(isProcessAlive(typeof pid === 'number' ? pid : undefined)).toBe(false);
      expect(supervisor.status('dealer').status).toBe('failed');
    });
  });

  describe('process groups', () => {
    it('should escalate to SIGKILL when the service ignores SIGTERM', async () => {
      const supervisor = createSupervisor([service('dealer', STUBBORN)], { stopGraceMs: 300 });
      const { pid } = await supervisor.start('dealer');
      if (pid === undefined) throw new Error('expected a pid');
      expect(await waitFor(() => fs.existsSync(path.join(tmpDir, 'ready')), 5000)).toBe(true);

      const began = Date.now();
      const state = await supervisor.stop('dealer');

      expect(Date.now() - began).toBeGreaterThanOrEqual(300);
      expect(state.status).toBe('stopped');
      expect(isGroupAlive(pid)).toBe(false);
    });

    it('should keep reporting running while the group outlives its shell', async () => {
      const supervisor = createSupervisor([service('dealer', WRAPPED_IDLE)]);
      const { pid } = await supervisor.start('dealer');
      if (pid === undefined) throw new Error('expected a pid');

      process.kill(pid, 'SIGKILL');
      expect(await waitFor(() => !isProcessAlive(pid), 2000)).toBe(true);

      expect(supervisor.status('dealer')).toMatchObject({ status: 'running', pid });

      expect((await supervisor.stop('dealer')).status).toBe('stopped');
      expect(isGroupAlive(pid)).toBe(false);
    });

    it('should let only one of two racing starts keep its process', async () => {
      const pidFile = path.join(tmpDir, 'pids');
      const command = `${NODE} -e "require('fs').appendFileSync('pids', process.pid + '\\n'); setInterval(() => {}, 1000)"`;
      const first = createSupervisor([service('dealer', command)]);
      const second = createSupervisor([service('dealer', command)]);

      const results = await Promise.allSettled([first.start('dealer'), second.start('dealer')]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const errors = results.flatMap((r): unknown[] => (r.status === 'rejected' ? [r.reason] : []));
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(CoreError);
      expect(errors[0]).toMatchObject({ kind: 'AlreadyRunning' });

      const readPids = () =>
        fs.existsSync(pidFile) ? fs.readFileSync(pidFile, 'utf-8').split('\n').filter(Boolean).map(Number) : [];
      expect(await waitFor(() => readPids().some((pid) => isProcessAlive(pid)), 5000)).toBe(true);
      expect(readPids().filter((pid) => isProcessAlive(pid))).toHaveLength(1);
      expect(first.status('dealer').status).toBe('running');
    });

    it('should keep the pid of a service that survives the startup-timeout kill', async () => {
      const port = await freePort();
      const supervisor = createSupervisor([service('dealer', IDLE, { port, healthCheck: '/health' })], {
        startupTimeoutMs: 300,
        stopGraceMs: 100,
        killWaitMs: 100,
      });
      const realKill = process.kill.bind(process);
      // signals are swallowed; liveness checks (signal 0) still reach the OS
      const kill = vi
        .spyOn(process, 'kill')
        .mockImplementation((pid, signal) => (signal === 'SIGTERM' || signal === 'SIGKILL' ? true : realKill(pid, signal)));

      try {
        await expect(supervisor.start('dealer')).rejects.toMatchObject({ kind: 'StopFailed' });
        const state = supervisor.status('dealer');
        expect(state.status).toBe('starting');
        expect(isProcessAlive(state.pid)).toBe(true);
      } finally {
        kill.mockRestore();
      }

      expect((await supervisor.stop('dealer')).status).toBe('stopped');
    });

    it.runIf(fs.existsSync('/proc/self/stat'))('should not mistake a recycled pid for the service', async () => {
      const stranger = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { detached: true, stdio: 'ignore' });
      const pid = stranger.pid;
      if (pid === undefined) throw new Error('expected a pid');

      try {
        new StateStore(settings.stateDir, { logger }).write({
          name: 'dealer',
          status: 'running',
          pid,
          startedAt: new Date().toISOString(),
          startTime: '1',
        });
        const supervisor = createSupervisor([service('dealer', IDLE)]);

        expect(supervisor.status('dealer')).toEqual({ name: 'dealer', status: 'failed' });
        await supervisor.stop('dealer');
        expect(isProcessAlive(pid)).toBe(true);
      } finally {
        stranger.kill('SIGKILL');
      }
    });
  });

  describe('health checks', () => {
    it('should wait for the HTTP health endpoint to answer', async () => {
      const port = await freePort();
      const server = `${NODE} -e "require('http').createServer((req, res) => res.end('ok')).listen(${port}, '127.0.0.1')"`;
      const supervisor = createSupervisor([service('dealer', server, { port, healthCheck: '/health' })]);

      const state = await supervisor.start('dealer');

      expect(state).toMatchObject({ name: 'dealer', status: 'running', port });
      const res = await fetch(`http://127.0.0.1:${port}/health`);
      expect(await res.text()).toBe('ok');
    });
  });

  describe('restart()', () => {
    it('should replace the running process', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);
      const first = await supervisor.start('dealer');

      const second = await supervisor.restart('dealer');

      expect(second.status).toBe('running');
      expect(second.pid).not.toBe(first.pid);
      expect(isProcessAlive(first.pid)).toBe(false);
    });

    it('should start a stopped service', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);

      const state = await supervisor.restart('dealer');
      expect(state.status).toBe('running');
    });

    it('should not start when the stop fails', async () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);
      vi.spyOn(supervisor, 'stop').mockRejectedValue(
        new CoreError('StopFailed', 'Service "dealer" (PID 1) survived SIGKILL'),
      );
      const start = vi.spyOn(supervisor, 'start');

      await expect(supervisor.restart('dealer')).rejects.toMatchObject({ kind: 'StopFailed' });
      expect(start).not.toHaveBeenCalled();
    });
  });

  describe('bulk operations', () => {
    it('should start in config order and stop in reverse order', async () => {
      const supervisor = createSupervisor([service('auth', IDLE), service('lobby', IDLE), service('dealer', IDLE)]);

      const started = await supervisor.startAll();
      expect(started.map((o) => [o.name, o.success])).toEqual([
        ['auth', true],
        ['lobby', true],
        ['dealer', true],
      ]);

      const stopped = await supervisor.stopAll();
      expect(stopped.map((o) => o.name)).toEqual(['dealer', 'lobby', 'auth']);
      expect(stopped.every((o) => o.state?.status === 'stopped')).toBe(true);
    });

    it('should keep going when one service fails', async () => {
      const supervisor = createSupervisor([service('auth', 'exit 1'), service('lobby', IDLE)]);

      const outcomes = await supervisor.startAll();

      expect(outcomes[0]).toMatchObject({ name: 'auth', success: false, error: { kind: 'ProcessExitedEarly' } });
      expect(outcomes[1]).toMatchObject({ name: 'lobby', success: true, state: { status: 'running' } });
    });

    it('should count already-running services as started', async () => {
      const supervisor = createSupervisor([service('auth', IDLE)]);
      const { pid } = await supervisor.start('auth');

      const outcomes = await supervisor.startAll();
      expect(outcomes).toEqual([{ name: 'auth', success: true, state: expect.objectContaining({ pid }) }]);
    });

    it('should restart every service', async () => {
      const supervisor = createSupervisor([service('auth', IDLE), service('lobby', IDLE)]);
      const before = await supervisor.startAll();

      const after = await supervisor.restartAll();

      expect(after.map((o) => o.name)).toEqual(['auth', 'lobby']);
      expect(after[0].state?.pid).not.toBe(before[0].state?.pid);
      expect(after.every((o) => o.success)).toBe(true);
    });
  });

  describe('logs()', () => {
    it('should return the last lines of the service log', async () => {
      const supervisor = createSupervisor([service('dealer', `echo one && echo two && echo three && ${IDLE}`)]);
      await supervisor.start('dealer');
      await waitFor(() => supervisor.logs('dealer', 10).length >= 3, 2000);

      expect(supervisor.logs('dealer', 2)).toEqual(['two', 'three']);
    });

    it('should return nothing for a service that never ran', () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);
      expect(supervisor.logs('dealer', 10)).toEqual([]);
    });

    it('should reject unknown services', () => {
      const supervisor = createSupervisor([service('dealer', IDLE)]);
      expect(() => supervisor.logs('ghost', 10)).toThrow(CoreError);
    });
  });
});
