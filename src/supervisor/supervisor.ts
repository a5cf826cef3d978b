/**
 * Process Supervisor
 * Starts, stops and health-checks the configured services. Runtime state
 * lives in the StateStore and is re-read (and re-validated against the OS)
 * before every action, so separate CLI invocations agree on it.
 */

import { spawn, type ChildProcess } from 'child_process';
import { once } from 'events';
import fs from 'fs';
import path from 'path';

import { CoreError, messages } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { EventBus } from '../plugins/types.js';
import {
  isGroupAlive,
  isPortFree,
  isProcessAlive,
  probeHttp,
  processStartTime,
  signalGroup,
  sleep,
  tailLines,
  waitFor,
} from './probes.js';
import { StateStore, type StateRecord } from './state-store.js';
import {
  canTransition,
  isLive,
  type BulkOutcome,
  type ServiceDefinition,
  type ServiceRuntimeState,
  type ServiceStatus,
  type SupervisorSettings,
} from './types.js';

export interface SupervisorOptions {
  services: ServiceDefinition[];
  settings: SupervisorSettings;
  events: EventBus;
  logger?: Logger;
}

/** Exit information for a process spawned by this supervisor instance. */
interface TrackedChild {
  child: ChildProcess;
  exited: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
}

type HealthOutcome = 'healthy' | 'exited' | 'timeout';

const PROBE_TIMEOUT_MS = 2000;

export class ProcessSupervisor {
  private definitions = new Map<string, ServiceDefinition>();
  private children = new Map<string, TrackedChild>();
  private settings: SupervisorSettings;
  private events: EventBus;
  private logger: Logger;
  private store: StateStore;

  constructor(options: SupervisorOptions) {
    for (const def of options.services) {
      this.definitions.set(def.name, def);
    }
    this.settings = options.settings;
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger;
    this.store = new StateStore(options.settings.stateDir, { logger: this.logger });
  }

  services(): ServiceDefinition[] {
    return [...this.definitions.values()];
  }

  logPath(name: string): string {
    return path.join(this.settings.logDir, `${name}.log`);
  }

  // --- Queries ---

  status(name: string): ServiceRuntimeState;
  status(): ServiceRuntimeState[];
  status(name?: string): ServiceRuntimeState | ServiceRuntimeState[] {
    if (name !== undefined) {
      return this.refresh(this.definition(name));
    }
    return this.services().map((def) => this.refresh(def));
  }

  logs(name: string, lines: number): string[] {
    this.definition(name);
    return tailLines(this.logPath(name), lines);
  }

  // --- Lifecycle ---

  async start(name: string): Promise<ServiceRuntimeState> {
    const def = this.definition(name);
    const current = this.refresh(def);
    if (isLive(current.status)) {
      throw new CoreError('AlreadyRunning', messages.alreadyRunning(name, current.pid ?? 0), { pid: current.pid });
    }

    if (def.port !== undefined && !(await isPortFree(def.port, this.settings.host))) {
      throw new CoreError('PortInUse', messages.portInUse(name, def.port), { port: def.port });
    }

    const tracked = await this.spawnService(def);
    const pid = tracked.child.pid ?? 0;
    // Another start may have won the race since the status check; the
    // check and the claiming write below must not be split by an await
    const winner = this.refresh(def);
    if (isLive(winner.status)) await this.discard(def, pid, winner);
    this.children.set(name, tracked);
    this.transition(def, 'starting', { pid, startedAt: new Date().toISOString(), startTime: processStartTime(pid) });
    this.publish('service.starting', def, { pid });
    this.logger.info({ service: name, pid }, 'Service starting');

    const outcome = await this.waitHealthy(def, tracked);

    if (outcome === 'healthy') {
      const record = this.transition(def, 'running');
      this.publish('service.started', def, { pid });
      this.logger.info({ service: name, pid }, 'Service started');
      return this.snapshot(def, record);
    }

    if (outcome === 'exited') {
      // the exit event can trail the liveness probe by a tick
      await waitFor(() => tracked.exited, 1000, 10);
      const message = messages.processExitedEarly(name, tracked.code);
      // the shell is gone, but processes it started may remain in the group
      if (isGroupAlive(pid)) await this.abandonStart(def, pid, tracked, message);
      const exitCode = tracked.code ?? undefined;
      this.transition(def, 'failed', { exitCode, signal: tracked.signal ?? undefined });
      this.children.delete(name);
      this.publish('service.failed', def, { exitCode, reason: message });
      this.logger.error({ service: name, exitCode }, message);
      throw new CoreError('ProcessExitedEarly', message, { exitCode: tracked.code });
    }

    const message = messages.startupTimeout(name, this.settings.startupTimeoutMs);
    await this.abandonStart(def, pid, tracked, message);
    this.transition(def, 'failed', { signal: tracked.signal ?? undefined });
    this.children.delete(name);
    this.publish('service.failed', def, { reason: message });
    this.logger.error({ service: name, pid }, message);
    throw new CoreError('StartupTimeout', message);
  }

  async stop(name: string): Promise<ServiceRuntimeState> {
    const def = this.definition(name);
    const current = this.refresh(def);
    if (!isLive(current.status) || current.pid === undefined) {
      return current;
    }

    const pid = current.pid;
    if (current.status !== 'stopping') {
      this.transition(def, 'stopping');
    }
    this.logger.info({ service: name, pid }, 'Stopping service');

    const tracked = this.children.get(name);
    if (!(await this.terminate(def, pid))) {
      throw new CoreError('StopFailed', messages.stopFailed(name, pid), { pid });
    }

    const record = this.transition(def, 'stopped', {
      exitCode: tracked?.exited ? (tracked.code ?? undefined) : undefined,
      signal: tracked?.exited ? (tracked.signal ?? undefined) : undefined,
    });
    this.children.delete(name);
    this.publish('service.stopped', def, { pid, exitCode: record.exitCode });
    this.logger.info({ service: name, pid }, 'Service stopped');
    return this.snapshot(def, record);
  }

  /** Stop then start; a failed stop means no start is attempted. */
  async restart(name: string): Promise<ServiceRuntimeState> {
    await this.stop(name);
    return this.start(name);
  }

  /** Start every service in config order. Already-running services count as successes. */
  async startAll(): Promise<BulkOutcome[]> {
    const outcomes: BulkOutcome[] = [];
    for (const def of this.services()) {
      try {
        outcomes.push({ name: def.name, success: true, state: await this.start(def.name) });
      } catch (err) {
        if (err instanceof CoreError && err.kind === 'AlreadyRunning') {
          outcomes.push({ name: def.name, success: true, state: this.refresh(def) });
        } else {
          outcomes.push(this.failedOutcome(def.name, err));
        }
      }
    }
    return outcomes;
  }

  /** Stop every service in reverse config order. */
  async stopAll(): Promise<BulkOutcome[]> {
    const outcomes: BulkOutcome[] = [];
    for (const def of this.services().reverse()) {
      try {
        outcomes.push({ name: def.name, success: true, state: await this.stop(def.name) });
      } catch (err) {
        outcomes.push(this.failedOutcome(def.name, err));
      }
    }
    return outcomes;
  }

  /** Stop everything, then start everything; services that failed to stop are not started. */
  async restartAll(): Promise<BulkOutcome[]> {
    const stopped = await this.stopAll();
    const stopFailures = new Map(stopped.filter((o) => !o.success).map((o): [string, BulkOutcome] => [o.name, o]));

    const outcomes: BulkOutcome[] = [];
    for (const def of this.services()) {
      const stopFailure = stopFailures.get(def.name);
      if (stopFailure) {
        outcomes.push(stopFailure);
        continue;
      }
      try {
        outcomes.push({ name: def.name, success: true, state: await this.start(def.name) });
      } catch (err) {
        outcomes.push(this.failedOutcome(def.name, err));
      }
    }
    return outcomes;
  }

  // --- Internals ---

  private definition(name: string): ServiceDefinition {
    const def = this.definitions.get(name);
    if (!def) {
      throw new CoreError('UnknownService', messages.unknownService(name), { service: name });
    }
    return def;
  }

  /** Kill the process of a start that lost the race to `winner`. */
  private async discard(def: ServiceDefinition, pid: number, winner: ServiceRuntimeState): Promise<never> {
    this.logger.warn({ service: def.name, pid, winner: winner.pid }, 'Concurrent start detected, discarding own process');
    if (!(await this.terminate(def, pid))) {
      this.logger.error({ service: def.name, pid }, `Discarded process ${pid} survived SIGKILL`);
    }
    throw new CoreError('AlreadyRunning', messages.alreadyRunning(def.name, winner.pid ?? 0), { pid: winner.pid });
  }

  /**
   * Kill a service whose start failed. When the group survives, the
   * record keeps its pid so a later stop can still reach it.
   */
  private async abandonStart(def: ServiceDefinition, pid: number, tracked: TrackedChild, reason: string): Promise<void> {
    if (await this.terminate(def, pid)) return;

    this.logger.error({ service: def.name, pid }, `${reason}; process group survived SIGKILL`);
    throw new CoreError('StopFailed', messages.stopFailed(def.name, pid), { pid, reason, exitCode: tracked.code });
  }

  /** A record's process is running if its group is alive and the pid was not recycled. */
  private isRunning(record: StateRecord): boolean {
    const { pid, startTime } = record;
    if (pid === undefined || !isGroupAlive(pid)) return false;
    if (startTime === undefined) return true;
    const current = processStartTime(pid);
    // the leader may be gone while the rest of its group lives on
    return current === undefined || current === startTime;
  }

  /**
   * Read the stored record and reconcile it with the OS: a live status
   * whose process is gone becomes `stopped` (if it was stopping) or
   * `failed`.
   */
  private refresh(def: ServiceDefinition): ServiceRuntimeState {
    const record = this.store.read(def.name);
    if (!record) {
      return { name: def.name, status: 'stopped', port: def.port };
    }

    if (!isLive(record.status) || this.isRunning(record)) {
      return this.snapshot(def, record);
    }

    const tracked = this.children.get(def.name);
    const exit = {
      exitCode: tracked?.exited ? (tracked.code ?? undefined) : undefined,
      signal: tracked?.exited ? (tracked.signal ?? undefined) : undefined,
    };
    this.children.delete(def.name);

    if (record.status === 'stopping') {
      const updated = this.transition(def, 'stopped', exit, record);
      this.publish('service.stopped', def, { pid: record.pid, exitCode: exit.exitCode });
      return this.snapshot(def, updated);
    }

    const reason = `process ${record.pid ?? 'unknown'} is no longer running`;
    const updated = this.transition(def, 'failed', exit, record);
    this.publish('service.failed', def, { pid: record.pid, exitCode: exit.exitCode, reason });
    this.logger.warn({ service: def.name, pid: record.pid }, `Service "${def.name}" died: ${reason}`);
    return this.snapshot(def, updated);
  }

  /** Persist a lifecycle move. Leaving the live states clears pid and start time. */
  private transition(
    def: ServiceDefinition,
    to: ServiceStatus,
    patch: Partial<Pick<StateRecord, 'pid' | 'startedAt' | 'startTime' | 'exitCode' | 'signal'>> = {},
    previous: StateRecord | undefined = this.store.read(def.name),
  ): StateRecord {
    const from = previous?.status ?? 'stopped';
    if (!canTransition(from, to)) {
      throw new Error(`Illegal state transition for "${def.name}": ${from} -> ${to}`);
    }

    const live = isLive(to);
    return this.store.write({
      name: def.name,
      status: to,
      pid: live ? (patch.pid ?? previous?.pid) : undefined,
      startedAt: live ? (patch.startedAt ?? previous?.startedAt) : undefined,
      startTime: live ? (patch.startTime ?? previous?.startTime) : undefined,
      exitCode: live ? undefined : patch.exitCode,
      signal: live ? undefined : patch.signal,
    });
  }

  private snapshot(def: ServiceDefinition, record: StateRecord): ServiceRuntimeState {
    const state: ServiceRuntimeState = { name: def.name, status: record.status, port: def.port };
    if (isLive(record.status)) {
      state.pid = record.pid;
    }
    if (record.status === 'running' && record.startedAt) {
      state.startedAt = record.startedAt;
      state.uptimeMs = Math.max(0, Date.now() - Date.parse(record.startedAt));
    }
    if (record.exitCode !== undefined) state.exitCode = record.exitCode;
    if (record.signal !== undefined) state.signal = record.signal;
    return state;
  }

  private async spawnService(def: ServiceDefinition): Promise<TrackedChild> {
    fs.mkdirSync(this.settings.logDir, { recursive: true });
    const logFd = fs.openSync(this.logPath(def.name), 'a');

    let child: ChildProcess;
    try {
      child = spawn('/bin/sh', ['-c', def.command], {
        cwd: def.workingDirectory,
        env: { ...process.env, ...def.environment },
        detached: true,
        stdio: ['ignore', logFd, logFd],
      });
    } finally {
      fs.closeSync(logFd);
    }

    if (child.pid === undefined) {
      const [err]: unknown[] = await once(child, 'error');
      const reason = err instanceof Error ? err.message : String(err);
      throw new CoreError('ProcessExitedEarly', messages.spawnFailed(def.name, reason));
    }

    const tracked: TrackedChild = { child, exited: false, code: null, signal: null };
    child.on('error', (err) => {
      this.logger.error({ err, service: def.name }, 'Service process error');
    });
    child.on('exit', (code, signal) => {
      tracked.exited = true;
      tracked.code = code;
      tracked.signal = signal;
      this.logger.debug({ service: def.name, code, signal }, 'Service process exited');
    });
    // The CLI must be free to exit while the service keeps running
    child.unref();
    return tracked;
  }

  /** Poll with exponential backoff until healthy, dead, or out of time. */
  private async waitHealthy(def: ServiceDefinition, tracked: TrackedChild): Promise<HealthOutcome> {
    const pid = tracked.child.pid ?? 0;
    const deadline = Date.now() + this.settings.startupTimeoutMs;
    let delay = this.settings.healthIntervalMs;

    for (;;) {
      await sleep(Math.min(delay, Math.max(0, deadline - Date.now())));
      if (tracked.exited || !isProcessAlive(pid)) return 'exited';
      if (await this.probe(def)) return 'healthy';
      if (Date.now() >= deadline) return 'timeout';
      delay = Math.min(delay * 2, this.settings.healthMaxIntervalMs);
    }
  }

  private probe(def: ServiceDefinition): Promise<boolean> {
    if (def.healthCheck === undefined || def.port === undefined) {
      return Promise.resolve(true);
    }
    const url = `http://${this.settings.host}:${def.port}${def.healthCheck}`;
    return probeHttp(url, Math.min(PROBE_TIMEOUT_MS, this.settings.startupTimeoutMs));
  }

  /** SIGTERM the process group, escalate to SIGKILL. False if any member survives both. */
  private async terminate(def: ServiceDefinition, pid: number): Promise<boolean> {
    const alive = () => isGroupAlive(pid);

    if (!signalGroup(pid, 'SIGTERM')) return true;
    if (await waitFor(() => !alive(), this.settings.stopGraceMs)) return true;

    this.logger.warn({ service: def.name, pid }, 'Service ignored SIGTERM, sending SIGKILL');
    if (!signalGroup(pid, 'SIGKILL')) return true;
    return waitFor(() => !alive(), this.settings.killWaitMs);
  }

  private publish(
    event: string,
    def: ServiceDefinition,
    extra: { pid?: number; exitCode?: number; reason?: string },
  ): void {
    const record = this.store.read(def.name);
    this.events.publish(event, { name: def.name, status: record?.status ?? 'stopped', ...extra });
  }

  private failedOutcome(name: string, err: unknown): BulkOutcome {
    if (err instanceof CoreError) {
      return { name, success: false, error: { kind: err.kind, message: err.message } };
    }
    const message = messages.executionError(err instanceof Error ? err.message : String(err));
    return { name, success: false, error: { kind: 'ExecutionError', message } };
  }
}
