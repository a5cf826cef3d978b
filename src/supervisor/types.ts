/**
 * Supervisor data model: static service definitions and their runtime state.
 */

import type { ErrorKind } from '../errors.js';

export interface ServiceDefinition {
  name: string;
  /** Shell command line, run through `/bin/sh -c`. */
  command: string;
  workingDirectory: string;
  port?: number;
  /** HTTP path probed on `port` until it answers 2xx. */
  healthCheck?: string;
  description: string;
  environment: Record<string, string>;
}

export interface SupervisorSettings {
  stateDir: string;
  logDir: string;
  /** Interface health probes and port checks connect to. */
  host: string;
  startupTimeoutMs: number;
  healthIntervalMs: number;
  healthMaxIntervalMs: number;
  stopGraceMs: number;
  killWaitMs: number;
}

export type ServiceStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'failed';

export const LIVE_STATUSES: readonly ServiceStatus[] = ['starting', 'running', 'stopping'];

export function isLive(status: ServiceStatus): boolean {
  return LIVE_STATUSES.includes(status);
}

/** Allowed lifecycle edges; anything else is a bug in the supervisor. */
export const TRANSITIONS: Readonly<Record<ServiceStatus, readonly ServiceStatus[]>> = {
  stopped: ['starting'],
  failed: ['starting'],
  starting: ['running', 'failed', 'stopping'],
  running: ['stopping', 'failed'],
  stopping: ['stopped'],
};

export function canTransition(from: ServiceStatus, to: ServiceStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface ServiceRuntimeState {
  name: string;
  status: ServiceStatus;
  pid?: number;
  port?: number;
  /** ISO timestamp; present while running. */
  startedAt?: string;
  uptimeMs?: number;
  exitCode?: number;
  signal?: string;
}

/** Outcome of one service inside a bulk operation. */
export interface BulkOutcome {
  name: string;
  success: boolean;
  state?: ServiceRuntimeState;
  error?: { kind: ErrorKind; message: string };
}
