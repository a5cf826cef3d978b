/**
 * Dispatcher middleware: hooks run around every handler.
 *
 * A before-hook returning a CommandResult aborts the command with that
 * result; an after-hook may return a replacement result.
 */

import type { Logger } from '../logger.js';
import type { CommandResult, OptionValue, RegisteredCommand, ResolvedInvocation } from './types.js';

export interface Execution {
  invocation: ResolvedInvocation;
  command: RegisteredCommand;
  options: Record<string, OptionValue>;
  /** `performance.now()` when the dispatcher began running hooks. */
  startedAt: number;
}

type MaybePromise<T> = T | Promise<T>;

export type BeforeMiddleware = (execution: Execution) => MaybePromise<CommandResult | void>;
export type AfterMiddleware = (execution: Execution, result: CommandResult) => MaybePromise<CommandResult | void>;

export interface Middleware {
  name?: string;
  before?: BeforeMiddleware;
  after?: AfterMiddleware;
}

function label(execution: Execution): string {
  const { plugin, group, command } = execution.invocation;
  return [plugin, ...group, command].join(' ');
}

export function loggingMiddleware(logger: Logger): Middleware {
  return {
    name: 'logging',
    before(execution) {
      logger.debug({ options: execution.options }, `Executing ${label(execution)}`);
    },
    after(execution, result) {
      if (result.success) {
        logger.debug(`Command ${label(execution)} completed`);
      } else {
        logger.warn({ kind: result.error?.kind }, `Command ${label(execution)} failed: ${result.message}`);
      }
    },
  };
}

/** Adds `durationMs` to the result data. */
export function timingMiddleware(): Middleware {
  return {
    name: 'timing',
    after(execution, result) {
      const durationMs = Math.round(performance.now() - execution.startedAt);
      return { ...result, data: { ...result.data, durationMs } };
    },
  };
}
