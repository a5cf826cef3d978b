/**
 * Command Dispatcher
 * Resolves an invocation, validates its options, runs middleware and the
 * handler, and always answers with exactly one CommandResult.
 */

import { logger as defaultLogger, type Logger } from '../logger.js';
import { createCommandContext } from './context.js';
import type { AfterMiddleware, BeforeMiddleware, Execution, Middleware } from './middleware.js';
import { resolveOptions } from './options.js';
import type { PluginRegistry, ResolvedCommand } from './registry.js';
import { fromError, normalizeResult } from './result.js';
import type { CommandResult, EventBus, Invocation, ResolvedInvocation } from './types.js';

export interface DispatcherOptions {
  registry: PluginRegistry;
  events: EventBus;
  logger?: Logger;
}

interface Hook<T> {
  name: string;
  fn: T;
}

export class CommandDispatcher {
  private registry: PluginRegistry;
  private events: EventBus;
  private logger: Logger;
  private beforeHooks: Hook<BeforeMiddleware>[] = [];
  private afterHooks: Hook<AfterMiddleware>[] = [];

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger;
  }

  useBefore(fn: BeforeMiddleware, name = fn.name || 'anonymous'): this {
    this.beforeHooks.push({ name, fn });
    return this;
  }

  useAfter(fn: AfterMiddleware, name = fn.name || 'anonymous'): this {
    this.afterHooks.push({ name, fn });
    return this;
  }

  use(middleware: Middleware): this {
    const name = middleware.name ?? 'anonymous';
    if (middleware.before) this.useBefore(middleware.before, name);
    if (middleware.after) this.useAfter(middleware.after, name);
    return this;
  }

  async execute(invocation: Invocation): Promise<CommandResult> {
    const group = invocation.group ?? [];

    let resolved: ResolvedCommand;
    let execution: Execution;
    try {
      resolved = this.registry.lookup(invocation.plugin, group, invocation.command);
      execution = {
        invocation: { plugin: resolved.plugin.metadata.name, group, command: invocation.command },
        command: resolved.command,
        options: resolveOptions(
          invocation.command,
          resolved.command.definition.options ?? [],
          invocation.options ?? {},
        ),
        startedAt: performance.now(),
      };
    } catch (err) {
      return this.complete({ plugin: invocation.plugin ?? '', group, command: invocation.command }, fromError(err));
    }

    const aborted = await this.runBefore(execution);
    if (aborted) return this.complete(execution.invocation, aborted);

    let result: CommandResult;
    try {
      const ctx = createCommandContext(resolved.plugin, execution.invocation, {
        logger: this.logger,
        events: this.events,
      });
      result = normalizeResult(await resolved.command.definition.handler(execution.options, ctx));
    } catch (err) {
      this.logger.debug({ err }, 'Command handler threw');
      result = fromError(err);
    }

    result = await this.runAfter(execution, result);
    return this.complete(execution.invocation, result);
  }

  private async runBefore(execution: Execution): Promise<CommandResult | undefined> {
    for (const hook of this.beforeHooks) {
      try {
        const outcome = await hook.fn(execution);
        if (outcome) {
          this.logger.debug({ middleware: hook.name }, 'Command aborted by middleware');
          return normalizeResult(outcome);
        }
      } catch (err) {
        this.logger.error({ err, middleware: hook.name }, 'Before-middleware failed');
      }
    }
    return undefined;
  }

  private async runAfter(execution: Execution, initial: CommandResult): Promise<CommandResult> {
    let result = initial;
    for (const hook of this.afterHooks) {
      try {
        const replacement = await hook.fn(execution, result);
        if (replacement) result = normalizeResult(replacement);
      } catch (err) {
        this.logger.error({ err, middleware: hook.name }, 'After-middleware failed');
      }
    }
    return result;
  }

  private complete(invocation: ResolvedInvocation, result: CommandResult): CommandResult {
    this.events.publish('command.completed', {
      plugin: invocation.plugin,
      group: invocation.group,
      command: invocation.command,
      success: result.success,
      kind: result.error?.kind,
    });
    return result;
  }
}
