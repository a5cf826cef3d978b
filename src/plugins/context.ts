/**
 * Command Context
 * Builds what a handler sees: bus, logger, and its plugin's configuration.
 */

import type { Logger } from '../logger.js';
import type { CommandContext, EventBus, RegisteredPlugin, ResolvedInvocation } from './types.js';

export interface ContextServices {
  logger: Logger;
  events: EventBus;
}

export function createCommandContext(
  registered: RegisteredPlugin,
  invocation: ResolvedInvocation,
  services: ContextServices,
): CommandContext {
  return {
    logger: services.logger.child({ plugin: registered.metadata.name, command: invocation.command }),
    events: services.events,
    config: { ...registered.config },
    plugin: registered.metadata,
    invocation,
  };
}
