/**
 * Plugin system re-exports
 */

export { PluginEventBus, WILDCARD } from './events.js';
export { PluginRegistry, type RegistryOptions, type ResolvedCommand } from './registry.js';
export { CommandDispatcher, type DispatcherOptions } from './dispatcher.js';
export {
  PluginLoader,
  PluginManifestSchema,
  DependencyCycleError,
  isPlugin,
  type LoaderOptions,
  type LoadReport,
  type PluginManifest,
} from './loader.js';
export {
  loggingMiddleware,
  timingMiddleware,
  type AfterMiddleware,
  type BeforeMiddleware,
  type Execution,
  type Middleware,
} from './middleware.js';
export { coerceOption, resolveOptions } from './options.js';
export { ok, fail, fromError } from './result.js';
export { createCommandContext, type ContextServices } from './context.js';
export type {
  Plugin,
  PluginMetadata,
  PluginMetadataInput,
  PluginConfigSchema,
  CommandEntry,
  CommandDefinition,
  CommandGroupDefinition,
  CommandHandler,
  CommandContext,
  CommandResult,
  OptionDefinition,
  OptionType,
  OptionValue,
  EventBus,
  EventHandler,
  BusEvent,
  SubscriptionToken,
  Invocation,
  RegisteredPlugin,
  RegisteredCommand,
  GroupListing,
} from './types.js';
export { PluginMetadataSchema, OPTION_TYPES, isCommandGroup } from './types.js';
