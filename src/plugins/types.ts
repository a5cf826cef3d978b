/**
 * Plugin System Types & Metadata Schema
 */

import { z } from 'zod';

import type { ErrorKind } from '../errors.js';
import type { Logger } from '../logger.js';

// --- Plugin metadata ---

export const PluginMetadataSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/),
  version: z.string().min(1),
  description: z.string().default(''),
  author: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
});

export type PluginMetadata = z.infer<typeof PluginMetadataSchema>;
export type PluginMetadataInput = z.input<typeof PluginMetadataSchema>;

// --- Event Bus interface ---

export type EventPayload = Record<string, unknown>;

export interface BusEvent {
  name: string;
  payload: EventPayload;
  timestamp: string;
}

export type EventHandler = (event: BusEvent) => void | Promise<void>;

export interface SubscriptionToken {
  readonly id: number;
  readonly event: string;
}

export interface EventBus {
  publish(name: string, payload?: EventPayload): number;
  subscribe(name: string, handler: EventHandler): SubscriptionToken;
  unsubscribe(token: SubscriptionToken): boolean;
}

// --- Commands ---

export const OPTION_TYPES = ['string', 'int', 'float', 'bool', 'flag', 'choice'] as const;
export type OptionType = (typeof OPTION_TYPES)[number];

export type OptionValue = string | number | boolean;

export interface OptionDefinition {
  name: string;
  type: OptionType;
  description: string;
  default?: OptionValue;
  required?: boolean;
  /** Allowed values for `choice` options. */
  choices?: string[];
  /** Single-letter CLI alias. */
  short?: string;
}

export interface CommandResult {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
  error?: { kind: ErrorKind; message: string };
}

export type CommandHandler = (
  options: Record<string, OptionValue>,
  ctx: CommandContext,
) => CommandResult | Promise<CommandResult>;

export interface CommandDefinition {
  name: string;
  /** Nested group path, e.g. `['tables']`. Empty or absent = plugin root. */
  group?: string[];
  description: string;
  handler: CommandHandler;
  options?: OptionDefinition[];
  hidden?: boolean;
}

export interface CommandGroupDefinition {
  name: string;
  description: string;
  commands: CommandEntry[];
}

/** What a plugin hands over: commands, possibly nested inside groups. */
export type CommandEntry = CommandDefinition | CommandGroupDefinition;

export function isCommandGroup(entry: CommandEntry): entry is CommandGroupDefinition {
  return 'commands' in entry;
}

// --- Plugin Context ---

export interface CommandContext {
  logger: Logger;
  events: EventBus;
  /** This plugin's validated configuration. */
  config: Record<string, unknown>;
  plugin: PluginMetadata;
  invocation: ResolvedInvocation;
}

export interface Invocation {
  plugin?: string;
  group?: string[];
  command: string;
  options?: Record<string, unknown>;
}

export interface ResolvedInvocation {
  plugin: string;
  group: string[];
  command: string;
}

// --- Plugin interface ---

export type PluginConfigSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

/**
 * Anything offering metadata and commands is a plugin; the registry
 * depends on nothing else.
 */
export interface Plugin {
  metadata(): PluginMetadataInput;
  commands(): CommandEntry[];

  configSchema?(): PluginConfigSchema;
  /** Extra checks after the schema; returns human-readable problems, empty when valid. */
  validateConfig?(config: Record<string, unknown>): string[];
  onConfigChange?(previous: Record<string, unknown>, next: Record<string, unknown>): void;
}

/** A command after flattening, tagged with its owner. */
export interface RegisteredCommand {
  plugin: string;
  group: string[];
  definition: CommandDefinition;
}

export interface RegisteredPlugin {
  metadata: PluginMetadata;
  plugin: Plugin;
  commands: RegisteredCommand[];
  config: Record<string, unknown>;
}

export interface GroupListing {
  path: string[];
  description: string;
  /** Plugins contributing commands, in registration order. */
  plugins: string[];
  commands: string[];
}
