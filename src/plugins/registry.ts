/**
 * Plugin Registry
 * Holds registered plugins and their flattened command sets.
 *
 * Commands at a plugin's root are private to that plugin. Commands inside
 * a group live in a namespace shared by all plugins, so two plugins adding
 * `tables list` collide while two plugins each offering a root `status`
 * do not.
 */

import { CoreError, messages } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import {
  isCommandGroup,
  PluginMetadataSchema,
  type CommandEntry,
  type EventBus,
  type GroupListing,
  type Plugin,
  type PluginMetadata,
  type RegisteredCommand,
  type RegisteredPlugin,
} from './types.js';

export interface RegistryOptions {
  events: EventBus;
  logger?: Logger;
}

export interface ResolvedCommand {
  plugin: RegisteredPlugin;
  command: RegisteredCommand;
}

const NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

const pathKey = (path: string[]): string => path.join(' ');

export class PluginRegistry {
  private plugins = new Map<string, RegisteredPlugin>();
  private loadOrder: string[] = [];
  private groupDescriptions = new Map<string, string>();
  private events: EventBus;
  private logger: Logger;

  constructor(options: RegistryOptions) {
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Register a plugin after its dependencies. Fails without touching
   * already-registered plugins.
   */
  register(plugin: Plugin, config: Record<string, unknown> = {}): RegisteredPlugin {
    const metadata = this.readMetadata(plugin);
    const { name } = metadata;

    if (this.plugins.has(name)) {
      throw new CoreError('DuplicatePlugin', messages.duplicatePlugin(name), { plugin: name });
    }

    const missing = metadata.dependencies.filter((dep) => !this.plugins.has(dep));
    if (missing.length > 0) {
      throw new CoreError('MissingDependency', messages.missingDependency(name, missing), {
        plugin: name,
        missing,
      });
    }

    const groups = new Map<string, string>();
    const commands = this.flatten(name, plugin, groups);
    this.checkCollisions(name, commands, groups);
    const validated = this.validateConfig(metadata, plugin, config);

    const entry: RegisteredPlugin = { metadata, plugin, commands, config: validated };
    this.plugins.set(name, entry);
    this.loadOrder.push(name);
    for (const [key, description] of groups) {
      if (!this.groupDescriptions.get(key)) this.groupDescriptions.set(key, description);
    }

    this.events.publish('plugin.registered', { name, version: metadata.version, commands: commands.length });
    this.logger.debug({ plugin: name, commands: commands.length }, `Plugin registered: ${name} v${metadata.version}`);
    return entry;
  }

  /** Explicit unload. Refuses while other plugins still depend on it. */
  unregister(name: string): void {
    if (!this.plugins.has(name)) {
      throw new CoreError('UnknownPlugin', messages.unknownPlugin(name), { plugin: name });
    }
    const dependants = this.getAll()
      .filter((p) => p.metadata.dependencies.includes(name))
      .map((p) => p.metadata.name);
    if (dependants.length > 0) {
      throw new CoreError('MissingDependency', messages.requiredBy(name, dependants), { plugin: name, dependants });
    }

    this.plugins.delete(name);
    this.loadOrder = this.loadOrder.filter((n) => n !== name);
    this.events.publish('plugin.unregistered', { name });
    this.logger.debug({ plugin: name }, `Plugin unregistered: ${name}`);
  }

  /** Replace a plugin's configuration after validating it. */
  reconfigure(name: string, config: Record<string, unknown>): RegisteredPlugin {
    const entry = this.plugins.get(name);
    if (!entry) {
      throw new CoreError('UnknownPlugin', messages.unknownPlugin(name), { plugin: name });
    }
    const next = this.validateConfig(entry.metadata, entry.plugin, config);
    const previous = entry.config;
    entry.config = next;
    entry.plugin.onConfigChange?.(previous, next);
    this.events.publish('plugin.reconfigured', { name });
    return entry;
  }

  /**
   * Resolve a command. Without a plugin name every plugin is searched;
   * a root command offered by more than one plugin is ambiguous.
   */
  lookup(plugin: string | undefined, group: string[], command: string): ResolvedCommand {
    const key = pathKey([...group, command]);
    const candidates = plugin === undefined ? this.getAll() : [this.plugins.get(plugin)].filter(isDefined);

    const matches: ResolvedCommand[] = [];
    for (const entry of candidates) {
      const found = entry.commands.find((c) => pathKey([...c.group, c.definition.name]) === key);
      if (found) matches.push({ plugin: entry, command: found });
    }

    if (matches.length === 0) {
      throw new CoreError('CommandNotFound', messages.commandNotFound(plugin, group, command), {
        plugin,
        group,
        command,
      });
    }
    if (matches.length > 1) {
      const owners = matches.map((m) => m.plugin.metadata.name);
      throw new CoreError('AmbiguousCommand', messages.ambiguousCommand(key, owners), { plugins: owners });
    }
    return matches[0];
  }

  get(name: string): RegisteredPlugin | undefined {
    return this.plugins.get(name);
  }

  /** All registered plugins in registration order. */
  getAll(): RegisteredPlugin[] {
    return this.loadOrder.map((n) => this.plugins.get(n)).filter(isDefined);
  }

  listPlugins(): PluginMetadata[] {
    return this.getAll().map((p) => p.metadata);
  }

  /** Commands in registration order, then declaration order. */
  listCommands(plugin?: string): RegisteredCommand[] {
    return this.getAll()
      .filter((p) => plugin === undefined || p.metadata.name === plugin)
      .flatMap((p) => p.commands);
  }

  /** Every group path (including intermediate ones) in first-seen order. */
  listGroups(): GroupListing[] {
    const listings = new Map<string, GroupListing>();

    for (const { plugin: owner, group, definition } of this.listCommands()) {
      for (let depth = 1; depth <= group.length; depth++) {
        const path = group.slice(0, depth);
        const key = pathKey(path);
        let listing = listings.get(key);
        if (!listing) {
          listing = { path, description: this.groupDescriptions.get(key) ?? '', plugins: [], commands: [] };
          listings.set(key, listing);
        }
        if (!listing.plugins.includes(owner)) listing.plugins.push(owner);
        if (depth === group.length && !definition.hidden) listing.commands.push(definition.name);
      }
    }
    return [...listings.values()];
  }

  // --- Validation ---

  private readMetadata(plugin: Plugin): PluginMetadata {
    let raw: unknown;
    try {
      raw = plugin.metadata();
    } catch (err) {
      throw new CoreError('InvalidPlugin', messages.invalidPlugin('<unknown>', [errorMessage(err)]));
    }
    const parsed = PluginMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      const name = isRecord(raw) && typeof raw.name === 'string' ? raw.name : '<unknown>';
      throw new CoreError(
        'InvalidPlugin',
        messages.invalidPlugin(name, parsed.error.issues.map((i) => `${i.path.join('.') || 'metadata'}: ${i.message}`)),
      );
    }
    return parsed.data;
  }

  /** Flatten nested groups into path-tagged commands, collecting group descriptions. */
  private flatten(name: string, plugin: Plugin, groups: Map<string, string>): RegisteredCommand[] {
    let entries: CommandEntry[];
    try {
      entries = plugin.commands();
    } catch (err) {
      throw new CoreError('InvalidPlugin', messages.invalidPlugin(name, [errorMessage(err)]));
    }

    const out: RegisteredCommand[] = [];
    const walk = (items: CommandEntry[], path: string[]): void => {
      for (const item of items) {
        if (!NAME_PATTERN.test(item.name)) {
          throw new CoreError('InvalidPlugin', messages.invalidPlugin(name, [`invalid name "${item.name}"`]));
        }
        if (isCommandGroup(item)) {
          const groupPath = [...path, item.name];
          groups.set(pathKey(groupPath), item.description);
          walk(item.commands, groupPath);
          continue;
        }
        const group = [...path, ...(item.group ?? [])];
        this.checkOptions(name, item.name, item.options ?? []);
        out.push({ plugin: name, group, definition: item });
      }
    };
    walk(entries, []);
    return out;
  }

  private checkOptions(
    plugin: string,
    command: string,
    options: Array<{ name: string; type: string; choices?: string[]; short?: string }>,
  ): void {
    const seen = new Set<string>();
    for (const option of options) {
      if (seen.has(option.name)) {
        throw new CoreError('InvalidPlugin', messages.invalidPlugin(plugin, [`option "${option.name}" declared twice on "${command}"`]));
      }
      if (option.name === 'help' || option.short === 'h') {
        throw new CoreError('InvalidPlugin', messages.invalidPlugin(plugin, [`option "${option.name}" on "${command}" clashes with --help`]));
      }
      if (option.type === 'choice' && !option.choices?.length) {
        throw new CoreError('InvalidPlugin', messages.invalidPlugin(plugin, [`choice option "${option.name}" on "${command}" has no choices`]));
      }
      seen.add(option.name);
    }
  }

  private checkCollisions(name: string, commands: RegisteredCommand[], groups: Map<string, string>): void {
    const fail = (path: string, owner: string): never => {
      throw new CoreError('CommandCollision', messages.commandCollision(name, path, owner), { plugin: name, path, owner });
    };

    // Group prefixes this plugin introduces, including those from `group` paths
    const ownGroups = new Set(groups.keys());
    for (const c of commands) {
      for (let depth = 1; depth <= c.group.length; depth++) ownGroups.add(pathKey(c.group.slice(0, depth)));
    }

    // Shared namespace: grouped commands and group paths of other plugins
    const sharedCommands = new Map<string, string>();
    const sharedGroups = new Map<string, string>();
    for (const other of this.getAll()) {
      for (const c of other.commands) {
        if (c.group.length > 0) sharedCommands.set(pathKey([...c.group, c.definition.name]), c.plugin);
        for (let depth = 1; depth <= c.group.length; depth++) {
          const key = pathKey(c.group.slice(0, depth));
          if (!sharedGroups.has(key)) sharedGroups.set(key, c.plugin);
        }
      }
    }

    const own = new Set<string>();
    for (const c of commands) {
      const key = pathKey([...c.group, c.definition.name]);
      if (own.has(key) || ownGroups.has(key)) fail(key, name);
      own.add(key);

      if (c.group.length > 0) {
        const owner = sharedCommands.get(key) ?? sharedGroups.get(key);
        if (owner) fail(key, owner);
      }
    }
    for (const key of ownGroups) {
      const owner = sharedCommands.get(key);
      if (owner) fail(key, owner);
    }
  }

  private validateConfig(metadata: PluginMetadata, plugin: Plugin, raw: Record<string, unknown>): Record<string, unknown> {
    let config = raw;
    const schema = plugin.configSchema?.();
    if (schema) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const problems = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new CoreError('InvalidPluginConfig', messages.invalidPluginConfig(metadata.name, problems), { problems });
      }
      config = parsed.data;
    }

    const problems = plugin.validateConfig?.(config) ?? [];
    if (problems.length > 0) {
      throw new CoreError('InvalidPluginConfig', messages.invalidPluginConfig(metadata.name, problems), { problems });
    }
    return config;
  }
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
