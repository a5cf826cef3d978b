/**
 * Plugin Loader
 * Discovers plugins (built-ins, then plugin.json manifests in plugin
 * directories), orders them by dependencies, and registers them.
 */

import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';

import { CoreError, messages, type ErrorKind } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { PluginRegistry } from './registry.js';
import { PluginMetadataSchema, type Plugin } from './types.js';

// --- Plugin Manifest (plugin.json) ---

export const PluginManifestSchema = PluginMetadataSchema.extend({
  main: z.string().default('index.js'),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

export interface LoaderOptions {
  /** Directories to scan for plugin folders */
  pluginDirs: string[];
  /** Plugins shipped with the CLI, discovered before any directory */
  builtins?: Plugin[];
  logger?: Logger;
}

export interface DiscoveredPlugin {
  plugin: Plugin;
  /** `builtin`, or the plugin's directory */
  source: string;
}

export interface LoadReport {
  loaded: string[];
  failed: Array<{ name: string; kind: ErrorKind; message: string }>;
}

export class DependencyCycleError extends CoreError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('DependencyCycle', messages.dependencyCycle([...cycle, cycle[0]]), { cycle });
    this.cycle = cycle;
  }
}

export function isPlugin(value: unknown): value is Plugin {
  return (
    typeof value === 'object' &&
    value !== null &&
    'metadata' in value &&
    typeof value.metadata === 'function' &&
    'commands' in value &&
    typeof value.commands === 'function'
  );
}

/** Name and dependencies without trusting the plugin's metadata to be valid. */
function identify(plugin: Plugin): { name: string; dependencies: string[] } {
  try {
    const parsed = PluginMetadataSchema.safeParse(plugin.metadata());
    if (parsed.success) return { name: parsed.data.name, dependencies: parsed.data.dependencies };
  } catch {
    // reported by the registry when it reads the metadata again
  }
  return { name: '<invalid>', dependencies: [] };
}

export class PluginLoader {
  private options: LoaderOptions;
  private logger: Logger;

  constructor(options: LoaderOptions) {
    this.options = options;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Lazily yield every discoverable plugin; broken ones are logged and skipped. */
  async *discover(): AsyncGenerator<DiscoveredPlugin> {
    for (const plugin of this.options.builtins ?? []) {
      yield { plugin, source: 'builtin' };
    }

    for (const { manifest, dir } of this.scan()) {
      try {
        yield { plugin: await this.importPlugin(manifest, dir), source: dir };
      } catch (err) {
        this.logger.warn(
          { dir },
          `Skipping plugin "${manifest.name}": ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }

  /** Scan plugin directories for valid plugin manifests. */
  scan(): Array<{ manifest: PluginManifest; dir: string }> {
    const results: Array<{ manifest: PluginManifest; dir: string }> = [];

    for (const baseDir of this.options.pluginDirs) {
      if (!fs.existsSync(baseDir)) continue;

      const entries = fs.readdirSync(baseDir, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        if (!entry.isDirectory()) continue;

        const pluginDir = path.join(baseDir, entry.name);
        const manifestPath = path.join(pluginDir, 'plugin.json');
        if (!fs.existsSync(manifestPath)) continue;

        try {
          const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
          results.push({ manifest: PluginManifestSchema.parse(raw), dir: pluginDir });
        } catch (err) {
          this.logger.warn(
            `Invalid plugin manifest in ${entry.name}/: ${err instanceof Error ? err.message : String(err)}`,
          );
        }
      }
    }

    return results;
  }

  private async importPlugin(manifest: PluginManifest, dir: string): Promise<Plugin> {
    const entryPoint = path.resolve(dir, manifest.main);
    // The entry point must stay inside the plugin directory
    if (!entryPoint.startsWith(path.resolve(dir) + path.sep)) {
      throw new Error(`entry point escapes plugin directory: ${manifest.main}`);
    }
    if (!fs.existsSync(entryPoint)) {
      throw new Error(`entry point not found: ${manifest.main}`);
    }

    const mod: unknown = await import(pathToFileURL(entryPoint).href);
    const plugin = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
    if (!isPlugin(plugin)) {
      throw new Error('default export is not a plugin (needs metadata() and commands())');
    }

    const declared = identify(plugin).name;
    if (declared !== manifest.name) {
      throw new Error(`manifest name "${manifest.name}" does not match plugin metadata name "${declared}"`);
    }
    return plugin;
  }

  // --- Dependency resolution ---

  /**
   * Topological sort by declared dependencies, keeping discovery order
   * among independent plugins. Unknown dependency names are left for the
   * registry to report. Throws DependencyCycleError on cycles.
   */
  resolveOrder(plugins: Plugin[]): Plugin[] {
    const nodes = plugins.map((plugin) => ({ plugin, ...identify(plugin) }));
    type Node = (typeof nodes)[number];

    const byName = new Map<string, Node>();
    for (const node of nodes) {
      if (!byName.has(node.name)) byName.set(node.name, node);
    }

    const visited = new Set<Node>();
    const visiting: Node[] = [];
    const sorted: Plugin[] = [];

    const visit = (node: Node): void => {
      if (visited.has(node)) return;
      const start = visiting.indexOf(node);
      if (start >= 0) {
        throw new DependencyCycleError(visiting.slice(start).map((n) => n.name));
      }

      visiting.push(node);
      for (const dep of node.dependencies) {
        const target = byName.get(dep);
        if (target) visit(target);
      }
      visiting.pop();
      visited.add(node);
      sorted.push(node.plugin);
    };

    for (const node of nodes) {
      visit(node);
    }
    return sorted;
  }

  /**
   * Discover, order, and register everything. Cycle members are dropped
   * (plugins needing them then fail with MissingDependency); one plugin's
   * failure never blocks the others.
   */
  async loadInto(
    registry: PluginRegistry,
    configs: Record<string, Record<string, unknown>> = {},
  ): Promise<LoadReport> {
    const report: LoadReport = { loaded: [], failed: [] };

    let pending: Plugin[] = [];
    for await (const { plugin } of this.discover()) {
      pending.push(plugin);
    }

    let ordered: Plugin[] | undefined;
    while (!ordered) {
      try {
        ordered = this.resolveOrder(pending);
      } catch (err) {
        if (!(err instanceof DependencyCycleError)) throw err;
        const { cycle, kind, message } = err;
        this.logger.warn(message);
        for (const name of cycle) {
          report.failed.push({ name, kind, message });
        }
        pending = pending.filter((p) => !cycle.includes(identify(p).name));
      }
    }

    for (const plugin of ordered) {
      const { name } = identify(plugin);
      try {
        registry.register(plugin, configs[name] ?? {});
        report.loaded.push(name);
      } catch (err) {
        if (!(err instanceof CoreError)) throw err;
        this.logger.warn({ plugin: name, kind: err.kind }, err.message);
        report.failed.push({ name, kind: err.kind, message: err.message });
      }
    }

    return report;
  }
}
