/**
 * Commander tree built from the plugin registry.
 *
 * Every command is reachable as `<plugin> [group...] <command>`; commands
 * that resolve unambiguously without a plugin name are also mounted at
 * the top level. The CLI only turns argv into an Invocation and renders
 * the CommandResult; everything else happens in the dispatcher.
 */

import { Command, CommanderError, Option } from 'commander';

import { VERSION } from './config.js';
import { exitCodeFor } from './errors.js';
import type { CommandDispatcher } from './plugins/dispatcher.js';
import type { PluginRegistry } from './plugins/registry.js';
import type { CommandResult, OptionDefinition, RegisteredCommand } from './plugins/types.js';

export interface ProgramDeps {
  registry: PluginRegistry;
  dispatcher: CommandDispatcher;
  /** Defaults to stdout. */
  out?: (text: string) => void;
  /** Defaults to stderr. */
  err?: (text: string) => void;
}

function optionFlags(def: OptionDefinition): string {
  const short = def.short ? `-${def.short}, ` : '';
  if (def.type === 'flag') return `${short}--${def.name}`;
  const placeholder = def.type === 'choice' && def.choices ? def.choices.join('|') : def.type;
  return `${short}--${def.name} <${placeholder}>`;
}

/** Only the options the user actually typed, keyed by their declared names. */
function collectOptions(cmd: Command, defs: OptionDefinition[], attributes: Map<string, string>): Record<string, unknown> {
  const values = cmd.opts();
  const supplied: Record<string, unknown> = {};
  for (const def of defs) {
    const attribute = attributes.get(def.name) ?? def.name;
    if (values[attribute] !== undefined) supplied[def.name] = values[attribute];
  }
  return supplied;
}

export function renderResult(result: CommandResult, json: boolean): { stdout?: string; stderr?: string } {
  if (json) return { stdout: JSON.stringify(result, null, 2) };
  if (result.success) return result.message ? { stdout: result.message } : {};
  return { stderr: `Error: ${result.message}` };
}

export function exitCodeOf(result: CommandResult): number {
  if (result.success) return 0;
  return exitCodeFor(result.error?.kind ?? 'ExecutionError');
}

/** Global options that take a value; their values are not operands. */
const GLOBAL_VALUE_OPTIONS = new Set(['-c', '--config', '--plugin-dir']);

/**
 * Values of a global option, read before commander runs: the
 * configuration and plugin directories decide which commands exist.
 * Global options only count before the first operand, as in the program
 * itself, so commands keep their own flags.
 */
export function peekOption(argv: string[], name: string, short?: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--' || !arg.startsWith('-')) break;
    if (arg.startsWith(`--${name}=`)) {
      values.push(arg.slice(name.length + 3));
    } else if ((arg === `--${name}` || (short && arg === `-${short}`)) && i + 1 < argv.length) {
      values.push(argv[++i]);
    } else if (GLOBAL_VALUE_OPTIONS.has(arg)) {
      i++;
    }
  }
  return values;
}

/**
 * Build the program. `run(argv)` parses user arguments (without the node
 * and script entries) and resolves to the process exit code.
 */
export function buildProgram(deps: ProgramDeps): { program: Command; run: (argv: string[]) => Promise<number> } {
  const out = deps.out ?? ((text: string) => process.stdout.write(`${text}\n`));
  const err = deps.err ?? ((text: string) => process.stderr.write(`${text}\n`));
  let exitCode = 0;

  const program = new Command()
    .name('svcdeck')
    .description('Manage local services; commands are contributed by plugins')
    .version(VERSION)
    .option('-c, --config <path>', 'Configuration file')
    .option('--json', 'Print results as JSON')
    .option('--plugin-dir <dir>', 'Extra plugin directory (repeatable)', (dir: string, dirs: string[]) => [...dirs, dir], [])
    // global options go before the command; anything after belongs to it
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => err(text.trimEnd()),
    });

  const leaves = new Set<Command>();

  /** Find or create the group commands along `path`; undefined when a leaf is in the way. */
  const ensureGroups = (parent: Command, path: string[], descriptionOf: (path: string[]) => string) => {
    let current = parent;
    for (let depth = 1; depth <= path.length; depth++) {
      const name = path[depth - 1];
      let next = current.commands.find((c) => c.name() === name);
      if (next && leaves.has(next)) return undefined;
      if (!next) {
        next = current.command(name).description(descriptionOf(path.slice(0, depth)));
      }
      current = next;
    }
    return current;
  };

  const groupDescriptions = new Map(
    deps.registry.listGroups().map((g): [string, string] => [g.path.join(' '), g.description]),
  );
  const describeGroup = (path: string[]) => groupDescriptions.get(path.join(' ')) ?? '';

  const attach = (parent: Command, registered: RegisteredCommand, scope: string | undefined): void => {
    const { definition, group } = registered;
    const container = ensureGroups(parent, group, describeGroup);
    if (!container || container.commands.some((c) => c.name() === definition.name)) return;

    const cmd = container
      .command(definition.name, { hidden: definition.hidden === true })
      .description(definition.description);
    const defs = definition.options ?? [];
    const attributes = new Map<string, string>();
    for (const def of defs) {
      // Defaults are filled by the dispatcher, so commander only mentions them
      const suffix = def.default !== undefined ? ` (default: ${String(def.default)})` : '';
      const option = new Option(optionFlags(def), `${def.description}${suffix}`);
      attributes.set(def.name, option.attributeName());
      cmd.addOption(option);
    }

    cmd.action(async () => {
      const result = await deps.dispatcher.execute({
        plugin: scope,
        group,
        command: definition.name,
        options: collectOptions(cmd, defs, attributes),
      });
      const rendered = renderResult(result, program.opts().json === true);
      if (rendered.stdout !== undefined) out(rendered.stdout);
      if (rendered.stderr !== undefined) err(rendered.stderr);
      exitCode = exitCodeOf(result);
    });

    leaves.add(cmd);
  };

  // Scoped: <plugin> [group...] <command>
  const pluginNames = new Set<string>();
  for (const { metadata, commands } of deps.registry.getAll()) {
    pluginNames.add(metadata.name);
    const pluginCommand = program.command(metadata.name).description(metadata.description);
    for (const registered of commands) attach(pluginCommand, registered, metadata.name);
  }

  // Unscoped shortcuts for commands that resolve without a plugin name
  const pathCounts = new Map<string, number>();
  const pathOf = (c: RegisteredCommand) => [...c.group, c.definition.name].join(' ');
  for (const registered of deps.registry.listCommands()) {
    pathCounts.set(pathOf(registered), (pathCounts.get(pathOf(registered)) ?? 0) + 1);
  }
  for (const registered of deps.registry.listCommands()) {
    const head = registered.group[0] ?? registered.definition.name;
    if (pluginNames.has(head) || pathCounts.get(pathOf(registered)) !== 1) continue;
    attach(program, registered, undefined);
  }

  const run = async (argv: string[]): Promise<number> => {
    exitCode = 0;
    try {
      await program.parseAsync(argv, { from: 'user' });
    } catch (e) {
      if (e instanceof CommanderError) {
        // help and version exit with 0; everything else is a usage error
        return e.exitCode === 0 ? 0 : 2;
      }
      throw e;
    }
    return exitCode;
  };

  return { program, run };
}
