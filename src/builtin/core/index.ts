import { VERSION } from '../../config.js';
import { CoreError, messages } from '../../errors.js';
import type { PluginRegistry } from '../../plugins/registry.js';
import { ok } from '../../plugins/result.js';
import type { CommandDefinition, Plugin } from '../../plugins/types.js';
import { formatTable } from '../format.js';

export function createCorePlugin(registry: PluginRegistry): Plugin {
  const pluginsCommand: CommandDefinition = {
    name: 'plugins',
    description: 'List registered plugins',
    options: [{ name: 'verbose', type: 'flag', description: 'Include dependencies and command counts', short: 'v' }],
    handler(options) {
      const plugins = registry.getAll();
      const rows = plugins.map(({ metadata, commands }) => {
        const row = [metadata.name, metadata.version, metadata.description];
        if (options.verbose) {
          row.push(metadata.dependencies.join(', ') || '-', String(commands.length));
        }
        return row;
      });
      const headers = options.verbose
        ? ['NAME', 'VERSION', 'DESCRIPTION', 'DEPENDS ON', 'COMMANDS']
        : ['NAME', 'VERSION', 'DESCRIPTION'];

      return ok(formatTable(headers, rows), { plugins: plugins.map((p) => p.metadata) });
    },
  };

  const groupsCommand: CommandDefinition = {
    name: 'groups',
    description: 'List command groups and the plugins contributing to them',
    handler() {
      const groups = registry.listGroups();
      if (groups.length === 0) return ok('No command groups registered.', { groups });

      const rows = groups.map((g) => [g.path.join(' '), g.description, g.plugins.join(', '), g.commands.join(', ')]);
      return ok(formatTable(['GROUP', 'DESCRIPTION', 'PLUGINS', 'COMMANDS'], rows), { groups });
    },
  };

  const infoCommand: CommandDefinition = {
    name: 'info',
    description: 'Show one plugin and its commands',
    options: [{ name: 'name', type: 'string', description: 'Plugin name', required: true }],
    handler(options) {
      const name = String(options.name);
      const entry = registry.get(name);
      if (!entry) {
        throw new CoreError('UnknownPlugin', messages.unknownPlugin(name), { plugin: name });
      }

      const { metadata } = entry;
      const commands = entry.commands
        .filter((c) => !c.definition.hidden)
        .map((c) => ({ path: [...c.group, c.definition.name].join(' '), description: c.definition.description }));

      const lines = [
        `${metadata.name} ${metadata.version}`,
        ...(metadata.description ? [metadata.description] : []),
        ...(metadata.author ? [`Author: ${metadata.author}`] : []),
        `Depends on: ${metadata.dependencies.join(', ') || 'nothing'}`,
        'Commands:',
        ...commands.map((c) => `  ${c.path} - ${c.description}`),
      ];
      return ok(lines.join('\n'), { plugin: metadata, commands });
    },
  };

  return {
    metadata: () => ({
      name: 'core',
      version: VERSION,
      description: 'Inspect the plugin registry',
    }),
    commands: () => [pluginsCommand, groupsCommand, infoCommand],
  };
}
