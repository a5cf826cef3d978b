import { VERSION } from '../../config.js';
import { fail, ok } from '../../plugins/result.js';
import type { CommandDefinition, CommandResult, OptionDefinition, Plugin } from '../../plugins/types.js';
import type { ProcessSupervisor } from '../../supervisor/supervisor.js';
import type { BulkOutcome, ServiceDefinition, ServiceRuntimeState } from '../../supervisor/types.js';
import { formatTable, formatUptime } from '../format.js';

const serviceOption = (required: boolean): OptionDefinition => ({
  name: 'service',
  type: 'string',
  description: 'Service name from the configuration',
  required,
  short: 's',
});

export function formatStatus(states: ServiceRuntimeState[]): string {
  if (states.length === 0) return 'No services configured.';
  return formatTable(
    ['NAME', 'STATUS', 'PID', 'PORT', 'UPTIME'],
    states.map((s) => [
      s.name,
      s.status,
      s.pid !== undefined ? String(s.pid) : '-',
      s.port !== undefined ? String(s.port) : '-',
      s.uptimeMs !== undefined ? formatUptime(s.uptimeMs) : '-',
    ]),
  );
}

/** The configured services, without touching their runtime state. */
export function formatServices(services: ServiceDefinition[]): string {
  if (services.length === 0) return 'No services configured.';
  return formatTable(
    ['NAME', 'PORT', 'DESCRIPTION'],
    services.map((s) => [s.name, s.port !== undefined ? String(s.port) : '-', s.description || '-']),
  );
}

function describeState(state: ServiceRuntimeState): string {
  return state.pid !== undefined ? `${state.status} (PID ${state.pid})` : state.status;
}

/** One line per service; fails with the first failure's kind when anything failed. */
function bulkResult(verb: string, outcomes: BulkOutcome[]): CommandResult {
  const lines = outcomes.map((o) =>
    o.error ? `${o.name}: ${o.error.message}` : `${o.name}: ${o.state ? describeState(o.state) : 'ok'}`,
  );
  const failures = outcomes.filter((o) => !o.success);
  const data = { results: outcomes };

  if (failures.length === 0) {
    return ok([`${verb} ${outcomes.length} service(s)`, ...lines].join('\n'), data);
  }
  const kind = failures[0].error?.kind ?? 'ExecutionError';
  return fail(kind, [`${failures.length} of ${outcomes.length} service(s) failed`, ...lines].join('\n'), data);
}

export function createServicePlugin(supervisor: ProcessSupervisor): Plugin {
  const startCommand: CommandDefinition = {
    name: 'start',
    description: 'Start a service and wait until it is healthy',
    options: [serviceOption(true)],
    async handler(options) {
      const state = await supervisor.start(String(options.service));
      return ok(`Service "${state.name}" started (PID ${state.pid ?? '?'})`, { service: state });
    },
  };

  const stopCommand: CommandDefinition = {
    name: 'stop',
    description: 'Stop a service (SIGTERM, then SIGKILL after the grace period)',
    options: [serviceOption(true)],
    async handler(options) {
      const name = String(options.service);
      const before = supervisor.status(name);
      const state = await supervisor.stop(name);
      const message =
        before.status === 'stopped' || before.status === 'failed'
          ? `Service "${name}" is not running`
          : `Service "${name}" stopped`;
      return ok(message, { service: state });
    },
  };

  const restartCommand: CommandDefinition = {
    name: 'restart',
    description: 'Stop and start a service',
    options: [serviceOption(true)],
    async handler(options) {
      const state = await supervisor.restart(String(options.service));
      return ok(`Service "${state.name}" restarted (PID ${state.pid ?? '?'})`, { service: state });
    },
  };

  const statusCommand: CommandDefinition = {
    name: 'status',
    description: 'Show the state of one or all services',
    options: [serviceOption(false)],
    handler(options) {
      const states =
        options.service !== undefined ? [supervisor.status(String(options.service))] : supervisor.status();
      return ok(formatStatus(states), { services: states });
    },
  };

  const listCommand: CommandDefinition = {
    name: 'list',
    description: 'List configured services with their ports',
    handler() {
      const services = supervisor.services();
      return ok(formatServices(services), {
        services: services.map(({ name, port, description }) => ({ name, port, description })),
      });
    },
  };

  const logsCommand: CommandDefinition = {
    name: 'logs',
    description: 'Print the last lines of a service log',
    options: [
      serviceOption(true),
      { name: 'lines', type: 'int', description: 'Number of lines to show', default: 100, short: 'n' },
    ],
    handler(options) {
      const name = String(options.service);
      const lines = supervisor.logs(name, Number(options.lines));
      return ok(lines.join('\n'), { service: name, lines });
    },
  };

  const startAllCommand: CommandDefinition = {
    name: 'start-all',
    description: 'Start every configured service in order',
    handler: async () => bulkResult('Started', await supervisor.startAll()),
  };

  const stopAllCommand: CommandDefinition = {
    name: 'stop-all',
    description: 'Stop every configured service in reverse order',
    handler: async () => bulkResult('Stopped', await supervisor.stopAll()),
  };

  const restartAllCommand: CommandDefinition = {
    name: 'restart-all',
    description: 'Restart every configured service',
    handler: async () => bulkResult('Restarted', await supervisor.restartAll()),
  };

  return {
    metadata: () => ({
      name: 'service',
      version: VERSION,
      description: 'Start, stop and inspect configured services',
    }),
    commands: () => [
      startCommand,
      stopCommand,
      restartCommand,
      statusCommand,
      listCommand,
      logsCommand,
      startAllCommand,
      stopAllCommand,
      restartAllCommand,
    ],
  };
}
