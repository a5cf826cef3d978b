#!/usr/bin/env node
import path from 'path';

import { createCorePlugin } from './builtin/core/index.js';
import { createServicePlugin } from './builtin/service/index.js';
import { DEFAULT_PLUGIN_DIR, loadConfig } from './config.js';
import { CoreError, exitCodeFor, formatCliError } from './errors.js';
import { logger } from './logger.js';
import { CommandDispatcher } from './plugins/dispatcher.js';
import { PluginEventBus } from './plugins/events.js';
import { PluginLoader } from './plugins/loader.js';
import { loggingMiddleware, timingMiddleware } from './plugins/middleware.js';
import { PluginRegistry } from './plugins/registry.js';
import { buildProgram, peekOption } from './program.js';
import { ProcessSupervisor } from './supervisor/supervisor.js';

/** Whether to show full stack traces (set DEBUG=1 in env). */
const DEBUG = Boolean(process.env.DEBUG);

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});

async function main(argv: string[]): Promise<number> {
  const config = loadConfig(peekOption(argv, 'config', 'c')[0]);
  logger.debug({ source: config.source ?? 'defaults', services: config.services.length }, 'Configuration loaded');

  const events = new PluginEventBus({ logger });
  const registry = new PluginRegistry({ events, logger });
  const supervisor = new ProcessSupervisor({
    services: config.services,
    settings: config.settings,
    events,
    logger,
  });
  const dispatcher = new CommandDispatcher({ registry, events, logger })
    .use(timingMiddleware())
    .use(loggingMiddleware(logger));

  const loader = new PluginLoader({
    pluginDirs: [
      DEFAULT_PLUGIN_DIR,
      ...config.plugins.dirs,
      ...peekOption(argv, 'plugin-dir').map((dir) => path.resolve(dir)),
    ],
    builtins: [createCorePlugin(registry), createServicePlugin(supervisor)],
    logger,
  });
  const report = await loader.loadInto(registry, config.plugins.config);
  logger.debug({ loaded: report.loaded, failed: report.failed.length }, 'Plugins loaded');

  const { run } = buildProgram({ registry, dispatcher });
  return run(argv);
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${formatCliError(err)}`);
    if (DEBUG && err instanceof Error && err.stack) {
      console.error(`\nStack trace:\n${err.stack}`);
    }
    process.exitCode = err instanceof CoreError ? exitCodeFor(err.kind) : 1;
  });
