import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

import type { ServiceDefinition, SupervisorSettings } from './supervisor/types.js';

export const VERSION = '0.3.0';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'warn';
export const CONFIG_ENV_VAR = 'SVCDECK_CONFIG';

const HOME_DIR = os.homedir();
export const CONFIG_HOME = path.join(HOME_DIR, '.config', 'svcdeck');
export const DEFAULT_STATE_DIR = path.join(CONFIG_HOME, 'state');
export const DEFAULT_LOG_DIR = path.join(CONFIG_HOME, 'logs');
export const DEFAULT_PLUGIN_DIR = path.join(CONFIG_HOME, 'plugins');

export const CONFIG_SEARCH_PATHS = [
  path.join('config', 'default.yaml'),
  path.join(CONFIG_HOME, 'default.yaml'),
  '/etc/svcdeck/default.yaml',
];

// --- Schema ---

const seconds = (fallback: number) => z.number().positive().default(fallback);

const SettingsSchema = z
  .object({
    state_dir: z.string().min(1).default(DEFAULT_STATE_DIR),
    log_dir: z.string().min(1).default(DEFAULT_LOG_DIR),
    host: z.string().min(1).default('127.0.0.1'),
    startup_timeout: seconds(30),
    health_interval: seconds(0.25),
    health_max_interval: seconds(2),
    stop_grace: seconds(5),
    kill_wait: seconds(2),
  })
  .strict();

const ServiceSchema = z
  .object({
    command: z.string().min(1),
    working_directory: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
    health_check: z.string().startsWith('/').optional(),
    description: z.string().default(''),
    environment: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
  })
  .strict()
  .refine((s) => s.health_check === undefined || s.port !== undefined, {
    message: 'health_check requires port',
    path: ['health_check'],
  });

const PluginsSchema = z
  .object({
    dirs: z.array(z.string().min(1)).default([]),
    config: z.record(z.record(z.unknown())).default({}),
  })
  .strict();

export const ConfigFileSchema = z.object({
  settings: SettingsSchema.default({}),
  services: z.record(z.string().regex(/^[A-Za-z0-9][\w.-]*$/, 'invalid service name'), ServiceSchema).default({}),
  plugins: PluginsSchema.default({}),
});

// --- Loaded configuration ---

export interface AppConfig {
  /** File the configuration came from, if any. */
  source?: string;
  settings: SupervisorSettings;
  services: ServiceDefinition[];
  plugins: {
    dirs: string[];
    config: Record<string, Record<string, unknown>>;
  };
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function expandPath(value: string, baseDir: string): string {
  if (value === '~') return HOME_DIR;
  if (value.startsWith('~/')) return path.join(HOME_DIR, value.slice(2));
  return path.resolve(baseDir, value);
}

/** Parse and validate YAML configuration text. Relative paths resolve against `baseDir`. */
export function parseConfig(text: string, source = '<inline>', baseDir = process.cwd()): AppConfig {
  const raw = yaml.load(text, { filename: source }) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const { settings, services, plugins } = parsed.data;
  return {
    source,
    settings: {
      stateDir: expandPath(settings.state_dir, baseDir),
      logDir: expandPath(settings.log_dir, baseDir),
      host: settings.host,
      startupTimeoutMs: Math.round(settings.startup_timeout * 1000),
      healthIntervalMs: Math.round(settings.health_interval * 1000),
      healthMaxIntervalMs: Math.round(settings.health_max_interval * 1000),
      stopGraceMs: Math.round(settings.stop_grace * 1000),
      killWaitMs: Math.round(settings.kill_wait * 1000),
    },
    services: Object.entries(services).map(([name, svc]) => ({
      name,
      command: svc.command,
      workingDirectory: expandPath(svc.working_directory, baseDir),
      port: svc.port,
      healthCheck: svc.health_check,
      description: svc.description,
      environment: svc.environment,
    })),
    plugins: {
      dirs: plugins.dirs.map((dir) => expandPath(dir, baseDir)),
      config: plugins.config,
    },
  };
}

/** Configuration used when no file is found: no services, default settings. */
export function emptyConfig(): AppConfig {
  const config = parseConfig('{}');
  delete config.source;
  return config;
}

/** Locate the configuration file: explicit path, then env var, then the search paths. */
export function findConfigFile(explicit?: string): string | undefined {
  if (explicit) return path.resolve(explicit);
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) return path.resolve(fromEnv);
  return CONFIG_SEARCH_PATHS.map((p) => path.resolve(p)).find((p) => fs.existsSync(p));
}

export function loadConfig(explicit?: string): AppConfig {
  const file = findConfigFile(explicit);
  if (!file) return emptyConfig();
  return parseConfig(fs.readFileSync(file, 'utf-8'), file, path.dirname(file));
}
