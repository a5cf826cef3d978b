import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CONFIG_ENV_VAR, ConfigError, emptyConfig, findConfigFile, loadConfig, parseConfig } from './config.js';

function issuesOf(text: string): string[] {
  try {
    parseConfig(text, 'test.yaml', '/srv/deck');
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('parseConfig', () => {
  it('should convert durations to milliseconds and fill defaults', () => {
    const config = parseConfig(
      ['settings:', '  startup_timeout: 10', '  stop_grace: 1.5', '  state_dir: state'].join('\n'),
      'test.yaml',
      '/srv/deck',
    );

    expect(config.settings).toEqual({
      stateDir: '/srv/deck/state',
      logDir: path.join(os.homedir(), '.config', 'svcdeck', 'logs'),
      host: '127.0.0.1',
      startupTimeoutMs: 10000,
      healthIntervalMs: 250,
      healthMaxIntervalMs: 2000,
      stopGraceMs: 1500,
      killWaitMs: 2000,
    });
  });

  it('should keep services in file order with resolved paths', () => {
    const config = parseConfig(
      [
        'services:',
        '  dealer:',
        '    command: ./run-dealer',
        '    working_directory: dealer',
        '    port: 7000',
        '    health_check: /health',
        '    environment:',
        '      TABLES: 4',
        '      DEBUG: true',
        '  croupier:',
        '    command: ./run-croupier',
        '    working_directory: ~/croupier',
        '    description: Spins the wheel',
      ].join('\n'),
      'test.yaml',
      '/srv/deck',
    );

    expect(config.services).toEqual([
      {
        name: 'dealer',
        command: './run-dealer',
        workingDirectory: '/srv/deck/dealer',
        port: 7000,
        healthCheck: '/health',
        description: '',
        environment: { TABLES: '4', DEBUG: 'true' },
      },
      {
        name: 'croupier',
        command: './run-croupier',
        workingDirectory: path.join(os.homedir(), 'croupier'),
        port: undefined,
        healthCheck: undefined,
        description: 'Spins the wheel',
        environment: {},
      },
    ]);
  });

  it('should resolve plugin directories and keep per-plugin config', () => {
    const config = parseConfig(
      ['plugins:', '  dirs: [extra, /opt/plugins]', '  config:', '    casino:', '      tables: 3'].join('\n'),
      'test.yaml',
      '/srv/deck',
    );

    expect(config.plugins).toEqual({ dirs: ['/srv/deck/extra', '/opt/plugins'], config: { casino: { tables: 3 } } });
  });

  it('should list every issue with its path', () => {
    expect(issuesOf(['services:', '  dealer:', '    working_directory: dealer', '    port: 70000'].join('\n'))).toEqual([
      'services.dealer.command: Required',
      'services.dealer.port: Number must be less than or equal to 65535',
    ]);
  });

  it('should require a port for health checks', () => {
    expect(
      issuesOf(['services:', '  dealer:', '    command: ./run', '    working_directory: .', '    health_check: /health'].join('\n')),
    ).toEqual(['services.dealer.health_check: health_check requires port']);
  });

  it('should reject unknown settings', () => {
    const issues = issuesOf(['settings:', '  colour: red'].join('\n'));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^settings: Unrecognized key/);
  });

  it('should name the source in the error message', () => {
    expect(() => parseConfig('services: 3', 'deck.yaml')).toThrow(
      'Invalid configuration in deck.yaml: services: Expected object, received number',
    );
  });

  it('should treat an empty document as defaults', () => {
    const config = parseConfig('', 'empty.yaml');
    expect(config.services).toEqual([]);
    expect(config.source).toBe('empty.yaml');
  });
});

describe('emptyConfig', () => {
  it('should have no services and no source', () => {
    const config = emptyConfig();
    expect(config.services).toEqual([]);
    expect(config.plugins).toEqual({ dirs: [], config: {} });
    expect(config.source).toBeUndefined();
  });
});

describe('loadConfig', () => {
  let tmpDir: string;
  let savedEnv: string | undefined;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'svcdeck-config-'));
    savedEnv = process.env[CONFIG_ENV_VAR];
  });

  afterEach(() => {
    if (savedEnv === undefined) delete process.env[CONFIG_ENV_VAR];
    else process.env[CONFIG_ENV_VAR] = savedEnv;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, service: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, ['services:', `  ${service}:`, '    command: ./run', '    working_directory: work'].join('\n'));
    return file;
  }

  it('should read the file named by the environment variable', () => {
    const file = writeConfig('env.yaml', 'dealer');
    process.env[CONFIG_ENV_VAR] = file;

    const config = loadConfig();
    expect(config.source).toBe(file);
    expect(config.services.map((s) => s.name)).toEqual(['dealer']);
    expect(config.services[0].workingDirectory).toBe(path.join(tmpDir, 'work'));
  });

  it('should prefer an explicit path over the environment variable', () => {
    process.env[CONFIG_ENV_VAR] = writeConfig('env.yaml', 'dealer');
    const explicit = writeConfig('explicit.yaml', 'croupier');

    expect(findConfigFile(explicit)).toBe(explicit);
    expect(loadConfig(explicit).services.map((s) => s.name)).toEqual(['croupier']);
  });

  it('should fail on a missing explicit file', () => {
    expect(() => loadConfig(path.join(tmpDir, 'absent.yaml'))).toThrow(/ENOENT/);
  });
});
