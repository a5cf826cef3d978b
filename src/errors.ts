/**
 * Error taxonomy shared by the supervisor, registry, dispatcher and CLI.
 *
 * Every failure the core reports carries a `kind` from this list and a
 * message produced by the matching entry in `messages`, so tooling can
 * match on the kind instead of free text.
 */

export const ERROR_KINDS = [
  'UnknownService',
  'AlreadyRunning',
  'StartupTimeout',
  'ProcessExitedEarly',
  'PortInUse',
  'StopFailed',
  'CommandNotFound',
  'AmbiguousCommand',
  'MissingOption',
  'InvalidOption',
  'UnknownOption',
  'DuplicatePlugin',
  'MissingDependency',
  'DependencyCycle',
  'CommandCollision',
  'InvalidPluginConfig',
  'InvalidPlugin',
  'UnknownPlugin',
  'ExecutionError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && ERROR_KINDS.some((kind) => kind === value);
}

export class CoreError extends Error {
  readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CoreError';
    this.kind = kind;
    this.details = details;
  }
}

// --- Stable messages ---

function quoted(path: string[], name: string): string {
  return [...path, name].join(' ');
}

export const messages = {
  unknownService: (name: string) => `Service "${name}" is not configured`,
  alreadyRunning: (name: string, pid: number) => `Service "${name}" is already running (PID ${pid})`,
  startupTimeout: (name: string, timeoutMs: number) =>
    `Service "${name}" did not become healthy within ${timeoutMs}ms`,
  processExitedEarly: (name: string, code: number | null) =>
    `Service "${name}" exited before becoming healthy (exit code ${code ?? 'unknown'})`,
  portInUse: (name: string, port: number) => `Port ${port} for service "${name}" is already in use`,
  stopFailed: (name: string, pid: number) => `Service "${name}" (PID ${pid}) survived SIGKILL`,
  commandNotFound: (plugin: string | undefined, group: string[], command: string) =>
    plugin
      ? `Command "${quoted(group, command)}" not found in plugin "${plugin}"`
      : `Command "${quoted(group, command)}" not found`,
  ambiguousCommand: (command: string, plugins: string[]) =>
    `Command "${command}" is provided by several plugins (${plugins.join(', ')}); prefix it with the plugin name`,
  missingOption: (option: string) => `Missing required option "--${option}"`,
  invalidOption: (option: string, expected: string, value: unknown) =>
    `Invalid value for "--${option}": expected ${expected}, got ${JSON.stringify(value)}`,
  unknownOption: (option: string, command: string) => `Unknown option "--${option}" for command "${command}"`,
  duplicatePlugin: (name: string) => `Plugin "${name}" is already registered`,
  missingDependency: (name: string, missing: string[]) =>
    `Plugin "${name}" depends on unregistered plugin(s): ${missing.join(', ')}`,
  dependencyCycle: (cycle: string[]) => `Circular plugin dependency: ${cycle.join(' -> ')}`,
  commandCollision: (plugin: string, path: string, owner: string) =>
    owner === plugin
      ? `Plugin "${plugin}" declares "${path}" more than once`
      : `Plugin "${plugin}" declares "${path}", already provided by plugin "${owner}"`,
  invalidPluginConfig: (name: string, problems: string[]) =>
    `Invalid configuration for plugin "${name}": ${problems.join('; ')}`,
  invalidPlugin: (name: string, problems: string[]) => `Invalid plugin "${name}": ${problems.join('; ')}`,
  unknownPlugin: (name: string) => `Plugin "${name}" is not registered`,
  requiredBy: (name: string, dependants: string[]) =>
    `Plugin "${name}" is required by: ${dependants.join(', ')}`,
  spawnFailed: (name: string, reason: string) => `Service "${name}" could not be launched: ${reason}`,
  executionError: (message: string) => `Command failed: ${message}`,
};

// --- Exit codes ---

const EXIT_CODES: Record<ErrorKind, number> = {
  ExecutionError: 1,
  MissingOption: 2,
  InvalidOption: 2,
  UnknownOption: 2,
  CommandNotFound: 3,
  AmbiguousCommand: 3,
  UnknownService: 3,
  AlreadyRunning: 4,
  PortInUse: 4,
  StartupTimeout: 5,
  ProcessExitedEarly: 5,
  StopFailed: 5,
  DuplicatePlugin: 6,
  MissingDependency: 6,
  DependencyCycle: 6,
  CommandCollision: 6,
  InvalidPluginConfig: 6,
  InvalidPlugin: 6,
  UnknownPlugin: 3,
};

export function exitCodeFor(kind: ErrorKind): number {
  return EXIT_CODES[kind];
}

// --- CLI formatting ---

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * js-yaml YAMLException shape, detected by `name` so the CLI does not
 * depend on the js-yaml class.
 */
interface YAMLExceptionLike extends Error {
  name: 'YAMLException';
  reason?: string;
  mark?: { name?: string | null; line?: number; column?: number };
}

export function isYAMLException(err: unknown): err is YAMLExceptionLike {
  return err instanceof Error && err.name === 'YAMLException';
}

/** Turn any thrown value into a single line for the terminal. */
export function formatCliError(err: unknown): string {
  if (isYAMLException(err)) {
    const reason = err.reason ?? 'invalid YAML syntax';
    const mark = err.mark;
    if (mark && mark.line != null) {
      const file = mark.name ? `${mark.name} ` : '';
      // js-yaml marks are 0-based
      return `Failed to parse YAML: ${reason} (${file}line ${mark.line + 1}, column ${(mark.column ?? 0) + 1})`;
    }
    return `Failed to parse YAML: ${reason}`;
  }

  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` "${err.path}"` : '';
    switch (err.code) {
      case 'ENOENT':
        return `File not found:${filePath}`;
      case 'EACCES':
      case 'EPERM':
        return `Permission denied:${filePath}`;
      default:
        return `System error (${err.code}):${filePath} ${err.message}`;
    }
  }

  if (err instanceof Error) {
    return err.message.split('\n')[0];
  }
  return String(err);
}
