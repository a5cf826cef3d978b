import { CoreError, isErrorKind, messages, type ErrorKind } from '../errors.js';
import type { CommandResult } from './types.js';

export function ok(message: string, data?: Record<string, unknown>): CommandResult {
  return data === undefined ? { success: true, message } : { success: true, message, data };
}

export function fail(kind: ErrorKind, message: string, data?: Record<string, unknown>): CommandResult {
  const result: CommandResult = { success: false, message, error: { kind, message } };
  if (data !== undefined) result.data = data;
  return result;
}

/** Failed result for anything thrown; taxonomy errors keep their kind. */
export function fromError(err: unknown): CommandResult {
  if (err instanceof CoreError) return fail(err.kind, err.message);
  const text = err instanceof Error ? err.message : String(err);
  return fail('ExecutionError', messages.executionError(text || 'unknown error'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isCommandResult(value: unknown): value is CommandResult {
  if (!isRecord(value)) return false;
  if (typeof value.success !== 'boolean' || typeof value.message !== 'string') return false;
  if (value.data !== undefined && !isRecord(value.data)) return false;
  if (value.error !== undefined) {
    if (!isRecord(value.error) || !isErrorKind(value.error.kind) || typeof value.error.message !== 'string') {
      return false;
    }
  }
  return true;
}

/**
 * Handlers from plugin modules are not type-checked; anything that is
 * not a CommandResult becomes a success carrying its text.
 */
export function normalizeResult(value: unknown): CommandResult {
  if (isCommandResult(value)) {
    if (!value.success && !value.error) return fail('ExecutionError', value.message, value.data);
    return value;
  }
  if (value === undefined || value === null) return ok('');
  if (typeof value === 'string') return ok(value);
  return isRecord(value) ? ok('', { value }) : ok(String(value));
}
