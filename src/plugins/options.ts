/**
 * Option validation & coercion for the dispatcher.
 * Raw values arrive as strings from the CLI or as typed values from code.
 */

import { CoreError, messages } from '../errors.js';
import type { OptionDefinition, OptionType, OptionValue } from './types.js';

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

const EXPECTED: Record<OptionType, string> = {
  string: 'a string',
  int: 'an integer',
  float: 'a number',
  bool: 'a boolean',
  flag: 'a boolean',
  choice: 'one of the listed choices',
};

/** Coerce one raw value; `undefined` means the value cannot be coerced. */
export function coerceOption(def: OptionDefinition, raw: unknown): OptionValue | undefined {
  switch (def.type) {
    case 'string':
      if (typeof raw === 'string') return raw;
      if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
      return undefined;

    case 'int': {
      if (typeof raw === 'number') return Number.isSafeInteger(raw) ? raw : undefined;
      if (typeof raw !== 'string' || !/^[-+]?\d+$/.test(raw.trim())) return undefined;
      // beyond 2^53 parseInt silently rounds
      const value = Number.parseInt(raw, 10);
      return Number.isSafeInteger(value) ? value : undefined;
    }

    case 'float': {
      if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined;
      if (typeof raw !== 'string' || raw.trim() === '') return undefined;
      const value = Number(raw);
      return Number.isFinite(value) ? value : undefined;
    }

    case 'bool':
    case 'flag': {
      if (typeof raw === 'boolean') return raw;
      const word = String(raw).trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
      return undefined;
    }

    case 'choice':
      return typeof raw === 'string' && def.choices?.includes(raw) ? raw : undefined;
  }
}

function expectedFor(def: OptionDefinition): string {
  return def.type === 'choice' && def.choices ? `one of ${def.choices.join(', ')}` : EXPECTED[def.type];
}

/**
 * Validate supplied options against their definitions and fill defaults.
 * Unknown names are reported first, then each definition in order.
 */
export function resolveOptions(
  command: string,
  defs: OptionDefinition[],
  supplied: Record<string, unknown>,
): Record<string, OptionValue> {
  const known = new Set(defs.map((d) => d.name));
  for (const name of Object.keys(supplied)) {
    if (!known.has(name)) {
      throw new CoreError('UnknownOption', messages.unknownOption(name, command), { option: name });
    }
  }

  const resolved: Record<string, OptionValue> = {};
  for (const def of defs) {
    const raw = supplied[def.name];

    if (raw === undefined || raw === null) {
      if (def.required) {
        throw new CoreError('MissingOption', messages.missingOption(def.name), { option: def.name });
      }
      if (def.default !== undefined) resolved[def.name] = def.default;
      else if (def.type === 'flag') resolved[def.name] = false;
      continue;
    }

    const value = coerceOption(def, raw);
    if (value === undefined) {
      throw new CoreError('InvalidOption', messages.invalidOption(def.name, expectedFor(def), raw), {
        option: def.name,
      });
    }
    resolved[def.name] = value;
  }
  return resolved;
}
