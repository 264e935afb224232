import { ValidationError } from '@media-api/core';
import type { HttpMethod } from '@media-api/core';

export interface ParsedFlags {
  [key: string]: string | string[] | boolean | undefined;
}

export interface ParsedArgs {
  command: string;
  args: string[];
  flags: ParsedFlags;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['help', 'version', 'quiet', 'json', 'verbose']);

function isBooleanFlag(arg: string): boolean {
  return arg.startsWith('--no-') || BOOLEAN_FLAGS.has(arg.replace(/^-+/, ''));
}

export function parseArgs(argv: string[]): ParsedArgs {
  // Skip node executable and script path
  const raw = argv.slice(2);

  // Find the command: first positional arg that isn't a flag or flag value
  let command = '';
  let commandIndex = -1;
  for (let i = 0; i < raw.length; i++) {
    const arg = raw[i];
    if (arg === '--') break;
    if (arg.startsWith('-')) {
      if (isBooleanFlag(arg)) continue;
      // Skip value flags and their value
      if (arg.startsWith('--') || arg.length === 2) i++;
      continue;
    }
    command = arg;
    commandIndex = i;
    break;
  }

  const rest = commandIndex >= 0
    ? [...raw.slice(0, commandIndex), ...raw.slice(commandIndex + 1)]
    : raw;

  const args: string[] = [];
  const flags: ParsedFlags = {};

  const setValue = (key: string, value: string): void => {
    const existing = flags[key];
    if (existing === undefined || typeof existing === 'boolean') {
      flags[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      // Already set - convert to array for repeatable flags
      flags[key] = [existing, value];
    }
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--') {
      args.push(...rest.slice(i + 1));
      break;
    }

    if (arg.startsWith('--no-')) {
      flags[arg.slice(5)] = false;
      continue;
    }

    const isLong = arg.startsWith('--');
    if (isLong || (arg.startsWith('-') && arg.length === 2)) {
      const key = arg.slice(isLong ? 2 : 1);
      const next = rest[i + 1];

      if (BOOLEAN_FLAGS.has(key) || next === undefined || next.startsWith('-')) {
        flags[key] = true;
        continue;
      }

      i++;
      setValue(key, next);
      continue;
    }

    args.push(arg);
  }

  return { command, args, flags };
}

export function getFlag(flags: ParsedFlags, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const val = flags[key];
    if (typeof val === 'string') return val;
    if (Array.isArray(val)) return val[val.length - 1];
  }
  return undefined;
}

export function getFlagArray(flags: ParsedFlags, ...keys: string[]): string[] {
  for (const key of keys) {
    const val = flags[key];
    if (Array.isArray(val)) return val;
    if (typeof val === 'string') return [val];
  }
  return [];
}

export function hasFlag(flags: ParsedFlags, ...keys: string[]): boolean {
  return keys.some(k => flags[k] !== undefined);
}

/**
 * Parse repeated "key=value" arguments. The value may itself contain "=".
 */
export function parseKeyValues(items: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const item of items) {
    const sep = item.indexOf('=');
    if (sep <= 0) {
      throw new ValidationError(`Invalid parameter: "${item}". Expected key=value.`);
    }
    result[item.slice(0, sep)] = item.slice(sep + 1);
  }
  return result;
}

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE'];

export function parseHttpMethod(input: string): HttpMethod {
  const upper = input.toUpperCase();
  const method = HTTP_METHODS.find(m => m === upper);
  if (!method) {
    throw new ValidationError(`Invalid HTTP method: "${input}". Use one of ${HTTP_METHODS.join(', ')}.`);
  }
  return method;
}
