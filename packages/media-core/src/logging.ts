import type { LoggerFn, LogLevel } from './types.js';

type LoggerLevel = Parameters<LoggerFn>[0];

const LEVEL_RANK: Record<LoggerLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const CONFIG_LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export const noopLogger: LoggerFn = () => { };

/**
 * Wrap a logger so that messages below `minLevel` are dropped.
 */
export function filterLogger(logger: LoggerFn, minLevel: LogLevel): LoggerFn {
  const min = CONFIG_LEVEL_RANK[minLevel];
  return (level, message, meta) => {
    if (LEVEL_RANK[level] < min) return;
    logger(level, message, meta);
  };
}

/**
 * Logger writing "<iso time> <name> <LEVEL> <message>" lines to stderr.
 */
export function createConsoleLogger(name = 'media-api', write: (line: string) => void = (line) => process.stderr.write(line + '\n')): LoggerFn {
  return (level, message, meta) => {
    let line = `${new Date().toISOString()} ${name} ${level.toUpperCase()} ${message}`;
    if (meta !== undefined) {
      line += ` ${meta instanceof Error ? meta.message : JSON.stringify(meta)}`;
    }
    write(line);
  };
}
