import { z } from 'zod';
import {
  DEFAULT_API_PREFIX,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CLIENT_ID,
  DEFAULT_MAX_RETRY,
  DEFAULT_RETRY_DELAY_SECONDS,
  DEFAULT_RETRY_EXCEPT,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_UPLOAD_MAX_FILES,
} from '../constants.js';
import { ConfigurationError } from '../errors.js';
import type { Configuration, RawConfiguration } from '../types.js';

/**
 * Values used for every key a source leaves unset. SERVER_URL and API_KEY have
 * no usable default.
 */
export const DEFAULT_CONFIGURATION: RawConfiguration = Object.freeze({
  SERVER_URL: '',
  API_KEY: '',
  CLIENT_ID: DEFAULT_CLIENT_ID,
  LOG_LEVEL: 'INFO',
  LANGUAGE: 'en',
  TIMEOUT: DEFAULT_TIMEOUT_SECONDS,
  VERIFY_SSL: true,
  PROXIES: null,
  MAX_RETRY: DEFAULT_MAX_RETRY,
  RETRY_EXCEPT: [...DEFAULT_RETRY_EXCEPT],
  RETRY_DELAY: DEFAULT_RETRY_DELAY_SECONDS,
  UPLOAD_CHUNK_SIZE: DEFAULT_CHUNK_SIZE,
  UPLOAD_MAX_FILES: DEFAULT_UPLOAD_MAX_FILES,
  API_KEY_LOCATION: 'header',
  API_PREFIX: DEFAULT_API_PREFIX,
});

export const configurationSchema = z.object({
  SERVER_URL: z.string(),
  API_KEY: z.string(),
  CLIENT_ID: z.string(),
  LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']),
  LANGUAGE: z.string().nullable(),
  TIMEOUT: z.number().positive(),
  VERIFY_SSL: z.boolean(),
  PROXIES: z.record(z.string()).nullable(),
  MAX_RETRY: z.number().int().min(0),
  RETRY_EXCEPT: z.array(z.number().int()),
  RETRY_DELAY: z.number().min(0),
  UPLOAD_CHUNK_SIZE: z.number().int().positive(),
  UPLOAD_MAX_FILES: z.number().int().positive(),
  API_KEY_LOCATION: z.enum(['header', 'query']),
  API_PREFIX: z.string(),
});

export const CONFIGURATION_KEYS: readonly (keyof Configuration)[] = configurationSchema.keyof().options;

function withoutUndefined(raw: RawConfiguration): RawConfiguration {
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));
}

/**
 * Check a raw configuration and return the frozen value the client runs on.
 * Pure: performs no I/O.
 *
 * @throws {ConfigurationError} If a key has the wrong type, SERVER_URL is
 * blank or API_KEY is empty.
 */
export function validateConfiguration(raw: RawConfiguration): Configuration {
  const parsed = configurationSchema.safeParse({ ...DEFAULT_CONFIGURATION, ...withoutUndefined(raw) });
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `"${issue.path.join('.')}" ${issue.message.toLowerCase()}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${summary}.`, { details: parsed.error.issues });
  }

  const conf = parsed.data;
  const serverUrl = conf.SERVER_URL.trim().replace(/\/+$/, '');
  if (!serverUrl) {
    throw new ConfigurationError('The value of "SERVER_URL" is not set. Please configure it.');
  }
  if (conf.API_KEY === '') {
    throw new ConfigurationError('The value of "API_KEY" is not set. Please configure it.');
  }

  const validated: Configuration = {
    ...conf,
    SERVER_URL: serverUrl,
    PROXIES: conf.PROXIES ? Object.freeze({ ...conf.PROXIES }) : null,
    RETRY_EXCEPT: Object.freeze([...conf.RETRY_EXCEPT]),
  };
  return Object.freeze(validated);
}
