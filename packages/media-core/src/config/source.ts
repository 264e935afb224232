import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { HOST_PLACEHOLDER } from '../constants.js';
import { ConfigurationError } from '../errors.js';
import { noopLogger } from '../logging.js';
import type { LoggerFn, RawConfiguration } from '../types.js';
import { isJsonObject } from '../utils/network.js';
import { DEFAULT_CONFIGURATION } from './validate.js';

/**
 * Where a configuration comes from.
 */
export type ConfigurationSource =
  | { readonly kind: 'inline'; readonly values: RawConfiguration }
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'managed'; readonly user: string; readonly root?: string };

/**
 * ConfigurationSource factory functions.
 */
export const ConfigurationSource = {
  inline(values: RawConfiguration): ConfigurationSource {
    return { kind: 'inline', values };
  },
  file(filePath: string): ConfigurationSource {
    return { kind: 'file', path: filePath };
  },
  managed(user: string, root?: string): ConfigurationSource {
    return root === undefined ? { kind: 'managed', user } : { kind: 'managed', user, root };
  },
};

const MANAGED_PREFIX = 'unix:';

/**
 * Interpret a user-supplied value: a mapping is inline, "unix:<user>" is a
 * managed lookup, any other string is a file path.
 */
export function parseConfigurationSource(value: string | RawConfiguration): ConfigurationSource {
  if (typeof value !== 'string') return ConfigurationSource.inline(value);
  if (value.startsWith(MANAGED_PREFIX)) {
    return ConfigurationSource.managed(value.slice(MANAGED_PREFIX.length));
  }
  return ConfigurationSource.file(value);
}

/** Drop "//" comment lines from a JSON configuration file. */
export function stripJsonComments(content: string): string {
  return content.replace(/(^|\n)\s*\/\/.*/g, '$1');
}

async function readConfigurationFile(filePath: string, logger: LoggerFn): Promise<RawConfiguration> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger('debug', `Config file "${filePath}" does not exist.`);
      return {};
    }
    throw new ConfigurationError(`Failed to read config file "${filePath}".`, { cause: err });
  }

  const cleaned = stripJsonComments(content).trim();
  if (!cleaned) {
    logger('debug', `Config file "${filePath}" is empty.`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new ConfigurationError(`The config file "${filePath}" is not valid JSON.`, { cause: err });
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`The configuration in "${filePath}" is not an object.`);
  }
  logger('debug', `Config file "${filePath}" loaded.`);
  return parsed;
}

export function managedSettingsPath(user: string, root = '/home'): string {
  return path.join(root, user, 'msinstance', 'conf', 'mssettings.py');
}

function extractSetting(content: string, name: string): string | undefined {
  const match = new RegExp(`^${name}\\s*=\\s*['"](.*)['"]\\s*$`, 'm').exec(content);
  return match?.[1];
}

/**
 * Read the server URL and master key from a server instance's settings file.
 */
async function readManagedConfiguration(user: string, root: string | undefined, logger: LoggerFn): Promise<RawConfiguration> {
  const name = user.trim();
  if (!name) throw new ConfigurationError('Invalid unix user provided.');

  const settingsPath = managedSettingsPath(name, root);
  let content: string;
  try {
    content = (await fs.readFile(settingsPath, 'utf-8')).replace(/\r/g, '');
  } catch (err) {
    throw new ConfigurationError(`Instance settings file "${settingsPath}" does not exist.`, { cause: err });
  }
  logger('info', `Retrieving configuration from user "${name}" instance.`);

  const siteUrl = extractSetting(content, 'SITE_URL');
  if (siteUrl === undefined) {
    throw new ConfigurationError('Failed to get site URL from instance settings.');
  }
  const masterKey = extractSetting(content, 'MASTER_API_KEY');
  if (masterKey === undefined) {
    throw new ConfigurationError('Failed to get master API key from instance settings.');
  }
  return { SERVER_URL: siteUrl, API_KEY: masterKey };
}

async function readSource(source: ConfigurationSource, logger: LoggerFn): Promise<RawConfiguration> {
  switch (source.kind) {
    case 'inline':
      return Object.fromEntries(Object.entries(source.values).filter(([key]) => !key.startsWith('_')));
    case 'file':
      return readConfigurationFile(source.path, logger);
    case 'managed':
      return readManagedConfiguration(source.user, source.root, logger);
  }
}

/**
 * Layer the given sources, in order, over the defaults. The result still has
 * to go through `validateConfiguration()`.
 */
export async function loadConfiguration(
  sources: readonly ConfigurationSource[],
  opts: { logger?: LoggerFn; hostname?: string } = {}
): Promise<RawConfiguration> {
  const logger = opts.logger ?? noopLogger;
  let conf: RawConfiguration = { ...DEFAULT_CONFIGURATION };
  for (const source of sources) {
    conf = { ...conf, ...(await readSource(source, logger)) };
  }
  if (typeof conf.CLIENT_ID === 'string') {
    conf.CLIENT_ID = conf.CLIENT_ID.replace(HOST_PLACEHOLDER, opts.hostname ?? os.hostname());
  }
  return conf;
}

/**
 * Set one key in a JSON configuration file, creating the file if needed.
 */
export async function updateConfigurationFile(
  filePath: string,
  key: string,
  value: unknown,
  logger: LoggerFn = noopLogger
): Promise<void> {
  let data: RawConfiguration = {};
  try {
    const cleaned = stripJsonComments(await fs.readFile(filePath, 'utf-8')).trim();
    if (cleaned) {
      const parsed: unknown = JSON.parse(cleaned);
      if (!isJsonObject(parsed)) {
        throw new ConfigurationError(`The configuration in "${filePath}" is not an object.`);
      }
      data = parsed;
    }
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw new ConfigurationError(`Failed to read config file "${filePath}".`, { cause: err });
    }
  }

  data[key] = value;
  const sorted = Object.fromEntries(Object.keys(data).sort().map((k) => [k, data[k]]));
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(sorted, null, 4) + '\n', 'utf-8');
  logger('info', `Configuration file "${filePath}" updated: "${key}" set.`);
}
