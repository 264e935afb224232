import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  CONFIGURATION_KEYS,
  ConfigurationError,
  DEFAULT_CONFIGURATION,
  ValidationError,
  configurationSchema,
  isJsonObject,
  stripJsonComments,
  updateConfigurationFile,
} from '@media-api/core';
import type { ConfigurationKey, RawConfiguration } from '@media-api/core';

const NUMBER_KEYS = new Set<ConfigurationKey>(['TIMEOUT', 'MAX_RETRY', 'RETRY_DELAY', 'UPLOAD_CHUNK_SIZE', 'UPLOAD_MAX_FILES']);
const SECRET_KEYS = new Set<ConfigurationKey>(['API_KEY']);

function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming'), 'media-api');
  }
  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'media-api');
  }
  return path.join(process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'media-api');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Values stored in the user's configuration file. Keys left unset there are
 * absent, not defaulted.
 */
export function readConfig(): RawConfiguration {
  const configPath = getConfigPath();
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }

  const cleaned = stripJsonComments(raw).trim();
  if (!cleaned) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new ConfigurationError(`The config file "${configPath}" is not valid JSON.`, { cause: err });
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`The configuration in "${configPath}" is not an object.`);
  }
  return parsed;
}

export function writeConfig(config: RawConfiguration): void {
  const configPath = getConfigPath();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 4) + '\n', 'utf-8');
}

export function getConfigValue(key: string): unknown {
  const name = validateConfigKey(key);
  const stored = readConfig();
  return name in stored ? stored[name] : DEFAULT_CONFIGURATION[name];
}

/**
 * Text shown for a configuration value, with secrets masked. Null when the
 * value is unset.
 */
export function formatConfigValue(key: ConfigurationKey, value: unknown): string | null {
  if (value === undefined || value === '') return null;
  if (SECRET_KEYS.has(key)) return '********';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Turn the command-line text for `key` into the value stored in the file.
 * @throws {ValidationError} If the text is not a valid value for `key`.
 */
export function coerceConfigValue(key: ConfigurationKey, input: string): unknown {
  let value: unknown = input;

  if (NUMBER_KEYS.has(key)) {
    value = input.trim() === '' ? NaN : Number(input);
  } else if (key === 'VERIFY_SSL') {
    const lower = input.trim().toLowerCase();
    if (['true', 'yes', 'on', '1'].includes(lower)) value = true;
    else if (['false', 'no', 'off', '0'].includes(lower)) value = false;
  } else if (key === 'RETRY_EXCEPT') {
    value = input.split(',').map(s => s.trim()).filter(Boolean).map(Number);
  } else if (key === 'PROXIES') {
    if (input === 'null' || input === '') {
      value = null;
    } else {
      try {
        value = JSON.parse(input);
      } catch (err) {
        throw new ValidationError(`Invalid value for PROXIES: expected a JSON object such as {"https": "http://proxy:3128"}.`, { cause: err });
      }
    }
  } else if (key === 'LANGUAGE' && input === 'null') {
    value = null;
  } else if (key === 'LOG_LEVEL' || key === 'API_KEY_LOCATION') {
    value = key === 'LOG_LEVEL' ? input.toUpperCase() : input.toLowerCase();
  }

  const check = configurationSchema.shape[key].safeParse(value);
  if (!check.success) {
    const reason = check.error.issues[0]?.message ?? 'invalid value';
    throw new ValidationError(`Invalid value for ${key}: "${input}" (${reason.toLowerCase()}).`);
  }
  return check.data;
}

export async function setConfigValue(key: string, value: string): Promise<unknown> {
  const name = validateConfigKey(key);
  const coerced = coerceConfigValue(name, value);
  await updateConfigurationFile(getConfigPath(), name, coerced);
  return coerced;
}

export function resetConfig(): void {
  writeConfig({});
}

/**
 * Accepts keys in any case ("server_url" or "SERVER_URL").
 * @throws {ValidationError} If the key is not a configuration key.
 */
export function validateConfigKey(key: string): ConfigurationKey {
  const upper = key.toUpperCase();
  const name = CONFIGURATION_KEYS.find(k => k === upper);
  if (!name) {
    throw new ValidationError(`Unknown config key: "${key}". Valid keys: ${CONFIGURATION_KEYS.join(', ')}`);
  }
  return name;
}

export function getDefaults(): RawConfiguration {
  return { ...DEFAULT_CONFIGURATION };
}
