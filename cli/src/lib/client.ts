import {
  ConfigurationSource,
  MediaServerClient,
  createConsoleLogger,
  parseConfigurationSource,
} from '@media-api/core';
import type { RawConfiguration } from '@media-api/core';
import { getConfigPath } from './config-store.js';
import { getFlag, hasFlag, type ParsedFlags } from './parse.js';

/**
 * Configuration sources, lowest precedence first: the user's config file,
 * then `--config`, then `--server` / `--api-key`.
 */
export function resolveSources(flags: ParsedFlags): ConfigurationSource[] {
  const sources: ConfigurationSource[] = [ConfigurationSource.file(getConfigPath())];

  const configFlag = getFlag(flags, 'config');
  if (configFlag) sources.push(parseConfigurationSource(configFlag));

  const overrides: RawConfiguration = {};
  const server = getFlag(flags, 'server');
  const apiKey = getFlag(flags, 'api-key');
  if (server) overrides.SERVER_URL = server;
  if (apiKey) overrides.API_KEY = apiKey;
  if (hasFlag(flags, 'verbose')) overrides.LOG_LEVEL = 'DEBUG';
  if (Object.keys(overrides).length > 0) sources.push(ConfigurationSource.inline(overrides));

  return sources;
}

export async function createClient(flags: ParsedFlags): Promise<MediaServerClient> {
  const verbose = hasFlag(flags, 'verbose');
  return MediaServerClient.fromSources(resolveSources(flags), {
    ...(verbose ? { logger: createConsoleLogger('msc') } : {}),
  });
}
