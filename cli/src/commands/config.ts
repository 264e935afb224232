import { CONFIGURATION_KEYS } from '@media-api/core';
import type { ConfigurationKey } from '@media-api/core';
import type { ParsedFlags } from '../lib/parse.js';
import {
  formatConfigValue,
  readConfig,
  setConfigValue,
  getConfigValue,
  resetConfig,
  getConfigPath,
  getDefaults,
  validateConfigKey,
} from '../lib/config-store.js';
import { printHeader, printKeyValue, printSuccess, dim, printBlank } from '../lib/output.js';
import { exitUsage } from '../lib/errors.js';

function display(key: ConfigurationKey, value: unknown): string {
  return formatConfigValue(key, value) ?? dim('(not set)');
}

export async function run(args: string[], _flags: ParsedFlags): Promise<void> {
  const action = args[0];

  switch (action) {
    case 'set': {
      const key = args[1];
      const value = args.slice(2).join(' ');
      if (!key || !value) exitUsage('Usage: msc config set <key> <value>');
      const name = validateConfigKey(key);
      const stored = await setConfigValue(name, value);
      printSuccess(`${name} = ${display(name, stored)}`);
      break;
    }

    case 'get': {
      const key = args[1];
      if (!key) exitUsage('Usage: msc config get <key>');
      const name = validateConfigKey(key);
      console.log(display(name, getConfigValue(name)));
      break;
    }

    case 'list': {
      const config = readConfig();
      const defaults = getDefaults();
      printHeader('Media API Configuration');

      for (const key of CONFIGURATION_KEYS) {
        const isDefault = !(key in config);
        const val = isDefault ? defaults[key] : config[key];
        const shown = display(key, val);
        printKeyValue(key, isDefault ? dim(shown) : shown);
      }

      printBlank();
      console.log(`  ${dim(`Config file: ${getConfigPath()}`)}`);
      printBlank();
      break;
    }

    case 'reset': {
      resetConfig();
      printSuccess('Configuration reset to defaults.');
      break;
    }

    case 'path': {
      console.log(getConfigPath());
      break;
    }

    default:
      exitUsage(
        action
          ? `Unknown config action: "${action}". Use: set, get, list, reset, or path.`
          : 'Usage: msc config <set|get|list|reset|path>',
      );
  }
}
