import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '@media-api/core';
import { createClient, resolveSources } from '../src/lib/client.js';
import { getConfigPath, writeConfig } from '../src/lib/config-store.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-api-test-'));
  if (process.platform === 'win32') {
    vi.stubEnv('APPDATA', tmpDir);
  } else if (process.platform === 'darwin') {
    vi.stubEnv('HOME', tmpDir);
  } else {
    vi.stubEnv('XDG_CONFIG_HOME', tmpDir);
  }
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('resolveSources', () => {
  it('starts from the user config file', () => {
    expect(resolveSources({})).toEqual([{ kind: 'file', path: getConfigPath() }]);
  });

  it('adds --config, then command-line overrides', () => {
    const sources = resolveSources({
      config: 'unix:alice',
      server: 'https://ms.example.com',
      'api-key': 'test-secret',
      verbose: true,
    });
    expect(sources).toEqual([
      { kind: 'file', path: getConfigPath() },
      { kind: 'managed', user: 'alice' },
      {
        kind: 'inline',
        values: { SERVER_URL: 'https://ms.example.com', API_KEY: 'test-secret', LOG_LEVEL: 'DEBUG' },
      },
    ]);
  });

  it('treats other --config values as file paths', () => {
    const sources = resolveSources({ config: '/etc/media/config.json' });
    expect(sources[1]).toEqual({ kind: 'file', path: '/etc/media/config.json' });
    expect(sources).toHaveLength(2);
  });
});

describe('createClient', () => {
  it('layers the flags over the stored configuration', async () => {
    writeConfig({ SERVER_URL: 'https://old.example.com', API_KEY: 'test-secret', TIMEOUT: 30 });
    const client = await createClient({ server: 'https://ms.example.com/' });

    expect(client.config.SERVER_URL).toBe('https://ms.example.com');
    expect(client.config.API_KEY).toBe('test-secret');
    expect(client.config.TIMEOUT).toBe(30);
    await client.close();
  });

  it('defers configuration errors to the first call', async () => {
    const client = await createClient({});
    expect(() => client.config).toThrow(ConfigurationError);
    await expect(client.checkServer()).rejects.toThrow('The value of "SERVER_URL" is not set. Please configure it.');
    await client.close();
  });
});
