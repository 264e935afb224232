import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigurationError,
  ConfigurationSource,
  DEFAULT_CHUNK_SIZE,
  loadConfiguration,
  managedSettingsPath,
  parseConfigurationSource,
  stripJsonComments,
  updateConfigurationFile,
  validateConfiguration,
} from '../src/index.js';

const BASE = { SERVER_URL: 'https://ms.example.com', API_KEY: 'test-secret' };

describe('validateConfiguration', () => {
  it('fills in defaults', () => {
    const conf = validateConfiguration(BASE);
    expect(conf).toMatchObject({
      SERVER_URL: 'https://ms.example.com',
      API_KEY: 'test-secret',
      CLIENT_ID: 'media-api-client_<host>',
      LOG_LEVEL: 'INFO',
      LANGUAGE: 'en',
      TIMEOUT: 10,
      VERIFY_SSL: true,
      PROXIES: null,
      MAX_RETRY: 3,
      RETRY_EXCEPT: [403, 404],
      RETRY_DELAY: 3,
      UPLOAD_CHUNK_SIZE: DEFAULT_CHUNK_SIZE,
      UPLOAD_MAX_FILES: 100,
      API_KEY_LOCATION: 'header',
      API_PREFIX: '/api/v2',
    });
    expect(DEFAULT_CHUNK_SIZE).toBe(25 * 1024 * 1024);
  });

  it('strips whitespace and trailing slashes from the server URL', () => {
    expect(validateConfiguration({ ...BASE, SERVER_URL: ' https://ms.example.com/// ' }).SERVER_URL).toBe(
      'https://ms.example.com'
    );
  });

  it('returns a frozen value', () => {
    const conf = validateConfiguration({ ...BASE, PROXIES: { https: 'http://proxy.example.com:3128' } });
    expect(Object.isFrozen(conf)).toBe(true);
    expect(Object.isFrozen(conf.RETRY_EXCEPT)).toBe(true);
    expect(Object.isFrozen(conf.PROXIES)).toBe(true);
  });

  it('treats undefined values as unset', () => {
    expect(validateConfiguration({ ...BASE, TIMEOUT: undefined }).TIMEOUT).toBe(10);
  });

  it('is valid exactly when SERVER_URL and API_KEY are both set', () => {
    const cases: Array<[string, string, boolean]> = [
      ['https://ms.example.com', 'test-secret', true],
      ['https://ms.example.com', '', false],
      ['https://ms.example.com', ' ', true],
      ['https://ms.example.com', '   ', true],
      ['', 'test-secret', false],
      ['/', 'test-secret', false],
      ['', '', false],
    ];
    for (const [SERVER_URL, API_KEY, valid] of cases) {
      const attempt = () => validateConfiguration({ SERVER_URL, API_KEY });
      if (valid) expect(attempt).not.toThrow();
      else expect(attempt).toThrow(ConfigurationError);
    }
  });

  it('keeps a blank-looking API key as given', () => {
    expect(validateConfiguration({ ...BASE, API_KEY: ' ' }).API_KEY).toBe(' ');
  });

  it('names the missing key', () => {
    expect(() => validateConfiguration({ API_KEY: 'test-secret' })).toThrow(
      'The value of "SERVER_URL" is not set. Please configure it.'
    );
    expect(() => validateConfiguration({ SERVER_URL: 'https://ms.example.com' })).toThrow(
      'The value of "API_KEY" is not set. Please configure it.'
    );
  });

  it('rejects values of the wrong type', () => {
    expect(() => validateConfiguration({ ...BASE, TIMEOUT: '10' })).toThrow(
      'Invalid configuration: "TIMEOUT" expected number, received string.'
    );
    expect(() => validateConfiguration({ ...BASE, API_KEY_LOCATION: 'cookie' })).toThrow(ConfigurationError);
    expect(() => validateConfiguration({ ...BASE, MAX_RETRY: -1 })).toThrow(ConfigurationError);
    expect(() => validateConfiguration({ ...BASE, UPLOAD_CHUNK_SIZE: 0 })).toThrow(ConfigurationError);
  });
});

describe('parseConfigurationSource', () => {
  it('recognises the three kinds', () => {
    expect(parseConfigurationSource({ SERVER_URL: 'x' })).toEqual({ kind: 'inline', values: { SERVER_URL: 'x' } });
    expect(parseConfigurationSource('unix:alice')).toEqual({ kind: 'managed', user: 'alice' });
    expect(parseConfigurationSource('/etc/media/config.json')).toEqual({ kind: 'file', path: '/etc/media/config.json' });
  });
});

describe('stripJsonComments', () => {
  it('drops comment lines but keeps URLs', () => {
    const input = '{\n  // the server\n  "SERVER_URL": "https://ms.example.com"\n}';
    expect(JSON.parse(stripJsonComments(input))).toEqual({ SERVER_URL: 'https://ms.example.com' });
  });
});

describe('loadConfiguration', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'media-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('layers sources over the defaults, later sources winning', async () => {
    const conf = await loadConfiguration(
      [
        ConfigurationSource.inline({ SERVER_URL: 'https://a.example.com', API_KEY: 'k', TIMEOUT: 5 }),
        ConfigurationSource.inline({ SERVER_URL: 'https://b.example.com' }),
      ],
      { hostname: 'box' }
    );
    expect(conf).toMatchObject({
      SERVER_URL: 'https://b.example.com',
      API_KEY: 'k',
      TIMEOUT: 5,
      MAX_RETRY: 3,
      CLIENT_ID: 'media-api-client_box',
    });
  });

  it('ignores inline keys starting with an underscore', async () => {
    const conf = await loadConfiguration([ConfigurationSource.inline({ _comment: 'x', API_KEY: 'k' })]);
    expect(conf).not.toHaveProperty('_comment');
    expect(conf.API_KEY).toBe('k');
  });

  it('reads a JSON file with comment lines', async () => {
    const filePath = path.join(tmpDir, 'config.json');
    await fs.writeFile(
      filePath,
      '{\n    // production\n    "SERVER_URL": "https://ms.example.com",\n    "API_KEY": "test-secret"\n}\n'
    );
    const conf = await loadConfiguration([ConfigurationSource.file(filePath)]);
    expect(conf.SERVER_URL).toBe('https://ms.example.com');
    expect(conf.API_KEY).toBe('test-secret');
  });

  it('uses the defaults when the file does not exist or is empty', async () => {
    const emptyPath = path.join(tmpDir, 'empty.json');
    await fs.writeFile(emptyPath, '\n');
    const conf = await loadConfiguration([
      ConfigurationSource.file(path.join(tmpDir, 'missing.json')),
      ConfigurationSource.file(emptyPath),
    ]);
    expect(conf.SERVER_URL).toBe('');
    expect(conf.TIMEOUT).toBe(10);
  });

  it('rejects invalid JSON and non-object documents', async () => {
    const badPath = path.join(tmpDir, 'bad.json');
    await fs.writeFile(badPath, '{ "SERVER_URL": ');
    await expect(loadConfiguration([ConfigurationSource.file(badPath)])).rejects.toThrow(
      `The config file "${badPath}" is not valid JSON.`
    );

    const listPath = path.join(tmpDir, 'list.json');
    await fs.writeFile(listPath, '[1, 2]');
    await expect(loadConfiguration([ConfigurationSource.file(listPath)])).rejects.toThrow(
      `The configuration in "${listPath}" is not an object.`
    );
  });

  it('reads the URL and master key of a server instance', async () => {
    const settingsPath = managedSettingsPath('alice', tmpDir);
    expect(settingsPath).toBe(path.join(tmpDir, 'alice', 'msinstance', 'conf', 'mssettings.py'));
    await fs.mkdir(path.dirname(settingsPath), { recursive: true });
    await fs.writeFile(
      settingsPath,
      "DEBUG = False\nSITE_URL = 'https://ms.example.com'\nMASTER_API_KEY = \"test-secret\"\n"
    );

    const conf = await loadConfiguration([ConfigurationSource.managed('alice', tmpDir)]);
    expect(conf.SERVER_URL).toBe('https://ms.example.com');
    expect(conf.API_KEY).toBe('test-secret');
  });

  it('reports what is missing from an instance', async () => {
    await expect(loadConfiguration([ConfigurationSource.managed(' ', tmpDir)])).rejects.toThrow(
      'Invalid unix user provided.'
    );

    const settingsPath = managedSettingsPath('bob', tmpDir);
    await expect(loadConfiguration([ConfigurationSource.managed('bob', tmpDir)])).rejects.toThrow(
      `Instance settings file "${settingsPath}" does not exist.`
    );

    await fs.mkdir(path.dirname(settingsPath), { recursive: true });
    await fs.writeFile(settingsPath, "SITE_URL = 'https://ms.example.com'\n");
    await expect(loadConfiguration([ConfigurationSource.managed('bob', tmpDir)])).rejects.toThrow(
      'Failed to get master API key from instance settings.'
    );
  });
});

describe('updateConfigurationFile', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'media-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates the file and keeps keys sorted', async () => {
    const filePath = path.join(tmpDir, 'nested', 'config.json');
    await updateConfigurationFile(filePath, 'SERVER_URL', 'https://ms.example.com');
    await updateConfigurationFile(filePath, 'API_KEY', 'test-secret');

    expect(await fs.readFile(filePath, 'utf-8')).toBe(
      '{\n    "API_KEY": "test-secret",\n    "SERVER_URL": "https://ms.example.com"\n}\n'
    );
  });

  it('refuses to overwrite a file that is not a JSON object', async () => {
    const filePath = path.join(tmpDir, 'config.json');
    await fs.writeFile(filePath, '[]');
    await expect(updateConfigurationFile(filePath, 'API_KEY', 'k')).rejects.toBeInstanceOf(ConfigurationError);
  });
});
