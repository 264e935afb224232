import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import {
  AbortError,
  ApiError,
  ConfigurationError,
  ConnectionError,
  HttpStatusError,
  MediaClientError,
  TimeoutError,
  UploadError,
  ValidationError,
} from '@media-api/core';
import {
  displayError,
  EXIT_SUCCESS,
  EXIT_ERROR,
  EXIT_USAGE,
  EXIT_NETWORK,
  EXIT_PROTOCOL,
  EXIT_FS,
  EXIT_CANCELLED,
} from '../src/lib/errors.js';

const url = 'https://ms.example.com/api/v2/';

describe('exit codes', () => {
  it('has correct values', () => {
    expect(EXIT_SUCCESS).toBe(0);
    expect(EXIT_ERROR).toBe(1);
    expect(EXIT_USAGE).toBe(2);
    expect(EXIT_NETWORK).toBe(3);
    expect(EXIT_PROTOCOL).toBe(4);
    expect(EXIT_FS).toBe(5);
    expect(EXIT_CANCELLED).toBe(130);
  });
});

describe('displayError', () => {
  let errorSpy: MockInstance<typeof console.error>;

  // Suppress console output during tests
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string {
    return errorSpy.mock.calls.map((call) => call.join(' ')).join('\n');
  }

  it('returns EXIT_CANCELLED for AbortError', () => {
    expect(displayError(new AbortError())).toBe(EXIT_CANCELLED);
  });

  it('returns EXIT_USAGE with a hint for ConfigurationError', () => {
    expect(displayError(new ConfigurationError('The value of "API_KEY" is not set. Please configure it.'))).toBe(EXIT_USAGE);
    expect(printed()).toContain('The value of "API_KEY" is not set. Please configure it.');
    expect(printed()).toContain('msc config set SERVER_URL <url>');
  });

  it('returns EXIT_USAGE for ValidationError', () => {
    expect(displayError(new ValidationError('bad input'))).toBe(EXIT_USAGE);
  });

  it('returns EXIT_NETWORK for ConnectionError', () => {
    expect(displayError(new ConnectionError('connection failed', { url }))).toBe(EXIT_NETWORK);
  });

  it('returns EXIT_NETWORK for TimeoutError', () => {
    expect(displayError(new TimeoutError('timed out', { url }))).toBe(EXIT_NETWORK);
  });

  it('returns EXIT_NETWORK for HttpStatusError', () => {
    expect(displayError(new HttpStatusError('HTTP 500', { url, status: 500 }))).toBe(EXIT_NETWORK);
    expect(printed()).not.toContain('API key');
  });

  it('hints at the API key on 403', () => {
    expect(displayError(new HttpStatusError('HTTP 403', { url, status: 403 }))).toBe(EXIT_NETWORK);
    expect(printed()).toContain('Check that the API key is valid for this server.');
  });

  it('returns EXIT_PROTOCOL for ApiError and UploadError', () => {
    expect(displayError(new ApiError('remote_rejected', 'rejected', { url, status: 200 }))).toBe(EXIT_PROTOCOL);
    expect(displayError(new ApiError('invalid_response', 'not JSON', { url, status: 200 }))).toBe(EXIT_PROTOCOL);
    expect(displayError(new UploadError('no upload id'))).toBe(EXIT_PROTOCOL);
  });

  it('returns EXIT_ERROR for generic MediaClientError', () => {
    expect(displayError(new MediaClientError('something went wrong'))).toBe(EXIT_ERROR);
  });

  it('returns EXIT_FS for file system errors', () => {
    expect(displayError(new Error('ENOENT: no such file or directory'))).toBe(EXIT_FS);
    expect(displayError(new Error('EACCES: permission denied'))).toBe(EXIT_FS);
    expect(displayError(Object.assign(new Error('is a directory'), { code: 'EISDIR' }))).toBe(EXIT_FS);
  });

  it('returns EXIT_ERROR for generic errors', () => {
    expect(displayError(new Error('unknown error'))).toBe(EXIT_ERROR);
  });

  it('returns EXIT_ERROR for non-Error objects', () => {
    expect(displayError('string error')).toBe(EXIT_ERROR);
    expect(displayError(42)).toBe(EXIT_ERROR);
    expect(displayError(null)).toBe(EXIT_ERROR);
  });
});
