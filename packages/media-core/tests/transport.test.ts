import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { Agent, FormData, Response } from 'undici';
import type { RequestInit } from 'undici';
import {
  AbortError,
  ConnectionError,
  FetchTransport,
  HttpStatusError,
  TimeoutError,
} from '../src/index.js';
import type { FetchFn, TransportConfiguration } from '../src/index.js';

const CONFIG: TransportConfiguration = {
  SERVER_URL: 'https://ms.example.com',
  TIMEOUT: 10,
  VERIFY_SSL: true,
  PROXIES: null,
  LANGUAGE: 'en',
};

function replyWith(body: string, status = 200): Mock<FetchFn> {
  return vi.fn<FetchFn>(async () => new Response(body, { status, headers: { 'content-type': 'application/json' } }));
}

function initOf(fetchFn: Mock<FetchFn>): RequestInit {
  const call = fetchFn.mock.calls[0];
  expect(call).toBeDefined();
  return call[1];
}

describe('FetchTransport.send', () => {
  it('builds the query string and default headers', async () => {
    const fetchFn = replyWith('{"success": true}');
    const transport = new FetchTransport(CONFIG, { fetchFn });

    const raw = await transport.send({
      method: 'GET',
      url: 'https://ms.example.com/api/v2/medias/',
      params: { limit: 2, oid: ['v1', 'v2'] },
      headers: { 'api-key': 'test-secret' },
    });

    expect(fetchFn.mock.calls[0][0]).toBe('https://ms.example.com/api/v2/medias/?limit=2&oid=v1&oid=v2');
    const init = initOf(fetchFn);
    expect(init.method).toBe('GET');
    expect(init.body).toBeUndefined();
    expect(init.headers).toEqual({ Accept: 'application/json', 'Accept-Language': 'en', 'api-key': 'test-secret' });
    expect(raw).toMatchObject({ status: 200, text: '{"success": true}' });
    expect(raw.headers['content-type']).toBe('application/json');
  });

  it('sends mappings as JSON', async () => {
    const fetchFn = replyWith('{}');
    await new FetchTransport(CONFIG, { fetchFn }).send({
      method: 'POST',
      url: 'https://ms.example.com/api/v2/medias/add/',
      data: { title: 'Lecture', origin: 'test-client' },
    });

    const init = initOf(fetchFn);
    expect(init.body).toBe('{"title":"Lecture","origin":"test-client"}');
    expect(init.headers).toMatchObject({ 'Content-Type': 'application/json' });
  });

  it('sends files as multipart with the data as fields', async () => {
    const fetchFn = replyWith('{}');
    await new FetchTransport(CONFIG, { fetchFn }).send({
      method: 'POST',
      url: 'https://ms.example.com/api/v2/upload/',
      data: { upload_id: 'up-1', skipped: null },
      files: { file: { filename: 'clip.bin', content: new Uint8Array([1, 2, 3]) } },
    });

    const body = initOf(fetchFn).body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get('upload_id')).toBe('up-1');
    expect(body.has('skipped')).toBe(false);
    expect(body.has('file')).toBe(true);
  });

  it('turns a non-2xx status into HttpStatusError with the remote message', async () => {
    const fetchFn = replyWith('{"success": false, "error": "Server exploded.", "code": "E500"}', 500);
    const err = await new FetchTransport(CONFIG, { fetchFn })
      .send({ method: 'GET', url: 'https://ms.example.com/api/v2/medias/' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err).toMatchObject({
      status: 500,
      errorCode: 'E500',
      url: 'https://ms.example.com/api/v2/medias/',
      message: 'HTTP 500 error on "https://ms.example.com/api/v2/medias/": Server exploded.',
      payload: { success: false, error: 'Server exploded.', code: 'E500' },
    });
  });

  it('falls back to the body text for non-JSON errors', async () => {
    const fetchFn = replyWith('Bad gateway', 502);
    const err = await new FetchTransport(CONFIG, { fetchFn })
      .send({ method: 'GET', url: 'https://ms.example.com/api/v2/' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err).toMatchObject({
      message: 'HTTP 502 error on "https://ms.example.com/api/v2/": Bad gateway',
      bodySnippet: 'Bad gateway',
    });
  });

  it('masks the API key in error URLs', async () => {
    const fetchFn = replyWith('{"error": "Denied."}', 403);
    const err = await new FetchTransport(CONFIG, { fetchFn })
      .send({ method: 'GET', url: 'https://ms.example.com/api/v2/', params: { api_key: 'test-secret' } })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err).toMatchObject({
      url: 'https://ms.example.com/api/v2/?api_key=***',
      message: 'HTTP 403 error on "https://ms.example.com/api/v2/?api_key=***": Denied.',
    });
  });

  it('maps network failures to ConnectionError', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });
    const err = await new FetchTransport(CONFIG, { fetchFn })
      .send({ method: 'GET', url: 'https://ms.example.com/api/v2/' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ message: 'Connection error on "https://ms.example.com/api/v2/": fetch failed' });
  });

  it('maps an expired timeout to TimeoutError', async () => {
    const fetchFn = vi.fn<FetchFn>((_url, init) => new Promise((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    }));
    const err = await new FetchTransport(CONFIG, { fetchFn })
      .send({ method: 'GET', url: 'https://ms.example.com/api/v2/', timeout: 0.05 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: 'Request on "https://ms.example.com/api/v2/" timed out after 0.05s.' });
  });

  it('maps a caller abort to AbortError', async () => {
    const controller = new AbortController();
    const fetchFn = vi.fn<FetchFn>((_url, init) => new Promise((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      controller.abort();
    }));
    const err = await new FetchTransport(CONFIG, { fetchFn })
      .send({ method: 'GET', url: 'https://ms.example.com/api/v2/', signal: controller.signal })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AbortError);
  });

  it('uses an agent that skips certificate checks when VERIFY_SSL is off', async () => {
    const fetchFn = replyWith('{}');
    const transport = new FetchTransport({ ...CONFIG, VERIFY_SSL: false }, { fetchFn });
    await transport.send({ method: 'GET', url: 'https://ms.example.com/api/v2/' });

    expect(initOf(fetchFn).dispatcher).toBeInstanceOf(Agent);
    await transport.close();
  });

  it('uses the default dispatcher otherwise', async () => {
    const fetchFn = replyWith('{}');
    await new FetchTransport(CONFIG, { fetchFn }).send({ method: 'GET', url: 'https://ms.example.com/api/v2/' });
    expect(initOf(fetchFn).dispatcher).toBeUndefined();
  });
});
