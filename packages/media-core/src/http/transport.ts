import { Blob } from 'node:buffer';
import { Agent, FormData, ProxyAgent, fetch as undiciFetch } from 'undici';
import type { Dispatcher, RequestInit, Response } from 'undici';
import {
  AbortError,
  ConnectionError,
  HttpStatusError,
  TimeoutError,
} from '../errors.js';
import type {
  Configuration,
  FetchFn,
  HttpTransport,
  QueryParams,
  RawResponse,
  RequestSpec,
} from '../types.js';
import { isJsonObject, makeAbortSignal, redactUrl, remoteErrorMessage } from '../utils/network.js';

export type TransportConfiguration = Pick<
  Configuration,
  'SERVER_URL' | 'TIMEOUT' | 'VERIFY_SSL' | 'PROXIES' | 'LANGUAGE'
>;

export interface FetchTransportOptions {
  /** Replaces undici's fetch, mostly for tests. */
  fetchFn?: FetchFn;
}

const BODY_SNIPPET_LENGTH = 200;

function appendQuery(rawUrl: string, params: QueryParams | undefined): string {
  if (!params) return rawUrl;
  const url = new URL(rawUrl);
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) url.searchParams.append(key, String(item));
  }
  return url.toString();
}

function encodeBody(request: RequestSpec, headers: Record<string, string>): RequestInit['body'] {
  const { data, files } = request;

  if (files && Object.keys(files).length > 0) {
    const form = new FormData();
    if (data && !(data instanceof Uint8Array)) {
      for (const [key, value] of Object.entries(data)) {
        if (value === null) continue;
        form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
      }
    }
    for (const [field, file] of Object.entries(files)) {
      const blob = new Blob([file.content], { type: file.contentType ?? 'application/octet-stream' });
      form.append(field, blob, file.filename);
    }
    return form;
  }

  if (data === undefined || request.method === 'GET' || request.method === 'HEAD') return undefined;

  if (data instanceof Uint8Array) {
    headers['Content-Type'] ??= 'application/octet-stream';
    return data;
  }
  headers['Content-Type'] ??= 'application/json';
  return JSON.stringify(data);
}

function pickDispatcher(config: TransportConfiguration): Dispatcher | undefined {
  const scheme = config.SERVER_URL.startsWith('https:') ? 'https' : 'http';
  const proxy = config.PROXIES?.[scheme];
  if (proxy) {
    return new ProxyAgent({
      uri: proxy,
      requestTls: { rejectUnauthorized: config.VERIFY_SSL },
    });
  }
  if (!config.VERIFY_SSL) {
    return new Agent({ connect: { rejectUnauthorized: false } });
  }
  return undefined;
}

function collectHeaders(res: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  res.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

function parsePayload(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * HTTP transport over undici. Performs exactly one exchange per `send()`;
 * retrying is the caller's business.
 */
export class FetchTransport implements HttpTransport {
  private readonly fetchFn: FetchFn;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(private readonly config: TransportConfiguration, opts: FetchTransportOptions = {}) {
    this.fetchFn = opts.fetchFn ?? undiciFetch;
    this.dispatcher = pickDispatcher(config);
  }

  /**
   * @throws {TimeoutError} If no complete response arrived within the timeout.
   * @throws {ConnectionError} If the exchange failed before a response.
   * @throws {HttpStatusError} If the status is not 2xx.
   * @throws {AbortError} If the caller's signal fired.
   */
  async send(request: RequestSpec): Promise<RawResponse> {
    const url = appendQuery(request.url, request.params);
    const shownUrl = redactUrl(url);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.LANGUAGE) headers['Accept-Language'] = this.config.LANGUAGE;
    Object.assign(headers, request.headers);
    const body = encodeBody(request, headers);

    const timeoutSeconds = request.timeout ?? this.config.TIMEOUT;
    const { signal, timedOut, cleanup } = makeAbortSignal(request.signal, timeoutSeconds * 1000);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchFn(url, {
        method: request.method,
        headers,
        body,
        signal,
        redirect: 'follow',
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      text = request.method === 'HEAD' ? '' : await res.text();
    } catch (err) {
      if (timedOut()) {
        throw new TimeoutError(`Request on "${shownUrl}" timed out after ${timeoutSeconds}s.`, { url: shownUrl, cause: err });
      }
      if (request.signal?.aborted) {
        throw new AbortError(`Request on "${shownUrl}" was aborted.`, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(`Connection error on "${shownUrl}": ${reason}`, { url: shownUrl, cause: err });
    } finally {
      cleanup();
    }

    if (res.status < 200 || res.status >= 300) {
      const payload = parsePayload(text);
      const bodySnippet = text.slice(0, BODY_SNIPPET_LENGTH);
      const code = payload?.code;
      throw new HttpStatusError(
        `HTTP ${res.status} error on "${shownUrl}": ${remoteErrorMessage(payload) ?? (bodySnippet || res.statusText)}`,
        {
          url: shownUrl,
          status: res.status,
          bodySnippet,
          ...(payload ? { payload } : {}),
          ...(typeof code === 'string' || typeof code === 'number' ? { errorCode: String(code) } : {}),
        }
      );
    }

    return { url: shownUrl, status: res.status, headers: collectHeaders(res), text };
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
