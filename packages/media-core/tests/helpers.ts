import { ConnectionError, HttpStatusError } from '../src/errors.js';
import type { HttpTransport, RawConfiguration, RawResponse, RequestSpec } from '../src/types.js';

export const TEST_CONFIG: RawConfiguration = {
  SERVER_URL: 'https://ms.example.com',
  API_KEY: 'test-secret',
  CLIENT_ID: 'test-client',
  RETRY_DELAY: 0,
};

export type Handler = (request: RequestSpec, callIndex: number) => RawResponse | Promise<RawResponse>;

/**
 * In-process transport: records every request and answers through `handler`.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: RequestSpec[] = [];
  closed = false;

  constructor(private readonly handler: Handler) { }

  async send(request: RequestSpec): Promise<RawResponse> {
    this.requests.push(request);
    return this.handler(request, this.requests.length - 1);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function jsonReply(request: RequestSpec, body: unknown, status = 200): RawResponse {
  return { url: request.url, status, headers: { 'content-type': 'application/json' }, text: JSON.stringify(body) };
}

export function statusError(request: RequestSpec, status: number, payload?: Record<string, unknown>): HttpStatusError {
  return new HttpStatusError(`HTTP ${status} error on "${request.url}"`, {
    url: request.url,
    status,
    bodySnippet: payload ? JSON.stringify(payload) : '',
    ...(payload ? { payload } : {}),
  });
}

export type Reply =
  | { body: unknown; status?: number }
  | { error: (request: RequestSpec) => Error };

export const ok = (body: unknown): Reply => ({ body });

export const fail = (status: number, payload?: Record<string, unknown>): Reply => ({
  error: (request) => statusError(request, status, payload),
});

export const dropConnection = (): Reply => ({
  error: (request) => new ConnectionError(`Connection error on "${request.url}": socket hang up`, { url: request.url }),
});

/**
 * Answers the n-th call with `replies[n]`, repeating the last reply once the
 * list runs out.
 */
export function sequence(replies: Reply[]): Handler {
  return (request, callIndex) => {
    const reply = replies[Math.min(callIndex, replies.length - 1)];
    if ('error' in reply) throw reply.error(request);
    return jsonReply(request, reply.body, reply.status);
  };
}
