import { signRequest } from '../auth/signer.js';
import {
  AbortError,
  ApiError,
  ConfigurationError,
  ConnectionError,
  HttpStatusError,
  TimeoutError,
  ValidationError,
} from '../errors.js';
import type {
  ApiCallOptions,
  ApiResult,
  Configuration,
  HttpTransport,
  LoggerFn,
  RawResponse,
  RequestSpec,
} from '../types.js';
import { buildApiUrl, isJsonObject, remoteErrorMessage, sleep } from '../utils/network.js';

export interface RetryOptions<T> {
  /** Used in log lines, e.g. 'Request on "medias/"'. */
  label: string;
  maxRetry: number;
  signal?: AbortSignal;
  /**
   * Inspect a failure before the retry policy does. Returning a value ends the
   * loop with that value.
   */
  recover?: (err: unknown, tried: number) => { value: T } | undefined;
  onRetry?: (err: unknown, tried: number, delayMs: number) => void;
}

export interface RequestExecutorOptions {
  /** A validated configuration, or the reason validation failed. */
  config: Configuration | ConfigurationError;
  /** Built on first use so that an invalid configuration never reaches it. */
  transport: (config: Configuration) => HttpTransport;
  logger: LoggerFn;
}

/**
 * Transient failures worth another attempt: no response at all, or a 5xx that
 * is not listed in `retryExcept`.
 */
export function isRetryable(err: unknown, retryExcept: readonly number[]): boolean {
  if (err instanceof ConnectionError || err instanceof TimeoutError) return true;
  if (err instanceof HttpStatusError) {
    return err.status >= 500 && !retryExcept.includes(err.status);
  }
  return false;
}

/** Delay before retry `tried` (1-based): base * tried^2. */
export function retryDelayMs(tried: number, baseSeconds: number): number {
  return baseSeconds * tried * tried * 1000;
}

/**
 * Generic request pipeline: URL resolution, signing, a single transport
 * exchange, JSON decoding and the bounded retry loop.
 */
export class RequestExecutor {
  private readonly config: Configuration | ConfigurationError;
  private readonly createTransport: (config: Configuration) => HttpTransport;
  private readonly logger: LoggerFn;
  private transport: HttpTransport | null = null;

  constructor(opts: RequestExecutorOptions) {
    this.config = opts.config;
    this.createTransport = opts.transport;
    this.logger = opts.logger;
  }

  /**
   * The validated configuration.
   * @throws {ConfigurationError} If validation failed at construction.
   */
  get configuration(): Configuration {
    if (this.config instanceof ConfigurationError) throw this.config;
    return this.config;
  }

  /**
   * Call an API path, retrying transient failures.
   */
  async call(path: string, opts: ApiCallOptions = {}): Promise<ApiResult> {
    const conf = this.configuration;
    const maxRetry = this.resolveMaxRetry(opts.maxRetry);
    const request = this.buildRequest(path, opts);

    const begin = Date.now();
    const result = await this.retry(() => this.execute(request), {
      label: `Request on "${path}"`,
      maxRetry,
      ...(opts.signal ? { signal: opts.signal } : {}),
    });
    this.logger('debug', `API call duration: ${((Date.now() - begin) / 1000).toFixed(2)} s - ${path}.`, {
      server: conf.SERVER_URL,
    });
    return result;
  }

  buildRequest(path: string, opts: ApiCallOptions = {}): RequestSpec {
    const conf = this.configuration;
    const url = buildApiUrl(conf.SERVER_URL, conf.API_PREFIX, path);
    try {
      new URL(url);
    } catch (err) {
      throw new ConfigurationError(`Cannot build a valid URL from "${conf.SERVER_URL}" and "${path}".`, { cause: err });
    }

    const request: RequestSpec = { method: opts.method ?? 'GET', url };
    if (opts.params) request.params = opts.params;
    if (opts.data !== undefined) request.data = opts.data;
    if (opts.files) request.files = opts.files;
    if (opts.headers) request.headers = opts.headers;
    if (opts.authenticate !== undefined) request.authenticate = opts.authenticate;
    if (opts.timeout !== undefined) request.timeout = opts.timeout;
    if (opts.signal) request.signal = opts.signal;
    return request;
  }

  /**
   * One signed exchange, decoded. No retry. A HEAD response has no body and
   * resolves to `{ success: true }`.
   */
  async execute(request: RequestSpec): Promise<ApiResult> {
    const conf = this.configuration;
    if (!this.transport) this.transport = this.createTransport(conf);
    const raw = await this.transport.send(signRequest(request, conf));
    if (request.method === 'HEAD') return { success: true };
    return decodeResponse(raw);
  }

  /**
   * Run `attempt` until it succeeds, the failure is not transient, or the
   * retry budget is spent.
   */
  async retry<T>(attempt: (tried: number) => Promise<T>, opts: RetryOptions<T>): Promise<T> {
    const conf = this.configuration;
    let tried = 0;

    for (;;) {
      tried++;
      try {
        return await attempt(tried);
      } catch (err) {
        const recovered = opts.recover?.(err, tried);
        if (recovered) return recovered.value;

        if (!isRetryable(err, conf.RETRY_EXCEPT)) {
          if (tried > 1 || err instanceof HttpStatusError) {
            this.logger('error', `${opts.label} failed, tried ${tried} times (not retryable).`, err);
          }
          throw err;
        }
        if (tried > opts.maxRetry) {
          this.logger('error', `${opts.label} failed, tried ${tried} times (reached max retry count).`, err);
          throw err;
        }

        const delayMs = retryDelayMs(tried, conf.RETRY_DELAY);
        this.logger(
          'warn',
          `${opts.label} failed, tried ${tried} times (max ${opts.maxRetry}), retrying in ${delayMs / 1000}s.`,
          err
        );
        opts.onRetry?.(err, tried, delayMs);
        try {
          await sleep(delayMs, opts.signal);
        } catch (abortReason) {
          throw new AbortError('Retry wait aborted.', { cause: abortReason });
        }
      }
    }
  }

  resolveMaxRetry(maxRetry: number | undefined): number {
    const value = maxRetry ?? this.configuration.MAX_RETRY;
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError('The "maxRetry" option must be an integer greater than or equal to 0.');
    }
    return value;
  }

  async close(): Promise<void> {
    await this.transport?.close?.();
    this.transport = null;
  }
}

/**
 * Decode a 2xx body into an ApiResult.
 *
 * @throws {ApiError} kind `invalid_response` if the body is not a JSON object,
 * kind `remote_rejected` if it reports `success: false`.
 */
export function decodeResponse(raw: RawResponse): ApiResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.text);
  } catch (err) {
    throw new ApiError('invalid_response', `API call failed on "${raw.url}": failed to decode JSON.`, {
      url: raw.url,
      status: raw.status,
      payload: { raw: raw.text.slice(0, 200) },
      cause: err,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new ApiError('invalid_response', `API call failed on "${raw.url}": response is not a JSON object.`, {
      url: raw.url,
      status: raw.status,
      payload: parsed,
    });
  }

  if (parsed.success === false) {
    const code = parsed.code;
    throw new ApiError(
      'remote_rejected',
      `API call failed on "${raw.url}": ${remoteErrorMessage(parsed) ?? raw.text.slice(0, 200)}`,
      {
        url: raw.url,
        status: raw.status,
        payload: parsed,
        ...(typeof code === 'string' || typeof code === 'number' ? { errorCode: String(code) } : {}),
      }
    );
  }

  return { ...parsed, success: true };
}
