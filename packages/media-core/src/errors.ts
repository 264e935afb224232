export interface MediaClientErrorOptions {
  code?: string;
  details?: unknown;
  cause?: unknown;
}

/**
 * Base class for every error raised by the client.
 */
export class MediaClientError extends Error {
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, opts: MediaClientErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.code = opts.code || 'MEDIA_CLIENT_ERROR';
    if (opts.details !== undefined) this.details = opts.details;
  }
}

/** Missing or invalid local setup. Never retried. */
export class ConfigurationError extends MediaClientError {
  constructor(message: string, opts: MediaClientErrorOptions = {}) {
    super(message, { ...opts, code: opts.code || 'CONFIGURATION_ERROR' });
  }
}

/** Invalid argument passed by the caller. */
export class ValidationError extends MediaClientError {
  constructor(message: string, opts: MediaClientErrorOptions = {}) {
    super(message, { ...opts, code: opts.code || 'VALIDATION_ERROR' });
  }
}

export interface TransportErrorOptions extends MediaClientErrorOptions {
  url: string;
  status?: number;
}

/**
 * A single HTTP exchange failed, either before a response arrived or with a
 * non-2xx status.
 */
export class TransportError extends MediaClientError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, opts: TransportErrorOptions) {
    super(message, { ...opts, code: opts.code || 'TRANSPORT_ERROR' });
    this.url = opts.url;
    if (opts.status !== undefined) this.status = opts.status;
  }
}

/** DNS failure, refused or reset connection, TLS failure. */
export class ConnectionError extends TransportError {
  constructor(message: string, opts: TransportErrorOptions) {
    super(message, { ...opts, code: 'CONNECTION_ERROR' });
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string, opts: TransportErrorOptions) {
    super(message, { ...opts, code: 'TIMEOUT' });
  }
}

export interface HttpStatusErrorOptions extends TransportErrorOptions {
  status: number;
  payload?: Record<string, unknown>;
  bodySnippet?: string;
  errorCode?: string;
}

/** The server answered with a non-2xx status. */
export class HttpStatusError extends TransportError {
  declare readonly status: number;
  /** Decoded JSON body, when the body was a JSON object. */
  readonly payload?: Record<string, unknown>;
  readonly bodySnippet: string;
  /** Application error code reported by the server. */
  readonly errorCode?: string;

  constructor(message: string, opts: HttpStatusErrorOptions) {
    super(message, { ...opts, code: 'HTTP_STATUS' });
    this.status = opts.status;
    this.bodySnippet = opts.bodySnippet ?? '';
    if (opts.payload !== undefined) this.payload = opts.payload;
    if (opts.errorCode !== undefined) this.errorCode = opts.errorCode;
  }
}

export type ApiErrorKind = 'invalid_response' | 'remote_rejected';

export interface ApiErrorOptions extends MediaClientErrorOptions {
  url: string;
  status: number;
  payload?: unknown;
  errorCode?: string;
}

/**
 * The server answered 2xx but the body is not usable: either it is not a JSON
 * object, or it reports `success: false`. Never retried.
 */
export class ApiError extends MediaClientError {
  readonly kind: ApiErrorKind;
  readonly url: string;
  readonly status: number;
  readonly payload?: unknown;
  readonly errorCode?: string;

  constructor(kind: ApiErrorKind, message: string, opts: ApiErrorOptions) {
    super(message, { ...opts, code: kind === 'invalid_response' ? 'INVALID_RESPONSE' : 'REMOTE_REJECTED' });
    this.kind = kind;
    this.url = opts.url;
    this.status = opts.status;
    if (opts.payload !== undefined) this.payload = opts.payload;
    if (opts.errorCode !== undefined) this.errorCode = opts.errorCode;
  }
}

/** The chunk sequence of an upload session broke. */
export class UploadError extends MediaClientError {
  constructor(message: string, opts: MediaClientErrorOptions = {}) {
    super(message, { ...opts, code: opts.code || 'UPLOAD_ERROR' });
  }
}

export class AbortError extends MediaClientError {
  constructor(message = 'Operation aborted.', opts: MediaClientErrorOptions = {}) {
    super(message, { ...opts, code: 'ABORT_ERR' });
  }
}
