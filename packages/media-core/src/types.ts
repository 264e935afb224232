import type { RequestInit, Response } from 'undici';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type ApiKeyLocation = 'header' | 'query';

/**
 * Validated client configuration. Produced by `validateConfiguration()` and
 * frozen; the client never mutates it.
 */
export type Configuration = {
  /** Base URL of the server, without trailing slash. */
  readonly SERVER_URL: string;
  readonly API_KEY: string;
  /** Origin name attached to media created by this client. */
  readonly CLIENT_ID: string;
  readonly LOG_LEVEL: LogLevel;
  /** Sent as Accept-Language; null leaves the server default. */
  readonly LANGUAGE: string | null;
  /** Per-request timeout in seconds. */
  readonly TIMEOUT: number;
  readonly VERIFY_SSL: boolean;
  /** Proxy URL per scheme ("http", "https"). */
  readonly PROXIES: Readonly<Record<string, string>> | null;
  readonly MAX_RETRY: number;
  readonly RETRY_EXCEPT: readonly number[];
  /** Base retry delay in seconds. */
  readonly RETRY_DELAY: number;
  readonly UPLOAD_CHUNK_SIZE: number;
  /** Most files per HLS upload request. */
  readonly UPLOAD_MAX_FILES: number;
  readonly API_KEY_LOCATION: ApiKeyLocation;
  readonly API_PREFIX: string;
};

export type ConfigurationKey = keyof Configuration;

/** Configuration as read from a source, before validation. */
export type RawConfiguration = Record<string, unknown>;

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | readonly QueryValue[]>;

export interface FileAttachment {
  filename: string;
  content: Uint8Array;
  contentType?: string;
}

/**
 * One HTTP request, built per call and never persisted.
 */
export interface RequestSpec {
  method: HttpMethod;
  /** Absolute URL. */
  url: string;
  params?: QueryParams;
  /** A mapping is sent as JSON (or as form fields next to files); bytes as-is. */
  data?: JsonObject | Uint8Array;
  files?: Record<string, FileAttachment>;
  headers?: Record<string, string>;
  /** Set to false to skip the API key. Defaults to true. */
  authenticate?: boolean;
  /** Timeout in seconds; falls back to the configured TIMEOUT. */
  timeout?: number;
  signal?: AbortSignal;
}

/** What the transport hands back for a 2xx response. */
export interface RawResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  text: string;
}

/**
 * Decoded JSON response body. `success` defaults to true when the server
 * omits it.
 */
export type ApiResult<T extends JsonObject = JsonObject> = T & { success: boolean };

export interface ApiCallOptions {
  method?: HttpMethod;
  params?: QueryParams;
  data?: JsonObject | Uint8Array;
  files?: Record<string, FileAttachment>;
  headers?: Record<string, string>;
  timeout?: number;
  /** Overrides the configured MAX_RETRY for this call. */
  maxRetry?: number;
  authenticate?: boolean;
  signal?: AbortSignal;
}

/**
 * Logger function type for debug and diagnostic output.
 */
export type LoggerFn = (
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string,
  meta?: unknown
) => void;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpTransport {
  send(request: RequestSpec): Promise<RawResponse>;
  close?(): Promise<void>;
}

export type UploadState = 'preparing' | 'uploading' | 'finalizing' | 'done' | 'failed';

export interface UploadProgressEvent {
  phase: 'prepare' | 'chunk' | 'retry-wait' | 'finalize' | 'done';
  text: string;
  percent: number;
  processedBytes: number;
  totalBytes: number;
  chunkIndex?: number;
  totalChunks?: number;
}

export interface ChunkedUploadOptions {
  /** Remote destination, "<dir id>/<file path>". */
  remotePath?: string;
  chunkSize?: number;
  timeout?: number;
  maxRetry?: number;
  onProgress?: (evt: UploadProgressEvent) => void;
  signal?: AbortSignal;
}

export interface ChunkedUploadResult {
  /** Remote resource identifier assigned on the first chunk. */
  uploadId: string;
  totalSize: number;
  chunkCount: number;
  /** Body of the finalize call. */
  response: ApiResult;
}

export interface HlsUploadOptions {
  /** Remote directory to add the files to. Empty lets the server create one. */
  remoteDir?: string;
  timeout?: number;
  maxRetry?: number;
  onProgress?: (evt: UploadProgressEvent) => void;
  signal?: AbortSignal;
}

export interface HlsUploadResult {
  /** Remote directory holding the playlist and its fragments. */
  remoteDir: string;
  /** Fragments plus the playlist. */
  fileCount: number;
  totalSize: number;
  requestCount: number;
}

export interface AddMediaOptions {
  title?: string;
  filePath?: string;
  /** Extra media fields (channel, speaker_email, ...). */
  metadata?: JsonObject;
  onProgress?: (evt: UploadProgressEvent) => void;
  timeout?: number;
  maxRetry?: number;
  signal?: AbortSignal;
}
