import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { ADD_MEDIA_PATH, FALLBACK_SERVER_VERSION, HLS_MIN_SERVER_VERSION } from '../constants.js';
import { ConfigurationError, UploadError, ValidationError } from '../errors.js';
import { loadConfiguration } from '../config/source.js';
import type { ConfigurationSource } from '../config/source.js';
import { validateConfiguration } from '../config/validate.js';
import { FetchTransport } from '../http/transport.js';
import { filterLogger, noopLogger } from '../logging.js';
import type {
  AddMediaOptions,
  ApiCallOptions,
  ApiResult,
  ChunkedUploadOptions,
  ChunkedUploadResult,
  Configuration,
  FetchFn,
  HlsUploadOptions,
  HlsUploadResult,
  HttpTransport,
  JsonObject,
  LoggerFn,
  RawConfiguration,
} from '../types.js';
import { ChunkedUploader } from '../upload/ChunkedUploader.js';
import { RequestExecutor } from './executor.js';

export interface MediaServerClientOptions {
  /** Raw configuration; validated once, here. */
  config: RawConfiguration;
  logger?: LoggerFn;
  /** Replaces the undici transport entirely. */
  transport?: HttpTransport;
  /** Passed to the default transport. */
  fetchFn?: FetchFn;
}

export interface FromSourcesOptions extends Omit<MediaServerClientOptions, 'config'> {
  /** Substituted for "<host>" in configuration values. */
  hostname?: string;
}

export interface ServerVersion {
  /** Version string as reported, e.g. "11.2.0". */
  raw: string;
  /** Numeric components; non-numeric parts are dropped. */
  parts: number[];
}

/**
 * Parse "major.minor.patch[...]" into its numeric components.
 */
export function parseServerVersion(raw: string): ServerVersion {
  const parts: number[] = [];
  for (const piece of raw.split('.')) {
    const n = Number.parseInt(piece, 10);
    if (Number.isNaN(n)) break;
    parts.push(n);
  }
  return { raw, parts };
}

/** True when `parts` is at least `minimum`; missing components count as 0. */
export function versionAtLeast(parts: readonly number[], minimum: readonly number[]): boolean {
  for (let i = 0; i < Math.max(parts.length, minimum.length); i++) {
    const have = parts[i] ?? 0;
    const want = minimum[i] ?? 0;
    if (have !== want) return have > want;
  }
  return true;
}

/**
 * Client for a media server API.
 *
 * The configuration is validated once in the constructor. If it is invalid the
 * error is kept and thrown by every call, before any network access.
 */
export class MediaServerClient {
  private readonly executor: RequestExecutor;
  private readonly uploader: ChunkedUploader;
  private readonly logger: LoggerFn;

  /** Cached version (null until first getServerVersion()). */
  private _version: ServerVersion | null = null;
  /** In-flight version lookup, shared by concurrent callers. */
  private _versionPromise: Promise<ServerVersion> | null = null;

  constructor(opts: MediaServerClientOptions) {
    let config: Configuration | ConfigurationError;
    try {
      config = validateConfiguration(opts.config);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      config = err;
    }

    const base = opts.logger ?? noopLogger;
    this.logger = config instanceof ConfigurationError ? base : filterLogger(base, config.LOG_LEVEL);

    const { transport, fetchFn } = opts;
    this.executor = new RequestExecutor({
      config,
      transport: (conf) => transport ?? new FetchTransport(conf, fetchFn ? { fetchFn } : {}),
      logger: this.logger,
    });
    this.uploader = new ChunkedUploader(this.executor, this.logger);
  }

  /**
   * Load a configuration from `sources` (later ones win) and build a client.
   * @throws {ConfigurationError} If a source cannot be read.
   */
  static async fromSources(
    sources: readonly ConfigurationSource[],
    opts: FromSourcesOptions = {}
  ): Promise<MediaServerClient> {
    const { hostname, ...clientOpts } = opts;
    const config = await loadConfiguration(sources, {
      ...(clientOpts.logger ? { logger: clientOpts.logger } : {}),
      ...(hostname !== undefined ? { hostname } : {}),
    });
    return new MediaServerClient({ ...clientOpts, config });
  }

  /**
   * The validated configuration.
   * @throws {ConfigurationError} If it failed validation.
   */
  get config(): Configuration {
    return this.executor.configuration;
  }

  /**
   * Call `path` (relative to SERVER_URL + API_PREFIX) and decode the JSON
   * response. Transient failures are retried up to MAX_RETRY times.
   *
   * @throws {ConfigurationError} If the configuration is invalid.
   * @throws {TransportError} On connection failure, timeout or non-2xx status.
   * @throws {ApiError} If the body is not a JSON object or reports a failure.
   */
  async api(path: string, opts: ApiCallOptions = {}): Promise<ApiResult> {
    return this.executor.call(path, opts);
  }

  /** Authenticated `GET /` on the API root. */
  async checkServer(opts: Pick<ApiCallOptions, 'timeout' | 'signal'> = {}): Promise<ApiResult> {
    return this.executor.call('/', opts);
  }

  /**
   * Version of the remote server. Results are cached; concurrent calls share
   * one request.
   */
  async getServerVersion(opts: Pick<ApiCallOptions, 'timeout' | 'signal'> = {}): Promise<ServerVersion> {
    if (this._version) return this._version;

    if (!this._versionPromise) {
      this._versionPromise = this.fetchServerVersion(opts).finally(() => {
        this._versionPromise = null;
      });
    }
    return this._versionPromise;
  }

  private async fetchServerVersion(opts: Pick<ApiCallOptions, 'timeout' | 'signal'>): Promise<ServerVersion> {
    const response = await this.executor.call('/', { ...opts, authenticate: false });
    const reported = response.mediaserver;
    const raw = typeof reported === 'string' && reported ? reported : FALLBACK_SERVER_VERSION;
    this.logger('debug', `Server version is ${raw}.`);
    this._version = parseServerVersion(raw);
    return this._version;
  }

  /**
   * Upload a local file in chunks and finalize it on the server.
   * See {@link ChunkedUploader.upload}.
   */
  async chunkedUpload(filePath: string, opts: ChunkedUploadOptions = {}): Promise<ChunkedUploadResult> {
    return this.uploader.upload(filePath, opts);
  }

  /**
   * Upload an HLS playlist with its fragments.
   * See {@link ChunkedUploader.hlsUpload}.
   *
   * @throws {UploadError} If the server is older than 8.2.
   */
  async hlsUpload(m3u8Path: string, opts: HlsUploadOptions = {}): Promise<HlsUploadResult> {
    const version = await this.getServerVersion(opts.signal ? { signal: opts.signal } : {});
    if (!versionAtLeast(version.parts, HLS_MIN_SERVER_VERSION)) {
      throw new UploadError(`The server version ${version.raw} does not support HLS upload.`);
    }
    return this.uploader.hlsUpload(m3u8Path, opts);
  }

  /**
   * Create a media, optionally uploading its source file first.
   *
   * @throws {ValidationError} If neither a title nor a file is given, or the
   * file cannot be read or is empty.
   */
  async addMedia(opts: AddMediaOptions = {}): Promise<ApiResult> {
    const { title, filePath, metadata, onProgress, timeout, maxRetry, signal } = opts;
    if (!title && !filePath) {
      throw new ValidationError('You should give a title or a file to create a media.');
    }
    const conf = this.config;

    const fields: JsonObject = { ...metadata, origin: conf.CLIENT_ID };
    if (title) fields.title = title;

    if (filePath) {
      let stat: Stats;
      try {
        stat = await fs.stat(filePath);
      } catch (err) {
        throw new ValidationError(`Cannot read file "${filePath}".`, { cause: err });
      }
      if (stat.size === 0) throw new ValidationError(`File "${filePath}" is empty.`);

      const upload = await this.uploader.upload(filePath, {
        ...(onProgress ? { onProgress } : {}),
        ...(timeout !== undefined ? { timeout } : {}),
        ...(maxRetry !== undefined ? { maxRetry } : {}),
        ...(signal ? { signal } : {}),
      });
      fields.code = upload.uploadId;
    }

    const response = await this.executor.call(ADD_MEDIA_PATH, {
      method: 'POST',
      data: fields,
      ...(timeout !== undefined ? { timeout } : {}),
      ...(maxRetry !== undefined ? { maxRetry } : {}),
      ...(signal ? { signal } : {}),
    });
    this.logger('info', `Media "${title ?? filePath ?? ''}" added.`, { oid: response.oid ?? null });
    return response;
  }

  /** Release the transport's connections. */
  async close(): Promise<void> {
    await this.executor.close();
  }
}
