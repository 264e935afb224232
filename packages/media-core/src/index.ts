// Constants
export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_MAX_RETRY,
  DEFAULT_RETRY_DELAY_SECONDS,
  DEFAULT_RETRY_EXCEPT,
  DEFAULT_API_PREFIX,
  DEFAULT_CLIENT_ID,
  DEFAULT_UPLOAD_MAX_FILES,
  FALLBACK_SERVER_VERSION,
  HLS_MIN_SERVER_VERSION,
} from './constants.js';

// Errors
export {
  MediaClientError,
  ConfigurationError,
  ValidationError,
  TransportError,
  ConnectionError,
  TimeoutError,
  HttpStatusError,
  ApiError,
  UploadError,
  AbortError,
} from './errors.js';
export type {
  MediaClientErrorOptions,
  TransportErrorOptions,
  HttpStatusErrorOptions,
  ApiErrorKind,
  ApiErrorOptions,
} from './errors.js';

// Types
export type * from './types.js';

// Configuration
export {
  CONFIGURATION_KEYS,
  DEFAULT_CONFIGURATION,
  configurationSchema,
  validateConfiguration,
} from './config/validate.js';
export {
  ConfigurationSource,
  loadConfiguration,
  managedSettingsPath,
  parseConfigurationSource,
  stripJsonComments,
  updateConfigurationFile,
} from './config/source.js';

// Logging
export { createConsoleLogger, filterLogger, noopLogger } from './logging.js';

// Request pipeline
export { API_KEY_HEADER, API_KEY_PARAM, signRequest } from './auth/signer.js';
export { FetchTransport } from './http/transport.js';
export type { FetchTransportOptions, TransportConfiguration } from './http/transport.js';
export { RequestExecutor, decodeResponse, isRetryable, retryDelayMs } from './client/executor.js';
export type { RequestExecutorOptions, RetryOptions } from './client/executor.js';

// Client
export { MediaServerClient, parseServerVersion, versionAtLeast } from './client/MediaServerClient.js';
export type { FromSourcesOptions, MediaServerClientOptions, ServerVersion } from './client/MediaServerClient.js';

// Uploads
export { ChunkedUploader, fragmentDirName, planHlsBatches } from './upload/ChunkedUploader.js';
export type { HlsFile } from './upload/ChunkedUploader.js';
export { UploadSession } from './upload/UploadSession.js';
export type { ChunkRange } from './upload/UploadSession.js';

// Utilities
export { buildApiUrl, isJsonObject, makeAbortSignal, redactUrl, sleep } from './utils/network.js';
export { formatSize } from './utils/format.js';
