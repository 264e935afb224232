/** Default upload chunk size: 25 MiB. */
export const DEFAULT_CHUNK_SIZE = 25 * 1024 * 1024;

/** Most files sent in one HLS upload request. */
export const DEFAULT_UPLOAD_MAX_FILES = 100;

/** Default per-request timeout, in seconds. */
export const DEFAULT_TIMEOUT_SECONDS = 10;

/** Retries after the first attempt. */
export const DEFAULT_MAX_RETRY = 3;

/** Base delay in seconds; retry n waits RETRY_DELAY * n^2. */
export const DEFAULT_RETRY_DELAY_SECONDS = 3;

/** Status codes that are never retried, even when otherwise transient. */
export const DEFAULT_RETRY_EXCEPT: readonly number[] = [403, 404];

export const DEFAULT_API_PREFIX = '/api/v2';

/** Replaced by the machine hostname when a configuration is loaded. */
export const HOST_PLACEHOLDER = '<host>';

export const DEFAULT_CLIENT_ID = `media-api-client_${HOST_PLACEHOLDER}`;

/** Reported by servers too old to include their version in `GET /`. */
export const FALLBACK_SERVER_VERSION = '6.5.4';

export const FINALIZE_PATH = 'upload/complete/';
export const CHUNK_PATH = 'upload/';
export const ADD_MEDIA_PATH = 'medias/add/';
export const HLS_PATH = 'upload/hls/';

/** Oldest server release that accepts HLS uploads. */
export const HLS_MIN_SERVER_VERSION: readonly number[] = [8, 2];
