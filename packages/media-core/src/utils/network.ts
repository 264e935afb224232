import type { JsonObject } from '../types.js';

export interface AbortSignalWithCleanup {
  signal: AbortSignal;
  /** True once the timeout (not the parent signal) fired. */
  timedOut: () => boolean;
  cleanup: () => void;
}

/**
 * Combine an optional parent signal with a timeout.
 */
export function makeAbortSignal(parent: AbortSignal | undefined, timeoutMs: number): AbortSignalWithCleanup {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) controller.abort(parent.reason);
    else parent.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = Number.isFinite(timeoutMs) && timeoutMs > 0
    ? setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs)
    : null;

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    cleanup: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Join a base URL and a path into an API URL. Absolute URLs pass through.
 * Relative paths get a single leading and trailing slash.
 */
export function buildApiUrl(serverUrl: string, prefix: string, path: string): string {
  if (path.includes('://')) return path;
  const cleanPrefix = prefix.replace(/^\/+|\/+$/g, '');
  const cleanPath = path.replace(/^\/+|\/+$/g, '');
  const parts = [serverUrl.replace(/\/+$/, '')];
  if (cleanPrefix) parts.push(cleanPrefix);
  if (cleanPath) parts.push(cleanPath);
  return parts.join('/') + '/';
}

/**
 * Extract the remote error message from a decoded response body.
 */
export function remoteErrorMessage(payload: Record<string, unknown> | undefined): string | undefined {
  if (!payload) return undefined;
  for (const key of ['error', 'errors', 'message']) {
    const value = payload[key];
    if (typeof value === 'string' && value) return value;
    if (value && typeof value === 'object') return JSON.stringify(value);
  }
  return undefined;
}

/**
 * Top-level object check for values that came out of `JSON.parse`, whose
 * nested values are JSON by construction.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const SECRET_PARAMS = ['api_key'];

/**
 * Mask credential query parameters so a URL can be logged or put in an error.
 */
export function redactUrl(rawUrl: string): string {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return rawUrl;
  }
  let changed = false;
  for (const name of SECRET_PARAMS) {
    if (url.searchParams.has(name)) {
      url.searchParams.set(name, '***');
      changed = true;
    }
  }
  return changed ? url.toString() : rawUrl;
}
