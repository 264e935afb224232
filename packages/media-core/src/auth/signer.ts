import type { Configuration, RequestSpec } from '../types.js';

export const API_KEY_HEADER = 'api-key';
export const API_KEY_PARAM = 'api_key';

/**
 * Return a copy of `request` carrying the API key, as a header or a query
 * parameter depending on API_KEY_LOCATION. Requests with
 * `authenticate: false` come back unchanged. The input is not modified.
 */
export function signRequest(
  request: RequestSpec,
  config: Pick<Configuration, 'API_KEY' | 'API_KEY_LOCATION'>
): RequestSpec {
  if (request.authenticate === false || !config.API_KEY) return request;

  if (config.API_KEY_LOCATION === 'query') {
    return {
      ...request,
      params: { ...request.params, [API_KEY_PARAM]: config.API_KEY },
    };
  }
  return {
    ...request,
    headers: { ...request.headers, [API_KEY_HEADER]: config.API_KEY },
  };
}
