// Pure HTTP utility functions
// All functions are pure - no side effects

import type { TransportResponse } from './types.js';

/**
 * Build URL from base URL and endpoint
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (endpoint === '' || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

export const isAbsoluteHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
};

/**
 * 204 or an explicit zero content length: there is no body to parse.
 */
export const hasEmptyBody = (response: TransportResponse): boolean => {
  return response.status === 204 || response.headers.get('content-length') === '0';
};

/**
 * Serialize a request body. Strings and byte arrays go out as-is, anything else as JSON.
 */
export const encodeBody = (body: unknown): { body: string | Uint8Array; contentType?: string } | undefined => {
  if (body === undefined) {
    return undefined;
  }
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return { body };
  }
  return { body: JSON.stringify(body), contentType: 'application/json' };
};
