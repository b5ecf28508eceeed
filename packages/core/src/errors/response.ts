import { z } from 'zod';

import { sanitizeAndTruncate } from '../sanitize.js';

import { ApiError, HttpError } from './index.js';

const apiErrorBodySchema = z.object({
  error: z
    .object({
      code: z.union([z.string(), z.number()]).optional(),
      message: z.string().optional(),
    })
    .passthrough(),
});

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

/**
 * Convert a non-success response into a terminal error.
 *
 * Bodies shaped like `{ "error": { "code", "message" } }` become an ApiError;
 * anything else becomes an HttpError carrying the body text. Either way the
 * text is sanitized and then truncated.
 */
export function errorFromResponse(status: number, body: string, retryAfterSeconds?: number): ApiError | HttpError {
  const parsed = apiErrorBodySchema.safeParse(parseJson(body));

  if (parsed.success) {
    const { code, message } = parsed.data.error;
    return new ApiError(sanitizeAndTruncate(message ?? body), {
      code: code === undefined ? 'unknown' : String(code),
      retryAfterSeconds,
      status,
    });
  }

  return new HttpError(sanitizeAndTruncate(body), { retryAfterSeconds, status });
}
