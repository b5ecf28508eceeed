/**
 * Redaction of secret-shaped substrings.
 *
 * Every string that ends up in a log record, an error message or an
 * instrumentation field goes through `sanitize` first. Redaction always runs
 * before truncation: truncating first can leave a fragment of a secret that no
 * longer matches any pattern.
 */

declare const sanitizedBrand: unique symbol;

/**
 * A string that has passed through the redaction pass.
 */
export type SanitizedText = string & { readonly [sanitizedBrand]: true };

export const REDACTED = '[REDACTED]';

const brand = (text: string): SanitizedText => text as SanitizedText;

/**
 * Header names whose values are always secret. Matched case-insensitively.
 */
export const SENSITIVE_HEADER_NAMES: readonly string[] = [
  'authorization',
  'proxy-authorization',
  'api-key',
  'x-api-key',
  'ocp-apim-subscription-key',
  'cookie',
  'set-cookie',
];

// base64url of `{"`, the start of every JSON-encoded JWT header
export const JWT_MAGIC_PREFIX = 'eyJ';

const BEARER_PATTERN = /\bBearer\s+[^\s"',;]+/gi;
const JWT_PATTERN = /eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

export interface SanitizerOptions {
  /** Extra header names redacted in addition to SENSITIVE_HEADER_NAMES. */
  additionalHeaderNames?: readonly string[] | undefined;
  /** Extra patterns; every match is replaced with the redaction marker. Must be global. */
  additionalPatterns?: readonly RegExp[] | undefined;
}

export type Sanitizer = (text: string) => SanitizedText;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Matches `name: value`, `name=value`, the JSON form `"name": "value"` and the
 * same JSON escaped inside another string (`\"name\": \"value\"`).
 * A quoted value ends at its closing quote; anything else runs to the end of
 * the line.
 */
const buildHeaderPattern = (names: readonly string[]): RegExp => {
  const alternation = names.map(escapeRegExp).join('|');
  const value = [
    String.raw`\\"(?:[^\\\r\n]|\\(?!"))*\\"`,
    String.raw`"(?:[^"\\\r\n]|\\.)*"`,
    String.raw`'[^'\r\n]*'`,
    String.raw`[^\r\n]+`,
  ].join('|');
  return new RegExp(String.raw`(^|[^A-Za-z0-9-])(${alternation})(\\?["']?[ \t]*[:=][ \t]*)(${value})`, 'gi');
};

const QUOTED_VALUE = /^(\\"|"|')[\s\S]*\1$/;

const redactValue = (value: string): string => {
  const quote = QUOTED_VALUE.exec(value)?.[1];
  return quote !== undefined && value.length >= quote.length * 2 ? `${quote}${REDACTED}${quote}` : REDACTED;
};

const toGlobal = (pattern: RegExp): RegExp =>
  pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);

/**
 * Build a sanitizer. The fixed patterns (bearer tokens, JWT-shaped strings and
 * the sensitive headers) are always applied; options can only add to them.
 */
export function createSanitizer(options: SanitizerOptions = {}): Sanitizer {
  const headerNames = [...SENSITIVE_HEADER_NAMES, ...(options.additionalHeaderNames ?? [])].map((name) =>
    name.toLowerCase()
  );
  const headerPattern = buildHeaderPattern(headerNames);
  const extraPatterns = (options.additionalPatterns ?? []).map(toGlobal);

  return (text: string): SanitizedText => {
    let result = text.replace(headerPattern, (_match, lead: string, name: string, separator: string, value: string) => {
      return `${lead}${name}${separator}${redactValue(value)}`;
    });
    result = result.replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
    result = result.replace(JWT_PATTERN, REDACTED);
    for (const pattern of extraPatterns) {
      result = result.replace(pattern, REDACTED);
    }
    return brand(result);
  };
}

/**
 * Redact secrets from text using the fixed pattern set.
 */
export const sanitize: Sanitizer = createSanitizer();

export const MAX_ERROR_MESSAGE_LENGTH = 1000;

/**
 * Sanitize, then cut to `maxLength` characters with a `... (truncated)` suffix.
 */
export function sanitizeAndTruncate(text: string, maxLength = MAX_ERROR_MESSAGE_LENGTH): SanitizedText {
  const clean = sanitize(text);
  if (clean.length <= maxLength) {
    return clean;
  }
  return brand(`${clean.slice(0, maxLength)}... (truncated)`);
}

/**
 * Sanitize a URL for logging: redacts credential-like query parameters and
 * user info, then runs the text pass over the result.
 */
export function sanitizeUrl(url: string): SanitizedText {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'api-key', 'secret', 'password', 'sig', 'code'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }
    if (urlObj.password) {
      urlObj.password = '***';
    }

    return sanitize(urlObj.toString());
  } catch {
    return sanitize(url);
  }
}
