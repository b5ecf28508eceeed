import type { Credential } from '@cloudcall/auth';
import {
  ConfigurationError,
  errorFromResponse,
  getErrorMessage,
  HttpError,
  sanitizeUrl,
  SdkDependencyError,
  StreamError,
  type AnySdkError,
} from '@cloudcall/core';
import { getLogger, type Logger } from '@cloudcall/logger';
import { parseRetryAfter, RetryEngine, RetryPolicy, sleep } from '@cloudcall/resilience';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import { z, type ZodType } from 'zod';

import { buildUrl, encodeBody, hasEmptyBody, isAbsoluteHttpUrl } from './core/http-utils.js';
import type { HttpEffects, HttpMethod, TransportResponse } from './core/types.js';
import { sanitizeEndpoint } from './instrumentation.js';
import { DEFAULT_MAX_BUFFER_BYTES, parseFrames, type StreamFrame } from './sse/frame-parser.js';
import {
  DEFAULT_API_VERSION,
  DEFAULT_AUTH_HEADER,
  DEFAULT_TIMEOUT_MS,
  type ApiClientConfig,
  type ApiClientHooks,
  type RequestOptions,
  type SchemaRequestOptions,
  type StreamRequestOptions,
} from './types.js';

const clientConfigSchema = z.object({
  apiVersion: z.string().trim().min(1, { message: 'must not be empty' }).default(DEFAULT_API_VERSION),
  authHeaderName: z
    .string()
    .regex(/^[A-Za-z0-9-]+$/, { message: 'must be a valid header name' })
    .default(DEFAULT_AUTH_HEADER),
  endpoint: z.string().trim().refine(isAbsoluteHttpUrl, { message: 'must be an absolute http(s) URL' }),
  maxStreamBufferBytes: z.number().int().positive().default(DEFAULT_MAX_BUFFER_BYTES),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

interface ResolvedClientConfig extends z.infer<typeof clientConfigSchema> {
  credential: Credential;
  defaultHeaders: Record<string, string>;
  hooks?: ApiClientHooks | undefined;
  instrumentation?: ApiClientConfig['instrumentation'];
  retryPolicy: RetryPolicy;
}

export type FrameStream = AsyncGenerator<Result<StreamFrame, StreamError>, void, undefined>;

type JsonRequestOptions = RequestOptions & { schema?: ZodType<unknown> | undefined };
type ResponseHandler<T> = (response: TransportResponse) => Promise<Result<T, AnySdkError>>;

interface RequestContext {
  endpoint: string;
  method: HttpMethod;
  options: RequestOptions;
  streaming: boolean;
  url: string;
}

interface AttemptOutcome<T> {
  result: Result<T, AnySdkError>;
  /** Absent when no response arrived. */
  status?: number | undefined;
}

/**
 * Client core for one API endpoint.
 *
 * Every call, streaming or not, runs through the same retry loop. Each attempt
 * resolves the credential again, sends one request and turns a non-success
 * response into a typed error. Streams are retried only until they are
 * established; once frames reach the caller nothing is re-sent.
 */
export class ApiClient {
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;
  private readonly engine: RetryEngine;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;
  private isClosed = false;

  private constructor(
    private readonly config: ResolvedClientConfig,
    effects?: Partial<HttpEffects>
  ) {
    this.logger = getLogger(`ApiClient:${new URL(config.endpoint).host}`);

    // Initialize undici agent for connection pooling and proper cleanup
    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    // Initialize effects with production defaults
    this.effects = {
      delay: sleep,
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      random: Math.random,
      ...effects,
    };

    this.engine = new RetryEngine(config.retryPolicy, {
      delay: this.effects.delay,
      now: this.effects.now,
      random: this.effects.random,
    });

    this.logger.debug(
      `API client initialized - Endpoint: ${sanitizeUrl(config.endpoint)}, ApiVersion: ${config.apiVersion}, Timeout: ${config.timeoutMs}ms, MaxRetries: ${config.retryPolicy.maxRetries}, Credential: ${String(config.credential)}`
    );
  }

  static create(config: ApiClientConfig, effects?: Partial<HttpEffects>): Result<ApiClient, ConfigurationError> {
    const parsed = clientConfigSchema.safeParse({
      apiVersion: config.apiVersion,
      authHeaderName: config.authHeaderName,
      endpoint: config.endpoint,
      maxStreamBufferBytes: config.maxStreamBufferBytes,
      timeoutMs: config.timeoutMs,
    });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(new ConfigurationError(`Invalid client configuration: ${issues}`));
    }

    return ok(
      new ApiClient(
        {
          ...parsed.data,
          credential: config.credential,
          defaultHeaders: config.defaultHeaders ?? {},
          hooks: config.hooks,
          instrumentation: config.instrumentation,
          retryPolicy: config.retryPolicy ?? RetryPolicy.default(),
        },
        effects
      )
    );
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  get apiVersion(): string {
    return this.config.apiVersion;
  }

  get retryPolicy(): RetryPolicy {
    return this.config.retryPolicy;
  }

  /** Join a path, with or without its leading slash, to the endpoint. */
  url(path: string): string {
    return buildUrl(this.config.endpoint, path);
  }

  /**
   * Send a non-streaming request and parse its JSON body.
   * An empty body (204, or zero length) yields `undefined`.
   */
  request<T>(path: string, options: SchemaRequestOptions<T>): Promise<Result<T, AnySdkError>>;
  request(path: string, options?: RequestOptions): Promise<Result<unknown, AnySdkError>>;
  request(path: string, options: JsonRequestOptions = {}): Promise<Result<unknown, AnySdkError>> {
    return this.sendJson(path, options, options.schema);
  }

  get<T>(path: string, options: Omit<SchemaRequestOptions<T>, 'body' | 'method'>): Promise<Result<T, AnySdkError>>;
  get(path: string, options?: Omit<RequestOptions, 'body' | 'method'>): Promise<Result<unknown, AnySdkError>>;
  get(path: string, options: Omit<JsonRequestOptions, 'body' | 'method'> = {}): Promise<Result<unknown, AnySdkError>> {
    return this.sendJson(path, { ...options, method: 'GET' }, options.schema);
  }

  post<T>(
    path: string,
    body: unknown,
    options: Omit<SchemaRequestOptions<T>, 'body' | 'method'>
  ): Promise<Result<T, AnySdkError>>;
  post(
    path: string,
    body?: unknown,
    options?: Omit<RequestOptions, 'body' | 'method'>
  ): Promise<Result<unknown, AnySdkError>>;
  post(
    path: string,
    body?: unknown,
    options: Omit<JsonRequestOptions, 'body' | 'method'> = {}
  ): Promise<Result<unknown, AnySdkError>> {
    return this.sendJson(path, { ...options, body, method: 'POST' }, options.schema);
  }

  /**
   * Send a streaming request. Resolves once a success status arrives, with the
   * frames of the response body. Defaults to POST.
   */
  async stream(path: string, options: StreamRequestOptions = {}): Promise<Result<FrameStream, AnySdkError>> {
    const maxBufferBytes = options.maxBufferBytes ?? this.config.maxStreamBufferBytes;
    const body = await this.execute(
      path,
      { ...options, method: options.method ?? 'POST' },
      true,
      (response): Promise<Result<AsyncIterable<Uint8Array>, AnySdkError>> =>
        Promise.resolve(response.body ? ok(response.body) : err(new StreamError('response has no body')))
    );
    return body.map((source) => parseFrames(source, { maxBufferBytes }));
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    if (this.isClosed) {
      return;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.isClosed = true;
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = getErrorMessage(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new SdkDependencyError(`HTTP agent cleanup failed: ${errorMessage}`, { cause: error });
      }
    })();

    return this.closePromise;
  }

  private sendJson(
    path: string,
    options: RequestOptions,
    schema: ZodType<unknown> | undefined
  ): Promise<Result<unknown, AnySdkError>> {
    return this.execute(path, options, false, (response) => this.readJson(response, schema));
  }

  /**
   * One logical request: the retry loop plus the once-per-request hooks.
   */
  private async execute<T>(
    path: string,
    options: RequestOptions,
    streaming: boolean,
    handle: ResponseHandler<T>
  ): Promise<Result<T, AnySdkError>> {
    const ctx: RequestContext = {
      endpoint: sanitizeEndpoint(path),
      method: options.method ?? 'GET',
      options,
      streaming,
      url: this.url(path),
    };
    const hooks = this.config.hooks;
    const last: { status?: number | undefined } = {};

    // Emit start event once before retry loop (logical request started)
    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ endpoint: ctx.endpoint, method: ctx.method, timestamp: startTime });

    const result = await this.engine.executeWithRetry(
      async (attempt, signal) => {
        const attemptStart = this.effects.now();
        const outcome = await this.exchange(ctx, attempt, signal, handle);
        last.status = outcome.status;
        this.recordMetric(ctx, attempt, attemptStart, outcome);
        return outcome.result;
      },
      {
        hooks: { onBackoff: hooks?.onBackoff },
        label: `${ctx.method} ${ctx.endpoint}`,
        signal: options.signal,
      }
    );

    const durationMs = this.effects.now() - startTime;
    if (result.isOk()) {
      hooks?.onRequestSuccess?.({ durationMs, endpoint: ctx.endpoint, method: ctx.method, status: last.status ?? 0 });
    } else {
      hooks?.onRequestFailure?.({
        durationMs,
        endpoint: ctx.endpoint,
        error: result.error.message,
        method: ctx.method,
        status: last.status,
      });
    }
    return result;
  }

  /**
   * A single physical attempt. The timeout runs until `handle` returns, which
   * for streams is as soon as the body is available.
   */
  private async exchange<T>(
    ctx: RequestContext,
    attempt: number,
    signal: AbortSignal | undefined,
    handle: ResponseHandler<T>
  ): Promise<AttemptOutcome<T>> {
    const authorization = await this.config.credential.resolve();
    if (authorization.isErr()) {
      return { result: err(authorization.error) };
    }

    const encoded = encodeBody(ctx.options.body);
    const headers: Record<string, string> = {
      Accept: ctx.streaming ? 'text/event-stream' : 'application/json',
      'api-version': this.config.apiVersion,
      ...this.config.defaultHeaders,
      ...ctx.options.headers,
      [this.config.authHeaderName]: authorization.value,
    };
    if (encoded?.contentType) {
      headers['Content-Type'] = encoded.contentType;
    }

    const timeoutMs = ctx.options.timeoutMs ?? this.config.timeoutMs;
    const timeoutController = new AbortController();
    const timeoutId = setTimeout(() => timeoutController.abort(), timeoutMs);
    const fetchSignal = signal ? AbortSignal.any([signal, timeoutController.signal]) : timeoutController.signal;
    const timedOut = (cause: unknown) => new HttpError(`Request timeout after ${timeoutMs}ms`, { cause });

    this.effects.log(
      'debug',
      `Making HTTP request - URL: ${sanitizeUrl(ctx.url)}, Method: ${ctx.method}, Attempt: ${attempt + 1}/${this.config.retryPolicy.maxAttempts}`
    );

    try {
      let response: TransportResponse;
      try {
        response = await this.effects.fetch(ctx.url, {
          // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
          body: encoded?.body ?? null,
          headers,
          method: ctx.method,
          signal: fetchSignal,
        });
      } catch (error) {
        if (timeoutController.signal.aborted) {
          return { result: err(timedOut(error)) };
        }
        if (signal?.aborted) {
          return { result: err(new HttpError('Request aborted', { cause: signal.reason })) };
        }
        this.effects.log('warn', `Request failed - URL: ${sanitizeUrl(ctx.url)}, Error: ${getErrorMessage(error)}`, {
          attempt,
          method: ctx.method,
        });
        return { result: err(new HttpError(`request failed: ${getErrorMessage(error)}`, { cause: error })) };
      }

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
        this.effects.log('warn', `Request failed - URL: ${sanitizeUrl(ctx.url)}, Status: ${response.status}`, {
          attempt,
          method: ctx.method,
          retryAfter,
        });
        return { result: err(errorFromResponse(response.status, errorText, retryAfter)), status: response.status };
      }

      const result = await handle(response);
      if (result.isErr() && timeoutController.signal.aborted) {
        return { result: err(timedOut(result.error)), status: response.status };
      }
      return { result, status: response.status };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readJson(
    response: TransportResponse,
    schema: ZodType<unknown> | undefined
  ): Promise<Result<unknown, AnySdkError>> {
    let text: string;
    try {
      text = hasEmptyBody(response) ? '' : await response.text();
    } catch (error) {
      return err(new HttpError(`failed to read response body: ${getErrorMessage(error)}`, { cause: error }));
    }

    let data: unknown;
    if (text !== '') {
      try {
        data = JSON.parse(text);
      } catch (error) {
        return err(new SdkDependencyError(`invalid JSON response: ${getErrorMessage(error)}`, { cause: error }));
      }
    }

    if (!schema) {
      return ok(data);
    }

    const parseResult = schema.safeParse(data);
    if (!parseResult.success) {
      const allIssues = parseResult.error.issues;
      const firstFiveErrors = allIssues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');

      this.effects.log(
        'error',
        `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
        { status: response.status }
      );
      return err(
        new SdkDependencyError(`Response validation failed: ${firstFiveErrors}`, {
          cause: parseResult.error,
          context: { issueCount: allIssues.length },
        })
      );
    }
    return ok(parseResult.data);
  }

  /**
   * Record request metric if instrumentation is enabled
   */
  private recordMetric<T>(ctx: RequestContext, attempt: number, startTime: number, outcome: AttemptOutcome<T>): void {
    const instrumentation = this.config.instrumentation;
    if (!instrumentation) {
      return;
    }

    const now = this.effects.now();
    instrumentation.record({
      attempt,
      durationMs: now - startTime,
      endpoint: ctx.endpoint,
      error: outcome.result.isErr() ? outcome.result.error.name : undefined,
      method: ctx.method,
      status: outcome.status ?? 0,
      streaming: ctx.streaming,
      timestamp: now,
    });
  }
}
