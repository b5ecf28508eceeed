// Transport seam between the client and whatever performs the exchange.
// Narrow on purpose: the undici fetch satisfies it, and so does a test double.

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface TransportRequest {
  body: string | Uint8Array | null;
  headers: Record<string, string>;
  method: HttpMethod;
  signal: AbortSignal;
}

export interface TransportResponse {
  readonly body: AsyncIterable<Uint8Array> | null;
  readonly headers: { get(name: string): string | null };
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: TransportRequest) => Promise<TransportResponse>;

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  fetch: FetchLike;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
  random: () => number;
}
