// Data shapes for the functional core and its injected side effects

export interface FetchInit {
  body: string | null;
  headers: Record<string, string>;
  method: string;
  signal: AbortSignal;
}

/**
 * The subset of a fetch Response the client reads.
 */
export interface FetchResponseLike {
  headers: { get(name: string): string | null };
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface RateLimitHeaderInfo {
  delayMs?: number | undefined;
  source: string;
}

/**
 * Side effects, injectable for tests
 */
export interface HttpEffects {
  /** Resolves after `ms`, or early when `signal` aborts */
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  fetch: FetchLike;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
  random: () => number;
}
