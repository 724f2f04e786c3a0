/**
 * Trendwire — Errors
 */

/**
 * Non-2xx response from an upstream API.
 */
export class UpstreamError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    message = `Upstream responded ${status}`
  ) {
    super(message);
    this.name = 'UpstreamError';
  }

  get rateLimited(): boolean {
    return this.status === 429;
  }
}

/**
 * The whole aggregation ran past the caller's deadline.
 * Distinct from a single source timing out, which is recovered locally.
 */
export class AggregationTimeoutError extends Error {
  readonly status = 504;

  constructor(readonly timeoutMs: number) {
    super(`Aggregation exceeded ${timeoutMs}ms`);
    this.name = 'AggregationTimeoutError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Aggregator could not be constructed at startup.
 */
export class InitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InitError';
  }
}

const TIMED_OUT = Symbol('timed-out');

/**
 * Race a promise against a deadline. `onTimeout` runs once the deadline
 * passes and its return value becomes the result; the original promise is
 * abandoned, not awaited.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => T
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    const result = await Promise.race([promise, deadline]);
    return result === TIMED_OUT ? onTimeout() : result;
  } finally {
    clearTimeout(timer);
  }
}
