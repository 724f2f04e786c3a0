/**
 * Trendwire — Sliding-Window Rate Limiter
 *
 * Keeps, per client id, the request instants that fall inside the trailing
 * `periodSeconds`. Every method runs synchronously, so a check-and-record
 * cannot interleave with another request for the same client.
 *
 * The limiter owns no timer: callers schedule cleanupOldEntries().
 */

export interface RateLimiterOptions {
  /** Requests admitted per window */
  limit: number;
  /** Window length in seconds */
  periodSeconds: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface ClientAddressSource {
  headers: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string };
}

export class RateLimiter {
  readonly limit: number;
  readonly periodSeconds: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();

  constructor(options: RateLimiterOptions) {
    this.limit = options.limit;
    this.periodSeconds = options.periodSeconds;
    this.now = options.now ?? Date.now;
  }

  /**
   * Admit and record a request, or reject it when the window is full.
   */
  isAllowed(clientId: string): boolean {
    const current = this.now();
    const window = this.windows.get(clientId) ?? [];
    this.evictExpired(window, current);

    if (window.length >= this.limit) {
      this.windows.set(clientId, window);
      return false;
    }

    window.push(current);
    this.windows.set(clientId, window);
    return true;
  }

  getRemainingRequests(clientId: string): number {
    const window = this.windows.get(clientId);
    if (!window) return this.limit;

    this.evictExpired(window, this.now());
    return Math.max(0, this.limit - window.length);
  }

  /**
   * Epoch ms at which the oldest recorded request leaves the window,
   * or null when the client has none.
   */
  getResetTime(clientId: string): number | null {
    const window = this.windows.get(clientId);
    if (!window) return null;

    this.evictExpired(window, this.now());
    if (window.length === 0) return null;

    return window[0] + this.periodSeconds * 1000;
  }

  /**
   * Whole seconds until the client's oldest request leaves the window,
   * 0 when it has none.
   */
  getRetryAfter(clientId: string): number {
    const resetTime = this.getResetTime(clientId);
    if (resetTime === null) return 0;
    return Math.max(0, Math.trunc((resetTime - this.now()) / 1000));
  }

  /**
   * Drop clients whose most recent request is older than `maxAgeSeconds`.
   * Returns how many were removed.
   */
  cleanupOldEntries(maxAgeSeconds = 3600): number {
    const cutoff = this.now() - maxAgeSeconds * 1000;
    let removed = 0;

    for (const [clientId, window] of this.windows) {
      const newest = window[window.length - 1];
      if (newest === undefined || newest <= cutoff) {
        this.windows.delete(clientId);
        removed++;
      }
    }

    return removed;
  }

  get trackedClients(): number {
    return this.windows.size;
  }

  private evictExpired(window: number[], current: number): void {
    const boundary = current - this.periodSeconds * 1000;
    let expired = 0;
    while (expired < window.length && window[expired] <= boundary) {
      expired++;
    }
    if (expired > 0) {
      window.splice(0, expired);
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Client identity: first X-Forwarded-For hop, then X-Real-IP, then the
 * socket peer, then "unknown".
 */
export function getClientId(request: ClientAddressSource): string {
  const forwardedFor = firstHeader(request.headers['x-forwarded-for']);
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0].trim();
    if (first) return first;
  }

  const realIp = firstHeader(request.headers['x-real-ip']);
  if (realIp) return realIp;

  return request.socket?.remoteAddress || 'unknown';
}
