/**
 * Trendwire — HTTP Session
 *
 * Scoped network session for one source call. The abort controller is
 * created on the first request; close() aborts whatever is still in
 * flight and refuses further requests. Sources always run inside
 * withSession(), which closes the session on every exit path.
 */

import type { z } from 'zod';
import { UpstreamError } from './errors';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpSessionOptions {
  headers?: Record<string, string>;
  /** Parent signal; aborting it closes the session */
  signal?: AbortSignal;
}

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  method?: 'GET' | 'POST';
  body?: string | URLSearchParams;
}

export class SessionClosedError extends Error {
  constructor() {
    super('HTTP session is closed');
    this.name = 'SessionClosedError';
  }
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

export class HttpSession {
  private controller: AbortController | null = null;
  private isClosed = false;
  private requestCount = 0;
  private readonly detachParent: () => void = () => {};

  constructor(private readonly options: HttpSessionOptions = {}) {
    const parent = options.signal;
    if (parent) {
      const onAbort = () => this.close();
      if (parent.aborted) {
        this.isClosed = true;
      } else {
        parent.addEventListener('abort', onAbort, { once: true });
        this.detachParent = () => parent.removeEventListener('abort', onAbort);
      }
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Requests issued so far; zero means the session was never acquired. */
  get requests(): number {
    return this.requestCount;
  }

  /**
   * Issue a request and parse the JSON body against `schema`.
   * Throws UpstreamError on non-2xx, ZodError on an unexpected payload.
   */
  async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const res = await this.request(url, options);
    const data: unknown = await res.json();
    return schema.parse(data);
  }

  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    const target = buildUrl(url, options.params);
    const res = await fetch(target, {
      method: options.method ?? 'GET',
      headers: { ...this.options.headers, ...options.headers },
      body: options.body,
      signal: this.acquire().signal,
    });

    if (!res.ok) {
      throw new UpstreamError(res.status, target);
    }

    return res;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.detachParent();
    this.controller?.abort();
    this.controller = null;
  }

  private acquire(): AbortController {
    if (this.isClosed) {
      throw new SessionClosedError();
    }
    this.requestCount++;
    this.controller ??= new AbortController();
    return this.controller;
  }
}

/**
 * Run `work` with a fresh session and close it afterwards, whether
 * `work` resolves or throws.
 */
export async function withSession<T>(
  options: HttpSessionOptions,
  work: (session: HttpSession) => Promise<T>
): Promise<T> {
  const session = new HttpSession(options);
  try {
    return await work(session);
  } finally {
    session.close();
  }
}
