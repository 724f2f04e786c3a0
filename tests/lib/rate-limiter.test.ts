import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter, getClientId } from '../../src/lib/rate-limiter';

describe('RateLimiter', () => {
  const start = 1_700_000_000_000;
  let clock: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = start;
    limiter = new RateLimiter({ limit: 3, periodSeconds: 10, now: () => clock });
  });

  it('should admit up to the limit and reject the next request', () => {
    expect(limiter.isAllowed('client-a')).toBe(true);
    expect(limiter.isAllowed('client-a')).toBe(true);
    expect(limiter.isAllowed('client-a')).toBe(true);
    expect(limiter.isAllowed('client-a')).toBe(false);
    expect(limiter.getRemainingRequests('client-a')).toBe(0);
  });

  it('should admit again once the window has passed', () => {
    for (let i = 0; i < 3; i++) limiter.isAllowed('client-a');

    clock = start + 9_999;
    expect(limiter.isAllowed('client-a')).toBe(false);

    clock = start + 10_000;
    expect(limiter.isAllowed('client-a')).toBe(true);
    expect(limiter.getRemainingRequests('client-a')).toBe(2);
  });

  it('should slide the window one request at a time', () => {
    limiter.isAllowed('client-a');
    clock = start + 4_000;
    limiter.isAllowed('client-a');
    limiter.isAllowed('client-a');

    clock = start + 10_000;
    expect(limiter.isAllowed('client-a')).toBe(true);
    expect(limiter.isAllowed('client-a')).toBe(false);
  });

  it('should isolate clients', () => {
    for (let i = 0; i < 3; i++) limiter.isAllowed('client-a');

    expect(limiter.isAllowed('client-a')).toBe(false);
    expect(limiter.isAllowed('client-b')).toBe(true);
    expect(limiter.getRemainingRequests('client-b')).toBe(2);
  });

  it('should not count read queries as requests', () => {
    expect(limiter.getRemainingRequests('client-a')).toBe(3);
    expect(limiter.getResetTime('client-a')).toBeNull();
    expect(limiter.trackedClients).toBe(0);

    for (let i = 0; i < 3; i++) {
      expect(limiter.isAllowed('client-a')).toBe(true);
    }
  });

  it('should report the reset time of the oldest request', () => {
    limiter.isAllowed('client-a');
    clock = start + 2_000;
    limiter.isAllowed('client-a');

    expect(limiter.getResetTime('client-a')).toBe(start + 10_000);

    clock = start + 10_000;
    expect(limiter.getResetTime('client-a')).toBe(start + 12_000);

    clock = start + 12_000;
    expect(limiter.getResetTime('client-a')).toBeNull();
  });

  it('should report whole seconds until retry', () => {
    expect(limiter.getRetryAfter('client-a')).toBe(0);

    for (let i = 0; i < 3; i++) limiter.isAllowed('client-a');
    clock = start + 2_500;

    expect(limiter.getRetryAfter('client-a')).toBe(7);
  });

  it('should sweep clients with no recent requests', () => {
    limiter.isAllowed('stale');
    clock = start + 3_000_000;
    limiter.isAllowed('active');

    clock = start + 3_600_000;
    expect(limiter.cleanupOldEntries()).toBe(1);
    expect(limiter.trackedClients).toBe(1);
    expect(limiter.getRemainingRequests('active')).toBe(3);
  });

  it('should honor a custom sweep age', () => {
    limiter.isAllowed('client-a');
    clock = start + 5_000;

    expect(limiter.cleanupOldEntries(10)).toBe(0);
    expect(limiter.cleanupOldEntries(5)).toBe(1);
  });
});

describe('getClientId', () => {
  it('should prefer the first forwarded address', () => {
    expect(
      getClientId({
        headers: { 'x-forwarded-for': '203.0.113.7, 10.0.0.1', 'x-real-ip': '198.51.100.2' },
        socket: { remoteAddress: '127.0.0.1' },
      })
    ).toBe('203.0.113.7');
  });

  it('should fall back to the real-ip header', () => {
    expect(
      getClientId({ headers: { 'x-real-ip': '198.51.100.2' }, socket: { remoteAddress: '127.0.0.1' } })
    ).toBe('198.51.100.2');
  });

  it('should fall back to the socket peer', () => {
    expect(getClientId({ headers: {}, socket: { remoteAddress: '127.0.0.1' } })).toBe('127.0.0.1');
  });

  it('should return unknown without any address', () => {
    expect(getClientId({ headers: {} })).toBe('unknown');
    expect(getClientId({ headers: { 'x-forwarded-for': '  ' } })).toBe('unknown');
  });
});
