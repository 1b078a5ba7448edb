import { describe, it, expect } from 'vitest';
import { DomainRateLimiter } from '../rate-limiter.js';

describe('DomainRateLimiter', () => {
  it('hands out consecutive slots per domain', () => {
    const limiter = new DomainRateLimiter(1000);

    expect(limiter.reserve('blog.example.com', 0)).toBe(0);
    expect(limiter.reserve('blog.example.com', 0)).toBe(1000);
    expect(limiter.reserve('blog.example.com', 500)).toBe(1500);
    expect(limiter.reserve('other.example.com', 500)).toBe(0);
  });

  it('does not make callers wait once the interval has passed', () => {
    const limiter = new DomainRateLimiter(1000);

    limiter.reserve('blog.example.com', 0);
    expect(limiter.reserve('blog.example.com', 5000)).toBe(0);
  });

  it('never lowers the interval below the minimum', () => {
    const limiter = new DomainRateLimiter(1000);

    limiter.setInterval('blog.example.com', 200);
    expect(limiter.intervalFor('blog.example.com')).toBe(1000);

    limiter.setInterval('blog.example.com', 5000);
    expect(limiter.intervalFor('blog.example.com')).toBe(5000);
    expect(limiter.intervalFor('other.example.com')).toBe(1000);
  });

  it('waits for the reserved slot', async () => {
    const limiter = new DomainRateLimiter(30);
    const startedAt = Date.now();

    await limiter.waitForSlot('blog.example.com');
    await limiter.waitForSlot('blog.example.com');

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(25);
  });
});
