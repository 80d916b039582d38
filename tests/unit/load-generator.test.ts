/**
 * Unit Tests: user loops, deadline handling, join barrier, validation before traffic.
 */
import { describe, it, expect, vi } from 'vitest';
import { LoadGenerator, pickDelay, runLoad } from '../../src/load-generator.js';
import { ConfigurationError } from '../../src/errors.js';
import {
  connectionRefused,
  createDelayedFetch,
  createMockFetch,
  mockTextResponse,
} from '../helpers/mock-fetch.js';

const URL_UNDER_TEST = 'http://localhost:8080/health';

/**
 * Fake clock that moves forward by `stepMs` on every fetch call.
 */
function steppingFetch(stepMs: number, status = 200) {
  let now = 0;
  const fetch = createMockFetch();
  fetch.mockImplementation(async () => {
    now += stepMs;
    return mockTextResponse('ok', status);
  });
  return { fetch, now: () => now };
}

describe('pickDelay', () => {
  it('is zero without a range', () => {
    expect(pickDelay(undefined)).toBe(0);
  });

  it('returns a fixed delay', () => {
    expect(pickDelay({ minMs: 250, maxMs: 250 }, () => 0.9)).toBe(250);
  });

  it('scales random into the range', () => {
    expect(pickDelay({ minMs: 100, maxMs: 300 }, () => 0.5)).toBe(200);
    expect(pickDelay({ minMs: 100, maxMs: 300 }, () => 0)).toBe(100);
  });
});

describe('LoadGenerator validation', () => {
  it.each([
    ['zero users', { url: URL_UNDER_TEST, concurrentUsers: 0, durationSeconds: 1 }],
    ['zero duration', { url: URL_UNDER_TEST, concurrentUsers: 1, durationSeconds: 0 }],
    ['invalid url', { url: 'localhost:8080', concurrentUsers: 1, durationSeconds: 1 }],
  ])('rejects %s before any request', async (_, input) => {
    const fetch = createMockFetch();
    const generator = new LoadGenerator({ fetch });

    await expect(generator.run(input)).rejects.toThrow(ConfigurationError);
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('LoadGenerator.run', () => {
  it('issues requests until the deadline, then stops', async () => {
    const { fetch, now } = steppingFetch(100);

    const report = await runLoad(
      { url: URL_UNDER_TEST, concurrentUsers: 1, durationSeconds: 1 },
      { fetch, now },
    );

    expect(report.totalRequests).toBe(10);
    expect(report.durationMs).toBe(1000);
    expect(fetch).toHaveBeenCalledTimes(10);
  });

  it('lets a request in flight at the deadline finish and records it', async () => {
    const { fetch, now } = steppingFetch(600);

    const report = await runLoad(
      { url: URL_UNDER_TEST, concurrentUsers: 1, durationSeconds: 1 },
      { fetch, now },
    );

    expect(report.totalRequests).toBe(2);
    expect(report.succeeded).toBe(2);
    expect(report.durationMs).toBe(1200);
  });

  it('accounts for every outcome across concurrent users', async () => {
    const fetch = createDelayedFetch(200, 10);
    const onOutcome = vi.fn();

    const report = await new LoadGenerator({ fetch, onOutcome }).run({
      url: URL_UNDER_TEST,
      concurrentUsers: 4,
      durationSeconds: 0.2,
    });

    expect(report.totalRequests).toBe(fetch.mock.calls.length);
    expect(report.totalRequests).toBe(report.outcomes.length);
    expect(report.succeeded + report.failed).toBe(report.totalRequests);
    expect(onOutcome).toHaveBeenCalledTimes(report.totalRequests);
    expect(report.perUser.map(u => u.userId)).toEqual([0, 1, 2, 3]);
    expect(report.durationMs).toBeGreaterThanOrEqual(200);
  });

  it('keeps each user\'s outcomes in issue order', async () => {
    const fetch = createDelayedFetch(200, 5);

    const report = await runLoad(
      { url: URL_UNDER_TEST, concurrentUsers: 3, durationSeconds: 0.1 },
      { fetch },
    );

    for (const { userId, requests } of report.perUser) {
      const sequences = report.outcomes.filter(o => o.userId === userId).map(o => o.sequence);
      expect(sequences).toEqual(Array.from({ length: requests }, (_, i) => i));
    }
  });

  it('cuts the inter-request delay short at the deadline', async () => {
    const fetch = createMockFetch();
    fetch.mockImplementation(async () => mockTextResponse('ok'));

    const report = await runLoad(
      { url: URL_UNDER_TEST, concurrentUsers: 1, durationSeconds: 0.1, delay: { minMs: 10000, maxMs: 10000 } },
      { fetch },
    );

    expect(report.totalRequests).toBe(1);
    expect(report.durationMs).toBeLessThan(1000);
  });

  it('absorbs transport failures without aborting the run', async () => {
    const fetch = createMockFetch();
    fetch.mockImplementation(
      () => new Promise((_, reject) => setTimeout(() => reject(connectionRefused()), 5)),
    );

    const report = await runLoad(
      { url: URL_UNDER_TEST, concurrentUsers: 2, durationSeconds: 0.1 },
      { fetch },
    );

    expect(report.totalRequests).toBeGreaterThan(0);
    expect(report.succeeded).toBe(0);
    expect(report.failed).toBe(report.totalRequests);
    expect(report.statusCodes.size).toBe(0);
    expect(report.errors).toEqual([{ message: 'ECONNREFUSED', count: report.totalRequests }]);
  });
});
