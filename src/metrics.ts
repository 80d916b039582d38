import { ErrorCount, LatencyStats, LoadTestConfig, Report, RequestOutcome, UserSummary } from './types.js';

const EMPTY_STATS: LatencyStats = { count: 0, min: 0, max: 0, mean: 0, median: 0, p95: 0, p99: 0, stdDev: 0 };

/**
 * Percentile of an ascending list, interpolating linearly between the two
 * closest ranks.
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function calculateLatencyStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { ...EMPTY_STATS };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);
  const mean = sum / sorted.length;
  const variance = sorted.length > 1
    ? sorted.reduce((acc, value) => acc + (value - mean) ** 2, 0) / (sorted.length - 1)
    : 0;

  return {
    count: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    // Float summation can drift just outside [min, max] for identical samples
    mean: Math.min(Math.max(mean, sorted[0]), sorted[sorted.length - 1]),
    median: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    stdDev: Math.sqrt(variance),
  };
}

export interface StatusDistribution {
  '2xx': number;
  '3xx': number;
  '4xx': number;
  '5xx': number;
  other: number;
}

export function getStatusCodeDistributionByCategory(statusCodes: ReadonlyMap<number, number>): StatusDistribution {
  const distribution: StatusDistribution = { '2xx': 0, '3xx': 0, '4xx': 0, '5xx': 0, other: 0 };

  for (const [code, count] of statusCodes) {
    if (code >= 200 && code < 300) {
      distribution['2xx'] += count;
    } else if (code >= 300 && code < 400) {
      distribution['3xx'] += count;
    } else if (code >= 400 && code < 500) {
      distribution['4xx'] += count;
    } else if (code >= 500 && code < 600) {
      distribution['5xx'] += count;
    } else {
      distribution.other += count;
    }
  }

  return distribution;
}

export interface ReportInput {
  config: LoadTestConfig;
  outcomes: RequestOutcome[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export function buildReport(input: ReportInput): Report {
  const { config, outcomes, startedAt, finishedAt, durationMs } = input;

  const statusCodes = new Map<number, number>();
  const errors = new Map<string, number>();
  const perUser = new Map<number, number>();
  let succeeded = 0;
  const latencies: number[] = [];

  for (const outcome of outcomes) {
    if (outcome.success) {
      succeeded++;
      latencies.push(outcome.latencyMs);
    }
    if (outcome.statusCode !== null) {
      statusCodes.set(outcome.statusCode, (statusCodes.get(outcome.statusCode) ?? 0) + 1);
    }
    if (outcome.error !== null) {
      errors.set(outcome.error, (errors.get(outcome.error) ?? 0) + 1);
    }
    perUser.set(outcome.userId, (perUser.get(outcome.userId) ?? 0) + 1);
  }

  const errorList: ErrorCount[] = [...errors]
    .map(([message, count]) => ({ message, count }))
    .sort((a, b) => b.count - a.count || a.message.localeCompare(b.message));

  const userList: UserSummary[] = [...perUser]
    .map(([userId, requests]) => ({ userId, requests }))
    .sort((a, b) => a.userId - b.userId);

  const totalRequests = outcomes.length;

  return Object.freeze({
    config,
    startedAt,
    finishedAt,
    durationMs,
    totalRequests,
    succeeded,
    failed: totalRequests - succeeded,
    successRate: totalRequests > 0 ? (succeeded / totalRequests) * 100 : 0,
    requestsPerSecond: durationMs > 0 ? totalRequests / (durationMs / 1000) : 0,
    latency: calculateLatencyStats(latencies),
    statusCodes: new Map([...statusCodes].sort(([a], [b]) => a - b)),
    errors: errorList,
    perUser: userList,
    outcomes: Object.freeze([...outcomes]),
  });
}
