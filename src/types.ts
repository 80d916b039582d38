export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface LoadTestConfig {
  url: string;
  concurrentUsers: number;
  durationSeconds: number;
  delay?: DelayRange;
  timeoutMs: number;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export interface RequestOutcome {
  userId: number;
  sequence: number;
  timestamp: string;
  latencyMs: number;
  statusCode: number | null;
  success: boolean;
  error: string | null;
}

export interface LatencyStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p95: number;
  p99: number;
  stdDev: number;
}

export interface ErrorCount {
  message: string;
  count: number;
}

export interface UserSummary {
  userId: number;
  requests: number;
}

export interface Report {
  readonly config: LoadTestConfig;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly totalRequests: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly successRate: number;
  readonly requestsPerSecond: number;
  readonly latency: LatencyStats;
  readonly statusCodes: ReadonlyMap<number, number>;
  readonly errors: readonly ErrorCount[];
  readonly perUser: readonly UserSummary[];
  readonly outcomes: readonly RequestOutcome[];
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
