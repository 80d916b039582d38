import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import chalk from 'chalk';
import { ReportWriteError } from './errors.js';
import { getStatusCodeDistributionByCategory } from './metrics.js';
import { LoadTestConfig, Report } from './types.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

export interface ReporterOptions {
  format: OutputFormat;
}

export interface SerializeOptions {
  includeOutcomes?: boolean;
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatLatency(ms: number): string {
  return ms.toFixed(1);
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function describeDelay(config: LoadTestConfig): string {
  if (!config.delay) return 'none';
  const { minMs, maxMs } = config.delay;
  return minMs === maxMs ? `${minMs}ms` : `${minMs}-${maxMs}ms`;
}

/**
 * Builds the machine-readable results document. Latencies are in milliseconds.
 */
export function serializeReport(report: Report, options: SerializeOptions = {}) {
  return {
    test_config: {
      url: report.config.url,
      method: report.config.method,
      concurrent_users: report.config.concurrentUsers,
      duration_seconds: report.config.durationSeconds,
      timeout_ms: report.config.timeoutMs,
      delay_ms: report.config.delay
        ? { min: report.config.delay.minMs, max: report.config.delay.maxMs }
        : null,
    },
    started_at: report.startedAt,
    finished_at: report.finishedAt,
    duration_ms: round(report.durationMs),
    requests: {
      total: report.totalRequests,
      succeeded: report.succeeded,
      failed: report.failed,
      success_rate: round(report.successRate),
    },
    latency_ms: {
      samples: report.latency.count,
      min: round(report.latency.min),
      max: round(report.latency.max),
      mean: round(report.latency.mean),
      median: round(report.latency.median),
      p95: round(report.latency.p95),
      p99: round(report.latency.p99),
      std_dev: round(report.latency.stdDev),
    },
    throughput_rps: round(report.requestsPerSecond),
    status_codes: Object.fromEntries([...report.statusCodes].map(([code, count]) => [String(code), count])),
    errors: report.errors.map(({ message, count }) => ({ message, count })),
    per_user: report.perUser.map(({ userId, requests }) => ({ user_id: userId, requests })),
    ...(options.includeOutcomes && {
      results: report.outcomes.map(outcome => ({
        user_id: outcome.userId,
        sequence: outcome.sequence,
        timestamp: outcome.timestamp,
        latency_ms: round(outcome.latencyMs),
        status_code: outcome.statusCode,
        success: outcome.success,
        error: outcome.error,
      })),
    }),
  };
}

export async function writeReport(path: string, report: Report, options: SerializeOptions = {}): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(serializeReport(report, options), null, 2)}\n`, 'utf8');
  } catch (error) {
    throw new ReportWriteError(path, error);
  }
}

export function printRunStart(config: LoadTestConfig): void {
  console.log(`Starting load test for ${chalk.bold(config.url)}`);
  console.log(`Concurrent users: ${config.concurrentUsers}`);
  console.log(`Test duration:    ${config.durationSeconds} seconds`);
  console.log(`Request delay:    ${describeDelay(config)}`);
  console.log(chalk.gray('-'.repeat(50)));
}

export function printProgress(completed: number): void {
  process.stdout.write(`\rRequests: ${completed}`);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow(`Warning: ${message}`));
}

export function printResults(report: Report, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      printJson(report);
      break;
    case 'csv':
      printCsv(report);
      break;
    default:
      printPretty(report);
  }
}

function printPretty(report: Report): void {
  const stats = report.latency;
  const successRate = report.successRate.toFixed(1);

  console.log('');
  console.log(chalk.bold('Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Target:')}        ${report.config.method} ${report.config.url}`);
  console.log(`${chalk.cyan('Users:')}         ${report.config.concurrentUsers}`);
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(report.durationMs)}`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${report.totalRequests}`);
  console.log(`  Succeeded:    ${chalk.green(report.succeeded)} (${successRate}%)`);
  console.log(`  Failed:       ${chalk.red(report.failed)} (${(100 - report.successRate).toFixed(1)}%)`);
  console.log('');

  if (stats.count > 0) {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Min:          ${formatLatency(stats.min)}`);
    console.log(`  Max:          ${formatLatency(stats.max)}`);
    console.log(`  Mean:         ${formatLatency(stats.mean)}`);
    console.log(`  Median:       ${formatLatency(stats.median)}`);
    console.log(`  p95:          ${formatLatency(stats.p95)}`);
    console.log(`  p99:          ${formatLatency(stats.p99)}`);
    if (stats.count > 1) {
      console.log(`  Std Dev:      ${formatLatency(stats.stdDev)}`);
    }
    console.log('');
  }

  if (report.statusCodes.size > 0) {
    const categories = getStatusCodeDistributionByCategory(report.statusCodes);
    console.log(chalk.bold('Status Codes:'));
    for (const [code, count] of report.statusCodes) {
      const paint = code < 400 ? chalk.green : chalk.red;
      console.log(`  ${paint(code)}:          ${count}`);
    }
    console.log(chalk.gray(`  (2xx ${categories['2xx']}, 3xx ${categories['3xx']}, 4xx ${categories['4xx']}, 5xx ${categories['5xx']})`));
    console.log('');
  }

  if (report.errors.length > 0) {
    console.log(chalk.bold('Errors:'));
    for (const { message, count } of report.errors) {
      console.log(`  ${chalk.red(message)}:  ${count}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(report.requestsPerSecond.toFixed(2))} req/s`);
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

function printJson(report: Report): void {
  console.log(JSON.stringify(serializeReport(report), null, 2));
}

export const CSV_HEADER =
  'url,users,duration_ms,total,succeeded,failed,success_rate,min_ms,max_ms,mean_ms,median_ms,p95_ms,p99_ms,throughput_rps';

export function toCsvRow(report: Report): string {
  const stats = report.latency;
  return [
    report.config.url,
    report.config.concurrentUsers,
    Math.round(report.durationMs),
    report.totalRequests,
    report.succeeded,
    report.failed,
    report.successRate.toFixed(2),
    stats.min.toFixed(1),
    stats.max.toFixed(1),
    stats.mean.toFixed(1),
    stats.median.toFixed(1),
    stats.p95.toFixed(1),
    stats.p99.toFixed(1),
    report.requestsPerSecond.toFixed(2),
  ].join(',');
}

function printCsv(report: Report): void {
  console.log(CSV_HEADER);
  console.log(toCsvRow(report));
}

export interface RampLevelSummary {
  concurrentUsers: number;
  report: Report;
}

export function printRampSummary(levels: RampLevelSummary[]): void {
  console.log(chalk.bold('Ramp Summary'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`  ${'Users'.padEnd(8)}${'Total'.padEnd(8)}${'Success'.padEnd(10)}${'Median'.padEnd(10)}${'p95'.padEnd(10)}RPS`);
  for (const { concurrentUsers, report } of levels) {
    console.log(
      `  ${String(concurrentUsers).padEnd(8)}` +
      `${String(report.totalRequests).padEnd(8)}` +
      `${`${report.successRate.toFixed(1)}%`.padEnd(10)}` +
      `${formatLatency(report.latency.median).padEnd(10)}` +
      `${formatLatency(report.latency.p95).padEnd(10)}` +
      report.requestsPerSecond.toFixed(2)
    );
  }
  console.log(chalk.gray('══════════════════════════════════════'));
}
