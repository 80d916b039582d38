import { LoadTestConfigInput, validateConfig } from './config.js';
import { ConfigurationError, ReportWriteError } from './errors.js';
import { LoadGenerator } from './load-generator.js';
import { RampLevelSummary, writeReport } from './reporter.js';
import { Report } from './types.js';

export interface RunnerOptions {
  config: LoadTestConfigInput;
  /** Path of the results file; nothing is written when omitted. */
  output?: string;
  includeOutcomes?: boolean;
  generator?: LoadGenerator;
}

export interface RunnerResult {
  report: Report;
  outputPath?: string;
  writeError?: ReportWriteError;
}

/**
 * Runs one load test and persists its report. A failed write is returned
 * alongside the report rather than thrown.
 */
export async function runLoadTest(options: RunnerOptions): Promise<RunnerResult> {
  const generator = options.generator ?? new LoadGenerator();
  const report = await generator.run(options.config);

  if (!options.output) {
    return { report };
  }

  try {
    await writeReport(options.output, report, { includeOutcomes: options.includeOutcomes });
    return { report, outputPath: options.output };
  } catch (error) {
    if (error instanceof ReportWriteError) {
      return { report, writeError: error };
    }
    throw error;
  }
}

export interface RampOptions {
  base: LoadTestConfigInput;
  levels: number[];
  cooldownSeconds: number;
  generator?: LoadGenerator;
  sleep?: (ms: number) => Promise<void>;
  onLevelStart?: (concurrentUsers: number, index: number) => void;
  onLevelComplete?: (level: RampLevelSummary, index: number) => void;
  onCooldown?: (seconds: number) => void;
}

export function parseLevels(text: string): number[] {
  return text
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0)
    .map(Number);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Progressive load: runs the load test once per user count, in order, pausing
 * for the cool-down between levels.
 */
export async function runRamp(options: RampOptions): Promise<RampLevelSummary[]> {
  const { base, levels, cooldownSeconds } = options;
  const issues: string[] = [];

  if (levels.length === 0) {
    issues.push('levels must contain at least one user count');
  }
  for (const level of levels) {
    if (!Number.isInteger(level) || level < 1) {
      issues.push(`each level must be an integer of at least 1, got ${level}`);
    }
  }
  if (!Number.isFinite(cooldownSeconds) || cooldownSeconds < 0) {
    issues.push(`cooldown must be at least 0 seconds, got ${cooldownSeconds}`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  validateConfig({ ...base, concurrentUsers: levels[0] });

  const generator = options.generator ?? new LoadGenerator();
  const sleep = options.sleep ?? defaultSleep;
  const results: RampLevelSummary[] = [];

  for (const [index, concurrentUsers] of levels.entries()) {
    if (index > 0 && cooldownSeconds > 0) {
      options.onCooldown?.(cooldownSeconds);
      await sleep(cooldownSeconds * 1000);
    }

    options.onLevelStart?.(concurrentUsers, index);
    const report = await generator.run({ ...base, concurrentUsers });
    const level = { concurrentUsers, report };
    results.push(level);
    options.onLevelComplete?.(level, index);
  }

  return results;
}
