import { validateConfig, LoadTestConfigInput } from './config.js';
import { HttpProbe } from './http-client.js';
import { buildReport } from './metrics.js';
import { DelayRange, FetchLike, LoadTestConfig, Report, RequestOutcome } from './types.js';

export interface LoadGeneratorOptions {
  fetch?: FetchLike;
  /** Source of randomness for inter-request delays, in [0, 1). */
  random?: () => number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  onOutcome?: (outcome: RequestOutcome) => void;
}

export function pickDelay(range: DelayRange | undefined, random: () => number = Math.random): number {
  if (!range) return 0;
  return range.minMs + random() * (range.maxMs - range.minMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs a fixed-duration load test: one async loop per simulated user, each
 * with its own outcome buffer. Buffers are merged only after every loop has
 * finished.
 */
export class LoadGenerator {
  private options: LoadGeneratorOptions;

  constructor(options: LoadGeneratorOptions = {}) {
    this.options = options;
  }

  async run(input: LoadTestConfigInput): Promise<Report> {
    const config = validateConfig(input);
    const now = this.options.now ?? (() => performance.now());
    const probe = new HttpProbe(config, this.options.fetch);

    const startedAt = new Date().toISOString();
    const start = now();
    const deadline = start + config.durationSeconds * 1000;

    const userLoops: Promise<RequestOutcome[]>[] = [];
    for (let userId = 0; userId < config.concurrentUsers; userId++) {
      userLoops.push(this.simulateUser(userId, config, probe, deadline, now));
    }

    const buffers = await Promise.all(userLoops);
    const durationMs = now() - start;

    return buildReport({
      config,
      outcomes: buffers.flat(),
      startedAt,
      finishedAt: new Date().toISOString(),
      durationMs,
    });
  }

  private async simulateUser(
    userId: number,
    config: LoadTestConfig,
    probe: HttpProbe,
    deadline: number,
    now: () => number
  ): Promise<RequestOutcome[]> {
    const outcomes: RequestOutcome[] = [];
    const random = this.options.random ?? Math.random;
    let sequence = 0;

    while (now() < deadline) {
      const outcome = await probe.send({ userId, sequence: sequence++ });
      outcomes.push(outcome);
      this.options.onOutcome?.(outcome);

      const delay = pickDelay(config.delay, random);
      if (delay > 0) {
        const remaining = deadline - now();
        if (remaining <= 0) break;
        if (delay >= remaining) {
          // Timers can fire up to a millisecond early
          await sleep(Math.ceil(remaining) + 1);
          break;
        }
        await sleep(delay);
      }
    }

    return outcomes;
  }
}

export function runLoad(input: LoadTestConfigInput, options: LoadGeneratorOptions = {}): Promise<Report> {
  return new LoadGenerator(options).run(input);
}
