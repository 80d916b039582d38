#!/usr/bin/env node

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import {
  defaultOutputPath,
  LoadTestConfigInput,
  parseDelayRange,
  parseHeader,
  resolveInput,
  validateConfig,
} from './config.js';
import { ConfigurationError } from './errors.js';
import { LoadGenerator } from './load-generator.js';
import {
  isOutputFormat,
  OutputFormat,
  printProgress,
  printRampSummary,
  printResults,
  printRunStart,
  printWarning,
} from './reporter.js';
import { parseLevels, runLoadTest, runRamp } from './runner.js';
import { DelayRange } from './types.js';

interface TargetOptions {
  url?: string;
  duration?: number;
  delay?: DelayRange;
  timeout?: number;
  method?: string;
  header?: Record<string, string>;
  body?: string;
  format: string;
}

interface RunCommandOptions extends TargetOptions {
  users?: number;
  output: string;
  save: boolean;
  includeOutcomes?: boolean;
}

interface RampCommandOptions extends TargetOptions {
  levels: string;
  cooldown: number;
}

const PROGRESS_EVERY = 100;

function toInput(options: TargetOptions): LoadTestConfigInput {
  return {
    url: options.url,
    durationSeconds: options.duration,
    delay: options.delay,
    timeoutMs: options.timeout,
    method: options.method,
    headers: options.header,
    body: options.body,
  };
}

function resolveFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new ConfigurationError([`format must be one of pretty, json, csv, got "${value}"`]);
  }
  return value;
}

function progressGenerator(format: OutputFormat): LoadGenerator {
  let completed = 0;
  return new LoadGenerator({
    onOutcome: () => {
      completed++;
      if (format === 'pretty' && completed % PROGRESS_EVERY === 0) {
        printProgress(completed);
      }
    },
  });
}

function handleFatal(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red('Configuration error:'));
    for (const issue of error.issues) {
      console.error(chalk.red(`  - ${issue}`));
    }
  } else if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else {
    console.error(chalk.red('An unknown error occurred'));
  }
  process.exit(2);
}

function asArgument<T>(parse: (value: string, previous?: T) => T) {
  return (value: string, previous?: T): T => {
    try {
      return parse(value, previous);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new InvalidArgumentError(error.issues.join('; '));
      }
      throw error;
    }
  };
}

function withTargetOptions(command: Command): Command {
  return command
    .option('-u, --url <url>', 'Target URL (default: LOAD_PROBE_URL)')
    .option('-d, --duration <seconds>', 'Test duration in seconds (default: LOAD_PROBE_DURATION)', Number)
    .option('--delay <ms>', 'Delay between requests per user, fixed ("500") or range ("1000-3000")', asArgument(parseDelayRange))
    .option('--timeout <ms>', 'Per-request timeout in milliseconds (default: 30000)', Number)
    .option('-X, --method <method>', 'HTTP method', 'GET')
    .option('-H, --header <header>', 'Request header "Name: value" (repeatable)', asArgument(parseHeader))
    .option('--body <body>', 'Request body')
    .option('-f, --format <format>', 'Output format: pretty, json, csv', 'pretty');
}

const program = new Command();

program
  .name('load-probe')
  .description('Fire concurrent simulated users at one HTTP endpoint and report latency statistics')
  .version('1.0.0');

withTargetOptions(
  program
    .command('run', { isDefault: true })
    .description('Run a fixed-duration load test')
    .option('-c, --users <number>', 'Number of concurrent users (default: LOAD_PROBE_USERS)', Number)
)
  .option('-o, --output <path>', 'Results file', defaultOutputPath())
  .option('--no-save', 'Do not write a results file')
  .option('--include-outcomes', 'Include every request outcome in the results file')
  .action(async (options: RunCommandOptions) => {
    try {
      const format = resolveFormat(options.format);
      const config = validateConfig(resolveInput({ ...toInput(options), concurrentUsers: options.users }));

      if (format === 'pretty') {
        printRunStart(config);
      }

      const result = await runLoadTest({
        config,
        output: options.save ? options.output : undefined,
        includeOutcomes: options.includeOutcomes,
        generator: progressGenerator(format),
      });

      if (format === 'pretty' && result.report.totalRequests >= PROGRESS_EVERY) {
        console.log('');
      }
      printResults(result.report, { format });

      if (result.writeError) {
        printWarning(result.writeError.message);
      } else if (result.outputPath && format === 'pretty') {
        console.log(`Detailed results saved to: ${result.outputPath}`);
      }

      process.exit(result.report.failed > 0 ? 1 : 0);
    } catch (error) {
      handleFatal(error);
    }
  });

withTargetOptions(
  program
    .command('ramp')
    .description('Run the load test once per user count, with a cool-down between levels')
    .requiredOption('-l, --levels <counts>', 'Comma-separated user counts, e.g. 1,5,10,20')
    .option('--cooldown <seconds>', 'Pause between levels in seconds', Number, 10)
).action(async (options: RampCommandOptions) => {
  try {
    const format = resolveFormat(options.format);
    const levels = await runRamp({
      base: resolveInput(toInput(options)),
      levels: parseLevels(options.levels),
      cooldownSeconds: options.cooldown,
      generator: progressGenerator(format),
      onLevelStart: (users) => {
        if (format === 'pretty') {
          console.log(chalk.bold(`\nLevel: ${users} concurrent users`));
        }
      },
      onLevelComplete: ({ report }) => printResults(report, { format }),
      onCooldown: (seconds) => {
        if (format === 'pretty') {
          console.log(chalk.gray(`Cooling down for ${seconds}s...`));
        }
      },
    });

    if (format === 'pretty') {
      printRampSummary(levels);
    }

    process.exit(levels.some(({ report }) => report.failed > 0) ? 1 : 0);
  } catch (error) {
    handleFatal(error);
  }
});

program.parseAsync().catch(handleFatal);
