import { config } from 'dotenv';
import { ConfigurationError } from './errors.js';
import { DelayRange, LoadTestConfig } from './types.js';

config();

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_OUTPUT_PATH = 'load_test_results.json';

export interface LoadTestConfigInput {
  url?: string;
  concurrentUsers?: number;
  durationSeconds?: number;
  delay?: DelayRange;
  timeoutMs?: number;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Parses a delay given as a fixed value ("250") or a range ("100-300"), in milliseconds.
 */
export function parseDelayRange(text: string): DelayRange {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(?:-\s*(\d+(?:\.\d+)?)\s*)?$/.exec(text);
  if (!match) {
    throw new ConfigurationError([`delay must look like "250" or "100-300", got "${text}"`]);
  }
  const minMs = parseFloat(match[1]);
  const maxMs = match[2] === undefined ? minMs : parseFloat(match[2]);
  return { minMs, maxMs };
}

/**
 * Parses a repeatable "Name: value" header flag into a header map.
 */
export function parseHeader(text: string, headers: Record<string, string> = {}): Record<string, string> {
  const separator = text.indexOf(':');
  if (separator <= 0) {
    throw new ConfigurationError([`header must look like "Name: value", got "${text}"`]);
  }
  return {
    ...headers,
    [text.slice(0, separator).trim()]: text.slice(separator + 1).trim(),
  };
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

export function readEnvironment(): LoadTestConfigInput {
  const delay = process.env.LOAD_PROBE_DELAY_MS;
  return {
    url: process.env.LOAD_PROBE_URL || undefined,
    concurrentUsers: numberFromEnv('LOAD_PROBE_USERS'),
    durationSeconds: numberFromEnv('LOAD_PROBE_DURATION'),
    timeoutMs: numberFromEnv('LOAD_PROBE_TIMEOUT_MS'),
    delay: delay ? parseDelayRange(delay) : undefined,
  };
}

export function defaultOutputPath(): string {
  return process.env.LOAD_PROBE_OUTPUT || DEFAULT_OUTPUT_PATH;
}

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

export function validateConfig(input: LoadTestConfigInput): LoadTestConfig {
  const issues: string[] = [];
  const {
    url,
    concurrentUsers,
    durationSeconds,
    delay,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    method = 'GET',
    headers = {},
    body,
  } = input;

  if (url === undefined || url === '') {
    issues.push('url is required');
  } else if (!isAbsoluteHttpUrl(url)) {
    issues.push(`url must be an absolute http(s) URL, got "${url}"`);
  }

  if (concurrentUsers === undefined || !Number.isInteger(concurrentUsers) || concurrentUsers < 1) {
    issues.push(`concurrentUsers must be an integer of at least 1, got ${concurrentUsers}`);
  }

  if (durationSeconds === undefined || !Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    issues.push(`durationSeconds must be greater than 0, got ${durationSeconds}`);
  }

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    issues.push(`timeoutMs must be greater than 0, got ${timeoutMs}`);
  }

  if (delay) {
    if (!Number.isFinite(delay.minMs) || delay.minMs < 0) {
      issues.push(`delay minimum must be at least 0, got ${delay.minMs}`);
    } else if (!Number.isFinite(delay.maxMs) || delay.maxMs < delay.minMs) {
      issues.push(`delay maximum must be at least the minimum (${delay.minMs}), got ${delay.maxMs}`);
    }
  }

  const normalizedMethod = method.trim().toUpperCase();
  if (normalizedMethod === '') {
    issues.push('method must not be empty');
  } else if (body !== undefined && (normalizedMethod === 'GET' || normalizedMethod === 'HEAD')) {
    issues.push(`${normalizedMethod} requests cannot carry a body`);
  }

  if (issues.length > 0 || url === undefined || concurrentUsers === undefined || durationSeconds === undefined) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    url,
    concurrentUsers,
    durationSeconds,
    ...(delay && { delay: Object.freeze({ ...delay }) }),
    timeoutMs,
    method: normalizedMethod,
    headers: Object.freeze({ ...headers }),
    ...(body !== undefined && { body }),
  });
}

/**
 * Merges environment defaults with explicit overrides; overrides win.
 */
export function resolveInput(overrides: LoadTestConfigInput = {}): LoadTestConfigInput {
  const env = readEnvironment();
  return {
    url: overrides.url ?? env.url,
    concurrentUsers: overrides.concurrentUsers ?? env.concurrentUsers,
    durationSeconds: overrides.durationSeconds ?? env.durationSeconds,
    delay: overrides.delay ?? env.delay,
    timeoutMs: overrides.timeoutMs ?? env.timeoutMs,
    method: overrides.method,
    headers: overrides.headers,
    body: overrides.body,
  };
}

export function loadConfig(overrides: LoadTestConfigInput = {}): LoadTestConfig {
  return validateConfig(resolveInput(overrides));
}
