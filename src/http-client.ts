import { FetchLike, LoadTestConfig, RequestOutcome } from './types.js';

export interface ProbeRequest {
  userId: number;
  sequence: number;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

/**
 * Turns a transport failure into a stable description, so that identical
 * failures collapse into one entry of the error breakdown.
 */
export function describeTransportError(error: unknown, timeoutMs: number): string {
  if (typeof error !== 'object' || error === null) {
    return String(error);
  }

  if ('name' in error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `Timeout after ${timeoutMs}ms`;
  }

  // fetch wraps socket and DNS failures as `TypeError: fetch failed` with the system error as cause
  const cause = 'cause' in error ? error.cause : undefined;
  for (const candidate of [cause, error]) {
    if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
      return candidate.code;
    }
  }

  if (cause instanceof Error && cause.message) {
    return cause.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Issues single attempts against the configured target and records each one
 * as a {@link RequestOutcome}. Never throws for request failures.
 */
export class HttpProbe {
  private config: LoadTestConfig;
  private fetchImpl: FetchLike;

  constructor(config: LoadTestConfig, fetchImpl: FetchLike = globalThis.fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async send(request: ProbeRequest): Promise<RequestOutcome> {
    const { url, method, headers, body, timeoutMs } = this.config;
    const timestamp = new Date().toISOString();
    const start = performance.now();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        ...(body !== undefined && { body }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      return {
        ...request,
        timestamp,
        latencyMs: performance.now() - start,
        statusCode: null,
        success: false,
        error: describeTransportError(error, timeoutMs),
      };
    }

    try {
      // Latency covers the full body, not just the headers
      await response.arrayBuffer();
    } catch (error) {
      return {
        ...request,
        timestamp,
        latencyMs: performance.now() - start,
        statusCode: response.status,
        success: false,
        error: describeTransportError(error, timeoutMs),
      };
    }

    return {
      ...request,
      timestamp,
      latencyMs: performance.now() - start,
      statusCode: response.status,
      success: isSuccessStatus(response.status),
      error: null,
    };
  }
}
