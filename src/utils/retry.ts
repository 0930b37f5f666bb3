/**
 * Retry wrapper with exponential backoff + jitter
 * - Retries transient failures: timeouts, connection resets/refusals, 5xx, 429
 * - Fails fast on deterministic failures: DNS errors, 4xx, parse errors
 * - Formula: delay = baseDelay * 2^attempt + random(0, jitterMax)
 */

import { getLogger } from './logger.js';

export interface RetryOptions {
  maxAttempts?: number; // default 3
  baseDelayMs?: number; // default 1000
  maxDelayMs?: number; // default 10000
  jitterMaxMs?: number; // default 500
}

export class RetryError extends Error {
  constructor(
    message: string,
    readonly isTransient: boolean,
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryError';
  }
}

const TRANSIENT_MARKERS = [
  'timeout',
  'econnrefused',
  'econnreset',
  'net::err_connection_reset',
  'net::err_connection_refused',
  'net::err_timed_out',
  'ns_error_net_reset',
];

const DETERMINISTIC_MARKERS = [
  'net::err_name_not_resolved',
  'ns_error_unknown_host',
  'net::err_invalid_url',
  'net::err_aborted',
];

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Determine if an error is transient (should retry) or deterministic (fail fast)
 */
function isTransientError(error: unknown): boolean {
  if (error instanceof SyntaxError) {
    return false;
  }

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    if (DETERMINISTIC_MARKERS.some((marker) => msg.includes(marker))) {
      return false;
    }
    if (TRANSIENT_MARKERS.some((marker) => msg.includes(marker))) {
      return true;
    }
  }

  if (typeof error === 'object' && error !== null) {
    const status = readStatus(error);
    if (status !== undefined) {
      if ((status >= 500 && status < 600) || status === 429) {
        return true;
      }
      if (status >= 400 && status < 500) {
        return false;
      }
    }
  }

  // Default to transient for unknown errors
  return true;
}

function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMaxMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMaxMs;
  return cappedDelay + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Executes fn with exponential backoff on transient failures.
 * Throws RetryError once attempts run out or on a deterministic failure.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const baseDelayMs = options?.baseDelayMs ?? 1000;
  const maxDelayMs = options?.maxDelayMs ?? 10000;
  const jitterMaxMs = options?.jitterMaxMs ?? 500;

  const logger = getLogger();

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!isTransientError(error)) {
        logger.debug(`Deterministic failure (not retrying): ${lastError.message}`);
        throw new RetryError(
          `Failed after ${attempt + 1} attempt(s): ${lastError.message}`,
          false,
          attempt + 1,
          lastError
        );
      }

      if (attempt === maxAttempts - 1) {
        logger.debug(`Max attempts (${maxAttempts}) reached. Giving up: ${lastError.message}`);
        throw new RetryError(
          `Failed after ${maxAttempts} attempts: ${lastError.message}`,
          true,
          maxAttempts,
          lastError
        );
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMaxMs);
      logger.debug(
        `Transient failure (attempt ${attempt + 1}/${maxAttempts}): ${lastError.message}. Retrying in ${Math.round(delayMs)}ms...`
      );

      await sleep(delayMs);
    }
  }
}

export { isTransientError };
