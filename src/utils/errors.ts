/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-4)
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger.js';

/**
 * Base error class with exit code
 */
export abstract class XssLensError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: malformed URL, invalid depth/timeout/link limits
 */
export class InvalidInputError extends XssLensError {
  readonly code = 1;

  static fromInvalidUrl(url: string, reason: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid target URL: "${url}". ${reason}`,
      'Provide an absolute http(s) URL, e.g. https://example.com'
    );
  }

  static fromInvalidNumber(flag: string, value: string, constraint: string): InvalidInputError {
    return new InvalidInputError(
      `${flag} must be ${constraint}, got: ${value}`
    );
  }
}

/**
 * Browser launch error (exit code 2)
 * Triggered by: neither Chromium nor Firefox could be started
 */
export class BrowserLaunchError extends XssLensError {
  readonly code = 2;

  static fromLaunchFailure(browser: string, reason: string): BrowserLaunchError {
    return new BrowserLaunchError(
      `Could not launch ${browser}: ${reason}`,
      'Install the Playwright browsers (playwright install chromium firefox) or pass --chrome-path'
    );
  }
}

/**
 * Crawl error (exit code 3)
 * Triggered by: the start page could not be rendered
 */
export class CrawlError extends XssLensError {
  readonly code = 3;

  static fromUnreachableStart(url: string): CrawlError {
    return new CrawlError(
      `Could not load the start page: ${url}`,
      'Check that the site is reachable and try a larger --timeout-ms'
    );
  }
}

/**
 * Report error (exit code 4)
 * Triggered by: report file could not be written
 */
export class ReportError extends XssLensError {
  readonly code = 4;

  static fromWriteFailure(path: string, reason: string): ReportError {
    return new ReportError(
      `Could not write report to ${path}`,
      `Write error: ${reason}. Check that the directory is writable`
    );
  }
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof XssLensError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
