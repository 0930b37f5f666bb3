import { Command } from 'commander';
import type { ScanOptions } from '../core/index.js';
import { DEFAULT_SCAN_OPTIONS } from '../core/index.js';
import { InvalidInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeTargetUrl } from '../utils/url.js';
import type { CliAction, CliOptions } from './types.js';

export const MAX_TIMEOUT_MS = 300000;

export const USAGE_HINT = [
  'Usage: xss-lens --url <url> [--depth <n>] [--output <path>] [--screenshots] [--verbose]',
  'Example: xss-lens --url https://example.com --depth 2 --output report.html',
];

function parseInteger(flag: string, value: string, min: number): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw InvalidInputError.fromInvalidNumber(flag, value, 'an integer');
  }

  const parsed = parseInt(trimmed, 10);
  if (parsed < min) {
    throw InvalidInputError.fromInvalidNumber(flag, value, `at least ${min}`);
  }
  return parsed;
}

export function parseTimeout(value: string): number {
  const parsed = parseInteger('--timeout-ms', value, 1);
  if (parsed > MAX_TIMEOUT_MS) {
    getLogger().warn(
      `--timeout-ms ${parsed}ms exceeds maximum of ${MAX_TIMEOUT_MS}ms, capping to ${MAX_TIMEOUT_MS}ms`
    );
    return MAX_TIMEOUT_MS;
  }
  return parsed;
}

/**
 * Validate raw CLI options and turn them into scan options.
 * Runs before any browser is started.
 */
export function toScanOptions(options: CliOptions): ScanOptions {
  const target = normalizeTargetUrl(options.url);
  if (!target.ok) {
    throw InvalidInputError.fromInvalidUrl(target.input, target.reason);
  }

  return {
    url: target.url,
    depth: parseInteger('--depth', options.depth, 1),
    output: options.output,
    screenshots: options.screenshots ?? false,
    verbose: options.verbose ?? false,
    chromePath: options.chromePath,
    useFirefox: options.useFirefox ?? false,
    timeoutMs:
      options.timeoutMs !== undefined ? parseTimeout(options.timeoutMs) : DEFAULT_SCAN_OPTIONS.timeoutMs,
    maxLinksPerPage:
      options.maxLinks !== undefined
        ? parseInteger('--max-links', options.maxLinks, 1)
        : DEFAULT_SCAN_OPTIONS.maxLinksPerPage,
    settleMs: DEFAULT_SCAN_OPTIONS.settleMs,
    headless: !options.headful,
    jsonPath: options.json,
  };
}

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('xss-lens')
    .description('Crawl a website in a headless browser and report potential XSS vectors')
    .version('0.1.0')
    .requiredOption('--url <url>', 'Target URL to scan')
    .option('--depth <n>', 'Crawl depth (1 = start page only)', String(DEFAULT_SCAN_OPTIONS.depth))
    .option('--output <path>', 'Report file path', DEFAULT_SCAN_OPTIONS.output)
    .option('--screenshots', 'Capture page screenshots')
    .option('--verbose', 'Enable verbose logging')
    .option('--chrome-path <path>', 'Path to a Chrome/Chromium binary')
    .option('--use-firefox', 'Use Firefox instead of Chromium')
    .option('--timeout-ms <n>', `Navigation timeout in milliseconds (default: 30000, max: ${MAX_TIMEOUT_MS})`)
    .option('--max-links <n>', 'Links followed per page (default: 10)')
    .option('--headful', 'Run browser in headful mode (default: headless)')
    .option('--json <path>', 'Also write a JSON summary to this path')
    .action(async (options: CliOptions) => {
      await action(options);
    });

  return program;
}
