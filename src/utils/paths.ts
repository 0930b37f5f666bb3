/**
 * Path utilities and naming policy for scan output
 * Defines where the report and its screenshots live and how screenshots are named
 */

import { createHash } from 'crypto';
import { dirname, join, relative, sep } from 'path';

/**
 * Canonical output layout
 */
export const OUTPUT_LAYOUT = {
  /** Default report file, relative to the working directory */
  DEFAULT_REPORT_FILE: 'xss_report.html',
  /** Screenshots directory, beside the report */
  SCREENSHOTS_DIR: 'screenshots',
} as const;

/**
 * Get the screenshots directory for a report
 * @param reportPath - Path of the HTML report
 */
export function getScreenshotsDir(reportPath: string): string {
  return join(dirname(reportPath), OUTPUT_LAYOUT.SCREENSHOTS_DIR);
}

/**
 * Path of a screenshot as referenced from inside the report (always forward slashes)
 */
export function toReportRelative(reportPath: string, filePath: string): string {
  return relative(dirname(reportPath), filePath).split(sep).join('/');
}

/**
 * Normalize a string to a filesystem-safe slug
 * - Unicode normalization (NFKD)
 * - Lowercase
 * - Non-alphanumerics collapse to single hyphens
 * - Hyphens trimmed from edges
 */
export function normalizeSlug(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Deterministic 8-character hash suffix
 */
function generateHashSuffix(input: string): string {
  return createHash('sha256').update(input).digest('hex').substring(0, 8);
}

/**
 * Generate a deterministic screenshot filename for a page URL
 * Format: <slug of host and path, at most 60 chars>-<8-char hash of full URL>.png
 * The hash keeps URLs that differ only in the query string apart.
 */
export function generateScreenshotFilename(pageUrl: string): string {
  let readable = '';
  try {
    const url = new URL(pageUrl);
    readable = normalizeSlug(`${url.host}${url.pathname}`);
  } catch {
    readable = normalizeSlug(pageUrl);
  }

  const truncated = readable.substring(0, 60).replace(/-+$/, '');
  const hash = generateHashSuffix(pageUrl);
  return truncated ? `${truncated}-${hash}.png` : `page-${hash}.png`;
}
