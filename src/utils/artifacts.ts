/**
 * Screenshot capture for scanned pages
 * Saves full-page PNGs under <reportDir>/screenshots/
 */

import type { Page } from 'playwright';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { getLogger } from './logger.js';

/**
 * Capture a full-page screenshot to the given path
 * Creates the parent directory if needed
 *
 * @returns The screenshot path, or null if capture failed
 */
export async function captureScreenshot(
  page: Page,
  screenshotPath: string
): Promise<string | null> {
  const logger = getLogger();

  try {
    await mkdir(dirname(screenshotPath), { recursive: true });
    await page.screenshot({ path: screenshotPath, fullPage: true });
    logger.debug(`Screenshot captured: ${screenshotPath}`);
    return screenshotPath;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn(`Failed to capture screenshot: ${errorMessage}`);
    return null;
  }
}
