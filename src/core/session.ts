import { existsSync } from 'fs';
import { chromium, firefox } from 'playwright';
import type { Browser, BrowserContext, BrowserType, LaunchOptions, Page } from 'playwright';
import { BrowserLaunchError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export type BrowserName = 'chromium' | 'firefox';

export interface BrowserSession {
  browserName: BrowserName;
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close: () => Promise<void>;
}

export interface BrowserSessionOptions {
  useFirefox?: boolean;
  chromePath?: string;
  headless?: boolean;
  timeoutMs?: number;
}

const BROWSERS: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
};

async function closeQuietly(label: string, target: { close: () => Promise<void> } | null): Promise<void> {
  if (!target) return;
  try {
    await target.close();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().debug(`Failed to close ${label}: ${message}`);
  }
}

async function openSession(
  browserName: BrowserName,
  launchOptions: LaunchOptions,
  timeoutMs?: number
): Promise<BrowserSession> {
  let browser: Browser | null = null;
  let context: BrowserContext | null = null;
  let page: Page | null = null;
  let closed = false;

  const close = async () => {
    if (closed) return;
    closed = true;

    await closeQuietly('page', page);
    await closeQuietly('context', context);
    await closeQuietly('browser', browser);
  };

  try {
    browser = await BROWSERS[browserName].launch(launchOptions);
    context = await browser.newContext();
    page = await context.newPage();
    if (timeoutMs !== undefined) {
      page.setDefaultTimeout(timeoutMs);
    }

    return {
      browserName,
      browser,
      context,
      page,
      close,
    };
  } catch (error) {
    await close();
    throw error;
  }
}

/**
 * Launch Chromium (or Firefox when asked) and open a single page.
 * A Chromium launch failure falls back to Firefox.
 */
export async function createBrowserSession(
  options: BrowserSessionOptions = {}
): Promise<BrowserSession> {
  const logger = getLogger();
  const headless = options.headless ?? true;

  if (options.useFirefox) {
    try {
      return await openSession('firefox', { headless }, options.timeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw BrowserLaunchError.fromLaunchFailure('firefox', message);
    }
  }

  const chromiumOptions: LaunchOptions = { headless };
  if (options.chromePath) {
    if (existsSync(options.chromePath)) {
      chromiumOptions.executablePath = options.chromePath;
    } else {
      logger.warn(`Chrome binary not found at ${options.chromePath}, using the bundled Chromium`);
    }
  }

  try {
    return await openSession('chromium', chromiumOptions, options.timeoutMs);
  } catch (chromiumError) {
    const chromiumMessage = chromiumError instanceof Error ? chromiumError.message : String(chromiumError);
    logger.warn(`Chromium failed to launch (${chromiumMessage}), falling back to Firefox`);

    try {
      return await openSession('firefox', { headless }, options.timeoutMs);
    } catch (firefoxError) {
      const firefoxMessage = firefoxError instanceof Error ? firefoxError.message : String(firefoxError);
      throw BrowserLaunchError.fromLaunchFailure(
        'chromium or firefox',
        `chromium: ${chromiumMessage}; firefox: ${firefoxMessage}`
      );
    }
  }
}
