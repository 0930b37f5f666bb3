/**
 * Playwright-backed page driver
 * Navigates, lets the page settle, and reads back DOM, scripts and form-control geometry
 */

import type { Page } from 'playwright';
import { getLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { captureScreenshot } from '../utils/artifacts.js';
import type {
  PageDriver,
  RenderOptions,
  RenderedPage,
  ScriptRef,
  Viewport,
  VisualElement,
} from './types.js';

export interface DriverOptions {
  navigationTimeout?: number; // default 30000
  settleMs?: number; // default 2000
  maxAttempts?: number; // default 3
}

export interface RawScript {
  src: string | null;
  content: string;
}

const DEFAULT_VIEWPORT: Viewport = { width: 1280, height: 720 };

/**
 * Map raw <script> data to script references
 * - src present: external, resolved against the page URL
 * - no src: inline, dropped when empty
 */
export function toScriptRefs(raw: RawScript[], pageUrl: string): ScriptRef[] {
  const refs: ScriptRef[] = [];

  for (const script of raw) {
    if (script.src) {
      const src = URL.canParse(script.src, pageUrl)
        ? new URL(script.src, pageUrl).toString()
        : script.src;
      refs.push({ kind: 'external', src });
    } else if (script.content.trim()) {
      refs.push({ kind: 'inline', content: script.content });
    }
  }

  return refs;
}

export class PlaywrightPageDriver implements PageDriver {
  private page: Page;
  private navigationTimeout: number;
  private settleMs: number;
  private maxAttempts: number;

  constructor(page: Page, options?: DriverOptions) {
    this.page = page;
    this.navigationTimeout = options?.navigationTimeout ?? 30000;
    this.settleMs = options?.settleMs ?? 2000;
    this.maxAttempts = options?.maxAttempts ?? 3;
  }

  public async render(url: string, options?: RenderOptions): Promise<RenderedPage | null> {
    const logger = getLogger();

    try {
      logger.debug(`Navigating to: ${url}`);
      const response = await retry(
        () =>
          this.page.goto(url, {
            timeout: this.navigationTimeout,
            waitUntil: 'domcontentloaded',
          }),
        { maxAttempts: this.maxAttempts }
      );

      if (response) {
        logger.debug(`Page loaded with status: ${response.status()}`);
      }

      await this.settle();

      const screenshotPath = options?.screenshotPath
        ? await captureScreenshot(this.page, options.screenshotPath)
        : null;

      const html = await this.page.content();
      const finalUrl = this.page.url() || url;
      const scripts = toScriptRefs(await this.readScripts(), finalUrl);
      const visualElements = screenshotPath ? await this.readVisualElements() : [];
      const viewport = screenshotPath ? await this.readDocumentSize() : this.currentViewport();

      return { url: finalUrl, html, scripts, visualElements, viewport, screenshotPath };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to render ${url}: ${message}`);
      return null;
    }
  }

  /**
   * Give client-side rendering time to finish; a busy network only shortens the wait
   */
  private async settle(): Promise<void> {
    if (this.settleMs <= 0) return;
    try {
      await this.page.waitForLoadState('networkidle', { timeout: this.settleMs });
    } catch {
      getLogger().debug(`Network still busy after ${this.settleMs}ms, continuing`);
    }
  }

  private async readScripts(): Promise<RawScript[]> {
    return this.page.$$eval('script', (nodes) =>
      nodes.map((node) => ({
        src: node.getAttribute('src'),
        content: node.textContent ?? '',
      }))
    );
  }

  private async readVisualElements(): Promise<VisualElement[]> {
    const elements = await this.page.$$eval('input, textarea, select', (nodes) =>
      nodes.map((node) => {
        const rect = node.getBoundingClientRect();
        return {
          tag: node.tagName.toLowerCase(),
          inputType: (node.getAttribute('type') ?? '').toLowerCase(),
          x: Math.round(rect.left + window.scrollX),
          y: Math.round(rect.top + window.scrollY),
          width: Math.round(rect.width),
          height: Math.round(rect.height),
        };
      })
    );

    return elements.filter((el) => el.width > 0 && el.height > 0);
  }

  private async readDocumentSize(): Promise<Viewport> {
    return this.page.evaluate(() => ({
      width: document.documentElement.scrollWidth,
      height: document.documentElement.scrollHeight,
    }));
  }

  private currentViewport(): Viewport {
    return this.page.viewportSize() ?? DEFAULT_VIEWPORT;
  }
}
