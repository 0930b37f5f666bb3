/**
 * Depth-limited, same-host crawl
 * Depth counts page levels: 1 = start page only, 2 = start page plus its links, ...
 */

import { join } from 'path';
import { getLogger } from '../utils/logger.js';
import { isSameHost, visitKey } from '../utils/url.js';
import { generateScreenshotFilename } from '../utils/paths.js';
import { extractLinks } from './links.js';
import type { CrawlOptions, PageDriver, PageSnapshot } from './types.js';

export const DEFAULT_MAX_LINKS_PER_PAGE = 10;

export class WebCrawler {
  private driver: PageDriver;
  private maxLinksPerPage: number;
  private screenshotsDir?: string;
  private visited = new Set<string>();

  constructor(driver: PageDriver, options?: CrawlOptions) {
    this.driver = driver;
    this.maxLinksPerPage = options?.maxLinksPerPage ?? DEFAULT_MAX_LINKS_PER_PAGE;
    this.screenshotsDir = options?.screenshotsDir;
  }

  /**
   * Crawl from startUrl and return the pages in visit order
   */
  public async crawl(startUrl: string, depth: number = 2): Promise<PageSnapshot[]> {
    const logger = getLogger();
    logger.phaseStart('Crawl');
    logger.debug(`Crawling from ${startUrl} with depth ${depth}`);

    this.visited.clear();
    const pages: PageSnapshot[] = [];
    await this.visit(startUrl, depth, pages);

    logger.phaseComplete('Crawl', `${pages.length} page(s) visited`);
    return pages;
  }

  private async visit(url: string, depth: number, pages: PageSnapshot[]): Promise<void> {
    const key = visitKey(url);
    if (depth <= 0 || this.visited.has(key)) {
      return;
    }
    this.visited.add(key);

    const logger = getLogger();
    const screenshotPath = this.screenshotsDir
      ? join(this.screenshotsDir, generateScreenshotFilename(key))
      : undefined;

    const rendered = await this.driver.render(key, { screenshotPath });
    if (!rendered) {
      logger.warn(`Skipping ${key}: page could not be rendered`);
      return;
    }

    // Redirect targets count as visited too
    this.visited.add(visitKey(rendered.url));

    const links = extractLinks(rendered.html, rendered.url);
    pages.push({
      url: rendered.url,
      html: rendered.html,
      scripts: rendered.scripts,
      links,
      screenshotPath: rendered.screenshotPath,
      visualElements: rendered.visualElements,
      viewport: rendered.viewport,
      depth,
      timestamp: new Date().toISOString(),
    });

    logger.debug(`Depth ${depth}: ${rendered.url} - found ${links.length} link(s)`);

    if (depth - 1 <= 0) {
      return;
    }

    let candidates = links.filter(
      (link) => isSameHost(link, key) && !this.visited.has(visitKey(link))
    );

    if (candidates.length > this.maxLinksPerPage) {
      logger.debug(
        `Limiting to ${this.maxLinksPerPage} of ${candidates.length} link(s) on ${rendered.url}`
      );
      candidates = candidates.slice(0, this.maxLinksPerPage);
    }

    for (const link of candidates) {
      await this.visit(link, depth - 1, pages);
    }
  }
}
