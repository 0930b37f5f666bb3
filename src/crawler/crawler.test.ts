import { jest } from '@jest/globals';
import { WebCrawler } from './crawler';
import type { PageDriver, RenderOptions, RenderedPage } from './types';
import { resetLogger } from '../utils/logger';

function linksTo(...hrefs: string[]): string {
  return `<html><body>${hrefs.map((href) => `<a href="${href}">link</a>`).join('')}</body></html>`;
}

class FakePageDriver implements PageDriver {
  calls: Array<{ url: string; options?: RenderOptions }> = [];

  constructor(
    private pages: Record<string, string>,
    private redirects: Record<string, string> = {}
  ) {}

  async render(url: string, options?: RenderOptions): Promise<RenderedPage | null> {
    this.calls.push({ url, options });
    const finalUrl = this.redirects[url] ?? url;
    const html = this.pages[finalUrl];
    if (html === undefined) return null;

    return {
      url: finalUrl,
      html,
      scripts: [],
      visualElements: [],
      viewport: { width: 1280, height: 720 },
      screenshotPath: options?.screenshotPath ?? null,
    };
  }

  visited(): string[] {
    return this.calls.map((call) => call.url);
  }
}

describe('WebCrawler', () => {
  beforeEach(() => {
    resetLogger();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const site = {
    'https://example.com/': linksTo('/a', '/b', 'https://other.example.org/x'),
    'https://example.com/a': linksTo('/a1', '/'),
    'https://example.com/b': linksTo('/b1'),
    'https://example.com/a1': linksTo('/deep'),
    'https://example.com/b1': linksTo(),
    'https://example.com/deep': linksTo(),
  };

  it('scans only the start page at depth 1', async () => {
    const driver = new FakePageDriver(site);
    const pages = await new WebCrawler(driver).crawl('https://example.com/', 1);

    expect(pages.map((p) => p.url)).toEqual(['https://example.com/']);
    expect(pages[0].links).toEqual([
      'https://example.com/a',
      'https://example.com/b',
      'https://other.example.org/x',
    ]);
  });

  it('scans nothing at depth 0', async () => {
    const driver = new FakePageDriver(site);
    const pages = await new WebCrawler(driver).crawl('https://example.com/', 0);

    expect(pages).toEqual([]);
    expect(driver.calls).toEqual([]);
  });

  it('crawls depth-first in document order, once per URL, on the same host', async () => {
    const driver = new FakePageDriver(site);
    const pages = await new WebCrawler(driver).crawl('https://example.com/', 3);

    expect(driver.visited()).toEqual([
      'https://example.com/',
      'https://example.com/a',
      'https://example.com/a1',
      'https://example.com/b',
      'https://example.com/b1',
    ]);
    expect(pages.map((p) => p.depth)).toEqual([3, 2, 1, 2, 1]);
  });

  it('defaults to depth 2', async () => {
    const driver = new FakePageDriver(site);
    await new WebCrawler(driver).crawl('https://example.com/');

    expect(driver.visited()).toEqual([
      'https://example.com/',
      'https://example.com/a',
      'https://example.com/b',
    ]);
  });

  it('follows at most maxLinksPerPage links per page', async () => {
    const driver = new FakePageDriver(site);
    await new WebCrawler(driver, { maxLinksPerPage: 1 }).crawl('https://example.com/', 2);

    expect(driver.visited()).toEqual(['https://example.com/', 'https://example.com/a']);
  });

  it('skips pages that fail to render and keeps going', async () => {
    const driver = new FakePageDriver({
      'https://example.com/': linksTo('/missing', '/b'),
      'https://example.com/b': linksTo(),
    });
    const pages = await new WebCrawler(driver).crawl('https://example.com/', 2);

    expect(driver.visited()).toEqual([
      'https://example.com/',
      'https://example.com/missing',
      'https://example.com/b',
    ]);
    expect(pages.map((p) => p.url)).toEqual(['https://example.com/', 'https://example.com/b']);
    expect(console.warn).toHaveBeenCalledWith(
      '[xss-lens] WARNING: Skipping https://example.com/missing: page could not be rendered'
    );
  });

  it('treats redirect targets as visited', async () => {
    const driver = new FakePageDriver(
      {
        'https://example.com/home': linksTo('/old', '/home'),
      },
      { 'https://example.com/': 'https://example.com/home' }
    );
    const pages = await new WebCrawler(driver).crawl('https://example.com/', 2);

    expect(driver.visited()).toEqual(['https://example.com/', 'https://example.com/old']);
    expect(pages.map((p) => p.url)).toEqual(['https://example.com/home']);
  });

  it('asks for a screenshot per page when a screenshots directory is set', async () => {
    const driver = new FakePageDriver(site);
    const pages = await new WebCrawler(driver, { screenshotsDir: '/tmp/shots' }).crawl(
      'https://example.com/',
      1
    );

    expect(pages[0].screenshotPath).toMatch(/^\/tmp\/shots\/example-com-[0-9a-f]{8}\.png$/);
  });

  it('asks for no screenshot otherwise', async () => {
    const driver = new FakePageDriver(site);
    await new WebCrawler(driver).crawl('https://example.com/', 1);

    expect(driver.calls[0].options).toEqual({ screenshotPath: undefined });
  });
});
