import { jest } from '@jest/globals';
import { PlaywrightPageDriver, toScriptRefs } from './driver';
import type { RawScript } from './driver';
import { resetLogger } from '../utils/logger';

describe('toScriptRefs', () => {
  it('resolves external scripts and keeps non-empty inline ones', () => {
    const raw: RawScript[] = [
      { src: '/js/app.js', content: '' },
      { src: null, content: 'var a = 1;' },
      { src: null, content: '   ' },
      { src: 'https://cdn.example.org/lib.js', content: '' },
    ];

    expect(toScriptRefs(raw, 'https://example.com/page')).toEqual([
      { kind: 'external', src: 'https://example.com/js/app.js' },
      { kind: 'inline', content: 'var a = 1;' },
      { kind: 'external', src: 'https://cdn.example.org/lib.js' },
    ]);
  });
});

function createFakePage(overrides: Record<string, unknown> = {}) {
  return {
    goto: jest.fn<() => Promise<{ status: () => number }>>().mockResolvedValue({ status: () => 200 }),
    waitForLoadState: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
    content: jest.fn<() => Promise<string>>().mockResolvedValue('<html><body>hi</body></html>'),
    url: jest.fn<() => string>().mockReturnValue('https://example.com/final'),
    $$eval: jest
      .fn<() => Promise<RawScript[]>>()
      .mockResolvedValue([{ src: null, content: 'init();' }]),
    viewportSize: jest.fn<() => { width: number; height: number } | null>().mockReturnValue({
      width: 800,
      height: 600,
    }),
    screenshot: jest.fn<() => Promise<Buffer>>(),
    ...overrides,
  };
}

describe('PlaywrightPageDriver', () => {
  beforeEach(() => {
    resetLogger();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders a page without a screenshot', async () => {
    const page = createFakePage();
    const driver = new PlaywrightPageDriver(page as never, { settleMs: 10 });

    const rendered = await driver.render('https://example.com/');

    expect(page.goto).toHaveBeenCalledWith('https://example.com/', {
      timeout: 30000,
      waitUntil: 'domcontentloaded',
    });
    expect(page.waitForLoadState).toHaveBeenCalledWith('networkidle', { timeout: 10 });
    expect(page.screenshot).not.toHaveBeenCalled();
    expect(rendered).toEqual({
      url: 'https://example.com/final',
      html: '<html><body>hi</body></html>',
      scripts: [{ kind: 'inline', content: 'init();' }],
      visualElements: [],
      viewport: { width: 800, height: 600 },
      screenshotPath: null,
    });
  });

  it('continues when the network does not settle', async () => {
    const page = createFakePage({
      waitForLoadState: jest.fn<() => Promise<void>>().mockRejectedValue(new Error('Timeout 10ms exceeded')),
    });
    const driver = new PlaywrightPageDriver(page as never, { settleMs: 10 });

    const rendered = await driver.render('https://example.com/');

    expect(rendered?.html).toBe('<html><body>hi</body></html>');
  });

  it('returns null when navigation fails for good', async () => {
    const page = createFakePage({
      goto: jest.fn<() => Promise<never>>().mockRejectedValue(new Error('net::ERR_NAME_NOT_RESOLVED')),
    });
    const driver = new PlaywrightPageDriver(page as never);

    await expect(driver.render('https://example.invalid/')).resolves.toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      '[xss-lens] ERROR: Failed to render https://example.invalid/: Failed after 1 attempt(s): net::ERR_NAME_NOT_RESOLVED'
    );
  });
});
