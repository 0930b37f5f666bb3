import { resolve } from 'path';
import { getLogger } from '../utils/logger.js';
import { CrawlError } from '../utils/errors.js';
import { getScreenshotsDir, OUTPUT_LAYOUT } from '../utils/paths.js';
import { WebCrawler, PlaywrightPageDriver, DEFAULT_MAX_LINKS_PER_PAGE } from '../crawler/index.js';
import type { PageDriver } from '../crawler/index.js';
import { XssDetector } from '../detector/index.js';
import type { Finding, Severity } from '../detector/index.js';
import { generateReport, deduplicateFindings, writeJsonReport } from '../report/index.js';
import { createBrowserSession } from './session.js';

export interface ScanOptions {
  url: string;
  depth: number;
  output: string;
  screenshots: boolean;
  verbose: boolean;
  chromePath?: string;
  useFirefox: boolean;
  timeoutMs: number;
  maxLinksPerPage: number;
  settleMs: number;
  headless: boolean;
  jsonPath?: string;
}

export const DEFAULT_SCAN_OPTIONS: Omit<ScanOptions, 'url'> = {
  depth: 2,
  output: OUTPUT_LAYOUT.DEFAULT_REPORT_FILE,
  screenshots: false,
  verbose: false,
  useFirefox: false,
  timeoutMs: 30000,
  maxLinksPerPage: DEFAULT_MAX_LINKS_PER_PAGE,
  settleMs: 2000,
  headless: true,
};

/**
 * A page driver plus whatever must be released once the scan is over
 */
export interface ScanSession {
  driver: PageDriver;
  close: () => Promise<void>;
}

export interface ScanDependencies {
  openSession?: (options: ScanOptions) => Promise<ScanSession>;
  cwd?: string; // base for relative output paths, default process.cwd()
}

export interface ScanSummary {
  pagesScanned: number;
  findings: Finding[];
  bySeverity: Record<Severity, number>;
  reportPath: string;
  jsonPath?: string;
}

export async function openBrowserScanSession(options: ScanOptions): Promise<ScanSession> {
  const session = await createBrowserSession({
    useFirefox: options.useFirefox,
    chromePath: options.chromePath,
    headless: options.headless,
    timeoutMs: options.timeoutMs,
  });
  getLogger().debug(`Browser started: ${session.browserName}`);

  return {
    driver: new PlaywrightPageDriver(session.page, {
      navigationTimeout: options.timeoutMs,
      settleMs: options.settleMs,
    }),
    close: session.close,
  };
}

function countBySeverity(findings: Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of findings) {
    counts[finding.severity]++;
  }
  return counts;
}

/**
 * Crawl, analyze every page, and write the report(s)
 */
export async function orchestrateScan(
  input: Partial<ScanOptions> & Pick<ScanOptions, 'url'>,
  deps: ScanDependencies = {}
): Promise<ScanSummary> {
  const options: ScanOptions = { ...DEFAULT_SCAN_OPTIONS, ...input };
  const logger = getLogger();
  const cwd = deps.cwd ?? process.cwd();
  const reportPath = resolve(cwd, options.output);
  const openSession = deps.openSession ?? openBrowserScanSession;

  logger.info(`Scanning ${options.url} (depth ${options.depth})`);

  const session = await openSession(options);
  const findings: Finding[] = [];
  let pagesScanned = 0;

  try {
    const crawler = new WebCrawler(session.driver, {
      maxLinksPerPage: options.maxLinksPerPage,
      screenshotsDir: options.screenshots ? getScreenshotsDir(reportPath) : undefined,
    });
    const pages = await crawler.crawl(options.url, options.depth);

    if (pages.length === 0) {
      throw CrawlError.fromUnreachableStart(options.url);
    }
    pagesScanned = pages.length;

    logger.phaseStart('Analysis');
    const detector = new XssDetector();
    pages.forEach((page, index) => {
      logger.progress({ phase: 'Analysis', current: index, total: pages.length });
      findings.push(...detector.analyze(page));
    });
    logger.progress({ phase: 'Analysis', current: pages.length, total: pages.length });
  } finally {
    await session.close();
  }

  const meta = {
    targetUrl: options.url,
    pagesScanned,
    depth: options.depth,
    generatedAt: new Date(),
  };

  await generateReport(findings, reportPath, meta);

  let jsonPath: string | undefined;
  if (options.jsonPath) {
    jsonPath = await writeJsonReport(findings, resolve(cwd, options.jsonPath), meta);
  }

  const unique = deduplicateFindings(findings);
  const bySeverity = countBySeverity(unique);

  logger.summary({
    pages: pagesScanned,
    findings: {
      total: unique.length,
      high: bySeverity.high,
      medium: bySeverity.medium,
      low: bySeverity.low,
    },
    reportPath,
  });

  return {
    pagesScanned,
    findings: unique,
    bySeverity,
    reportPath,
    jsonPath,
  };
}

export { createBrowserSession } from './session.js';
export type { BrowserSession, BrowserSessionOptions, BrowserName } from './session.js';
