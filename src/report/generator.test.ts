import { jest } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ReportGenerator } from './generator';
import { buildJsonReport, writeJsonReport } from './json';
import type { Finding } from '../detector/types';
import { ReportError } from '../utils/errors';
import { resetLogger } from '../utils/logger';

const meta = {
  targetUrl: 'https://example.com/?q=<x>',
  pagesScanned: 2,
  depth: 2,
  generatedAt: new Date(2024, 0, 2, 3, 4, 5),
};

function finding(overrides: Partial<Finding> = {}): Finding {
  return {
    type: 'url_xss',
    subtype: 'suspicious_link',
    url: 'https://example.com/',
    severity: 'medium',
    title: 'JavaScript URI: javascript:alert(1)',
    description: 'Link carries a potential XSS vector: JavaScript URI: javascript:alert(1)',
    recommendation: 'Validate URLs.',
    screenshot: null,
    evidence: { href: 'javascript:alert(1)' },
    ...overrides,
  };
}

describe('ReportGenerator', () => {
  let workDir: string;

  beforeEach(async () => {
    resetLogger();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    workDir = await mkdtemp(join(tmpdir(), 'xss-lens-report-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  it('writes the full report into a new directory', async () => {
    const reportPath = join(workDir, 'nested', 'report.html');

    const written = await new ReportGenerator(reportPath, meta).generate([
      finding(),
      finding(),
      finding({ type: 'script_xss', severity: 'high', description: 'High-risk script script_0 scored 75/100.' }),
    ]);

    expect(written).toBe(reportPath);
    const html = await readFile(reportPath, 'utf-8');
    expect(html).toContain('<title>XSS Scan Report - https://example.com/?q=&lt;x&gt;</title>');
    expect(html).toContain('Generated: 2024-01-02 03:04:05');
    expect(html).toContain('Total findings: <strong>2</strong>');
    expect(html).not.toContain('{{');
  });

  it('keeps placeholder-like text in the target URL literal', async () => {
    const reportPath = join(workDir, 'report.html');

    await new ReportGenerator(reportPath, { ...meta, targetUrl: 'https://example.com/?q={{findings}}' }).generate([
      finding(),
    ]);

    const html = await readFile(reportPath, 'utf-8');
    expect(html).toContain('<title>XSS Scan Report - https://example.com/?q={{findings}}</title>');
    expect(html).toContain('<p>Target: https://example.com/?q={{findings}}</p>');
  });

  it('writes the empty report when there are no findings', async () => {
    const reportPath = join(workDir, 'report.html');

    await new ReportGenerator(reportPath, meta).generate([]);

    const html = await readFile(reportPath, 'utf-8');
    expect(html).toContain('<h2>No XSS vulnerabilities found</h2>');
    expect(html).toContain('<p>2 page(s) were analyzed and no potential XSS vectors were detected.</p>');
  });

  it('falls back to the basic report when templates are missing', async () => {
    const reportPath = join(workDir, 'report.html');

    await new ReportGenerator(reportPath, meta, { templateDir: join(workDir, 'missing') }).generate([finding()]);

    const html = await readFile(reportPath, 'utf-8');
    expect(html).toContain('<h1>Basic XSS Report</h1>');
    expect(html).toContain('<p>Date: 2024-01-02 03:04:05</p>');
    expect(html).toContain('<p>Total: 1</p>');
  });

  it('raises ReportError when the report cannot be written', async () => {
    const generator = new ReportGenerator(workDir, meta);

    await expect(generator.generate([finding()])).rejects.toBeInstanceOf(ReportError);
  });
});

describe('JSON report', () => {
  let workDir: string;

  beforeEach(async () => {
    resetLogger();
    workDir = await mkdtemp(join(tmpdir(), 'xss-lens-json-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('summarizes deduplicated findings without evidence', () => {
    const report = buildJsonReport([finding(), finding()], meta);

    expect(report).toEqual({
      timestamp: '2024-01-02 03:04:05',
      targetUrl: 'https://example.com/?q=<x>',
      pagesScanned: 2,
      totalFindings: 1,
      findingsByType: { url_xss: 1 },
      findingsBySeverity: { high: 0, medium: 1, low: 0, info: 0 },
      findings: [
        {
          id: 'vuln_1',
          type: 'url_xss',
          subtype: 'suspicious_link',
          url: 'https://example.com/',
          severity: 'medium',
          title: 'JavaScript URI: javascript:alert(1)',
          description: 'Link carries a potential XSS vector: JavaScript URI: javascript:alert(1)',
          recommendation: 'Validate URLs.',
          screenshot: null,
        },
      ],
    });
  });

  it('writes the summary to disk', async () => {
    const jsonPath = join(workDir, 'out', 'summary.json');

    await writeJsonReport([finding()], jsonPath, meta);

    const parsed: unknown = JSON.parse(await readFile(jsonPath, 'utf-8'));
    expect(parsed).toMatchObject({ totalFindings: 1, targetUrl: 'https://example.com/?q=<x>' });
  });
});
