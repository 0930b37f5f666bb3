import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { Finding } from '../detector/types.js';
import { ReportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { deduplicateFindings, formatTimestamp, prepareReportData } from './aggregate.js';
import {
  escapeHtml,
  fillTemplate,
  renderBasicReport,
  renderFindings,
  renderSummary,
} from './render.js';
import type { ReportMeta } from './types.js';

export const DEFAULT_TEMPLATE_DIR = join(__dirname, 'templates');

export interface ReportGeneratorOptions {
  templateDir?: string;
}

export class ReportGenerator {
  private reportPath: string;
  private meta: ReportMeta;
  private templateDir: string;

  constructor(reportPath: string, meta: ReportMeta, options?: ReportGeneratorOptions) {
    this.reportPath = reportPath;
    this.meta = meta;
    this.templateDir = options?.templateDir ?? DEFAULT_TEMPLATE_DIR;
  }

  /**
   * Write the report and return its path.
   * Rendering problems fall back to the basic report; write problems raise ReportError.
   */
  public async generate(findings: Finding[]): Promise<string> {
    const logger = getLogger();
    const generatedAt = this.meta.generatedAt ?? new Date();

    await this.ensureReportDir();

    const unique = deduplicateFindings(findings);
    if (unique.length < findings.length) {
      logger.debug(`Dropped ${findings.length - unique.length} duplicate finding(s)`);
    }

    let html: string;
    try {
      html = unique.length === 0 ? await this.renderEmpty(generatedAt) : await this.renderFull(unique, generatedAt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to render report: ${message}. Writing basic report instead.`);
      html = renderBasicReport(unique, formatTimestamp(generatedAt));
    }

    try {
      await writeFile(this.reportPath, html, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw ReportError.fromWriteFailure(this.reportPath, message);
    }

    logger.debug(`Report written: ${this.reportPath}`);
    return this.reportPath;
  }

  private async ensureReportDir(): Promise<void> {
    const dir = dirname(this.reportPath);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw ReportError.fromWriteFailure(this.reportPath, message);
    }
  }

  private async loadTemplate(name: string): Promise<string> {
    return readFile(join(this.templateDir, name), 'utf-8');
  }

  private async renderFull(findings: Finding[], generatedAt: Date): Promise<string> {
    const template = await this.loadTemplate('report.html');
    const data = prepareReportData(findings, { ...this.meta, generatedAt });

    return fillTemplate(template, {
      targetUrl: escapeHtml(data.targetUrl),
      timestamp: escapeHtml(data.timestamp),
      summary: renderSummary(data),
      findings: renderFindings(data, this.reportPath),
    });
  }

  private async renderEmpty(generatedAt: Date): Promise<string> {
    const template = await this.loadTemplate('empty.html');

    return fillTemplate(template, {
      targetUrl: escapeHtml(this.meta.targetUrl),
      timestamp: escapeHtml(formatTimestamp(generatedAt)),
      pagesScanned: String(this.meta.pagesScanned),
    });
  }
}
