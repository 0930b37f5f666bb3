/**
 * HTML/JSON report generation module
 */

import type { Finding } from '../detector/types.js';
import { getLogger } from '../utils/logger.js';
import { ReportGenerator } from './generator.js';
import type { ReportMeta } from './types.js';

export async function generateReport(
  findings: Finding[],
  outputPath: string,
  meta: ReportMeta
): Promise<string> {
  const logger = getLogger();
  logger.phaseStart('Report');

  const generator = new ReportGenerator(outputPath, meta);
  const reportPath = await generator.generate(findings);

  logger.phaseComplete('Report', reportPath);
  return reportPath;
}

export { ReportGenerator, DEFAULT_TEMPLATE_DIR } from './generator.js';
export type { ReportGeneratorOptions } from './generator.js';
export { writeJsonReport, buildJsonReport } from './json.js';
export { deduplicateFindings, prepareReportData, formatTimestamp } from './aggregate.js';
export { escapeHtml, humanize, fillTemplate, renderBasicReport } from './render.js';
export type { ReportMeta, ReportData, ReportFinding, JsonReport } from './types.js';
