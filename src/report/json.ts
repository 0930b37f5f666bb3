/**
 * JSON summary writer (--json)
 * Same numbering and counts as the HTML report, without evidence
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { Finding } from '../detector/types.js';
import { ReportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { deduplicateFindings, prepareReportData } from './aggregate.js';
import type { JsonReport, ReportMeta } from './types.js';

export function buildJsonReport(findings: Finding[], meta: ReportMeta): JsonReport {
  const data = prepareReportData(deduplicateFindings(findings), meta);

  return {
    timestamp: data.timestamp,
    targetUrl: data.targetUrl,
    pagesScanned: data.pagesScanned,
    totalFindings: data.totalFindings,
    findingsByType: data.findingsByType,
    findingsBySeverity: data.findingsBySeverity,
    findings: data.findings.map((finding) => ({
      id: finding.id,
      type: finding.type,
      subtype: finding.subtype,
      url: finding.url,
      severity: finding.severity,
      title: finding.title,
      description: finding.description,
      recommendation: finding.recommendation,
      screenshot: finding.screenshot,
    })),
  };
}

export async function writeJsonReport(
  findings: Finding[],
  outputPath: string,
  meta: ReportMeta
): Promise<string> {
  const report = buildJsonReport(findings, meta);

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(report, null, 2), 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw ReportError.fromWriteFailure(outputPath, message);
  }

  getLogger().debug(`JSON report written: ${outputPath}`);
  return outputPath;
}
