/**
 * Deduplication and aggregation of findings ahead of rendering
 */

import { SEVERITY_ORDER } from '../detector/types.js';
import type { Finding, Severity } from '../detector/types.js';
import type { ReportData, ReportFinding, ReportMeta } from './types.js';

/**
 * Drop findings that repeat (url, type, description); first occurrence wins
 */
export function deduplicateFindings(findings: Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];

  for (const finding of findings) {
    const key = JSON.stringify([finding.url, finding.type, finding.description]);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(finding);
  }

  return unique;
}

/**
 * Local timestamp formatted as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Number findings, count them per type/severity and group them per page.
 * Within a page, findings are ordered by severity, otherwise kept in detection order.
 */
export function prepareReportData(findings: Finding[], meta: ReportMeta): ReportData {
  const findingsBySeverity: Record<Severity, number> = { high: 0, medium: 0, low: 0, info: 0 };
  const data: ReportData = {
    timestamp: formatTimestamp(meta.generatedAt ?? new Date()),
    targetUrl: meta.targetUrl,
    pagesScanned: meta.pagesScanned,
    depth: meta.depth,
    totalFindings: findings.length,
    urlsWithFindings: [],
    findingsByType: {},
    findingsBySeverity,
    findingsByUrl: new Map(),
    findings: [],
  };

  const numbered: ReportFinding[] = findings.map((finding, index) => ({
    ...finding,
    id: `vuln_${index + 1}`,
  }));

  for (const finding of numbered) {
    data.findingsByType[finding.type] = (data.findingsByType[finding.type] ?? 0) + 1;
    findingsBySeverity[finding.severity]++;

    const group = data.findingsByUrl.get(finding.url);
    if (group) {
      group.push(finding);
    } else {
      data.findingsByUrl.set(finding.url, [finding]);
      data.urlsWithFindings.push(finding.url);
    }
  }

  for (const group of data.findingsByUrl.values()) {
    group.sort((a, b) => SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity));
  }

  data.findings = numbered;
  return data;
}
