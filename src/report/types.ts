import type { Finding, FindingType, Severity } from '../detector/types.js';

export interface ReportMeta {
  targetUrl: string;
  pagesScanned: number;
  depth: number;
  generatedAt?: Date;
}

export interface ReportFinding extends Finding {
  /** vuln_1, vuln_2, ... in report order */
  id: string;
}

export interface ReportData {
  timestamp: string;
  targetUrl: string;
  pagesScanned: number;
  depth: number;
  totalFindings: number;
  urlsWithFindings: string[];
  findingsByType: Partial<Record<FindingType, number>>;
  findingsBySeverity: Record<Severity, number>;
  findingsByUrl: Map<string, ReportFinding[]>;
  findings: ReportFinding[];
}

/**
 * Shape of the JSON summary written with --json
 */
export interface JsonReport {
  timestamp: string;
  targetUrl: string;
  pagesScanned: number;
  totalFindings: number;
  findingsByType: Partial<Record<FindingType, number>>;
  findingsBySeverity: Record<Severity, number>;
  findings: Array<{
    id: string;
    type: FindingType;
    subtype: string;
    url: string;
    severity: Severity;
    title: string;
    description: string;
    recommendation: string;
    screenshot: string | null;
  }>;
}
