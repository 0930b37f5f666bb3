/**
 * HTML fragments of the report
 * Every value that comes from a scanned page goes through escapeHtml
 */

import { SEVERITY_ORDER } from '../detector/types.js';
import type { Finding } from '../detector/types.js';
import { toReportRelative } from '../utils/paths.js';
import type { ReportData, ReportFinding } from './types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * "event_handler_xss" -> "Event Handler Xss"
 */
export function humanize(identifier: string): string {
  return identifier
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Replace {{name}} placeholders in one pass. Values are inserted verbatim and
 * never expanded again; unknown placeholders are left as they are.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) =>
    Object.hasOwn(values, name) ? values[name] : match
  );
}

export function renderSummary(data: ReportData): string {
  const severityRows = SEVERITY_ORDER.map(
    (severity) => `
          <tr>
            <td><span class="severity-badge severity-${severity}">${severity}</span></td>
            <td>${data.findingsBySeverity[severity]}</td>
          </tr>`
  ).join('');

  const typeRows = Object.entries(data.findingsByType)
    .map(
      ([type, count]) => `
          <tr>
            <td>${escapeHtml(humanize(type))}</td>
            <td>${count}</td>
          </tr>`
    )
    .join('');

  return `
    <div class="summary-box">
      <div>
        <h2>Summary</h2>
        <p>Total findings: <strong>${data.totalFindings}</strong></p>
        <p>Pages scanned: ${data.pagesScanned} (crawl depth ${data.depth})</p>
        <p>Pages with findings: ${data.urlsWithFindings.length}</p>
      </div>
      <div>
        <h3>By severity</h3>
        <table>
          <tr><th>Severity</th><th>Count</th></tr>${severityRows}
        </table>
      </div>
      <div>
        <h3>By type</h3>
        <table>
          <tr><th>Type</th><th>Count</th></tr>${typeRows}
        </table>
      </div>
    </div>`;
}

function renderScreenshot(screenshotPath: string, reportPath: string): string {
  const src = escapeHtml(toReportRelative(reportPath, screenshotPath));
  return `
          <a href="${src}" target="_blank"><img src="${src}" class="screenshot-thumbnail" alt="Screenshot of the page"></a>`;
}

export function renderFindingCard(finding: ReportFinding, reportPath: string): string {
  const subtype = finding.subtype
    ? `<span class="badge">${escapeHtml(humanize(finding.subtype))}</span>`
    : '';

  const screenshot = finding.screenshot ? renderScreenshot(finding.screenshot, reportPath) : '';

  return `
        <div class="vulnerability-card ${finding.severity}" id="${finding.id}">
          <h4>
            <span class="severity-badge severity-${finding.severity}">${finding.severity}</span>
            ${escapeHtml(finding.title)}
          </h4>
          <p>${escapeHtml(finding.description)}</p>
          <div class="recommendation-box"><strong>Recommendation:</strong> ${escapeHtml(finding.recommendation)}</div>
          <p>
            <span class="badge">${escapeHtml(humanize(finding.type))}</span>
            ${subtype}
          </p>
          <details>
            <summary>Evidence</summary>
            <pre>${escapeHtml(JSON.stringify(finding.evidence, null, 2))}</pre>
          </details>${screenshot}
        </div>`;
}

export function renderFindings(data: ReportData, reportPath: string): string {
  return data.urlsWithFindings
    .map((url) => {
      const findings = data.findingsByUrl.get(url) ?? [];
      const cards = findings.map((finding) => renderFindingCard(finding, reportPath)).join('');
      return `
    <div class="url-box">
      <h3>${escapeHtml(url)}</h3>
      <p>${findings.length} finding(s)</p>
      <div class="vulnerability-list">${cards}
      </div>
    </div>`;
    })
    .join('\n');
}

/**
 * Minimal, template-free report used when the full report cannot be rendered
 */
export function renderBasicReport(findings: Finding[], timestamp: string): string {
  const items = findings
    .map(
      (finding) => `
  <div class="vuln">
    <h3>${escapeHtml(finding.type)} - ${escapeHtml(finding.severity)}</h3>
    <p>${escapeHtml(finding.description)}</p>
  </div>`
    )
    .join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Basic XSS Report</title>
  <style>body {font-family: sans-serif;} .vuln {border: 1px solid #ccc; padding: 10px; margin: 5px;}</style>
</head>
<body>
  <h1>Basic XSS Report</h1>
  <p>Date: ${escapeHtml(timestamp)}</p>
  <p>Total: ${findings.length}</p>${items}
</body>
</html>
`;
}
