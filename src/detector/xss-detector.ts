/**
 * XSS detector
 * Runs the HTML, script and visual analyzers on a crawled page and correlates
 * their output into findings
 */

import { HtmlAnalyzer, ScriptAnalyzer, VisualAnalyzer } from '../analysis/index.js';
import type {
  HtmlAnalysis,
  InputInfo,
  ScriptAnalysis,
  ScriptResult,
  VisualAnalysis,
  VisualField,
} from '../analysis/index.js';
import type { PageSnapshot } from '../crawler/types.js';
import { getLogger } from '../utils/logger.js';
import type { Finding } from './types.js';

const HIGH_RISK_EVENTS = [
  'onclick', 'onkeypress', 'onkeyup', 'onkeydown',
  'onchange', 'onsubmit', 'onload', 'onerror',
];

const DANGEROUS_HANDLER_CODE = ['eval(', 'function(', 'document.write', 'innerhtml', 'location'];

const TEXT_LIKE_INPUT_TYPES = ['text', 'password', 'email', 'search'];

const MEDIUM_SCRIPT_REPORT_THRESHOLD = 60;

const RECOMMENDATIONS = {
  input: 'Validate and sanitize user input on the server and encode it for the context it is rendered in.',
  inputDangerous:
    'Validate and sanitize user input and write it to the DOM with safe APIs (textContent, setAttribute) instead of HTML sinks.',
  eventHandler: 'Avoid inline JavaScript in event attributes. Bind handlers from script and validate the data they use.',
  highRiskScript:
    'Review the script, sanitize user-controlled data before use, and avoid eval(), document.write() and direct innerHTML assignment.',
  mediumRiskScript: 'Review the script and sanitize user-controlled data before it reaches DOM or network sinks.',
  inlineScript: 'Review the inline script. Consider moving it to an external file covered by a Content Security Policy.',
  link: 'Validate and sanitize URLs before rendering links; reject javascript: and other script-bearing schemes.',
  pattern: 'Review the markup and encode or sanitize any user-controlled content it contains.',
} as const;

export class XssDetector {
  private htmlAnalyzer = new HtmlAnalyzer();
  private scriptAnalyzer = new ScriptAnalyzer();
  private visualAnalyzer = new VisualAnalyzer();

  /**
   * Analyze one page. An analyzer that throws is logged and treated as empty.
   */
  public analyze(page: PageSnapshot): Finding[] {
    const logger = getLogger();
    logger.debug(`Analyzing page: ${page.url}`);

    const visual = this.safely('visual', page.url, () => this.visualAnalyzer.analyze(page), null);
    const html = this.safely('HTML', page.url, () => this.htmlAnalyzer.parse(page.html, page.url), emptyHtmlAnalysis(page.url));
    const scripts = this.safely('script', page.url, () => this.scriptAnalyzer.analyze(page.scripts), emptyScriptAnalysis());

    const findings = [
      ...this.findInputVulnerabilities(page, visual, html, scripts),
      ...this.findEventVulnerabilities(page, html),
      ...this.findScriptVulnerabilities(page, html, scripts),
      ...this.findUrlVulnerabilities(page, html),
    ];

    logger.debug(`Analysis of ${page.url} complete: ${findings.length} finding(s)`);
    return findings;
  }

  private safely<T>(name: string, url: string, fn: () => T, fallback: T): T {
    try {
      return fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      getLogger().error(`${name} analysis failed for ${url}: ${message}`);
      return fallback;
    }
  }

  private findInputVulnerabilities(
    page: PageSnapshot,
    visual: VisualAnalysis | null,
    html: HtmlAnalysis,
    scripts: ScriptAnalysis
  ): Finding[] {
    const findings: Finding[] = [];

    if (!visual) {
      for (const input of html.inputs) {
        if (!input.suspicious) continue;
        const vector = input.xssVector ?? 'Suspicious attribute';
        findings.push({
          type: 'input_xss',
          subtype: 'suspicious_attribute',
          url: page.url,
          severity: 'medium',
          title: vector,
          description: `Input field with a potential XSS vector: ${vector}`,
          recommendation: RECOMMENDATIONS.input,
          screenshot: page.screenshotPath,
          evidence: { element: describeInput(input) },
        });
      }
      return findings;
    }

    for (const field of visual.inputFields) {
      for (const input of matchingInputs(field, html.inputs)) {
        const usage = findDangerousUsage(input, scripts.results);
        if (!input.suspicious && !usage) continue;

        const vector = input.suspicious
          ? (input.xssVector ?? 'Unsafe input handling')
          : 'Input used by a dangerous script sink';
        findings.push({
          type: 'input_xss',
          subtype: usage ? 'input_with_dangerous_usage' : 'suspicious_input',
          url: page.url,
          severity: usage ? 'high' : 'medium',
          title: vector,
          description: input.suspicious
            ? `Input field with a potential XSS vector: ${vector}`
            : `Input field "${input.id || input.name}" is used in a dangerous script context without visible sanitization.`,
          recommendation: usage ? RECOMMENDATIONS.inputDangerous : RECOMMENDATIONS.input,
          screenshot: page.screenshotPath,
          evidence: {
            element: describeInput(input),
            visualPosition: { x: field.x, y: field.y, width: field.width, height: field.height },
            ...(usage ? { scriptUsage: usage } : {}),
          },
        });
      }
    }

    return findings;
  }

  private findEventVulnerabilities(page: PageSnapshot, html: HtmlAnalysis): Finding[] {
    return html.eventHandlers.map((handler) => {
      let criticalReason: string | null = null;

      for (const [event, code] of Object.entries(handler.handlers)) {
        if (!HIGH_RISK_EVENTS.includes(event.toLowerCase())) continue;
        const lower = code.toLowerCase();
        if (DANGEROUS_HANDLER_CODE.some((danger) => lower.includes(danger))) {
          criticalReason = `Event handler ${event} contains dangerous code: ${code.slice(0, 50)}...`;
          break;
        }
      }

      const element = [handler.tagName, handler.id ? `#${handler.id}` : ''].join('');
      const events = Object.keys(handler.handlers).join(', ');

      const finding: Finding = {
        type: 'event_handler_xss',
        subtype: criticalReason ? 'critical_handler' : 'suspicious_handler',
        url: page.url,
        severity: criticalReason ? 'high' : 'medium',
        title: criticalReason ?? 'Event handler may allow XSS',
        description: criticalReason
          ? `${criticalReason} (on <${element}>)`
          : `Inline event handler (${events}) on <${element}> can execute injected code.`,
        recommendation: RECOMMENDATIONS.eventHandler,
        screenshot: page.screenshotPath,
        evidence: { ...handler },
      };
      return finding;
    });
  }

  private findScriptVulnerabilities(
    page: PageSnapshot,
    html: HtmlAnalysis,
    scripts: ScriptAnalysis
  ): Finding[] {
    const findings: Finding[] = [];

    for (const script of scripts.results) {
      const summary = {
        riskLevel: script.riskLevel,
        riskScore: script.riskScore,
        dangerousFunctionsCount: script.dangerousFunctions.length,
        obfuscated: script.obfuscationDetected,
      };

      if (script.riskLevel === 'high') {
        const keyIssues = script.dangerousFunctions
          .slice(0, 3)
          .filter((fn) => fn.risk === 'high')
          .map((fn) => `Dangerous function: ${fn.match} in context: ${fn.context}`);

        findings.push({
          type: 'script_xss',
          subtype: script.obfuscationDetected ? 'obfuscated_script' : 'high_risk_script',
          url: page.url,
          severity: 'high',
          title: 'Script contains code that may allow XSS',
          description:
            `High-risk script ${script.id} scored ${script.riskScore}/100 ` +
            `with ${script.dangerousFunctions.length} dangerous function(s)` +
            `${script.obfuscationDetected ? ' and signs of obfuscation' : ''}.`,
          recommendation: RECOMMENDATIONS.highRiskScript,
          screenshot: page.screenshotPath,
          evidence: { scriptId: script.id, keyIssues, ...summary },
        });
      } else if (script.riskLevel === 'medium' && script.riskScore >= MEDIUM_SCRIPT_REPORT_THRESHOLD) {
        findings.push({
          type: 'script_xss',
          subtype: 'medium_risk_script',
          url: page.url,
          severity: 'medium',
          title: 'Script contains potentially unsafe code',
          description: `Medium-risk script ${script.id} scored ${script.riskScore}/100 and may contain vulnerabilities.`,
          recommendation: RECOMMENDATIONS.mediumRiskScript,
          screenshot: page.screenshotPath,
          evidence: { scriptId: script.id, ...summary },
        });
      }
    }

    for (const inline of html.inlineScripts) {
      if (!inline.suspicious) continue;
      const patterns = inline.suspiciousPatterns;
      findings.push({
        type: 'inline_script_xss',
        subtype: 'suspicious_inline_script',
        url: page.url,
        severity: 'medium',
        title: 'Inline script contains suspicious patterns',
        description: `Inline script ${inline.id} has ${patterns.length} suspicious pattern(s) that may indicate XSS.`,
        recommendation: RECOMMENDATIONS.inlineScript,
        screenshot: page.screenshotPath,
        evidence: { scriptId: inline.id, patterns: patterns.slice(0, 5) },
      });
    }

    return findings;
  }

  private findUrlVulnerabilities(page: PageSnapshot, html: HtmlAnalysis): Finding[] {
    const findings: Finding[] = [];

    for (const link of html.links) {
      if (!link.suspicious) continue;
      const vector = link.xssVector ?? 'Suspicious link';
      findings.push({
        type: 'url_xss',
        subtype: 'suspicious_link',
        url: page.url,
        severity: 'medium',
        title: vector,
        description: `Link carries a potential XSS vector: ${vector}`,
        recommendation: RECOMMENDATIONS.link,
        screenshot: page.screenshotPath,
        evidence: { href: link.href, text: link.text, parameters: link.parameters },
      });
    }

    for (const pattern of html.suspiciousPatterns) {
      findings.push({
        type: 'pattern_xss',
        subtype: 'suspicious_html_pattern',
        url: page.url,
        severity: 'medium',
        title: 'Suspicious markup pattern',
        description: `Suspicious markup pattern that may indicate XSS: ${pattern.match}`,
        recommendation: RECOMMENDATIONS.pattern,
        screenshot: page.screenshotPath,
        evidence: { pattern: pattern.pattern, context: pattern.context, position: pattern.position },
      });
    }

    return findings;
  }
}

function emptyHtmlAnalysis(url: string): HtmlAnalysis {
  return {
    baseUrl: url,
    inputs: [],
    forms: [],
    eventHandlers: [],
    inlineScripts: [],
    suspiciousPatterns: [],
    links: [],
  };
}

function emptyScriptAnalysis(): ScriptAnalysis {
  return { scriptsAnalyzed: 0, highRiskScripts: 0, mediumRiskScripts: 0, results: [] };
}

function describeInput(input: InputInfo): Record<string, unknown> {
  return {
    tag: input.tag,
    type: input.type,
    id: input.id,
    name: input.name,
    xssVector: input.xssVector,
  };
}

/**
 * HTML inputs that may correspond to a field seen on screen.
 * Text-shaped fields match text-like inputs and textareas; other fields match every input.
 */
export function matchingInputs(field: VisualField, inputs: InputInfo[]): InputInfo[] {
  if (field.type !== 'text_input') {
    return inputs;
  }
  return inputs.filter(
    (input) =>
      (input.tag === 'input' && TEXT_LIKE_INPUT_TYPES.includes(input.type.toLowerCase())) ||
      input.tag === 'textarea'
  );
}

/**
 * First high-risk sink whose surrounding code mentions the input's id or name
 */
export function findDangerousUsage(
  input: InputInfo,
  scripts: ScriptResult[]
): { scriptId: string; match: string; context: string } | null {
  const identifiers = [input.id, input.name].filter((value) => value.length > 0);
  if (identifiers.length === 0) return null;

  for (const script of scripts) {
    for (const fn of script.dangerousFunctions) {
      if (fn.risk !== 'high') continue;
      if (identifiers.some((identifier) => fn.context.includes(identifier))) {
        return { scriptId: script.id, match: fn.match, context: fn.context };
      }
    }
  }
  return null;
}
