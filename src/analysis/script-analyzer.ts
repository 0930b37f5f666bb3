/**
 * Risk scoring for inline JavaScript
 *
 * Score = 25 per high-risk sink + 10 per medium-risk pattern + 20 if obfuscated, capped at 100.
 * Medium-risk patterns are only counted when no high-risk sink matched.
 * Level: high >= 70, medium >= 40, low >= 10, otherwise safe.
 */

import type { ScriptRef } from '../crawler/types.js';
import { getLogger } from '../utils/logger.js';
import { getContext } from './html-parser.js';
import type {
  DangerousFunctionMatch,
  ScriptAnalysis,
  ScriptResult,
  ScriptRiskLevel,
} from './types.js';

export const HIGH_RISK_PATTERNS: readonly RegExp[] = [
  /eval\s*\(/,
  /document\.write\s*\(/,
  /innerHTML\s*=/,
  /outerHTML\s*=/,
  /setTimeout\s*\(\s*['"`]/,
  /setInterval\s*\(\s*['"`]/,
  /location\.href\s*=/,
  /document\.cookie\s*=/,
];

export const MEDIUM_RISK_PATTERNS: readonly RegExp[] = [
  /\.ajax\s*\(/,
  /fetch\s*\(/,
  /XMLHttpRequest/,
  /\.src\s*=/,
  /document\.createElement\s*\(/,
];

export const OBFUSCATION_PATTERNS: readonly RegExp[] = [
  /String\.fromCharCode/,
  /atob\s*\(/,
  /\[\s*(['"`])[^'"`]+\1\s*\+\s*(['"`])[^'"`]+\2\s*\]/,
];

const HIGH_RISK_WEIGHT = 25;
const MEDIUM_RISK_WEIGHT = 10;
const OBFUSCATION_WEIGHT = 20;

export function riskLevelFor(score: number): ScriptRiskLevel {
  if (score >= 70) return 'high';
  if (score >= 40) return 'medium';
  if (score >= 10) return 'low';
  return 'safe';
}

function findFirst(
  content: string,
  patterns: readonly RegExp[],
  risk: 'high' | 'medium'
): DangerousFunctionMatch[] {
  const found: DangerousFunctionMatch[] = [];
  for (const pattern of patterns) {
    const match = pattern.exec(content);
    if (match) {
      found.push({
        pattern: pattern.source,
        match: match[0],
        risk,
        context: getContext(content, match.index),
      });
    }
  }
  return found;
}

export class ScriptAnalyzer {
  /**
   * Score every inline script. External scripts carry no content and are skipped.
   */
  public analyze(scripts: ScriptRef[]): ScriptAnalysis {
    const results: ScriptAnalysis = {
      scriptsAnalyzed: scripts.length,
      highRiskScripts: 0,
      mediumRiskScripts: 0,
      results: [],
    };

    scripts.forEach((script, index) => {
      if (script.kind !== 'inline' || !script.content) return;

      const result = this.analyzeScript(script.content, `script_${index}`);
      results.results.push(result);

      if (result.riskLevel === 'high') {
        results.highRiskScripts++;
      } else if (result.riskLevel === 'medium') {
        results.mediumRiskScripts++;
      }
    });

    getLogger().debug(
      `Script analysis: ${results.results.length} inline script(s), ` +
        `${results.highRiskScripts} high risk, ${results.mediumRiskScripts} medium risk`
    );

    return results;
  }

  public analyzeScript(content: string, id: string): ScriptResult {
    const highRisk = findFirst(content, HIGH_RISK_PATTERNS, 'high');
    const mediumRisk = highRisk.length === 0 ? findFirst(content, MEDIUM_RISK_PATTERNS, 'medium') : [];
    const obfuscationDetected = OBFUSCATION_PATTERNS.some((pattern) => pattern.test(content));

    const rawScore =
      highRisk.length * HIGH_RISK_WEIGHT +
      mediumRisk.length * MEDIUM_RISK_WEIGHT +
      (obfuscationDetected ? OBFUSCATION_WEIGHT : 0);
    const riskScore = Math.min(100, rawScore);

    return {
      id,
      riskLevel: riskLevelFor(riskScore),
      riskScore,
      dangerousFunctions: [...highRisk, ...mediumRisk],
      obfuscationDetected,
    };
  }
}
