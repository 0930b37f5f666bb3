export { HtmlAnalyzer, EVENT_ATTRIBUTES, HTML_XSS_PATTERNS, getContext, truncate } from './html-parser.js';
export {
  ScriptAnalyzer,
  HIGH_RISK_PATTERNS,
  MEDIUM_RISK_PATTERNS,
  OBFUSCATION_PATTERNS,
  riskLevelFor,
} from './script-analyzer.js';
export { VisualAnalyzer } from './visual-analyzer.js';
export type * from './types.js';
