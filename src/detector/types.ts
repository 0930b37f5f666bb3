/**
 * Finding model shared by the detector and the report
 */

export type FindingType =
  | 'input_xss'
  | 'event_handler_xss'
  | 'script_xss'
  | 'inline_script_xss'
  | 'url_xss'
  | 'pattern_xss';

export type Severity = 'high' | 'medium' | 'low' | 'info';

export const SEVERITY_ORDER: readonly Severity[] = ['high', 'medium', 'low', 'info'];

export interface Finding {
  type: FindingType;
  subtype: string;
  /** Page the finding was made on */
  url: string;
  severity: Severity;
  /** Short statement of the vector */
  title: string;
  description: string;
  recommendation: string;
  screenshot: string | null;
  /** JSON-serializable analyzer output backing the finding */
  evidence: Record<string, unknown>;
}
