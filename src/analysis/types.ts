/**
 * Result types of the HTML, script and visual analyzers
 */

export type Position = [start: number, end: number];

export interface OptionInfo {
  value: string;
  text: string;
  selected: boolean;
}

export interface InputInfo {
  tag: 'input' | 'textarea' | 'select';
  type: string;
  name: string;
  id: string;
  value: string;
  attributes: Record<string, string>;
  options?: OptionInfo[];
  inForm: boolean;
  suspicious: boolean;
  xssVector?: string;
}

export interface FormFieldInfo {
  type: string;
  name: string;
  id: string;
  value: string;
}

export interface FormInfo {
  action: string;
  method: string;
  id: string;
  name: string;
  attributes: Record<string, string>;
  inputs: FormFieldInfo[];
  submitButtons: FormFieldInfo[];
  suspicious: boolean;
  xssVector?: string;
}

export interface EventHandlerInfo {
  tagName: string;
  id: string;
  className: string;
  handlers: Record<string, string>;
  contentPreview: string;
}

export interface InlineScriptInfo {
  id: string;
  content: string;
  attributes: Record<string, string>;
  suspicious: boolean;
  suspiciousPatterns: string[];
}

export interface PatternMatch {
  pattern: string;
  match: string;
  position: Position;
  context: string;
}

export interface LinkInfo {
  href: string;
  text: string;
  suspicious: boolean;
  hasParameters: boolean;
  parameters: Record<string, string>;
  xssVector?: string;
}

export interface HtmlAnalysis {
  baseUrl: string | null;
  inputs: InputInfo[];
  forms: FormInfo[];
  eventHandlers: EventHandlerInfo[];
  inlineScripts: InlineScriptInfo[];
  suspiciousPatterns: PatternMatch[];
  links: LinkInfo[];
}

export type ScriptRiskLevel = 'high' | 'medium' | 'low' | 'safe';

export interface DangerousFunctionMatch {
  pattern: string;
  match: string;
  risk: 'high' | 'medium';
  context: string;
}

export interface ScriptResult {
  id: string;
  riskLevel: ScriptRiskLevel;
  riskScore: number;
  dangerousFunctions: DangerousFunctionMatch[];
  obfuscationDetected: boolean;
}

export interface ScriptAnalysis {
  scriptsAnalyzed: number;
  highRiskScripts: number;
  mediumRiskScripts: number;
  results: ScriptResult[];
}

export type VisualFieldType = 'text_input' | 'input_field';

export interface VisualField {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  type: VisualFieldType;
  tag: string;
  inputType: string;
}

export interface VisualAnalysis {
  inputFields: VisualField[];
  imageDimensions: { width: number; height: number };
}
