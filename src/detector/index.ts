export { XssDetector, matchingInputs, findDangerousUsage } from './xss-detector.js';
export { SEVERITY_ORDER } from './types.js';
export type { Finding, FindingType, Severity } from './types.js';
