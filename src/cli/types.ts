/**
 * CLI argument parsing and validation types
 */

/**
 * Options as commander hands them over, before validation
 */
export interface CliOptions {
  url: string;
  depth: string;
  output: string;
  screenshots?: boolean;
  verbose?: boolean;
  chromePath?: string;
  useFirefox?: boolean;
  timeoutMs?: string;
  maxLinks?: string;
  headful?: boolean;
  json?: string;
}

export type CliAction = (options: CliOptions) => Promise<void> | void;
