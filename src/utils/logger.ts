/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - progress(): crawl/analysis progress indicator
 * - summary(): final scan statistics
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export interface SummaryStats {
  pages?: number;
  findings?: {
    total: number;
    high: number;
    medium: number;
    low: number;
  };
  reportPath?: string;
}

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  /**
   * Set verbose mode
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    console.log(`[xss-lens] ${message}`);
  }

  /**
   * Only prints in verbose mode - page visits, analyzer counts, retry notes
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`[xss-lens] DEBUG: ${message}`);
    }
  }

  /**
   * Progress indicator for a phase
   * Prints every step in verbose mode, only first/last otherwise
   */
  progress(stats: ProgressStats): void {
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.verbose) {
      console.log(
        `[xss-lens] PROGRESS: ${phase} - ${current}/${total} (${percentage}%)`
      );
    } else if (current === 0 || current === total) {
      console.log(`[xss-lens] ${phase}: ${current}/${total} (${percentage}%)`);
    }
  }

  /**
   * Print final summary statistics
   */
  summary(stats: SummaryStats): void {
    const lines: string[] = [];

    if (stats.pages !== undefined) {
      lines.push(`Pages scanned: ${stats.pages}`);
    }

    if (stats.findings) {
      const { total, high, medium, low } = stats.findings;
      lines.push(
        `Findings: ${total} (${high} high, ${medium} medium, ${low} low)`
      );
    }

    if (stats.reportPath) {
      lines.push(`Report: ${stats.reportPath}`);
    }

    lines.forEach((line) => this.info(line));
  }

  /**
   * Print a phase completion message
   */
  phaseComplete(phaseName: string, details?: string): void {
    const msg = details
      ? `${phaseName} complete: ${details}`
      : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Print a phase start message (verbose only)
   */
  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  warn(message: string): void {
    console.warn(`[xss-lens] WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`[xss-lens] ERROR: ${message}`);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton.
 * A config passed after creation still updates verbosity.
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
