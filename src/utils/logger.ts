/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - progress(): phase progress indicator
 * - summary(): final summary statistics
 */

export interface LoggerConfig {
  verbose?: boolean;
  /** Route info/debug lines to stderr so stdout stays machine-readable */
  useStderr?: boolean;
}

export interface ProgressStats {
  phase: string;
  current: number;
  total: number;
}

export interface SummaryStats {
  feed?: {
    urls: number;
    scrolls: number;
    reason: string;
  };
  download?: {
    attempted: number;
    succeeded: number;
    skipped: number;
    failed: number;
    outputDir: string;
  };
}

const PREFIX = '[feed-harvest]';

class Logger {
  private verbose: boolean = false;
  private useStderr: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
    this.useStderr = config?.useStderr ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  setUseStderr(useStderr: boolean): void {
    this.useStderr = useStderr;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  private write(line: string): void {
    if (this.useStderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    this.write(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - used for detailed steps, backoff/retry notes
   */
  debug(message: string): void {
    if (this.verbose) {
      this.write(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Progress indicator for a phase
   * Prints every step in verbose mode, milestones otherwise
   */
  progress(stats: ProgressStats): void {
    const { phase, current, total } = stats;
    const percentage = total > 0 ? Math.round((current / total) * 100) : 0;

    if (this.verbose) {
      this.write(`${PREFIX} PROGRESS: ${phase} - ${current}/${total} (${percentage}%)`);
    } else if (current === 0 || current === total || percentage === 50) {
      this.write(`${PREFIX} ${phase}: ${current}/${total} (${percentage}%)`);
    }
  }

  summary(stats: SummaryStats): void {
    const lines: string[] = [];

    if (stats.feed) {
      const { urls, scrolls, reason } = stats.feed;
      lines.push(`Feed: ${urls} image URLs after ${scrolls} scrolls (${reason})`);
    }

    if (stats.download) {
      const { attempted, succeeded, skipped, failed, outputDir } = stats.download;
      lines.push(
        `Download: ${attempted} attempted, ${succeeded} succeeded, ${skipped} skipped, ${failed} failed`
      );
      lines.push(`Output: ${outputDir}`);
    }

    lines.forEach((line) => this.info(line));
  }

  phaseComplete(phaseName: string, details?: string): void {
    const msg = details ? `${phaseName} complete: ${details}` : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Print a phase start message (verbose only)
   */
  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
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
