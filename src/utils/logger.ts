/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - summary(): final summary lines
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export interface SummaryStats {
  comments?: {
    collected: number;
    limit?: number;
  };
  files?: string[];
}

const PREFIX = '[yt-comments]';

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Always prints - used for progress and outcome lines
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - used for per-cycle details and skipped lookups
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  summary(stats: SummaryStats): void {
    const lines: string[] = [];

    if (stats.comments) {
      const { collected, limit } = stats.comments;
      lines.push(
        limit !== undefined
          ? `Comments: ${collected} collected (limit ${limit})`
          : `Comments: ${collected} collected`
      );
    }

    if (stats.files && stats.files.length > 0) {
      lines.push(`Files: ${stats.files.join(', ')}`);
    }

    lines.forEach((line) => this.info(line));
  }

  phaseComplete(phaseName: string, details?: string): void {
    const msg = details
      ? `${phaseName} complete: ${details}`
      : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Verbose only
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
 * Get or create the logger singleton. A config passed after creation
 * still updates the verbose flag.
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
