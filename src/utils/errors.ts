/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code
 * - message: user-facing message
 * - details: optional verbose details
 *
 * A video id that cannot be resolved is not an error here: the scrape
 * reports it and returns null, and the CLI exits 0.
 */

import { getLogger } from './logger.js';

export abstract class CommentScraperError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: unknown sort/format/browser values, malformed numeric flags
 */
export class InvalidInputError extends CommentScraperError {
  readonly code = 1;

  static fromInvalidChoice(
    name: string,
    value: string,
    choices: readonly string[]
  ): InvalidInputError {
    return new InvalidInputError(
      `Invalid ${name}: "${value}". Expected one of: ${choices.join(', ')}`,
      `Leave the answer blank to use the default`
    );
  }

  static fromInvalidNumber(name: string, value: string): InvalidInputError {
    return new InvalidInputError(
      `${name} must be a positive integer, got: ${value}`
    );
  }
}

/**
 * Browser launch error (exit code 2)
 * Triggered by: missing browser channel, launch/context setup failure
 */
export class BrowserLaunchError extends CommentScraperError {
  readonly code = 2;

  static fromLaunchFailure(browser: string, reason: string): BrowserLaunchError {
    return new BrowserLaunchError(
      `Failed to start ${browser} browser: ${reason}`,
      `Make sure ${browser === 'edge' ? 'Microsoft Edge' : 'Google Chrome'} is installed, or pick the other one with --browser`
    );
  }
}

/**
 * Export error (exit code 3)
 * Triggered by: output file cannot be written
 */
export class ExportError extends CommentScraperError {
  readonly code = 3;

  static fromWriteFailure(path: string, reason: string): ExportError {
    return new ExportError(
      `Failed to write ${path}`,
      `Write error: ${reason}. Check that the output directory exists and is writable`
    );
  }
}

export function getExitCode(error: unknown): number {
  if (error instanceof CommentScraperError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Log the error and exit with its code
 */
export function handleError(error: unknown): never {
  if (error instanceof CommentScraperError) {
    error.log();
    return process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  return process.exit(1);
}
