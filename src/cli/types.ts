/**
 * CLI argument parsing and validation types
 */

import type { SortOrder } from '../youtube/types.js';
import type { OutputFormat } from '../export/index.js';
import type { BrowserChoice } from '../core/session.js';

export interface CliOptions {
  maxComments?: number;
  sort?: SortOrder;
  format?: OutputFormat;
  browser?: BrowserChoice;
  outDir: string;
  verbose?: boolean;
  headful?: boolean;
  timeoutMs?: number;
}

/**
 * Answers gathered interactively when no URL is given on the command line
 */
export interface PromptAnswers {
  videoUrl: string;
  maxComments?: number;
  sort: SortOrder;
  format: OutputFormat;
  browser: BrowserChoice;
}

export type Ask = (question: string) => Promise<string>;
