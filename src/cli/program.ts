import { Command } from 'commander';
import type { RunOptions } from '../core/index.js';
import {
  parseBrowser,
  parseMaxCommentsFlag,
  parseOutputFormat,
  parseSortOrder,
  parseTimeout,
} from './parse.js';
import { askRunQuestions } from './prompts.js';
import type { Ask, CliOptions } from './types.js';

export type CliAction = (videoUrl: string | undefined, options: CliOptions) => Promise<void>;

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('yt-comments')
    .description('Scrape a YouTube video\'s details and comments to JSON or CSV')
    .version('0.1.0')
    .argument('[videoUrl]', 'Video URL or 11-character id; asks interactively when omitted')
    .option('--max-comments <number>', 'Maximum comments to collect (default: all)', parseMaxCommentsFlag)
    .option('--sort <order>', 'Comment order: top or newest (default: top)', parseSortOrder)
    .option('--format <format>', 'Output format: csv, json or both (default: json)', parseOutputFormat)
    .option('--browser <browser>', 'Browser to drive: edge or chrome (default: edge)', parseBrowser)
    .option('--out-dir <dir>', 'Directory for output files', '.')
    .option('--timeout-ms <number>', 'Navigation and lookup timeout in milliseconds (default: 15000, max: 300000)', parseTimeout)
    .option('--headful', 'Show the browser window (default: headless)')
    .option('--verbose', 'Enable verbose logging')
    .action(action);

  return program;
}

/**
 * Turn parsed arguments into run options. Without a URL argument the run
 * questions are asked, with any matching flag as the answer's default;
 * flags that have no question still apply.
 */
export async function resolveRunOptions(
  videoUrl: string | undefined,
  options: CliOptions,
  ask?: Ask
): Promise<RunOptions> {
  const shared = {
    outDir: options.outDir,
    headless: !options.headful,
    timeoutMs: options.timeoutMs,
  };

  if (videoUrl !== undefined || !ask) {
    return {
      ...shared,
      videoUrl: (videoUrl ?? '').trim(),
      maxComments: options.maxComments,
      sortBy: options.sort ?? 'top',
      format: options.format ?? 'json',
      browser: options.browser ?? 'edge',
    };
  }

  const answers = await askRunQuestions(ask, {
    maxComments: options.maxComments,
    sort: options.sort,
    format: options.format,
    browser: options.browser,
  });
  return {
    ...shared,
    videoUrl: answers.videoUrl,
    maxComments: answers.maxComments,
    sortBy: answers.sort,
    format: answers.format,
    browser: answers.browser,
  };
}
