#!/usr/bin/env node
import { runScrape } from '../core/index.js';
import { getLogger } from '../utils/logger.js';
import { handleError } from '../utils/errors.js';
import { createProgram, resolveRunOptions } from './program.js';
import { withTerminalPrompt } from './prompts.js';
import type { CliOptions } from './types.js';

async function action(videoUrl: string | undefined, options: CliOptions): Promise<void> {
  const logger = getLogger({ verbose: options.verbose ?? false });

  if (videoUrl === undefined) {
    console.log('\n=== YouTube Comment Scraper ===\n');
  }

  const runOptions =
    videoUrl !== undefined
      ? await resolveRunOptions(videoUrl, options)
      : await withTerminalPrompt((ask) => resolveRunOptions(undefined, options, ask));

  if (logger.isVerbose()) {
    logger.debug('Run options:');
    logger.debug(`  Video: ${runOptions.videoUrl}`);
    logger.debug(`  Max comments: ${runOptions.maxComments ?? 'all'}`);
    logger.debug(`  Sort: ${runOptions.sortBy}`);
    logger.debug(`  Format: ${runOptions.format}`);
    logger.debug(`  Browser: ${runOptions.browser}`);
    logger.debug(`  Output directory: ${runOptions.outDir}`);
    logger.debug(`  Headless: ${runOptions.headless}`);
    if (runOptions.timeoutMs) {
      logger.debug(`  Timeout: ${runOptions.timeoutMs}ms`);
    }
  }

  await runScrape({
    ...runOptions,
    scrape: {
      onCycle: (stats) =>
        logger.debug(
          `Cycle ${stats.cycle}: ${stats.found} threads, examined ${stats.processed}, ` +
            `added ${stats.added} (total ${stats.collected}, stalled ${stats.consecutiveStalls})`
        ),
    },
  });
}

async function run(): Promise<void> {
  const program = createProgram(action);

  try {
    await program.parseAsync(process.argv);
    process.exit(0);
  } catch (err) {
    handleError(err);
  }
}

void run();
