import { getLogger } from '../utils/logger.js';
import { buildBaseFilename } from '../utils/paths.js';
import { extractVideoId, scrapeComments } from '../youtube/index.js';
import type { ResultBundle, ScrapeOptions, SortOrder } from '../youtube/index.js';
import { exportBundle } from '../export/index.js';
import type { OutputFormat } from '../export/index.js';
import { createBrowserSession } from './session.js';
import type { BrowserChoice } from './session.js';
import { PlaywrightDriver } from './driver.js';
import type { BrowserDriver } from './driver.js';

export interface RunOptions {
  /** Video URL or bare id */
  videoUrl: string;
  maxComments?: number;
  /** @default 'top' */
  sortBy?: SortOrder;
  /** @default 'json' */
  format?: OutputFormat;
  /** @default 'edge' */
  browser?: BrowserChoice;
  /** @default '.' */
  outDir?: string;
  /** @default true */
  headless?: boolean;
  /** Lookup and navigation timeout (ms) */
  timeoutMs?: number;
  /** Settle delays and loop limits passed through to the scraper */
  scrape?: Omit<ScrapeOptions, 'maxComments' | 'sortBy'>;
}

export interface RunResult {
  bundle: ResultBundle;
  files: string[];
}

export interface RunDependencies {
  openDriver: (options: RunOptions) => Promise<BrowserDriver>;
  now: () => Date;
}

async function openPlaywrightDriver(options: RunOptions): Promise<BrowserDriver> {
  const session = await createBrowserSession({
    browser: options.browser,
    headless: options.headless,
    timeoutMs: options.timeoutMs,
  });
  return new PlaywrightDriver(session, { navigationTimeout: options.timeoutMs });
}

const defaultDependencies: RunDependencies = {
  openDriver: openPlaywrightDriver,
  now: () => new Date(),
};

/**
 * Scrape one video and write the requested output files.
 * The browser is released exactly once, whether the scrape succeeds or throws.
 * Returns null when nothing could be scraped.
 */
export async function runScrape(
  options: RunOptions,
  deps: Partial<RunDependencies> = {}
): Promise<RunResult | null> {
  const logger = getLogger();
  const { openDriver, now } = { ...defaultDependencies, ...deps };
  const format = options.format ?? 'json';
  const outDir = options.outDir ?? '.';

  const baseFilename = buildBaseFilename(extractVideoId(options.videoUrl), now());

  const driver = await openDriver(options);

  try {
    const bundle = await scrapeComments(driver, options.videoUrl, {
      ...options.scrape,
      maxComments: options.maxComments,
      sortBy: options.sortBy,
      now,
    });

    if (!bundle) {
      logger.info('Failed to scrape comments');
      return null;
    }

    const files = await exportBundle(bundle, format, outDir, baseFilename);

    logger.summary({
      comments: { collected: bundle.comments.length, limit: options.maxComments },
      files,
    });
    logger.info(`Scraping complete! Collected ${bundle.comments.length} comments`);

    return { bundle, files };
  } finally {
    await driver.quit();
    logger.info('Browser closed');
  }
}
