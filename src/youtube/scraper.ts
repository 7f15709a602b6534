import type { BrowserDriver } from '../core/driver.js';
import { getLogger } from '../utils/logger.js';
import { formatScrapeDate } from '../utils/paths.js';
import { waitUntil } from '../utils/wait.js';
import { collectComments } from './comments.js';
import { extractVideoInfo } from './fields.js';
import { openVideoPage } from './navigator.js';
import { COMMENT_SELECTORS } from './selectors.js';
import { extractVideoId } from './url.js';
import type { ResultBundle, ScrapeOptions, VideoInfo } from './types.js';

export const SCROLL_TO_COMMENTS_SCRIPT =
  `(() => { const section = document.querySelector('${COMMENT_SELECTORS.SECTION}'); ` +
  `if (section) window.scrollTo(0, section.offsetTop); })();`;

/**
 * Resolve the input to a video, load its page and read the metadata.
 * Returns null when the input is not a recognisable video URL or id.
 */
export async function fetchVideoInfo(
  driver: BrowserDriver,
  input: string,
  options?: ScrapeOptions
): Promise<VideoInfo | null> {
  const logger = getLogger();
  const videoId = extractVideoId(input);
  if (!videoId) {
    logger.error('Invalid YouTube URL');
    return null;
  }

  const url = await openVideoPage(driver, videoId, options);
  const info = await extractVideoInfo(driver, videoId, url);

  logger.info(`Video info extracted: '${info.title}' by ${info.channel}`);
  return info;
}

/**
 * Scrape video metadata and comments into a result bundle, or null when the
 * video could not be resolved
 */
export async function scrapeComments(
  driver: BrowserDriver,
  input: string,
  options?: ScrapeOptions
): Promise<ResultBundle | null> {
  const logger = getLogger();
  const now = options?.now ?? (() => new Date());
  const sortBy = options?.sortBy ?? 'top';

  logger.phaseStart('Video info');
  const videoInfo = await fetchVideoInfo(driver, input, options);
  if (!videoInfo) {
    return null;
  }

  logger.info('Scrolling to comments section...');
  await driver.runScript(SCROLL_TO_COMMENTS_SCRIPT);
  const hasThreads = await waitUntil(
    async () => (await driver.findAll(COMMENT_SELECTORS.THREAD)).length > 0,
    {
      timeoutMs: options?.commentsSettleMs ?? 2000,
      intervalMs: options?.pollIntervalMs ?? 250,
      pause: (ms) => driver.pause(ms),
    }
  );
  if (!hasThreads) {
    logger.debug('No comment threads rendered yet, starting collection anyway');
  }

  logger.phaseStart('Comments');
  const { comments, stopReason } = await collectComments(driver, { ...options, sortBy });

  const bundle: ResultBundle = {
    video_info: videoInfo,
    comments,
    metadata: {
      total_comments_collected: comments.length,
      sort_order: sortBy,
      scrape_date: formatScrapeDate(now()),
    },
  };

  logger.phaseComplete('Comments', `${comments.length} collected (${stopReason})`);
  logger.info(`Successfully scraped ${comments.length} comments`);
  return bundle;
}
