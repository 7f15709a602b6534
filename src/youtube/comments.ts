import type { BrowserDriver } from '../core/driver.js';
import { getLogger } from '../utils/logger.js';
import { extractComment } from './fields.js';
import { COMMENT_SELECTORS, NEWEST_FIRST_LABEL, SORT_SELECTORS } from './selectors.js';
import type {
  CollectionResult,
  CollectorOptions,
  CollectorState,
  CommentRecord,
  StopReason,
} from './types.js';

export function scrollByScript(px: number): string {
  return `window.scrollBy(0, ${px});`;
}

/**
 * Open the sort menu and pick "Newest first". Missing controls are skipped.
 * Returns whether the order was changed.
 */
export async function sortByNewest(
  driver: BrowserDriver,
  menuSettleMs: number = 1000,
  sortSettleMs: number = 2000
): Promise<boolean> {
  const logger = getLogger();

  const [menu] = await driver.findAll(SORT_SELECTORS.MENU);
  if (!menu) {
    logger.debug('Sort menu not found, keeping default order');
    return false;
  }

  await driver.click(menu);
  await driver.pause(menuSettleMs);

  for (const option of await driver.findAll(SORT_SELECTORS.OPTION)) {
    let label: string;
    try {
      label = await option.text();
    } catch (e) {
      logger.debug(`Skipping unreadable sort option: ${e instanceof Error ? e.message : String(e)}`);
      continue;
    }
    if (label.includes(NEWEST_FIRST_LABEL)) {
      await driver.click(option);
      await driver.pause(sortSettleMs);
      logger.info(`Changed sort order to: ${NEWEST_FIRST_LABEL}`);
      return true;
    }
  }

  logger.debug(`"${NEWEST_FIRST_LABEL}" option not found, keeping default order`);
  return false;
}

/**
 * Scroll through the comment section collecting top-level comments.
 *
 * Each cycle examines at most batchSize thread elements that have not been
 * examined before, so elements are never read twice. The loop stops when the
 * limit is reached, after maxScrollIterations scrolls, or after stallLimit
 * consecutive cycles in which no new thread elements appeared.
 */
export async function collectComments(
  driver: BrowserDriver,
  options?: CollectorOptions
): Promise<CollectionResult> {
  const logger = getLogger();
  const limit =
    options?.maxComments !== undefined && options.maxComments > 0
      ? options.maxComments
      : undefined;
  const opts = {
    sortBy: options?.sortBy ?? 'top',
    maxScrollIterations: options?.maxScrollIterations ?? 30,
    stallLimit: options?.stallLimit ?? 3,
    batchSize: Math.max(1, options?.batchSize ?? 10),
    scrollStepPx: options?.scrollStepPx ?? 800,
    scrollSettleMs: options?.scrollSettleMs ?? 2000,
    sortMenuSettleMs: options?.sortMenuSettleMs ?? 1000,
    sortSettleMs: options?.sortSettleMs ?? 2000,
  };

  if (opts.sortBy === 'newest') {
    await sortByNewest(driver, opts.sortMenuSettleMs, opts.sortSettleMs);
  }

  const collected: CommentRecord[] = [];
  const state: CollectorState = {
    scrollIterations: 0,
    consecutiveStalls: 0,
    lastSeenCount: 0,
    processed: 0,
  };
  const limitReached = () => limit !== undefined && collected.length >= limit;

  logger.info(`Starting to collect comments (max: ${limit ?? 'all'})...`);

  while (
    !limitReached() &&
    state.scrollIterations < opts.maxScrollIterations &&
    state.consecutiveStalls < opts.stallLimit
  ) {
    const threads = await driver.findAll(COMMENT_SELECTORS.THREAD);

    if (threads.length > state.lastSeenCount) {
      logger.info(`Found ${threads.length} comments so far`);
      state.lastSeenCount = threads.length;
      state.consecutiveStalls = 0;
    } else {
      state.consecutiveStalls++;
    }

    const start = state.processed;
    const end = Math.min(threads.length, start + opts.batchSize);
    const before = collected.length;

    for (let i = start; i < end; i++) {
      state.processed = i + 1;
      const comment = await extractComment(driver, threads[i]);
      if (comment) {
        collected.push(comment);
        if (limitReached()) {
          break;
        }
      }
    }

    const added = collected.length - before;
    options?.onCycle?.({
      cycle: state.scrollIterations + 1,
      found: threads.length,
      processed: state.processed - start,
      added,
      collected: collected.length,
      consecutiveStalls: state.consecutiveStalls,
    });

    if (added > 0 && collected.length % 10 === 0) {
      logger.info(`Extracted ${collected.length} comments`);
    }

    if (limitReached()) {
      logger.info(`Reached maximum comment limit (${limit})`);
      break;
    }

    await driver.runScript(scrollByScript(opts.scrollStepPx));
    await driver.pause(opts.scrollSettleMs);
    state.scrollIterations++;
  }

  let stopReason: StopReason;
  if (limitReached()) {
    stopReason = 'limit';
  } else if (state.consecutiveStalls >= opts.stallLimit) {
    stopReason = 'stalled';
  } else {
    stopReason = 'max-iterations';
  }
  logger.debug(
    `Stopping reason: ${stopReason} (${state.scrollIterations} scrolls, ${state.consecutiveStalls} stalled cycles)`
  );

  return {
    comments: limit !== undefined ? collected.slice(0, limit) : collected,
    state,
    stopReason,
  };
}
