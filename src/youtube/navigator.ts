import type { BrowserDriver } from '../core/driver.js';
import { getLogger } from '../utils/logger.js';
import { waitUntil } from '../utils/wait.js';
import { CONSENT_PHRASES, CONSENT_SELECTORS, VIDEO_SELECTORS } from './selectors.js';
import { buildWatchUrl } from './url.js';
import type { NavigatorOptions } from './types.js';

/**
 * Load the watch page for videoId and clear a cookie consent dialog if one shows up.
 * Returns the canonical URL that was loaded.
 */
export async function openVideoPage(
  driver: BrowserDriver,
  videoId: string,
  options?: NavigatorOptions
): Promise<string> {
  const logger = getLogger();
  const settleTimeoutMs = options?.settleTimeoutMs ?? 3000;
  const clickSettleMs = options?.clickSettleMs ?? 1000;
  const pollIntervalMs = options?.pollIntervalMs ?? 250;

  const url = buildWatchUrl(videoId);
  logger.debug(`Navigating to: ${url}`);
  await driver.navigate(url);

  const ready = await waitUntil(
    async () => (await driver.findAll(VIDEO_SELECTORS.TITLE)).length > 0,
    {
      timeoutMs: settleTimeoutMs,
      intervalMs: pollIntervalMs,
      pause: (ms) => driver.pause(ms),
    }
  );
  logger.debug(ready ? 'Page ready: title detected' : 'Title not detected, proceeding anyway');

  const dismissed = await dismissConsentDialog(driver, clickSettleMs);
  if (dismissed) {
    logger.debug('Dismissed consent dialog');
  }

  return url;
}

/**
 * Click the first visible button whose label contains a consent phrase.
 * Returns whether a button was clicked. A candidate that cannot be read or
 * clicked is skipped.
 */
export async function dismissConsentDialog(
  driver: BrowserDriver,
  clickSettleMs: number = 1000
): Promise<boolean> {
  const logger = getLogger();
  const buttons = await driver.findAll(CONSENT_SELECTORS.BUTTON);

  for (const button of buttons) {
    try {
      const label = (await button.text()).toLowerCase();
      if (!CONSENT_PHRASES.some((phrase) => label.includes(phrase))) {
        continue;
      }
      if (!(await button.isVisible())) {
        continue;
      }
      await driver.click(button);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      logger.debug(`Skipping consent button: ${message}`);
      continue;
    }
    await driver.pause(clickSettleMs);
    return true;
  }

  return false;
}
