/**
 * Best-effort field reads from the watch page
 * A field that is missing or has not rendered yet yields undefined; the
 * caller picks the fallback. Nothing here retries or throws for a missing
 * or unreadable element.
 */

import type { BrowserDriver, ElementRef } from '../core/driver.js';
import { getLogger } from '../utils/logger.js';
import { COMMENT_SELECTORS, VIDEO_SELECTORS } from './selectors.js';
import type { CommentRecord, VideoInfo } from './types.js';

export const VIDEO_FALLBACKS = {
  TITLE: 'Unknown Title',
  CHANNEL: 'Unknown Channel',
  VIEWS: 'Unknown Views',
  UPLOAD_DATE: 'Unknown Date',
  LIKES: 'Unknown Likes',
} as const;

export const COMMENT_FALLBACKS = {
  LIKES: '0',
  TIMESTAMP: 'Unknown',
} as const;

/**
 * Trimmed text of the first element matching selector, or undefined when
 * nothing matches, the text is blank or the element cannot be read (it was
 * re-rendered away between lookup and read)
 */
export async function readText(
  driver: BrowserDriver,
  selector: string,
  scope?: ElementRef
): Promise<string | undefined> {
  try {
    const [first] = await driver.findAll(selector, scope);
    if (!first) {
      return undefined;
    }
    const text = await first.text();
    return text || undefined;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    getLogger().debug(`Could not read ${selector}: ${message}`);
    return undefined;
  }
}

export async function getText(
  driver: BrowserDriver,
  selector: string,
  fallback: string,
  scope?: ElementRef
): Promise<string> {
  return (await readText(driver, selector, scope)) ?? fallback;
}

export async function extractVideoInfo(
  driver: BrowserDriver,
  videoId: string,
  url: string
): Promise<VideoInfo> {
  return {
    video_id: videoId,
    title: await getText(driver, VIDEO_SELECTORS.TITLE, VIDEO_FALLBACKS.TITLE),
    channel: await getText(driver, VIDEO_SELECTORS.CHANNEL, VIDEO_FALLBACKS.CHANNEL),
    views: await getText(driver, VIDEO_SELECTORS.VIEWS, VIDEO_FALLBACKS.VIEWS),
    upload_date: await getText(driver, VIDEO_SELECTORS.UPLOAD_DATE, VIDEO_FALLBACKS.UPLOAD_DATE),
    likes: await getText(driver, VIDEO_SELECTORS.LIKES, VIDEO_FALLBACKS.LIKES),
    url,
  };
}

/**
 * Build a comment from a thread element, or null when it has no author or no text
 */
export async function extractComment(
  driver: BrowserDriver,
  thread: ElementRef
): Promise<CommentRecord | null> {
  const author = await readText(driver, COMMENT_SELECTORS.AUTHOR, thread);
  const text = await readText(driver, COMMENT_SELECTORS.TEXT, thread);

  if (!author || !text) {
    return null;
  }

  return {
    author,
    text,
    likes: (await readText(driver, COMMENT_SELECTORS.LIKES, thread)) ?? COMMENT_FALLBACKS.LIKES,
    timestamp:
      (await readText(driver, COMMENT_SELECTORS.TIMESTAMP, thread)) ?? COMMENT_FALLBACKS.TIMESTAMP,
  };
}
