/**
 * CSS selectors for the YouTube watch page
 */

export const VIDEO_SELECTORS = {
  TITLE: 'h1 yt-formatted-string',
  CHANNEL: 'ytd-channel-name a, #channel-name a',
  VIEWS: 'span.view-count',
  UPLOAD_DATE: '#info-strings yt-formatted-string',
  LIKES: 'ytd-toggle-button-renderer yt-formatted-string',
} as const;

export const COMMENT_SELECTORS = {
  SECTION: '#comments',
  THREAD: 'ytd-comment-thread-renderer',
  AUTHOR: '#author-text',
  TEXT: '#content-text',
  LIKES: '#vote-count-middle',
  TIMESTAMP: '.published-time-text',
} as const;

export const SORT_SELECTORS = {
  MENU: 'ytd-sort-filter-submenus-renderer yt-sort-filter-sub-menu-renderer',
  OPTION: 'tp-yt-paper-listbox a, tp-yt-paper-item, paper-item',
} as const;

export const CONSENT_SELECTORS = {
  BUTTON: 'button:has-text("accept"), button:has-text("agree")',
} as const;

export const NEWEST_FIRST_LABEL = 'Newest first';

/** Lower-cased phrases that mark a consent button */
export const CONSENT_PHRASES = ['accept', 'agree'] as const;
