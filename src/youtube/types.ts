/**
 * Video, comment and result types
 * Field names match the JSON written to disk.
 */

export type SortOrder = 'top' | 'newest';

export const SORT_ORDERS: readonly SortOrder[] = ['top', 'newest'];

/**
 * Video metadata read from the watch page
 */
export interface VideoInfo {
  video_id: string;
  title: string;
  channel: string;
  /** View count as displayed, e.g. "1,234 views" */
  views: string;
  upload_date: string;
  likes: string;
  /** Canonical watch URL */
  url: string;
}

/**
 * A top-level comment. Only built when author and text are both non-empty.
 */
export interface CommentRecord {
  author: string;
  text: string;
  likes: string;
  timestamp: string;
}

export interface ResultMetadata {
  total_comments_collected: number;
  sort_order: SortOrder;
  /** Local time, YYYY-MM-DD HH:MM:SS */
  scrape_date: string;
}

export interface ResultBundle {
  readonly video_info: Readonly<VideoInfo>;
  readonly comments: readonly Readonly<CommentRecord>[];
  readonly metadata: Readonly<ResultMetadata>;
}

export type StopReason = 'limit' | 'max-iterations' | 'stalled';

/**
 * Per-cycle statistics reported to CollectorOptions.onCycle
 */
export interface CycleStats {
  cycle: number;
  /** Thread elements present in the DOM */
  found: number;
  /** Elements examined in this cycle's window */
  processed: number;
  /** Records added in this cycle */
  added: number;
  collected: number;
  consecutiveStalls: number;
}

export interface CollectorOptions {
  /** Stop once this many comments are collected (unbounded when absent or not positive) */
  maxComments?: number;

  /** @default 'top' */
  sortBy?: SortOrder;

  /**
   * Hard cap on scroll cycles
   * @default 30
   */
  maxScrollIterations?: number;

  /**
   * Consecutive cycles without new thread elements before stopping
   * @default 3
   */
  stallLimit?: number;

  /**
   * Maximum elements examined per cycle
   * @default 10
   */
  batchSize?: number;

  /**
   * Pixels scrolled per cycle
   * @default 800
   */
  scrollStepPx?: number;

  /**
   * Pause after each scroll (ms)
   * @default 2000
   */
  scrollSettleMs?: number;

  /**
   * Pause after opening the sort menu (ms)
   * @default 1000
   */
  sortMenuSettleMs?: number;

  /**
   * Pause after choosing a sort order (ms)
   * @default 2000
   */
  sortSettleMs?: number;

  onCycle?: (stats: CycleStats) => void;
}

/**
 * Internal loop state of the comment collector
 */
export interface CollectorState {
  scrollIterations: number;
  consecutiveStalls: number;
  lastSeenCount: number;
  /** Index of the next thread element to examine */
  processed: number;
}

export interface CollectionResult {
  comments: CommentRecord[];
  state: CollectorState;
  stopReason: StopReason;
}

export interface NavigatorOptions {
  /**
   * Maximum wait for the title element after navigation (ms)
   * @default 3000
   */
  settleTimeoutMs?: number;

  /**
   * Pause after dismissing a consent dialog (ms)
   * @default 1000
   */
  clickSettleMs?: number;

  /**
   * Poll interval for readiness checks (ms)
   * @default 250
   */
  pollIntervalMs?: number;
}

export interface ScrapeOptions extends CollectorOptions, NavigatorOptions {
  /**
   * Maximum wait for the first comment thread after scrolling to the comments section (ms)
   * @default 2000
   */
  commentsSettleMs?: number;

  /** Clock used for the scrape date */
  now?: () => Date;
}
