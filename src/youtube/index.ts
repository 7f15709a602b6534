export { extractVideoId, buildWatchUrl } from './url.js';
export { scrapeComments, fetchVideoInfo } from './scraper.js';
export { collectComments, sortByNewest } from './comments.js';
export { openVideoPage, dismissConsentDialog } from './navigator.js';
export { readText, getText, extractVideoInfo, extractComment } from './fields.js';
export { SORT_ORDERS } from './types.js';
export type {
  SortOrder,
  VideoInfo,
  CommentRecord,
  ResultBundle,
  ResultMetadata,
  CollectorOptions,
  CollectionResult,
  CycleStats,
  ScrapeOptions,
  StopReason,
} from './types.js';
