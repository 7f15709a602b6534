/**
 * Runtime validation for result bundles read back from disk
 * Lightweight type guards without external dependencies
 */

import { SORT_ORDERS } from '../youtube/types.js';
import type { CommentRecord, ResultBundle, SortOrder, VideoInfo } from '../youtube/types.js';

/** Column order of the CSV export */
export const COMMENT_COLUMNS = ['author', 'text', 'likes', 'timestamp'] as const satisfies readonly (keyof CommentRecord)[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSortOrder(value: unknown): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

export function isVideoInfo(value: unknown): value is VideoInfo {
  if (!isRecord(value)) return false;

  return (
    typeof value.video_id === 'string' &&
    typeof value.title === 'string' &&
    typeof value.channel === 'string' &&
    typeof value.views === 'string' &&
    typeof value.upload_date === 'string' &&
    typeof value.likes === 'string' &&
    typeof value.url === 'string'
  );
}

export function isCommentRecord(value: unknown): value is CommentRecord {
  if (!isRecord(value)) return false;

  return (
    typeof value.author === 'string' &&
    value.author !== '' &&
    typeof value.text === 'string' &&
    value.text !== '' &&
    typeof value.likes === 'string' &&
    typeof value.timestamp === 'string'
  );
}

export function isResultBundle(value: unknown): value is ResultBundle {
  if (!isRecord(value)) return false;

  if (!isVideoInfo(value.video_info)) return false;

  if (!Array.isArray(value.comments) || !value.comments.every(isCommentRecord)) {
    return false;
  }

  const metadata = value.metadata;
  if (!isRecord(metadata)) return false;

  return (
    typeof metadata.total_comments_collected === 'number' &&
    isSortOrder(metadata.sort_order) &&
    typeof metadata.scrape_date === 'string'
  );
}
