/**
 * Output naming policy
 * Files are named yt_comments_<videoId>_<YYYYMMDD_HHMM>.<ext> inside the output directory
 */

import { join } from 'path';

export const OUTPUT_LAYOUT = {
  /** Prefix shared by every output file */
  FILE_PREFIX: 'yt_comments',
  /** Id used when the input cannot be resolved to a video id */
  FALLBACK_ID: 'video',
  JSON_EXT: 'json',
  CSV_EXT: 'csv',
} as const;

export type OutputExtension = typeof OUTPUT_LAYOUT.JSON_EXT | typeof OUTPUT_LAYOUT.CSV_EXT;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local-time stamp used in filenames, e.g. 20240305_0907
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}

/**
 * Local-time stamp stored in the bundle metadata, e.g. 2024-03-05 09:07:41
 */
export function formatScrapeDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function buildBaseFilename(videoId: string | null, date: Date): string {
  const id = videoId || OUTPUT_LAYOUT.FALLBACK_ID;
  return `${OUTPUT_LAYOUT.FILE_PREFIX}_${id}_${formatFileTimestamp(date)}`;
}

export function getOutputPath(outDir: string, baseFilename: string, ext: OutputExtension): string {
  return join(outDir, `${baseFilename}.${ext}`);
}
