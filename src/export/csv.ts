/**
 * CSV export of the comment rows
 * UTF-8 with a byte order mark so spreadsheet tools keep non-ASCII text intact.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import { getLogger } from '../utils/logger.js';
import { ExportError } from '../utils/errors.js';
import { COMMENT_COLUMNS } from './schema.js';
import type { ResultBundle } from '../youtube/types.js';

export function commentsToCsv(bundle: ResultBundle): string {
  return stringify(
    bundle.comments.map((comment) => ({ ...comment })),
    {
      bom: true,
      header: true,
      columns: [...COMMENT_COLUMNS],
    }
  );
}

/**
 * Write the comments of the bundle as CSV.
 * Returns false without writing when there are no comments.
 */
export async function saveCsv(bundle: ResultBundle, filePath: string): Promise<boolean> {
  if (bundle.comments.length === 0) {
    getLogger().debug(`No comments to write, skipping ${filePath}`);
    return false;
  }

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, commentsToCsv(bundle), 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw ExportError.fromWriteFailure(filePath, message);
  }

  getLogger().info(`Comments saved to: ${filePath}`);
  return true;
}
