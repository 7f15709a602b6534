/**
 * Result bundle exporters
 */

import { saveJson } from './json.js';
import { saveCsv } from './csv.js';
import { getOutputPath, OUTPUT_LAYOUT } from '../utils/paths.js';
import type { ResultBundle } from '../youtube/types.js';

export type OutputFormat = 'json' | 'csv' | 'both';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'both'];

export { saveJson, readJson, serializeBundle, parseBundle } from './json.js';
export { saveCsv, commentsToCsv } from './csv.js';
export { isResultBundle, isVideoInfo, isCommentRecord, COMMENT_COLUMNS } from './schema.js';

/**
 * Write the bundle in the requested format(s) under outDir.
 * Returns the paths actually written.
 */
export async function exportBundle(
  bundle: ResultBundle,
  format: OutputFormat,
  outDir: string,
  baseFilename: string
): Promise<string[]> {
  const written: string[] = [];

  if (format === 'json' || format === 'both') {
    const jsonPath = getOutputPath(outDir, baseFilename, OUTPUT_LAYOUT.JSON_EXT);
    await saveJson(bundle, jsonPath);
    written.push(jsonPath);
  }

  if (format === 'csv' || format === 'both') {
    const csvPath = getOutputPath(outDir, baseFilename, OUTPUT_LAYOUT.CSV_EXT);
    if (await saveCsv(bundle, csvPath)) {
      written.push(csvPath);
    }
  }

  return written;
}
