/**
 * JSON export of the full result bundle
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { getLogger } from '../utils/logger.js';
import { ExportError } from '../utils/errors.js';
import { isResultBundle } from './schema.js';
import type { ResultBundle } from '../youtube/types.js';

export function serializeBundle(bundle: ResultBundle): string {
  return JSON.stringify(bundle, null, 2);
}

export function parseBundle(content: string): ResultBundle {
  const parsed: unknown = JSON.parse(content);

  if (!isResultBundle(parsed)) {
    throw new Error('Invalid result bundle structure');
  }

  return parsed;
}

/**
 * Write the bundle as UTF-8 JSON: write to a temp file, then rename
 */
export async function saveJson(bundle: ResultBundle, filePath: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, serializeBundle(bundle), 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      getLogger().debug(`Could not remove ${tempPath}: ${String(cleanupError)}`);
    });
    const message = error instanceof Error ? error.message : String(error);
    throw ExportError.fromWriteFailure(filePath, message);
  }

  getLogger().info(`Data saved to: ${filePath}`);
}

export async function readJson(filePath: string): Promise<ResultBundle> {
  const content = await readFile(filePath, 'utf-8');
  return parseBundle(content);
}
