/**
 * File helper utilities
 */

import { readFile } from 'fs/promises';
import { basename, extname } from 'path';

/**
 * Read a UTF-8 text file, normalizing Windows line endings and dropping a BOM
 */
export async function readTextFile(filePath: string): Promise<string> {
  const content = await readFile(filePath, 'utf-8');
  return content.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n');
}

/**
 * Cache file name for a source document and analysis kind. Chunked analyses
 * pass their chunk size, which changes the result.
 */
export function cacheFileName(filePath: string, kind: string, model: string, maxWords?: number): string {
  const stem = basename(filePath, extname(filePath));
  const safeModel = model.replace(/[^A-Za-z0-9._-]+/g, '_');
  const chunking = maxWords === undefined ? '' : `.w${maxWords}`;
  return `${stem}.${kind}.${safeModel}${chunking}.json`;
}
