/**
 * File-based JSON cache for analysis results
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from '../types/index.js';

/**
 * Load data from cache or run function to generate it.
 *
 * `isValid` guards against stale or hand-edited cache files; a rejected file
 * is regenerated.
 */
export async function loadOrRun<T>(
  filePath: string,
  runFunction: () => Promise<T>,
  logger: Logger,
  isValid: (data: unknown) => data is T
): Promise<T> {
  const directory = dirname(filePath);

  if (!existsSync(directory)) {
    await mkdir(directory, { recursive: true });
    logger.info(`Created directory ${directory}`);
  }

  if (existsSync(filePath)) {
    logger.info(`Loading data from ${filePath}`);
    try {
      const data: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
      if (isValid(data)) {
        return data;
      }
      logger.warn(`Cache ${filePath} has an unexpected shape, regenerating`);
    } catch (error) {
      logger.warn(`Failed to load cache from ${filePath}, regenerating:`, error);
    }
  }

  logger.info(`Running function to generate data for ${filePath}`);
  const data = await runFunction();

  try {
    await writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
    logger.info(`Saved data to ${filePath}`);
  } catch (error) {
    logger.warn(`Failed to save cache to ${filePath}:`, error);
  }

  return data;
}
