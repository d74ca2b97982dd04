#!/usr/bin/env node
/**
 * Command-line entry point: analyze the characters of a text file
 */

import 'dotenv/config';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { Logger } from './lib/logger.js';
import { createCharacterAnalyzer } from './lib/character-analyzer.js';
import { DEFAULT_MAX_WORDS } from './lib/chunking.js';
import { describeProviderConfig, loadProviderConfigFromEnv } from './providers/config.js';
import { loadOrRun } from './utils/cache.js';
import { cacheFileName, readTextFile } from './utils/file-helpers.js';
import { isCharacterTraits, isExtractionResult, isRelationshipResult } from './types/schema.js';
import { ValidationError } from './types/errors.js';
import { CACHE_DIRECTORY, RELATIONSHIP_CHARACTER_LIMIT, USAGE } from './constants.js';
import type { Logger as ILogger } from './types/index.js';

export interface CliOptions {
  file: string;
  relationships: boolean;
  traits?: string;
  maxWords?: number;
  cache: boolean;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: Omit<CliOptions, 'file'> & { file?: string } = {
    relationships: false,
    cache: true,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--relationships':
        options.relationships = true;
        break;
      case '--no-cache':
        options.cache = false;
        break;
      case '--traits': {
        const name = args[++i];
        if (!name) {
          throw new ValidationError('--traits', 'expects a character name');
        }
        options.traits = name;
        break;
      }
      case '--max-words': {
        const value = Number(args[++i]);
        if (!Number.isInteger(value) || value < 1) {
          throw new ValidationError('--max-words', 'expects a positive integer');
        }
        options.maxWords = value;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new ValidationError(arg, 'unknown option');
        }
        if (options.file) {
          throw new ValidationError(arg, 'only one text file can be analyzed');
        }
        options.file = arg;
    }
  }

  if (!options.file) {
    throw new ValidationError('file', 'a text file is required');
  }
  return { ...options, file: options.file };
}

async function cached<T>(
  enabled: boolean,
  filePath: string,
  run: () => Promise<T>,
  logger: ILogger,
  isValid: (data: unknown) => data is T
): Promise<T> {
  return enabled ? loadOrRun(filePath, run, logger, isValid) : run();
}

/**
 * Main application workflow
 */
export async function main(args: readonly string[], logger: ILogger = new Logger('CharacterLens')): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  try {
    const config = loadProviderConfigFromEnv(process.env);
    logger.info(`Using AI provider: ${describeProviderConfig(config)}`);

    const analyzer = createCharacterAnalyzer(config, { maxWords: options.maxWords, logger });
    const text = await readTextFile(options.file);
    const maxWords = options.maxWords ?? DEFAULT_MAX_WORDS;
    const cachePath = (kind: string, chunked: boolean): string =>
      join(
        CACHE_DIRECTORY,
        cacheFileName(options.file, kind, describeProviderConfig(config), chunked ? maxWords : undefined)
      );

    const extraction = await cached(
      options.cache,
      cachePath('characters', true),
      () => analyzer.extractCharacters(text),
      logger,
      isExtractionResult
    );
    const output: Record<string, unknown> = { ...extraction };

    if (options.relationships) {
      const candidates = extraction.characters.slice(0, RELATIONSHIP_CHARACTER_LIMIT);
      const relationships = await cached(
        options.cache,
        cachePath('relationships', true),
        () => analyzer.analyzeRelationships(text, candidates),
        logger,
        isRelationshipResult
      );
      output.relationships = relationships.relationships;
      output.relationshipFailures = relationships.failures;
    }

    if (options.traits) {
      const characterName = options.traits;
      output.traits = await cached(
        options.cache,
        cachePath(`traits-${characterName}`, false),
        () => analyzer.extractCharacterTraits(text, characterName),
        logger,
        isCharacterTraits
      );
    }

    console.log(JSON.stringify(output, null, 2));
    return 0;
  } catch (error) {
    logger.error('Application error:', error);
    return 1;
  }
}

// Run if called directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
