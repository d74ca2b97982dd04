/**
 * Character Analyzer - LLM-based character and relationship extraction
 *
 * Splits the text into chunks, prompts the configured provider once per chunk,
 * parses each answer and merges the partial results. A chunk that keeps
 * failing is reported in `failures`; configuration and authentication errors
 * abort the call.
 */

import { randomUUID } from 'crypto';
import { buildPrompt, SYSTEM_PROMPT } from './prompt-builder.js';
import { parseCharacters, parseRelationships, parseTraits } from './response-parser.js';
import {
  DEFAULT_MAX_WORDS,
  mergeCharacters,
  mergeRelationships,
  runMetadata,
  splitText,
} from './chunking.js';
import { Logger } from './logger.js';
import { createProviderClient } from '../providers/client.js';
import type { ProviderClient } from '../providers/client.js';
import type { ProviderConfig } from '../providers/config.js';
import {
  CharacterLensError,
  MalformedResponseError,
  ValidationError,
  getRecoveryStrategy,
  isFatalError,
  wrapError,
} from '../types/errors.js';
import type {
  Character,
  CharacterTraits,
  ChunkFailure,
  ExtractionResult,
  Logger as ILogger,
  RelationshipResult,
  ResultMetadata,
  TokenUsage,
} from '../types/index.js';

export const DEFAULT_TEMPERATURE = 0.3;

export interface RetryPolicy {
  /** Re-asks after an unparseable answer, each at half the previous temperature */
  malformedRetries: number;
  /** Re-asks after rate limiting, transport failures or 5xx responses */
  transientRetries: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  malformedRetries: 1,
  transientRetries: 2,
};

export interface CharacterAnalyzerOptions {
  /** Sampling temperature for the first attempt (0-1) */
  temperature?: number;
  maxTokens?: number;
  /** Words per chunk */
  maxWords?: number;
  /** Per-call timeout */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Waits between transient retries; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: ILogger;
}

interface TaskOutcome<T> {
  value: T;
  usage?: TokenUsage;
}

interface ChunkRun<T> {
  runId: string;
  chunkCount: number;
  values: T[];
  failures: ChunkFailure[];
  usage?: TokenUsage;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function addUsage(total: TokenUsage | undefined, usage: TokenUsage | undefined): TokenUsage | undefined {
  if (!usage) return total;
  if (!total) return usage;
  return {
    promptTokens: total.promptTokens + usage.promptTokens,
    completionTokens: total.completionTokens + usage.completionTokens,
    totalTokens: total.totalTokens + usage.totalTokens,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function requireText(text: string): void {
  if (!text.trim()) {
    throw new ValidationError('text', 'must not be empty');
  }
}

export class CharacterAnalyzer {
  private readonly client: ProviderClient;
  private readonly temperature: number;
  private readonly maxTokens?: number;
  private readonly maxWords: number;
  private readonly timeoutMs?: number;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: ILogger;

  constructor(client: ProviderClient, options: CharacterAnalyzerOptions = {}) {
    this.client = client;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens;
    this.maxWords = options.maxWords ?? DEFAULT_MAX_WORDS;
    this.timeoutMs = options.timeoutMs;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? new Logger('CharacterAnalyzer');

    if (!Number.isFinite(this.temperature) || this.temperature < 0 || this.temperature > 1) {
      throw new ValidationError('temperature', `must be between 0 and 1, got ${this.temperature}`);
    }
    if (!Number.isInteger(this.maxWords) || this.maxWords < 1) {
      throw new ValidationError('maxWords', `must be a positive integer, got ${this.maxWords}`);
    }
  }

  /**
   * Extract the characters of a text, merged across chunks
   */
  async extractCharacters(text: string): Promise<ExtractionResult> {
    requireText(text);
    const chunks = splitText(text, this.maxWords);
    this.logger.info(`Extracting characters from ${chunks.length} chunk(s)`);

    const run = await this.processChunks(chunks, (chunk) =>
      this.runTask(buildPrompt('extract_characters', chunk), (raw) =>
        parseCharacters(raw, { logger: this.logger })
      )
    );

    const result: ExtractionResult = {
      characters: mergeCharacters(run.values.flat()),
      failures: run.failures,
      metadata: this.metadata(run),
    };
    this.logger.info(
      `Extracted ${result.characters.length} character(s), ${run.failures.length} chunk(s) failed`
    );
    return deepFreeze(result);
  }

  /**
   * Relationships among the given characters; endpoints outside that set are dropped
   */
  async analyzeRelationships(
    text: string,
    characters: ReadonlyArray<string | Character>
  ): Promise<RelationshipResult> {
    requireText(text);
    const names = [
      ...new Set(characters.map((c) => (typeof c === 'string' ? c : c.name).trim())),
    ].filter((name) => name.length > 0);
    if (names.length < 2) {
      throw new ValidationError('characters', 'at least two character names are required');
    }

    const chunks = splitText(text, this.maxWords);
    this.logger.info(
      `Analyzing relationships among ${names.length} characters in ${chunks.length} chunk(s)`
    );

    const run = await this.processChunks(chunks, (chunk) =>
      this.runTask(buildPrompt('analyze_relationships', chunk, names), (raw) =>
        parseRelationships(raw, { knownCharacters: characters, logger: this.logger })
      )
    );

    const result: RelationshipResult = {
      relationships: mergeRelationships(run.values.flat()),
      failures: run.failures,
      metadata: this.metadata(run),
    };
    this.logger.info(`Found ${result.relationships.length} relationship(s)`);
    return deepFreeze(result);
  }

  /**
   * Detailed profile of one character, from the whole text in a single call
   */
  async extractCharacterTraits(text: string, characterName: string): Promise<CharacterTraits> {
    requireText(text);
    const { value } = await this.runTask(
      buildPrompt('extract_traits', text, [characterName]),
      (raw) => parseTraits(raw, { characterName: characterName.trim(), logger: this.logger })
    );
    return deepFreeze(value);
  }

  private metadata<T>(run: ChunkRun<T>): ResultMetadata {
    return runMetadata({
      runId: run.runId,
      provider: this.client.provider,
      model: this.client.model,
      chunkCount: run.chunkCount,
      failedChunks: run.failures.length,
      ...(run.usage ? { usage: run.usage } : {}),
    });
  }

  /**
   * Run every chunk under a fresh run id, collecting failures. Fatal errors
   * abort; if no chunk succeeds the first failure is thrown.
   */
  private async processChunks<T>(
    chunks: string[],
    handler: (chunk: string, index: number) => Promise<TaskOutcome<T>>
  ): Promise<ChunkRun<T>> {
    const run: ChunkRun<T> = { runId: randomUUID(), chunkCount: chunks.length, values: [], failures: [] };
    let firstError: CharacterLensError | undefined;

    for (const [index, chunk] of chunks.entries()) {
      this.logger.debug(`Processing chunk ${index + 1}/${chunks.length}`);
      try {
        const { value, usage } = await handler(chunk, index);
        run.values.push(value);
        run.usage = addUsage(run.usage, usage);
      } catch (error) {
        const failure = wrapError(error, `chunk ${index}`);
        if (isFatalError(failure)) {
          this.logger.error(`Aborting: ${failure.message}`);
          throw failure;
        }
        this.logger.warn(`Chunk ${index + 1} failed: ${failure.message}`);
        firstError ??= failure;
        run.failures.push({
          runId: run.runId,
          chunkIndex: index,
          code: failure.code,
          message: failure.message,
        });
      }
    }

    if (run.values.length === 0 && firstError) {
      throw firstError;
    }
    return run;
  }

  /**
   * One prompt, with bounded retries: malformed answers are re-asked at a
   * lower temperature, transient failures after a backoff
   */
  private async runTask<T>(prompt: string, parse: (raw: string) => T): Promise<TaskOutcome<T>> {
    let temperature = this.temperature;
    let malformedLeft = this.retry.malformedRetries;
    let transientAttempts = 0;
    let usage: TokenUsage | undefined;

    for (;;) {
      try {
        const completion = await this.client.complete(prompt, {
          temperature,
          maxTokens: this.maxTokens,
          timeoutMs: this.timeoutMs,
          system: SYSTEM_PROMPT,
        });
        usage = addUsage(usage, completion.usage);
        return { value: parse(completion.text), usage };
      } catch (error) {
        const failure = wrapError(error);

        if (failure instanceof MalformedResponseError) {
          if (malformedLeft <= 0) {
            throw failure;
          }
          malformedLeft--;
          temperature = temperature / 2;
          this.logger.warn(`Unparseable response, retrying at temperature ${temperature}`);
          continue;
        }

        const strategy = getRecoveryStrategy(failure);
        const budget = Math.min(this.retry.transientRetries, strategy.maxRetries ?? 0);
        if (isFatalError(failure) || !strategy.canRetry || transientAttempts >= budget) {
          throw failure;
        }

        const backoff = strategy.backoffMs ?? [0];
        const delay = backoff[Math.min(transientAttempts, backoff.length - 1)] ?? 0;
        transientAttempts++;
        this.logger.warn(`${failure.code}: retrying in ${delay}ms (attempt ${transientAttempts + 1})`);
        await this.sleep(delay);
      }
    }
  }
}

/**
 * Create an analyzer for a resolved provider configuration
 */
export function createCharacterAnalyzer(
  config: ProviderConfig,
  options: CharacterAnalyzerOptions = {}
): CharacterAnalyzer {
  const client = createProviderClient(config, {
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });
  return new CharacterAnalyzer(client, options);
}
