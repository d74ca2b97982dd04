/**
 * Provider client: one text-in, text-out call against a configured backend
 */

import { APICallError, LoadAPIKeyError, generateText } from 'ai';
import type { LanguageModelV1, LanguageModelUsage } from 'ai';
import { Logger } from '../lib/logger.js';
import type { Logger as ILogger, TokenUsage } from '../types/index.js';
import {
  AuthenticationError,
  CharacterLensError,
  ConfigurationError,
  ProviderError,
  RateLimitError,
  TransportError,
  ValidationError,
} from '../types/errors.js';
import type { ProviderConfig } from './config.js';
import { createLanguageModel } from './factory.js';

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_TOKENS = 4096;

export interface CompletionOptions {
  /** Sampling temperature, clamped to [0, 1] */
  temperature: number;
  maxTokens?: number;
  /** Abort the call after this many milliseconds */
  timeoutMs?: number;
  system?: string;
}

export interface Completion {
  text: string;
  usage?: TokenUsage;
}

/**
 * Uniform interface over every backend
 */
export interface ProviderClient {
  readonly provider: string;
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<Completion>;
}

export interface ProviderClientOptions {
  timeoutMs?: number;
  logger?: ILogger;
}

export function clampTemperature(temperature: number): number {
  if (!Number.isFinite(temperature)) {
    return 0;
  }
  return Math.min(1, Math.max(0, temperature));
}

function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage | undefined {
  if (
    !usage ||
    !Number.isFinite(usage.promptTokens) ||
    !Number.isFinite(usage.completionTokens)
  ) {
    return undefined;
  }
  return {
    promptTokens: usage.promptTokens,
    completionTokens: usage.completionTokens,
    totalTokens: usage.promptTokens + usage.completionTokens,
  };
}

/**
 * Milliseconds to wait according to retry-after-ms / retry-after headers
 */
export function parseRetryAfter(headers: Record<string, string> | undefined): number | undefined {
  if (!headers) {
    return undefined;
  }
  const lowered = Object.fromEntries(
    Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value])
  );

  const ms = Number(lowered['retry-after-ms']);
  if (lowered['retry-after-ms'] !== undefined && Number.isFinite(ms) && ms >= 0) {
    return ms;
  }

  const retryAfter = lowered['retry-after'];
  if (retryAfter === undefined) {
    return undefined;
  }
  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(retryAfter);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error) {
    return typeof error.name === 'string' ? error.name : undefined;
  }
  return undefined;
}

/**
 * Map SDK, fetch and abort failures onto the character-lens taxonomy
 */
export function classifyProviderError(
  error: unknown,
  provider: string,
  timeoutMs: number
): CharacterLensError {
  if (error instanceof CharacterLensError) {
    return error;
  }

  if (LoadAPIKeyError.isInstance(error)) {
    return new ConfigurationError('apiKey', error.message, error);
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === undefined) {
      return new TransportError(provider, error.message, error);
    }
    if (status === 401 || status === 403) {
      return new AuthenticationError(provider, status, error);
    }
    if (status === 429) {
      return new RateLimitError(provider, parseRetryAfter(error.responseHeaders), error);
    }
    if (status === 408) {
      return new TransportError(provider, 'request timeout', error);
    }
    return new ProviderError(provider, status, error);
  }

  const name = errorName(error);
  const cause = error instanceof Error ? error : undefined;
  if (name === 'TimeoutError') {
    return new TransportError(provider, `timed out after ${timeoutMs}ms`, cause);
  }
  if (name === 'AbortError') {
    return new TransportError(provider, 'request aborted', cause);
  }
  if (error instanceof TypeError) {
    // fetch() rejects with a TypeError on DNS/connection failures
    return new TransportError(provider, error.message, error);
  }

  return new ProviderError(provider, undefined, cause ?? new Error(String(error)));
}

/**
 * ProviderClient backed by an AI SDK language model
 */
export class LanguageModelClient implements ProviderClient {
  readonly provider: string;
  readonly model: string;
  private readonly languageModel: LanguageModelV1;
  private readonly timeoutMs: number;
  private readonly logger: ILogger;

  constructor(
    languageModel: LanguageModelV1,
    identity: { provider: string; model: string },
    options: ProviderClientOptions = {}
  ) {
    this.languageModel = languageModel;
    this.provider = identity.provider;
    this.model = identity.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? new Logger('ProviderClient');
  }

  async complete(prompt: string, options: CompletionOptions): Promise<Completion> {
    if (!prompt.trim()) {
      throw new ValidationError('prompt', 'must not be empty');
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const temperature = clampTemperature(options.temperature);
    const startTime = Date.now();
    this.logger.debug(
      `[${this.provider}] Sending prompt (${prompt.length} chars, temperature ${temperature})`
    );

    try {
      const { text, usage } = await generateText({
        model: this.languageModel,
        system: options.system,
        prompt,
        temperature,
        maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(timeoutMs),
      });

      const tokenUsage = toTokenUsage(usage);
      this.logger.debug(
        `[${this.provider}] Completed in ${Date.now() - startTime}ms` +
          (tokenUsage ? ` (tokens in=${tokenUsage.promptTokens}, out=${tokenUsage.completionTokens})` : '')
      );

      return tokenUsage ? { text, usage: tokenUsage } : { text };
    } catch (error) {
      const classified = classifyProviderError(error, this.provider, timeoutMs);
      this.logger.warn(
        `[${this.provider}] Call failed after ${Date.now() - startTime}ms: ${classified.code}`,
        classified.message
      );
      throw classified;
    }
  }
}

/**
 * Build the client for a resolved configuration; the backend is chosen here,
 * once, rather than on every call
 */
export function createProviderClient(
  config: ProviderConfig,
  options: ProviderClientOptions = {}
): ProviderClient {
  let languageModel: LanguageModelV1;
  try {
    languageModel = createLanguageModel(config);
  } catch (error) {
    throw new ConfigurationError(
      config.provider,
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined
    );
  }
  return new LanguageModelClient(
    languageModel,
    { provider: config.provider, model: config.model },
    options
  );
}
