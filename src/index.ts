/**
 * Public API
 */

export {
  CharacterAnalyzer,
  createCharacterAnalyzer,
  DEFAULT_RETRY_POLICY,
  DEFAULT_TEMPERATURE,
  type CharacterAnalyzerOptions,
  type RetryPolicy,
} from './lib/character-analyzer.js';
export { buildPrompt, SYSTEM_PROMPT, FALSE_POSITIVE_EXAMPLES } from './lib/prompt-builder.js';
export {
  parseResponse,
  parseCharacters,
  parseRelationships,
  parseTraits,
  extractJsonPayload,
  normalizeRole,
  type ParseOptions,
} from './lib/response-parser.js';
export {
  splitText,
  mergeCharacters,
  mergeRelationships,
  mergeExtractionResults,
  mergeRelationshipResults,
  mergeMetadata,
  runMetadata,
  DEFAULT_MAX_WORDS,
} from './lib/chunking.js';
export { compareWithTraditional, surfaceForms, type NameSetComparison } from './lib/comparison.js';
export { Logger, type LoggerOptions } from './lib/logger.js';
export {
  createProviderClient,
  LanguageModelClient,
  classifyProviderError,
  type Completion,
  type CompletionOptions,
  type ProviderClient,
  type ProviderClientOptions,
} from './providers/client.js';
export {
  PROVIDER_TAGS,
  DEFAULT_MODELS,
  resolveProviderConfig,
  loadProviderConfigFromEnv,
  describeProviderConfig,
  type Environment,
  type ProviderConfig,
  type ProviderConfigFor,
  type ProviderOptions,
  type ProviderTag,
} from './providers/config.js';
export { createLanguageModel } from './providers/factory.js';
export { buildGraphData, type GraphData, type GraphLink, type GraphNode } from './lib/graph-data.js';
export * from './types/errors.js';
export { CHARACTER_ROLES } from './types/index.js';
export type * from './types/index.js';
