/**
 * Core type definitions for character-lens
 */

export const CHARACTER_ROLES = ['protagonist', 'antagonist', 'supporting', 'minor', 'unknown'] as const;

/**
 * Narrative role of a character, listed in precedence order
 */
export type CharacterRole = (typeof CHARACTER_ROLES)[number];

/**
 * A person-entity detected in the text
 */
export interface Character {
  /** Canonical display name */
  name: string;
  /** Alternate surface forms referring to the same character (never repeats `name`) */
  aliases: string[];
  role: CharacterRole;
  /** Extraction certainty in [0, 1] */
  confidence: number;
  /** Confidence of the record `role` came from, when it differs from `confidence` */
  roleConfidence?: number;
  /** Context of the first appearance, when the model reports one */
  firstMention?: string;
}

/**
 * Association between two characters
 */
export interface Relationship {
  character1: string;
  character2: string;
  /** Relation label such as ally, enemy, family, mentor, romantic or unknown */
  type: string;
  /** Intensity on a 1-10 scale */
  strength: number;
  /** Distinct strengths averaged into `strength`, present after merging differing values */
  strengthSamples?: number[];
  description?: string;
  keyScenes?: string[];
}

/**
 * Detailed profile of a single character
 */
export interface CharacterTraits {
  name: string;
  physicalDescription: string;
  personality: string[];
  motivations: string[];
  keyActions: string[];
  characterArc: string;
  /** Other character name -> relationship label */
  relationships: Record<string, string>;
}

/**
 * Analysis tasks understood by the prompt builder and response parser
 */
export type AnalysisTask = 'extract_characters' | 'analyze_relationships' | 'extract_traits';

/**
 * Token accounting reported by the provider
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * A chunk that could not be analyzed
 */
export interface ChunkFailure {
  /** Analysis run the chunk belongs to */
  runId: string;
  chunkIndex: number;
  code: string;
  message: string;
}

/**
 * One call to the analyzer: the chunks it saw and what they cost
 */
export interface RunSummary {
  runId: string;
  provider: string;
  model: string;
  chunkCount: number;
  failedChunks: number;
  usage?: TokenUsage;
}

/**
 * Provenance of a result. The totals cover every distinct run in `runs`.
 */
export interface ResultMetadata {
  provider: string;
  model: string;
  chunkCount: number;
  failedChunks: number;
  usage?: TokenUsage;
  runs: RunSummary[];
}

export interface ExtractionResult {
  characters: Character[];
  failures: ChunkFailure[];
  metadata: ResultMetadata;
}

export interface RelationshipResult {
  relationships: Relationship[];
  failures: ChunkFailure[];
  metadata: ResultMetadata;
}

/**
 * Log levels
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}
