/**
 * Zod schemas for results read back from disk
 */

import { z } from 'zod';
import { CHARACTER_ROLES } from './index.js';
import type { CharacterTraits, ExtractionResult, RelationshipResult } from './index.js';

const UsageSchema = z.object({
  promptTokens: z.number(),
  completionTokens: z.number(),
  totalTokens: z.number(),
});

const RunSummarySchema = z.object({
  runId: z.string().min(1),
  provider: z.string(),
  model: z.string(),
  chunkCount: z.number().int().min(0),
  failedChunks: z.number().int().min(0),
  usage: UsageSchema.optional(),
});

const MetadataSchema = z.object({
  provider: z.string(),
  model: z.string(),
  chunkCount: z.number().int().min(0),
  failedChunks: z.number().int().min(0),
  usage: UsageSchema.optional(),
  runs: z.array(RunSummarySchema),
});

const FailureSchema = z.object({
  runId: z.string().min(1),
  chunkIndex: z.number().int().min(0),
  code: z.string(),
  message: z.string(),
});

export const CharacterSchema = z.object({
  name: z.string().min(1).describe('Canonical character name'),
  aliases: z.array(z.string()).describe('Other names the character goes by'),
  role: z.enum(CHARACTER_ROLES),
  confidence: z.number().min(0).max(1),
  roleConfidence: z.number().min(0).max(1).optional(),
  firstMention: z.string().optional(),
});

export const RelationshipSchema = z.object({
  character1: z.string().min(1),
  character2: z.string().min(1),
  type: z.string().describe('Relationship label, several joined by " / "'),
  strength: z.number().min(1).max(10).describe('Relationship strength between 1 and 10'),
  strengthSamples: z.array(z.number().min(1).max(10)).optional(),
  description: z.string().optional(),
  keyScenes: z.array(z.string()).optional(),
});

export const ExtractionResultSchema = z.object({
  characters: z.array(CharacterSchema),
  failures: z.array(FailureSchema),
  metadata: MetadataSchema,
});

export const RelationshipResultSchema = z.object({
  relationships: z.array(RelationshipSchema),
  failures: z.array(FailureSchema),
  metadata: MetadataSchema,
});

export const CharacterTraitsSchema = z.object({
  name: z.string(),
  physicalDescription: z.string(),
  personality: z.array(z.string()),
  motivations: z.array(z.string()),
  keyActions: z.array(z.string()),
  characterArc: z.string(),
  relationships: z.record(z.string()),
});

export function isExtractionResult(data: unknown): data is ExtractionResult {
  return ExtractionResultSchema.safeParse(data).success;
}

export function isRelationshipResult(data: unknown): data is RelationshipResult {
  return RelationshipResultSchema.safeParse(data).success;
}

export function isCharacterTraits(data: unknown): data is CharacterTraits {
  return CharacterTraitsSchema.safeParse(data).success;
}
