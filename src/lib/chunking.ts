/**
 * Chunking policy: split long texts on word boundaries and merge the
 * per-chunk results back into one.
 *
 * Merges are commutative, associative and idempotent, so chunks may be
 * analyzed in any order (or in parallel) and a merged result can be merged
 * again without changing.
 */

import { ValidationError } from '../types/errors.js';
import { CHARACTER_ROLES } from '../types/index.js';
import type {
  Character,
  ChunkFailure,
  ExtractionResult,
  Relationship,
  RelationshipResult,
  ResultMetadata,
  RunSummary,
  TokenUsage,
} from '../types/index.js';

export const DEFAULT_MAX_WORDS = 2500;

/**
 * Split text into chunks of at most `maxWords` whitespace-delimited words.
 *
 * Chunk boundaries fall just before a word, so `chunks.join('')` is the
 * original text. Text without words yields no chunks.
 */
export function splitText(text: string, maxWords: number = DEFAULT_MAX_WORDS): string[] {
  if (!Number.isInteger(maxWords) || maxWords < 1) {
    throw new ValidationError('maxWords', `must be a positive integer, got ${maxWords}`);
  }

  const wordStarts: number[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    wordStarts.push(match.index ?? 0);
  }
  if (wordStarts.length === 0) {
    return [];
  }

  const chunks: string[] = [];
  for (let word = 0; word < wordStarts.length; word += maxWords) {
    const begin = word === 0 ? 0 : wordStarts[word];
    const end = word + maxWords < wordStarts.length ? wordStarts[word + maxWords] : text.length;
    chunks.push(text.slice(begin, end));
  }
  return chunks;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

function keysOf(character: Character): string[] {
  return [character.name, ...character.aliases].map(nameKey).filter((key) => key.length > 0);
}

/**
 * Order of the records a merged name can come from. Only confidence and the
 * lower-cased name take part, so a merged record ranks exactly like the
 * record its name was taken from.
 */
function compareNameSources(a: Character, b: Character): number {
  const keyA = nameKey(a.name);
  const keyB = nameKey(b.name);
  return b.confidence - a.confidence || keyB.length - keyA.length || compareStrings(keyA, keyB);
}

function roleConfidence(character: Character): number {
  return character.roleConfidence ?? character.confidence;
}

/**
 * Most confident role designation first; equal confidences fall back to role precedence
 */
function compareRoleSources(a: Character, b: Character): number {
  return (
    roleConfidence(b) - roleConfidence(a) ||
    CHARACTER_ROLES.indexOf(a.role) - CHARACTER_ROLES.indexOf(b.role)
  );
}

/**
 * Group indices whose key sets intersect, transitively
 */
function groupByOverlap<T>(items: readonly T[], keys: (item: T) => string[]): T[][] {
  const parent = items.map((_, i) => i);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  const owner = new Map<string, number>();
  items.forEach((item, i) => {
    for (const key of keys(item)) {
      const existing = owner.get(key);
      if (existing === undefined) {
        owner.set(key, i);
      } else {
        parent[find(i)] = find(existing);
      }
    }
  });

  const groups = new Map<number, T[]>();
  items.forEach((item, i) => {
    const root = find(i);
    const group = groups.get(root) ?? [];
    group.push(item);
    groups.set(root, group);
  });
  return [...groups.values()];
}

/**
 * One surface form per case-insensitive key; the smallest wins so the choice
 * does not depend on input order
 */
function distinctSurfaceForms(forms: Iterable<string>): Map<string, string> {
  const byKey = new Map<string, string>();
  for (const form of forms) {
    const trimmed = form.trim();
    const key = trimmed.toLowerCase();
    if (!key) continue;
    const current = byKey.get(key);
    if (current === undefined || compareStrings(trimmed, current) < 0) {
      byKey.set(key, trimmed);
    }
  }
  return byKey;
}

function mergeCharacterGroup(group: Character[]): Character {
  const best = [...group].sort(compareNameSources)[0];
  const forms = distinctSurfaceForms(group.flatMap((c) => [c.name, ...c.aliases]));
  const key = nameKey(best.name);
  const name = forms.get(key) ?? best.name.trim();
  forms.delete(key);

  const merged: Character = {
    name,
    aliases: [...forms.values()].sort(compareStrings),
    role: 'unknown',
    confidence: best.confidence,
  };

  const roleSource = group.filter((c) => c.role !== 'unknown').sort(compareRoleSources)[0];
  if (roleSource) {
    merged.role = roleSource.role;
    if (roleConfidence(roleSource) !== merged.confidence) {
      merged.roleConfidence = roleConfidence(roleSource);
    }
  }

  const firstMention = group
    .map((c) => c.firstMention)
    .filter((m): m is string => m !== undefined && m.length > 0)
    .sort(compareStrings)[0];
  if (firstMention) {
    merged.firstMention = firstMention;
  }
  return merged;
}

/**
 * Unify records that share a name or alias (case-insensitive).
 *
 * Every field of the merged record is picked by a rule that ignores how the
 * records were grouped: the name comes from the most confident record, the
 * confidence is the highest seen, aliases are the union of all surface forms,
 * and the role is the known role reported with the highest confidence
 * (kept as `roleConfidence` when that is below the record's confidence).
 */
export function mergeCharacters(characters: readonly Character[]): Character[] {
  return groupByOverlap(
    characters.filter((c) => c.name.trim().length > 0),
    keysOf
  )
    .map(mergeCharacterGroup)
    .sort((a, b) => b.confidence - a.confidence || compareStrings(a.name, b.name));
}

function pairKey(relationship: Relationship): string {
  return [relationship.character1, relationship.character2]
    .map((name) => name.trim().toLowerCase())
    .sort(compareStrings)
    .join('\u0000');
}

function typeLabels(type: string): string[] {
  return type
    .split('/')
    .map((label) => label.trim().toLowerCase())
    .filter((label) => label.length > 0);
}

function strengthSamples(relationship: Relationship): number[] {
  return relationship.strengthSamples ?? [relationship.strength];
}

function mergeRelationshipGroup(group: Relationship[]): Relationship {
  const endpoints = distinctSurfaceForms(group.flatMap((r) => [r.character1, r.character2]));
  const [first, second] = [...endpoints.entries()].sort((a, b) => compareStrings(a[0], b[0]));

  // A set, sorted, so repeats and grouping do not shift the mean
  const samples = [...new Set(group.flatMap(strengthSamples))].sort((a, b) => a - b);
  const mean = samples.reduce((sum, s) => sum + s, 0) / samples.length;

  const labels = [...new Set(group.flatMap((r) => typeLabels(r.type)))].sort(compareStrings);

  const merged: Relationship = {
    character1: first[1],
    character2: second[1],
    type: labels.length > 0 ? labels.join(' / ') : 'unknown',
    strength: Math.round(mean * 100) / 100,
  };
  if (samples.length > 1) {
    merged.strengthSamples = samples;
  }

  const description = group
    .map((r) => r.description)
    .filter((d): d is string => d !== undefined && d.length > 0)
    .sort((a, b) => b.length - a.length || compareStrings(a, b))[0];
  if (description) {
    merged.description = description;
  }

  const scenes = [...new Set(group.flatMap((r) => r.keyScenes ?? []))].sort(compareStrings);
  if (scenes.length > 0) {
    merged.keyScenes = scenes;
  }
  return merged;
}

/**
 * Collapse relationships between the same unordered pair.
 *
 * The strength is the mean (two decimals) of the distinct strengths observed
 * for the pair, carried in `strengthSamples` so merged results can be merged
 * again. Distinct type labels are joined with
 * " / ", key scenes are unioned and the longest description is kept. The pair
 * is written in alphabetical order.
 */
export function mergeRelationships(relationships: readonly Relationship[]): Relationship[] {
  const groups = new Map<string, Relationship[]>();
  for (const relationship of relationships) {
    const key = pairKey(relationship);
    const [a, b] = key.split('\u0000');
    if (!a || !b || a === b) {
      continue;
    }
    const group = groups.get(key) ?? [];
    group.push(relationship);
    groups.set(key, group);
  }

  return [...groups.entries()]
    .sort((a, b) => compareStrings(a[0], b[0]))
    .map(([, group]) => mergeRelationshipGroup(group));
}

function mergeUsage(usages: Array<TokenUsage | undefined>): TokenUsage | undefined {
  const present = usages.filter((u): u is TokenUsage => u !== undefined);
  if (present.length === 0) {
    return undefined;
  }
  return present.reduce((total, u) => ({
    promptTokens: total.promptTokens + u.promptTokens,
    completionTokens: total.completionTokens + u.completionTokens,
    totalTokens: total.totalTokens + u.totalTokens,
  }));
}

function distinctJoined(values: string[]): string {
  return [...new Set(values)].sort(compareStrings).join('+');
}

/**
 * Metadata of a single analysis run
 */
export function runMetadata(run: RunSummary): ResultMetadata {
  const metadata: ResultMetadata = {
    provider: run.provider,
    model: run.model,
    chunkCount: run.chunkCount,
    failedChunks: run.failedChunks,
    runs: [run],
  };
  if (run.usage) {
    metadata.usage = run.usage;
  }
  return metadata;
}

function compareRuns(a: RunSummary, b: RunSummary): number {
  return compareStrings(a.runId, b.runId) || compareStrings(JSON.stringify(a), JSON.stringify(b));
}

/**
 * Combine metadata of partial results. Runs are counted once per `runId`, so
 * merging a result with itself changes nothing; a hybrid run lists every
 * provider.
 */
export function mergeMetadata(metadata: readonly ResultMetadata[]): ResultMetadata {
  const runs = new Map<string, RunSummary>();
  for (const run of metadata.flatMap((m) => m.runs).sort(compareRuns)) {
    if (!runs.has(run.runId)) {
      runs.set(run.runId, run);
    }
  }
  const distinct = [...runs.values()];

  const merged: ResultMetadata = {
    provider: distinctJoined(distinct.map((r) => r.provider)),
    model: distinctJoined(distinct.map((r) => r.model)),
    chunkCount: distinct.reduce((sum, r) => sum + r.chunkCount, 0),
    failedChunks: distinct.reduce((sum, r) => sum + r.failedChunks, 0),
    runs: distinct,
  };
  const usage = mergeUsage(distinct.map((r) => r.usage));
  if (usage) {
    merged.usage = usage;
  }
  return merged;
}

function compareFailures(a: ChunkFailure, b: ChunkFailure): number {
  return (
    compareStrings(a.runId, b.runId) ||
    a.chunkIndex - b.chunkIndex ||
    compareStrings(a.code, b.code) ||
    compareStrings(a.message, b.message)
  );
}

/**
 * One failure per chunk of each run
 */
function mergeFailures(failures: ChunkFailure[]): ChunkFailure[] {
  const distinct = new Map<string, ChunkFailure>();
  for (const failure of [...failures].sort(compareFailures)) {
    const key = `${failure.runId}\u0000${failure.chunkIndex}`;
    if (!distinct.has(key)) {
      distinct.set(key, failure);
    }
  }
  return [...distinct.values()];
}

export function mergeExtractionResults(results: readonly ExtractionResult[]): ExtractionResult {
  return {
    characters: mergeCharacters(results.flatMap((r) => r.characters)),
    failures: mergeFailures(results.flatMap((r) => r.failures)),
    metadata: mergeMetadata(results.map((r) => r.metadata)),
  };
}

export function mergeRelationshipResults(results: readonly RelationshipResult[]): RelationshipResult {
  return {
    relationships: mergeRelationships(results.flatMap((r) => r.relationships)),
    failures: mergeFailures(results.flatMap((r) => r.failures)),
    metadata: mergeMetadata(results.map((r) => r.metadata)),
  };
}
