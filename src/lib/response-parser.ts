/**
 * Response Parser - turns raw model text into validated records
 *
 * Models wrap their JSON in prose and code fences, mislabel roles and return
 * scores as strings. The parser finds the first JSON value of the expected
 * shape, validates each record on its own, drops the ones that cannot be
 * repaired and coerces the rest.
 */

import { z } from 'zod';
import { Logger } from './logger.js';
import { MalformedResponseError } from '../types/errors.js';
import type {
  AnalysisTask,
  Character,
  CharacterRole,
  CharacterTraits,
  Logger as ILogger,
  Relationship,
} from '../types/index.js';

export const DEFAULT_CONFIDENCE = 0.5;
export const DEFAULT_STRENGTH = 5;
export const MIN_STRENGTH = 1;
export const MAX_STRENGTH = 10;

export interface ParseOptions {
  /**
   * Characters relationship endpoints must resolve to. Character records also
   * resolve through their aliases.
   */
  knownCharacters?: ReadonlyArray<string | Character>;
  /** Fallback name for trait payloads that omit it */
  characterName?: string;
  logger?: ILogger;
}

const defaultLogger = new Logger('ResponseParser');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * An array of records, possibly with stray non-record entries that the record
 * schemas drop one by one. Arrays without any record (e.g. `[1, 2]` in prose)
 * are not candidates unless empty.
 */
function isRecordList(value: unknown): value is unknown[] {
  return Array.isArray(value) && (value.length === 0 || value.some(isRecord));
}

/**
 * Index of the closing bracket matching the opener at `start`, or -1
 */
function findBalancedEnd(text: string, start: number): number {
  const closers: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      closers.push('}');
    } else if (ch === '[') {
      closers.push(']');
    } else if (ch === '}' || ch === ']') {
      if (closers.pop() !== ch) {
        return -1;
      }
      if (closers.length === 0) {
        return i;
      }
    }
  }

  return -1;
}

/**
 * Every balanced JSON value embedded in `text`, in order of appearance
 */
export function* findJsonValues(text: string): Generator<unknown> {
  for (let start = 0; start < text.length; start++) {
    const ch = text[start];
    if (ch !== '{' && ch !== '[') {
      continue;
    }
    const end = findBalancedEnd(text, start);
    if (end === -1) {
      continue;
    }
    try {
      yield JSON.parse(text.slice(start, end + 1));
    } catch {
      // Not JSON (e.g. "[sic]" in prose); keep scanning
    }
  }
}

/**
 * First embedded JSON value that `select` accepts
 *
 * @throws {MalformedResponseError} when no candidate has the expected shape
 */
export function extractJsonPayload<T>(
  raw: string,
  expectedFormat: string,
  select: (value: unknown) => T | undefined
): T {
  for (const value of findJsonValues(raw)) {
    const selected = select(value);
    if (selected !== undefined) {
      return selected;
    }
  }
  throw new MalformedResponseError(expectedFormat, raw);
}

/**
 * Clamp numeric values into range, replace anything non-numeric with the fallback
 */
export function coerceScore(value: unknown, min: number, max: number, fallback: number): number {
  const numeric =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : Number.NaN;
  if (!Number.isFinite(numeric)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, numeric));
}

const ROLE_KEYWORDS: Array<[CharacterRole, RegExp]> = [
  ['protagonist', /protagonist|main character|\bhero(ine)?\b|\blead\b/],
  ['antagonist', /antagonist|villain|\bfoe\b/],
  ['supporting', /supporting|secondary|\bside\b|deuteragonist/],
  ['minor', /minor|background|cameo|tertiary/],
];

/**
 * Map free-text role labels onto the fixed role set
 */
export function normalizeRole(value: unknown): CharacterRole {
  if (typeof value !== 'string') {
    return 'unknown';
  }
  const label = value.trim().toLowerCase();
  for (const [role, pattern] of ROLE_KEYWORDS) {
    if (pattern.test(label)) {
      return role;
    }
  }
  return 'unknown';
}

const trimmedStrings = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const CharacterRecordSchema = z.object({
  name: z.string().trim().min(1),
  aliases: trimmedStrings,
  role: z.unknown().transform(normalizeRole),
  confidence: z.unknown().transform((v) => coerceScore(v, 0, 1, DEFAULT_CONFIDENCE)),
  first_mention: z.string().trim().min(1).optional().catch(undefined),
});

const RelationshipRecordSchema = z.object({
  character1: z.string().trim().min(1),
  character2: z.string().trim().min(1),
  type: z.string().trim().toLowerCase().min(1).catch('unknown'),
  strength: z
    .unknown()
    .transform((v) => coerceScore(v, MIN_STRENGTH, MAX_STRENGTH, DEFAULT_STRENGTH)),
  description: z.string().trim().min(1).optional().catch(undefined),
  key_scenes: trimmedStrings.optional(),
});

const TRAIT_KEYS = [
  'physical_description',
  'personality',
  'motivations',
  'key_actions',
  'character_arc',
  'relationships',
];

const TraitsRecordSchema = z.object({
  name: z.string().trim().min(1).optional().catch(undefined),
  physical_description: z.string().trim().catch(''),
  personality: trimmedStrings,
  motivations: trimmedStrings,
  key_actions: trimmedStrings,
  character_arc: z.string().trim().catch(''),
  relationships: z
    .record(z.unknown())
    .catch({})
    .transform((entries) =>
      Object.fromEntries(
        Object.entries(entries).filter(
          (entry): entry is [string, string] => typeof entry[1] === 'string'
        )
      )
    ),
});

/**
 * Aliases without duplicates (case-insensitive) and without the name itself
 */
export function cleanAliases(name: string, aliases: readonly string[]): string[] {
  const seen = new Set<string>([name.toLowerCase()]);
  const result: string[] = [];
  for (const alias of aliases) {
    const key = alias.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(alias);
    }
  }
  return result;
}

/**
 * Lower-cased name/alias -> canonical name
 */
export function buildNameIndex(characters: ReadonlyArray<string | Character>): Map<string, string> {
  const index = new Map<string, string>();
  // Canonical names first so an alias never shadows another character's name
  for (const entry of characters) {
    const name = (typeof entry === 'string' ? entry : entry.name).trim();
    if (name && !index.has(name.toLowerCase())) {
      index.set(name.toLowerCase(), name);
    }
  }
  for (const entry of characters) {
    if (typeof entry === 'string') {
      continue;
    }
    for (const alias of entry.aliases) {
      const key = alias.trim().toLowerCase();
      if (key && !index.has(key)) {
        index.set(key, entry.name.trim());
      }
    }
  }
  return index;
}

export function parseCharacters(raw: string, options: ParseOptions = {}): Character[] {
  const logger = options.logger ?? defaultLogger;
  const records = extractJsonPayload(raw, 'JSON array of characters', (value) => {
    if (isRecordList(value)) return value;
    if (isRecord(value) && isRecordList(value.characters)) return value.characters;
    return undefined;
  });

  const characters: Character[] = [];
  records.forEach((record, i) => {
    const parsed = CharacterRecordSchema.safeParse(record);
    if (!parsed.success) {
      logger.warn(`Dropping character record #${i}: missing or empty name`);
      return;
    }
    const { name, aliases, role, confidence, first_mention } = parsed.data;
    const character: Character = { name, aliases: cleanAliases(name, aliases), role, confidence };
    if (first_mention) {
      character.firstMention = first_mention;
    }
    characters.push(character);
  });

  return characters;
}

export function parseRelationships(raw: string, options: ParseOptions = {}): Relationship[] {
  const logger = options.logger ?? defaultLogger;
  const records = extractJsonPayload(raw, '{"relationships": [...]}', (value) => {
    if (isRecord(value) && isRecordList(value.relationships)) return value.relationships;
    if (isRecordList(value)) return value;
    return undefined;
  });

  const index = options.knownCharacters ? buildNameIndex(options.knownCharacters) : undefined;
  const resolve = (name: string): string | undefined =>
    index ? index.get(name.toLowerCase()) : name;

  const relationships: Relationship[] = [];
  records.forEach((record, i) => {
    const parsed = RelationshipRecordSchema.safeParse(record);
    if (!parsed.success) {
      logger.warn(`Dropping relationship record #${i}: missing character names`);
      return;
    }
    const { type, strength, description, key_scenes } = parsed.data;
    const character1 = resolve(parsed.data.character1);
    const character2 = resolve(parsed.data.character2);

    if (!character1 || !character2) {
      logger.warn(
        `Dropping relationship ${parsed.data.character1} -> ${parsed.data.character2}: unknown character`
      );
      return;
    }
    if (character1.toLowerCase() === character2.toLowerCase()) {
      logger.warn(`Dropping relationship #${i}: ${character1} is related to itself`);
      return;
    }

    const relationship: Relationship = { character1, character2, type, strength };
    if (description) {
      relationship.description = description;
    }
    if (key_scenes && key_scenes.length > 0) {
      relationship.keyScenes = key_scenes;
    }
    relationships.push(relationship);
  });

  return relationships;
}

export function parseTraits(raw: string, options: ParseOptions = {}): CharacterTraits {
  const payload = extractJsonPayload(raw, 'JSON object of character traits', (value) =>
    isRecord(value) && TRAIT_KEYS.some((key) => key in value) ? value : undefined
  );

  const traits = TraitsRecordSchema.parse(payload);
  return {
    name: traits.name ?? options.characterName ?? '',
    physicalDescription: traits.physical_description,
    personality: traits.personality,
    motivations: traits.motivations,
    keyActions: traits.key_actions,
    characterArc: traits.character_arc,
    relationships: traits.relationships,
  };
}

/**
 * Parse the raw output of a task
 *
 * @throws {MalformedResponseError} when no JSON value of the task's shape is found
 */
export function parseResponse(raw: string, task: 'extract_characters', options?: ParseOptions): Character[];
export function parseResponse(raw: string, task: 'analyze_relationships', options?: ParseOptions): Relationship[];
export function parseResponse(raw: string, task: 'extract_traits', options?: ParseOptions): CharacterTraits;
export function parseResponse(
  raw: string,
  task: AnalysisTask,
  options: ParseOptions = {}
): Character[] | Relationship[] | CharacterTraits {
  switch (task) {
    case 'extract_characters':
      return parseCharacters(raw, options);
    case 'analyze_relationships':
      return parseRelationships(raw, options);
    case 'extract_traits':
      return parseTraits(raw, options);
  }
}
