import { describe, it, expect } from 'vitest';
import {
  coerceScore,
  extractJsonPayload,
  findJsonValues,
  normalizeRole,
  parseCharacters,
  parseRelationships,
  parseResponse,
  parseTraits,
} from '../../src/lib/response-parser.js';
import { MalformedResponseError } from '../../src/types/errors.js';
import type { Character } from '../../src/types/index.js';
import { RecordingLogger } from '../helpers/test-provider.js';

describe('ResponseParser', () => {
  describe('JSON location', () => {
    it('should skip bracketed prose that is not JSON', () => {
      const values = [...findJsonValues('See [note] and {"a": [1, "]"]}')];

      expect(values).toEqual([{ a: [1, ']'] }, [1, ']']]);
    });

    it('should ignore brackets inside strings', () => {
      const raw = 'Result: {"name": "A {weird} [name]", "quote": "He said \\"}\\""}';
      const payload = extractJsonPayload(raw, 'object', (v) => v);

      expect(payload).toEqual({ name: 'A {weird} [name]', quote: 'He said "}"' });
    });

    it('should keep scanning until a value has the expected shape', () => {
      const raw = 'Counts {"total": 2} then [{"name": "Gaal Dornick"}]';
      const payload = extractJsonPayload(raw, 'array', (v) => (Array.isArray(v) ? v : undefined));

      expect(payload).toEqual([{ name: 'Gaal Dornick' }]);
    });

    it('should throw MalformedResponseError when nothing matches', () => {
      expect(() => parseCharacters('I could not find any characters.')).toThrow(MalformedResponseError);
      expect(() => parseCharacters('[{"name": "Hari"')).toThrow(MalformedResponseError);
    });
  });

  describe('parseCharacters', () => {
    it('should parse a fenced array surrounded by prose', () => {
      const raw =
        'Here is the result:\n```json\n[{"name":"Hari Seldon","role":"protagonist","confidence":0.95,"aliases":["Hari","Seldon"]}]\n```';

      const characters = parseResponse(raw, 'extract_characters');

      expect(characters).toHaveLength(1);
      expect(characters[0].name).toBe('Hari Seldon');
      expect(new Set(characters[0].aliases)).toEqual(new Set(['Hari', 'Seldon']));
      expect(characters[0].role).toBe('protagonist');
      expect(characters[0].confidence).toBe(0.95);
    });

    it('should accept an object wrapping a characters array', () => {
      const characters = parseCharacters('{"characters": [{"name": "Cleon I", "role": "supporting"}]}');

      expect(characters).toEqual([
        { name: 'Cleon I', aliases: [], role: 'supporting', confidence: 0.5 },
      ]);
    });

    it('should drop records without a name and keep the rest', () => {
      const logger = new RecordingLogger();
      const raw = JSON.stringify([
        { name: '  ', role: 'minor' },
        { role: 'supporting' },
        { name: 'Gaal Dornick', confidence: 0.9 },
      ]);

      const characters = parseCharacters(raw, { logger });

      expect(characters.map((c) => c.name)).toEqual(['Gaal Dornick']);
      expect(logger.warnings()).toEqual([
        'Dropping character record #0: missing or empty name',
        'Dropping character record #1: missing or empty name',
      ]);
    });

    it('should keep the records of an array with stray non-record entries', () => {
      const logger = new RecordingLogger();
      const raw = '[{"name": "Hari Seldon", "confidence": 0.9}, "Gaal", null]';

      const characters = parseCharacters(raw, { logger });

      expect(characters).toEqual([
        { name: 'Hari Seldon', aliases: [], role: 'unknown', confidence: 0.9 },
      ]);
      expect(logger.warnings()).toEqual([
        'Dropping character record #1: missing or empty name',
        'Dropping character record #2: missing or empty name',
      ]);
    });

    it('should accept an empty array and skip arrays without records', () => {
      expect(parseCharacters('Found none: []')).toEqual([]);
      expect(parseCharacters('Chapters [1, 2] mention [{"name": "Cleon I"}]')).toEqual([
        { name: 'Cleon I', aliases: [], role: 'unknown', confidence: 0.5 },
      ]);
    });

    it('should coerce confidence values', () => {
      const raw = JSON.stringify([
        { name: 'A', confidence: 'high' },
        { name: 'B', confidence: 1.7 },
        { name: 'C', confidence: -0.2 },
        { name: 'D', confidence: '0.8' },
        { name: 'E' },
      ]);

      const confidences = parseCharacters(raw).map((c) => c.confidence);

      expect(confidences).toEqual([0.5, 1, 0, 0.8, 0.5]);
    });

    it('should remove the name and duplicates from aliases', () => {
      const raw = JSON.stringify([
        { name: 'Hari Seldon', aliases: ['hari seldon', 'Hari', 'HARI', ' Seldon ', '', 42] },
      ]);

      expect(parseCharacters(raw)[0].aliases).toEqual(['Hari', 'Seldon']);
    });

    it('should keep the first mention', () => {
      const raw = JSON.stringify([{ name: 'Gaal Dornick', first_mention: 'young protégé' }]);

      expect(parseCharacters(raw)[0].firstMention).toBe('young protégé');
    });
  });

  describe('normalizeRole', () => {
    it.each([
      ['protagonist', 'protagonist'],
      ['Main character', 'protagonist'],
      ['protagonist/antagonist/supporting', 'protagonist'],
      ['Villain', 'antagonist'],
      ['secondary', 'supporting'],
      ['background', 'minor'],
      ['comic relief', 'unknown'],
      [7, 'unknown'],
      [undefined, 'unknown'],
    ])('should map %s to %s', (input, expected) => {
      expect(normalizeRole(input)).toBe(expected);
    });
  });

  describe('coerceScore', () => {
    it('should clamp numbers and default everything else', () => {
      expect(coerceScore(12, 1, 10, 5)).toBe(10);
      expect(coerceScore(0, 1, 10, 5)).toBe(1);
      expect(coerceScore('7', 1, 10, 5)).toBe(7);
      expect(coerceScore('strong', 1, 10, 5)).toBe(5);
      expect(coerceScore(Number.NaN, 1, 10, 5)).toBe(5);
      expect(coerceScore(null, 1, 10, 5)).toBe(5);
    });
  });

  describe('parseRelationships', () => {
    const known = ['Hari Seldon', 'Gaal Dornick', 'Cleon I'];

    it('should drop relationships with unknown endpoints and keep the others', () => {
      const logger = new RecordingLogger();
      const raw = `{"relationships": [
        {"character1": "Hari Seldon", "character2": "Gaal Dornick", "type": "Mentor", "strength": 8},
        {"character1": "Hari Seldon", "character2": "Trantor", "type": "ally", "strength": 3},
        {"character1": "Cleon I", "character2": "Hari Seldon", "type": "enemy", "strength": "6"}
      ]}`;

      const relationships = parseRelationships(raw, { knownCharacters: known, logger });

      expect(relationships).toEqual([
        { character1: 'Hari Seldon', character2: 'Gaal Dornick', type: 'mentor', strength: 8 },
        { character1: 'Cleon I', character2: 'Hari Seldon', type: 'enemy', strength: 6 },
      ]);
      expect(logger.warnings()).toEqual([
        'Dropping relationship Hari Seldon -> Trantor: unknown character',
      ]);
    });

    it('should keep the relationships of a list with stray entries', () => {
      const logger = new RecordingLogger();
      const raw = `{"relationships": [
        "Hari Seldon and Gaal Dornick",
        {"character1": "Hari Seldon", "character2": "Gaal Dornick", "type": "mentor", "strength": 8}
      ]}`;

      const relationships = parseRelationships(raw, { knownCharacters: known, logger });

      expect(relationships).toEqual([
        { character1: 'Hari Seldon', character2: 'Gaal Dornick', type: 'mentor', strength: 8 },
      ]);
      expect(logger.warnings()).toEqual(['Dropping relationship record #0: missing character names']);
    });

    it('should resolve endpoints case-insensitively and through aliases', () => {
      const characters: Character[] = [
        { name: 'Hari Seldon', aliases: ['Seldon', 'Raven'], role: 'protagonist', confidence: 0.9 },
        { name: 'Cleon I', aliases: ['The Emperor'], role: 'supporting', confidence: 0.8 },
      ];
      const raw = '[{"character1": "raven", "character2": "the emperor", "type": "enemy", "strength": 4}]';

      const relationships = parseRelationships(raw, { knownCharacters: characters });

      expect(relationships).toEqual([
        { character1: 'Hari Seldon', character2: 'Cleon I', type: 'enemy', strength: 4 },
      ]);
    });

    it('should drop self-relationships', () => {
      const raw = '{"relationships": [{"character1": "Seldon", "character2": "Hari Seldon", "type": "ally"}]}';
      const characters: Character[] = [
        { name: 'Hari Seldon', aliases: ['Seldon'], role: 'protagonist', confidence: 0.9 },
      ];

      expect(parseRelationships(raw, { knownCharacters: characters })).toEqual([]);
    });

    it('should default type and strength and keep description and scenes', () => {
      const raw = JSON.stringify({
        relationships: [
          {
            character1: 'Hari Seldon',
            character2: 'Gaal Dornick',
            strength: 'very strong',
            description: 'Mentor and student',
            key_scenes: ['The trial', ''],
          },
        ],
      });

      expect(parseRelationships(raw, { knownCharacters: known })).toEqual([
        {
          character1: 'Hari Seldon',
          character2: 'Gaal Dornick',
          type: 'unknown',
          strength: 5,
          description: 'Mentor and student',
          keyScenes: ['The trial'],
        },
      ]);
    });

    it('should accept any endpoints when no character set is given', () => {
      const raw = '{"relationships": [{"character1": "A", "character2": "B", "type": "family", "strength": 2}]}';

      expect(parseRelationships(raw)).toEqual([
        { character1: 'A', character2: 'B', type: 'family', strength: 2 },
      ]);
    });
  });

  describe('parseTraits', () => {
    it('should map snake_case fields and default missing ones', () => {
      const raw = `Sure!\n{"name": "Gaal Dornick", "personality": ["curious", 3], "key_actions": ["travels to Trantor"], "relationships": {"Hari Seldon": "mentor", "Cleon I": 5}}`;

      expect(parseTraits(raw, { characterName: 'Gaal' })).toEqual({
        name: 'Gaal Dornick',
        physicalDescription: '',
        personality: ['curious'],
        motivations: [],
        keyActions: ['travels to Trantor'],
        characterArc: '',
        relationships: { 'Hari Seldon': 'mentor' },
      });
    });

    it('should fall back to the requested name', () => {
      const traits = parseTraits('{"character_arc": "From outsider to insider"}', {
        characterName: 'Gaal Dornick',
      });

      expect(traits.name).toBe('Gaal Dornick');
      expect(traits.characterArc).toBe('From outsider to insider');
    });

    it('should reject payloads without trait fields', () => {
      expect(() => parseTraits('{"error": "Could not parse response"}')).toThrow(MalformedResponseError);
    });
  });
});
