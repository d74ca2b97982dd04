import { describe, it, expect } from 'vitest';
import {
  mergeCharacters,
  mergeExtractionResults,
  mergeMetadata,
  mergeRelationships,
  runMetadata,
  splitText,
} from '../../src/lib/chunking.js';
import { ValidationError } from '../../src/types/errors.js';
import type { Character, ExtractionResult, Relationship } from '../../src/types/index.js';

describe('Chunking', () => {
  describe('splitText', () => {
    it('should split on word boundaries', () => {
      expect(splitText('one two three four five', 2)).toEqual(['one two ', 'three four ', 'five']);
    });

    it('should reproduce the original text when joined', () => {
      const text = '  The ship landed.\n\nGaal stepped out,\tblinking.  \n';
      for (const maxWords of [1, 2, 3, 7, 100]) {
        expect(splitText(text, maxWords).join('')).toBe(text);
      }
    });

    it('should keep leading whitespace in the first chunk', () => {
      expect(splitText('  alpha beta\n', 1)).toEqual(['  alpha ', 'beta\n']);
    });

    it('should return a single chunk for short texts', () => {
      expect(splitText('Hari Seldon smiled.')).toEqual(['Hari Seldon smiled.']);
    });

    it('should return no chunks for text without words', () => {
      expect(splitText('   \n\t')).toEqual([]);
      expect(splitText('')).toEqual([]);
    });

    it('should reject a non-positive chunk size', () => {
      expect(() => splitText('text', 0)).toThrow(ValidationError);
      expect(() => splitText('text', 1.5)).toThrow(ValidationError);
    });
  });

  describe('mergeCharacters', () => {
    const hari: Character = {
      name: 'Hari Seldon',
      aliases: ['Hari'],
      role: 'protagonist',
      confidence: 0.9,
    };
    const seldon: Character = {
      name: 'Seldon',
      aliases: ['Hari Seldon'],
      role: 'unknown',
      confidence: 0.7,
    };

    it('should unify records whose names and aliases overlap', () => {
      expect(mergeCharacters([hari, seldon])).toEqual([
        { name: 'Hari Seldon', aliases: ['Hari', 'Seldon'], role: 'protagonist', confidence: 0.9 },
      ]);
    });

    it('should not depend on input order', () => {
      expect(mergeCharacters([seldon, hari])).toEqual(mergeCharacters([hari, seldon]));
    });

    it('should be idempotent', () => {
      const once = mergeCharacters([hari, seldon]);
      expect(mergeCharacters(once)).toEqual(once);
    });

    it('should merge transitively through shared aliases', () => {
      const merged = mergeCharacters([
        { name: 'Hari Seldon', aliases: ['Raven'], role: 'protagonist', confidence: 0.9 },
        { name: 'Raven', aliases: ['Dr. Seldon'], role: 'unknown', confidence: 0.6 },
        { name: 'Dr. Seldon', aliases: [], role: 'supporting', confidence: 0.5 },
      ]);

      expect(merged).toEqual([
        {
          name: 'Hari Seldon',
          aliases: ['Dr. Seldon', 'Raven'],
          role: 'protagonist',
          confidence: 0.9,
        },
      ]);
    });

    it('should prefer the longer name on equal confidence and keep the known role', () => {
      const merged = mergeCharacters([
        { name: 'Gaal', aliases: [], role: 'unknown', confidence: 0.8 },
        { name: 'Gaal Dornick', aliases: ['Gaal'], role: 'supporting', confidence: 0.8 },
      ]);

      expect(merged).toEqual([
        { name: 'Gaal Dornick', aliases: ['Gaal'], role: 'supporting', confidence: 0.8 },
      ]);
    });

    it('should keep the confidence a known role was reported with', () => {
      const merged = mergeCharacters([
        { name: 'X', aliases: [], role: 'unknown', confidence: 0.9 },
        { name: 'x', aliases: [], role: 'minor', confidence: 0.4, firstMention: 'the hallway' },
      ]);

      expect(merged).toEqual([
        {
          name: 'X',
          aliases: [],
          role: 'minor',
          confidence: 0.9,
          roleConfidence: 0.4,
          firstMention: 'the hallway',
        },
      ]);
    });

    it('should give the same record however partial results are grouped', () => {
      const a: Character = { name: 'X', aliases: [], role: 'unknown', confidence: 0.9 };
      const b: Character = { name: 'X', aliases: [], role: 'minor', confidence: 0.5 };
      const c: Character = { name: 'X', aliases: [], role: 'antagonist', confidence: 0.7 };

      const flat = mergeCharacters([a, b, c]);

      expect(flat).toEqual([
        { name: 'X', aliases: [], role: 'antagonist', confidence: 0.9, roleConfidence: 0.7 },
      ]);
      expect(mergeCharacters([...mergeCharacters([a, b]), c])).toEqual(flat);
      expect(mergeCharacters([a, ...mergeCharacters([b, c])])).toEqual(flat);
      expect(mergeCharacters([...mergeCharacters([a, c]), b])).toEqual(flat);
    });

    it('should pick name and first mention independently of grouping', () => {
      const a: Character = { name: 'gaal', aliases: [], role: 'minor', confidence: 0.6, firstMention: 'the dock' };
      const b: Character = { name: 'Gaal', aliases: [], role: 'minor', confidence: 0.6 };
      const c: Character = { name: 'GAAL', aliases: [], role: 'minor', confidence: 0.6, firstMention: 'a letter' };

      const flat = mergeCharacters([a, b, c]);

      expect(flat).toEqual([
        { name: 'GAAL', aliases: [], role: 'minor', confidence: 0.6, firstMention: 'a letter' },
      ]);
      expect(mergeCharacters([...mergeCharacters([a, b]), c])).toEqual(flat);
      expect(mergeCharacters([...mergeCharacters([b, c]), a])).toEqual(flat);
    });

    it('should break equal role confidence by role precedence', () => {
      const merged = mergeCharacters([
        { name: 'Cleon', aliases: [], role: 'minor', confidence: 0.7 },
        { name: 'Cleon', aliases: [], role: 'antagonist', confidence: 0.7 },
      ]);

      expect(merged).toEqual([{ name: 'Cleon', aliases: [], role: 'antagonist', confidence: 0.7 }]);
    });

    it('should sort by confidence, then name', () => {
      const merged = mergeCharacters([
        { name: 'Zeno', aliases: [], role: 'minor', confidence: 0.5 },
        { name: 'Cleon', aliases: [], role: 'supporting', confidence: 0.7 },
        { name: 'Anna', aliases: [], role: 'minor', confidence: 0.5 },
      ]);

      expect(merged.map((c) => c.name)).toEqual(['Cleon', 'Anna', 'Zeno']);
    });

    it('should keep distinct characters apart', () => {
      const merged = mergeCharacters([
        { name: 'Gaal Dornick', aliases: [], role: 'supporting', confidence: 0.8 },
        { name: 'Hari Seldon', aliases: [], role: 'protagonist', confidence: 0.9 },
      ]);

      expect(merged.map((c) => c.name)).toEqual(['Hari Seldon', 'Gaal Dornick']);
    });
  });

  describe('mergeRelationships', () => {
    const first: Relationship = {
      character1: 'Hari Seldon',
      character2: 'Gaal Dornick',
      type: 'mentor',
      strength: 8,
      description: 'Mentor',
      keyScenes: ['Trial'],
    };
    const second: Relationship = {
      character1: 'gaal dornick',
      character2: 'Hari Seldon',
      type: 'ally',
      strength: 7,
      description: 'Mentor and student',
      keyScenes: ['Arrival', 'Trial'],
    };

    it('should collapse both orientations of a pair', () => {
      expect(mergeRelationships([first, second])).toEqual([
        {
          character1: 'Gaal Dornick',
          character2: 'Hari Seldon',
          type: 'ally / mentor',
          strength: 7.5,
          strengthSamples: [7, 8],
          description: 'Mentor and student',
          keyScenes: ['Arrival', 'Trial'],
        },
      ]);
    });

    it('should be commutative and idempotent', () => {
      const merged = mergeRelationships([first, second]);

      expect(mergeRelationships([second, first])).toEqual(merged);
      expect(mergeRelationships(merged)).toEqual(merged);
      expect(mergeRelationships([...merged, ...merged])).toEqual(merged);
    });

    it('should average distinct strengths, rounded to two decimals', () => {
      const merged = mergeRelationships([
        { character1: 'A', character2: 'B', type: 'ally', strength: 1 },
        { character1: 'A', character2: 'B', type: 'ally', strength: 2 },
        { character1: 'B', character2: 'A', type: 'ally', strength: 2 },
        { character1: 'A', character2: 'B', type: 'ally', strength: 4 },
      ]);

      expect(merged).toEqual([
        { character1: 'A', character2: 'B', type: 'ally', strength: 2.33, strengthSamples: [1, 2, 4] },
      ]);
    });

    it('should give the same strength however partial results are grouped', () => {
      const pair = (strength: number): Relationship => ({
        character1: 'Hari Seldon',
        character2: 'Gaal Dornick',
        type: 'mentor',
        strength,
      });

      const flat = mergeRelationships([pair(2), pair(4), pair(9)]);

      expect(flat.map((r) => r.strength)).toEqual([5]);
      expect(mergeRelationships([...mergeRelationships([pair(2), pair(4)]), pair(9)])).toEqual(flat);
      expect(mergeRelationships([pair(2), ...mergeRelationships([pair(4), pair(9)])])).toEqual(flat);
    });

    it('should skip self-relationships', () => {
      expect(
        mergeRelationships([{ character1: 'Cleon', character2: 'cleon', type: 'ally', strength: 3 }])
      ).toEqual([]);
    });
  });

  describe('result merging', () => {
    const usage = { promptTokens: 10, completionTokens: 20, totalTokens: 30 };

    it('should combine metadata of different providers', () => {
      const merged = mergeMetadata([
        runMetadata({ runId: 'run-a', provider: 'openai', model: 'gpt-4o', chunkCount: 2, failedChunks: 0, usage }),
        runMetadata({ runId: 'run-b', provider: 'anthropic', model: 'claude-x', chunkCount: 1, failedChunks: 1 }),
        runMetadata({ runId: 'run-c', provider: 'openai', model: 'gpt-4o', chunkCount: 1, failedChunks: 0 }),
      ]);

      expect(merged).toMatchObject({
        provider: 'anthropic+openai',
        model: 'claude-x+gpt-4o',
        chunkCount: 4,
        failedChunks: 1,
        usage,
      });
      expect(merged.runs.map((r) => r.runId)).toEqual(['run-a', 'run-b', 'run-c']);
    });

    it('should count each run once', () => {
      const metadata = runMetadata({
        runId: 'run-a',
        provider: 'openai',
        model: 'gpt-4o',
        chunkCount: 3,
        failedChunks: 1,
        usage,
      });

      expect(mergeMetadata([metadata, metadata])).toEqual(metadata);
      expect(mergeMetadata([mergeMetadata([metadata]), metadata])).toEqual(metadata);
    });

    const cleonRun = (runId: string, provider: string): ExtractionResult => ({
      characters: [{ name: 'Cleon', aliases: [], role: 'supporting', confidence: 0.7 }],
      failures: [{ runId, chunkIndex: 1, code: 'MALFORMED_RESPONSE', message: 'no JSON' }],
      metadata: runMetadata({ runId, provider, model: 'm', chunkCount: 2, failedChunks: 1 }),
    });

    it('should keep failures of the same chunk in different runs', () => {
      const merged = mergeExtractionResults([cleonRun('run-b', 'openai'), cleonRun('run-a', 'anthropic')]);

      expect(merged.failures).toEqual([
        { runId: 'run-a', chunkIndex: 1, code: 'MALFORMED_RESPONSE', message: 'no JSON' },
        { runId: 'run-b', chunkIndex: 1, code: 'MALFORMED_RESPONSE', message: 'no JSON' },
      ]);
      expect(merged.metadata).toMatchObject({
        provider: 'anthropic+openai',
        chunkCount: 4,
        failedChunks: 2,
      });
      expect(merged.metadata.failedChunks).toBe(merged.failures.length);
    });

    it('should leave a result unchanged when merged with itself', () => {
      const result = mergeExtractionResults([cleonRun('run-a', 'openai')]);

      expect(mergeExtractionResults([result, result])).toEqual(result);
      expect(result.metadata).toMatchObject({ chunkCount: 2, failedChunks: 1 });
    });

    it('should merge characters and order failures by run and chunk', () => {
      const results: ExtractionResult[] = [
        {
          characters: [{ name: 'Cleon', aliases: [], role: 'supporting', confidence: 0.7 }],
          failures: [{ runId: 'run-a', chunkIndex: 1, code: 'MALFORMED_RESPONSE', message: 'no JSON' }],
          metadata: runMetadata({ runId: 'run-a', provider: 'openai', model: 'gpt-4o', chunkCount: 2, failedChunks: 1 }),
        },
        {
          characters: [{ name: 'cleon', aliases: ['Emperor'], role: 'unknown', confidence: 0.4 }],
          failures: [{ runId: 'run-a', chunkIndex: 0, code: 'TRANSPORT_FAILED', message: 'timeout' }],
          metadata: runMetadata({ runId: 'run-b', provider: 'openai', model: 'gpt-4o', chunkCount: 1, failedChunks: 1 }),
        },
      ];

      const merged = mergeExtractionResults(results);

      expect(merged.characters).toEqual([
        { name: 'Cleon', aliases: ['Emperor'], role: 'supporting', confidence: 0.7 },
      ]);
      expect(merged.failures.map((f) => [f.runId, f.chunkIndex])).toEqual([
        ['run-a', 0],
        ['run-a', 1],
      ]);
    });
  });
});
