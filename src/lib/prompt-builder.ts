/**
 * Prompt construction for the three analysis tasks.
 *
 * Everything here is pure: the same (task, text, context) always yields the
 * same prompt, byte for byte.
 */

import type { AnalysisTask } from '../types/index.js';
import { ValidationError } from '../types/errors.js';

export const SYSTEM_PROMPT =
  'You are a literary analysis expert specializing in character analysis. ' +
  'You answer with JSON only.';

/**
 * Surface forms the part-of-speech pipeline commonly mistakes for names
 */
export const FALSE_POSITIVE_EXAMPLES = ['Well', 'Yes', 'Master', 'Trantor'] as const;

function buildCharacterPrompt(text: string): string {
  const examples = FALSE_POSITIVE_EXAMPLES.map((word) => `"${word}"`).join(', ');

  return `Analyze the following text and extract all character names.

Rules:
1. Only include actual characters (people or beings). Exclude locations, titles, organizations and interjections (for example ${examples}).
2. Merge aliases and variations of the same character (e.g. "Hari" and "Hari Seldon" -> "Hari Seldon").
3. Exclude generic titles unless they refer to a specific unnamed character.
4. Give a role: one of "protagonist", "antagonist", "supporting" or "minor".
5. Provide a confidence score between 0 and 1 for each character.

Return the results as a JSON array with this structure:
[
  {
    "name": "Character Name",
    "aliases": ["alias1", "alias2"],
    "role": "protagonist",
    "confidence": 0.95,
    "first_mention": "context of first appearance"
  }
]

Text to analyze:
${text}

Return only the JSON array, no additional commentary.`;
}

function buildRelationshipPrompt(text: string, characters: readonly string[]): string {
  return `Analyze the relationships between these characters in the text:
${characters.join(', ')}

Only report relationships between two different characters from that list. For each interacting pair, provide:
1. Nature of the relationship (ally, enemy, family, mentor, romantic, neutral or unknown)
2. Strength of the relationship (integer from 1 to 10)
3. A brief description and the key scenes

Return as JSON:
{
  "relationships": [
    {
      "character1": "Name1",
      "character2": "Name2",
      "type": "relationship type",
      "strength": 8,
      "description": "brief description",
      "key_scenes": ["scene1", "scene2"]
    }
  ]
}

Text to analyze:
${text}

Return only the JSON, no additional commentary.`;
}

function buildTraitsPrompt(text: string, characterName: string): string {
  const name = JSON.stringify(characterName);

  return `Analyze the character ${name} in the following text.

Provide:
1. Physical description (if mentioned)
2. Personality traits
3. Motivations and goals
4. Key actions and decisions
5. Character arc and development
6. Relationships with other characters

Return as JSON:
{
  "name": ${name},
  "physical_description": "...",
  "personality": ["trait1", "trait2"],
  "motivations": ["goal1", "goal2"],
  "key_actions": ["action1", "action2"],
  "character_arc": "description of development",
  "relationships": {"Other Character": "relationship type"}
}

Text:
${text}

Return only the JSON, no additional commentary.`;
}

/**
 * Build the instruction text for a task.
 *
 * `context` carries the candidate character names for
 * `analyze_relationships` and the character name for `extract_traits`.
 */
export function buildPrompt(
  task: AnalysisTask,
  text: string,
  context: readonly string[] = []
): string {
  switch (task) {
    case 'extract_characters':
      return buildCharacterPrompt(text);

    case 'analyze_relationships': {
      const names = context.map((name) => name.trim()).filter((name) => name.length > 0);
      if (names.length < 2) {
        throw new ValidationError('context', 'relationship analysis needs at least two character names');
      }
      return buildRelationshipPrompt(text, names);
    }

    case 'extract_traits': {
      const name = context[0]?.trim();
      if (!name) {
        throw new ValidationError('context', 'trait extraction needs a character name');
      }
      return buildTraitsPrompt(text, name);
    }

    default: {
      const exhaustive: never = task;
      throw new ValidationError('task', `Unknown task: ${String(exhaustive)}`);
    }
  }
}
