/**
 * Application constants
 */

export const CACHE_DIRECTORY = 'data/cache';

/**
 * Relationships are analyzed among this many of the most confident characters
 */
export const RELATIONSHIP_CHARACTER_LIMIT = 12;

export const USAGE = `Usage: character-lens <text-file> [--relationships] [--traits <name>] [--max-words <n>] [--no-cache]

Provider selection comes from the environment (see .env.example):
  AI_PROVIDER   openai | anthropic | bedrock | gemini | openrouter | ollama | llamacpp
  AI_MODEL      model name (provider default when unset)`;
