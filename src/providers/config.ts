/**
 * Provider configuration types and utilities
 *
 * Each backend has its own closed config shape. Options meant for one provider
 * are rejected when given to another, and credentials are resolved once from an
 * explicit environment record rather than read implicitly at call time.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';

/**
 * Supported provider tags
 */
export const PROVIDER_TAGS = [
  'openai',
  'anthropic',
  'bedrock',
  'gemini',
  'openrouter',
  'ollama',
  'llamacpp',
] as const;

export type ProviderTag = (typeof PROVIDER_TAGS)[number];

export function isProviderTag(value: string): value is ProviderTag {
  return PROVIDER_TAGS.some((tag) => tag === value);
}

export const DEFAULT_MODELS: Record<ProviderTag, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-latest',
  bedrock: 'anthropic.claude-3-5-sonnet-20240620-v1:0',
  gemini: 'gemini-1.5-pro',
  openrouter: 'openai/gpt-4o-mini',
  ollama: 'llama3.1',
  llamacpp: 'local-model',
};

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_LLAMACPP_BASE_URL = 'http://localhost:8080';
export const DEFAULT_BEDROCK_REGION = 'us-east-1';

/**
 * Environment variables each config field falls back to
 */
const ENV_FIELDS: Record<ProviderTag, Record<string, string>> = {
  openai: { apiKey: 'OPENAI_API_KEY', baseUrl: 'OPENAI_BASE_URL' },
  anthropic: { apiKey: 'ANTHROPIC_API_KEY' },
  bedrock: {
    region: 'AWS_REGION',
    accessKeyId: 'AWS_ACCESS_KEY_ID',
    secretAccessKey: 'AWS_SECRET_ACCESS_KEY',
    sessionToken: 'AWS_SESSION_TOKEN',
  },
  gemini: { apiKey: 'GEMINI_API_KEY' },
  openrouter: { apiKey: 'OPENROUTER_API_KEY' },
  ollama: { baseUrl: 'OLLAMA_BASE_URL' },
  llamacpp: { baseUrl: 'LLAMACPP_BASE_URL' },
};

const FIELD_DEFAULTS: Record<ProviderTag, Record<string, string>> = {
  openai: {},
  anthropic: {},
  bedrock: { region: DEFAULT_BEDROCK_REGION },
  gemini: {},
  openrouter: {},
  ollama: { baseUrl: DEFAULT_OLLAMA_BASE_URL },
  llamacpp: { baseUrl: DEFAULT_LLAMACPP_BASE_URL },
};

const required = z.string().trim().min(1);
const url = z.string().trim().url();

const ProviderConfigSchema = z.discriminatedUnion('provider', [
  z
    .object({ provider: z.literal('openai'), model: required, apiKey: required, baseUrl: url.optional() })
    .strict(),
  z.object({ provider: z.literal('anthropic'), model: required, apiKey: required }).strict(),
  z
    .object({
      provider: z.literal('bedrock'),
      model: required,
      region: required,
      accessKeyId: required,
      secretAccessKey: required,
      sessionToken: required.optional(),
    })
    .strict(),
  z.object({ provider: z.literal('gemini'), model: required, apiKey: required }).strict(),
  z.object({ provider: z.literal('openrouter'), model: required, apiKey: required }).strict(),
  z.object({ provider: z.literal('ollama'), model: required, baseUrl: url }).strict(),
  z.object({ provider: z.literal('llamacpp'), model: required, baseUrl: url }).strict(),
]);

/**
 * Union type for all provider configurations
 */
export type ProviderConfig = Readonly<z.infer<typeof ProviderConfigSchema>>;

export type ProviderConfigFor<T extends ProviderTag> = Extract<ProviderConfig, { provider: T }>;

/**
 * Loosely-typed provider options, as they arrive from a CLI or a notebook
 */
export interface ProviderOptions {
  provider: string;
  model?: string;
  [field: string]: unknown;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function definedEntries(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).filter(([, value]) => value !== undefined && value !== '')
  );
}

/**
 * Resolve a frozen provider configuration from explicit options, falling back
 * to the given environment for credentials and connection fields.
 *
 * @throws {ConfigurationError} for an unknown tag, options the provider does
 *   not accept, or a missing credential
 */
export function resolveProviderConfig(options: ProviderOptions, env: Environment = {}): ProviderConfig {
  const tag = options.provider.trim().toLowerCase();
  if (!isProviderTag(tag)) {
    throw new ConfigurationError(
      'provider',
      `Unsupported provider: ${options.provider} (expected one of ${PROVIDER_TAGS.join(', ')})`
    );
  }

  const envFields = ENV_FIELDS[tag];
  const fromEnv = definedEntries(
    Object.fromEntries(Object.entries(envFields).map(([field, name]) => [field, env[name]]))
  );

  const candidate: Record<string, unknown> = {
    ...FIELD_DEFAULTS[tag],
    ...fromEnv,
    ...definedEntries(options),
    provider: tag,
    model: options.model || DEFAULT_MODELS[tag],
  };

  const parsed = ProviderConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue?.code === 'unrecognized_keys') {
      throw new ConfigurationError(
        tag,
        `unsupported option(s) for ${tag}: ${issue.keys.join(', ')}`
      );
    }
    const field = String(issue?.path[0] ?? tag);
    const envName = envFields[field];
    const missing = candidate[field] === undefined;
    throw new ConfigurationError(
      field,
      missing && envName ? `${envName} is not set` : (issue?.message ?? 'invalid value')
    );
  }

  return Object.freeze(parsed.data);
}

/**
 * Load provider configuration from environment variables
 */
export function loadProviderConfigFromEnv(env: Environment = process.env): ProviderConfig {
  return resolveProviderConfig(
    {
      provider: env.AI_PROVIDER || 'openai',
      model: env.AI_MODEL || undefined,
    },
    env
  );
}

/**
 * Human-readable label without credentials
 */
export function describeProviderConfig(config: ProviderConfig): string {
  return `${config.provider}:${config.model}`;
}
