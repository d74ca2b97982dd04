/**
 * Provider factory for creating language model instances
 */

import type { LanguageModelV1 } from 'ai';
import { createAmazonBedrock } from '@ai-sdk/amazon-bedrock';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import type { ProviderConfig } from './config.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * Local servers speak the OpenAI chat API under /v1 and ignore the key
 */
const LOCAL_SERVER_API_KEY = 'not-needed';

function openAICompatibleURL(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

/**
 * Create a language model instance based on provider configuration
 */
export function createLanguageModel(config: ProviderConfig): LanguageModelV1 {
  switch (config.provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
      return openai(config.model);
    }

    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey: config.apiKey });
      return anthropic(config.model);
    }

    case 'bedrock': {
      const bedrock = createAmazonBedrock({
        region: config.region,
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
        sessionToken: config.sessionToken,
      });
      return bedrock(config.model);
    }

    case 'gemini': {
      const google = createGoogleGenerativeAI({ apiKey: config.apiKey });
      return google(config.model);
    }

    case 'openrouter': {
      const openrouter = createOpenAI({
        apiKey: config.apiKey,
        baseURL: OPENROUTER_BASE_URL,
        compatibility: 'compatible',
      });
      return openrouter(config.model);
    }

    case 'ollama':
    case 'llamacpp': {
      const local = createOpenAI({
        apiKey: LOCAL_SERVER_API_KEY,
        baseURL: openAICompatibleURL(config.baseUrl),
        compatibility: 'compatible',
      });
      return local(config.model);
    }

    default: {
      const exhaustive: never = config;
      throw new Error(`Unknown provider type: ${JSON.stringify(exhaustive)}`);
    }
  }
}
