// Provider factory using the Vercel AI SDK
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { EmbeddingModel, LanguageModel } from 'ai';
import { InvalidConfigurationError } from './errors';
import type { EmbeddingSettings, GenerationSettings } from './ragConfig';
import type { ModelIdentity } from './types';

interface ConnectionSettings {
  apiKey?: string;
  baseURL?: string;
}

export function identityOf(settings: {
  provider: string;
  modelId: string;
}): ModelIdentity {
  return { provider: settings.provider, modelId: settings.modelId };
}

// Use OpenAI-compatible API for local servers (LM Studio, Ollama, etc.)
function createLocalProvider(field: string, settings: ConnectionSettings) {
  if (!settings.baseURL) {
    throw new InvalidConfigurationError(field, 'Base URL is required for local provider');
  }
  return createOpenAI({
    baseURL: settings.baseURL,
    apiKey: settings.apiKey || 'not-needed',
  });
}

function openAIConfig(settings: ConnectionSettings): Parameters<typeof createOpenAI>[0] {
  const config: Parameters<typeof createOpenAI>[0] = { apiKey: settings.apiKey };
  if (settings.baseURL) {
    config.baseURL = settings.baseURL;
  }
  return config;
}

export function createEmbeddingModel(
  settings: EmbeddingSettings
): EmbeddingModel<string> {
  switch (settings.provider) {
    case 'local':
      return createLocalProvider('embedding.baseURL', settings).embedding(
        settings.modelId
      );
    case 'openai':
      return createOpenAI(openAIConfig(settings)).embedding(settings.modelId);
    case 'google': {
      const google = createGoogleGenerativeAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseURL,
      });
      return google.textEmbeddingModel(settings.modelId);
    }
  }
}

export function createLanguageModel(settings: GenerationSettings): LanguageModel {
  switch (settings.provider) {
    case 'local':
      return createLocalProvider('generation.baseURL', settings).chat(
        settings.modelId
      );
    case 'openai': {
      const openai = createOpenAI(openAIConfig(settings));
      // Use .chat() for custom endpoints to ensure compatibility
      return settings.baseURL
        ? openai.chat(settings.modelId)
        : openai(settings.modelId);
    }
    case 'anthropic': {
      const anthropicConfig: Parameters<typeof createAnthropic>[0] = {
        apiKey: settings.apiKey,
      };
      if (settings.baseURL) {
        anthropicConfig.baseURL = settings.baseURL;
      }
      return createAnthropic(anthropicConfig)(settings.modelId);
    }
    case 'google': {
      const google = createGoogleGenerativeAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseURL,
      });
      return google(settings.modelId);
    }
  }
}
