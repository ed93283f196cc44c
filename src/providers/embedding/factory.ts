/**
 * Embedding Client Factory
 *
 * Creates embedding clients using Vercel AI SDK v6 with direct provider packages.
 * Label vectors only feed the similarity tier of the matcher, so any provider
 * that returns a fixed-length vector works.
 */

import { createCohere } from '@ai-sdk/cohere';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { EmbeddingModelV3 } from '@ai-sdk/provider';
import { defaultEmbeddingSettingsMiddleware, wrapEmbeddingModel } from 'ai';
import type { EmbeddingConfig } from '@/config/schema';
import { VercelEmbeddingClient } from './client';
import type { EmbeddingClient } from './types';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  return new VercelEmbeddingClient(getEmbeddingModel(config), config.dimensions);
}

function getEmbeddingModel(config: EmbeddingConfig): EmbeddingModelV3 {
  const { model, dimensions, apiKey, baseUrl } = config;

  switch (config.provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey });
      return wrapWithDimensions(openai.embedding(model), 'openai', { dimensions });
    }

    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey });
      return wrapWithDimensions(google.embedding(model), 'google', {
        outputDimensionality: dimensions
      });
    }

    case 'cohere': {
      // No dimension reduction
      const cohere = createCohere({ apiKey });
      return cohere.embedding(model);
    }

    case 'mistral': {
      // No dimension reduction
      const mistral = createMistral({ apiKey });
      return mistral.embedding(model);
    }

    case 'ollama': {
      const ollama = createOpenAICompatible({
        name: 'ollama',
        baseURL: baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama' // Required by SDK but not used by Ollama
      });
      return ollama.embeddingModel(model);
    }

    case 'openai-compatible': {
      if (!baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      const compatible = createOpenAICompatible({
        name: config.providerName ?? 'openai-compatible',
        baseURL: baseUrl,
        apiKey: apiKey ?? ''
      });
      return compatible.embeddingModel(model);
    }
  }
}

/**
 * Wrap an embedding model with default provider options (e.g., dimensions).
 * The options are set once at model creation, not on every embed call.
 */
function wrapWithDimensions(
  model: EmbeddingModelV3,
  providerKey: string,
  providerOptions: Record<string, number>
): EmbeddingModelV3 {
  return wrapEmbeddingModel({
    model,
    middleware: defaultEmbeddingSettingsMiddleware({
      settings: {
        providerOptions: {
          [providerKey]: providerOptions
        }
      }
    })
  });
}
