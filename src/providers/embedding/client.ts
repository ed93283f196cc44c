/**
 * Vercel AI SDK v6 Embedding Client
 *
 * Wraps the AI SDK embed/embedMany functions with L2 normalization.
 */

import type { EmbeddingModel } from 'ai';
import { embed, embedMany } from 'ai';
import type { EmbeddingClient } from './types';
import { normalizeL2 } from './utils';

function assertEmbeddable(text: string): void {
  if (!text.trim()) {
    throw new Error('Cannot embed empty or whitespace-only text');
  }
}

export class VercelEmbeddingClient implements EmbeddingClient {
  readonly modelId: string;
  readonly dimensions: number;

  constructor(
    private model: EmbeddingModel,
    dimensions: number
  ) {
    this.modelId = typeof model === 'string' ? model : model.modelId;
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    assertEmbeddable(text);

    const { embedding } = await embed({
      model: this.model,
      value: text
    });

    return normalizeL2(embedding);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    texts.forEach(assertEmbeddable);

    const { embeddings } = await embedMany({
      model: this.model,
      values: texts
    });

    return embeddings.map(normalizeL2);
  }
}
