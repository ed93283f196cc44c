import type { EmbeddingProvider } from '@/config/schema';

export type { EmbeddingProvider };

/**
 * Maps label text to a fixed-length vector for similarity matching.
 * The Vercel-backed client L2-normalizes its output; the matcher does not rely on it.
 */
export interface EmbeddingClient {
  /** Embed a single label. Rejects on empty or whitespace-only text. */
  embed(text: string): Promise<number[]>;

  /** Embed several labels in one request, preserving input order. */
  embedBatch(texts: string[]): Promise<number[][]>;

  readonly dimensions: number;

  readonly modelId: string;
}
