/**
 * Label Matcher
 *
 * Resolves a caller-supplied string to a canonical label in three tiers:
 *
 * 1. Exact: the query is literally an existing label.
 * 2. Normalized: first label (creation order) whose normalized key equals the
 *    query's key.
 * 3. Embedding: cosine similarity between the query vector and each cached
 *    label vector. Scores below the similarity threshold are dropped; if more
 *    than one candidate lands within the ambiguity window of the top score the
 *    result is unresolved and carries the candidates instead of a guess.
 *
 * Tier 3 only runs with an embedding client. If embedding the query fails the
 * tier is skipped and the error is reported through `onEmbeddingError`; the
 * matcher itself never throws and never mutates the cache.
 */

import type { EmbeddingClient } from '@/providers/embedding/types';
import { cosineSimilarity } from '@/providers/embedding/utils';
import { normalizeLabel } from './normalize';
import type { MatchCandidate, MatchingConfig, MatchResult, SimilarityCache } from './types';

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = {
  similarityThreshold: 0.75,
  ambiguityThreshold: 0.05,
  maxCandidates: 5
};

/** Absorbs float noise in score differences such as 0.81 - 0.76 */
const SCORE_EPSILON = 1e-9;

export interface MatcherOptions {
  embeddingClient?: EmbeddingClient | null;
  config?: MatchingConfig;
  onEmbeddingError?: (error: Error, query: string) => void;
}

const NO_MATCH: MatchResult = {
  matchedLabel: null,
  exact: false,
  similarity: 0,
  tier: 'none',
  candidates: []
};

export class Matcher {
  private readonly embeddingClient: EmbeddingClient | null;
  private readonly onEmbeddingError: ((error: Error, query: string) => void) | undefined;
  readonly config: MatchingConfig;

  constructor(
    private readonly cache: SimilarityCache,
    options: MatcherOptions = {}
  ) {
    this.embeddingClient = options.embeddingClient ?? null;
    this.config = options.config ?? DEFAULT_MATCHING_CONFIG;
    this.onEmbeddingError = options.onEmbeddingError;
  }

  get embeddingEnabled(): boolean {
    return this.embeddingClient !== null;
  }

  /**
   * Tiers 1 and 2 only.
   * Used by node creation, which never fuzzy-matches.
   */
  resolveLiteral(query: string, labels: readonly string[]): MatchResult | null {
    if (labels.includes(query)) {
      return { matchedLabel: query, exact: true, similarity: 1, tier: 'exact', candidates: [] };
    }

    // Punctuation-only labels all share the empty key
    const key = normalizeLabel(query);
    const hit = labels.find((label) => normalizeLabel(label) === key);
    if (hit !== undefined) {
      return { matchedLabel: hit, exact: false, similarity: 1, tier: 'normalized', candidates: [] };
    }

    return null;
  }

  /**
   * Full tiered resolution.
   */
  async resolve(query: string, labels: readonly string[]): Promise<MatchResult> {
    const literal = this.resolveLiteral(query, labels);
    if (literal) return literal;

    const scored = await this.score(query, labels);
    const top = scored[0];
    if (!top) return { ...NO_MATCH };

    const window = scored
      .filter((candidate) => top.similarity - candidate.similarity <= this.config.ambiguityThreshold + SCORE_EPSILON)
      .slice(0, this.config.maxCandidates);

    if (window.length > 1) {
      return {
        matchedLabel: null,
        exact: false,
        similarity: top.similarity,
        tier: 'embedding',
        candidates: window
      };
    }

    return {
      matchedLabel: top.label,
      exact: false,
      similarity: top.similarity,
      tier: 'embedding',
      candidates: []
    };
  }

  /**
   * Embedding candidates at or above the similarity threshold, best first.
   * Ties keep label order.
   */
  async score(query: string, labels: readonly string[]): Promise<MatchCandidate[]> {
    const queryVector = await this.embedQuery(query);
    if (!queryVector) return [];

    const scored: MatchCandidate[] = [];
    for (const label of labels) {
      const vector = this.cache.get(label);
      if (!vector) continue;

      const similarity = cosineSimilarity(queryVector, vector);
      if (similarity >= this.config.similarityThreshold) {
        scored.push({ label, similarity });
      }
    }

    return scored.sort((a, b) => b.similarity - a.similarity);
  }

  private async embedQuery(query: string): Promise<number[] | null> {
    if (!this.embeddingClient || !query.trim()) return null;

    try {
      return await this.embeddingClient.embed(query);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.onEmbeddingError?.(error, query);
      return null;
    }
  }
}
