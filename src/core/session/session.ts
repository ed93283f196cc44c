/**
 * Graph Session
 *
 * One named graph: its node/edge set, its similarity cache and the matcher
 * reading that cache. The cache object is created here once and handed by
 * reference to the matcher; node creation writes it and node removal deletes
 * from it, so the matcher always sees the live entries.
 */

import { LabelGraph } from '../graph/label-graph';
import { Matcher, type MatcherOptions } from '../graph/matcher';
import type { GraphNode, MatchResult, NodeInput, SimilarityCache } from '../graph/types';
import type { EmbeddingClient } from '@/providers/embedding/types';

export interface SessionOptions {
  embeddingClient?: EmbeddingClient | null;
  matching?: MatcherOptions['config'];
  onEmbeddingError?: (error: Error, text: string) => void;
}

/**
 * Outcome of creating a node by label.
 * `label` is the canonical label actually stored (differs from the input
 * when a normalized duplicate already existed).
 */
export interface NodeCreation {
  input: string;
  label: string;
  created: boolean;
  node: GraphNode;
}

export class GraphSession {
  readonly graph = new LabelGraph();
  readonly cache: SimilarityCache = new Map();
  readonly matcher: Matcher;
  readonly createdAt = new Date();
  lastAccessed = new Date();

  private readonly embeddingClient: EmbeddingClient | null;
  private readonly onEmbeddingError: ((error: Error, text: string) => void) | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly name: string,
    options: SessionOptions = {}
  ) {
    this.embeddingClient = options.embeddingClient ?? null;
    this.onEmbeddingError = options.onEmbeddingError;
    this.matcher = new Matcher(this.cache, {
      embeddingClient: this.embeddingClient,
      config: options.matching,
      onEmbeddingError: options.onEmbeddingError
    });
  }

  touch(): void {
    this.lastAccessed = new Date();
  }

  /**
   * Run an operation after every previously queued one on this session.
   * Embedding calls are awaited mid-operation; queuing keeps two callers from
   * interleaving their resolve-then-mutate steps on the same graph.
   */
  run<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    // The queue only tracks completion; failures reach the caller through `result`
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolve a label against the current node set. */
  resolve(query: string): Promise<MatchResult> {
    return this.matcher.resolve(query, this.graph.labels());
  }

  /**
   * Create nodes by label.
   *
   * An exact or normalized duplicate returns the existing node; anything else
   * becomes a new node, however close it is to an existing label. New labels
   * are embedded in one batch and written to the cache.
   */
  async createNodes(inputs: NodeInput[]): Promise<NodeCreation[]> {
    const results: NodeCreation[] = [];
    const newLabels: string[] = [];

    for (const input of inputs) {
      const hit = this.matcher.resolveLiteral(input.label, this.graph.labels());
      const label = hit?.matchedLabel ?? input.label;
      const { node, created } = this.graph.addNode(label, input.type ?? null, input.properties);
      if (created) newLabels.push(label);
      results.push({ input: input.label, label, created, node });
    }

    await this.embedLabels(newLabels);
    return results;
  }

  /**
   * Remove a node, its edges and its cache entry.
   * @returns Number of edges removed, or null if the node did not exist
   */
  removeNode(label: string): number | null {
    const removed = this.graph.removeNode(label);
    if (removed === null) return null;

    this.cache.delete(label);
    return removed.length;
  }

  private async embedLabels(labels: string[]): Promise<void> {
    if (!this.embeddingClient || labels.length === 0) return;

    const embeddable = labels.filter((label) => label.trim());
    try {
      const vectors = await this.embeddingClient.embedBatch(embeddable);
      embeddable.forEach((label, i) => {
        const vector = vectors[i];
        // Skip labels removed while the batch was in flight
        if (vector && this.graph.hasNode(label)) this.cache.set(label, vector);
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.onEmbeddingError?.(error, embeddable.join(', '));
    }
  }
}
