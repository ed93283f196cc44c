/**
 * Test Fixtures
 *
 * Shared test data. Keep these minimal and focused on what each test category needs.
 */

import { LabelGraph } from '@/core/graph/label-graph';

// ═══════════════════════════════════════════════════════════════════════════════
// Vector Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Unit vector pointing in positive x direction */
export const UNIT_VECTOR_X = [1, 0, 0];

/** Unit vector pointing in positive y direction */
export const UNIT_VECTOR_Y = [0, 1, 0];

/** Zero vector */
export const ZERO_VECTOR = [0, 0, 0];

/** Non-normalized vector for L2 normalization tests */
export const UNNORMALIZED_VECTOR = [3, 4, 0]; // magnitude = 5

/** Already normalized vector (magnitude = 1) */
export const NORMALIZED_VECTOR = [0.6, 0.8, 0]; // 3/5, 4/5, 0

/** Query direction for similarity fixtures */
export const QUERY_VECTOR = [1, 0];

/**
 * 2D unit vector whose cosine similarity with QUERY_VECTOR is `similarity`.
 */
export function atSimilarity(similarity: number): number[] {
  return [similarity, Math.sqrt(1 - similarity * similarity)];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const VALID_OPENAI_EMBEDDING_CONFIG = {
  embedding: {
    provider: 'openai' as const,
    model: 'text-embedding-3-small',
    dimensions: 1536,
    apiKey: 'test-secret'
  }
};

export const VALID_COMPATIBLE_EMBEDDING_CONFIG = {
  embedding: {
    provider: 'openai-compatible' as const,
    providerName: 'local',
    model: 'nomic-embed-text',
    dimensions: 768,
    baseUrl: 'http://localhost:8080/v1'
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Graph Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build a LabelGraph from `[source, target]` pairs (relation "depends_on").
 * Extra labels become isolated nodes, created after the edge endpoints.
 */
export function graphFrom(edges: Array<[string, string]>, isolated: string[] = []): LabelGraph {
  const graph = new LabelGraph();
  for (const [source, target] of edges) {
    graph.addNode(source);
    graph.addNode(target);
    graph.addEdge(source, target, 'depends_on');
  }
  for (const label of isolated) {
    graph.addNode(label);
  }
  return graph;
}
