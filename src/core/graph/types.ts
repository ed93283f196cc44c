/**
 * Label Graph Types
 *
 * Nodes are keyed by their canonical label. Edges are keyed by the ordered
 * (source, target) pair, so there is at most one edge per direction.
 */

// ============================================================
// GRAPH ELEMENTS
// ============================================================

/** Open, caller-defined attributes on a node or edge */
export type Properties = Record<string, unknown>;

export interface GraphNode {
  label: string; // Canonical label, unique within one graph, immutable
  type: string | null; // Optional tag: "service", "person", ...
  properties: Properties;
}

export interface GraphEdge {
  source: string; // Canonical source label
  target: string; // Canonical target label
  relation: string; // "depends_on", "calls", ...
  properties: Properties;
}

export interface NodeInput {
  label: string;
  type?: string | null;
  properties?: Properties;
}

export interface EdgeInput {
  source: string;
  target: string;
  relation: string;
  properties?: Properties;
}

// ============================================================
// RESOLUTION
// ============================================================

/**
 * Per-session map from canonical label to its embedding vector.
 *
 * One instance per session, shared by reference between the session's node
 * mutations (writers) and its matcher (reader).
 */
export type SimilarityCache = Map<string, number[]>;

/**
 * Which resolution tier produced a result.
 * - exact: the query is literally an existing label
 * - normalized: equal after case/whitespace/punctuation normalization
 * - embedding: cosine similarity over cached label vectors
 * - none: nothing cleared any tier
 */
export type MatchTier = 'exact' | 'normalized' | 'embedding' | 'none';

export interface MatchCandidate {
  label: string;
  similarity: number;
}

export interface MatchResult {
  /** Canonical label, or null when unresolved (no match or ambiguous) */
  matchedLabel: string | null;
  exact: boolean;
  /** 1.0 for exact and normalized hits, cosine score for embedding hits */
  similarity: number;
  tier: MatchTier;
  /** Non-empty only when several labels fall inside the ambiguity window */
  candidates: MatchCandidate[];
}

export interface MatchingConfig {
  /** Minimum cosine similarity for an embedding candidate */
  readonly similarityThreshold: number;
  /** Candidates within this margin of the top score are too close to call */
  readonly ambiguityThreshold: number;
  /** Upper bound on the candidates reported for an ambiguous query */
  readonly maxCandidates: number;
}
