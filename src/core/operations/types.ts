/**
 * Operation Types
 *
 * Shapes returned by the resolved-mutation layer. Every payload is plain data
 * ready for JSON serialization.
 */

import type { GraphEdge, MatchCandidate, MatchTier, Properties } from '../graph/types';

/**
 * A label the caller typed that resolved to a different canonical label.
 * Reported on every mutation so substitutions are never silent.
 */
export interface ResolvedLabel {
  query: string;
  label: string;
  tier: MatchTier;
  similarity: number;
}

export interface AnalysisOptions {
  /** Upper bound on edges per path for path enumeration */
  maxPathLength: number;
}

export type Direction = 'in' | 'out' | 'both';

// ============================================================
// NODES
// ============================================================

export interface AddNodesResult {
  added: number;
  existing: number;
  nodes: Array<{ label: string; type: string | null; created: boolean }>;
  resolved: ResolvedLabel[];
}

export interface SearchMatch {
  label: string;
  type: string | null;
  similarity: number;
  tier: MatchTier;
}

export interface SearchResult {
  query: string;
  /** True only when a single canonical label was identified */
  resolved: boolean;
  matches: SearchMatch[];
}

export interface NodeDetails {
  label: string;
  type: string | null;
  properties: Properties;
  inDegree: number;
  outDegree: number;
}

export interface GetNodeResult {
  query: string;
  node: NodeDetails | null;
  tier: MatchTier;
  similarity: number;
  /** Set when the query was ambiguous */
  candidates: MatchCandidate[];
}

export interface RemoveNodeResult {
  label: string;
  edgesRemoved: number;
  resolved: ResolvedLabel[];
}

// ============================================================
// EDGES
// ============================================================

export interface EdgeSummary {
  source: string;
  target: string;
  relation: string;
}

export interface AddEdgeResult {
  edge: EdgeSummary;
  created: boolean;
  resolved: ResolvedLabel[];
}

export interface AddFactsResult {
  nodesCreated: number;
  nodesExisted: number;
  edgesCreated: number;
  edgesExisted: number;
  resolved: ResolvedLabel[];
}

export interface RemoveEdgeResult {
  removed: boolean;
  source: string;
  target: string;
  /** Why nothing was removed */
  reason?: string;
  resolved: ResolvedLabel[];
}

/** A lookup filter that named no single node */
export interface UnresolvedFilter {
  query: string;
  /** Empty when nothing matched; several when the query was ambiguous */
  candidates: MatchCandidate[];
}

export interface FindEdgesResult {
  edges: GraphEdge[];
  count: number;
  resolved: ResolvedLabel[];
  unresolved: UnresolvedFilter[];
}

export interface Neighbor {
  label: string;
  relation: string;
  direction: 'in' | 'out';
}

export interface NeighborsResult {
  /** Null when the query named no single node */
  node: string | null;
  neighbors: Neighbor[];
  resolved: ResolvedLabel[];
  candidates: MatchCandidate[];
}
