/**
 * Read-only analysis.
 *
 * Endpoint labels are resolved before any algorithm runs, so ambiguity and
 * missing nodes surface as errors rather than empty answers. Whole-graph
 * analyses need no labels and return empty results on an empty graph.
 */

import { degreeCentrality as rankDegrees, type DegreeCentrality } from '../algorithms/centrality';
import { isWeaklyConnected, weaklyConnectedComponents } from '../algorithms/components';
import { simpleCycles } from '../algorithms/cycles';
import { pagerank as computePagerank } from '../algorithms/pagerank';
import { redundantEdges } from '../algorithms/reduction';
import { allSimplePaths, shortestPath as findShortestPath } from '../algorithms/traversal';
import type { GraphEdge, GraphNode } from '../graph/types';
import type { GraphSession } from '../session/session';
import { collectResolved, type ResolvedEntry, resolveRequired } from './resolve';
import type { AnalysisOptions, EdgeSummary, ResolvedLabel } from './types';

/** Path enumeration stops after this many paths */
export const MAX_PATHS = 100;

/** Cycle enumeration stops after this many cycles */
export const MAX_CYCLES = 100;

async function resolveEndpoints(session: GraphSession, source: string, target: string, operation: string) {
  const from = await resolveRequired(session, source, operation, 'Source node');
  const to = await resolveRequired(session, target, operation, 'Target node');
  return {
    source: from.label,
    target: to.label,
    resolved: collectResolved([
      { query: source, ...from },
      { query: target, ...to }
    ])
  };
}

// ============================================================
// PATHS
// ============================================================

export interface ShortestPathResult {
  source: string;
  target: string;
  path: string[] | null;
  /** Edges along the path */
  length: number | null;
  reason?: string;
  resolved: ResolvedLabel[];
}

export async function shortestPath(
  session: GraphSession,
  source: string,
  target: string
): Promise<ShortestPathResult> {
  const endpoints = await resolveEndpoints(session, source, target, 'find a path');
  const path = findShortestPath(session.graph, endpoints.source, endpoints.target);

  if (path === null) {
    return {
      ...endpoints,
      path: null,
      length: null,
      reason: `No path from '${endpoints.source}' to '${endpoints.target}'. The nodes may be in different components; use connected_components to check.`
    };
  }

  return { ...endpoints, path, length: path.length - 1 };
}

export interface AllPathsResult {
  source: string;
  target: string;
  paths: string[][];
  count: number;
  maxLength: number;
  truncated: boolean;
  resolved: ResolvedLabel[];
}

export async function allPaths(
  session: GraphSession,
  source: string,
  target: string,
  options: AnalysisOptions & { maxLength?: number }
): Promise<AllPathsResult> {
  const endpoints = await resolveEndpoints(session, source, target, 'find paths');
  const maxLength = Math.min(options.maxLength ?? options.maxPathLength, options.maxPathLength);
  const { paths, truncated } = allSimplePaths(
    session.graph,
    endpoints.source,
    endpoints.target,
    maxLength,
    MAX_PATHS
  );

  return { ...endpoints, paths, count: paths.length, maxLength, truncated };
}

// ============================================================
// WHOLE-GRAPH ANALYSIS
// ============================================================

export interface RankedScore {
  label: string;
  score: number;
}

export function pagerank(session: GraphSession, topN?: number): { scores: RankedScore[]; count: number } {
  const ranks = computePagerank(session.graph);
  const scores = Array.from(ranks, ([label, score]) => ({ label, score })).sort(
    (a, b) => b.score - a.score
  );
  const limited = topN === undefined ? scores : scores.slice(0, topN);
  return { scores: limited, count: limited.length };
}

export function connectedComponents(session: GraphSession): {
  components: string[][];
  count: number;
  isConnected: boolean;
} {
  const components = weaklyConnectedComponents(session.graph);
  return {
    components,
    count: components.length,
    isConnected: isWeaklyConnected(session.graph)
  };
}

export function findCycles(session: GraphSession): {
  cycles: string[][];
  count: number;
  hasCycles: boolean;
  truncated: boolean;
} {
  const { cycles, truncated } = simpleCycles(session.graph, MAX_CYCLES);
  return { cycles, count: cycles.length, hasCycles: cycles.length > 0, truncated };
}

/**
 * Find edges implied by longer paths; remove them when `apply` is set.
 * @throws InvalidInputError if the graph has a cycle
 */
export function transitiveReduction(
  session: GraphSession,
  apply = false
): { redundantEdges: EdgeSummary[]; count: number; applied: boolean } {
  const redundant = redundantEdges(session.graph).map(({ source, target, relation }) => ({
    source,
    target,
    relation
  }));

  if (apply) {
    for (const edge of redundant) {
      session.graph.removeEdge(edge.source, edge.target);
    }
  }

  return { redundantEdges: redundant, count: redundant.length, applied: apply };
}

export function degreeCentrality(
  session: GraphSession,
  topN?: number
): { rankings: DegreeCentrality[] } {
  const rankings = rankDegrees(session.graph);
  return { rankings: topN === undefined ? rankings : rankings.slice(0, topN) };
}

// ============================================================
// SUBGRAPH
// ============================================================

export interface SubgraphResult {
  nodes: GraphNode[];
  edges: GraphEdge[];
  resolved: ResolvedLabel[];
}

/**
 * The named nodes and, unless `includeEdges` is false, the edges among them.
 */
export async function subgraph(
  session: GraphSession,
  labels: string[],
  includeEdges = true
): Promise<SubgraphResult> {
  const entries: ResolvedEntry[] = [];
  for (const query of labels) {
    const match = await resolveRequired(session, query, 'extract a subgraph');
    entries.push({ query, ...match });
  }

  const members = new Set(entries.map((entry) => entry.label));
  const nodes = session.graph.nodes().filter((node) => members.has(node.label));
  const edges = includeEdges
    ? session.graph.edges().filter((edge) => members.has(edge.source) && members.has(edge.target))
    : [];

  return { nodes, edges, resolved: collectResolved(entries) };
}
