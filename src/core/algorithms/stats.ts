/**
 * Summary statistics for a whole graph.
 */

import type { LabelGraph } from '../graph/label-graph';
import { isWeaklyConnected } from './components';
import { isDag } from './cycles';

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  isDirected: true;
  /** E / (N * (N - 1)); 0 below two nodes */
  density: number;
  isConnected: boolean;
  isDag: boolean;
  nodeTypes: Record<string, number>;
  relationTypes: Record<string, number>;
}

export const UNTYPED = 'unknown';

export function computeGraphStats(graph: LabelGraph): GraphStats {
  const n = graph.nodeCount;
  const nodeTypes: Record<string, number> = {};
  const relationTypes: Record<string, number> = {};

  for (const node of graph.nodes()) {
    const type = node.type ?? UNTYPED;
    nodeTypes[type] = (nodeTypes[type] ?? 0) + 1;
  }
  for (const edge of graph.edges()) {
    relationTypes[edge.relation] = (relationTypes[edge.relation] ?? 0) + 1;
  }

  return {
    nodeCount: n,
    edgeCount: graph.edgeCount,
    isDirected: true,
    density: n > 1 ? graph.edgeCount / (n * (n - 1)) : 0,
    isConnected: isWeaklyConnected(graph),
    isDag: isDag(graph),
    nodeTypes,
    relationTypes
  };
}
