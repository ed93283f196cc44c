/**
 * Degree centrality, normalized by n - 1.
 */

import type { LabelGraph } from '../graph/label-graph';

export interface DegreeCentrality {
  label: string;
  inDegree: number;
  outDegree: number;
  total: number;
}

/**
 * @returns One entry per node, highest total first; ties keep creation order
 */
export function degreeCentrality(graph: LabelGraph): DegreeCentrality[] {
  const n = graph.nodeCount;
  const scale = n > 1 ? 1 / (n - 1) : 1;

  return graph
    .labels()
    .map((label) => {
      const inDegree = graph.inDegree(label) * scale;
      const outDegree = graph.outDegree(label) * scale;
      return { label, inDegree, outDegree, total: inDegree + outDegree };
    })
    .sort((a, b) => b.total - a.total);
}
