/**
 * PageRank by power iteration.
 *
 * Unweighted edges; dangling nodes (no outgoing edges) spread their rank
 * uniformly across the graph. Converges when the L1 change of the rank vector
 * falls below `nodeCount * tolerance`.
 */

import type { LabelGraph } from '../graph/label-graph';

export interface PageRankOptions {
  damping: number;
  maxIterations: number;
  tolerance: number;
}

export const DEFAULT_PAGERANK_OPTIONS: PageRankOptions = {
  damping: 0.85,
  maxIterations: 100,
  tolerance: 1e-6
};

export function pagerank(
  graph: LabelGraph,
  options: PageRankOptions = DEFAULT_PAGERANK_OPTIONS
): Map<string, number> {
  const labels = graph.labels();
  const n = labels.length;
  if (n === 0) return new Map();

  const { damping, maxIterations, tolerance } = options;
  let ranks = new Map(labels.map((label) => [label, 1 / n]));

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const previous = ranks;
    ranks = new Map(labels.map((label) => [label, 0]));

    let danglingSum = 0;
    for (const label of labels) {
      if (graph.outDegree(label) === 0) {
        danglingSum += previous.get(label) ?? 0;
      }
    }

    for (const label of labels) {
      const successors = graph.successors(label);
      if (successors.length === 0) continue;

      const share = (damping * (previous.get(label) ?? 0)) / successors.length;
      for (const neighbor of successors) {
        ranks.set(neighbor, (ranks.get(neighbor) ?? 0) + share);
      }
    }

    const base = (damping * danglingSum) / n + (1 - damping) / n;
    let delta = 0;
    for (const label of labels) {
      const rank = (ranks.get(label) ?? 0) + base;
      ranks.set(label, rank);
      delta += Math.abs(rank - (previous.get(label) ?? 0));
    }

    if (delta < n * tolerance) break;
  }

  return ranks;
}
