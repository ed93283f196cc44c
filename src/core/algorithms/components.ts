/**
 * Weakly connected components (edge direction ignored).
 */

import type { LabelGraph } from '../graph/label-graph';

/**
 * @returns Components in order of their first node's creation; members
 * in creation order as well
 */
export function weaklyConnectedComponents(graph: LabelGraph): string[][] {
  const labels = graph.labels();
  const order = new Map(labels.map((label, i) => [label, i]));
  const seen = new Set<string>();
  const components: string[][] = [];

  for (const start of labels) {
    if (seen.has(start)) continue;

    const members: string[] = [];
    const stack = [start];
    seen.add(start);

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      members.push(current);

      for (const neighbor of [...graph.successors(current), ...graph.predecessors(current)]) {
        if (!seen.has(neighbor)) {
          seen.add(neighbor);
          stack.push(neighbor);
        }
      }
    }

    components.push(members.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0)));
  }

  return components;
}

export function isWeaklyConnected(graph: LabelGraph): boolean {
  return graph.nodeCount === 0 || weaklyConnectedComponents(graph).length === 1;
}
