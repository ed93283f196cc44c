/**
 * Transitive reduction of a DAG: the edges implied by a longer path.
 */

import { InvalidInputError } from '../errors';
import type { LabelGraph } from '../graph/label-graph';
import type { GraphEdge } from '../graph/types';
import { isDag } from './cycles';
import { descendants } from './traversal';

/**
 * @returns Edges u -> v where v is also reachable through another successor of u
 * @throws InvalidInputError if the graph has a cycle
 */
export function redundantEdges(graph: LabelGraph): GraphEdge[] {
  if (!isDag(graph)) {
    throw new InvalidInputError(
      'Transitive reduction needs a graph without cycles. Use find_cycles to locate them.'
    );
  }

  const reach = new Map<string, Set<string>>();
  const reachable = (label: string): Set<string> => {
    let set = reach.get(label);
    if (!set) {
      set = descendants(graph, label);
      reach.set(label, set);
    }
    return set;
  };

  const redundant: GraphEdge[] = [];
  for (const edge of graph.edges()) {
    const others = graph.successors(edge.source).filter((s) => s !== edge.target);
    if (others.some((other) => reachable(other).has(edge.target))) {
      redundant.push(edge);
    }
  }
  return redundant;
}
