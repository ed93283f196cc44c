/**
 * Path algorithms over a LabelGraph.
 *
 * Edges are unweighted, so breadth-first search gives the shortest path.
 */

import type { LabelGraph } from '../graph/label-graph';

/**
 * Shortest directed path, inclusive of both endpoints.
 * A node reaches itself with the one-element path [source].
 *
 * @returns Labels along the path, or null when target is unreachable
 */
export function shortestPath(graph: LabelGraph, source: string, target: string): string[] | null {
  if (!graph.hasNode(source) || !graph.hasNode(target)) return null;
  if (source === target) return [source];

  const parent = new Map<string, string>();
  const visited = new Set<string>([source]);
  let frontier = [source];

  while (frontier.length > 0) {
    const next: string[] = [];
    for (const current of frontier) {
      for (const neighbor of graph.successors(current)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        parent.set(neighbor, current);

        if (neighbor === target) {
          return rebuildPath(parent, source, target);
        }
        next.push(neighbor);
      }
    }
    frontier = next;
  }

  return null;
}

function rebuildPath(parent: Map<string, string>, source: string, target: string): string[] {
  const path = [target];
  let current = target;
  while (current !== source) {
    const previous = parent.get(current);
    if (previous === undefined) break;
    path.push(previous);
    current = previous;
  }
  return path.reverse();
}

export interface SimplePathsResult {
  paths: string[][];
  /** True when enumeration stopped at the path limit */
  truncated: boolean;
}

/**
 * Every simple path (no repeated node) from source to target with at most
 * `maxLength` edges, in depth-first order.
 */
export function allSimplePaths(
  graph: LabelGraph,
  source: string,
  target: string,
  maxLength: number,
  limit: number
): SimplePathsResult {
  if (!graph.hasNode(source) || !graph.hasNode(target)) {
    return { paths: [], truncated: false };
  }
  if (source === target) {
    return { paths: [[source]], truncated: false };
  }

  const paths: string[][] = [];
  const path = [source];
  const onPath = new Set<string>([source]);
  let truncated = false;

  const visit = (current: string): void => {
    if (truncated || path.length - 1 >= maxLength) return;

    for (const neighbor of graph.successors(current)) {
      if (onPath.has(neighbor)) continue;

      if (neighbor === target) {
        if (paths.length >= limit) {
          truncated = true;
          return;
        }
        paths.push([...path, target]);
        continue;
      }

      path.push(neighbor);
      onPath.add(neighbor);
      visit(neighbor);
      path.pop();
      onPath.delete(neighbor);
      if (truncated) return;
    }
  };

  visit(source);
  return { paths, truncated };
}

/**
 * Labels reachable from `start` by at least one edge.
 */
export function descendants(graph: LabelGraph, start: string): Set<string> {
  const seen = new Set<string>();
  const stack = [...graph.successors(start)];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    stack.push(...graph.successors(current));
  }

  return seen;
}
