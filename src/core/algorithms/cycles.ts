/**
 * Cycle detection and DAG utilities.
 */

import type { LabelGraph } from '../graph/label-graph';

export interface CyclesResult {
  cycles: string[][];
  truncated: boolean;
}

/**
 * Elementary cycles. Each cycle is listed once, rotated to start at its
 * earliest-created node. A self-loop is the one-element cycle [label].
 */
export function simpleCycles(graph: LabelGraph, limit: number): CyclesResult {
  const labels = graph.labels();
  const order = new Map(labels.map((label, i) => [label, i]));
  const cycles: string[][] = [];
  let truncated = false;

  for (const start of labels) {
    const startIndex = order.get(start) ?? 0;
    const path = [start];
    const onPath = new Set<string>([start]);

    const visit = (current: string): void => {
      for (const neighbor of graph.successors(current)) {
        if (truncated) return;

        if (neighbor === start) {
          if (cycles.length >= limit) {
            truncated = true;
            return;
          }
          cycles.push([...path]);
          continue;
        }

        // Cycles through earlier nodes were found from those nodes
        if (onPath.has(neighbor) || (order.get(neighbor) ?? 0) < startIndex) continue;

        path.push(neighbor);
        onPath.add(neighbor);
        visit(neighbor);
        path.pop();
        onPath.delete(neighbor);
      }
    };

    visit(start);
    if (truncated) break;
  }

  return { cycles, truncated };
}

/**
 * Kahn's algorithm.
 * @returns Topological order, or null when the graph has a cycle
 */
export function topologicalSort(graph: LabelGraph): string[] | null {
  const remaining = new Map(graph.labels().map((label) => [label, graph.inDegree(label)]));
  const queue = graph.labels().filter((label) => remaining.get(label) === 0);
  const sorted: string[] = [];

  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    if (current === undefined) break;
    sorted.push(current);

    for (const neighbor of graph.successors(current)) {
      const degree = (remaining.get(neighbor) ?? 0) - 1;
      remaining.set(neighbor, degree);
      if (degree === 0) queue.push(neighbor);
    }
  }

  return sorted.length === graph.nodeCount ? sorted : null;
}

export function isDag(graph: LabelGraph): boolean {
  return topologicalSort(graph) !== null;
}

/**
 * Longest directed path in a DAG, measured in edges.
 * @returns The path's labels, or null when the graph has a cycle
 */
export function dagLongestPath(graph: LabelGraph): string[] | null {
  const sorted = topologicalSort(graph);
  if (sorted === null) return null;

  const length = new Map<string, number>();
  const parent = new Map<string, string>();

  for (const label of sorted) {
    const here = length.get(label) ?? 0;
    for (const neighbor of graph.successors(label)) {
      if (here + 1 > (length.get(neighbor) ?? 0)) {
        length.set(neighbor, here + 1);
        parent.set(neighbor, label);
      }
    }
  }

  let end: string | undefined;
  let best = -1;
  for (const label of sorted) {
    const value = length.get(label) ?? 0;
    if (value > best) {
      best = value;
      end = label;
    }
  }
  if (end === undefined) return [];

  const path = [end];
  let current = parent.get(end);
  while (current !== undefined) {
    path.push(current);
    current = parent.get(current);
  }
  return path.reverse();
}
