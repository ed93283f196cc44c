/**
 * Edge operations. Mutations need every endpoint to resolve to exactly one
 * existing node; lookups report unresolved labels instead of failing.
 */

import type { EdgeInput } from '../graph/types';
import type { GraphSession } from '../session/session';
import {
  collectResolved,
  type LookupMatch,
  type RequiredMatch,
  type ResolvedEntry,
  resolveLookup,
  resolveRequired
} from './resolve';
import type {
  AddEdgeResult,
  Direction,
  FindEdgesResult,
  Neighbor,
  NeighborsResult,
  RemoveEdgeResult,
  UnresolvedFilter
} from './types';

function toEntry(query: string, { label, match }: RequiredMatch): ResolvedEntry {
  return { query, label, match };
}

export async function addEdge(session: GraphSession, input: EdgeInput): Promise<AddEdgeResult> {
  const source = await resolveRequired(session, input.source, 'add an edge', 'Source node');
  const target = await resolveRequired(session, input.target, 'add an edge', 'Target node');

  const { edge, created } = session.graph.addEdge(
    source.label,
    target.label,
    input.relation,
    input.properties
  );

  return {
    edge: { source: edge.source, target: edge.target, relation: edge.relation },
    created,
    resolved: collectResolved([toEntry(input.source, source), toEntry(input.target, target)])
  };
}

export interface RemoveEdgeInput {
  source: string;
  target: string;
  /** Only remove when the stored relation equals this */
  relation?: string;
}

export async function removeEdge(
  session: GraphSession,
  input: RemoveEdgeInput
): Promise<RemoveEdgeResult> {
  const source = await resolveRequired(session, input.source, 'remove an edge', 'Source node');
  const target = await resolveRequired(session, input.target, 'remove an edge', 'Target node');
  const resolved = collectResolved([toEntry(input.source, source), toEntry(input.target, target)]);
  const base = { source: source.label, target: target.label, resolved };

  const existing = session.graph.getEdge(source.label, target.label);
  if (!existing) {
    return { ...base, removed: false, reason: `No edge from '${source.label}' to '${target.label}'.` };
  }
  if (input.relation !== undefined && existing.relation !== input.relation) {
    return {
      ...base,
      removed: false,
      reason: `Edge '${source.label}' -> '${target.label}' has relation '${existing.relation}', not '${input.relation}'.`
    };
  }

  session.graph.removeEdge(source.label, target.label);
  return { ...base, removed: true };
}

export interface FindEdgesInput {
  source?: string;
  target?: string;
  relation?: string;
}

/**
 * Edges matching every given filter. A label filter that names no single node
 * matches nothing; its candidates are reported under `unresolved`.
 */
export async function findEdges(
  session: GraphSession,
  input: FindEdgesInput = {}
): Promise<FindEdgesResult> {
  const filters: Array<{ query: string; lookup: LookupMatch }> = [];
  const lookup = async (query: string | undefined): Promise<string | null | undefined> => {
    if (query === undefined) return undefined;
    const found = await resolveLookup(session, query);
    filters.push({ query, lookup: found });
    return found.label;
  };

  const source = await lookup(input.source);
  const target = await lookup(input.target);

  const unresolved: UnresolvedFilter[] = filters
    .filter(({ lookup: found }) => found.label === null)
    .map(({ query, lookup: found }) => ({ query, candidates: found.match.candidates }));

  const resolved = collectResolved(
    filters.flatMap(({ query, lookup: found }) =>
      found.label === null ? [] : [{ query, label: found.label, match: found.match }]
    )
  );

  const edges =
    unresolved.length > 0
      ? []
      : session.graph.edges().filter(
          (edge) =>
            (source === undefined || edge.source === source) &&
            (target === undefined || edge.target === target) &&
            (input.relation === undefined || edge.relation === input.relation)
        );

  return { edges, count: edges.length, resolved, unresolved };
}

export interface NeighborsInput {
  node: string;
  direction?: Direction;
  relation?: string;
}

/**
 * Adjacent nodes: predecessors first (direction 'in'), then successors.
 */
export async function getNeighbors(
  session: GraphSession,
  input: NeighborsInput
): Promise<NeighborsResult> {
  const { label, match } = await resolveLookup(session, input.node);
  if (label === null) {
    return { node: null, neighbors: [], resolved: [], candidates: match.candidates };
  }

  const { graph } = session;
  const direction = input.direction ?? 'both';
  const neighbors: Neighbor[] = [];

  if (direction !== 'out') {
    for (const edge of graph.inEdges(label)) {
      neighbors.push({ label: edge.source, relation: edge.relation, direction: 'in' });
    }
  }
  if (direction !== 'in') {
    for (const edge of graph.outEdges(label)) {
      neighbors.push({ label: edge.target, relation: edge.relation, direction: 'out' });
    }
  }

  return {
    node: label,
    neighbors:
      input.relation === undefined
        ? neighbors
        : neighbors.filter((neighbor) => neighbor.relation === input.relation),
    resolved: collectResolved([{ query: input.node, label, match }]),
    candidates: []
  };
}
