/**
 * Node operations.
 *
 * Creation matches only exact and normalized duplicates. Lookups report
 * ambiguity and absence as results; removal treats both as errors.
 */

import type { LabelGraph } from '../graph/label-graph';
import type { GraphNode, NodeInput } from '../graph/types';
import type { GraphSession } from '../session/session';
import { collectResolved, NORMALIZED_HIT, resolveRequired } from './resolve';
import type {
  AddNodesResult,
  GetNodeResult,
  NodeDetails,
  RemoveNodeResult,
  SearchMatch,
  SearchResult
} from './types';

export async function addNodes(session: GraphSession, inputs: NodeInput[]): Promise<AddNodesResult> {
  const creations = await session.createNodes(inputs);
  const added = creations.filter((creation) => creation.created).length;

  return {
    added,
    existing: creations.length - added,
    nodes: creations.map(({ label, node, created }) => ({ label, type: node.type, created })),
    resolved: collectResolved(
      creations.map(({ input, label }) => ({
        query: input,
        label,
        match: NORMALIZED_HIT
      }))
    )
  };
}

function nodeType(graph: LabelGraph, label: string): string | null {
  return graph.getNode(label)?.type ?? null;
}

/**
 * Look a label up without failing.
 * One match when resolved, every candidate when ambiguous, none otherwise.
 */
export async function searchNodes(session: GraphSession, query: string): Promise<SearchResult> {
  const match = await session.resolve(query);
  const { graph } = session;

  if (match.matchedLabel !== null) {
    const hit: SearchMatch = {
      label: match.matchedLabel,
      type: nodeType(graph, match.matchedLabel),
      similarity: match.similarity,
      tier: match.tier
    };
    return { query, resolved: true, matches: [hit] };
  }

  return {
    query,
    resolved: false,
    matches: match.candidates.map(({ label, similarity }) => ({
      label,
      type: nodeType(graph, label),
      similarity,
      tier: match.tier
    }))
  };
}

function describeNode(graph: LabelGraph, node: GraphNode): NodeDetails {
  return {
    label: node.label,
    type: node.type,
    properties: node.properties,
    inDegree: graph.inDegree(node.label),
    outDegree: graph.outDegree(node.label)
  };
}

export async function getNode(session: GraphSession, query: string): Promise<GetNodeResult> {
  const match = await session.resolve(query);
  const node = match.matchedLabel === null ? null : session.graph.getNode(match.matchedLabel);

  return {
    query,
    node: node ? describeNode(session.graph, node) : null,
    tier: match.tier,
    similarity: match.similarity,
    candidates: match.candidates
  };
}

export interface ListNodesOptions {
  type?: string;
  limit?: number;
}

export function listNodes(
  session: GraphSession,
  options: ListNodesOptions = {}
): { nodes: GraphNode[]; count: number; total: number } {
  const { type, limit } = options;
  const all = session.graph.nodes();
  const filtered = type === undefined ? all : all.filter((node) => node.type === type);
  const nodes = limit === undefined ? filtered : filtered.slice(0, limit);

  return { nodes, count: nodes.length, total: all.length };
}

export async function removeNode(session: GraphSession, query: string): Promise<RemoveNodeResult> {
  const { label, match } = await resolveRequired(session, query, 'remove a node');
  const edgesRemoved = session.removeNode(label) ?? 0;

  return {
    label,
    edgesRemoved,
    resolved: collectResolved([{ query, label, match }])
  };
}
