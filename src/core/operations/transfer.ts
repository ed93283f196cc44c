/**
 * Graph import and export.
 *
 * Imports merge into the existing graph: node labels go through the creation
 * policy, so a document label that normalizes to an existing node lands on it.
 */

import { exportJson, type GraphDocument, parseJson } from '../formats/json';
import { exportMermaid } from '../formats/mermaid';
import type { NodeInput } from '../graph/types';
import type { GraphSession } from '../session/session';
import { createFromMermaid } from './facts';
import { collectResolved, NORMALIZED_HIT } from './resolve';
import type { AddFactsResult } from './types';

export const graphFormats = ['json', 'mermaid'] as const;
export type GraphFormat = (typeof graphFormats)[number];

export function exportGraph(
  session: GraphSession,
  format: GraphFormat
): { format: GraphFormat; content: string } {
  const content = format === 'json' ? exportJson(session.graph) : exportMermaid(session.graph);
  return { format, content };
}

async function importDocument(session: GraphSession, document: GraphDocument): Promise<AddFactsResult> {
  const inputs: NodeInput[] = document.nodes.map(({ label, type, properties }) => ({
    label,
    type: type ?? null,
    properties
  }));
  // Edge endpoints missing from the node list are created untyped
  for (const edge of document.edges) {
    inputs.push({ label: edge.source }, { label: edge.target });
  }

  const creations = await session.createNodes(inputs);
  const canonical = new Map(creations.map((creation) => [creation.input, creation.label]));

  let edgesCreated = 0;
  for (const edge of document.edges) {
    const { created } = session.graph.addEdge(
      canonical.get(edge.source) ?? edge.source,
      canonical.get(edge.target) ?? edge.target,
      edge.relation,
      edge.properties
    );
    if (created) edgesCreated++;
  }

  const listed = creations.slice(0, document.nodes.length);
  return {
    nodesCreated: creations.filter((creation) => creation.created).length,
    nodesExisted: listed.filter((creation) => !creation.created).length,
    edgesCreated,
    edgesExisted: document.edges.length - edgesCreated,
    resolved: collectResolved(
      creations.map(({ input, label }) => ({ query: input, label, match: NORMALIZED_HIT }))
    )
  };
}

/**
 * @throws InvalidInputError when the content does not parse
 */
export async function importGraph(
  session: GraphSession,
  format: GraphFormat,
  content: string
): Promise<AddFactsResult> {
  if (format === 'mermaid') {
    return createFromMermaid(session, content);
  }
  return importDocument(session, parseJson(content));
}
