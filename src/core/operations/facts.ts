/**
 * Fact ingestion: add_facts, the knowledge DSL and Mermaid diagrams.
 *
 * Endpoints follow the node-creation policy (exact or normalized duplicates
 * are reused, everything else is created), so ingestion never fails on an
 * unknown label.
 */

import { parseKnowledge } from '../formats/knowledge';
import { parseMermaid } from '../formats/mermaid';
import type { Fact } from '../formats/types';
import type { NodeInput } from '../graph/types';
import type { GraphSession } from '../session/session';
import { collectResolved, NORMALIZED_HIT } from './resolve';
import type { AddFactsResult } from './types';

/** Type given to nodes a fact creates without a type hint */
export const DEFAULT_FACT_TYPE = 'entity';

async function applyFacts(
  session: GraphSession,
  facts: Fact[],
  standalone: string[] = []
): Promise<AddFactsResult> {
  const inputs: NodeInput[] = facts.flatMap((fact) => [
    { label: fact.from, type: fact.fromType ?? null },
    { label: fact.to, type: fact.toType ?? null }
  ]);
  inputs.push(...standalone.map((label) => ({ label })));

  const creations = await session.createNodes(inputs);

  let nodesCreated = 0;
  for (const creation of creations) {
    if (!creation.created) continue;
    nodesCreated++;
    if (creation.node.type === null) {
      session.graph.addNode(creation.label, DEFAULT_FACT_TYPE);
    }
  }

  let edgesCreated = 0;
  let edgesExisted = 0;
  facts.forEach((fact, i) => {
    const from = creations[2 * i];
    const to = creations[2 * i + 1];
    if (!from || !to) return;

    const { created } = session.graph.addEdge(from.label, to.label, fact.relation);
    if (created) edgesCreated++;
    else edgesExisted++;
  });

  return {
    nodesCreated,
    nodesExisted: creations.length - nodesCreated,
    edgesCreated,
    edgesExisted,
    resolved: collectResolved(
      creations.map(({ input, label }) => ({ query: input, label, match: NORMALIZED_HIT }))
    )
  };
}

export async function addFacts(session: GraphSession, facts: Fact[]): Promise<AddFactsResult> {
  return applyFacts(session, facts);
}

/**
 * @throws InvalidInputError before touching the graph if any line is malformed
 */
export async function addKnowledge(session: GraphSession, knowledge: string): Promise<AddFactsResult> {
  return applyFacts(session, parseKnowledge(knowledge));
}

/**
 * Edges become facts; declared nodes without edges are created on their own.
 */
export async function createFromMermaid(session: GraphSession, mermaid: string): Promise<AddFactsResult> {
  const diagram = parseMermaid(mermaid);
  return applyFacts(session, diagram.facts, diagram.nodes);
}
