/**
 * Edge tools: connect nodes, ingest facts and remove relationships.
 */

import { z } from 'zod';
import {
  addEdge,
  addFacts,
  addKnowledge,
  createFromMermaid,
  findEdges,
  getNeighbors,
  removeEdge
} from '@/core';
import { logAdded, logRemoved, logResolved } from '@/utils/logger';
import { defineTool } from '../types';
import { graphArg, inSession, labelArg, propertiesArg } from './shared';

const relationArg = z.string().min(1);

export const addEdgeTool = defineTool({
  name: 'add_edge',
  description:
    'Connect two existing nodes. Labels are matched exactly, then ignoring case and punctuation, then by meaning; the response reports which labels were used. Fails with candidates when a label is ambiguous.',
  schema: z.object({
    graph: graphArg,
    source: labelArg.describe('Source node'),
    target: labelArg.describe('Target node'),
    relation: relationArg.describe('Relationship type, e.g. "depends_on"'),
    properties: propertiesArg
  }),
  async handler({ graph, ...input }, ctx) {
    const result = await inSession(ctx, graph, (session) => addEdge(session, input));
    logAdded(0, result.created ? 1 : 0);
    logResolved(result.resolved);
    return result;
  }
});

export const addFactsTool = defineTool({
  name: 'add_facts',
  description:
    "Add relationship facts. Nodes are created when they don't exist (type 'entity' unless given).",
  schema: z.object({
    graph: graphArg,
    facts: z
      .array(
        z.object({
          from: labelArg.describe('Source node'),
          to: labelArg.describe('Target node'),
          relation: relationArg.describe('Relationship type'),
          fromType: z.string().min(1).optional().describe('Source node type'),
          toType: z.string().min(1).optional().describe('Target node type')
        })
      )
      .min(1)
  }),
  async handler({ graph, facts }, ctx) {
    const result = await inSession(ctx, graph, (session) => addFacts(session, facts));
    logAdded(result.nodesCreated, result.edgesCreated);
    logResolved(result.resolved);
    return result;
  }
});

export const addKnowledgeTool = defineTool({
  name: 'add_knowledge',
  description:
    'Add knowledge as text, one \'Subject relation Object\' per line. Quote spaces: \'"Auth Service" "depends on" "User DB"\'. Type hints: \'Node:type rel Target:type\'. # starts a comment.',
  schema: z.object({
    graph: graphArg,
    knowledge: z.string().describe('DSL text')
  }),
  async handler({ graph, knowledge }, ctx) {
    const result = await inSession(ctx, graph, (session) => addKnowledge(session, knowledge));
    logAdded(result.nodesCreated, result.edgesCreated);
    logResolved(result.resolved);
    return result;
  }
});

export const createFromMermaidTool = defineTool({
  name: 'create_from_mermaid',
  description: 'Add the nodes and edges of a Mermaid flowchart. Edge labels become relation types.',
  schema: z.object({
    graph: graphArg,
    mermaid: z.string().describe('Mermaid diagram text')
  }),
  async handler({ graph, mermaid }, ctx) {
    const result = await inSession(ctx, graph, (session) => createFromMermaid(session, mermaid));
    logAdded(result.nodesCreated, result.edgesCreated);
    logResolved(result.resolved);
    return result;
  }
});

export const findEdgesTool = defineTool({
  name: 'find_edges',
  description:
    'Find edges by source, target and/or relation. Omitted filters match everything; a label that names no single node is listed under unresolved.',
  schema: z.object({
    graph: graphArg,
    source: labelArg.optional().describe('Source node'),
    target: labelArg.optional().describe('Target node'),
    relation: relationArg.optional().describe('Relationship type')
  }),
  handler: ({ graph, ...input }, ctx) => inSession(ctx, graph, (session) => findEdges(session, input))
});

export const getNeighborsTool = defineTool({
  name: 'get_neighbors',
  description:
    "Nodes connected to a node. direction 'in' follows edges pointing at it, 'out' edges leaving it. An unknown or ambiguous node returns no neighbors plus any candidates.",
  schema: z.object({
    graph: graphArg,
    node: labelArg.describe('Node label'),
    direction: z.enum(['in', 'out', 'both']).optional().describe("Default 'both'"),
    relation: relationArg.optional().describe('Only edges with this relation')
  }),
  handler: ({ graph, ...input }, ctx) => inSession(ctx, graph, (session) => getNeighbors(session, input))
});

export const forgetRelationshipTool = defineTool({
  name: 'forget_relationship',
  description: 'Remove the edge between two nodes, optionally only if it has the given relation.',
  schema: z.object({
    graph: graphArg,
    source: labelArg.describe('Source node'),
    target: labelArg.describe('Target node'),
    relation: relationArg.optional().describe('Relation the edge must have')
  }),
  async handler({ graph, ...input }, ctx) {
    const result = await inSession(ctx, graph, (session) => removeEdge(session, input));
    if (result.removed) logRemoved(`edge ${result.source} -> ${result.target}`);
    logResolved(result.resolved);
    return result;
  }
});
