/**
 * Node tools: create, look up, list and remove nodes.
 */

import { z } from 'zod';
import { addNodes, getNode, listNodes, removeNode, searchNodes } from '@/core';
import { logAdded, logRemoved, logResolved, plural } from '@/utils/logger';
import { defineTool } from '../types';
import { graphArg, inSession, labelArg, propertiesArg } from './shared';

export const addNodesTool = defineTool({
  name: 'add_nodes',
  description:
    'Create nodes. A label equal to an existing one after ignoring case, spaces and punctuation reuses that node; anything else creates a new node.',
  schema: z.object({
    graph: graphArg,
    nodes: z
      .array(
        z.object({
          label: labelArg.describe('Node label'),
          type: z.string().min(1).optional().describe('Node type, e.g. "service"'),
          properties: propertiesArg
        })
      )
      .min(1)
  }),
  async handler({ graph, nodes }, ctx) {
    const result = await inSession(ctx, graph, (session) => addNodes(session, nodes));
    logAdded(result.added, 0);
    logResolved(result.resolved);
    return result;
  }
});

export const searchNodesTool = defineTool({
  name: 'search_nodes',
  description:
    'Find the node a label refers to. Returns one match when the label is unambiguous, every close candidate when it is ambiguous, and nothing when no node matches. Use this before add_edge when unsure of a label.',
  schema: z.object({
    graph: graphArg,
    query: labelArg.describe('Label or description to look up')
  }),
  handler: ({ graph, query }, ctx) => inSession(ctx, graph, (session) => searchNodes(session, query))
});

export const getNodeTool = defineTool({
  name: 'get_node',
  description: 'Get a node with its type, properties and degree. Ambiguous labels return candidates.',
  schema: z.object({
    graph: graphArg,
    label: labelArg.describe('Node label')
  }),
  handler: ({ graph, label }, ctx) => inSession(ctx, graph, (session) => getNode(session, label))
});

export const listNodesTool = defineTool({
  name: 'list_nodes',
  description: 'List nodes in creation order, optionally filtered by type.',
  schema: z.object({
    graph: graphArg,
    type: z.string().min(1).optional().describe('Only nodes of this type'),
    limit: z.number().int().positive().optional().describe('Maximum nodes to return')
  }),
  handler: ({ graph, type, limit }, ctx) =>
    inSession(ctx, graph, (session) => listNodes(session, { type, limit }))
});

export const forgetTool = defineTool({
  name: 'forget',
  description: 'Remove a node and every edge touching it. Fails if the label is ambiguous or unknown.',
  schema: z.object({
    graph: graphArg,
    label: labelArg.describe('Node to remove')
  }),
  async handler({ graph, label }, ctx) {
    const result = await inSession(ctx, graph, (session) => removeNode(session, label));
    logRemoved(`node "${result.label}" (${plural(result.edgesRemoved, 'edge')})`);
    logResolved(result.resolved);
    return result;
  }
});
