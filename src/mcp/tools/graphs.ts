/**
 * Graph management and transfer tools.
 */

import { z } from 'zod';
import {
  DEFAULT_GRAPH,
  deleteGraph,
  exportGraph,
  getGraphInfo,
  graphFormats,
  importGraph,
  listGraphs
} from '@/core';
import { logAdded, logRemoved, logResolved } from '@/utils/logger';
import { defineTool } from '../types';
import { graphArg, inSession } from './shared';

export const listGraphsTool = defineTool({
  name: 'list_graphs',
  description: 'List all graphs with node and edge counts.',
  schema: z.object({}),
  handler: async (_args, ctx) => listGraphs(ctx.store)
});

export const deleteGraphTool = defineTool({
  name: 'delete_graph',
  description: 'Delete a graph and everything in it.',
  schema: z.object({ graph: graphArg }),
  async handler({ graph }, ctx) {
    const result = deleteGraph(ctx.store, graph ?? DEFAULT_GRAPH);
    if (result.deleted) logRemoved(`graph "${result.graph}"`);
    return result;
  }
});

export const getGraphInfoTool = defineTool({
  name: 'get_graph_info',
  description: 'Statistics for an existing graph: counts, density, types, DAG and connectivity.',
  schema: z.object({ graph: graphArg }),
  handler: async ({ graph }, ctx) => getGraphInfo(ctx.store, graph ?? DEFAULT_GRAPH)
});

export const exportGraphTool = defineTool({
  name: 'export_graph',
  description: 'Export the graph as JSON ({ nodes, edges }) or a Mermaid flowchart.',
  schema: z.object({
    graph: graphArg,
    format: z.enum(graphFormats).describe('Output format')
  }),
  handler: ({ graph, format }, ctx) => inSession(ctx, graph, (session) => exportGraph(session, format))
});

export const importGraphTool = defineTool({
  name: 'import_graph',
  description: 'Merge JSON ({ nodes, edges }) or a Mermaid flowchart into the graph.',
  schema: z.object({
    graph: graphArg,
    format: z.enum(graphFormats).describe('Input format'),
    content: z.string().min(1).describe('Document text')
  }),
  async handler({ graph, format, content }, ctx) {
    const result = await inSession(ctx, graph, (session) => importGraph(session, format, content));
    logAdded(result.nodesCreated, result.edgesCreated);
    logResolved(result.resolved);
    return result;
  }
});
