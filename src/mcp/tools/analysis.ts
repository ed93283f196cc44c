/**
 * Analysis tools. Path tools resolve their endpoints first; whole-graph tools
 * return empty results for an empty graph.
 */

import { z } from 'zod';
import {
  allPaths,
  askGraph,
  connectedComponents,
  degreeCentrality,
  dumpContext,
  findCycles,
  pagerank,
  shortestPath,
  subgraph,
  transitiveReduction
} from '@/core';
import { logRemoved, logResolved, plural } from '@/utils/logger';
import { defineTool } from '../types';
import { graphArg, inSession, labelArg, topNArg } from './shared';

export const shortestPathTool = defineTool({
  name: 'shortest_path',
  description: 'Shortest directed path between two nodes (fewest edges).',
  schema: z.object({
    graph: graphArg,
    source: labelArg.describe('Start node'),
    target: labelArg.describe('End node')
  }),
  handler: ({ graph, source, target }, ctx) =>
    inSession(ctx, graph, (session) => shortestPath(session, source, target))
});

export const allPathsTool = defineTool({
  name: 'all_paths',
  description: 'All simple directed paths between two nodes, up to a maximum number of edges.',
  schema: z.object({
    graph: graphArg,
    source: labelArg.describe('Start node'),
    target: labelArg.describe('End node'),
    maxLength: z.number().int().positive().optional().describe('Maximum edges per path')
  }),
  handler: ({ graph, source, target, maxLength }, ctx) =>
    inSession(ctx, graph, (session) => allPaths(session, source, target, { ...ctx.analysis, maxLength }))
});

export const pagerankTool = defineTool({
  name: 'pagerank',
  description: 'PageRank scores for node importance, highest first.',
  schema: z.object({ graph: graphArg, topN: topNArg }),
  handler: ({ graph, topN }, ctx) => inSession(ctx, graph, (session) => pagerank(session, topN))
});

export const connectedComponentsTool = defineTool({
  name: 'connected_components',
  description: 'Groups of nodes connected by edges in either direction.',
  schema: z.object({ graph: graphArg }),
  handler: ({ graph }, ctx) => inSession(ctx, graph, connectedComponents)
});

export const findCyclesTool = defineTool({
  name: 'find_cycles',
  description: 'Detect cycles (circular dependencies).',
  schema: z.object({ graph: graphArg }),
  handler: ({ graph }, ctx) => inSession(ctx, graph, findCycles)
});

export const transitiveReductionTool = defineTool({
  name: 'transitive_reduction',
  description:
    'Find edges implied by longer paths (A->C when A->B->C exists). Set apply to remove them. Requires a graph without cycles.',
  schema: z.object({
    graph: graphArg,
    apply: z.boolean().optional().describe('Remove the redundant edges (default false)')
  }),
  async handler({ graph, apply }, ctx) {
    const result = await inSession(ctx, graph, (session) => transitiveReduction(session, apply));
    if (result.applied && result.count > 0) {
      logRemoved(plural(result.count, 'redundant edge'));
    }
    return result;
  }
});

export const degreeCentralityTool = defineTool({
  name: 'degree_centrality',
  description: 'In/out degree centrality to find highly connected nodes.',
  schema: z.object({ graph: graphArg, topN: topNArg }),
  handler: ({ graph, topN }, ctx) => inSession(ctx, graph, (session) => degreeCentrality(session, topN))
});

export const subgraphTool = defineTool({
  name: 'subgraph',
  description: 'Extract the given nodes and the edges among them.',
  schema: z.object({
    graph: graphArg,
    nodes: z.array(labelArg).min(1).describe('Nodes to include'),
    includeEdges: z.boolean().optional().describe('Include edges between the nodes (default true)')
  }),
  async handler({ graph, nodes, includeEdges }, ctx) {
    const result = await inSession(ctx, graph, (session) => subgraph(session, nodes, includeEdges));
    logResolved(result.resolved);
    return result;
  }
});

export const askGraphTool = defineTool({
  name: 'ask_graph',
  description:
    "Answer common questions: 'what depends on X', 'what does X depend on', 'dependencies of X', 'dependents of X', 'path from X to Y', 'all paths from X to Y', 'cycles', 'most connected', 'orphans', 'components'.",
  schema: z.object({
    graph: graphArg,
    query: z.string().min(1).describe('Question matching a supported pattern')
  }),
  handler: ({ graph, query }, ctx) =>
    inSession(ctx, graph, (session) => askGraph(session, query, ctx.analysis))
});

export const dumpContextTool = defineTool({
  name: 'dump_context',
  description: 'Readable summary of the whole graph: nodes by type, relationships and insights (hubs, cycles, orphans).',
  schema: z.object({ graph: graphArg }),
  handler: ({ graph }, ctx) => inSession(ctx, graph, dumpContext)
});
