/**
 * Tool dispatch table.
 */

import type { Tool } from '../types';
import {
  allPathsTool,
  askGraphTool,
  connectedComponentsTool,
  degreeCentralityTool,
  dumpContextTool,
  findCyclesTool,
  pagerankTool,
  shortestPathTool,
  subgraphTool,
  transitiveReductionTool
} from './analysis';
import {
  addEdgeTool,
  addFactsTool,
  addKnowledgeTool,
  createFromMermaidTool,
  findEdgesTool,
  forgetRelationshipTool,
  getNeighborsTool
} from './edges';
import {
  deleteGraphTool,
  exportGraphTool,
  getGraphInfoTool,
  importGraphTool,
  listGraphsTool
} from './graphs';
import { addNodesTool, forgetTool, getNodeTool, listNodesTool, searchNodesTool } from './nodes';

export const tools: readonly Tool[] = [
  // Creation
  addNodesTool,
  addEdgeTool,
  addFactsTool,
  addKnowledgeTool,
  createFromMermaidTool,
  // Lookup
  searchNodesTool,
  getNodeTool,
  listNodesTool,
  findEdgesTool,
  getNeighborsTool,
  // Removal
  forgetTool,
  forgetRelationshipTool,
  // Graphs
  listGraphsTool,
  deleteGraphTool,
  getGraphInfoTool,
  // Analysis
  shortestPathTool,
  allPathsTool,
  pagerankTool,
  connectedComponentsTool,
  findCyclesTool,
  transitiveReductionTool,
  degreeCentralityTool,
  subgraphTool,
  askGraphTool,
  dumpContextTool,
  // Transfer
  exportGraphTool,
  importGraphTool
];

export const toolTable: ReadonlyMap<string, Tool> = new Map(tools.map((tool) => [tool.name, tool]));
