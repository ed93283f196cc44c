/**
 * Resolved-Mutation Layer
 *
 * One function per externally exposed operation. Each resolves the labels it
 * is given with the session's matcher and applies that operation's policy for
 * ambiguous and missing matches before touching the graph.
 */

export {
  allPaths,
  connectedComponents,
  degreeCentrality,
  findCycles,
  MAX_CYCLES,
  MAX_PATHS,
  pagerank,
  shortestPath,
  subgraph,
  transitiveReduction
} from './analysis';
export { ASK_HELP, type AskResult, askGraph } from './ask';
export { dumpContext } from './context';
export { addEdge, findEdges, getNeighbors, removeEdge } from './edges';
export { addFacts, addKnowledge, createFromMermaid, DEFAULT_FACT_TYPE } from './facts';
export { deleteGraph, getGraphInfo, listGraphs } from './graphs';
export { addNodes, getNode, listNodes, removeNode, searchNodes } from './nodes';
export { collectResolved, resolveRequired } from './resolve';
export { exportGraph, type GraphFormat, graphFormats, importGraph } from './transfer';
export type {
  AddEdgeResult,
  AddFactsResult,
  AddNodesResult,
  AnalysisOptions,
  Direction,
  EdgeSummary,
  FindEdgesResult,
  GetNodeResult,
  Neighbor,
  NeighborsResult,
  NodeDetails,
  RemoveEdgeResult,
  RemoveNodeResult,
  ResolvedLabel,
  SearchMatch,
  SearchResult,
  UnresolvedFilter
} from './types';
