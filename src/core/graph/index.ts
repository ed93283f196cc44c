/**
 * Label Graph Module
 *
 * Node/edge storage, label normalization and tiered label matching.
 */

export { LabelGraph } from './label-graph';
export { DEFAULT_MATCHING_CONFIG, Matcher, type MatcherOptions } from './matcher';
export { normalizeLabel } from './normalize';

export type {
  EdgeInput,
  GraphEdge,
  GraphNode,
  MatchCandidate,
  MatchingConfig,
  MatchResult,
  MatchTier,
  NodeInput,
  Properties,
  SimilarityCache
} from './types';
