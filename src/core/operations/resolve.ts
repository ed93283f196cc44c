/**
 * Turns MatchResults into canonical labels or errors.
 *
 * The matcher reports; this module applies the policy for operations that
 * need exactly one target node.
 */

import { AmbiguousMatchError, EmptyGraphError, NotFoundError } from '../errors';
import type { MatchResult } from '../graph/types';
import type { GraphSession } from '../session/session';
import type { ResolvedLabel } from './types';

/** Creation reuses a node only on an exact or normalized hit */
export const NORMALIZED_HIT = { tier: 'normalized', similarity: 1 } as const;

export interface RequiredMatch {
  label: string;
  match: MatchResult;
}

/** A resolved label together with what the caller typed */
export type ResolvedEntry = RequiredMatch & { query: string };

/**
 * Resolve a label that must name exactly one existing node.
 *
 * @param operation - Phrase for the empty-graph message ("find a path")
 * @param role - Subject of error messages ("Source node")
 * @throws EmptyGraphError when the graph has no nodes
 * @throws AmbiguousMatchError when several labels are too close to call
 * @throws NotFoundError when nothing matches
 */
export async function resolveRequired(
  session: GraphSession,
  query: string,
  operation: string,
  role = 'Node'
): Promise<RequiredMatch> {
  if (session.graph.nodeCount === 0) {
    throw new EmptyGraphError(operation);
  }

  const match = await session.resolve(query);
  if (match.matchedLabel !== null) {
    return { label: match.matchedLabel, match };
  }

  if (match.candidates.length > 0) {
    throw new AmbiguousMatchError(query, match.candidates, role);
  }
  throw new NotFoundError(query, session.graph.labels(), role);
}

/** A lookup filter that may fail to name a node */
export interface LookupMatch {
  label: string | null;
  match: MatchResult;
}

/**
 * Resolve a label for a read-only lookup. Absence and ambiguity come back as
 * a null label; the candidates stay on the match.
 */
export async function resolveLookup(session: GraphSession, query: string): Promise<LookupMatch> {
  const match = await session.resolve(query);
  return { label: match.matchedLabel, match };
}

/**
 * Collect the substitutions worth reporting: one entry per distinct
 * query/label pair whose label differs from what the caller typed.
 */
export function collectResolved(
  entries: Array<{ query: string; label: string; match: Pick<MatchResult, 'tier' | 'similarity'> }>
): ResolvedLabel[] {
  const seen = new Set<string>();
  const resolved: ResolvedLabel[] = [];

  for (const { query, label, match } of entries) {
    const key = `${query}\u0000${label}`;
    if (query === label || seen.has(key)) continue;
    seen.add(key);
    resolved.push({ query, label, tier: match.tier, similarity: match.similarity });
  }

  return resolved;
}
