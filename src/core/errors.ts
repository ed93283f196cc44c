/**
 * Graph Operation Errors
 *
 * Raised by the operation layer when a label cannot be turned into a single
 * canonical node, or when an operation's precondition fails. The matcher never
 * throws; these errors are the operation layer's reading of a MatchResult.
 *
 * Every error carries a stable `type` so the transport layer can build a
 * structured failure payload without inspecting messages.
 */

import type { MatchCandidate } from './graph/types';

// ============================================================
// ERROR TYPES
// ============================================================

export type GraphOperationErrorType =
  | 'NOT_FOUND' // Zero matches for a label
  | 'AMBIGUOUS_MATCH' // Several labels too close to call
  | 'EMPTY_GRAPH' // Operation needs at least one node
  | 'SESSION_NOT_FOUND' // Introspection on a graph that was never created
  | 'INVALID_INPUT'; // Unparseable DSL, diagram or import payload

/** How many existing labels a NotFoundError suggests */
export const MAX_SUGGESTIONS = 5;

/**
 * Base class for all operation failures.
 */
export class GraphOperationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: GraphOperationErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'GraphOperationError';
    this.cause = cause;
  }

  /** Extra fields for the failure payload. */
  details(): Record<string, unknown> {
    return {};
  }
}

// ============================================================
// RESOLUTION FAILURES
// ============================================================

export class NotFoundError extends GraphOperationError {
  readonly suggestions: string[];

  constructor(
    public readonly query: string,
    existingLabels: readonly string[],
    role = 'Node'
  ) {
    const suggestions = existingLabels.slice(0, MAX_SUGGESTIONS);
    const hint = suggestions.length > 0 ? ` Available nodes include: ${suggestions.join(', ')}.` : '';
    super(
      `${role} not found: '${query}'.${hint} Use search_nodes to find the right label first.`,
      'NOT_FOUND'
    );
    this.name = 'NotFoundError';
    this.suggestions = suggestions;
  }

  override details(): Record<string, unknown> {
    return { query: this.query, suggestions: this.suggestions };
  }
}

export class AmbiguousMatchError extends GraphOperationError {
  constructor(
    public readonly query: string,
    public readonly candidates: MatchCandidate[],
    role = 'Node'
  ) {
    const listed = candidates.map((c) => `${c.label} (${c.similarity.toFixed(3)})`).join(', ');
    super(
      `${role} '${query}' is ambiguous. Candidates: ${listed}. Repeat the call with one of these exact labels.`,
      'AMBIGUOUS_MATCH'
    );
    this.name = 'AmbiguousMatchError';
  }

  override details(): Record<string, unknown> {
    return { query: this.query, candidates: this.candidates };
  }
}

export class EmptyGraphError extends GraphOperationError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the graph is empty. Add nodes first.`, 'EMPTY_GRAPH');
    this.name = 'EmptyGraphError';
  }
}

// ============================================================
// SESSION & INPUT FAILURES
// ============================================================

export class SessionNotFoundError extends GraphOperationError {
  constructor(
    public readonly graph: string,
    public readonly available: string[]
  ) {
    const hint =
      available.length > 0
        ? `Available graphs: ${available.join(', ')}. Use list_graphs to see all.`
        : 'No graphs have been created yet. Any operation on a graph creates it.';
    super(`Graph '${graph}' does not exist. ${hint}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }

  override details(): Record<string, unknown> {
    return { graph: this.graph, available: this.available };
  }
}

export class InvalidInputError extends GraphOperationError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_INPUT', cause);
    this.name = 'InvalidInputError';
  }
}
