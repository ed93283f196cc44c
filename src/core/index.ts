/**
 * Core Graph System
 *
 * Public API barrel file. Re-exports the label graph, sessions, operations,
 * text formats and errors. Graph algorithms stay internal; operations wrap them.
 *
 * @example
 * ```typescript
 * import { SessionStore, addEdge } from '@/core';
 *
 * const store = new SessionStore();
 * const session = store.getOrCreate('architecture');
 * await session.run(() => addEdge(session, { source: 'auth', target: 'db', relation: 'uses' }));
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Label Graph
// ═══════════════════════════════════════════════════════════════════════════════

export * from './graph';

// ═══════════════════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DEFAULT_GRAPH,
  GraphSession,
  type NodeCreation,
  type SessionInfo,
  type SessionOptions,
  SessionStore,
  type SessionSummary
} from './session';

// ═══════════════════════════════════════════════════════════════════════════════
// Operations
// ═══════════════════════════════════════════════════════════════════════════════

export * from './operations';

// ═══════════════════════════════════════════════════════════════════════════════
// Formats
// ═══════════════════════════════════════════════════════════════════════════════

export * from './formats';

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AmbiguousMatchError,
  EmptyGraphError,
  GraphOperationError,
  type GraphOperationErrorType,
  InvalidInputError,
  NotFoundError,
  SessionNotFoundError
} from './errors';
