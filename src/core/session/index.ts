/**
 * Session Module
 *
 * Named graph sessions and the store that owns them.
 */

export { GraphSession, type NodeCreation, type SessionOptions } from './session';
export {
  DEFAULT_GRAPH,
  type SessionInfo,
  SessionStore,
  type SessionSummary
} from './store';
