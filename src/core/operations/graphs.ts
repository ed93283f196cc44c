/**
 * Store-level operations: they address graphs by name, not by label.
 */

import type { SessionInfo, SessionStore, SessionSummary } from '../session/store';

export function listGraphs(store: SessionStore): { graphs: SessionSummary[] } {
  return { graphs: store.list() };
}

export function deleteGraph(store: SessionStore, name: string): { graph: string; deleted: boolean } {
  return { graph: name, deleted: store.delete(name) };
}

/**
 * @throws SessionNotFoundError when no graph has that name
 */
export function getGraphInfo(store: SessionStore, name: string): SessionInfo {
  return store.info(name);
}
