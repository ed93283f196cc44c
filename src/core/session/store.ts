/**
 * Session Store
 *
 * Owns every named graph in the process. Sessions are created lazily on first
 * reference and live until deleted or until the process exits.
 */

import { computeGraphStats, type GraphStats } from '../algorithms/stats';
import { SessionNotFoundError } from '../errors';
import { GraphSession, type SessionOptions } from './session';

export const DEFAULT_GRAPH = 'default';

export interface SessionSummary {
  name: string;
  nodeCount: number;
  edgeCount: number;
  createdAt: string;
}

export interface SessionInfo extends GraphStats {
  name: string;
  createdAt: string;
  lastAccessed: string;
}

export class SessionStore {
  private readonly sessions = new Map<string, GraphSession>();

  /**
   * @param options - Applied to every session this store creates
   */
  constructor(private readonly options: SessionOptions = {}) {}

  /**
   * Get a session, creating an empty one on first reference. Never fails.
   */
  getOrCreate(name: string = DEFAULT_GRAPH): GraphSession {
    let session = this.sessions.get(name);
    if (!session) {
      session = new GraphSession(name, this.options);
      this.sessions.set(name, session);
    }
    session.touch();
    return session;
  }

  has(name: string): boolean {
    return this.sessions.has(name);
  }

  names(): string[] {
    return Array.from(this.sessions.keys());
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((session) => ({
      name: session.name,
      nodeCount: session.graph.nodeCount,
      edgeCount: session.graph.edgeCount,
      createdAt: session.createdAt.toISOString()
    }));
  }

  /**
   * @returns true if the session existed
   */
  delete(name: string = DEFAULT_GRAPH): boolean {
    return this.sessions.delete(name);
  }

  /**
   * Read-only introspection. Unlike getOrCreate this never creates a session.
   */
  info(name: string = DEFAULT_GRAPH): SessionInfo {
    const session = this.sessions.get(name);
    if (!session) {
      throw new SessionNotFoundError(name, this.names());
    }

    return {
      name,
      ...computeGraphStats(session.graph),
      createdAt: session.createdAt.toISOString(),
      lastAccessed: session.lastAccessed.toISOString()
    };
  }
}
