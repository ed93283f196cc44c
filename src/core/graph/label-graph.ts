/**
 * Label Graph
 *
 * In-memory directed graph keyed by canonical label. Iteration follows
 * insertion order everywhere, which makes normalized matching and every
 * algorithm result deterministic.
 *
 * This class knows nothing about resolution: every method takes canonical
 * labels. Callers resolve first.
 */

import type { GraphEdge, GraphNode, Properties } from './types';

export class LabelGraph {
  private readonly nodeMap = new Map<string, GraphNode>();
  private readonly outgoing = new Map<string, Map<string, GraphEdge>>();
  private readonly incoming = new Map<string, Map<string, GraphEdge>>();
  private edgeTotal = 0;

  // ============================================================
  // NODES
  // ============================================================

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  hasNode(label: string): boolean {
    return this.nodeMap.has(label);
  }

  getNode(label: string): GraphNode | null {
    return this.nodeMap.get(label) ?? null;
  }

  /** Canonical labels in creation order. */
  labels(): string[] {
    return Array.from(this.nodeMap.keys());
  }

  nodes(): GraphNode[] {
    return Array.from(this.nodeMap.values());
  }

  /**
   * Insert a node, or merge into the existing one with the same label.
   * A provided type replaces the stored one; properties are shallow-merged.
   */
  addNode(
    label: string,
    type: string | null = null,
    properties: Properties = {}
  ): { node: GraphNode; created: boolean } {
    const existing = this.nodeMap.get(label);
    if (existing) {
      if (type !== null) existing.type = type;
      Object.assign(existing.properties, properties);
      return { node: existing, created: false };
    }

    const node: GraphNode = { label, type, properties: { ...properties } };
    this.nodeMap.set(label, node);
    this.outgoing.set(label, new Map());
    this.incoming.set(label, new Map());
    return { node, created: true };
  }

  /**
   * Remove a node and every edge touching it.
   * @returns The removed edges, or null if the node did not exist
   */
  removeNode(label: string): GraphEdge[] | null {
    if (!this.nodeMap.has(label)) return null;

    const removed = new Map<string, GraphEdge>();
    for (const edge of [...this.outEdges(label), ...this.inEdges(label)]) {
      removed.set(`${edge.source}\u0000${edge.target}`, edge);
    }
    for (const edge of removed.values()) {
      this.removeEdge(edge.source, edge.target);
    }

    this.nodeMap.delete(label);
    this.outgoing.delete(label);
    this.incoming.delete(label);
    return Array.from(removed.values());
  }

  // ============================================================
  // EDGES
  // ============================================================

  hasEdge(source: string, target: string): boolean {
    return this.outgoing.get(source)?.has(target) ?? false;
  }

  getEdge(source: string, target: string): GraphEdge | null {
    return this.outgoing.get(source)?.get(target) ?? null;
  }

  /**
   * Insert or overwrite the edge for an ordered pair.
   * Both endpoints must already exist.
   */
  addEdge(
    source: string,
    target: string,
    relation: string,
    properties: Properties = {}
  ): { edge: GraphEdge; created: boolean } {
    const out = this.outgoing.get(source);
    const into = this.incoming.get(target);
    if (!out || !into) {
      throw new Error(`Cannot connect unknown nodes: ${source} -> ${target}`);
    }

    const existing = out.get(target);
    if (existing) {
      existing.relation = relation;
      existing.properties = { ...properties };
      return { edge: existing, created: false };
    }

    const edge: GraphEdge = { source, target, relation, properties: { ...properties } };
    out.set(target, edge);
    into.set(source, edge);
    this.edgeTotal++;
    return { edge, created: true };
  }

  removeEdge(source: string, target: string): GraphEdge | null {
    const edge = this.outgoing.get(source)?.get(target);
    if (!edge) return null;

    this.outgoing.get(source)?.delete(target);
    this.incoming.get(target)?.delete(source);
    this.edgeTotal--;
    return edge;
  }

  /** All edges, grouped by source in node creation order. */
  edges(): GraphEdge[] {
    const result: GraphEdge[] = [];
    for (const out of this.outgoing.values()) {
      result.push(...out.values());
    }
    return result;
  }

  outEdges(label: string): GraphEdge[] {
    return Array.from(this.outgoing.get(label)?.values() ?? []);
  }

  inEdges(label: string): GraphEdge[] {
    return Array.from(this.incoming.get(label)?.values() ?? []);
  }

  successors(label: string): string[] {
    return Array.from(this.outgoing.get(label)?.keys() ?? []);
  }

  predecessors(label: string): string[] {
    return Array.from(this.incoming.get(label)?.keys() ?? []);
  }

  outDegree(label: string): number {
    return this.outgoing.get(label)?.size ?? 0;
  }

  inDegree(label: string): number {
    return this.incoming.get(label)?.size ?? 0;
  }
}
