/**
 * dump_context: the whole graph as a readable briefing for an agent's context
 * window. Sections: statistics, nodes by type, relationships, key insights.
 */

import { dagLongestPath, simpleCycles } from '../algorithms/cycles';
import { UNTYPED } from '../algorithms/stats';
import type { GraphSession } from '../session/session';
import { MAX_CYCLES } from './analysis';

/** Cycles listed under Key Insights */
const SHOWN_CYCLES = 3;

const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function dumpContext(session: GraphSession): { context: string } {
  const { graph } = session;
  const lines: string[] = [`=== Graph Context: ${session.name} ===`, ''];

  const nodes = graph.nodes();
  const byType = new Map<string, string[]>();
  for (const node of nodes) {
    const type = node.type ?? UNTYPED;
    byType.set(type, [...(byType.get(type) ?? []), node.label]);
  }
  const namedTypes = Array.from(byType.keys())
    .filter((type) => type !== UNTYPED)
    .sort(byCodePoint);
  const { cycles } = simpleCycles(graph, MAX_CYCLES);

  // Statistics
  lines.push('## Statistics');
  lines.push(`- ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
  if (namedTypes.length > 0) {
    lines.push(`- ${namedTypes.length} node types: ${namedTypes.join(', ')}`);
  }
  lines.push(cycles.length > 0 ? `- Cycles detected: Yes (${cycles.length} cycles)` : '- Cycles detected: No');
  lines.push('');

  if (graph.nodeCount === 0) {
    lines.push('(Graph is empty)');
    return { context: lines.join('\n') };
  }

  // Nodes by type, untyped last
  lines.push('## Nodes by Type', '');
  const typeOrder = byType.has(UNTYPED) ? [...namedTypes, UNTYPED] : namedTypes;
  for (const type of typeOrder) {
    const labels = [...(byType.get(type) ?? [])].sort(byCodePoint);
    lines.push(`### ${type} (${labels.length} nodes)`);
    lines.push(...labels.map((label) => `- ${label}`));
    lines.push('');
  }

  // Relationships
  lines.push(`## Relationships (${graph.edgeCount} total)`, '');
  const edges = graph
    .edges()
    .sort((a, b) => byCodePoint(a.source, b.source) || byCodePoint(a.target, b.target));
  if (edges.length > 0) {
    lines.push(...edges.map((edge) => `- ${edge.source} ${edge.relation} ${edge.target}`));
  } else {
    lines.push('(No relationships)');
  }
  lines.push('');

  // Key insights
  lines.push('## Key Insights', '');
  const degrees = graph
    .labels()
    .map((label) => ({ label, total: graph.inDegree(label) + graph.outDegree(label) }))
    .filter((entry) => entry.total > 0)
    .sort((a, b) => b.total - a.total);

  const top = degrees[0];
  if (top) {
    lines.push(`- Most connected: ${top.label} (${top.total} connections)`);
    const hubs = degrees.slice(0, 3).filter((entry) => entry.total >= 2);
    if (hubs.length > 1) {
      lines.push(`- Hubs: ${hubs.map((hub) => hub.label).join(', ')}`);
    }
  }

  const isolated = graph
    .labels()
    .filter((label) => graph.inDegree(label) + graph.outDegree(label) === 0)
    .sort(byCodePoint);
  lines.push(`- Isolated nodes: ${isolated.length > 0 ? isolated.join(', ') : 'None'}`);

  if (graph.edgeCount > 0) {
    const chain = dagLongestPath(graph);
    if (chain && chain.length > 1) {
      lines.push(`- Longest chain: ${chain.join(' -> ')}`);
    }
  }

  if (cycles.length > 0) {
    lines.push('- Cycles:');
    for (const cycle of cycles.slice(0, SHOWN_CYCLES)) {
      lines.push(`  - ${[...cycle, cycle[0]].join(' -> ')}`);
    }
    if (cycles.length > SHOWN_CYCLES) {
      lines.push(`  - ... and ${cycles.length - SHOWN_CYCLES} more`);
    }
  }

  return { context: lines.join('\n') };
}
