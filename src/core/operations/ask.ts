/**
 * ask_graph: a handful of English question patterns mapped onto the
 * analysis operations. Node names in a question go through the same
 * resolution as every other operation.
 */

import type { DegreeCentrality } from '../algorithms/centrality';
import type { GraphSession } from '../session/session';
import { allPaths, connectedComponents, degreeCentrality, findCycles, shortestPath } from './analysis';
import { getNeighbors } from './edges';
import { collectResolved, resolveRequired } from './resolve';
import type { AnalysisOptions, Direction, ResolvedLabel } from './types';

export interface AskAnswer {
  query: string;
  interpretation: string;
  /** Human-readable answer */
  result: string;
  dependents?: string[];
  dependencies?: string[];
  path?: string[] | null;
  length?: number | null;
  paths?: string[][];
  count?: number;
  cycles?: string[][];
  hasCycles?: boolean;
  rankings?: DegreeCentrality[];
  orphans?: string[];
  components?: string[][];
  resolved?: ResolvedLabel[];
}

export interface AskHelp {
  query: string;
  error: string;
  help: string;
}

export type AskResult = AskAnswer | AskHelp;

type Answer = Omit<AskAnswer, 'query'>;

interface AskPattern {
  patterns: RegExp[];
  answer(session: GraphSession, groups: string[], options: AnalysisOptions): Promise<Answer>;
}

export const ASK_HELP = [
  'Supported query patterns:',
  "  - 'what depends on X' - find nodes that depend on X",
  "  - 'what does X depend on' - find X's dependencies",
  "  - 'dependencies of X' - find X's dependencies",
  "  - 'dependents of X' - find what depends on X",
  "  - 'path from X to Y' - find shortest path",
  "  - 'all paths from X to Y' - find all paths",
  "  - 'cycles' - find circular dependencies",
  "  - 'most connected' - find highly connected nodes",
  "  - 'orphans' - find isolated nodes",
  "  - 'components' - find connected components"
].join('\n');

const numbered = (items: string[]): string =>
  items.map((item, i) => `  ${i + 1}. ${item}`).join('\n');

async function neighborLabels(session: GraphSession, node: string, direction: Direction) {
  const required = await resolveRequired(session, node, 'answer the question');
  const result = await getNeighbors(session, { node: required.label, direction });
  return {
    label: required.label,
    labels: result.neighbors.map((neighbor) => neighbor.label),
    resolved: collectResolved([{ query: node, ...required }])
  };
}

async function dependents(session: GraphSession, node: string, phrasing: 'what' | 'of'): Promise<Answer> {
  const { label, labels, resolved } = await neighborLabels(session, node, 'in');
  const none = phrasing === 'what' ? `No incoming dependencies found for '${label}'` : `No nodes depend on '${label}'`;
  return {
    interpretation: phrasing === 'what' ? `Find what depends on '${label}'` : `Find dependents of '${label}'`,
    result: labels.length > 0 ? `Nodes that depend on '${label}': ${labels.join(', ')}` : none,
    dependents: labels,
    resolved
  };
}

async function dependencies(session: GraphSession, node: string): Promise<Answer> {
  const { label, labels, resolved } = await neighborLabels(session, node, 'out');
  return {
    interpretation: `Find what '${label}' depends on`,
    result:
      labels.length > 0
        ? `'${label}' depends on: ${labels.join(', ')}`
        : `'${label}' has no outgoing dependencies`,
    dependencies: labels,
    resolved
  };
}

const ASK_PATTERNS: AskPattern[] = [
  {
    patterns: [/^what\s+depends\s+on\s+(.+)$/i],
    answer: (session, [node = '']) => dependents(session, node, 'what')
  },
  {
    patterns: [/^what\s+(?:does\s+)?(.+?)\s+depends?\s+on$/i, /^dependencies\s+(?:of\s+)?(.+)$/i],
    answer: (session, [node = '']) => dependencies(session, node)
  },
  {
    patterns: [/^dependents\s+(?:of\s+)?(.+)$/i],
    answer: (session, [node = '']) => dependents(session, node, 'of')
  },
  {
    patterns: [/^all\s+paths?\s+from\s+(.+?)\s+to\s+(.+)$/i],
    async answer(session, [source = '', target = ''], options) {
      const found = await allPaths(session, source, target, options);
      const interpretation = `Find all paths from '${found.source}' to '${found.target}'`;
      const result =
        found.count > 0
          ? `Found ${found.count} path(s):\n${numbered(found.paths.map((path) => path.join(' -> ')))}`
          : `No paths from '${found.source}' to '${found.target}' within ${found.maxLength} edges`;
      return { interpretation, result, paths: found.paths, count: found.count, resolved: found.resolved };
    }
  },
  {
    patterns: [
      /^(?:shortest\s+)?path\s+from\s+(.+?)\s+to\s+(.+)$/i,
      /^how\s+(?:to\s+)?(?:get\s+)?from\s+(.+?)\s+to\s+(.+)$/i
    ],
    async answer(session, [source = '', target = '']) {
      const found = await shortestPath(session, source, target);
      return {
        interpretation: `Find shortest path from '${found.source}' to '${found.target}'`,
        result: found.path
          ? `Path found (length ${found.length}): ${found.path.join(' -> ')}`
          : (found.reason ?? 'No path found'),
        path: found.path,
        length: found.length,
        resolved: found.resolved
      };
    }
  },
  {
    patterns: [/^(?:find\s+)?(?:what\s+are\s+(?:the\s+)?)?cycles?$/i],
    async answer(session) {
      const { cycles, hasCycles } = findCycles(session);
      const rendered = cycles.map((cycle) => [...cycle, cycle[0]].join(' -> '));
      return {
        interpretation: 'Find cycles in the graph',
        result: hasCycles
          ? `Found ${cycles.length} cycle(s):\n${numbered(rendered)}`
          : 'No cycles found - graph is acyclic',
        cycles,
        hasCycles
      };
    }
  },
  {
    patterns: [/^(?:most\s+)?(?:connected|important|central)\s*(?:nodes?)?$/i],
    async answer(session) {
      const { rankings } = degreeCentrality(session, 10);
      const rendered = rankings.map(
        (r) =>
          `${r.label} (in: ${r.inDegree.toFixed(2)}, out: ${r.outDegree.toFixed(2)}, total: ${r.total.toFixed(2)})`
      );
      return {
        interpretation: 'Find most connected nodes',
        result:
          rankings.length > 0
            ? `Top ${rankings.length} most connected nodes:\n${numbered(rendered)}`
            : 'No nodes in graph',
        rankings
      };
    }
  },
  {
    patterns: [/^(?:orphans?|isolated|disconnected)(?:\s+nodes?)?$/i],
    async answer(session) {
      const { graph } = session;
      const orphans = graph
        .labels()
        .filter((label) => graph.inDegree(label) + graph.outDegree(label) === 0);
      return {
        interpretation: 'Find nodes with no connections',
        result:
          orphans.length > 0
            ? `Found ${orphans.length} isolated node(s): ${orphans.join(', ')}`
            : 'No isolated nodes found - all nodes have at least one connection',
        orphans
      };
    }
  },
  {
    patterns: [/^(?:connected\s+)?(?:components?|clusters?)$/i],
    async answer(session) {
      const { components, count } = connectedComponents(session);
      const rendered = components
        .map((members, i) => `  Component ${i + 1} (${members.length} nodes): ${members.join(', ')}`)
        .join('\n');
      return {
        interpretation: 'Find connected components',
        result: count > 0 ? `Found ${count} connected component(s):\n${rendered}` : 'No nodes in graph',
        components,
        count
      };
    }
  }
];

/**
 * Answer a question, or return the supported patterns when none matches.
 * Resolution errors for named nodes propagate.
 */
export async function askGraph(
  session: GraphSession,
  query: string,
  options: AnalysisOptions
): Promise<AskResult> {
  const question = query.trim().replace(/\?+$/, '').trim();

  for (const { patterns, answer } of ASK_PATTERNS) {
    for (const pattern of patterns) {
      const match = pattern.exec(question);
      if (!match) continue;

      const groups = match.slice(1).map((group) => group.trim());
      return { query, ...(await answer(session, groups, options)) };
    }
  }

  return { query, error: 'Query pattern not recognized', help: ASK_HELP };
}
