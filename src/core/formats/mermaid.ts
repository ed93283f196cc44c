/**
 * Mermaid flowcharts
 *
 * Parsing supports the common edge forms (`A --> B`, `A -->|label| B`,
 * `A --- B`, `A -.-> B`, `A ==> B`, `A ~~> B`) and node shapes `A[Label]`,
 * `A(Label)`, `A{Label}`. Edge labels become relations; unlabeled edges get
 * DEFAULT_RELATION. Lines that match neither an edge nor a node declaration
 * (styles, subgraphs, click handlers) are ignored.
 */

import type { LabelGraph } from '../graph/label-graph';
import type { Fact } from './types';

export const DEFAULT_RELATION = 'relates_to';

const SHAPE = String.raw`(?:\[([^\]]+)\]|\(([^)]+)\)|\{([^}]+)\})`;
const ARROW = String.raw`(?:-->|---|-\.->|==>|~~>)`;
const EDGE_PATTERN = new RegExp(
  String.raw`^(\w+)${SHAPE}?\s*${ARROW}\s*(?:\|([^|]+)\|)?\s*(\w+)${SHAPE}?`
);
const NODE_PATTERN = new RegExp(String.raw`^(\w+)${SHAPE}`);

export interface MermaidDiagram {
  facts: Fact[];
  /** Declared nodes that take part in no edge */
  nodes: string[];
}

// ============================================================
// PARSING
// ============================================================

const MAX_CODE_POINT = 0x10ffff;

/**
 * Undo exporter escaping: `#quot;`, `#35;` and surrounding double quotes.
 * Numeric entities outside the Unicode range are kept as written.
 */
function decodeText(raw: string): string {
  let text = raw.trim();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    text = text.slice(1, -1);
  }
  return text
    .replace(/#quot;/g, '"')
    .replace(/#(\d+);/g, (entity: string, code: string) => {
      const point = Number(code);
      return point <= MAX_CODE_POINT ? String.fromCodePoint(point) : entity;
    });
}

function shapeLabel(...groups: Array<string | undefined>): string | undefined {
  const raw = groups.find((group) => group !== undefined);
  return raw === undefined ? undefined : decodeText(raw);
}

export function parseMermaid(mermaid: string): MermaidDiagram {
  const facts: Fact[] = [];
  const labels = new Map<string, string>();
  const declared: string[] = [];
  const connected = new Set<string>();

  for (const raw of mermaid.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('%%')) continue;
    if (line.startsWith('graph ') || line.startsWith('flowchart ')) continue;

    const edge = EDGE_PATTERN.exec(line);
    if (edge) {
      const [, sourceId = '', s1, s2, s3, edgeLabel, targetId = '', t1, t2, t3] = edge;

      const sourceLabel = shapeLabel(s1, s2, s3);
      const targetLabel = shapeLabel(t1, t2, t3);
      if (sourceLabel) labels.set(sourceId, sourceLabel);
      if (targetLabel) labels.set(targetId, targetLabel);
      connected.add(sourceId);
      connected.add(targetId);

      const relation = edgeLabel ? decodeText(edgeLabel) : '';
      facts.push({
        from: labels.get(sourceId) ?? sourceId,
        to: labels.get(targetId) ?? targetId,
        relation: relation || DEFAULT_RELATION
      });
      continue;
    }

    const node = NODE_PATTERN.exec(line);
    if (node) {
      const [, id = '', n1, n2, n3] = node;
      const label = shapeLabel(n1, n2, n3);
      if (label) labels.set(id, label);
      if (!declared.includes(id)) declared.push(id);
    }
  }

  const nodes = declared
    .filter((id) => !connected.has(id))
    .map((id) => labels.get(id) ?? id);

  return { facts, nodes };
}

// ============================================================
// EXPORT
// ============================================================

const ESCAPED = /[#"[\](){}|]/g;

function encodeText(text: string): string {
  return text.replace(ESCAPED, (char) => (char === '"' ? '#quot;' : `#${char.codePointAt(0)};`));
}

/**
 * Render the graph as a top-down flowchart. Node ids are positional (n0, n1,
 * ...) and every node is declared with its quoted label, so labels with spaces
 * or punctuation survive a round trip through parseMermaid.
 */
export function exportMermaid(graph: LabelGraph): string {
  const ids = new Map(graph.labels().map((label, i) => [label, `n${i}`]));
  const lines = ['graph TD'];

  for (const [label, id] of ids) {
    lines.push(`    ${id}["${encodeText(label)}"]`);
  }
  for (const edge of graph.edges()) {
    lines.push(`    ${ids.get(edge.source)} -->|${encodeText(edge.relation)}| ${ids.get(edge.target)}`);
  }

  return lines.join('\n');
}
