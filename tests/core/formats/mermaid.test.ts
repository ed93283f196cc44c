import { describe, expect, test } from 'vitest';
import { DEFAULT_RELATION, exportMermaid, parseMermaid } from '@/core/formats/mermaid';
import { LabelGraph } from '@/core/graph/label-graph';

describe('parseMermaid', () => {
  test('reads labeled and unlabeled edges', () => {
    const diagram = parseMermaid(
      ['graph TD', '    A[Auth Service] -->|calls| B[User DB]', '    B --> C'].join('\n')
    );

    expect(diagram.facts).toEqual([
      { from: 'Auth Service', to: 'User DB', relation: 'calls' },
      { from: 'User DB', to: 'C', relation: DEFAULT_RELATION }
    ]);
    expect(diagram.nodes).toEqual([]);
  });

  test('uses labels declared on earlier lines', () => {
    const diagram = parseMermaid(['flowchart LR', '  api(Gateway)', '  db{Store}', '  api ==> db'].join('\n'));

    expect(diagram.facts).toEqual([{ from: 'Gateway', to: 'Store', relation: DEFAULT_RELATION }]);
  });

  test('supports the other arrow styles', () => {
    const diagram = parseMermaid(['a --- b', 'b -.-> c', 'c ~~> d'].join('\n'));

    expect(diagram.facts.map((fact) => `${fact.from}>${fact.to}`)).toEqual(['a>b', 'b>c', 'c>d']);
  });

  test('returns declared nodes that take part in no edge', () => {
    const diagram = parseMermaid(['graph TD', '  A[Lonely]', '  B --> C'].join('\n'));

    expect(diagram.nodes).toEqual(['Lonely']);
  });

  test('ignores comments and unrelated lines', () => {
    const diagram = parseMermaid(['%% comment', 'style A fill:#f9f', 'A --> B'].join('\n'));

    expect(diagram.facts).toHaveLength(1);
  });

  test('decodes numeric entities and keeps out-of-range ones as written', () => {
    const diagram = parseMermaid(['graph TD', '  A["x#35;1"] --> B["y#99999999;"]'].join('\n'));

    expect(diagram.facts).toEqual([{ from: 'x#1', to: 'y#99999999;', relation: DEFAULT_RELATION }]);
  });
});

describe('exportMermaid', () => {
  test('declares every node then every edge', () => {
    const graph = new LabelGraph();
    graph.addNode('Auth Service');
    graph.addNode('User DB');
    graph.addEdge('Auth Service', 'User DB', 'reads');

    expect(exportMermaid(graph)).toBe(
      ['graph TD', '    n0["Auth Service"]', '    n1["User DB"]', '    n0 -->|reads| n1'].join('\n')
    );
  });

  test('encodes characters that would break the diagram', () => {
    const graph = new LabelGraph();
    graph.addNode('say "hi" [v2]');

    expect(exportMermaid(graph)).toBe('graph TD\n    n0["say #quot;hi#quot; #91;v2#93;"]');
  });

  test('round-trips through parseMermaid', () => {
    const graph = new LabelGraph();
    graph.addNode('Parser (v2)');
    graph.addNode('Lexer | tokens');
    graph.addNode('Standalone');
    graph.addEdge('Parser (v2)', 'Lexer | tokens', 'uses {stream}');

    const diagram = parseMermaid(exportMermaid(graph));

    expect(diagram.facts).toEqual([{ from: 'Parser (v2)', to: 'Lexer | tokens', relation: 'uses {stream}' }]);
    expect(diagram.nodes).toEqual(['Standalone']);
  });
});
