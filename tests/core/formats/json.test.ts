import { describe, expect, test } from 'vitest';
import { InvalidInputError } from '@/core/errors';
import { exportJson, parseJson } from '@/core/formats/json';
import { LabelGraph } from '@/core/graph/label-graph';

describe('exportJson', () => {
  test('writes nodes and edges with their data', () => {
    const graph = new LabelGraph();
    graph.addNode('api', 'service', { port: 8080 });
    graph.addNode('db');
    graph.addEdge('api', 'db', 'reads', { pooled: true });

    expect(JSON.parse(exportJson(graph))).toEqual({
      nodes: [
        { label: 'api', type: 'service', properties: { port: 8080 } },
        { label: 'db', type: null, properties: {} }
      ],
      edges: [{ source: 'api', target: 'db', relation: 'reads', properties: { pooled: true } }]
    });
  });
});

describe('parseJson', () => {
  test('fills in missing arrays', () => {
    expect(parseJson('{}')).toEqual({ nodes: [], edges: [] });
  });

  test('reads an exported document back', () => {
    const graph = new LabelGraph();
    graph.addNode('a');
    graph.addNode('b');
    graph.addEdge('a', 'b', 'calls');

    const document = parseJson(exportJson(graph));

    expect(document.nodes.map((node) => node.label)).toEqual(['a', 'b']);
    expect(document.edges).toEqual([{ source: 'a', target: 'b', relation: 'calls', properties: {} }]);
  });

  test('rejects malformed JSON', () => {
    expect(() => parseJson('{nodes:')).toThrow(InvalidInputError);
    expect(() => parseJson('{nodes:')).toThrow(/^Invalid JSON: /);
  });

  test('rejects documents that fail validation with the offending path', () => {
    expect(() => parseJson('{"edges":[{"source":"a","target":"b"}]}')).toThrow(
      /^Invalid graph document: edges\.0\.relation: /
    );
  });
});
