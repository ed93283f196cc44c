import { describe, expect, test } from 'vitest';
import { degreeCentrality } from '@/core/algorithms/centrality';
import { isWeaklyConnected, weaklyConnectedComponents } from '@/core/algorithms/components';
import { redundantEdges } from '@/core/algorithms/reduction';
import { computeGraphStats } from '@/core/algorithms/stats';
import { InvalidInputError } from '@/core/errors';
import { LabelGraph } from '@/core/graph/label-graph';
import { graphFrom } from '@tests/helpers/fixtures';

describe('weaklyConnectedComponents', () => {
  test('ignores direction and keeps creation order', () => {
    const graph = graphFrom(
      [
        ['b', 'a'],
        ['x', 'y'],
        ['c', 'a']
      ],
      ['solo']
    );

    expect(weaklyConnectedComponents(graph)).toEqual([['b', 'a', 'c'], ['x', 'y'], ['solo']]);
    expect(isWeaklyConnected(graph)).toBe(false);
  });

  test('an empty graph counts as connected', () => {
    expect(weaklyConnectedComponents(new LabelGraph())).toEqual([]);
    expect(isWeaklyConnected(new LabelGraph())).toBe(true);
  });
});

describe('redundantEdges', () => {
  test('finds edges implied by a longer path', () => {
    const graph = graphFrom([
      ['a', 'b'],
      ['b', 'c'],
      ['a', 'c'],
      ['c', 'd'],
      ['a', 'd']
    ]);

    expect(redundantEdges(graph).map((edge) => `${edge.source}->${edge.target}`)).toEqual([
      'a->c',
      'a->d'
    ]);
  });

  test('a graph without shortcuts has none', () => {
    expect(redundantEdges(graphFrom([['a', 'b']]))).toEqual([]);
  });

  test('rejects cyclic graphs', () => {
    const graph = graphFrom([
      ['a', 'b'],
      ['b', 'a']
    ]);

    expect(() => redundantEdges(graph)).toThrow(InvalidInputError);
    expect(() => redundantEdges(graph)).toThrow(
      'Transitive reduction needs a graph without cycles. Use find_cycles to locate them.'
    );
  });
});

describe('degreeCentrality', () => {
  test('normalizes by n - 1 and ranks by total degree', () => {
    const graph = graphFrom([
      ['a', 'hub'],
      ['b', 'hub'],
      ['hub', 'c']
    ]);

    const rankings = degreeCentrality(graph);

    expect(rankings[0]?.label).toBe('hub');
    expect(rankings[0]?.inDegree).toBeCloseTo(2 / 3, 10);
    expect(rankings[0]?.outDegree).toBeCloseTo(1 / 3, 10);
    expect(rankings[0]?.total).toBeCloseTo(1, 10);
    expect(rankings.map((ranking) => ranking.label)).toEqual(['hub', 'a', 'b', 'c']);
  });

  test('a single node is not divided by zero', () => {
    expect(degreeCentrality(graphFrom([], ['a']))).toEqual([
      { label: 'a', inDegree: 0, outDegree: 0, total: 0 }
    ]);
  });
});

describe('computeGraphStats', () => {
  test('counts types and relations', () => {
    const graph = new LabelGraph();
    graph.addNode('api', 'service');
    graph.addNode('db', 'database');
    graph.addNode('worker', 'service');
    graph.addNode('notes');
    graph.addEdge('api', 'db', 'reads');
    graph.addEdge('worker', 'db', 'reads');
    graph.addEdge('api', 'worker', 'enqueues');

    expect(computeGraphStats(graph)).toEqual({
      nodeCount: 4,
      edgeCount: 3,
      isDirected: true,
      density: 0.25,
      isConnected: false,
      isDag: true,
      nodeTypes: { service: 2, database: 1, unknown: 1 },
      relationTypes: { reads: 2, enqueues: 1 }
    });
  });

  test('an empty graph has zero density', () => {
    expect(computeGraphStats(new LabelGraph())).toMatchObject({
      nodeCount: 0,
      density: 0,
      isConnected: true,
      isDag: true
    });
  });
});
