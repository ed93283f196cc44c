import { describe, expect, test } from 'vitest';
import { pagerank } from '@/core/algorithms/pagerank';
import { LabelGraph } from '@/core/graph/label-graph';
import { graphFrom } from '@tests/helpers/fixtures';

const sum = (ranks: Map<string, number>): number =>
  Array.from(ranks.values()).reduce((total, rank) => total + rank, 0);

describe('pagerank', () => {
  test('empty graph has no ranks', () => {
    expect(pagerank(new LabelGraph()).size).toBe(0);
  });

  test('ranks sum to one', () => {
    const graph = graphFrom([
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'a'],
      ['d', 'c']
    ]);

    expect(sum(pagerank(graph))).toBeCloseTo(1, 6);
  });

  test('a symmetric cycle ranks every node equally', () => {
    const graph = graphFrom([
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'a']
    ]);
    const ranks = pagerank(graph);

    for (const label of ['a', 'b', 'c']) {
      expect(ranks.get(label)).toBeCloseTo(1 / 3, 6);
    }
  });

  test('a node many others point to ranks highest', () => {
    const graph = graphFrom([
      ['a', 'hub'],
      ['b', 'hub'],
      ['c', 'hub']
    ]);
    const ranks = pagerank(graph);
    const hub = ranks.get('hub') ?? 0;

    for (const label of ['a', 'b', 'c']) {
      expect(hub).toBeGreaterThan(ranks.get(label) ?? 0);
    }
    expect(sum(ranks)).toBeCloseTo(1, 6);
  });

  test('isolated nodes share rank evenly', () => {
    const graph = graphFrom([], ['a', 'b']);
    const ranks = pagerank(graph);

    expect(ranks.get('a')).toBeCloseTo(0.5, 10);
    expect(ranks.get('b')).toBeCloseTo(0.5, 10);
  });
});
