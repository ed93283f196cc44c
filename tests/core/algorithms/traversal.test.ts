import { describe, expect, test } from 'vitest';
import { allSimplePaths, descendants, shortestPath } from '@/core/algorithms/traversal';
import { graphFrom } from '@tests/helpers/fixtures';

describe('shortestPath', () => {
  test('prefers the path with fewest edges', () => {
    const graph = graphFrom([
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'd'],
      ['a', 'd']
    ]);

    expect(shortestPath(graph, 'a', 'd')).toEqual(['a', 'd']);
    expect(shortestPath(graph, 'b', 'd')).toEqual(['b', 'c', 'd']);
  });

  test('follows edge direction', () => {
    const graph = graphFrom([['a', 'b']]);

    expect(shortestPath(graph, 'b', 'a')).toBeNull();
  });

  test('a node reaches itself', () => {
    const graph = graphFrom([['a', 'b']]);

    expect(shortestPath(graph, 'a', 'a')).toEqual(['a']);
  });

  test('unknown endpoints have no path', () => {
    expect(shortestPath(graphFrom([['a', 'b']]), 'a', 'z')).toBeNull();
  });
});

describe('allSimplePaths', () => {
  const diamond = () =>
    graphFrom([
      ['a', 'b'],
      ['a', 'c'],
      ['b', 'd'],
      ['c', 'd'],
      ['b', 'c']
    ]);

  test('enumerates every simple path depth first', () => {
    const { paths, truncated } = allSimplePaths(diamond(), 'a', 'd', 10, 100);

    expect(paths).toEqual([
      ['a', 'b', 'd'],
      ['a', 'b', 'c', 'd'],
      ['a', 'c', 'd']
    ]);
    expect(truncated).toBe(false);
  });

  test('respects the maximum length in edges', () => {
    const { paths } = allSimplePaths(diamond(), 'a', 'd', 2, 100);

    expect(paths).toEqual([
      ['a', 'b', 'd'],
      ['a', 'c', 'd']
    ]);
  });

  test('stops at the path limit and flags truncation', () => {
    const { paths, truncated } = allSimplePaths(diamond(), 'a', 'd', 10, 2);

    expect(paths).toHaveLength(2);
    expect(truncated).toBe(true);
  });

  test('never revisits a node on cycles', () => {
    const graph = graphFrom([
      ['a', 'b'],
      ['b', 'a'],
      ['b', 'c']
    ]);

    expect(allSimplePaths(graph, 'a', 'c', 10, 100).paths).toEqual([['a', 'b', 'c']]);
  });
});

describe('descendants', () => {
  test('collects everything reachable, excluding the start unless on a cycle', () => {
    const graph = graphFrom(
      [
        ['a', 'b'],
        ['b', 'c'],
        ['d', 'a']
      ],
      ['e']
    );

    expect(descendants(graph, 'a')).toEqual(new Set(['b', 'c']));
    expect(descendants(graph, 'e')).toEqual(new Set());
  });
});
