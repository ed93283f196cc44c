import { describe, expect, test } from 'vitest';
import { EmptyGraphError, NotFoundError } from '@/core/errors';
import { addNodes, getNode, listNodes, removeNode, searchNodes } from '@/core/operations/nodes';
import { GraphSession } from '@/core/session/session';
import { atSimilarity, QUERY_VECTOR } from '@tests/helpers/fixtures';
import { createSession, createTableEmbeddingClient } from '@tests/helpers/mocks';

describe('addNodes', () => {
  test('creates new labels and reuses normalized duplicates', async () => {
    const session = new GraphSession('test');

    const result = await addNodes(session, [{ label: 'AuthService', type: 'service' }, { label: 'auth service' }]);

    expect(result).toEqual({
      added: 1,
      existing: 1,
      nodes: [
        { label: 'AuthService', type: 'service', created: true },
        { label: 'AuthService', type: 'service', created: false }
      ],
      resolved: [{ query: 'auth service', label: 'AuthService', tier: 'normalized', similarity: 1 }]
    });
  });

  test('an exact repeat is existing but not reported as resolved', async () => {
    const session = await createSession(['Cache']);

    const result = await addNodes(session, [{ label: 'Cache' }]);

    expect(result.existing).toBe(1);
    expect(result.resolved).toEqual([]);
  });

  test('labels differing only by punctuation are one node', async () => {
    const session = await createSession(['???']);

    const result = await addNodes(session, [{ label: '!!!' }]);

    expect(result.added).toBe(0);
    expect(result.nodes).toEqual([{ label: '???', type: null, created: false }]);
  });
});

describe('searchNodes', () => {
  const ambiguousSession = () =>
    createSession(['AuthService', 'AuthServer', 'Billing'], {
      embeddingClient: createTableEmbeddingClient({
        authentication: QUERY_VECTOR,
        AuthService: atSimilarity(0.82),
        AuthServer: atSimilarity(0.8)
      })
    });

  test('returns every close candidate for an ambiguous query', async () => {
    const session = await ambiguousSession();

    const result = await searchNodes(session, 'authentication');

    expect(result.resolved).toBe(false);
    expect(result.matches.map((match) => match.label)).toEqual(['AuthService', 'AuthServer']);
    expect(result.matches.every((match) => match.tier === 'embedding')).toBe(true);
    expect(result.matches[0]?.similarity).toBeCloseTo(0.82, 10);
  });

  test('returns the single match for a resolvable query', async () => {
    const session = await ambiguousSession();

    const result = await searchNodes(session, 'billing');

    expect(result).toEqual({
      query: 'billing',
      resolved: true,
      matches: [{ label: 'Billing', type: null, similarity: 1, tier: 'normalized' }]
    });
  });

  test('returns nothing for an unknown query', async () => {
    const session = await ambiguousSession();

    expect(await searchNodes(session, 'payroll')).toEqual({ query: 'payroll', resolved: false, matches: [] });
  });
});

describe('getNode', () => {
  test('describes a resolved node with its degree', async () => {
    const session = await createSession(['api', 'db']);
    session.graph.addEdge('api', 'db', 'reads');

    const result = await getNode(session, 'API');

    expect(result).toEqual({
      query: 'API',
      node: { label: 'api', type: null, properties: {}, inDegree: 0, outDegree: 1 },
      tier: 'normalized',
      similarity: 1,
      candidates: []
    });
  });

  test('returns null for an unknown label', async () => {
    const session = await createSession(['api']);

    const result = await getNode(session, 'worker');

    expect(result.node).toBeNull();
    expect(result.tier).toBe('none');
  });
});

describe('listNodes', () => {
  test('filters by type and limits', async () => {
    const session = new GraphSession('test');
    await session.createNodes([
      { label: 'api', type: 'service' },
      { label: 'db', type: 'database' },
      { label: 'worker', type: 'service' }
    ]);

    const result = listNodes(session, { type: 'service', limit: 1 });

    expect(result.nodes.map((node) => node.label)).toEqual(['api']);
    expect(result.count).toBe(1);
    expect(result.total).toBe(3);
  });
});

describe('removeNode', () => {
  test('removes the node and its edges', async () => {
    const session = await createSession(['api', 'db', 'cache']);
    session.graph.addEdge('api', 'db', 'reads');
    session.graph.addEdge('api', 'cache', 'reads');

    const result = await removeNode(session, 'API');

    expect(result).toEqual({
      label: 'api',
      edgesRemoved: 2,
      resolved: [{ query: 'API', label: 'api', tier: 'normalized', similarity: 1 }]
    });
    expect(session.graph.labels()).toEqual(['db', 'cache']);
  });

  test('fails on an empty graph', async () => {
    const session = new GraphSession('test');

    await expect(removeNode(session, 'api')).rejects.toThrow(EmptyGraphError);
    await expect(removeNode(session, 'api')).rejects.toThrow(
      'Cannot remove a node: the graph is empty. Add nodes first.'
    );
  });

  test('fails with suggestions for an unknown label', async () => {
    const session = await createSession(['api', 'db']);

    await expect(removeNode(session, 'worker')).rejects.toThrow(NotFoundError);
    await expect(removeNode(session, 'worker')).rejects.toThrow(
      "Node not found: 'worker'. Available nodes include: api, db. Use search_nodes to find the right label first."
    );
    expect(session.graph.nodeCount).toBe(2);
  });
});
