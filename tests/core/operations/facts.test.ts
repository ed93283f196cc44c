import { describe, expect, test } from 'vitest';
import { InvalidInputError } from '@/core/errors';
import { addFacts, addKnowledge, createFromMermaid, DEFAULT_FACT_TYPE } from '@/core/operations/facts';
import { GraphSession } from '@/core/session/session';
import { createSession } from '@tests/helpers/mocks';

describe('addFacts', () => {
  test('creates endpoints, reuses normalized duplicates and adds edges', async () => {
    const session = new GraphSession('test');

    const result = await addFacts(session, [
      { from: 'AuthService', to: 'UserDB', relation: 'depends_on', fromType: 'service' },
      { from: 'auth service', to: 'Cache', relation: 'uses' }
    ]);

    expect(result).toEqual({
      nodesCreated: 3,
      nodesExisted: 1,
      edgesCreated: 2,
      edgesExisted: 0,
      resolved: [{ query: 'auth service', label: 'AuthService', tier: 'normalized', similarity: 1 }]
    });
    expect(session.graph.getNode('AuthService')?.type).toBe('service');
    expect(session.graph.getNode('UserDB')?.type).toBe(DEFAULT_FACT_TYPE);
    expect(session.graph.successors('AuthService')).toEqual(['UserDB', 'Cache']);
  });

  test('leaves the type of existing nodes alone', async () => {
    const session = await createSession(['Cache']);

    await addFacts(session, [{ from: 'Worker', to: 'Cache', relation: 'reads' }]);

    expect(session.graph.getNode('Cache')?.type).toBeNull();
    expect(session.graph.getNode('Worker')?.type).toBe('entity');
  });

  test('counts repeated edges as existing', async () => {
    const session = new GraphSession('test');
    await addFacts(session, [{ from: 'a', to: 'b', relation: 'calls' }]);

    const result = await addFacts(session, [{ from: 'a', to: 'b', relation: 'calls' }]);

    expect(result).toMatchObject({ nodesCreated: 0, nodesExisted: 2, edgesCreated: 0, edgesExisted: 1 });
  });
});

describe('addKnowledge', () => {
  test('applies every line of the DSL', async () => {
    const session = new GraphSession('test');

    const result = await addKnowledge(
      session,
      ['# storage', 'AuthService:service depends_on UserDB:database', 'UserDB replicates_to Replica'].join('\n')
    );

    expect(result.nodesCreated).toBe(3);
    expect(result.edgesCreated).toBe(2);
    expect(session.graph.nodes().map((node) => [node.label, node.type])).toEqual([
      ['AuthService', 'service'],
      ['UserDB', 'database'],
      ['Replica', 'entity']
    ]);
  });

  test('a malformed line leaves the graph untouched', async () => {
    const session = new GraphSession('test');

    await expect(addKnowledge(session, 'a calls b\nbroken line')).rejects.toThrow(InvalidInputError);
    expect(session.graph.nodeCount).toBe(0);
  });
});

describe('createFromMermaid', () => {
  test('adds edges and standalone declared nodes', async () => {
    const session = new GraphSession('test');

    const result = await createFromMermaid(
      session,
      ['graph TD', '  A[Auth] -->|calls| B[Users]', '  C[Lonely]'].join('\n')
    );

    expect(result).toMatchObject({ nodesCreated: 3, edgesCreated: 1 });
    expect(session.graph.getEdge('Auth', 'Users')?.relation).toBe('calls');
    expect(session.graph.getNode('Lonely')?.type).toBe('entity');
  });
});
