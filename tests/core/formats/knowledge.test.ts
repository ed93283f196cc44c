import { describe, expect, test } from 'vitest';
import { InvalidInputError } from '@/core/errors';
import { parseKnowledge, removeComment } from '@/core/formats/knowledge';

describe('removeComment', () => {
  test('strips a trailing comment', () => {
    expect(removeComment('a calls b # legacy')).toBe('a calls b ');
  });

  test('keeps # inside quotes', () => {
    expect(removeComment('"C# Service" uses ".NET"')).toBe('"C# Service" uses ".NET"');
  });
});

describe('parseKnowledge', () => {
  test('parses one fact per line', () => {
    const facts = parseKnowledge('AuthService depends_on UserRepository\nUserRepository reads Postgres');

    expect(facts).toEqual([
      { from: 'AuthService', to: 'UserRepository', relation: 'depends_on' },
      { from: 'UserRepository', to: 'Postgres', relation: 'reads' }
    ]);
  });

  test('reads type hints after the last colon', () => {
    const [fact] = parseKnowledge('AuthService:service depends_on UserDB:database');

    expect(fact).toEqual({
      from: 'AuthService',
      to: 'UserDB',
      relation: 'depends_on',
      fromType: 'service',
      toType: 'database'
    });
  });

  test('a colon inside quotes belongs to the label', () => {
    const [fact] = parseKnowledge('"ns:Auth" calls "ns:Users":service');

    expect(fact).toEqual({ from: 'ns:Auth', to: 'ns:Users', relation: 'calls', toType: 'service' });
  });

  test('quoted parts may contain spaces', () => {
    const [fact] = parseKnowledge(`"Auth Service" 'depends on' "User DB"`);

    expect(fact).toEqual({ from: 'Auth Service', to: 'User DB', relation: 'depends on' });
  });

  test('an empty type hint is ignored', () => {
    const [fact] = parseKnowledge('a: calls b');

    expect(fact).toEqual({ from: 'a', to: 'b', relation: 'calls' });
  });

  test('a leading colon is part of the label', () => {
    const [fact] = parseKnowledge(':root calls b');

    expect(fact?.from).toBe(':root');
    expect(fact?.fromType).toBeUndefined();
  });

  test('skips blank lines and comments', () => {
    const facts = parseKnowledge('# architecture\n\n  a calls b  # sync\n   \n');

    expect(facts).toEqual([{ from: 'a', to: 'b', relation: 'calls' }]);
  });

  test('rejects lines without exactly three parts', () => {
    expect(() => parseKnowledge('a calls b\na calls')).toThrow(
      "Line 2: Expected 3 parts (subject relation object), got 2: 'a calls'"
    );
    expect(() => parseKnowledge('a calls b c')).toThrow(
      "Line 1: Expected 3 parts (subject relation object), got 4: 'a calls b c'"
    );
  });

  test('rejects empty quoted parts', () => {
    expect(() => parseKnowledge('a calls b\n"" calls b')).toThrow(InvalidInputError);
    expect(() => parseKnowledge('a calls b\n"" calls b')).toThrow(`Line 2: Empty subject: '"" calls b'`);
    expect(() => parseKnowledge("a '' b")).toThrow(`Line 1: Empty relation: 'a '' b'`);
    expect(() => parseKnowledge('a calls ""')).toThrow(`Line 1: Empty object: 'a calls ""'`);
  });

  test('reports unbalanced quotes', () => {
    expect(() => parseKnowledge('"a calls b')).toThrow(InvalidInputError);
    expect(() => parseKnowledge('"a calls b')).toThrow('Line 1: Invalid syntax - No closing quotation');
  });

  test('backslash escapes outside quotes', () => {
    const [fact] = parseKnowledge('Auth\\ Service calls b');

    expect(fact?.from).toBe('Auth Service');
  });
});
