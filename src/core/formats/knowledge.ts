/**
 * Knowledge DSL
 *
 * One fact per line:
 *
 *   Subject relation Object
 *   AuthService:service depends_on UserDB:database
 *   "Auth Service" "depends on" "User DB"
 *
 * Quoting follows POSIX shell rules. A `:type` suffix on the subject or
 * object sets the node type; a colon inside quotes is part of the label.
 * `#` starts a comment unless quoted.
 */

import { InvalidInputError } from '../errors';
import type { Fact } from './types';

interface Token {
  text: string;
  /** Offset of the last unquoted colon in `text`, or -1 */
  colonAt: number;
}

class QuotingError extends Error {}

/**
 * Strip a trailing `#` comment, ignoring `#` inside quotes.
 */
export function removeComment(line: string): string {
  let quote: string | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if ((char === '"' || char === "'") && line[i - 1] !== '\\') {
      if (quote === null) quote = char;
      else if (char === quote) quote = null;
    } else if (char === '#' && quote === null) {
      return line.slice(0, i);
    }
  }

  return line;
}

/** Characters a backslash escapes inside double quotes */
const DOUBLE_QUOTE_ESCAPES = new Set(['\\', '"', '$', '`', '\n']);

function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let text = '';
  let colonAt = -1;
  let started = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    if (quote === "'") {
      if (char === "'") quote = null;
      else text += char;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      } else if (char === '\\' && DOUBLE_QUOTE_ESCAPES.has(line.charAt(i + 1))) {
        text += line.charAt(++i);
      } else {
        text += char;
      }
      continue;
    }

    if (/\s/.test(char)) {
      if (started) tokens.push({ text, colonAt });
      text = '';
      colonAt = -1;
      started = false;
      continue;
    }

    started = true;
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '\\') {
      if (i + 1 >= line.length) throw new QuotingError('No escaped character');
      text += line.charAt(++i);
    } else {
      if (char === ':') colonAt = text.length;
      text += char;
    }
  }

  if (quote !== null) throw new QuotingError('No closing quotation');
  if (started) tokens.push({ text, colonAt });
  return tokens;
}

function splitTypeHint(token: Token): { label: string; type?: string } {
  if (token.colonAt <= 0) return { label: token.text };

  const label = token.text.slice(0, token.colonAt);
  const type = token.text.slice(token.colonAt + 1);
  return type ? { label, type } : { label };
}

/**
 * Parse DSL text into facts.
 * @throws InvalidInputError naming the first malformed line
 */
export function parseKnowledge(knowledge: string): Fact[] {
  const facts: Fact[] = [];
  const lines = knowledge.split('\n');

  for (const [index, raw] of lines.entries()) {
    const lineNumber = index + 1;
    const line = removeComment(raw).trim();
    if (!line) continue;

    let tokens: Token[];
    try {
      tokens = tokenize(line);
    } catch (err) {
      if (err instanceof QuotingError) {
        throw new InvalidInputError(`Line ${lineNumber}: Invalid syntax - ${err.message}`, err);
      }
      throw err;
    }

    const [subject, relation, object] = tokens;
    if (tokens.length !== 3 || !subject || !relation || !object) {
      throw new InvalidInputError(
        `Line ${lineNumber}: Expected 3 parts (subject relation object), got ${tokens.length}: '${line}'`
      );
    }

    const from = splitTypeHint(subject);
    const to = splitTypeHint(object);
    const parts: Array<[string, string]> = [
      ['subject', from.label],
      ['relation', relation.text],
      ['object', to.label]
    ];
    const empty = parts.find(([, text]) => text === '');
    if (empty) {
      throw new InvalidInputError(`Line ${lineNumber}: Empty ${empty[0]}: '${line}'`);
    }
    const fact: Fact = { from: from.label, to: to.label, relation: relation.text };
    if (from.type) fact.fromType = from.type;
    if (to.type) fact.toType = to.type;
    facts.push(fact);
  }

  return facts;
}
