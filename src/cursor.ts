/**
 * rtconf — Token-stream primitives
 *
 * Every `{ key: value, ... }` construct in the grammar is built from
 * `delimited` (enter one group) and `fields` (walk its key/value pairs).
 */

import { ParseError } from './errors';
import { DELIMITERS, describeToken } from './tokens';
import type { Delimiter, IdentToken, Token } from './types';

/** A forward-only position in one token sequence. */
export class TokenCursor {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  /** The next token, without consuming it. */
  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  /** Consume and return the next token, or undefined at the end. */
  next(): Token | undefined {
    const token = this.tokens[this.pos];
    if (token !== undefined) {
      this.pos++;
    }
    return token;
  }

  done(): boolean {
    return this.pos >= this.tokens.length;
  }
}

/** Build a ParseError pointing at `token` (or at nothing, at end of input). */
export function unexpected(expected: string, token: Token | undefined): ParseError {
  return new ParseError(`expected ${expected}, found ${describeToken(token)}`, token?.span);
}

export function isPunct(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === 'punct' && token.value === value;
}

/**
 * Consume one group of the given delimiter and run `fn` over its
 * contents. Nothing outside the group is visible to `fn`.
 */
export function delimited<R>(
  cursor: TokenCursor,
  delimiter: Delimiter,
  fn: (inner: TokenCursor) => R,
): R {
  const token = cursor.next();
  const { open, close } = DELIMITERS[delimiter];

  if (token === undefined || token.type !== 'group') {
    throw unexpected(`\`${open} ... ${close}\``, token);
  }
  if (token.delimiter !== delimiter) {
    throw new ParseError(
      `expected \`${open}\`, found \`${DELIMITERS[token.delimiter].open}\``,
      token.span,
    );
  }

  return fn(new TokenCursor(token.tokens));
}

/**
 * Walk `key: value, key: value[,]`. The handler consumes the value;
 * whatever follows it must be a comma or the end of the list.
 */
export function fields(
  cursor: TokenCursor,
  handler: (key: IdentToken, cursor: TokenCursor) => void,
): void {
  while (!cursor.done()) {
    const key = cursor.next();
    if (key === undefined || key.type !== 'ident') {
      throw unexpected('identifier', key);
    }

    const colon = cursor.next();
    if (!isPunct(colon, ':')) {
      throw unexpected('`:`', colon);
    }

    handler(key, cursor);

    const separator = cursor.next();
    if (separator !== undefined && !isPunct(separator, ',')) {
      throw unexpected('`,`', separator);
    }
  }
}
