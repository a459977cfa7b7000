/**
 * rtconf — Literal coercers
 */

import { ParseError } from './errors';
import { isPunct, unexpected, type TokenCursor } from './cursor';
import type { Static, Token } from './types';

/** `true` or `false` */
export function parseBool(cursor: TokenCursor): boolean {
  const token = cursor.next();
  if (token === undefined || token.type !== 'literal' || token.kind !== 'bool') {
    throw unexpected('boolean', token);
  }
  return token.text === 'true';
}

/**
 * An unsuffixed, unsigned integer below 256. Accepts `0x`, `0o` and `0b`
 * prefixes and `_` separators. `-1` fails on the `-` token.
 */
export function parseU8(cursor: TokenCursor): number {
  const token = cursor.next();
  if (
    token === undefined ||
    token.type !== 'literal' ||
    token.kind !== 'int' ||
    token.suffix !== undefined
  ) {
    throw unexpected('integer', token);
  }

  const value = Number(token.text.replace(/_/g, ''));
  if (!(value < 256)) {
    throw new ParseError(`${token.text} is out of the \`u8\` range`, token.span);
  }
  return value;
}

/**
 * Collect tokens up to the next top-level `stop` punctuation and consume
 * it. Groups are taken whole, so separators inside them are not seen.
 * Returns the run and the separator that ended it.
 */
function collectUntil(cursor: TokenCursor, stop: string): { fragment: Token[]; end: Token } {
  const fragment: Token[] = [];
  for (;;) {
    const token = cursor.next();
    if (token === undefined) {
      throw unexpected(`\`${stop}\``, token);
    }
    if (isPunct(token, stop)) {
      return { fragment, end: token };
    }
    fragment.push(token);
  }
}

/** `ty = expr;` */
export function parseStatic(cursor: TokenCursor): Static {
  const ty = collectUntil(cursor, '=');
  if (ty.fragment.length === 0) {
    throw new ParseError('type is missing', ty.end.span);
  }

  const expr = collectUntil(cursor, ';');
  if (expr.fragment.length === 0) {
    throw new ParseError('initial value is missing', expr.end.span);
  }

  return { ty: ty.fragment, expr: expr.fragment };
}
