/**
 * rtconf — Tokenizer
 *
 * Turns configuration source text into token trees: identifiers,
 * punctuation, literals and balanced (), {} and [] groups. The parser
 * only ever sees the trees, so a group is always well formed by the
 * time a grammar rule looks at it.
 */

import { TokenizeError } from './errors';
import { DELIMITERS } from './tokens';
import type { Delimiter, GroupToken, LiteralKind, Position, Token } from './types';

/** Default maximum group nesting (can be overridden). */
const DEFAULT_MAX_DEPTH = 128;

export interface TokenizeOptions {
  /**
   * Maximum nesting of (), {} and [] groups. Deeper input is rejected
   * with a TokenizeError.
   * Set to 0 or Infinity to disable.
   * Default: 128
   */
  maxDepth?: number;
}

// Longest first, so that `..=` wins over `..` and `.`
const PUNCTUATION = [
  '...', '..=',
  '::', '->', '=>', '==', '!=', '<=', '>=', '&&', '||', '..',
  '+=', '-=', '*=', '/=', '%=', '^=', '&=', '|=',
  '+', '-', '*', '/', '%', '^', '!', '&', '|', '=', '<', '>',
  '@', '.', ',', ';', ':', '#', '$', '?', '~',
];

const OPENERS: Record<string, Delimiter> = { '(': 'paren', '{': 'brace', '[': 'bracket' };
const CLOSERS: Record<string, Delimiter> = { ')': 'paren', '}': 'brace', ']': 'bracket' };

const IDENT_START = /^[A-Za-z_]$/;
const IDENT_CHAR = /^[A-Za-z0-9_]$/;
const DIGIT = /^[0-9]$/;
const WHITESPACE = /^\s$/;

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && IDENT_START.test(ch);
}

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && IDENT_CHAR.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && DIGIT.test(ch);
}

interface Frame {
  delimiter: Delimiter;
  tokens: Token[];
  start: number;
}

/**
 * Tokenize configuration source.
 *
 * @example
 * ```ts
 * tokenize('idle: { path: main::idle }');
 * // [ident idle, punct :, group brace [ident path, punct :, ident main, punct ::, ident idle]]
 * ```
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const limited = maxDepth > 0 && Number.isFinite(maxDepth);

  const lineStarts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }

  // Binary search for the last line starting at or before `offset`
  function position(offset: number): Position {
    let lo = 0;
    let hi = lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return { line: lo + 1, column: offset - lineStarts[lo] + 1, offset };
  }

  function fail(reason: string, offset: number): never {
    throw new TokenizeError(reason, position(offset));
  }

  const root: Token[] = [];
  const stack: Frame[] = [];
  let pos = 0;

  function emit(token: Token, start: number): void {
    token.span = { start: position(start), end: position(pos) };
    const frame = stack[stack.length - 1];
    (frame ? frame.tokens : root).push(token);
  }

  while (pos < source.length) {
    const start = pos;
    const ch = source[pos];

    if (WHITESPACE.test(ch)) {
      pos++;
      continue;
    }

    if (source.startsWith('//', pos)) {
      while (pos < source.length && source[pos] !== '\n') pos++;
      continue;
    }

    if (source.startsWith('/*', pos)) {
      const end = source.indexOf('*/', pos + 2);
      if (end === -1) {
        fail('unterminated block comment', start);
      }
      pos = end + 2;
      continue;
    }

    const opened = OPENERS[ch];
    if (opened !== undefined) {
      if (limited && stack.length >= maxDepth) {
        fail(`nesting deeper than ${maxDepth} groups`, start);
      }
      stack.push({ delimiter: opened, tokens: [], start });
      pos++;
      continue;
    }

    const closed = CLOSERS[ch];
    if (closed !== undefined) {
      const frame = stack.pop();
      if (frame === undefined) {
        fail(`unexpected closing delimiter \`${ch}\``, start);
      }
      if (frame.delimiter !== closed) {
        fail(`mismatched closing delimiter \`${ch}\`, expected \`${DELIMITERS[frame.delimiter].close}\``, start);
      }
      pos++;
      const group: GroupToken = { type: 'group', delimiter: frame.delimiter, tokens: frame.tokens };
      emit(group, frame.start);
      continue;
    }

    if (isIdentStart(ch)) {
      while (isIdentChar(source[pos])) pos++;
      const word = source.slice(start, pos);
      if (word === 'true' || word === 'false') {
        emit({ type: 'literal', kind: 'bool', text: word }, start);
      } else {
        emit({ type: 'ident', value: word }, start);
      }
      continue;
    }

    if (isDigit(ch)) {
      emit(readNumber(), start);
      continue;
    }

    if (ch === '"') {
      pos++;
      while (source[pos] !== '"') {
        if (pos >= source.length) {
          fail('unterminated string literal', start);
        }
        pos += source[pos] === '\\' ? 2 : 1;
      }
      pos++;
      emit({ type: 'literal', kind: 'str', text: source.slice(start, pos) }, start);
      continue;
    }

    if (ch === "'") {
      emit(readQuote(), start);
      continue;
    }

    const punct = PUNCTUATION.find(p => source.startsWith(p, pos));
    if (punct !== undefined) {
      pos += punct.length;
      emit({ type: 'punct', value: punct }, start);
      continue;
    }

    fail(`unexpected character \`${ch}\``, start);
  }

  const unclosed = stack.pop();
  if (unclosed !== undefined) {
    fail(`unclosed delimiter \`${DELIMITERS[unclosed.delimiter].open}\``, unclosed.start);
  }

  return root;

  function readNumber(): Token {
    const start = pos;
    let kind: LiteralKind = 'int';

    const radix = source[pos] === '0' ? source[pos + 1] : undefined;
    if (radix === 'x' || radix === 'o' || radix === 'b') {
      const digit = radix === 'x' ? /^[0-9a-fA-F]$/ : radix === 'o' ? /^[0-7]$/ : /^[01]$/;
      let digits = 0;
      pos += 2;
      while (pos < source.length && (source[pos] === '_' || digit.test(source[pos]))) {
        if (source[pos] !== '_') digits++;
        pos++;
      }
      if (digits === 0) {
        fail(`expected digits after \`0${radix}\``, start);
      }
    } else {
      while (isDigit(source[pos]) || source[pos] === '_') pos++;

      if (source[pos] === '.' && isDigit(source[pos + 1])) {
        kind = 'float';
        pos++;
        while (isDigit(source[pos]) || source[pos] === '_') pos++;
      }

      const e = source[pos];
      if (e === 'e' || e === 'E') {
        const sign = source[pos + 1] === '+' || source[pos + 1] === '-' ? 1 : 0;
        if (isDigit(source[pos + 1 + sign])) {
          kind = 'float';
          pos += 1 + sign;
          while (isDigit(source[pos]) || source[pos] === '_') pos++;
        }
      }
    }

    const digitsEnd = pos;
    if (isIdentStart(source[pos])) {
      while (isIdentChar(source[pos])) pos++;
    }

    const text = source.slice(start, pos);
    if (digitsEnd === pos) {
      return { type: 'literal', kind, text };
    }

    const suffix = source.slice(digitsEnd, pos);
    if (suffix === 'f32' || suffix === 'f64') {
      kind = 'float';
    }
    return { type: 'literal', kind, text, suffix };
  }

  // 'x', '\n', '\u{1F600}' or a lifetime such as 'static
  function readQuote(): Token {
    const start = pos;

    if (source[pos + 1] === '\\') {
      let end = pos + 3;
      while (end < source.length && source[end] !== "'" && source[end] !== '\n') end++;
      if (source[end] !== "'") {
        fail('unterminated character literal', start);
      }
      pos = end + 1;
      return { type: 'literal', kind: 'char', text: source.slice(start, pos) };
    }

    const code = source.codePointAt(pos + 1);
    if (code !== undefined && source[pos + 1] !== '\n') {
      const width = code > 0xffff ? 2 : 1;
      if (source[pos + 1 + width] === "'") {
        pos += width + 2;
        return { type: 'literal', kind: 'char', text: source.slice(start, pos) };
      }
    }

    if (isIdentStart(source[pos + 1])) {
      pos++;
      while (isIdentChar(source[pos])) pos++;
      return { type: 'lifetime', value: source.slice(start, pos) };
    }

    return fail("unexpected character `'`", start);
  }
}
