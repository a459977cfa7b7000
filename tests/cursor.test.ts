import { describe, it, expect } from 'vitest';
import { TokenCursor, delimited, fields } from '../src/cursor';
import { tokenize } from '../src/tokenizer';
import { printTokens } from '../src/tokens';
import { ParseError } from '../src/errors';
import type { Token } from '../src/types';

function cursor(src: string): TokenCursor {
  return new TokenCursor(tokenize(src));
}

function words(tokens: readonly Token[]): string[] {
  return tokens.map(t => printTokens([t]));
}

describe('token-stream primitives', () => {
  describe('delimited', () => {
    it('hands only the group contents to the continuation', () => {
      const c = cursor('{ a b } c');
      const seen = delimited(c, 'brace', inner => {
        const out: Token[] = [];
        for (let t = inner.next(); t !== undefined; t = inner.next()) out.push(t);
        return out;
      });
      expect(words(seen)).toEqual(['a', 'b']);
      expect(words([c.next() ?? { type: 'ident', value: '<none>' }])).toEqual(['c']);
    });

    it('reports the expected and found delimiters', () => {
      expect(() => delimited(cursor('[a]'), 'brace', () => 0)).toThrow('expected `{`, found `[`');
    });

    it('rejects a non-group token', () => {
      expect(() => delimited(cursor('a'), 'paren', () => 0)).toThrow('expected `( ... )`, found `a`');
    });

    it('rejects end of input', () => {
      expect(() => delimited(cursor(''), 'bracket', () => 0)).toThrow('expected `[ ... ]`, found end of input');
    });
  });

  describe('fields', () => {
    function collect(src: string): string[] {
      const seen: string[] = [];
      fields(cursor(src), (key, c) => {
        seen.push(`${key.value}=${printTokens([c.next() ?? { type: 'ident', value: '<none>' }])}`);
      });
      return seen;
    }

    it('walks key/value pairs', () => {
      expect(collect('a: 1, b: x')).toEqual(['a=1', 'b=x']);
    });

    it('accepts a trailing comma', () => {
      expect(collect('a: 1, b: 2,')).toEqual(['a=1', 'b=2']);
    });

    it('accepts an empty list', () => {
      expect(collect('')).toEqual([]);
    });

    it('requires an identifier key', () => {
      expect(() => collect('1: a')).toThrow('expected identifier, found `1`');
    });

    it('requires a colon', () => {
      expect(() => collect('a 1')).toThrow('expected `:`, found `1`');
    });

    it('rejects trailing garbage after a value', () => {
      expect(() => collect('a: 1 2')).toThrow('expected `,`, found `2`');
    });

    it('stops at the first failing handler', () => {
      const seen: string[] = [];
      expect(() =>
        fields(cursor('a: 1, b: 2, c: 3'), (key, c) => {
          c.next();
          seen.push(key.value);
          if (key.value === 'b') throw new ParseError('boom');
        }),
      ).toThrow('boom');
      expect(seen).toEqual(['a', 'b']);
    });
  });
});
