import { describe, it, expect } from 'vitest';
import { ParseError, TokenizeError, withContext } from '../src/errors';

describe('ParseError', () => {
  it('builds the message from the chain', () => {
    const err = new ParseError('expected boolean, found `1`', undefined, ['parsing `enabled`']);
    expect(err.message).toBe('parsing `enabled`: expected boolean, found `1`');
    expect(err.chain).toEqual(['parsing `enabled`', 'expected boolean, found `1`']);
    expect(err.name).toBe('ParseError');
  });

  it('prepends context notes outermost first', () => {
    const err = new ParseError('boom').withContext('inner').withContext('outer');
    expect(err.context).toEqual(['outer', 'inner']);
    expect(err.reason).toBe('boom');
  });

  it('formats without a span', () => {
    expect(new ParseError('missing `init` field').format()).toBe('error: missing `init` field');
  });

  describe('withContext', () => {
    it('returns the result on success', () => {
      expect(withContext('note', () => 42)).toBe(42);
    });

    it('wraps parse errors', () => {
      expect(() =>
        withContext('parsing `x`', () => {
          throw new ParseError('bad');
        }),
      ).toThrow('parsing `x`: bad');
    });

    it('passes other errors through', () => {
      const boom = new TypeError('boom');
      expect(() =>
        withContext('parsing `x`', () => {
          throw boom;
        }),
      ).toThrow(boom);
    });
  });
});

describe('TokenizeError', () => {
  it('reports the position in the message', () => {
    const err = new TokenizeError('unterminated string literal', { line: 3, column: 7, offset: 20 });
    expect(err.message).toBe('Tokenize error at line 3, column 7: unterminated string literal');
    expect(err.reason).toBe('unterminated string literal');
    expect(err.name).toBe('TokenizeError');
  });
});
