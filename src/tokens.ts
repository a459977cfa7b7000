/**
 * rtconf — Token helpers
 *
 * Rendering tokens for diagnostics and printing captured fragments back
 * to source text.
 */

import type { Delimiter, Token } from './types';

export const DELIMITERS: Record<Delimiter, { open: string; close: string }> = {
  paren: { open: '(', close: ')' },
  brace: { open: '{', close: '}' },
  bracket: { open: '[', close: ']' },
};

/**
 * Describe a token for an error message, e.g. `` `foo` ``, `` `{ ... }` ``
 * or `end of input` when there is no token.
 */
export function describeToken(token: Token | undefined): string {
  if (token === undefined) {
    return 'end of input';
  }
  switch (token.type) {
    case 'ident':
    case 'lifetime':
    case 'punct':
      return `\`${token.value}\``;
    case 'literal':
      return `\`${token.text}\``;
    case 'group': {
      const { open, close } = DELIMITERS[token.delimiter];
      return `\`${open} ... ${close}\``;
    }
  }
}

function printToken(token: Token): string {
  switch (token.type) {
    case 'ident':
    case 'lifetime':
    case 'punct':
      return token.value;
    case 'literal':
      return token.text;
    case 'group': {
      const { open, close } = DELIMITERS[token.delimiter];
      return open + printTokens(token.tokens) + close;
    }
  }
}

/**
 * Print a fragment as source text. Tokens are separated by single
 * spaces, so tokenizing the output gives back the same tokens.
 *
 * @example
 * ```ts
 * printTokens(tokenize('Foo::new(1, 2)'));
 * // 'Foo :: new (1 , 2)'
 * ```
 */
export function printTokens(tokens: readonly Token[]): string {
  return tokens.map(printToken).join(' ');
}

/** Copy tokens without their source spans. */
export function stripSpans(tokens: readonly Token[]): Token[] {
  return tokens.map((token): Token => {
    switch (token.type) {
      case 'ident':
      case 'lifetime':
      case 'punct':
        return { type: token.type, value: token.value };
      case 'literal': {
        const { span: _span, ...rest } = token;
        return rest;
      }
      case 'group':
        return { type: 'group', delimiter: token.delimiter, tokens: stripSpans(token.tokens) };
    }
  });
}

function tokenEqual(a: Token, b: Token): boolean {
  switch (a.type) {
    case 'ident':
    case 'lifetime':
    case 'punct':
      return (b.type === 'ident' || b.type === 'lifetime' || b.type === 'punct') &&
        a.type === b.type &&
        a.value === b.value;
    case 'literal':
      return b.type === 'literal' && a.kind === b.kind && a.text === b.text && a.suffix === b.suffix;
    case 'group':
      return b.type === 'group' && a.delimiter === b.delimiter && tokensEqual(a.tokens, b.tokens);
  }
}

/** Compare two token sequences, ignoring spans. */
export function tokensEqual(a: readonly Token[], b: readonly Token[]): boolean {
  return a.length === b.length && a.every((token, i) => tokenEqual(token, b[i]));
}
