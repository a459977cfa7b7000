/**
 * rtconf — Errors
 *
 * Tokenizer failures carry a source position. Parser failures carry a
 * chain of context notes, outermost first, ending in the reason the
 * innermost rule gave up:
 *
 *   parsing `tasks`: parsing task `t1`: parsing `priority`: 256 is out of the `u8` range
 */

import type { Position, Span } from './types';

export class TokenizeError extends Error {
  constructor(
    public readonly reason: string,
    public readonly position: Position,
  ) {
    super(`Tokenize error at line ${position.line}, column ${position.column}: ${reason}`);
    this.name = 'TokenizeError';
  }
}

export class ParseError extends Error {
  readonly reason: string;
  readonly context: readonly string[];
  readonly span?: Span;

  constructor(reason: string, span?: Span, context: readonly string[] = []) {
    super([...context, reason].join(': '));
    this.name = 'ParseError';
    this.reason = reason;
    this.context = context;
    this.span = span;
  }

  /** Context notes followed by the reason. */
  get chain(): string[] {
    return [...this.context, this.reason];
  }

  /** Return a copy of this error with `note` as the new outermost context. */
  withContext(note: string): ParseError {
    return new ParseError(this.reason, this.span, [note, ...this.context]);
  }

  /**
   * Render the chain one link per line:
   *
   *   error: parsing `idle`
   *     caused by: unknown field: `stack` (line 3, column 5)
   */
  format(): string {
    const links = this.chain;
    const where = this.span
      ? ` (line ${this.span.start.line}, column ${this.span.start.column})`
      : '';

    return links
      .map((link, i) => {
        const text = i === links.length - 1 ? link + where : link;
        return i === 0 ? `error: ${text}` : `  caused by: ${text}`;
      })
      .join('\n');
  }
}

/**
 * Run `fn`, prefixing any ParseError it throws with `note`.
 * Other errors pass through unchanged.
 */
export function withContext<T>(note: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof ParseError) {
      throw e.withContext(note);
    }
    throw e;
  }
}
