/**
 * rtconf — Application description parser
 *
 * Parses the declarative description of an embedded real-time
 * application (device, init and idle routines, shared resources, tasks)
 * into a typed AST for a code generator to consume.
 */

import { parseAppTokens } from './parser';
import { tokenize } from './tokenizer';
import type { TokenizeOptions } from './tokenizer';
import type { App } from './types';
import { ParseError, TokenizeError } from './errors';

// Re-export types
export type {
  App,
  Delimiter,
  Fragment,
  GroupToken,
  IdentToken,
  Idents,
  Idle,
  Init,
  LifetimeToken,
  LiteralKind,
  LiteralToken,
  Position,
  PunctToken,
  Span,
  Static,
  Statics,
  Task,
  Tasks,
  Token,
} from './types';

export { parseAppTokens, idle, init, tasks, task, statics, idents, path } from './parser';
export { TokenCursor, delimited, fields } from './cursor';
export { parseBool, parseU8, parseStatic } from './literals';
export { tokenize } from './tokenizer';
export type { TokenizeOptions } from './tokenizer';
export { describeToken, printTokens, stripSpans, tokensEqual } from './tokens';
export { ParseError, TokenizeError, withContext } from './errors';

export type ParseOptions = TokenizeOptions;

export type ParseResult =
  | { ok: true; app: App }
  | { ok: false; error: ParseError | TokenizeError };

/**
 * Tokenize and parse an application description in one step.
 *
 * @throws {TokenizeError} when the source cannot be tokenized
 * @throws {ParseError} when the tokens do not form a valid description
 *
 * @example
 * ```ts
 * import { parseApp } from 'rtconf';
 *
 * const app = parseApp(`{
 *   device: stm32f103xx,
 *   idle: { path: idle },
 *   init: { path: init },
 *   tasks: { exti0: { priority: 1 } },
 * }`);
 * app.tasks.get('exti0');
 * // { enabled: undefined, priority: 1, resources: Set {} }
 * ```
 */
export function parseApp(source: string, options?: ParseOptions): App {
  return parseAppTokens(tokenize(source, options));
}

/**
 * Like parseApp(), but reports failure as a value instead of throwing.
 * Errors other than TokenizeError and ParseError still propagate.
 */
export function tryParseApp(source: string, options?: ParseOptions): ParseResult {
  try {
    return { ok: true, app: parseApp(source, options) };
  } catch (e) {
    if (e instanceof ParseError || e instanceof TokenizeError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
