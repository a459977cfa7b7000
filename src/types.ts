/**
 * rtconf — Token and AST Types
 *
 * The token tree consumed by the parser and the application description
 * it produces.
 */

// ─── Tokens ─────────────────────────────────────────────────────

/** A point in the source text. `line` and `column` are 1-based. */
export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export type Delimiter = 'paren' | 'brace' | 'bracket';

/** An identifier or keyword. */
export interface IdentToken {
  type: 'ident';
  value: string;
  span?: Span;
}

/** A lifetime such as `'static`; `value` keeps the apostrophe. */
export interface LifetimeToken {
  type: 'lifetime';
  value: string;
  span?: Span;
}

/** A single operator, possibly multi-character (`::`, `->`, `>=`). */
export interface PunctToken {
  type: 'punct';
  value: string;
  span?: Span;
}

export type LiteralKind = 'bool' | 'int' | 'float' | 'str' | 'char';

export interface LiteralToken {
  type: 'literal';
  kind: LiteralKind;
  text: string;              // raw source text, quotes and suffix included
  suffix?: string;           // e.g. 'u8' in 42u8
  span?: Span;
}

/**
 * A balanced span of tokens wrapped in (), {} or [].
 * The span covers both delimiters.
 */
export interface GroupToken {
  type: 'group';
  delimiter: Delimiter;
  tokens: Token[];
  span?: Span;
}

export type Token = IdentToken | LifetimeToken | PunctToken | LiteralToken | GroupToken;

/** A captured token run that the parser never interprets. */
export type Fragment = readonly Token[];

// ─── Application description ────────────────────────────────────

/** A statically allocated variable: `name: ty = expr;` */
export interface Static {
  readonly ty: Fragment;
  readonly expr: Fragment;
}

export type Statics = ReadonlyMap<string, Static>;

/** A set of resource names, e.g. `[A, B]`. */
export type Idents = ReadonlySet<string>;

export interface Init {
  readonly path: Fragment;
}

export interface Idle {
  readonly path: Fragment;
  readonly locals: Statics;
  readonly resources: Idents;
}

/**
 * A task. `enabled` and `priority` are left undefined when the
 * description omits them; the consumer decides what that means.
 */
export interface Task {
  readonly enabled?: boolean;
  readonly priority?: number;
  readonly resources: Idents;
}

export type Tasks = ReadonlyMap<string, Task>;

/** A complete application description. */
export interface App {
  readonly device: Fragment;
  readonly idle: Idle;
  readonly init: Init;
  readonly resources: Statics;
  readonly tasks: Tasks;
}
