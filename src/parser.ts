/**
 * rtconf — Parser
 *
 * A recursive descent parser over token trees (see tokenizer.ts) that
 * produces an application description (see types.ts).
 *
 * Grammar, where `path`, `ty` and `expr` are opaque token runs:
 *
 *   app     = "{" fields( device: path | idle: idle | init: init
 *                       | resources: statics | tasks: tasks ) "}"
 *   idle    = "{" fields( path: path | locals: statics | resources: idents ) "}"
 *   init    = "{" fields( path: path ) "}"
 *   tasks   = "{" fields( <name>: task ) "}"
 *   task    = "{" fields( enabled: bool | priority: u8 | resources: idents ) "}"
 *   statics = "{" { ident ":" ty "=" expr ";" } "}"
 *   idents  = "[" [ ident { "," ident } [ "," ] ] "]"
 *   fields(f) = [ f { "," f } [ "," ] ]
 */

import { ParseError, withContext } from './errors';
import { TokenCursor, delimited, fields, isPunct, unexpected } from './cursor';
import { parseBool, parseStatic, parseU8 } from './literals';
import { describeToken } from './tokens';
import type { App, Fragment, IdentToken, Idents, Idle, Init, Static, Statics, Task, Tasks, Token } from './types';

function duplicated(key: IdentToken): ParseError {
  return new ParseError(`duplicated \`${key.value}\` field`, key.span);
}

function unknownField(key: IdentToken): ParseError {
  return new ParseError(`unknown field: \`${key.value}\``, key.span);
}

function missing(field: string): ParseError {
  return new ParseError(`missing \`${field}\` field`);
}

/**
 * Parse a complete application description. `tokens` holds exactly one
 * brace group.
 */
export function parseAppTokens(tokens: readonly Token[]): App {
  const cursor = new TokenCursor(tokens);
  const result = app(cursor);

  const trailing = cursor.next();
  if (trailing !== undefined) {
    throw new ParseError(`unexpected ${describeToken(trailing)} after configuration`, trailing.span);
  }

  return result;
}

function app(cursor: TokenCursor): App {
  return delimited(cursor, 'brace', inner => {
    const slots: {
      device?: Fragment;
      idle?: Idle;
      init?: Init;
      resources?: Statics;
      tasks?: Tasks;
    } = {};

    fields(inner, (key, cursor) => {
      switch (key.value) {
        case 'device':
          if (slots.device) throw duplicated(key);
          slots.device = withContext('parsing `device`', () => path(cursor));
          break;
        case 'idle':
          if (slots.idle) throw duplicated(key);
          slots.idle = withContext('parsing `idle`', () => idle(cursor));
          break;
        case 'init':
          if (slots.init) throw duplicated(key);
          slots.init = withContext('parsing `init`', () => init(cursor));
          break;
        case 'resources':
          if (slots.resources) throw duplicated(key);
          slots.resources = withContext('parsing `resources`', () => statics(cursor));
          break;
        case 'tasks':
          if (slots.tasks) throw duplicated(key);
          slots.tasks = withContext('parsing `tasks`', () => tasks(cursor));
          break;
        default:
          throw unknownField(key);
      }
    });

    const { device, idle: idleValue, init: initValue } = slots;
    if (!device) throw missing('device');
    if (!idleValue) throw missing('idle');
    if (!initValue) throw missing('init');

    return {
      device,
      idle: idleValue,
      init: initValue,
      resources: slots.resources ?? new Map(),
      tasks: slots.tasks ?? new Map(),
    };
  });
}

export function idle(cursor: TokenCursor): Idle {
  return delimited(cursor, 'brace', inner => {
    const slots: { path?: Fragment; locals?: Statics; resources?: Idents } = {};

    fields(inner, (key, cursor) => {
      switch (key.value) {
        case 'path':
          if (slots.path) throw duplicated(key);
          slots.path = withContext('parsing `path`', () => path(cursor));
          break;
        case 'locals':
          if (slots.locals) throw duplicated(key);
          slots.locals = withContext('parsing `locals`', () => statics(cursor));
          break;
        case 'resources':
          if (slots.resources) throw duplicated(key);
          slots.resources = withContext('parsing `resources`', () => idents(cursor));
          break;
        default:
          throw unknownField(key);
      }
    });

    const pathValue = slots.path;
    if (!pathValue) throw missing('path');

    return {
      path: pathValue,
      locals: slots.locals ?? new Map(),
      resources: slots.resources ?? new Set(),
    };
  });
}

export function init(cursor: TokenCursor): Init {
  return delimited(cursor, 'brace', inner => {
    const slots: { path?: Fragment } = {};

    fields(inner, (key, cursor) => {
      if (key.value !== 'path') throw unknownField(key);
      if (slots.path) throw duplicated(key);
      slots.path = withContext('parsing `path`', () => path(cursor));
    });

    const pathValue = slots.path;
    if (!pathValue) throw missing('path');

    return { path: pathValue };
  });
}

export function tasks(cursor: TokenCursor): Tasks {
  return delimited(cursor, 'brace', inner => {
    const result = new Map<string, Task>();

    fields(inner, (key, cursor) => {
      if (result.has(key.value)) {
        throw new ParseError(`task \`${key.value}\` listed more than once`, key.span);
      }
      result.set(key.value, withContext(`parsing task \`${key.value}\``, () => task(cursor)));
    });

    return result;
  });
}

export function task(cursor: TokenCursor): Task {
  return delimited(cursor, 'brace', inner => {
    const slots: { enabled?: boolean; priority?: number; resources?: Idents } = {};

    fields(inner, (key, cursor) => {
      switch (key.value) {
        case 'enabled':
          if (slots.enabled !== undefined) throw duplicated(key);
          slots.enabled = withContext('parsing `enabled`', () => parseBool(cursor));
          break;
        case 'priority':
          if (slots.priority !== undefined) throw duplicated(key);
          slots.priority = withContext('parsing `priority`', () => parseU8(cursor));
          break;
        case 'resources':
          if (slots.resources) throw duplicated(key);
          slots.resources = withContext('parsing `resources`', () => idents(cursor));
          break;
        default:
          throw unknownField(key);
      }
    });

    return {
      enabled: slots.enabled,
      priority: slots.priority,
      resources: slots.resources ?? new Set(),
    };
  });
}

/** `{ NAME: ty = expr; ... }` */
export function statics(cursor: TokenCursor): Statics {
  return delimited(cursor, 'brace', inner => {
    const result = new Map<string, Static>();

    while (!inner.done()) {
      const name = inner.next();
      if (name === undefined || name.type !== 'ident') {
        throw unexpected('identifier', name);
      }
      if (result.has(name.value)) {
        throw new ParseError(`resource \`${name.value}\` listed more than once`, name.span);
      }

      const colon = inner.next();
      if (!isPunct(colon, ':')) {
        throw unexpected('`:`', colon);
      }

      result.set(name.value, withContext(`parsing \`${name.value}\``, () => parseStatic(inner)));
    }

    return result;
  });
}

/** `[A, B, C]` */
export function idents(cursor: TokenCursor): Idents {
  return delimited(cursor, 'bracket', inner => {
    const result = new Set<string>();

    while (!inner.done()) {
      const ident = inner.next();
      if (ident === undefined || ident.type !== 'ident') {
        throw unexpected('identifier', ident);
      }
      if (result.has(ident.value)) {
        throw new ParseError(`ident \`${ident.value}\` listed more than once`, ident.span);
      }
      result.add(ident.value);

      const separator = inner.next();
      if (separator !== undefined && !isPunct(separator, ',')) {
        throw unexpected('`,`', separator);
      }
    }

    return result;
  });
}

/**
 * Everything up to the next `,` or the end of the list, groups
 * included. The comma is left for the field walker.
 */
export function path(cursor: TokenCursor): Fragment {
  const fragment: Token[] = [];

  for (let token = cursor.peek(); token !== undefined && !isPunct(token, ','); token = cursor.peek()) {
    fragment.push(token);
    cursor.next();
  }

  if (fragment.length === 0) {
    throw unexpected('path', cursor.peek());
  }
  return fragment;
}
