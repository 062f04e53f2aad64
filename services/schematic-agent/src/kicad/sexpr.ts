/**
 * Minimal S-expression reader for KiCad schematic text.
 *
 * Atoms and quoted strings both become JS strings (quotes removed, escapes
 * resolved); lists become arrays whose first element is the keyword.
 *
 * @module kicad/sexpr
 */

import { ValidationError } from '../utils/errors.js';

export type SExpr = string | SExpr[];
export type SList = SExpr[];

function syntaxError(message: string, offset: number): ValidationError {
  return new ValidationError(`S-expression syntax error at offset ${offset}: ${message}`, {
    operation: 'parseSExpression',
    offset,
  });
}

const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t' };

/**
 * Parse exactly one top-level list. Trailing whitespace is allowed, any
 * other trailing content is an error.
 */
export function parseSExpression(text: string): SList {
  let pos = 0;

  const skipWhitespace = (): void => {
    while (pos < text.length && /\s/.test(text[pos])) pos++;
  };

  const readString = (): string => {
    const start = pos;
    pos++; // opening quote
    let out = '';
    while (pos < text.length) {
      const ch = text[pos];
      if (ch === '\\') {
        const next = text[pos + 1];
        if (next === undefined) break;
        out += ESCAPES[next] ?? next;
        pos += 2;
        continue;
      }
      if (ch === '"') {
        pos++;
        return out;
      }
      out += ch;
      pos++;
    }
    throw syntaxError('unterminated string', start);
  };

  const readAtom = (): string => {
    const start = pos;
    while (pos < text.length && !/[\s()"]/.test(text[pos])) pos++;
    return text.slice(start, pos);
  };

  const readList = (): SList => {
    const start = pos;
    pos++; // opening paren
    const items: SList = [];
    for (;;) {
      skipWhitespace();
      if (pos >= text.length) {
        throw syntaxError('unclosed list', start);
      }
      const ch = text[pos];
      if (ch === ')') {
        pos++;
        return items;
      }
      if (ch === '(') {
        items.push(readList());
      } else if (ch === '"') {
        items.push(readString());
      } else {
        items.push(readAtom());
      }
    }
  };

  skipWhitespace();
  if (text[pos] !== '(') {
    throw syntaxError('expected "("', pos);
  }
  const root = readList();
  skipWhitespace();
  if (pos < text.length) {
    throw syntaxError('unexpected content after top-level list', pos);
  }
  return root;
}

export function isList(expr: SExpr | undefined): expr is SList {
  return Array.isArray(expr);
}

export function head(expr: SExpr | undefined): string | undefined {
  if (!isList(expr)) return undefined;
  const first = expr[0];
  return typeof first === 'string' ? first : undefined;
}

/** First direct child list with the given keyword */
export function findExpr(list: SList, name: string): SList | undefined {
  for (const item of list) {
    if (isList(item) && head(item) === name) return item;
  }
  return undefined;
}

/** All direct child lists with the given keyword */
export function findAllExpr(list: SList, name: string): SList[] {
  return list.filter((item): item is SList => isList(item) && head(item) === name);
}

/** All lists with the given keyword at any depth, in document order */
export function findDeep(list: SList, name: string): SList[] {
  const found: SList[] = [];
  const visit = (node: SList): void => {
    for (const item of node) {
      if (!isList(item)) continue;
      if (head(item) === name) found.push(item);
      visit(item);
    }
  };
  visit(list);
  return found;
}

/** Value of `(name value)` child, if present and atomic */
export function getStringValue(list: SList, name: string): string | undefined {
  const child = findExpr(list, name);
  const value = child?.[1];
  return typeof value === 'string' ? value : undefined;
}

export function getNumberValue(list: SList, name: string): number | undefined {
  const value = getStringValue(list, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** `(at x y [angle])` of a list, or undefined */
export function getAt(list: SList): { x: number; y: number; angle: number } | undefined {
  const at = findExpr(list, 'at');
  if (!at) return undefined;
  const x = Number(at[1]);
  const y = Number(at[2]);
  const angle = at[3] === undefined ? 0 : Number(at[3]);
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(angle)) return undefined;
  return { x, y, angle };
}

/** All `(xy x y)` points under a list (e.g. a wire's `pts`) */
export function getPoints(list: SList): Array<[number, number]> {
  return findDeep(list, 'xy')
    .map((xy): [number, number] => [Number(xy[1]), Number(xy[2])])
    .filter(([x, y]) => Number.isFinite(x) && Number.isFinite(y));
}

/** `(property "Name" "Value" ...)` lookup */
export function getProperty(list: SList, name: string): string | undefined {
  for (const prop of findAllExpr(list, 'property')) {
    if (prop[1] === name && typeof prop[2] === 'string') return prop[2];
  }
  return undefined;
}
