/**
 * Allowed lib_id candidates per part, offered to the Architect so it picks
 * from symbols that actually exist.
 *
 * @module kicad/symbol-candidates
 */

import type { Part } from '../types/index.js';
import { customLibId, SymbolIndex } from './symbol-library.js';

export const DEFAULT_MAX_CANDIDATES = 5;

/** lib_ids that never name a real symbol */
export const INVALID_LIB_IDS: ReadonlySet<string> = new Set(['device:u', 'device:unknown']);

export function isInvalidLibId(libId: string): boolean {
  return INVALID_LIB_IDS.has(libId.toLowerCase());
}

function existing(index: SymbolIndex, library: string, symbols: string[]): string[] {
  return symbols.filter((s) => index.has(library, s)).map((s) => `${library}:${s}`);
}

/**
 * Tokens from a part value worth searching on, e.g. "ESP32-WROOM-32" gives
 * ["esp32", "wroom"].
 */
export function valueSearchTokens(value: string): string[] {
  const tokens = value
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length >= 3);
  return [...new Set(tokens)];
}

function suggestFromValue(index: SymbolIndex, value: string): string[] {
  const tokens = valueSearchTokens(value);
  if (tokens.length === 0) return [];

  const all = index.search(tokens);
  if (all.length > 0) return all;

  return index.search([tokens[0]]);
}

export function candidatesForPart(
  part: Part,
  index: SymbolIndex,
  max = DEFAULT_MAX_CANDIDATES
): string[] {
  const type = part.type.toUpperCase();
  const ref = part.ref.toUpperCase();

  const candidates: string[] = [];
  if (part.symbol && part.symbol.includes(':')) {
    candidates.push(part.symbol);
  }

  if (index.isEmpty) {
    candidates.push(
      index.resolveLibId({ ref: part.ref, type: part.type, preferred: part.symbol, value: part.value })
    );
  } else if (type === 'R' || ref.startsWith('R')) {
    candidates.push(...existing(index, 'Device', ['R']));
  } else if (type === 'C' || ref.startsWith('C')) {
    candidates.push(...existing(index, 'Device', ['C']));
  } else if (type === 'CONN' || type === 'CONNECTOR') {
    candidates.push(
      ...existing(index, 'Connector_Generic', ['Conn_01x02', 'Conn_01x03', 'Conn_01x04', 'Conn_01x06'])
    );
  } else if (type === 'LED' || type === 'D') {
    candidates.push(...existing(index, 'Device', ['LED', 'D']));
  } else if (part.value) {
    candidates.push(...suggestFromValue(index, part.value));
  }

  const result: string[] = [];
  for (const libId of candidates) {
    if (isInvalidLibId(libId) || result.includes(libId)) continue;
    result.push(libId);
    if (result.length >= max) break;
  }

  if (result.length === 0) {
    result.push(customLibId(part.value || ref || 'Unknown'));
  }

  return result;
}

export function candidatesForParts(
  parts: Part[],
  index: SymbolIndex,
  max = DEFAULT_MAX_CANDIDATES
): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const part of parts) {
    out[part.ref] = candidatesForPart(part, index, max);
  }
  return out;
}
