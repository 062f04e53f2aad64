/**
 * KiCad Symbol Library Index
 *
 * Scans installed `.kicad_sym` libraries and resolves part descriptions to
 * `Library:Symbol` identifiers.
 *
 * @module kicad/symbol-library
 */

import fs from 'fs/promises';
import path from 'path';
import { log, Logger } from '../utils/logger.js';

const SYMBOL_FILE_EXT = '.kicad_sym';

/** Unit sub-symbols such as `R_0_1` live inside their parent definition */
const UNIT_SUFFIX = /_\d+_\d+$/;

const SYMBOL_DECL = /^\s*\(symbol\s+"([^"]+)"/gm;

const libraryLogger: Logger = log.child({ service: 'symbol-library' });

export interface LibIdRequest {
  ref: string;
  type: string;
  preferred?: string;
  value?: string;
}

/**
 * Type hint to standard library candidates, in preference order
 */
const TYPE_CANDIDATES: Record<string, Array<[string, string]>> = {
  R: [['Device', 'R']],
  C: [['Device', 'C']],
  L: [['Device', 'L']],
  LED: [['Device', 'LED']],
  D: [['Device', 'D']],
  Q: [['Device', 'Q_NPN_BCE']],
  CONN: [
    ['Connector_Generic', 'Conn_01x02'],
    ['Connector_Generic', 'Conn_01x03'],
    ['Connector_Generic', 'Conn_01x04'],
  ],
  CONNECTOR: [
    ['Connector_Generic', 'Conn_01x02'],
    ['Connector_Generic', 'Conn_01x03'],
    ['Connector_Generic', 'Conn_01x04'],
  ],
};

/**
 * Build a `Custom:` lib_id for parts with no library match. The symbol
 * definition is embedded in the schematic.
 */
export function customLibId(label: string): string {
  const base = label.trim().replace(/[^A-Za-z0-9_]+/g, '_').slice(0, 48) || 'CustomPart';
  return `Custom:${base}`;
}

export class SymbolIndex {
  private readonly libraries: Map<string, Set<string>>;

  constructor(libraries: Map<string, Set<string>> = new Map()) {
    this.libraries = libraries;
  }

  /** Number of indexed libraries */
  get size(): number {
    return this.libraries.size;
  }

  get isEmpty(): boolean {
    return this.libraries.size === 0;
  }

  has(library: string, symbol: string): boolean {
    return this.libraries.get(library)?.has(symbol) ?? false;
  }

  hasLibId(libId: string): boolean {
    const [library, symbol] = splitLibId(libId);
    return symbol !== '' && this.has(library, symbol);
  }

  /**
   * Symbols whose lowercased name contains every given substring.
   * Results are sorted by library then symbol name.
   */
  search(substrings: string[]): string[] {
    const tokens = substrings.filter(Boolean).map((s) => s.toLowerCase());
    if (tokens.length === 0) return [];

    const results: string[] = [];
    for (const [library, symbols] of this.libraries) {
      for (const name of symbols) {
        const lower = name.toLowerCase();
        if (tokens.every((t) => lower.includes(t))) {
          results.push(`${library}:${name}`);
        }
      }
    }
    return results.sort();
  }

  /**
   * Resolve a part to a lib_id. A preferred value that already names a
   * library is kept. With an empty index the standard library names are
   * trusted; otherwise only symbols that exist are returned.
   */
  resolveLibId(request: LibIdRequest): string {
    const { preferred, type, value, ref } = request;

    if (preferred && preferred.includes(':')) {
      return preferred;
    }

    const candidates: Array<[string, string]> = [...(TYPE_CANDIDATES[type.toUpperCase()] ?? [])];
    if (value) {
      candidates.push(['Device', value], ['Connector_Generic', value]);
    }
    if (preferred) {
      candidates.push(['Device', preferred]);
    }

    if (this.isEmpty) {
      const standard = TYPE_CANDIDATES[type.toUpperCase()];
      if (standard && standard.length > 0) {
        const [library, symbol] = standard[0];
        return `${library}:${symbol}`;
      }
      return customLibId(value || preferred || ref);
    }

    for (const [library, symbol] of candidates) {
      if (this.has(library, symbol)) {
        return `${library}:${symbol}`;
      }
    }

    return customLibId(value || preferred || ref);
  }
}

export function splitLibId(libId: string): [string, string] {
  const idx = libId.indexOf(':');
  if (idx === -1) return ['', libId];
  return [libId.slice(0, idx), libId.slice(idx + 1)];
}

/**
 * Directories that may hold KiCad symbol libraries, most specific first.
 */
export function candidateSymbolDirs(
  explicitDir?: string,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const dirs: string[] = [];
  if (explicitDir) dirs.push(explicitDir);

  for (const base of [env.ProgramFiles, env['ProgramFiles(x86)']]) {
    if (!base) continue;
    for (const version of ['9.0', '8.0', '7.0']) {
      dirs.push(path.join(base, 'KiCad', version, 'share', 'kicad', 'symbols'));
    }
  }

  dirs.push(
    '/usr/share/kicad/symbols',
    '/usr/local/share/kicad/symbols',
    '/Applications/KiCad/KiCad.app/Contents/SharedSupport/symbols'
  );

  return dirs;
}

/**
 * Extract top-level symbol names from `.kicad_sym` text.
 */
export function extractSymbolNames(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(SYMBOL_DECL)) {
    const name = match[1];
    if (!UNIT_SUFFIX.test(name)) {
      names.push(name);
    }
  }
  return names;
}

async function listSymbolFiles(root: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(root, { recursive: true });
    return entries
      .filter((entry) => entry.endsWith(SYMBOL_FILE_EXT))
      .map((entry) => path.join(root, entry));
  } catch {
    // Missing install directories are expected on most hosts
    return [];
  }
}

/**
 * Build a symbol index from the given directories.
 */
export async function indexSymbolLibraries(dirs: string[]): Promise<SymbolIndex> {
  const libraries = new Map<string, Set<string>>();

  for (const dir of dirs) {
    const files = await listSymbolFiles(dir);
    for (const file of files) {
      const nickname = path.basename(file, SYMBOL_FILE_EXT);
      let text: string;
      try {
        text = await fs.readFile(file, 'utf-8');
      } catch (error) {
        libraryLogger.warn('Skipping unreadable symbol library', {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      const symbols = libraries.get(nickname) ?? new Set<string>();
      for (const name of extractSymbolNames(text)) {
        symbols.add(name);
      }
      libraries.set(nickname, symbols);
    }
  }

  libraryLogger.info('Symbol libraries indexed', {
    libraryCount: libraries.size,
    searchedDirs: dirs.length,
  });

  return new SymbolIndex(libraries);
}

const indexCache = new Map<string, Promise<SymbolIndex>>();

/**
 * Load (once per directory list) the symbol index for this host.
 */
export function loadSymbolIndex(explicitDir?: string): Promise<SymbolIndex> {
  const dirs = candidateSymbolDirs(explicitDir);
  const key = dirs.join(path.delimiter);
  let cached = indexCache.get(key);
  if (!cached) {
    cached = indexSymbolLibraries(dirs);
    indexCache.set(key, cached);
  }
  return cached;
}

export function clearSymbolIndexCache(): void {
  indexCache.clear();
}
