/**
 * Schematic Agent - Structural Validator
 *
 * In-process checks over written schematic text: embedded symbols, header,
 * sheet bookkeeping, instance placement and net label connectivity. Every
 * problem is reported as a {@link ValidationIssue}; nothing here throws on
 * bad input.
 *
 * @module validation/structural-validator
 */

import fs from 'fs/promises';
import {
  findAllExpr,
  findDeep,
  findExpr,
  getAt,
  getNumberValue,
  getPoints,
  getProperty,
  getStringValue,
  head,
  parseSExpression,
  SList,
} from '../kicad/sexpr.js';
import { KICAD_SCHEMATIC_VERSION, normalizeRotation } from '../kicad/schematic-writer.js';
import { isInvalidLibId } from '../kicad/symbol-candidates.js';
import { splitLibId } from '../kicad/symbol-library.js';
import { log, Logger } from '../utils/logger.js';
import type { Circuit, Rotation, ValidationIssue } from '../types/index.js';

const validatorLogger: Logger = log.child({ service: 'structural-validator' });

export const DEFAULT_MIN_SPACING_MM = 20;

const GRAPHIC_KEYWORDS = ['rectangle', 'polyline', 'circle', 'arc'];

export interface StructuralValidationOptions {
  /** Source circuit, enables the unused-net and missing-instance checks */
  circuit?: Circuit;
  minSpacing?: number;
}

interface LocalBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

interface PlacedInstance {
  ref: string;
  libId: string;
  x: number;
  y: number;
  rotation: Rotation;
  hasUuid: boolean;
}

type Box = [number, number, number, number];

// ============================================================================
// Extraction
// ============================================================================

function extractInstances(root: SList): PlacedInstance[] {
  const instances: PlacedInstance[] = [];
  for (const symbol of findAllExpr(root, 'symbol')) {
    const libId = getStringValue(symbol, 'lib_id');
    if (!libId) continue;
    const at = getAt(symbol) ?? { x: 0, y: 0, angle: 0 };
    instances.push({
      ref: getProperty(symbol, 'Reference') ?? '?',
      libId,
      x: at.x,
      y: at.y,
      rotation: normalizeRotation(at.angle),
      hasUuid: getStringValue(symbol, 'uuid') !== undefined,
    });
  }
  return instances;
}

/**
 * Local bounds of an embedded symbol from its body graphics and pin
 * endpoints, symbol Y axis up.
 */
function symbolBounds(def: SList): LocalBounds | undefined {
  const xs: number[] = [];
  const ys: number[] = [];

  for (const keyword of GRAPHIC_KEYWORDS) {
    for (const shape of findDeep(def, keyword)) {
      for (const key of ['start', 'end', 'center', 'mid']) {
        const point = findExpr(shape, key);
        if (point) {
          xs.push(Number(point[1]));
          ys.push(Number(point[2]));
        }
      }
      for (const [x, y] of getPoints(shape)) {
        xs.push(x);
        ys.push(y);
      }
    }
  }
  for (const pin of findDeep(def, 'pin')) {
    const at = getAt(pin);
    if (at) {
      xs.push(at.x);
      ys.push(at.y);
    }
  }

  const finiteXs = xs.filter(Number.isFinite);
  const finiteYs = ys.filter(Number.isFinite);
  if (finiteXs.length === 0 || finiteYs.length === 0) return undefined;

  return {
    minX: Math.min(...finiteXs),
    maxX: Math.max(...finiteXs),
    minY: Math.min(...finiteYs),
    maxY: Math.max(...finiteYs),
  };
}

function sheetBox(bounds: LocalBounds, inst: PlacedInstance): Box {
  const corners: Array<[number, number]> = [
    [bounds.minX, bounds.minY],
    [bounds.minX, bounds.maxY],
    [bounds.maxX, bounds.minY],
    [bounds.maxX, bounds.maxY],
  ].map(([x, y]): [number, number] => {
    switch (inst.rotation) {
      case 90:
        return [-y, x];
      case 180:
        return [-x, -y];
      case 270:
        return [y, -x];
      default:
        return [x, y];
    }
  });

  const sx = corners.map(([x]) => inst.x + x);
  const sy = corners.map(([, y]) => inst.y - y);
  const minX = Math.min(...sx);
  const minY = Math.min(...sy);
  return [minX, minY, Math.max(...sx) - minX, Math.max(...sy) - minY];
}

export function boxesOverlap(a: Box, b: Box): boolean {
  return a[0] < b[0] + b[2] && b[0] < a[0] + a[2] && a[1] < b[1] + b[3] && b[1] < a[1] + a[3];
}

/**
 * Expected reference prefix for a lib_id. Undefined for `Custom:` symbols,
 * whose names come from free-form part values, so any prefix is accepted.
 */
export function expectedReferencePrefix(libId: string): string | undefined {
  const lower = libId.toLowerCase();
  const [library, symbol] = splitLibId(lower);
  if (library === 'custom') return undefined;

  if (lower.includes('connector') || symbol.startsWith('conn')) return 'J';
  if (lower.includes('switch') || symbol.startsWith('sw') || lower.includes('button')) return 'S';
  if (lower.includes('led') || lower.includes('diode')) return 'D';
  if (['crystal', 'xtal', 'osc', 'resonator'].some((k) => lower.includes(k))) return 'Y';
  if (['transistor', 'mosfet', 'bjt'].some((k) => lower.includes(k))) return 'Q';
  if (lower.includes('resistor')) return 'R';
  if (lower.includes('capacitor')) return 'C';
  if (lower.includes('inductor')) return 'L';
  if (library === 'device') {
    const first = symbol.charAt(0).toUpperCase();
    if (['R', 'C', 'L', 'D', 'Q'].includes(first)) return first;
  }
  return 'U';
}

// ============================================================================
// Checks
// ============================================================================

function checkHeader(root: SList, issues: ValidationIssue[]): void {
  const version = getNumberValue(root, 'version');
  if (version !== KICAD_SCHEMATIC_VERSION) {
    issues.push({
      check: 'version',
      severity: 'error',
      message: `Header version is ${version ?? 'missing'}, expected ${KICAD_SCHEMATIC_VERSION} (KiCad 9)`,
    });
  }
  if (!findExpr(root, 'sheet_instances')) {
    issues.push({
      check: 'sheet-instances',
      severity: 'error',
      message: 'Missing (sheet_instances ...) block',
    });
  }
}

function checkLibSymbols(
  root: SList,
  instances: PlacedInstance[],
  issues: ValidationIssue[]
): Map<string, SList> {
  const defs = new Map<string, SList>();
  const libSymbols = findExpr(root, 'lib_symbols');
  const usedLibIds = [...new Set(instances.map((i) => i.libId))].sort();

  if (!libSymbols) {
    if (usedLibIds.length > 0) {
      issues.push({
        check: 'lib-symbols',
        severity: 'error',
        message: `No (lib_symbols ...) block; embed definitions for: ${usedLibIds.slice(0, 20).join(', ')}`,
      });
    }
    return defs;
  }

  for (const def of findAllExpr(libSymbols, 'symbol')) {
    const name = def[1];
    if (typeof name === 'string') defs.set(name, def);
  }

  const missing = usedLibIds.filter((id) => !defs.has(id));
  if (missing.length > 0) {
    issues.push({
      check: 'lib-symbols',
      severity: 'error',
      message: `Symbols used but not embedded: ${missing.join(', ')}`,
    });
  }

  for (const [name, def] of defs) {
    const hasGraphics = GRAPHIC_KEYWORDS.some((k) => findDeep(def, k).length > 0);
    if (!hasGraphics) {
      issues.push({
        check: 'symbol-graphics',
        severity: 'error',
        message: `Embedded symbol ${name} has no body graphics (rectangle/polyline)`,
      });
    }
    if (findDeep(def, 'pin').length === 0) {
      issues.push({
        check: 'symbol-graphics',
        severity: 'warning',
        message: `Embedded symbol ${name} has no pins`,
      });
    }
  }

  return defs;
}

function checkInstances(
  instances: PlacedInstance[],
  defs: Map<string, SList>,
  minSpacing: number,
  issues: ValidationIssue[]
): void {
  const invalid = [...new Set(instances.filter((i) => isInvalidLibId(i.libId)).map((i) => i.libId))];
  if (invalid.length > 0) {
    issues.push({
      check: 'invalid-lib-id',
      severity: 'error',
      message: `Invalid lib_id(s): ${invalid.sort().join(', ')}`,
      refs: instances.filter((i) => isInvalidLibId(i.libId)).map((i) => i.ref),
    });
  }

  for (const inst of instances) {
    if (!inst.hasUuid) {
      issues.push({
        check: 'uuid',
        severity: 'error',
        message: `Placed instance ${inst.ref} is missing (uuid ...)`,
        refs: [inst.ref],
      });
    }

    const prefix = expectedReferencePrefix(inst.libId);
    if (prefix && !inst.ref.toUpperCase().startsWith(prefix)) {
      issues.push({
        check: 'reference-prefix',
        severity: 'error',
        message: `Reference prefix mismatch for ${inst.ref}: expected '${prefix}' for ${inst.libId}`,
        refs: [inst.ref],
      });
    }
  }

  const boxes = instances.map((inst) => {
    const def = defs.get(inst.libId);
    const bounds = def ? symbolBounds(def) : undefined;
    return bounds ? sheetBox(bounds, inst) : undefined;
  });

  for (let i = 0; i < instances.length; i++) {
    for (let j = i + 1; j < instances.length; j++) {
      const a = instances[i];
      const b = instances[j];
      const distance = Math.hypot(a.x - b.x, a.y - b.y);
      if (distance < minSpacing) {
        issues.push({
          check: 'spacing',
          severity: 'error',
          message: `Placed instances too close: ${a.ref} and ${b.ref} (${distance.toFixed(2)} mm, minimum ${minSpacing} mm)`,
          refs: [a.ref, b.ref],
        });
      }

      const boxA = boxes[i];
      const boxB = boxes[j];
      if (boxA && boxB && boxesOverlap(boxA, boxB)) {
        issues.push({
          check: 'overlap',
          severity: 'error',
          message: `Bounding boxes overlap: ${a.ref} and ${b.ref}`,
          refs: [a.ref, b.ref],
        });
      }
    }
  }
}

function checkConnectivity(
  root: SList,
  instances: PlacedInstance[],
  circuit: Circuit | undefined,
  issues: ValidationIssue[]
): void {
  const labelCounts = new Map<string, number>();
  for (const keyword of ['label', 'global_label', 'hierarchical_label']) {
    for (const label of findAllExpr(root, keyword)) {
      const name = label[1];
      if (typeof name === 'string') {
        labelCounts.set(name, (labelCounts.get(name) ?? 0) + 1);
      }
    }
  }

  for (const [net, count] of labelCounts) {
    if (count === 1) {
      issues.push({
        check: 'connectivity',
        severity: 'warning',
        message: `Net '${net}' has a single label and connects nothing`,
      });
    }
  }

  if (!circuit) return;

  const declared = new Set(circuit.nets.map((n) => n.name));
  for (const net of labelCounts.keys()) {
    if (!declared.has(net)) {
      issues.push({
        check: 'connectivity',
        severity: 'warning',
        message: `Label references unknown net '${net}'`,
      });
    }
  }

  for (const net of circuit.nets) {
    if (!labelCounts.has(net.name)) {
      issues.push({
        check: 'connectivity',
        severity: 'warning',
        message: `Net '${net.name}' is not used by any label`,
      });
    }
  }

  const placed = new Set(instances.map((i) => i.ref));
  const missing = circuit.parts.map((p) => p.ref).filter((ref) => !placed.has(ref));
  if (missing.length > 0) {
    issues.push({
      check: 'connectivity',
      severity: 'error',
      message: `Missing placed instances for refs: ${missing.join(', ')}`,
      refs: missing,
    });
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all structural checks on schematic text.
 */
export function validateSchematicText(
  text: string,
  options: StructuralValidationOptions = {}
): ValidationIssue[] {
  let root: SList;
  try {
    root = parseSExpression(text);
  } catch (error) {
    return [
      {
        check: 'parse',
        severity: 'error',
        message: error instanceof Error ? error.message : String(error),
      },
    ];
  }

  if (head(root) !== 'kicad_sch') {
    return [
      {
        check: 'parse',
        severity: 'error',
        message: `Top-level expression is (${head(root) ?? ''} ...), expected (kicad_sch ...)`,
      },
    ];
  }

  const issues: ValidationIssue[] = [];
  const instances = extractInstances(root);

  checkHeader(root, issues);
  const defs = checkLibSymbols(root, instances, issues);
  checkInstances(instances, defs, options.minSpacing ?? DEFAULT_MIN_SPACING_MM, issues);
  checkConnectivity(root, instances, options.circuit, issues);

  validatorLogger.debug('Structural validation complete', {
    instanceCount: instances.length,
    errorCount: issues.filter((i) => i.severity === 'error').length,
    warningCount: issues.filter((i) => i.severity === 'warning').length,
  });

  return issues;
}

/**
 * Read and validate a schematic file. An unreadable file is a `parse` issue.
 */
export async function validateSchematicFile(
  filePath: string,
  options: StructuralValidationOptions = {}
): Promise<ValidationIssue[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return [{ check: 'parse', severity: 'error', message: `Cannot read schematic file ${filePath}: ${reason}` }];
  }
  return validateSchematicText(text, options);
}

export function hasBlockingIssues(issues: ValidationIssue[]): boolean {
  return issues.some((i) => i.severity === 'error');
}

export function formatIssue(issue: ValidationIssue): string {
  return `[${issue.check}] ${issue.message}`;
}
