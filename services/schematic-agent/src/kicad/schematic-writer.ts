/**
 * Schematic Agent - KiCad Schematic Writer
 *
 * Serializes a placed {@link Design} into KiCad 9 schematic S-expression
 * text. Output is a pure function of the design: UUIDs are name-based and
 * nothing time-dependent is written, so regenerating an unchanged design
 * yields byte-identical text.
 *
 * Every unique lib_id gets a generic embedded symbol (rectangle body, pins
 * alternating left/right). Connected pins get a short wire stub ending in a
 * local net label; unconnected pins get a no-connect flag.
 *
 * @module kicad/schematic-writer
 */

import fs from 'fs/promises';
import path from 'path';
import { v5 as uuidv5 } from 'uuid';
import { SchematicWriteError } from '../utils/errors.js';
import { log, Logger } from '../utils/logger.js';
import type {
  Design,
  LibSymbolDefinition,
  NetLabel,
  NoConnect,
  PlacedPart,
  PlacedSymbol,
  Point,
  Rotation,
  SchematicDocument,
  SymbolPin,
  Wire,
} from '../types/index.js';
import { splitLibId } from './symbol-library.js';

// ============================================================================
// Constants
// ============================================================================

export const KICAD_SCHEMATIC_VERSION = 20250114;
const GENERATOR_NAME = 'eeschema';
const GENERATOR_VERSION = '9.0';

/** Fixed namespace for name-based UUIDs */
const UUID_NAMESPACE = '6f1c2b9e-4d3a-5e8f-9a7b-2c1d0e3f4a5b';

export const PIN_PITCH = 2.54;
export const PIN_LENGTH = 2.54;
export const BODY_HALF_WIDTH = 5.08;
const MIN_BODY_HALF_HEIGHT = 2.54;
const STUB_LENGTH = 2.54;

const writerLogger: Logger = log.child({ service: 'schematic-writer' });

// ============================================================================
// Geometry
// ============================================================================

/** Stable UUID for a name within a schematic. Names are JSON-encoded so no separator can collide. */
export function stableUuid(...parts: string[]): string {
  return uuidv5(JSON.stringify(parts), UUID_NAMESPACE);
}

/** Format a coordinate: at most 4 decimals, no negative zero */
export function fmt(n: number): string {
  const rounded = Math.round(n * 10000) / 10000;
  return rounded === 0 ? '0' : String(rounded);
}

/**
 * Lay out a generic symbol for the given pin names.
 */
export function layoutLibSymbol(libId: string, pinNames: string[]): LibSymbolDefinition {
  const rows = Math.max(1, Math.ceil(pinNames.length / 2));
  const halfHeight = Math.max(MIN_BODY_HALF_HEIGHT, (rows * PIN_PITCH) / 2);
  const top = ((rows - 1) * PIN_PITCH) / 2;
  const pinX = BODY_HALF_WIDTH + PIN_LENGTH;

  const pins: SymbolPin[] = pinNames.map((name, i) => {
    const left = i % 2 === 0;
    const row = Math.floor(i / 2);
    return {
      name,
      number: name,
      at: [left ? -pinX : pinX, top - row * PIN_PITCH],
      angle: left ? 0 : 180,
    };
  });

  return { libId, pins, halfWidth: BODY_HALF_WIDTH, halfHeight };
}

/** Snap an angle in degrees to the nearest quarter turn */
export function normalizeRotation(angle: number): Rotation {
  const normalized = (((Math.round(angle / 90) * 90) % 360) + 360) % 360;
  switch (normalized) {
    case 90:
      return 90;
    case 180:
      return 180;
    case 270:
      return 270;
    default:
      return 0;
  }
}

/** Rotate a symbol-space vector counter-clockwise (symbol Y axis up) */
function rotateVector([x, y]: Point, rotation: Rotation): Point {
  switch (rotation) {
    case 90:
      return [-y, x];
    case 180:
      return [-x, -y];
    case 270:
      return [y, -x];
    default:
      return [x, y];
  }
}

/**
 * Sheet position of a symbol-space point on a placed symbol. Sheet Y grows
 * downward.
 */
export function toSheet(origin: Point, local: Point, rotation: Rotation): Point {
  const [dx, dy] = rotateVector(local, rotation);
  return [origin[0] + dx, origin[1] - dy];
}

/** Unit vector (sheet space) pointing from a pin away from its body */
function outwardDirection(pin: SymbolPin, rotation: Rotation): Point {
  const rad = (pin.angle * Math.PI) / 180;
  const [dx, dy] = rotateVector([-Math.round(Math.cos(rad)), -Math.round(Math.sin(rad))], rotation);
  return [dx, -dy];
}

function labelAngle([dx, dy]: Point): number {
  if (dx > 0) return 0;
  if (dx < 0) return 180;
  return dy < 0 ? 90 : 270;
}

/**
 * Extent of a placed symbol in sheet space (body plus pins), as
 * `[x, y, width, height]` with x, y the top-left corner.
 */
export function placedExtent(
  def: Pick<LibSymbolDefinition, 'halfWidth' | 'halfHeight'>,
  position: Point,
  rotation: Rotation
): [number, number, number, number] {
  let w = (def.halfWidth + PIN_LENGTH) * 2;
  let h = def.halfHeight * 2;
  if (rotation === 90 || rotation === 270) {
    [w, h] = [h, w];
  }
  return [position[0] - w / 2, position[1] - h / 2, w, h];
}

// ============================================================================
// Document model
// ============================================================================

/**
 * Collect lib symbol definitions. Pins are the union of pin names across
 * all parts sharing a lib_id, in first-appearance order.
 */
export function collectLibSymbols(parts: PlacedPart[]): Map<string, LibSymbolDefinition> {
  const pinNames = new Map<string, string[]>();
  for (const part of parts) {
    const names = pinNames.get(part.libId) ?? [];
    for (const pin of Object.keys(part.pins)) {
      if (!names.includes(pin)) names.push(pin);
    }
    pinNames.set(part.libId, names);
  }

  const defs = new Map<string, LibSymbolDefinition>();
  for (const [libId, names] of pinNames) {
    defs.set(libId, layoutLibSymbol(libId, names));
  }
  return defs;
}

function buildDocumentModel(design: Design): Omit<SchematicDocument, 'text'> {
  const title = design.title;
  const libSymbols = collectLibSymbols(design.parts);

  const symbols: PlacedSymbol[] = [];
  const wires: Wire[] = [];
  const labels: NetLabel[] = [];
  const noConnects: NoConnect[] = [];

  for (const part of design.parts) {
    symbols.push({
      ref: part.ref,
      libId: part.libId,
      value: part.value,
      uuid: stableUuid(title, 'symbol', part.ref),
      position: part.position,
      rotation: part.rotation,
    });

    const def = libSymbols.get(part.libId);
    if (!def) continue;

    for (const pin of def.pins) {
      const at = toSheet(part.position, pin.at, part.rotation);
      const net = part.pins[pin.name];

      if (!net) {
        noConnects.push({
          ref: part.ref,
          pin: pin.name,
          at,
          uuid: stableUuid(title, 'no_connect', part.ref, pin.name),
        });
        continue;
      }

      const dir = outwardDirection(pin, part.rotation);
      const end: Point = [at[0] + dir[0] * STUB_LENGTH, at[1] + dir[1] * STUB_LENGTH];
      wires.push({ net, start: at, end, uuid: stableUuid(title, 'wire', part.ref, pin.name) });
      labels.push({
        net,
        at: end,
        angle: labelAngle(dir),
        uuid: stableUuid(title, 'label', part.ref, pin.name),
      });
    }
  }

  return {
    title,
    uuid: stableUuid(title),
    libSymbols: [...libSymbols.values()],
    symbols,
    wires,
    labels,
    noConnects,
  };
}

// ============================================================================
// S-expression builders
// ============================================================================

/**
 * Escape special characters in strings for S-expression
 */
export function escapeString(str: string): string {
  return str
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

function font(indent: string, hide = false): string {
  return `${indent}(effects
${indent}  (font
${indent}    (size 1.27 1.27)
${indent}  )${hide ? `\n${indent}  (hide yes)` : ''}
${indent})`;
}

function buildTitleBlock(title: string): string {
  return `  (title_block
    (title "${escapeString(title)}")
    (rev "1")
  )`;
}

function referencePrefix(ref: string): string {
  return ref.replace(/[0-9?]+$/, '') || 'U';
}

function buildPin(pin: SymbolPin): string {
  return `        (pin passive line
          (at ${fmt(pin.at[0])} ${fmt(pin.at[1])} ${pin.angle})
          (length ${fmt(PIN_LENGTH)})
          (name "${escapeString(pin.name)}"
${font('            ')}
          )
          (number "${escapeString(pin.number)}"
${font('            ')}
          )
        )`;
}

function buildLibSymbol(def: LibSymbolDefinition, refPrefix: string): string {
  const [, symbolName] = splitLibId(def.libId);
  const unitName = escapeString(symbolName);

  return `    (symbol "${escapeString(def.libId)}"
      (pin_names
        (offset 1.016)
      )
      (exclude_from_sim no)
      (in_bom yes)
      (on_board yes)
      (property "Reference" "${escapeString(refPrefix)}"
        (at 0 ${fmt(def.halfHeight + 1.27)} 0)
${font('        ')}
      )
      (property "Value" "${unitName}"
        (at 0 ${fmt(-def.halfHeight - 1.27)} 0)
${font('        ')}
      )
      (property "Footprint" ""
        (at 0 0 0)
${font('        ', true)}
      )
      (property "Datasheet" ""
        (at 0 0 0)
${font('        ', true)}
      )
      (symbol "${unitName}_0_1"
        (rectangle
          (start ${fmt(-def.halfWidth)} ${fmt(def.halfHeight)})
          (end ${fmt(def.halfWidth)} ${fmt(-def.halfHeight)})
          (stroke
            (width 0.254)
            (type default)
          )
          (fill
            (type background)
          )
        )
      )
      (symbol "${unitName}_1_1"
${def.pins.map(buildPin).join('\n')}
      )
    )`;
}

function buildLibSymbols(defs: LibSymbolDefinition[], parts: PlacedPart[]): string {
  if (defs.length === 0) {
    return '  (lib_symbols)';
  }

  const lines: string[] = ['  (lib_symbols'];
  for (const def of defs) {
    const firstUser = parts.find((p) => p.libId === def.libId);
    lines.push(buildLibSymbol(def, referencePrefix(firstUser?.ref ?? 'U')));
  }
  lines.push('  )');
  return lines.join('\n');
}

function buildSymbolInstance(
  symbol: PlacedSymbol,
  def: LibSymbolDefinition | undefined,
  title: string,
  rootUuid: string
): string {
  const [x, y] = symbol.position;
  const pinEntries = (def?.pins ?? [])
    .map(
      (pin) => `    (pin "${escapeString(pin.number)}"
      (uuid "${stableUuid(title, 'pin', symbol.ref, pin.number)}")
    )`
    )
    .join('\n');

  return `  (symbol
    (lib_id "${escapeString(symbol.libId)}")
    (at ${fmt(x)} ${fmt(y)} ${symbol.rotation})
    (unit 1)
    (exclude_from_sim no)
    (in_bom yes)
    (on_board yes)
    (dnp no)
    (uuid "${symbol.uuid}")
    (property "Reference" "${escapeString(symbol.ref)}"
      (at ${fmt(x)} ${fmt(y - (def?.halfHeight ?? 2.54) - 1.27)} 0)
${font('      ')}
    )
    (property "Value" "${escapeString(symbol.value ?? '')}"
      (at ${fmt(x)} ${fmt(y + (def?.halfHeight ?? 2.54) + 1.27)} 0)
${font('      ')}
    )
    (property "Footprint" ""
      (at ${fmt(x)} ${fmt(y)} 0)
${font('      ', true)}
    )
    (property "Datasheet" ""
      (at ${fmt(x)} ${fmt(y)} 0)
${font('      ', true)}
    )
${pinEntries ? `${pinEntries}\n` : ''}    (instances
      (project "${escapeString(title)}"
        (path "/${rootUuid}"
          (reference "${escapeString(symbol.ref)}")
          (unit 1)
        )
      )
    )
  )`;
}

function buildWire(wire: Wire): string {
  return `  (wire
    (pts
      (xy ${fmt(wire.start[0])} ${fmt(wire.start[1])}) (xy ${fmt(wire.end[0])} ${fmt(wire.end[1])})
    )
    (stroke
      (width 0)
      (type default)
    )
    (uuid "${wire.uuid}")
  )`;
}

function buildLabel(label: NetLabel): string {
  const justify = label.angle === 180 || label.angle === 270 ? 'right bottom' : 'left bottom';
  return `  (label "${escapeString(label.net)}"
    (at ${fmt(label.at[0])} ${fmt(label.at[1])} ${label.angle})
    (effects
      (font
        (size 1.27 1.27)
      )
      (justify ${justify})
    )
    (uuid "${label.uuid}")
  )`;
}

function buildNoConnect(nc: NoConnect): string {
  return `  (no_connect
    (at ${fmt(nc.at[0])} ${fmt(nc.at[1])})
    (uuid "${nc.uuid}")
  )`;
}

function buildSheetInstances(): string {
  return `  (sheet_instances
    (path "/"
      (page "1")
    )
  )`;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Render a design to schematic text.
 */
export function renderSchematic(design: Design): SchematicDocument {
  const model = buildDocumentModel(design);
  const defsById = new Map(model.libSymbols.map((d) => [d.libId, d]));

  const sections = [
    `(kicad_sch
  (version ${KICAD_SCHEMATIC_VERSION})
  (generator "${GENERATOR_NAME}")
  (generator_version "${GENERATOR_VERSION}")
  (uuid "${model.uuid}")
  (paper "A4")`,
    buildTitleBlock(model.title),
    buildLibSymbols(model.libSymbols, design.parts),
    ...model.symbols.map((s) => buildSymbolInstance(s, defsById.get(s.libId), model.title, model.uuid)),
    ...model.wires.map(buildWire),
    ...model.labels.map(buildLabel),
    ...model.noConnects.map(buildNoConnect),
    buildSheetInstances(),
    '  (embedded_fonts no)',
    ')',
  ];

  return { ...model, text: `${sections.join('\n')}\n` };
}

/**
 * Minimal valid schematic with no symbols
 */
export function seedSchematic(title: string): string {
  return renderSchematic({ title, parts: [], nets: [] }).text;
}

/**
 * Write schematic text, creating the parent directory.
 */
export async function writeSchematicText(text: string, outPath: string): Promise<string> {
  const resolved = path.resolve(outPath);
  try {
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, text, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchematicWriteError(`Cannot write schematic to ${resolved}: ${reason}`, resolved, {
      operation: 'writeSchematic',
    });
  }

  writerLogger.debug('Schematic written', { outputPath: resolved, bytes: Buffer.byteLength(text) });
  return resolved;
}

/**
 * Render and write a design.
 */
export async function writeSchematic(
  design: Design,
  outPath: string
): Promise<SchematicDocument & { path: string }> {
  const doc = renderSchematic(design);
  const written = await writeSchematicText(doc.text, outPath);

  writerLogger.info('Schematic generated', {
    title: design.title,
    symbolCount: doc.symbols.length,
    wireCount: doc.wires.length,
    labelCount: doc.labels.length,
    noConnectCount: doc.noConnects.length,
  });

  return { ...doc, path: written };
}

/**
 * Schematic file name for a title: non-alphanumerics collapse to `_`.
 */
export function schematicFileName(title: string): string {
  const base = title.trim().replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return `${base || 'schematic'}.kicad_sch`;
}
