/**
 * Schematic Agent - Domain Types
 */

// ============================================================================
// Circuit (loader output)
// ============================================================================

export type Rotation = 0 | 90 | 180 | 270;

export type Point = [number, number];

export interface Part {
  /** Reference designator, unique within a circuit (e.g. "R1") */
  ref: string;
  /** Part type hint used for symbol choice (R, C, L, LED, D, Q, U, MCU, Conn) */
  type: string;
  /** Preferred symbol, either "Library:Symbol" or a bare symbol name */
  symbol?: string;
  value?: string;
  /** Pin name to net name. An empty net name marks an unconnected pin. */
  pins: Record<string, string>;
  position?: Point;
  rotation: Rotation;
}

export interface Net {
  name: string;
}

export interface Circuit {
  title: string;
  parts: Part[];
  nets: Net[];
}

// ============================================================================
// Design (architect output)
// ============================================================================

/** Axis-aligned box: x, y of the top-left corner, then width and height (mm) */
export type BoundingBox = [number, number, number, number];

export interface PlacedPart {
  ref: string;
  libId: string;
  value?: string;
  position: Point;
  rotation: Rotation;
  pins: Record<string, string>;
  bbox: BoundingBox;
}

export interface Design {
  title: string;
  parts: PlacedPart[];
  nets: string[];
}

// ============================================================================
// Schematic document (writer output)
// ============================================================================

export interface SymbolPin {
  name: string;
  number: string;
  /** Connection point relative to the symbol origin, symbol Y axis up */
  at: Point;
  /** Pin direction in degrees, pointing from the connection point into the body */
  angle: number;
}

export interface LibSymbolDefinition {
  libId: string;
  pins: SymbolPin[];
  halfWidth: number;
  halfHeight: number;
}

export interface PlacedSymbol {
  ref: string;
  libId: string;
  value?: string;
  uuid: string;
  position: Point;
  rotation: Rotation;
}

export interface Wire {
  net: string;
  start: Point;
  end: Point;
  uuid: string;
}

export interface NetLabel {
  net: string;
  at: Point;
  angle: number;
  uuid: string;
}

export interface NoConnect {
  ref: string;
  pin: string;
  at: Point;
  uuid: string;
}

export interface SchematicDocument {
  title: string;
  uuid: string;
  libSymbols: LibSymbolDefinition[];
  symbols: PlacedSymbol[];
  wires: Wire[];
  labels: NetLabel[];
  noConnects: NoConnect[];
  text: string;
}

// ============================================================================
// Validation
// ============================================================================

export type ErcSeverity = 'error' | 'warning' | 'exclusion' | 'info';

export interface ErcFinding {
  severity: ErcSeverity;
  message: string;
  type?: string;
  location?: { x: number; y: number; ref?: string };
}

export interface ErcReport {
  /** false when no compatible KiCad binary was found or its ERC run failed */
  available: boolean;
  binary?: string;
  exitCode?: number;
  violationCount: number;
  findings: ErcFinding[];
  rawOutput?: string;
  /** Set when a binary was found but `sch erc` could not complete */
  error?: string;
}

export type StructuralCheck =
  | 'parse'
  | 'lib-symbols'
  | 'symbol-graphics'
  | 'invalid-lib-id'
  | 'sheet-instances'
  | 'version'
  | 'spacing'
  | 'overlap'
  | 'reference-prefix'
  | 'uuid'
  | 'connectivity';

export interface ValidationIssue {
  check: StructuralCheck;
  severity: 'error' | 'warning';
  message: string;
  refs?: string[];
}

export interface ValidationReport {
  schematicPath: string;
  iterations: number;
  accepted: boolean;
  structural: ValidationIssue[];
  llmIssues: string[];
  erc: ErcReport;
  suggestions: string[];
}
