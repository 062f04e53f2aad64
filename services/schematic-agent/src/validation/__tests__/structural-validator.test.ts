import { describe, it, expect } from 'vitest';
import os from 'os';
import path from 'path';
import { renderSchematic } from '../../kicad/schematic-writer.js';
import {
  boxesOverlap,
  expectedReferencePrefix,
  formatIssue,
  hasBlockingIssues,
  validateSchematicFile,
  validateSchematicText,
} from '../structural-validator.js';
import type { Circuit, Design, PlacedPart, ValidationIssue } from '../../types/index.js';

function placed(overrides: Partial<PlacedPart> & { ref: string; libId: string }): PlacedPart {
  return { position: [50, 50], rotation: 0, pins: {}, bbox: [0, 0, 0, 0], ...overrides };
}

const LED_CIRCUIT: Circuit = {
  title: 'LED Indicator',
  parts: [
    { ref: 'J1', type: 'Conn', pins: { '1': 'VCC', '2': 'GND' }, rotation: 0 },
    { ref: 'R1', type: 'R', pins: { '1': 'VCC', '2': 'LED_A' }, rotation: 0 },
    { ref: 'D1', type: 'LED', pins: { A: 'LED_A', K: 'GND' }, rotation: 0 },
  ],
  nets: [{ name: 'VCC' }, { name: 'GND' }, { name: 'LED_A' }],
};

function ledDesign(): Design {
  return {
    title: 'LED Indicator',
    nets: ['VCC', 'GND', 'LED_A'],
    parts: [
      placed({ ref: 'J1', libId: 'Connector_Generic:Conn_01x02', position: [50, 50], pins: { '1': 'VCC', '2': 'GND' } }),
      placed({ ref: 'R1', libId: 'Device:R', position: [80, 50], pins: { '1': 'VCC', '2': 'LED_A' } }),
      placed({ ref: 'D1', libId: 'Device:LED', position: [110, 50], pins: { A: 'LED_A', K: 'GND' } }),
    ],
  };
}

function checks(issues: ValidationIssue[]): string[] {
  return issues.map((i) => `${i.severity}:${i.check}`);
}

describe('validateSchematicText', () => {
  it('accepts a well-spaced rendered design', () => {
    const text = renderSchematic(ledDesign()).text;
    expect(validateSchematicText(text, { circuit: LED_CIRCUIT })).toEqual([]);
  });

  it('reports instances placed too close and overlapping', () => {
    const text = renderSchematic({
      title: 'Tight',
      nets: ['N'],
      parts: [
        placed({ ref: 'R1', libId: 'Device:R', position: [50, 50], pins: { '1': 'N', '2': 'N' } }),
        placed({ ref: 'R2', libId: 'Device:R', position: [60, 50], pins: { '1': 'N', '2': 'N' } }),
      ],
    }).text;

    expect(validateSchematicText(text)).toEqual([
      {
        check: 'spacing',
        severity: 'error',
        message: 'Placed instances too close: R1 and R2 (10.00 mm, minimum 20 mm)',
        refs: ['R1', 'R2'],
      },
      {
        check: 'overlap',
        severity: 'error',
        message: 'Bounding boxes overlap: R1 and R2',
        refs: ['R1', 'R2'],
      },
    ]);
  });

  it('honours a custom minimum spacing', () => {
    const text = renderSchematic(ledDesign()).text;
    const issues = validateSchematicText(text, { minSpacing: 31 });
    expect(issues.filter((i) => i.check === 'spacing').map((i) => i.refs)).toEqual([
      ['J1', 'R1'],
      ['R1', 'D1'],
    ]);
  });

  it('flags reference prefixes that disagree with the symbol', () => {
    const text = renderSchematic({
      title: 'Prefix',
      nets: ['A'],
      parts: [placed({ ref: 'U1', libId: 'Device:R', pins: { '1': 'A', '2': 'A' } })],
    }).text;

    expect(validateSchematicText(text)).toEqual([
      {
        check: 'reference-prefix',
        severity: 'error',
        message: "Reference prefix mismatch for U1: expected 'R' for Device:R",
        refs: ['U1'],
      },
    ]);
  });

  it('flags lib_ids that never name a real symbol', () => {
    const text = renderSchematic({
      title: 'Invalid',
      nets: ['A'],
      parts: [placed({ ref: 'U1', libId: 'Device:U', pins: { '1': 'A', '2': 'A' } })],
    }).text;

    expect(validateSchematicText(text)).toEqual([
      { check: 'invalid-lib-id', severity: 'error', message: 'Invalid lib_id(s): Device:U', refs: ['U1'] },
    ]);
  });

  it('checks the header version and sheet instances', () => {
    expect(validateSchematicText('(kicad_sch (version 20230121) (lib_symbols))')).toEqual([
      {
        check: 'version',
        severity: 'error',
        message: 'Header version is 20230121, expected 20250114 (KiCad 9)',
      },
      { check: 'sheet-instances', severity: 'error', message: 'Missing (sheet_instances ...) block' },
    ]);
  });

  it('requires embedded definitions for every used lib_id', () => {
    const text = `(kicad_sch (version 20250114) (lib_symbols)
  (symbol (lib_id "Device:R") (at 10 10 0) (uuid "u-1") (property "Reference" "R1" (at 0 0 0)))
  (sheet_instances (path "/" (page "1"))))`;

    expect(validateSchematicText(text)).toEqual([
      { check: 'lib-symbols', severity: 'error', message: 'Symbols used but not embedded: Device:R' },
    ]);
  });

  it('reports a missing lib_symbols block', () => {
    const text = `(kicad_sch (version 20250114)
  (symbol (lib_id "Device:R") (at 10 10 0) (uuid "u-1") (property "Reference" "R1" (at 0 0 0)))
  (sheet_instances (path "/" (page "1"))))`;

    expect(validateSchematicText(text).map((i) => i.message)).toEqual([
      'No (lib_symbols ...) block; embed definitions for: Device:R',
    ]);
  });

  it('flags embedded symbols without graphics and instances without uuid', () => {
    const text = `(kicad_sch (version 20250114)
  (lib_symbols (symbol "Device:R" (symbol "R_1_1" (pin passive line (at 0 3.81 270) (length 1.27)))))
  (symbol (lib_id "Device:R") (at 10 10 0) (property "Reference" "R1" (at 0 0 0)))
  (sheet_instances (path "/" (page "1"))))`;

    expect(validateSchematicText(text)).toEqual([
      {
        check: 'symbol-graphics',
        severity: 'error',
        message: 'Embedded symbol Device:R has no body graphics (rectangle/polyline)',
      },
      { check: 'uuid', severity: 'error', message: 'Placed instance R1 is missing (uuid ...)', refs: ['R1'] },
    ]);
  });

  it('reports net label connectivity against the circuit', () => {
    const circuit: Circuit = {
      title: 'Conn',
      parts: [
        { ref: 'R1', type: 'R', pins: { '1': 'VCC', '2': 'GND' }, rotation: 0 },
        { ref: 'R2', type: 'R', pins: { '1': 'VCC', '2': 'GND' }, rotation: 0 },
      ],
      nets: [{ name: 'VCC' }, { name: 'GND' }],
    };
    const text = renderSchematic({
      title: 'Conn',
      nets: ['VCC', 'FOO'],
      parts: [placed({ ref: 'R1', libId: 'Device:R', pins: { '1': 'VCC', '2': 'FOO' } })],
    }).text;

    const issues = validateSchematicText(text, { circuit });
    expect(issues.map((i) => i.message)).toEqual([
      "Net 'VCC' has a single label and connects nothing",
      "Net 'FOO' has a single label and connects nothing",
      "Label references unknown net 'FOO'",
      "Net 'GND' is not used by any label",
      'Missing placed instances for refs: R2',
    ]);
    expect(checks(issues)).toEqual([
      'warning:connectivity',
      'warning:connectivity',
      'warning:connectivity',
      'warning:connectivity',
      'error:connectivity',
    ]);
  });

  it('reports parse failures as a single issue', () => {
    expect(validateSchematicText('(kicad_sch (version 20250114)')).toEqual([
      { check: 'parse', severity: 'error', message: 'S-expression syntax error at offset 0: unclosed list' },
    ]);
    expect(validateSchematicText('(kicad_pcb (version 20240108))')).toEqual([
      { check: 'parse', severity: 'error', message: 'Top-level expression is (kicad_pcb ...), expected (kicad_sch ...)' },
    ]);
  });
});

describe('validateSchematicFile', () => {
  it('turns an unreadable file into a parse issue', async () => {
    const missing = path.join(os.tmpdir(), 'no-such-dir-for-validator', 'x.kicad_sch');
    const issues = await validateSchematicFile(missing);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.check).toBe('parse');
    expect(issues[0]?.message.startsWith(`Cannot read schematic file ${missing}: `)).toBe(true);
  });
});

describe('helpers', () => {
  it('maps lib_ids to reference prefixes', () => {
    expect(expectedReferencePrefix('Connector_Generic:Conn_01x02')).toBe('J');
    expect(expectedReferencePrefix('Switch:SW_Push')).toBe('S');
    expect(expectedReferencePrefix('Device:LED')).toBe('D');
    expect(expectedReferencePrefix('Device:Crystal')).toBe('Y');
    expect(expectedReferencePrefix('Transistor_FET:2N7002')).toBe('Q');
    expect(expectedReferencePrefix('Device:C')).toBe('C');
    expect(expectedReferencePrefix('Device:L')).toBe('L');
    expect(expectedReferencePrefix('MCU_Espressif:ESP32-WROOM-32')).toBe('U');
    expect(expectedReferencePrefix('Custom:BME280')).toBeUndefined();
  });

  it('accepts any reference prefix on Custom symbols', () => {
    expect(expectedReferencePrefix('Custom:WS2812B_LED')).toBeUndefined();
    const text = renderSchematic({
      title: 'Custom',
      nets: ['A'],
      parts: [placed({ ref: 'U1', libId: 'Custom:WS2812B_LED', pins: { '1': 'A', '2': 'A' } })],
    }).text;

    expect(validateSchematicText(text).filter((i) => i.check === 'reference-prefix')).toEqual([]);
  });

  it('detects overlapping boxes but not touching ones', () => {
    expect(boxesOverlap([0, 0, 10, 10], [5, 5, 10, 10])).toBe(true);
    expect(boxesOverlap([0, 0, 10, 10], [10, 0, 10, 10])).toBe(false);
  });

  it('blocks only on errors and formats issues with their check', () => {
    const warning: ValidationIssue = { check: 'connectivity', severity: 'warning', message: 'w' };
    const error: ValidationIssue = { check: 'overlap', severity: 'error', message: 'Bounding boxes overlap: A and B' };
    expect(hasBlockingIssues([warning])).toBe(false);
    expect(hasBlockingIssues([warning, error])).toBe(true);
    expect(formatIssue(error)).toBe('[overlap] Bounding boxes overlap: A and B');
  });
});
