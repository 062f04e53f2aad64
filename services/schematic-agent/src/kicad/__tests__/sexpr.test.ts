import { describe, it, expect } from 'vitest';
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
} from '../sexpr.js';

const SAMPLE = `(kicad_sch (version 20250114) (generator "eeschema")
  (symbol (lib_id "Device:R") (at 50.8 25.4 90)
    (property "Reference" "R1" (at 0 0 0))
    (property "Value" "10k \\"small\\"" (at 0 0 0)))
  (wire (pts (xy 1 2) (xy 3.5 4)) (uuid "w-1"))
)
`;

describe('parseSExpression', () => {
  it('parses nested lists with quoted strings and escapes', () => {
    const root = parseSExpression(SAMPLE);
    expect(head(root)).toBe('kicad_sch');
    expect(getNumberValue(root, 'version')).toBe(20250114);
    expect(getStringValue(root, 'generator')).toBe('eeschema');

    const symbol = findExpr(root, 'symbol');
    expect(symbol).toBeDefined();
    if (!symbol) return;
    expect(getStringValue(symbol, 'lib_id')).toBe('Device:R');
    expect(getAt(symbol)).toEqual({ x: 50.8, y: 25.4, angle: 90 });
    expect(getProperty(symbol, 'Reference')).toBe('R1');
    expect(getProperty(symbol, 'Value')).toBe('10k "small"');
    expect(getProperty(symbol, 'Footprint')).toBeUndefined();
  });

  it('collects points and nested keywords', () => {
    const root = parseSExpression(SAMPLE);
    const wire = findExpr(root, 'wire');
    expect(wire && getPoints(wire)).toEqual([
      [1, 2],
      [3.5, 4],
    ]);
    expect(findAllExpr(root, 'property')).toHaveLength(0);
    expect(findDeep(root, 'property')).toHaveLength(2);
    expect(findDeep(root, 'at')).toHaveLength(3);
  });

  it('defaults a missing angle to 0', () => {
    expect(getAt(parseSExpression('(label "X" (at 1 2))'))).toEqual({ x: 1, y: 2, angle: 0 });
  });

  it('rejects unbalanced and trailing input', () => {
    expect(() => parseSExpression('(a (b)')).toThrow('S-expression syntax error at offset 0: unclosed list');
    expect(() => parseSExpression('(a) (b)')).toThrow(
      'S-expression syntax error at offset 4: unexpected content after top-level list'
    );
    expect(() => parseSExpression('a')).toThrow('S-expression syntax error at offset 0: expected "("');
    expect(() => parseSExpression('(a "open)')).toThrow('S-expression syntax error at offset 3: unterminated string');
  });
});
