import { describe, it, expect } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadCircuit, parseCircuit } from '../ingest.js';
import { CircuitParseError } from '../../utils/errors.js';

const EXAMPLES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../examples');

describe('loadCircuit', () => {
  it('loads the example circuit with three parts and three nets', async () => {
    const circuit = await loadCircuit(path.join(EXAMPLES_DIR, 'circuit.json'));

    expect(circuit.title).toBe('LED Indicator');
    expect(circuit.parts.map((p) => p.ref)).toEqual(['J1', 'R1', 'D1']);
    expect(circuit.nets.map((n) => n.name)).toEqual(['VCC', 'GND', 'LED_A']);

    const netNames = new Set(circuit.nets.map((n) => n.name));
    for (const part of circuit.parts) {
      for (const net of Object.values(part.pins)) {
        expect(netNames.has(net)).toBe(true);
      }
    }
  });

  it('defaults rotation to 0 and leaves position unset', async () => {
    const circuit = await loadCircuit(path.join(EXAMPLES_DIR, 'circuit.json'));
    expect(circuit.parts[1]).toEqual({
      ref: 'R1',
      type: 'R',
      symbol: 'Device:R',
      value: '330',
      pins: { '1': 'VCC', '2': 'LED_A' },
      position: undefined,
      rotation: 0,
    });
  });

  it('reports a missing file as a CircuitParseError', async () => {
    await expect(loadCircuit(path.join(EXAMPLES_DIR, 'does-not-exist.json'))).rejects.toBeInstanceOf(
      CircuitParseError
    );
  });
});

describe('parseCircuit', () => {
  it('rejects a pin that references an undeclared net', () => {
    const text = JSON.stringify({
      title: 'Bad',
      parts: [{ ref: 'R1', type: 'R', pins: { '1': 'VCC', '2': 'NOPE' } }],
      nets: [{ name: 'VCC' }],
    });

    expect(() => parseCircuit(text, 'bad.json')).toThrow(
      "Part R1 pin '2' references undefined net 'NOPE'"
    );
  });

  it('accepts an empty net name as an intentionally unconnected pin', () => {
    const circuit = parseCircuit(
      JSON.stringify({
        parts: [{ ref: 'U1', type: 'U', pins: { '1': 'VCC', '2': '' } }],
        nets: ['VCC'],
      })
    );
    expect(circuit.title).toBe('Untitled');
    expect(circuit.parts[0]?.pins).toEqual({ '1': 'VCC', '2': '' });
    expect(circuit.nets).toEqual([{ name: 'VCC' }]);
  });

  it('rejects duplicate references and duplicate nets', () => {
    const dupRefs = JSON.stringify({
      parts: [
        { ref: 'R1', pins: {} },
        { ref: 'R1', pins: {} },
      ],
      nets: [],
    });
    expect(() => parseCircuit(dupRefs)).toThrow("Duplicate reference designator 'R1'");

    const dupNets = JSON.stringify({ parts: [], nets: ['GND', { name: 'GND' }] });
    expect(() => parseCircuit(dupNets)).toThrow("Duplicate net 'GND'");
  });

  it('rejects malformed JSON and unknown document shapes', () => {
    expect(() => parseCircuit('{not json', 'x.json')).toThrow(/^Malformed JSON in x\.json/);
    expect(() => parseCircuit('[]', 'x.json')).toThrow('Circuit document in x.json must be a JSON object');
    expect(() => parseCircuit('{"foo": 1}', 'x.json')).toThrow(/^Unrecognized circuit document in x\.json/);
  });

  it('rejects an out-of-range rotation', () => {
    const text = JSON.stringify({ parts: [{ ref: 'R1', rotation: 45 }], nets: [] });
    expect(() => parseCircuit(text, 'rot.json')).toThrow(/^Invalid circuit in rot\.json: parts\.0\.rotation/);
  });

  it('converts a component list into parts and nets', () => {
    const circuit = parseCircuit(
      JSON.stringify({
        device: { name: 'Sensor Board' },
        components: [
          { id: 'C1', category: 'Passive', value: '100n' },
          { id: 'U1', category: 'microcontroller', value: 'STM32F103' },
          { id: 'J1', category: 'connector' },
          { category: 'sensor', value: 1234 },
        ],
        nets: [{ id: 'SDA', name: 'I2C_SDA' }],
        powerDomains: [{ name: '3V3' }],
      })
    );

    expect(circuit.title).toBe('Sensor Board');
    expect(circuit.parts.map((p) => [p.ref, p.type, p.symbol, p.value])).toEqual([
      ['C1', 'C', 'Device:C', '100n'],
      ['U1', 'MCU', undefined, 'STM32F103'],
      ['J1', 'Conn', 'Connector_Generic:Conn_01x02', undefined],
      ['U4', 'U', undefined, '1234'],
    ]);
    expect(circuit.nets.map((n) => n.name)).toEqual(['SDA', 'I2C_SDA', '3V3', 'GND']);
  });
});
