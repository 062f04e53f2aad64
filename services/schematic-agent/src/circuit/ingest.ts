/**
 * Circuit Input Loader
 *
 * Reads a JSON circuit description into a {@link Circuit}. Two document
 * shapes are accepted: the native `{ title, parts, nets }` form and the
 * component-list form produced by upstream design tools
 * (`{ device, components, nets, powerDomains }`).
 *
 * @module circuit/ingest
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { CircuitParseError } from '../utils/errors.js';
import { log, Logger } from '../utils/logger.js';
import type { Circuit, Net, Part } from '../types/index.js';

const ingestLogger: Logger = log.child({ service: 'circuit-ingest' });

// ============================================================================
// Schemas
// ============================================================================

const ScalarText = z.union([z.string(), z.number()]).transform((v) => String(v));

const RotationSchema = z.union([z.literal(0), z.literal(90), z.literal(180), z.literal(270)]);

const PartSchema = z.object({
  ref: z.string().min(1, 'ref must not be empty'),
  type: z.string().default('U'),
  symbol: z.string().nullish(),
  value: ScalarText.nullish(),
  pins: z.record(z.string()).default({}),
  position: z.tuple([z.number(), z.number()]).nullish(),
  rotation: RotationSchema.nullish(),
});

const NetEntrySchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1) }),
]);

const NativeCircuitSchema = z.object({
  title: z.string().nullish(),
  parts: z.array(PartSchema).default([]),
  nets: z.array(NetEntrySchema).default([]),
});

const ComponentSchema = z.object({
  id: ScalarText.nullish(),
  category: z.string().nullish(),
  value: ScalarText.nullish(),
});

const ComponentListSchema = z.object({
  device: z.object({ name: z.string().nullish() }).nullish(),
  components: z.array(ComponentSchema),
  nets: z
    .array(z.object({ id: z.unknown().optional(), name: z.unknown().optional() }))
    .default([]),
  powerDomains: z.array(z.object({ name: z.unknown().optional() })).default([]),
});

type NativeCircuitDocument = z.infer<typeof NativeCircuitSchema>;
type ComponentListDocument = z.infer<typeof ComponentListSchema>;
type ComponentEntry = z.infer<typeof ComponentSchema>;

// ============================================================================
// Component-list conversion
// ============================================================================

interface TypeGuess {
  type: string;
  symbol?: string;
}

function guessPartType(ref: string, category: string): TypeGuess {
  const prefix = ref.toUpperCase();

  switch (category) {
    case 'passive':
      if (prefix.startsWith('C')) {
        return { type: 'C', symbol: 'Device:C' };
      }
      return { type: 'R', symbol: 'Device:R' };
    case 'microcontroller':
    case 'processor':
    case 'mcu':
      return { type: 'MCU' };
    case 'sensor':
    case 'power-protection':
    case 'power-supply':
      return { type: 'U' };
    case 'connector':
      return { type: 'Conn', symbol: 'Connector_Generic:Conn_01x02' };
    default:
      return { type: 'U' };
  }
}

function componentToPart(component: ComponentEntry, index: number): Part {
  const ref = component.id ?? `U${index + 1}`;
  const guess = guessPartType(ref, (component.category ?? '').toLowerCase());

  return {
    ref,
    type: guess.type,
    symbol: guess.symbol,
    value: component.value ?? undefined,
    pins: {},
    rotation: 0,
  };
}

function convertComponentList(doc: ComponentListDocument): Circuit {
  const parts = doc.components.map(componentToPart);

  const nets: Net[] = [];
  const seen = new Set<string>();
  const addNet = (name: unknown): void => {
    if (typeof name === 'string' && name && !seen.has(name)) {
      seen.add(name);
      nets.push({ name });
    }
  };

  for (const net of doc.nets) {
    addNet(net.id);
    addNet(net.name);
  }
  for (const domain of doc.powerDomains) {
    addNet(domain.name);
  }
  addNet('GND');

  return {
    title: doc.device?.name || 'Untitled',
    parts,
    nets,
  };
}

function convertNative(doc: NativeCircuitDocument): Circuit {
  const parts: Part[] = doc.parts.map((p) => ({
    ref: p.ref,
    type: p.type,
    symbol: p.symbol ?? undefined,
    value: p.value ?? undefined,
    pins: p.pins,
    position: p.position ?? undefined,
    rotation: p.rotation ?? 0,
  }));

  return {
    title: doc.title || 'Untitled',
    parts,
    nets: doc.nets.map((n) => ({ name: typeof n === 'string' ? n : n.name })),
  };
}

// ============================================================================
// Cross-reference checks
// ============================================================================

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Enforce reference/net uniqueness and that every pin names a declared net.
 */
export function assertCircuitIntegrity(circuit: Circuit, source: string): void {
  const refs = new Set<string>();
  for (const part of circuit.parts) {
    if (refs.has(part.ref)) {
      throw new CircuitParseError(`Duplicate reference designator '${part.ref}'`, source, {
        operation: 'assertCircuitIntegrity',
        ref: part.ref,
      });
    }
    refs.add(part.ref);
  }

  const netNames = new Set<string>();
  for (const net of circuit.nets) {
    if (netNames.has(net.name)) {
      throw new CircuitParseError(`Duplicate net '${net.name}'`, source, {
        operation: 'assertCircuitIntegrity',
        net: net.name,
      });
    }
    netNames.add(net.name);
  }

  for (const part of circuit.parts) {
    for (const [pin, net] of Object.entries(part.pins)) {
      if (net !== '' && !netNames.has(net)) {
        throw new CircuitParseError(
          `Part ${part.ref} pin '${pin}' references undefined net '${net}'`,
          source,
          {
            operation: 'assertCircuitIntegrity',
            ref: part.ref,
            pin,
            net,
            suggestion: `Declare '${net}' in the nets list`,
          }
        );
      }
    }
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse circuit JSON text. `source` names the origin in error messages.
 */
export function parseCircuit(text: string, source = '<inline>'): Circuit {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CircuitParseError(`Malformed JSON in ${source}: ${reason}`, source, {
      operation: 'parseCircuit',
    });
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new CircuitParseError(`Circuit document in ${source} must be a JSON object`, source, {
      operation: 'parseCircuit',
    });
  }

  let circuit: Circuit;
  if ('components' in raw) {
    const parsed = ComponentListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CircuitParseError(
        `Invalid component list in ${source}: ${formatZodIssues(parsed.error)}`,
        source,
        { operation: 'parseCircuit' }
      );
    }
    circuit = convertComponentList(parsed.data);
  } else if ('parts' in raw || 'nets' in raw) {
    const parsed = NativeCircuitSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CircuitParseError(
        `Invalid circuit in ${source}: ${formatZodIssues(parsed.error)}`,
        source,
        { operation: 'parseCircuit' }
      );
    }
    circuit = convertNative(parsed.data);
  } else {
    throw new CircuitParseError(
      `Unrecognized circuit document in ${source}: expected 'parts'/'nets' or 'components'`,
      source,
      { operation: 'parseCircuit' }
    );
  }

  assertCircuitIntegrity(circuit, source);

  ingestLogger.debug('Circuit parsed', {
    source,
    title: circuit.title,
    partCount: circuit.parts.length,
    netCount: circuit.nets.length,
  });

  return circuit;
}

/**
 * Read and parse a circuit JSON file.
 */
export async function loadCircuit(filePath: string): Promise<Circuit> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CircuitParseError(`Cannot read circuit file ${filePath}: ${reason}`, filePath, {
      operation: 'loadCircuit',
    });
  }

  return parseCircuit(text, filePath);
}
