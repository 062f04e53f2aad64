/**
 * Schematic Agent - Architect Prompts
 *
 * Prompts for symbol choice and placement, design revision, and whole-file
 * schematic drafting.
 */

import { z } from 'zod';
import { parseSExpression } from '../../kicad/sexpr.js';
import { normalizeRotation } from '../../kicad/schematic-writer.js';
import type { Circuit, Point, Rotation } from '../../types/index.js';
import { LLMMessage } from '../types.js';
import { extractJsonObject } from './json-reply.js';

// ============================================================================
// Types
// ============================================================================

export interface PromptPart {
  ref: string;
  currentLibId: string;
  value?: string;
  position: Point;
  rotation: Rotation;
  allowed: string[];
}

export interface PlacementUpdate {
  ref: string;
  libId?: string;
  position?: Point;
  rotation?: Rotation;
}

export interface PlacementReply {
  parts: PlacementUpdate[];
  nets?: string[];
}

export interface DraftInput {
  circuit: Circuit;
  allowed: Record<string, string[]>;
  previousText?: string;
  issues?: string[];
  referenceText?: string;
}

const PLACEMENT_RULES = `Rules:
- lib_id MUST be one of the allowed candidates for that ref. Do not invent symbols.
- Positions are sheet millimetres on an A4 page (297 x 210); keep parts inside it.
- Keep at least 20 mm between part origins and avoid overlapping bodies.
- rotation is one of 0, 90, 180, 270.`;

function toPromptJson(part: PromptPart): Record<string, unknown> {
  return {
    ref: part.ref,
    current_lib_id: part.currentLibId,
    value: part.value ?? null,
    position: part.position,
    rotation: part.rotation,
    allowed: part.allowed,
  };
}

// ============================================================================
// Placement
// ============================================================================

/**
 * Generate a prompt asking for symbol choice and improved placement
 */
export function placementPrompt(title: string, parts: PromptPart[]): LLMMessage[] {
  const systemPrompt = `You are an EDA assistant laying out a KiCad 9 schematic.
Choose a valid KiCad symbol from the allowed list for each part and improve placement.

${PLACEMENT_RULES}

Return ONLY JSON: {"parts": [{"ref": string, "lib_id": string, "position": [x, y], "rotation"?: number}]}`;

  const userPrompt = JSON.stringify({
    title,
    parts: parts.map(toPromptJson),
  });

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

/**
 * Generate a prompt asking to fix reported issues
 */
export function revisionPrompt(
  title: string,
  parts: PromptPart[],
  nets: string[],
  issues: string[]
): LLMMessage[] {
  const systemPrompt = `You are an EDA assistant. Fix the reported issues by adjusting positions and selecting ONLY allowed KiCad symbols.

${PLACEMENT_RULES}

Return ONLY JSON: {"parts": [{"ref": string, "lib_id": string, "position": [x, y], "rotation"?: number}], "nets"?: string[]}`;

  const userPrompt = JSON.stringify({
    issues: issues.slice(0, 100),
    current: {
      title,
      parts: parts.map(toPromptJson),
      nets,
    },
  });

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

const PlacementEntrySchema = z
  .object({
    ref: z.string().min(1),
    lib_id: z.string().optional(),
    symbol: z.string().optional(),
    position: z.tuple([z.number(), z.number()]).optional(),
    pos: z.tuple([z.number(), z.number()]).optional(),
    rotation: z.number().optional(),
  })
  .passthrough();

const PlacementReplySchema = z.object({
  parts: z.array(z.unknown()),
  nets: z.array(z.string()).optional(),
});

/**
 * Validator for placement/revision replies. Malformed entries are skipped;
 * a reply without a `parts` array is rejected.
 */
export function validatePlacementResponse(response: string): PlacementReply | null {
  const parsed = PlacementReplySchema.safeParse(extractJsonObject(response));
  if (!parsed.success) return null;

  const parts: PlacementUpdate[] = [];
  for (const raw of parsed.data.parts) {
    const entry = PlacementEntrySchema.safeParse(raw);
    if (!entry.success) continue;

    const update: PlacementUpdate = { ref: entry.data.ref };
    const libId = entry.data.lib_id ?? entry.data.symbol;
    if (libId) update.libId = libId;
    const position = entry.data.position ?? entry.data.pos;
    if (position) update.position = [Math.round(position[0]), Math.round(position[1])];
    if (entry.data.rotation !== undefined) update.rotation = normalizeRotation(entry.data.rotation);
    parts.push(update);
  }

  return parsed.data.nets ? { parts, nets: parsed.data.nets } : { parts };
}

// ============================================================================
// Whole-file drafting
// ============================================================================

export function schematicDraftSystemPrompt(): string {
  return `You are a KiCad 9 schematic generator. Produce a valid KiCad 9 S-expression schematic file strictly from the given circuit JSON.
Constraints:
- Output ONLY the schematic text starting with (kicad_sch ...). No prose, no code fences.
- Use top-level: (kicad_sch (version 20250114) (generator "eeschema") (generator_version "9.0") ...).
- Include (paper "A4") and (title_block (title "<title>")).
- Library symbols live under (lib_symbols ...) and include pins and an outline (rectangle/polyline).
- Placed instances live directly under (kicad_sch) as (symbol ...). For each ref in 'allowed' (input order), create ONE (symbol ...) with (lib_id <Library:Symbol> chosen ONLY from that ref's allowed list), (at x y angle), (uuid <GUID>) and (property "Reference" "<ref>"). Every placed instance MUST include a UUID.
- Reference prefix rules (by lib_id category): R (resistors), C (capacitors), L (inductors), J (connectors), S (switches/buttons), D (diodes/LEDs), Q (transistors/MOSFETs), Y (crystals/oscillators), U (ICs/others).
- If no suitable real symbol exists, embed a custom symbol in (lib_symbols ...) and reference it via a Custom:<name> lib_id.
- Connect pins to their nets with wires and (label "<net>") entries; mark unused pins with (no_connect ...).
- Add (sheet_instances (path "/" (page "1"))).
- Apply engineering drawing practices: readable spacing (at least 20 mm between parts), no overlaps, consistent orientation.`;
}

export function schematicDraftUserPrompt(input: DraftInput): string {
  const payload: Record<string, unknown> = {
    circuit: input.circuit,
    allowed: input.allowed,
    refs: Object.keys(input.allowed),
  };
  if (input.previousText) payload.previous_text = input.previousText.slice(0, 12000);
  if (input.issues && input.issues.length > 0) payload.issues_to_fix = input.issues.slice(0, 100);
  if (input.referenceText) payload.reference_schematic = input.referenceText.slice(0, 20000);
  return JSON.stringify(payload);
}

/**
 * Cut the `(kicad_sch ...)` span out of a model reply. Returns null unless
 * the span parses as one balanced S-expression.
 */
export function extractSchematicText(reply: string): string | null {
  const start = reply.indexOf('(kicad_sch');
  const end = reply.lastIndexOf(')');
  if (start === -1 || end <= start) return null;

  const text = reply.slice(start, end + 1);
  try {
    parseSExpression(text);
  } catch {
    return null;
  }
  return `${text}\n`;
}
