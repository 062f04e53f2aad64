/**
 * Architect Agent
 *
 * Turns a {@link Circuit} into a placed {@link Design}: symbol choice from
 * the local library, grid placement, and (with an LLM client) model-driven
 * symbol selection and layout. Also revises a design against validation
 * feedback and, in `llm-text` mode, drafts whole schematic files.
 *
 * @module agents/architect-agent
 */

import fs from 'fs/promises';
import path from 'path';
import { candidatesForParts } from '../kicad/symbol-candidates.js';
import { SymbolIndex } from '../kicad/symbol-library.js';
import { collectLibSymbols, placedExtent, seedSchematic } from '../kicad/schematic-writer.js';
import {
  extractSchematicText,
  placementPrompt,
  PlacementReply,
  PromptPart,
  revisionPrompt,
  schematicDraftSystemPrompt,
  schematicDraftUserPrompt,
  validatePlacementResponse,
} from '../llm/prompts/architect-prompts.js';
import type { LLMClient, LLMMessage } from '../llm/types.js';
import { ArchitectResponseError } from '../utils/errors.js';
import { log, Logger } from '../utils/logger.js';
import type { BoundingBox, Circuit, Design, PlacedPart, Point } from '../types/index.js';

const architectLogger: Logger = log.child({ service: 'architect-agent' });

// Grid placement (mm)
const GRID_COLUMNS = 6;
const GRID_SPACING_X = 30;
const GRID_SPACING_Y = 25;
const GRID_MARGIN = 50;
const ROW_CLEARANCE = 10;

// Heuristic revision offsets (mm)
const SHIFT_X = 10;
const SHIFT_Y = 8;

const MAX_HISTORY = 10;
const DRAFT_MAX_TOKENS = 7000;

export interface ArchitectAgentOptions {
  symbolIndex: SymbolIndex;
  /** Enables model-driven placement, revision and drafting */
  llm?: LLMClient;
  maxCandidates?: number;
}

export interface DraftRequest {
  circuit: Circuit;
  previousText?: string;
  issues?: string[];
  referenceText?: string;
}

export interface DraftResult {
  text: string;
  raw: string;
  /** true when the reply was unusable and previous or seed text was returned */
  fallback: boolean;
}

/**
 * Grid positions, one per part height. Row pitch grows to fit the tallest part
 * in the row above.
 */
export function gridPositions(heights: number[]): Point[] {
  const positions: Point[] = [];
  let rowY = GRID_MARGIN;
  for (let i = 0; i < heights.length; i++) {
    const col = i % GRID_COLUMNS;
    if (i > 0 && col === 0) {
      const previousRow = heights.slice(i - GRID_COLUMNS, i);
      rowY += Math.max(GRID_SPACING_Y, Math.max(...previousRow) + ROW_CLEARANCE);
    }
    positions.push([GRID_MARGIN + col * GRID_SPACING_X, rowY]);
  }
  return positions;
}

function withBoundingBoxes(parts: PlacedPart[]): PlacedPart[] {
  const defs = collectLibSymbols(parts);
  return parts.map((part) => {
    const def = defs.get(part.libId);
    const bbox: BoundingBox = def
      ? placedExtent(def, part.position, part.rotation)
      : [part.position[0], part.position[1], 0, 0];
    return { ...part, bbox };
  });
}

function cloneDesign(design: Design): Design {
  return {
    title: design.title,
    nets: [...design.nets],
    parts: design.parts.map((p): PlacedPart => ({
      ...p,
      pins: { ...p.pins },
      position: [p.position[0], p.position[1]],
    })),
  };
}

export class ArchitectAgent {
  private readonly symbolIndex: SymbolIndex;
  private readonly llm?: LLMClient;
  private readonly maxCandidates?: number;
  private allowedByRef: Record<string, string[]> = {};

  private history: LLMMessage[] = [];
  private draftCounter = 0;
  private debugDir?: string;

  constructor(options: ArchitectAgentOptions) {
    this.symbolIndex = options.symbolIndex;
    this.llm = options.llm;
    this.maxCandidates = options.maxCandidates;
  }

  get usesLlm(): boolean {
    return this.llm !== undefined;
  }

  /**
   * Allowed lib_ids per ref, as offered to the model
   */
  allowedCandidates(circuit: Circuit): Record<string, string[]> {
    this.allowedByRef = candidatesForParts(circuit.parts, this.symbolIndex, this.maxCandidates);
    return this.allowedByRef;
  }

  /**
   * Heuristic design: library symbol choice and grid placement. Explicit
   * part positions win over the grid.
   */
  baseDesign(circuit: Circuit): Design {
    const withLibIds = circuit.parts.map((part): PlacedPart => ({
      ref: part.ref,
      libId: this.symbolIndex.resolveLibId({
        ref: part.ref,
        type: part.type,
        preferred: part.symbol,
        value: part.value,
      }),
      value: part.value,
      position: [0, 0],
      rotation: part.rotation,
      pins: { ...part.pins },
      bbox: [0, 0, 0, 0],
    }));

    const defs = collectLibSymbols(withLibIds);
    const heights = withLibIds.map((p) => {
      const def = defs.get(p.libId);
      return def ? placedExtent(def, [0, 0], p.rotation)[3] : 0;
    });
    const grid = gridPositions(heights);

    const parts = withLibIds.map((p, i): PlacedPart => ({
      ...p,
      position: circuit.parts[i].position ?? grid[i],
    }));

    return {
      title: circuit.title,
      parts: withBoundingBoxes(parts),
      nets: circuit.nets.map((n) => n.name),
    };
  }

  /**
   * Produce the first design for a circuit
   */
  async produceDesign(circuit: Circuit): Promise<Design> {
    const base = this.baseDesign(circuit);
    const allowed = this.allowedCandidates(circuit);

    if (!this.llm) {
      architectLogger.info('Design produced from heuristics', {
        title: base.title,
        partCount: base.parts.length,
      });
      return base;
    }

    const messages = placementPrompt(base.title, this.promptParts(base));
    const reply = await this.requestPlacement(messages, base, 'produceDesign');
    return this.applyPlacement(base, reply, allowed);
  }

  /**
   * Revise a design against validation feedback
   */
  async reviseDesign(design: Design, issues: string[]): Promise<Design> {
    if (this.llm) {
      const messages = revisionPrompt(design.title, this.promptParts(design), design.nets, issues);
      const reply = await this.requestPlacement(messages, design, 'reviseDesign');
      return this.applyPlacement(design, reply, this.allowedByRef);
    }

    return this.reviseHeuristically(design, issues);
  }

  /**
   * Fallback revision: spread parts apart on placement issues and declare
   * nets named by "unknown net 'X'" issues.
   */
  reviseHeuristically(design: Design, issues: string[]): Design {
    const updated = cloneDesign(design);
    const lowered = issues.map((i) => i.toLowerCase());

    const placementProblem = lowered.some((i) => i.includes('overlap') || i.includes('too close'));
    if (placementProblem) {
      updated.parts = withBoundingBoxes(
        updated.parts.map((part, idx): PlacedPart => ({
          ...part,
          position: [part.position[0] + (idx % 3) * SHIFT_X, part.position[1] + (idx % 3) * SHIFT_Y],
        }))
      );
    }

    for (const issue of issues) {
      const match = issue.match(/unknown net '([^']+)'/i);
      if (match && !updated.nets.includes(match[1])) {
        updated.nets.push(match[1]);
      }
    }

    architectLogger.debug('Design revised heuristically', {
      issueCount: issues.length,
      moved: placementProblem,
    });

    return updated;
  }

  private promptParts(design: Design): PromptPart[] {
    return design.parts.map((p) => ({
      ref: p.ref,
      currentLibId: p.libId,
      value: p.value,
      position: p.position,
      rotation: p.rotation,
      allowed: this.allowedByRef[p.ref] ?? [p.libId],
    }));
  }

  private async requestPlacement(
    messages: LLMMessage[],
    design: Design,
    operation: string
  ): Promise<PlacementReply> {
    if (!this.llm) {
      throw new ArchitectResponseError('No LLM client configured', '', { operation });
    }

    const refs = new Set(design.parts.map((p) => p.ref));
    const result = await this.llm.callLLMWithValidation(
      messages,
      (response) => {
        const reply = validatePlacementResponse(response);
        if (!reply) return null;
        if (refs.size > 0 && !reply.parts.some((u) => refs.has(u.ref))) return null;
        return reply;
      },
      { temperature: 0.1, maxTokens: 900 }
    );

    if (!result.success || !result.data) {
      throw new ArchitectResponseError(
        `Architect reply could not be mapped to the design after ${result.attempts} attempt(s): ${result.error ?? 'unknown error'}`,
        result.raw,
        { operation, title: design.title }
      );
    }

    return result.data;
  }

  /**
   * Map a placement reply onto a design. lib_ids outside the allowed list
   * are replaced by the first allowed candidate.
   */
  applyPlacement(design: Design, reply: PlacementReply, allowedByRef: Record<string, string[]>): Design {
    const updated = cloneDesign(design);
    const byRef = new Map(reply.parts.map((u) => [u.ref, u]));
    let replaced = 0;

    updated.parts = updated.parts.map((part) => {
      const update = byRef.get(part.ref);
      if (!update) return part;

      const next: PlacedPart = { ...part };
      const allowed = allowedByRef[part.ref] ?? [];
      if (allowed.length > 0) {
        if (update.libId && allowed.includes(update.libId)) {
          next.libId = update.libId;
        } else {
          next.libId = allowed[0];
          if (update.libId) replaced++;
        }
      } else if (update.libId) {
        next.libId = update.libId;
      }
      if (update.position) next.position = update.position;
      if (update.rotation !== undefined) next.rotation = update.rotation;
      return next;
    });
    updated.parts = withBoundingBoxes(updated.parts);

    for (const net of reply.nets ?? []) {
      if (!updated.nets.includes(net)) updated.nets.push(net);
    }

    architectLogger.info('Placement applied', {
      title: updated.title,
      updatedParts: reply.parts.filter((u) => updated.parts.some((p) => p.ref === u.ref)).length,
      replacedLibIds: replaced,
    });

    return updated;
  }

  // ==========================================================================
  // Whole-file drafting
  // ==========================================================================

  /**
   * Start a drafting session: clear history and the debug dump directory.
   */
  async startDraftSession(debugDir: string): Promise<void> {
    this.history = [];
    this.draftCounter = 0;
    this.debugDir = debugDir;
    await fs.rm(debugDir, { recursive: true, force: true });
    await fs.mkdir(debugDir, { recursive: true });
  }

  private addHistory(message: LLMMessage): void {
    this.history.push(message);
    if (this.history.length > MAX_HISTORY) {
      this.history = this.history.slice(-MAX_HISTORY);
    }
  }

  private async dump(name: string, content: string): Promise<void> {
    if (!this.debugDir) return;
    try {
      await fs.writeFile(path.join(this.debugDir, name), content, 'utf-8');
    } catch (error) {
      architectLogger.warn('Failed to write draft debug file', {
        file: name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Ask the model for a complete schematic file. An unusable reply falls
   * back to the previous text, else a seed schematic.
   */
  async draftSchematicText(request: DraftRequest): Promise<DraftResult> {
    if (!this.llm) {
      throw new ArchitectResponseError('Drafting schematic text requires an LLM client', '', {
        operation: 'draftSchematicText',
      });
    }

    this.draftCounter++;
    const tag = `iter_${String(this.draftCounter).padStart(2, '0')}`;
    const allowed =
      Object.keys(this.allowedByRef).length > 0 ? this.allowedByRef : this.allowedCandidates(request.circuit);

    const system = schematicDraftSystemPrompt();
    const user = schematicDraftUserPrompt({ ...request, allowed });
    this.addHistory({ role: 'user', content: user });
    const messages: LLMMessage[] = [{ role: 'system', content: system }, ...this.history];

    await this.dump(`${tag}_prompt.json`, JSON.stringify({ system, messages }, null, 2));

    let raw: string;
    try {
      const response = await this.llm.callLLM(messages, { maxTokens: DRAFT_MAX_TOKENS, temperature: 0.1 });
      raw = response.content;
    } catch (error) {
      await this.dump(`${tag}_error.txt`, error instanceof Error ? `${error.name}: ${error.message}` : String(error));
      throw error;
    }

    await this.dump(`${tag}_reply.txt`, raw);
    if (raw) this.addHistory({ role: 'assistant', content: raw });

    const text = extractSchematicText(raw);
    if (text) {
      return { text, raw, fallback: false };
    }

    architectLogger.warn('Draft reply is not a balanced (kicad_sch ...) expression; using fallback', {
      iteration: this.draftCounter,
      hasPrevious: Boolean(request.previousText?.trim()),
    });

    const previous = request.previousText?.trim() ? request.previousText : undefined;
    return { text: previous ?? seedSchematic(request.circuit.title), raw, fallback: true };
  }
}
