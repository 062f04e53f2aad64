/**
 * Pipeline Orchestrator
 *
 * Runs load → (architect → write → validate → review → ERC → interpret)
 * per iteration until a schematic is accepted or the iteration budget is
 * spent, then writes the validation report next to the schematic.
 *
 * @module pipeline/orchestrator
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ArchitectAgent } from '../agents/architect-agent.js';
import { ValidatorAgent } from '../agents/validator-agent.js';
import { assertCircuitIntegrity, loadCircuit } from '../circuit/ingest.js';
import { config } from '../config.js';
import { ErcOptions, isErcClean, runErc, summarizeErc } from '../kicad/erc.js';
import { schematicFileName, writeSchematic, writeSchematicText } from '../kicad/schematic-writer.js';
import { loadSymbolIndex, SymbolIndex } from '../kicad/symbol-library.js';
import { createLLMClient } from '../llm/openai-client.js';
import type { LLMClient } from '../llm/types.js';
import { formatIssue, hasBlockingIssues, validateSchematicFile } from '../validation/structural-validator.js';
import { handleError, SchematicWriteError, ValidationError } from '../utils/errors.js';
import { log, Logger } from '../utils/logger.js';
import type { Circuit, Design, ErcReport, ValidationIssue, ValidationReport } from '../types/index.js';
import {
  calculateOverallProgress,
  createProgressEvent,
  PipelineEventType,
  PipelinePhase,
  PipelineProgressEvent,
  ProgressCallback,
} from './progress.js';

const pipelineLogger: Logger = log.child({ service: 'pipeline' });

export type ArchitectMode = 'template' | 'llm-text';

export interface PipelineOptions {
  /** Circuit JSON file; ignored when `circuit` is given */
  inputPath?: string;
  circuit?: Circuit;
  outDir: string;
  maxIterations?: number;
  /** Model-driven placement and revision (template mode) */
  useLlm?: boolean;
  /** Model-driven compliance review and ERC interpretation */
  validatorUseLlm?: boolean;
  /** `llm-text` has the model draft the whole file */
  mode?: ArchitectMode;
  /** Example schematic offered to the model in `llm-text` mode */
  referencePath?: string;
  llm?: LLMClient;
  symbolIndex?: SymbolIndex;
  erc?: ErcOptions;
  onProgress?: ProgressCallback;
  operationId?: string;
}

export interface PipelineResult {
  operationId: string;
  circuit: Circuit;
  /** Last placed design; absent in `llm-text` mode */
  design?: Design;
  schematicPath: string;
  reportPath: string;
  report: ValidationReport;
  iterations: number;
  accepted: boolean;
}

interface IterationOutcome {
  structural: ValidationIssue[];
  llmIssues: string[];
  erc: ErcReport;
  suggestions: string[];
  accepted: boolean;
}

/**
 * Report file path for a schematic: `<name>.report.json` beside it
 */
export function reportPathFor(schematicPath: string): string {
  const parsed = path.parse(schematicPath);
  return path.join(parsed.dir, `${parsed.name}.report.json`);
}

/**
 * Feedback handed to the Architect after a rejected iteration
 */
export function collectFeedback(outcome: IterationOutcome): string[] {
  const feedback = [...outcome.structural.map(formatIssue), ...outcome.llmIssues];
  if (outcome.erc.available && !isErcClean(outcome.erc)) {
    feedback.push(...summarizeErc(outcome.erc, 15));
  }
  feedback.push(...outcome.suggestions);
  return feedback;
}

async function readReference(referencePath?: string): Promise<string | undefined> {
  if (!referencePath) return undefined;
  try {
    return await fs.readFile(referencePath, 'utf-8');
  } catch (error) {
    pipelineLogger.warn('Reference schematic not readable; drafting without it', {
      referencePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const operationId = options.operationId ?? uuidv4();
  const maxIterations = options.maxIterations ?? config.pipeline.maxIterations;
  const mode: ArchitectMode = options.mode ?? 'template';
  const useLlm = options.useLlm ?? false;
  const validatorUseLlm = options.validatorUseLlm ?? false;
  const outDir = path.resolve(options.outDir);

  const emit = (
    type: PipelineEventType,
    progress: number,
    message: string,
    extra?: Partial<PipelineProgressEvent>
  ): void => {
    if (!options.onProgress) return;
    try {
      options.onProgress(createProgressEvent(operationId, type, progress, message, extra));
    } catch (error) {
      pipelineLogger.warn('Progress callback failed', {
        operationId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new ValidationError('maxIterations must be a positive integer', { maxIterations });
  }
  if (mode === 'llm-text' && !useLlm && !options.llm) {
    throw new ValidationError("Mode 'llm-text' requires the LLM to be enabled", { mode });
  }

  const opLogger = pipelineLogger.child({ operationId });
  opLogger.info('Pipeline run starting', { mode, maxIterations, useLlm, validatorUseLlm });

  try {
    emit(PipelineEventType.RUN_START, 0, 'Loading circuit', { phase: 'load', max_iterations: maxIterations });

    let circuit: Circuit;
    if (options.circuit) {
      assertCircuitIntegrity(options.circuit, '<inline>');
      circuit = options.circuit;
    } else if (options.inputPath) {
      circuit = await loadCircuit(options.inputPath);
    } else {
      throw new ValidationError('Either inputPath or circuit is required');
    }

    try {
      await fs.mkdir(outDir, { recursive: true });
    } catch (error) {
      throw new SchematicWriteError('Failed to create output directory', outDir, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const needsArchitectLlm = useLlm || mode === 'llm-text';
    const llm =
      needsArchitectLlm || validatorUseLlm ? (options.llm ?? createLLMClient()) : undefined;
    const symbolIndex = options.symbolIndex ?? (await loadSymbolIndex(config.kicad.symbolsDir));
    const ercOptions: ErcOptions = {
      cliPath: config.kicad.cliPath,
      timeoutMs: config.kicad.ercTimeoutMs,
      ...options.erc,
    };

    const architect = new ArchitectAgent({ symbolIndex, llm: needsArchitectLlm ? llm : undefined });
    const validator = new ValidatorAgent({ llm: validatorUseLlm ? llm : undefined });

    const schematicPath = path.join(outDir, schematicFileName(circuit.title));
    const referenceText = mode === 'llm-text' ? await readReference(options.referencePath) : undefined;
    if (mode === 'llm-text') {
      await architect.startDraftSession(path.join(outDir, 'llm_debug'));
    }

    emit(PipelineEventType.PHASE_COMPLETE, calculateOverallProgress('load', 100), `Loaded '${circuit.title}'`, {
      phase: 'load',
      data: { parts: circuit.parts.length, nets: circuit.nets.length, symbolIndexSize: symbolIndex.size },
    });

    let design: Design | undefined;
    let previousText: string | undefined;
    let feedback: string[] = [];
    let outcome: IterationOutcome | undefined;
    let iterations = 0;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      iterations = iteration;
      const progressAt = (phase: PipelinePhase, phaseProgress: number): number =>
        calculateOverallProgress(phase, phaseProgress, iteration, maxIterations);
      const phaseStart = (phase: PipelinePhase, message: string): void =>
        emit(PipelineEventType.PHASE_START, progressAt(phase, 0), message, {
          phase,
          iteration,
          max_iterations: maxIterations,
        });

      emit(PipelineEventType.ITERATION_START, progressAt('architect', 0), `Iteration ${iteration} of ${maxIterations}`, {
        iteration,
        max_iterations: maxIterations,
      });

      // Architect + writer
      if (mode === 'llm-text') {
        phaseStart('architect', `Architect drafting schematic text (iteration ${iteration})`);
        const draft = await architect.draftSchematicText({
          circuit,
          previousText,
          issues: feedback,
          referenceText,
        });
        if (draft.fallback) {
          opLogger.warn('Draft reply unusable; reusing earlier text', { iteration });
        }
        phaseStart('write', 'Writing schematic');
        await writeSchematicText(draft.text, schematicPath);
        previousText = draft.text;
      } else {
        phaseStart('architect', iteration === 1 ? 'Architect placing parts' : 'Architect revising placement');
        design = design ? await architect.reviseDesign(design, feedback) : await architect.produceDesign(circuit);
        phaseStart('write', 'Writing schematic');
        await writeSchematic(design, schematicPath);
      }

      // In-process structural checks
      phaseStart('validate', 'Running structural checks');
      const structural = await validateSchematicFile(schematicPath, { circuit });

      // Optional model review
      let llmIssues: string[] = [];
      if (validator.usesLlm) {
        phaseStart('review', 'Validator reviewing KiCad 9 compliance');
        llmIssues = await validator.reviewSchematic(await fs.readFile(schematicPath, 'utf-8'));
      }

      // ERC
      phaseStart('erc', 'Running ERC');
      const erc = await runErc(schematicPath, ercOptions);
      if (!erc.available) {
        opLogger.warn('ERC skipped', { iteration, reason: erc.error ?? 'no KiCad binary found' });
      }

      const accepted = !hasBlockingIssues(structural) && llmIssues.length === 0 && isErcClean(erc);

      let suggestions: string[] = [];
      if (!accepted && validator.usesLlm) {
        phaseStart('interpret', 'Interpreting ERC findings');
        suggestions = await validator.interpretErc(erc, structural);
      }

      outcome = { structural, llmIssues, erc, suggestions, accepted };
      opLogger.info('Iteration complete', {
        iteration,
        accepted,
        structuralIssues: structural.length,
        llmIssues: llmIssues.length,
        ercAvailable: erc.available,
        ercViolations: erc.violationCount,
      });

      if (accepted) {
        emit(PipelineEventType.ACCEPTED, progressAt('interpret', 100), `Schematic accepted after ${iteration} iteration(s)`, {
          iteration,
          max_iterations: maxIterations,
          accepted: true,
        });
        break;
      }

      feedback = collectFeedback(outcome);
      emit(PipelineEventType.ISSUES_FOUND, progressAt('interpret', 100), `${feedback.length} issue(s) found`, {
        iteration,
        max_iterations: maxIterations,
        issues: feedback,
      });
    }

    if (!outcome) {
      throw new ValidationError('Pipeline finished without running an iteration', { maxIterations });
    }

    emit(PipelineEventType.PHASE_START, calculateOverallProgress('report', 0), 'Writing report', { phase: 'report' });
    const report: ValidationReport = {
      schematicPath,
      iterations,
      accepted: outcome.accepted,
      structural: outcome.structural,
      llmIssues: outcome.llmIssues,
      erc: outcome.erc,
      suggestions: outcome.suggestions,
    };
    const reportPath = reportPathFor(schematicPath);
    try {
      await fs.writeFile(reportPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new SchematicWriteError('Failed to write validation report', reportPath, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    emit(
      PipelineEventType.COMPLETE,
      100,
      outcome.accepted ? 'Schematic accepted' : `Finished after ${iterations} iteration(s) with open issues`,
      { schematic_path: schematicPath, report_path: reportPath, accepted: outcome.accepted, iteration: iterations }
    );
    opLogger.info('Pipeline run complete', { schematicPath, reportPath, accepted: outcome.accepted, iterations });

    return {
      operationId,
      circuit,
      design,
      schematicPath,
      reportPath,
      report,
      iterations,
      accepted: outcome.accepted,
    };
  } catch (error) {
    const normalized = handleError(error);
    opLogger.error('Pipeline run failed', normalized, { code: normalized.code });
    emit(PipelineEventType.ERROR, 0, normalized.message, {
      error_message: normalized.message,
      error_code: normalized.code,
    });
    throw normalized;
  }
}
