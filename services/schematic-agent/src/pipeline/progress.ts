/**
 * Pipeline Progress Events
 *
 * Typed progress updates emitted by the orchestrator and relayed to the CLI
 * and to browser clients over socket.io.
 */

/**
 * Event types emitted during a pipeline run
 */
export enum PipelineEventType {
  // Run lifecycle
  RUN_START = 'run_start',
  ITERATION_START = 'iteration_start',

  // Phase lifecycle
  PHASE_START = 'phase_start',
  PHASE_COMPLETE = 'phase_complete',

  // Outcome of one iteration
  ISSUES_FOUND = 'issues_found',
  ACCEPTED = 'accepted',

  // Final states
  COMPLETE = 'complete',
  ERROR = 'error',
}

/**
 * Phase names for display
 */
export type PipelinePhase =
  | 'load'
  | 'architect'
  | 'write'
  | 'validate'
  | 'review'
  | 'erc'
  | 'interpret'
  | 'report';

export interface PipelineProgressEvent {
  type: PipelineEventType;

  /** Unique operation ID for this run */
  operationId: string;

  /** ISO timestamp */
  timestamp: string;

  /** Overall progress 0-100 */
  progress_percentage: number;

  /** Human-readable message for current step */
  current_step: string;

  phase?: PipelinePhase;
  iteration?: number;
  max_iterations?: number;

  /** Issue summaries (for ISSUES_FOUND) */
  issues?: string[];

  /** Output paths (for COMPLETE) */
  schematic_path?: string;
  report_path?: string;
  accepted?: boolean;

  /** Error details (for ERROR type) */
  error_message?: string;
  error_code?: string;

  data?: Record<string, unknown>;
}

export type ProgressCallback = (event: PipelineProgressEvent) => void;

/**
 * Helper to create progress events
 */
export function createProgressEvent(
  operationId: string,
  type: PipelineEventType,
  progress: number,
  message: string,
  extra?: Partial<PipelineProgressEvent>
): PipelineProgressEvent {
  return {
    type,
    operationId,
    timestamp: new Date().toISOString(),
    progress_percentage: Math.min(100, Math.max(0, Math.round(progress))),
    current_step: message,
    ...extra,
  };
}

/**
 * Progress ranges for the phases outside the iteration loop
 */
const RUN_PROGRESS_RANGES: Record<'load' | 'report', [number, number]> = {
  load: [0, 5],
  report: [95, 100],
};

/**
 * Progress ranges of each phase within one iteration
 */
export const PHASE_PROGRESS_RANGES: Record<Exclude<PipelinePhase, 'load' | 'report'>, [number, number]> = {
  architect: [0, 30],
  write: [30, 40],
  validate: [40, 55],
  review: [55, 70],
  erc: [70, 90],
  interpret: [90, 100],
};

/**
 * Overall progress from phase, phase progress and iteration. Iterations
 * share the 5-95% band equally.
 */
export function calculateOverallProgress(
  phase: PipelinePhase,
  phaseProgress: number,
  iteration = 1,
  maxIterations = 1
): number {
  if (phase === 'load' || phase === 'report') {
    const [start, end] = RUN_PROGRESS_RANGES[phase];
    return Math.round(start + ((end - start) * phaseProgress) / 100);
  }

  const [start, end] = PHASE_PROGRESS_RANGES[phase];
  const withinIteration = (start + ((end - start) * phaseProgress) / 100) / 100;
  const slice = 90 / Math.max(1, maxIterations);
  return Math.round(5 + slice * (iteration - 1 + withinIteration));
}
