/**
 * Schematic Agent - Pipeline
 *
 * Usage:
 * ```typescript
 * import { runPipeline } from './pipeline/index.js';
 *
 * const result = await runPipeline({
 *   inputPath: 'examples/circuit.json',
 *   outDir: 'output',
 *   onProgress: (event) => console.log(event.progress_percentage, event.current_step),
 * });
 * ```
 */

export { runPipeline, collectFeedback, reportPathFor } from './orchestrator.js';
export type { ArchitectMode, PipelineOptions, PipelineResult } from './orchestrator.js';

export {
  PipelineEventType,
  PHASE_PROGRESS_RANGES,
  calculateOverallProgress,
  createProgressEvent,
} from './progress.js';
export type { PipelinePhase, PipelineProgressEvent, ProgressCallback } from './progress.js';
