/**
 * Pipeline module barrel exports.
 *
 * @module pipeline
 */

export {
  PIPELINE_PHASES,
  VALID_PHASE_TRANSITIONS,
  PHASE_LABELS,
  PipelineError,
  isRateGate,
  isTerminal,
} from './types.js';
export type {
  PipelinePhase,
  TerminalPhase,
  RateGatePhase,
  PhaseResult,
  PipelineStatus,
  PipelineResult,
} from './types.js';
export { transitionPhase, nextPhase } from './state-machine.js';
export {
  itemArtifacts,
  definitionStem,
  discardArtifacts,
  partialPath,
  pathExists,
  resolveResumePhase,
  moveAtomic,
  publishDirectory,
} from './artifacts.js';
export type { ItemArtifacts } from './artifacts.js';
export { PhasePipeline } from './phase-pipeline.js';
export type { PhasePipelineOptions } from './phase-pipeline.js';
