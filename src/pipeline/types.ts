/**
 * Type definitions and constants for the per-item phase pipeline.
 *
 * Phases run in a fixed order:
 * COLLECT_CONTEXT -> BUILD_DRAFT_REQUEST -> RATE_GATE_1 -> SUBMIT_DRAFT ->
 * RELOCATE_DRAFT -> COLLECT_DRAFT_CONTEXT -> BUILD_FINAL_REQUEST ->
 * RATE_GATE_2 -> SUBMIT_FINAL -> RELOCATE_FINAL -> DONE
 * with FAILED reachable from every non-terminal phase. Before anything
 * runs, COLLECT_CONTEXT may jump straight to a later phase whose inputs
 * already exist on disk (the short-circuit).
 *
 * @module pipeline/types
 */

import type { RateDecision } from '../rate-limit/rate-limiter.js';

// ============================================================================
// Phases
// ============================================================================

/** Every phase in execution order, followed by the failure state. */
export const PIPELINE_PHASES = [
  'COLLECT_CONTEXT',
  'BUILD_DRAFT_REQUEST',
  'RATE_GATE_1',
  'SUBMIT_DRAFT',
  'RELOCATE_DRAFT',
  'COLLECT_DRAFT_CONTEXT',
  'BUILD_FINAL_REQUEST',
  'RATE_GATE_2',
  'SUBMIT_FINAL',
  'RELOCATE_FINAL',
  'DONE',
  'FAILED',
] as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

export type TerminalPhase = 'DONE' | 'FAILED';

export type RateGatePhase = 'RATE_GATE_1' | 'RATE_GATE_2';

/**
 * Valid transitions. Each phase advances to its successor or fails;
 * COLLECT_CONTEXT additionally short-circuits to any resume phase.
 */
export const VALID_PHASE_TRANSITIONS: Record<PipelinePhase, readonly PipelinePhase[]> = {
  COLLECT_CONTEXT: [
    'BUILD_DRAFT_REQUEST',
    'RATE_GATE_1',
    'COLLECT_DRAFT_CONTEXT',
    'BUILD_FINAL_REQUEST',
    'RATE_GATE_2',
    'DONE',
    'FAILED',
  ],
  BUILD_DRAFT_REQUEST: ['RATE_GATE_1', 'FAILED'],
  RATE_GATE_1: ['SUBMIT_DRAFT', 'FAILED'],
  SUBMIT_DRAFT: ['RELOCATE_DRAFT', 'FAILED'],
  RELOCATE_DRAFT: ['COLLECT_DRAFT_CONTEXT', 'FAILED'],
  COLLECT_DRAFT_CONTEXT: ['BUILD_FINAL_REQUEST', 'FAILED'],
  BUILD_FINAL_REQUEST: ['RATE_GATE_2', 'FAILED'],
  RATE_GATE_2: ['SUBMIT_FINAL', 'FAILED'],
  SUBMIT_FINAL: ['RELOCATE_FINAL', 'FAILED'],
  RELOCATE_FINAL: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

/** Log labels per phase. */
export const PHASE_LABELS: Record<PipelinePhase, string> = {
  COLLECT_CONTEXT: 'Collecting context',
  BUILD_DRAFT_REQUEST: 'Creating draft batch request',
  RATE_GATE_1: 'Checking rate limit for draft batch',
  SUBMIT_DRAFT: 'Submitting draft batch',
  RELOCATE_DRAFT: 'Moving draft to drafts directory',
  COLLECT_DRAFT_CONTEXT: 'Collecting draft context',
  BUILD_FINAL_REQUEST: 'Creating final batch request',
  RATE_GATE_2: 'Checking rate limit for final batch',
  SUBMIT_FINAL: 'Submitting final batch',
  RELOCATE_FINAL: 'Moving artifacts to active directory',
  DONE: 'Done',
  FAILED: 'Failed',
};

export function isRateGate(phase: PipelinePhase): phase is RateGatePhase {
  return phase === 'RATE_GATE_1' || phase === 'RATE_GATE_2';
}

export function isTerminal(phase: PipelinePhase): phase is TerminalPhase {
  return phase === 'DONE' || phase === 'FAILED';
}

// ============================================================================
// Results
// ============================================================================

/** Outcome of one work phase. Only its side effects are durable. */
export type PhaseResult =
  | { ok: true; artifacts: string[] }
  | { ok: false; error: Error };

export type PipelineStatus = 'completed' | 'short-circuited' | 'deferred';

/** Outcome of one pipeline run that did not fail. */
export interface PipelineResult {
  item: string;
  status: PipelineStatus;
  /** Phase the run started from after resume detection. */
  resumedFrom: PipelinePhase;
  /** Work phases that ran to completion, in order. */
  phases: PipelinePhase[];
  /** Final artifacts in the active directory (completed runs). */
  artifacts: string[];
  /** The denying decision (deferred runs). */
  decision?: RateDecision;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * An item failed at `phase`. The definition has already been moved to
 * the failed directory when this is thrown.
 */
export class PipelineError extends Error {
  constructor(
    public readonly item: string,
    public readonly phase: PipelinePhase,
    public readonly error: Error,
  ) {
    super(`${item} failed at ${phase}: ${error.message}`, { cause: error });
    this.name = 'PipelineError';
  }
}
