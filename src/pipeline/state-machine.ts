/**
 * Phase state machine for a single pipeline run.
 *
 * Validates transitions against VALID_PHASE_TRANSITIONS so that a phase
 * can never be skipped or repeated except through the short-circuit
 * transitions out of COLLECT_CONTEXT.
 *
 * @module pipeline/state-machine
 */

import type { PipelinePhase } from './types.js';
import { PIPELINE_PHASES, VALID_PHASE_TRANSITIONS, isTerminal } from './types.js';

/**
 * Move from one phase to another.
 *
 * @returns The target phase.
 * @throws Error if transitioning to the same phase.
 * @throws Error if the transition is not allowed by VALID_PHASE_TRANSITIONS.
 */
export function transitionPhase(from: PipelinePhase, to: PipelinePhase): PipelinePhase {
  if (from === to) {
    throw new Error(`Cannot transition pipeline to same phase: ${to}`);
  }

  const allowed = VALID_PHASE_TRANSITIONS[from];
  if (!allowed.includes(to)) {
    throw new Error(`Invalid pipeline transition: ${from} -> ${to}`);
  }

  return to;
}

/**
 * The phase that follows `phase` on the success path.
 *
 * @throws Error for DONE and FAILED, which have no successor.
 */
export function nextPhase(phase: PipelinePhase): PipelinePhase {
  if (isTerminal(phase)) {
    throw new Error(`Phase ${phase} is terminal`);
  }
  const successor = PIPELINE_PHASES[PIPELINE_PHASES.indexOf(phase) + 1];
  if (successor === undefined || successor === 'FAILED') {
    throw new Error(`Phase ${phase} has no successor`);
  }
  return successor;
}
