/**
 * Run loop result and status types.
 *
 * @module orchestrator/types
 */

import type { PipelinePhase, PipelineStatus } from '../pipeline/types.js';
import type { RateDecision } from '../rate-limit/rate-limiter.js';

/** What happened to one item during a pass. */
export interface ItemOutcome {
  item: string;
  status: PipelineStatus | 'failed';
  /** Phase the item failed at. */
  phase?: PipelinePhase;
  error?: string;
  /** Published final artifacts. */
  artifacts: string[];
}

/** Result of one pass over the queue. */
export interface RunSummary {
  /** Items the scan offered. */
  scanned: number;
  outcomes: ItemOutcome[];
  completed: number;
  shortCircuited: number;
  deferred: number;
  failed: number;
  /** The pass stopped early on cancellation. */
  aborted: boolean;
}

/** Read-only view of queue and rate-limit state. */
export interface OrchestratorStatus {
  queueDir: string;
  queued: string[];
  processed: number;
  currentItem: string | null;
  lastSubmissionTime: string | null;
  submissionsInLastHour: number;
  decision: RateDecision;
}
