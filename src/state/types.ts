/**
 * Persistent orchestrator state.
 *
 * One JSON record holds the submission history the rate limiter decides
 * on, the set of completed queue items, and the item currently in the
 * pipeline. Timestamps are ISO-8601 strings.
 *
 * @module state/types
 */

import { z } from 'zod';

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 timestamp');

export const OrchestratorStateSchema = z.object({
  lastSubmissionTime: isoTimestamp.nullable().default(null),
  submissionTimes: z.array(isoTimestamp).default([]),
  completedItems: z.array(z.string().min(1)).default([]),
  currentItem: z.string().min(1).nullable().default(null),
});

export type OrchestratorState = z.infer<typeof OrchestratorStateSchema>;

/** The slice of state the rate limiter reads. */
export type SubmissionHistory = Pick<OrchestratorState, 'lastSubmissionTime' | 'submissionTimes'>;

/**
 * Fresh state used on first run and when the persisted copy is unusable.
 */
export function createDefaultState(): OrchestratorState {
  return {
    lastSubmissionTime: null,
    submissionTimes: [],
    completedItems: [],
    currentItem: null,
  };
}
