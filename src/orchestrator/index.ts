/**
 * Orchestrator module barrel exports.
 *
 * @module orchestrator
 */

export { QueueOrchestrator, abortableSleep } from './queue-orchestrator.js';
export type { QueueOrchestratorOptions, Sleep } from './queue-orchestrator.js';
export { createOrchestrator } from './create.js';
export type { CreateOrchestratorOptions, OrchestratorHandle } from './create.js';
export type { ItemOutcome, OrchestratorStatus, RunSummary } from './types.js';
