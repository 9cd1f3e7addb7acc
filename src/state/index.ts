/**
 * State module barrel exports.
 *
 * @module state
 */

export { OrchestratorStateSchema, createDefaultState } from './types.js';
export type { OrchestratorState, SubmissionHistory } from './types.js';
export { StateStore, StateStoreError } from './state-store.js';
export type { StateStoreDeps, StateStoreOptions } from './state-store.js';
