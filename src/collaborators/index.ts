/**
 * Collaborators module barrel exports.
 *
 * @module collaborators
 */

export {
  CollaboratorError,
  CollectorError,
  RequestBuildError,
  SubmissionError,
} from './types.js';
export type {
  BatchSubmitter,
  BuildRequestArgs,
  CollaboratorFailure,
  CollaboratorStep,
  Collaborators,
  CollectContextArgs,
  ContextCollector,
  RequestBuilder,
  RequestPhase,
  SubmitBatchArgs,
} from './types.js';
export { runScript } from './script-runner.js';
export type { ScriptInvocation, ScriptResult } from './script-runner.js';
export { createScriptCollaborators } from './script-collaborators.js';
export type { ScriptCollaboratorOptions } from './script-collaborators.js';
