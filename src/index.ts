// Config
export {
  OrchestratorConfigSchema,
  DEFAULT_ORCHESTRATOR_CONFIG,
  readOrchestratorConfig,
  resolveLayout,
  assertRunnable,
  ConfigError,
  DEFAULT_CONFIG_FILE,
} from './config/index.js';
export type {
  OrchestratorConfig,
  DirectoryLayout,
  LoadedConfig,
  ReadConfigOptions,
} from './config/index.js';

// Logging
export { createLogger, formatLogLine, formatTimestamp, OrchestratorLogger } from './logging/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logging/logger.js';

// State
export { OrchestratorStateSchema, createDefaultState, StateStore, StateStoreError } from './state/index.js';
export type { OrchestratorState, SubmissionHistory, StateStoreDeps, StateStoreOptions } from './state/index.js';

// Rate limiting
export { canSubmit, pruneSubmissionTimes, rateLimitFromConfig, ONE_HOUR_MS } from './rate-limit/rate-limiter.js';
export type { RateDecision, RateLimitConfig } from './rate-limit/rate-limiter.js';

// Queue
export { listPending, compareWorkItems } from './queue/scanner.js';
export type { WorkItem, ScanOptions } from './queue/scanner.js';

// Collaborators
export {
  CollaboratorError,
  CollectorError,
  RequestBuildError,
  SubmissionError,
  runScript,
  createScriptCollaborators,
} from './collaborators/index.js';
export type {
  Collaborators,
  ContextCollector,
  RequestBuilder,
  BatchSubmitter,
  CollectContextArgs,
  BuildRequestArgs,
  SubmitBatchArgs,
  RequestPhase,
  ScriptInvocation,
  ScriptResult,
  ScriptCollaboratorOptions,
} from './collaborators/index.js';

// Pipeline
export {
  PIPELINE_PHASES,
  VALID_PHASE_TRANSITIONS,
  PipelineError,
  PhasePipeline,
  transitionPhase,
  nextPhase,
  itemArtifacts,
  resolveResumePhase,
} from './pipeline/index.js';
export type {
  PipelinePhase,
  PipelineResult,
  PipelineStatus,
  PhasePipelineOptions,
  ItemArtifacts,
} from './pipeline/index.js';

// Run loop
export { QueueOrchestrator, abortableSleep, createOrchestrator } from './orchestrator/index.js';
export type {
  QueueOrchestratorOptions,
  Sleep,
  CreateOrchestratorOptions,
  OrchestratorHandle,
  ItemOutcome,
  OrchestratorStatus,
  RunSummary,
} from './orchestrator/index.js';
