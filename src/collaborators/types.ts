/**
 * Contracts for the external steps the pipeline invokes.
 *
 * Each step takes structured arguments, writes files, and resolves with
 * the paths it produced, or rejects with a CollaboratorError. What the
 * steps put inside those files is their own business.
 *
 * @module collaborators/types
 */

// ============================================================================
// Step contracts
// ============================================================================

export type RequestPhase = 'draft' | 'final';

export interface CollectContextArgs {
  /** Definition (or relocated draft) to gather context for. */
  definitionPath: string;
  /** Where the context artifact should be written. */
  outputPath: string;
}

export interface BuildRequestArgs {
  contextPath: string;
  phase: RequestPhase;
  /** Where the request payload should be written. */
  outputPath: string;
}

export interface SubmitBatchArgs {
  requestPath: string;
  /** Directory that receives the produced artifacts. */
  outputDir: string;
  timeoutMs: number;
}

export interface ContextCollector {
  /** Resolves with the path of the written context artifact. */
  collect(args: CollectContextArgs): Promise<string>;
}

export interface RequestBuilder {
  /** Resolves with the path of the written request payload. */
  build(args: BuildRequestArgs): Promise<string>;
}

export interface BatchSubmitter {
  /** Resolves with every artifact path the batch produced. */
  submit(args: SubmitBatchArgs): Promise<string[]>;
}

export interface Collaborators {
  collector: ContextCollector;
  builder: RequestBuilder;
  submitter: BatchSubmitter;
}

// ============================================================================
// Errors
// ============================================================================

export type CollaboratorStep = 'collect' | 'build' | 'submit';

export interface CollaboratorFailure {
  exitCode?: number;
  stderr?: string;
  timedOut?: boolean;
  cause?: unknown;
}

/**
 * A collaborator step failed. Per-item: the pipeline moves the item to
 * the failed directory and the run loop carries on.
 */
export class CollaboratorError extends Error {
  readonly exitCode?: number;
  readonly stderr?: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    public readonly step: CollaboratorStep,
    failure: CollaboratorFailure = {},
  ) {
    super(message, { cause: failure.cause });
    this.name = 'CollaboratorError';
    this.exitCode = failure.exitCode;
    this.stderr = failure.stderr;
    this.timedOut = failure.timedOut ?? false;
  }
}

export class CollectorError extends CollaboratorError {
  constructor(message: string, failure?: CollaboratorFailure) {
    super(message, 'collect', failure);
    this.name = 'CollectorError';
  }
}

export class RequestBuildError extends CollaboratorError {
  constructor(message: string, failure?: CollaboratorFailure) {
    super(message, 'build', failure);
    this.name = 'RequestBuildError';
  }
}

export class SubmissionError extends CollaboratorError {
  constructor(message: string, failure?: CollaboratorFailure) {
    super(message, 'submit', failure);
    this.name = 'SubmissionError';
  }
}
