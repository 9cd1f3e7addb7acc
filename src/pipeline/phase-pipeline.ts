/**
 * Per-item phase pipeline.
 *
 * Drives one WorkItem from its resume phase to DONE, stopping early
 * (without error) when a rate gate denies a submission. Partial progress
 * stays on disk and is picked up by the next run through resume
 * detection. Any other error sends the definition to the failed
 * directory with an error file, discards its intermediate artifacts
 * and is rethrown as a PipelineError.
 *
 * State store failures are never treated as item failures: they
 * propagate untouched and stop the run loop.
 *
 * @module pipeline/phase-pipeline
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { OrchestratorConfig } from '../config/schema.js';
import type { DirectoryLayout } from '../config/reader.js';
import type { Collaborators } from '../collaborators/types.js';
import type { Logger } from '../logging/logger.js';
import type { WorkItem } from '../queue/scanner.js';
import { canSubmit, rateLimitFromConfig } from '../rate-limit/rate-limiter.js';
import type { RateDecision, RateLimitConfig } from '../rate-limit/rate-limiter.js';
import { StateStore, StateStoreError } from '../state/state-store.js';
import {
  discardArtifacts,
  itemArtifacts,
  moveAtomic,
  partialPath,
  publishDirectory,
  resolveResumePhase,
} from './artifacts.js';
import type { ItemArtifacts } from './artifacts.js';
import { nextPhase, transitionPhase } from './state-machine.js';
import { PHASE_LABELS, PipelineError, isRateGate } from './types.js';
import type { PhaseResult, PipelinePhase, PipelineResult } from './types.js';

export interface PhasePipelineOptions {
  config: OrchestratorConfig;
  layout: DirectoryLayout;
  store: StateStore;
  collaborators: Collaborators;
  logger: Logger;
  clock?: () => Date;
}

/** Mutable scratch space for one run. */
interface RunContext {
  item: WorkItem;
  paths: ItemArtifacts;
  /** Artifacts returned by the most recent submission. */
  produced: string[];
  /** Final artifacts once published. */
  published: string[];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class PhasePipeline {
  private readonly config: OrchestratorConfig;
  private readonly layout: DirectoryLayout;
  private readonly store: StateStore;
  private readonly collaborators: Collaborators;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly rateLimit: RateLimitConfig;
  private readonly batchTimeoutMs: number;

  constructor(options: PhasePipelineOptions) {
    this.config = options.config;
    this.layout = options.layout;
    this.store = options.store;
    this.collaborators = options.collaborators;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.rateLimit = rateLimitFromConfig(options.config);
    this.batchTimeoutMs = Math.round(options.config.polling.batch_timeout_hours * 3600000);
  }

  /**
   * Run the pipeline for one item.
   *
   * @throws {PipelineError} After the item has been moved to the failed directory
   * @throws {StateStoreError} When state cannot be persisted
   */
  async run(item: WorkItem): Promise<PipelineResult> {
    this.logger.info(`Processing: ${item.name}`);
    await this.store.markCurrent(item.name);

    const ctx: RunContext = {
      item,
      paths: itemArtifacts(this.layout, item, this.config.queue.artifact_extension),
      produced: [],
      published: [],
    };
    const phases: PipelinePhase[] = [];
    let phase: PipelinePhase = 'COLLECT_CONTEXT';

    try {
      const resumedFrom = await resolveResumePhase(ctx.paths);

      if (resumedFrom !== 'COLLECT_CONTEXT') {
        phase = transitionPhase('COLLECT_CONTEXT', resumedFrom);
        this.logger.info(
          resumedFrom === 'DONE'
            ? `Artifacts for ${item.name} already in ${this.layout.activeDir}; skipping generation phases`
            : `Resuming ${item.name} at ${resumedFrom}`,
        );
      }

      while (phase !== 'DONE') {
        if (isRateGate(phase)) {
          const decision = this.checkRateGate(phase);
          if (!decision.allowed) {
            this.logger.warn(`Rate limit check: ${decision.reason}`);
            this.logger.info(`Will retry ${item.name} later`);
            return { item: item.name, status: 'deferred', resumedFrom, phases, artifacts: [], decision };
          }
          phase = transitionPhase(phase, nextPhase(phase));
          continue;
        }

        this.logger.info(`${PHASE_LABELS[phase]}...`);
        const result = await this.executePhase(phase, ctx);
        if (!result.ok) throw result.error;

        phases.push(phase);
        phase = transitionPhase(phase, nextPhase(phase));
      }

      await this.complete(ctx);
      return {
        item: item.name,
        status: resumedFrom === 'DONE' ? 'short-circuited' : 'completed',
        resumedFrom,
        phases,
        artifacts: ctx.published,
      };
    } catch (err) {
      if (err instanceof StateStoreError) throw err;
      throw await this.fail(ctx, phase, toError(err));
    }
  }

  // --------------------------------------------------------------------------
  // Phases
  // --------------------------------------------------------------------------

  private checkRateGate(phase: PipelinePhase): RateDecision {
    const decision = canSubmit(this.store.snapshot(), this.rateLimit, this.clock());
    this.logger.debug(`${phase}: ${decision.reason} (${decision.submissionsInWindow} in last hour)`);
    return decision;
  }

  /**
   * Run one work phase. Errors become a failed result, except state
   * store errors, which are rethrown.
   */
  private async executePhase(phase: PipelinePhase, ctx: RunContext): Promise<PhaseResult> {
    try {
      return { ok: true, artifacts: await this.runPhase(phase, ctx) };
    } catch (err) {
      if (err instanceof StateStoreError) throw err;
      return { ok: false, error: toError(err) };
    }
  }

  private async runPhase(phase: PipelinePhase, ctx: RunContext): Promise<string[]> {
    const { paths } = ctx;
    const { collector, builder } = this.collaborators;

    switch (phase) {
      case 'COLLECT_CONTEXT':
        return [await this.commit(paths.contextPath, (outputPath) =>
          collector.collect({ definitionPath: ctx.item.path, outputPath }))];

      case 'BUILD_DRAFT_REQUEST':
        return [await this.commit(paths.draftRequestPath, (outputPath) =>
          builder.build({ contextPath: paths.contextPath, phase: 'draft', outputPath }))];

      case 'SUBMIT_DRAFT':
        ctx.produced = await this.submit(paths.draftRequestPath, paths.draftResultsDir);
        return ctx.produced;

      case 'RELOCATE_DRAFT': {
        const [draft] = this.matchingArtifacts(ctx.produced);
        if (!draft) {
          throw new Error('No draft artifact produced by batch');
        }
        await moveAtomic(draft, paths.draftPath);
        this.logger.info(`Draft created: ${basename(paths.draftPath)}`);
        return [paths.draftPath];
      }

      case 'COLLECT_DRAFT_CONTEXT':
        return [await this.commit(paths.finalContextPath, (outputPath) =>
          collector.collect({ definitionPath: paths.draftPath, outputPath }))];

      case 'BUILD_FINAL_REQUEST':
        return [await this.commit(paths.finalRequestPath, (outputPath) =>
          builder.build({ contextPath: paths.finalContextPath, phase: 'final', outputPath }))];

      case 'SUBMIT_FINAL':
        ctx.produced = await this.submit(paths.finalRequestPath, paths.finalResultsDir);
        return ctx.produced;

      case 'RELOCATE_FINAL': {
        const artifacts = this.matchingArtifacts(ctx.produced);
        if (artifacts.length === 0) {
          throw new Error('No final artifacts produced by batch');
        }
        ctx.published = await publishDirectory(artifacts, paths.activeStagingDir, paths.activeItemDir);
        for (const artifact of ctx.published) {
          this.logger.info(`Ready for next stage: ${basename(artifact)}`);
        }
        return ctx.published;
      }

      default:
        throw new Error(`Phase ${phase} has no work step`);
    }
  }

  /**
   * Let a collaborator write `<target>.partial`, then rename whatever it
   * returned onto `target`.
   */
  private async commit(
    target: string,
    produce: (outputPath: string) => Promise<string>,
  ): Promise<string> {
    const written = await produce(partialPath(target));
    await moveAtomic(written, target);
    return target;
  }

  /**
   * Submit a batch and record the submission once the call has settled.
   * A submission that was started counts against the window even if it
   * failed.
   */
  private async submit(requestPath: string, outputDir: string): Promise<string[]> {
    await rm(outputDir, { recursive: true, force: true });
    await mkdir(outputDir, { recursive: true });

    try {
      return await this.collaborators.submitter.submit({
        requestPath,
        outputDir,
        timeoutMs: this.batchTimeoutMs,
      });
    } finally {
      await this.store.recordSubmission(this.clock());
    }
  }

  private matchingArtifacts(paths: readonly string[]): string[] {
    const ext = this.config.queue.artifact_extension;
    return paths.filter((p) => extname(p) === ext).sort();
  }

  // --------------------------------------------------------------------------
  // Terminal transitions
  // --------------------------------------------------------------------------

  private async complete(ctx: RunContext): Promise<void> {
    const { item, paths } = ctx;
    await this.store.markCompleted(item.name);

    try {
      await moveAtomic(item.path, paths.completedPath);
    } catch (err) {
      // Already recorded as completed; the scanner will not offer it again.
      this.logger.error(`Could not archive ${item.name}: ${toError(err).message}`);
    }

    this.logger.info(`Completed: ${item.name}`);
  }

  private async fail(ctx: RunContext, phase: PipelinePhase, error: Error): Promise<PipelineError> {
    const { item, paths } = ctx;
    const failure = new PipelineError(item.name, phase, error);
    this.logger.error(`Failed to process ${item.name}: ${error.message}`);

    await mkdir(this.layout.failedDir, { recursive: true });
    try {
      await moveAtomic(item.path, paths.failedPath);
    } catch (err) {
      this.logger.error(`Could not move ${item.name} to ${this.layout.failedDir}: ${toError(err).message}`);
    }
    await writeFile(
      paths.errorPath,
      `Failed at: ${this.clock().toISOString()}\nPhase: ${phase}\nError: ${error.message}\n`,
      'utf-8',
    );

    // A failed item is retired: nothing it produced counts as progress.
    try {
      await discardArtifacts(paths);
    } catch (err) {
      this.logger.error(`Could not clean up artifacts for ${item.name}: ${toError(err).message}`);
    }

    await this.store.markCurrent(null);
    return failure;
  }
}
