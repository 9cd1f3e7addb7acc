/**
 * Queue orchestrator run loop.
 *
 * One logical worker drains the queue an item at a time through the
 * phase pipeline. A failed item is logged and skipped; a state store
 * error stops the loop. Daemon mode repeats the pass on a fixed interval
 * until its AbortSignal fires. Cancellation is only observed between
 * items and between passes, never inside a pipeline run.
 *
 * @module orchestrator/queue-orchestrator
 */

import { mkdir } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import type { OrchestratorConfig } from '../config/schema.js';
import type { DirectoryLayout } from '../config/reader.js';
import type { Collaborators } from '../collaborators/types.js';
import type { Logger } from '../logging/logger.js';
import { PhasePipeline } from '../pipeline/phase-pipeline.js';
import { PipelineError } from '../pipeline/types.js';
import { listPending } from '../queue/scanner.js';
import type { WorkItem } from '../queue/scanner.js';
import { canSubmit, pruneSubmissionTimes, rateLimitFromConfig } from '../rate-limit/rate-limiter.js';
import { StateStore, StateStoreError } from '../state/state-store.js';
import type { ItemOutcome, OrchestratorStatus, RunSummary } from './types.js';

/** Resolves after `ms`, or early once `signal` aborts. Never rejects on abort. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') return;
    throw err;
  }
};

export interface QueueOrchestratorOptions {
  config: OrchestratorConfig;
  layout: DirectoryLayout;
  store: StateStore;
  collaborators: Collaborators;
  logger: Logger;
  clock?: () => Date;
  sleep?: Sleep;
}

export class QueueOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly layout: DirectoryLayout;
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly sleep: Sleep;
  private readonly pipeline: PhasePipeline;

  constructor(options: QueueOrchestratorOptions) {
    this.config = options.config;
    this.layout = options.layout;
    this.store = options.store;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? abortableSleep;
    this.pipeline = new PhasePipeline({
      config: options.config,
      layout: options.layout,
      store: options.store,
      collaborators: options.collaborators,
      logger: options.logger,
      clock: this.clock,
    });
  }

  /**
   * Create every configured directory.
   */
  async ensureLayout(): Promise<void> {
    const { queueDir, failedDir, stagingDir, draftsDir, activeDir, completedDir, logsDir } = this.layout;
    for (const dir of [queueDir, failedDir, stagingDir, draftsDir, activeDir, completedDir, logsDir]) {
      await mkdir(dir, { recursive: true });
    }
  }

  /** Pending items, oldest first. */
  async scan(): Promise<WorkItem[]> {
    return listPending(this.layout.queueDir, this.store.completedItems(), {
      extension: this.config.queue.definition_extension,
    });
  }

  /**
   * Process every pending item once.
   *
   * @throws {StateStoreError} When state cannot be persisted
   */
  async runOnce(signal?: AbortSignal): Promise<RunSummary> {
    const items = await this.scan();
    const summary: RunSummary = {
      scanned: items.length,
      outcomes: [],
      completed: 0,
      shortCircuited: 0,
      deferred: 0,
      failed: 0,
      aborted: false,
    };

    if (items.length === 0) {
      this.logger.info('No files in queue');
      return summary;
    }
    this.logger.info(`Found ${items.length} files in queue`);

    for (const item of items) {
      if (signal?.aborted) {
        summary.aborted = true;
        break;
      }
      const outcome = await this.processItem(item);
      summary.outcomes.push(outcome);
      switch (outcome.status) {
        case 'completed': summary.completed++; break;
        case 'short-circuited': summary.shortCircuited++; break;
        case 'deferred': summary.deferred++; break;
        case 'failed': summary.failed++; break;
      }
    }

    return summary;
  }

  /**
   * Repeat passes until `signal` aborts, sleeping the queue check
   * interval after each one. A failed pass is logged and retried on the
   * next cycle; only a state store error ends the loop.
   *
   * @returns The number of passes started.
   * @throws {StateStoreError} When state cannot be persisted
   */
  async runDaemon(signal: AbortSignal): Promise<number> {
    const intervalSeconds = this.config.polling.queue_check_interval_seconds;
    this.logger.info(`Queue directory: ${this.layout.queueDir}`);
    this.logger.info(`Check interval: ${intervalSeconds}s`);
    this.logger.info(`Rate limit: ${this.config.rate_limit.max_batches_per_hour} batches/hour`);

    let cycles = 0;
    while (!signal.aborted) {
      cycles++;
      try {
        const summary = await this.runOnce(signal);
        if (summary.scanned === 0) {
          this.logger.info('Queue empty, waiting...');
        }
      } catch (err) {
        if (err instanceof StateStoreError) throw err;
        // e.g. the queue directory became unreadable; retry next cycle
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Queue pass failed: ${message}`);
      }
      if (signal.aborted) break;
      await this.sleep(intervalSeconds * 1000, signal);
    }

    this.logger.info('Shutting down gracefully...');
    return cycles;
  }

  /**
   * Snapshot of the queue and the rate limiter's current decision.
   */
  async status(): Promise<OrchestratorStatus> {
    const state = this.store.snapshot();
    const now = this.clock();
    const queued = await this.scan();
    return {
      queueDir: this.layout.queueDir,
      queued: queued.map((item) => item.name),
      processed: state.completedItems.length,
      currentItem: state.currentItem,
      lastSubmissionTime: state.lastSubmissionTime,
      submissionsInLastHour: pruneSubmissionTimes(state.submissionTimes, now).length,
      decision: canSubmit(state, rateLimitFromConfig(this.config), now),
    };
  }

  private async processItem(item: WorkItem): Promise<ItemOutcome> {
    try {
      const result = await this.pipeline.run(item);
      return { item: item.name, status: result.status, artifacts: result.artifacts };
    } catch (err) {
      if (err instanceof StateStoreError) throw err;
      if (err instanceof PipelineError) {
        this.logger.warn('Continuing with next file after error');
        return { item: item.name, status: 'failed', phase: err.phase, error: err.error.message, artifacts: [] };
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Unexpected error processing ${item.name}: ${message}`);
      return { item: item.name, status: 'failed', error: message, artifacts: [] };
    }
  }
}
