/**
 * Tests for the per-item phase pipeline.
 *
 * Collaborators are in-memory fakes that write their outputs to a temp
 * directory; the clock is fixed and advanced by hand.
 *
 * @module pipeline/phase-pipeline.test
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, writeFile, readFile, rename, rm } from 'fs/promises';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import { PhasePipeline } from './phase-pipeline.js';
import { PipelineError } from './types.js';
import { itemArtifacts, pathExists } from './artifacts.js';
import { DEFAULT_ORCHESTRATOR_CONFIG } from '../config/schema.js';
import type { OrchestratorConfig } from '../config/schema.js';
import { resolveLayout } from '../config/reader.js';
import type { DirectoryLayout } from '../config/reader.js';
import { StateStore, StateStoreError } from '../state/state-store.js';
import type { StateStoreOptions } from '../state/state-store.js';
import { CollectorError, SubmissionError } from '../collaborators/types.js';
import type {
  BuildRequestArgs,
  CollectContextArgs,
  Collaborators,
  SubmitBatchArgs,
} from '../collaborators/types.js';
import type { Logger } from '../logging/logger.js';
import type { WorkItem } from '../queue/scanner.js';

// ============================================================================
// Fixtures
// ============================================================================

const T0 = new Date('2026-03-01T10:00:00.000Z');

function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60000);
}

function makeLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

function makeCollaborators() {
  const collect = vi.fn(async (args: CollectContextArgs) => {
    await writeFile(args.outputPath, JSON.stringify({ source: basename(args.definitionPath) }), 'utf-8');
    return args.outputPath;
  });
  const build = vi.fn(async (args: BuildRequestArgs) => {
    await writeFile(args.outputPath, `{"phase":"${args.phase}"}\n`, 'utf-8');
    return args.outputPath;
  });
  const submit = vi.fn(async (args: SubmitBatchArgs) => {
    const names = args.requestPath.endsWith('-final-request.jsonl')
      ? ['spec.md', 'tasks.md', 'batch.log']
      : ['draft.md', 'batch.log'];
    for (const name of names) {
      await writeFile(join(args.outputDir, name), name, 'utf-8');
    }
    return names.map((name) => join(args.outputDir, name)).sort();
  });
  const collaborators: Collaborators = {
    collector: { collect },
    builder: { build },
    submitter: { submit },
  };
  return { collaborators, collect, build, submit };
}

const UNLIMITED: OrchestratorConfig = {
  ...DEFAULT_ORCHESTRATOR_CONFIG,
  rate_limit: { max_batches_per_hour: 10, min_batch_interval_minutes: 0 },
};

// ============================================================================
// Tests
// ============================================================================

describe('PhasePipeline', () => {
  let root: string;
  let layout: DirectoryLayout;
  let item: WorkItem;
  let now: Date;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'phase-pipeline-test-'));
    layout = resolveLayout(DEFAULT_ORCHESTRATOR_CONFIG, root);
    for (const dir of [layout.queueDir, layout.stagingDir, layout.draftsDir, layout.activeDir]) {
      await mkdir(dir, { recursive: true });
    }
    item = { name: 'feature.md', path: join(layout.queueDir, 'feature.md'), modifiedAt: 0 };
    await writeFile(item.path, '# Feature\n', 'utf-8');
    now = T0;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function setup(config: OrchestratorConfig = UNLIMITED, storeOptions: StateStoreOptions = {}) {
    const store = await StateStore.open(layout.stateFile, storeOptions);
    const fakes = makeCollaborators();
    const logger = makeLogger();
    const pipeline = new PhasePipeline({
      config,
      layout,
      store,
      collaborators: fakes.collaborators,
      logger,
      clock: () => now,
    });
    return { store, pipeline, logger, ...fakes };
  }

  const paths = () => itemArtifacts(layout, item, '.md');

  it('runs a fresh item through every phase', async () => {
    const { pipeline, store, collect, build, submit } = await setup();

    const result = await pipeline.run(item);

    expect(result.status).toBe('completed');
    expect(result.resumedFrom).toBe('COLLECT_CONTEXT');
    expect(result.phases).toEqual([
      'COLLECT_CONTEXT',
      'BUILD_DRAFT_REQUEST',
      'SUBMIT_DRAFT',
      'RELOCATE_DRAFT',
      'COLLECT_DRAFT_CONTEXT',
      'BUILD_FINAL_REQUEST',
      'SUBMIT_FINAL',
      'RELOCATE_FINAL',
    ]);
    expect(result.artifacts).toEqual([
      join(layout.activeDir, 'feature', 'spec.md'),
      join(layout.activeDir, 'feature', 'tasks.md'),
    ]);

    expect(collect).toHaveBeenCalledTimes(2);
    expect(collect.mock.calls[0]?.[0]).toEqual({
      definitionPath: item.path,
      outputPath: `${paths().contextPath}.partial`,
    });
    expect(collect.mock.calls[1]?.[0].definitionPath).toBe(paths().draftPath);
    expect(build.mock.calls.map((call) => call[0].phase)).toEqual(['draft', 'final']);
    expect(submit.mock.calls[0]?.[0].timeoutMs).toBe(3 * 3600000);

    expect(await readFile(paths().draftPath, 'utf-8')).toBe('draft.md');
    expect(await pathExists(`${paths().contextPath}.partial`)).toBe(false);
    expect(await pathExists(item.path)).toBe(false);
    expect(await readFile(paths().completedPath, 'utf-8')).toBe('# Feature\n');

    const state = store.snapshot();
    expect(state.completedItems).toEqual(['feature.md']);
    expect(state.currentItem).toBeNull();
    expect(state.submissionTimes).toEqual([T0.toISOString(), T0.toISOString()]);
    expect(state.lastSubmissionTime).toBe(T0.toISOString());
  });

  it('persists the completed set across store instances', async () => {
    const { pipeline } = await setup();
    await pipeline.run(item);

    const reopened = await StateStore.open(layout.stateFile);
    expect(reopened.isCompleted('feature.md')).toBe(true);
  });

  it('short-circuits to DONE when final artifacts are already published', async () => {
    await mkdir(paths().activeItemDir, { recursive: true });
    const { pipeline, store, collect, build, submit } = await setup();

    const result = await pipeline.run(item);

    expect(result.status).toBe('short-circuited');
    expect(result.resumedFrom).toBe('DONE');
    expect(result.phases).toEqual([]);
    expect(collect).not.toHaveBeenCalled();
    expect(build).not.toHaveBeenCalled();
    expect(submit).not.toHaveBeenCalled();
    expect(store.isCompleted('feature.md')).toBe(true);
  });

  it('defers at the first gate and resumes without re-collecting', async () => {
    const { pipeline, store, logger, collect, build, submit } = await setup(DEFAULT_ORCHESTRATOR_CONFIG);
    await store.recordSubmission(minutesAfter(T0, -10));

    const first = await pipeline.run(item);

    expect(first.status).toBe('deferred');
    expect(first.phases).toEqual(['COLLECT_CONTEXT', 'BUILD_DRAFT_REQUEST']);
    expect(first.decision?.reason).toBe('Rate limit: 1 batches in last hour. Wait 50 minutes.');
    expect(logger.warn).toHaveBeenCalledWith('Rate limit check: Rate limit: 1 batches in last hour. Wait 50 minutes.');
    expect(submit).not.toHaveBeenCalled();
    expect(store.snapshot().currentItem).toBe('feature.md');
    expect(store.isCompleted('feature.md')).toBe(false);
    expect(await pathExists(item.path)).toBe(true);

    now = minutesAfter(T0, 60);
    const second = await pipeline.run(item);

    expect(second.resumedFrom).toBe('RATE_GATE_1');
    expect(second.phases).toEqual([
      'SUBMIT_DRAFT',
      'RELOCATE_DRAFT',
      'COLLECT_DRAFT_CONTEXT',
      'BUILD_FINAL_REQUEST',
    ]);
    expect(collect).toHaveBeenCalledTimes(2);
    expect(collect.mock.calls[1]?.[0].definitionPath).toBe(paths().draftPath);
    expect(build).toHaveBeenCalledTimes(2);
    expect(submit).toHaveBeenCalledTimes(1);
  });

  it('checks each gate separately against the shared window', async () => {
    const { pipeline, store, submit } = await setup(DEFAULT_ORCHESTRATOR_CONFIG);

    const first = await pipeline.run(item);

    expect(first.status).toBe('deferred');
    expect(first.decision?.reason).toBe('Rate limit: 1 batches in last hour. Wait 60 minutes.');
    expect(submit).toHaveBeenCalledTimes(1);
    expect(await pathExists(paths().finalRequestPath)).toBe(true);

    now = minutesAfter(T0, 61);
    const second = await pipeline.run(item);

    expect(second.status).toBe('completed');
    expect(second.resumedFrom).toBe('RATE_GATE_2');
    expect(second.phases).toEqual(['SUBMIT_FINAL', 'RELOCATE_FINAL']);
    expect(submit).toHaveBeenCalledTimes(2);
    expect(store.snapshot().submissionTimes).toEqual([minutesAfter(T0, 61).toISOString()]);
  });

  it('moves a failing item to the failed directory with an error file', async () => {
    const { pipeline, store, collect } = await setup();
    collect.mockRejectedValueOnce(new CollectorError('collect-context.sh exited with code 1: boom', {}));

    const error = await pipeline.run(item).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    if (error instanceof PipelineError) {
      expect(error.phase).toBe('COLLECT_CONTEXT');
      expect(error.item).toBe('feature.md');
      expect(error.error).toBeInstanceOf(CollectorError);
      expect(error.message).toBe('feature.md failed at COLLECT_CONTEXT: collect-context.sh exited with code 1: boom');
    }
    expect(await pathExists(item.path)).toBe(false);
    expect(await readFile(paths().failedPath, 'utf-8')).toBe('# Feature\n');
    expect(await readFile(paths().errorPath, 'utf-8')).toBe(
      'Failed at: 2026-03-01T10:00:00.000Z\nPhase: COLLECT_CONTEXT\nError: collect-context.sh exited with code 1: boom\n',
    );
    expect(store.snapshot().currentItem).toBeNull();
    expect(store.isCompleted('feature.md')).toBe(false);
  });

  it('counts a failed submission against the window', async () => {
    const { pipeline, store, submit } = await setup();
    submit.mockRejectedValueOnce(new SubmissionError('submit-batch.sh timed out after 10860s', { timedOut: true }));

    await expect(pipeline.run(item)).rejects.toBeInstanceOf(PipelineError);

    expect(store.snapshot().submissionTimes).toEqual([T0.toISOString()]);
    expect(store.snapshot().lastSubmissionTime).toBe(T0.toISOString());
  });

  it('starts a re-queued definition from scratch after a failure', async () => {
    const { pipeline, submit, collect, build } = await setup();
    submit.mockRejectedValueOnce(new SubmissionError('submit-batch.sh exited with code 1: rejected', { exitCode: 1 }));

    await expect(pipeline.run(item)).rejects.toBeInstanceOf(PipelineError);

    expect(await pathExists(paths().contextPath)).toBe(false);
    expect(await pathExists(paths().draftRequestPath)).toBe(false);
    expect(await pathExists(paths().draftResultsDir)).toBe(false);
    expect(await pathExists(paths().errorPath)).toBe(true);

    await writeFile(item.path, '# Feature (fixed)\n', 'utf-8');
    const result = await pipeline.run(item);

    expect(result.resumedFrom).toBe('COLLECT_CONTEXT');
    expect(result.status).toBe('completed');
    expect(collect).toHaveBeenCalledTimes(3);
    expect(build).toHaveBeenCalledTimes(3);
  });

  it('fails RELOCATE_DRAFT when the batch produced no artifact', async () => {
    const { pipeline, submit } = await setup();
    submit.mockImplementationOnce(async (args: SubmitBatchArgs) => {
      await writeFile(join(args.outputDir, 'batch.log'), 'log', 'utf-8');
      return [join(args.outputDir, 'batch.log')];
    });

    await expect(pipeline.run(item)).rejects.toThrow(
      'feature.md failed at RELOCATE_DRAFT: No draft artifact produced by batch',
    );
  });

  it('lets state store failures propagate without failing the item', async () => {
    let renames = 0;
    const { pipeline } = await setup(UNLIMITED, {
      deps: {
        rename: async (from, to) => {
          renames += 1;
          if (renames >= 2) throw new Error('disk full');
          await rename(from, to);
        },
      },
    });

    await expect(pipeline.run(item)).rejects.toBeInstanceOf(StateStoreError);

    expect(await pathExists(item.path)).toBe(true);
    expect(await pathExists(paths().errorPath)).toBe(false);
  });
});
