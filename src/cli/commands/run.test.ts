/**
 * Tests for the run command.
 *
 * Covers:
 * - Help flag
 * - Configuration errors (missing API key, bad env value, bad JSON)
 * - A full pass with fake collaborators
 * - Custom config path (--config=)
 * - Unreadable state file
 * - Summary rendering
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm, stat } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { formatSummary, runCommand } from './run.js';
import type {
  BuildRequestArgs,
  CollectContextArgs,
  Collaborators,
  SubmitBatchArgs,
} from '../../collaborators/types.js';
import type { Logger } from '../../logging/logger.js';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
    info: vi.fn(),
  },
  intro: vi.fn(),
  outro: vi.fn(),
}));

import * as p from '@clack/prompts';

function makeLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

function fakeCollaborators(): Collaborators {
  return {
    collector: {
      collect: async (args: CollectContextArgs) => {
        await writeFile(args.outputPath, '{}', 'utf-8');
        return args.outputPath;
      },
    },
    builder: {
      build: async (args: BuildRequestArgs) => {
        await writeFile(args.outputPath, '{}\n', 'utf-8');
        return args.outputPath;
      },
    },
    submitter: {
      submit: async (args: SubmitBatchArgs) => {
        const output = join(args.outputDir, 'result.md');
        await writeFile(output, 'result', 'utf-8');
        return [output];
      },
    },
  };
}

describe('runCommand', () => {
  let root: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  const env = {
    BATCH_API_KEY: 'test-secret',
    MAX_BATCHES_PER_HOUR: '10',
    MIN_BATCH_INTERVAL_MINUTES: '0',
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    root = await mkdtemp(join(tmpdir(), 'run-command-test-'));
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  function options(extraEnv: NodeJS.ProcessEnv = {}) {
    return {
      env: { ...env, ...extraEnv },
      root,
      orchestrator: {
        logger: makeLogger(),
        collaborators: fakeCollaborators(),
        clock: () => new Date('2026-03-01T10:00:00.000Z'),
      },
    };
  }

  it('prints help and exits 0', async () => {
    expect(await runCommand(['--help'])).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('Usage: queue-orchestrator [run] [options]'));
  });

  it('exits 1 when the API key is missing', async () => {
    const exitCode = await runCommand([], { env: {}, root });

    expect(exitCode).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      'Configuration Error: BATCH_API_KEY not set. Export it or add "api_key" to orchestrator.config.json.',
    );
  });

  it('exits 1 on a non-numeric rate limit', async () => {
    const exitCode = await runCommand([], options({ MAX_BATCHES_PER_HOUR: 'lots' }));

    expect(exitCode).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      'Configuration Error: MAX_BATCHES_PER_HOUR must be a number, got "lots"',
    );
  });

  it('exits 1 on an invalid config file', async () => {
    await writeFile(join(root, 'orchestrator.config.json'), '{ nope', 'utf-8');

    expect(await runCommand([], options())).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      `Configuration Error: Invalid JSON in config file: ${join(root, 'orchestrator.config.json')}`,
    );
  });

  it('processes the queue and prints the totals', async () => {
    await mkdir(join(root, 'queue'), { recursive: true });
    await writeFile(join(root, 'queue', 'feature.md'), '# Feature\n', 'utf-8');
    const opts = options();

    const exitCode = await runCommand([], opts);

    expect(exitCode).toBe(0);
    expect((await stat(join(root, 'active', 'feature', 'result.md'))).isFile()).toBe(true);
    expect(consoleLogSpy).toHaveBeenCalledWith('1 completed, 0 deferred, 0 failed (of 1 queued)');
    expect(p.outro).toHaveBeenCalledTimes(1);
    expect(opts.orchestrator.logger.flush).toHaveBeenCalled();
  });

  it('prints nothing but logs when the queue is empty', async () => {
    const opts = options();

    expect(await runCommand([], opts)).toBe(0);
    expect(p.intro).not.toHaveBeenCalled();
    expect(opts.orchestrator.logger.info).toHaveBeenCalledWith('No files in queue');
    expect((await stat(join(root, 'queue', 'failed'))).isDirectory()).toBe(true);
  });

  it('reads the config file given with --config=', async () => {
    await writeFile(
      join(root, 'custom.json'),
      JSON.stringify({ paths: { queue_dir: 'inbox', failed_dir: 'inbox/failed' } }),
      'utf-8',
    );
    await mkdir(join(root, 'inbox'), { recursive: true });
    await writeFile(join(root, 'inbox', 'feature.md'), '# Feature\n', 'utf-8');

    expect(await runCommand(['--config=custom.json'], options())).toBe(0);
    expect((await stat(join(root, 'completed', 'feature.md'))).isFile()).toBe(true);
  });

  it('exits 1 when the state file cannot be read', async () => {
    await mkdir(join(root, 'logs', 'orchestrator-state.json'), { recursive: true });

    expect(await runCommand([], options())).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(
      expect.stringContaining(`Cannot read state file ${join(root, 'logs', 'orchestrator-state.json')}`),
    );
  });
});

describe('formatSummary', () => {
  it('ends with the totals line', () => {
    const lines = formatSummary({
      scanned: 4,
      outcomes: [
        { item: 'a.md', status: 'completed', artifacts: ['x.md'] },
        { item: 'b.md', status: 'short-circuited', artifacts: [] },
        { item: 'c.md', status: 'deferred', artifacts: [] },
        { item: 'd.md', status: 'failed', phase: 'SUBMIT_DRAFT', error: 'timed out', artifacts: [] },
      ],
      completed: 1,
      shortCircuited: 1,
      deferred: 1,
      failed: 1,
      aborted: false,
    });

    expect(lines).toHaveLength(5);
    expect(lines[3]).toContain('d.md');
    expect(lines[3]).toContain('SUBMIT_DRAFT: timed out');
    expect(lines[4]).toBe('2 completed, 1 deferred, 1 failed (of 4 queued)');
  });
});
