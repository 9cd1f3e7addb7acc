/**
 * Durable store for the orchestrator state.
 *
 * State is held in memory and rewritten to disk after every mutation.
 * Writes go to a temp file in the same directory which is then renamed
 * over the state file, so a crash mid-write leaves the previous record
 * readable.
 *
 * A missing, unparseable or schema-invalid file loads as fresh state.
 * Any other filesystem failure is wrapped in StateStoreError and is
 * fatal to the caller: rate decisions must never run on state that was
 * not persisted.
 *
 * @module state/state-store
 */

import { readFile, writeFile, rename, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { OrchestratorStateSchema, createDefaultState } from './types.js';
import type { OrchestratorState } from './types.js';
import { pruneSubmissionTimes } from '../rate-limit/rate-limiter.js';
import type { Logger } from '../logging/logger.js';

// ============================================================================
// Error type
// ============================================================================

export class StateStoreError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StateStoreError';
  }
}

// ============================================================================
// DI Interface
// ============================================================================

export interface StateStoreDeps {
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, data: string) => Promise<void>;
  rename: (from: string, to: string) => Promise<void>;
  mkdir: (path: string, options: { recursive: boolean }) => Promise<unknown>;
}

const defaultDeps: StateStoreDeps = {
  readFile: (path) => readFile(path, 'utf-8'),
  writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  rename: (from, to) => rename(from, to),
  mkdir: (path, options) => mkdir(path, options),
};

export interface StateStoreOptions {
  logger?: Logger;
  deps?: Partial<StateStoreDeps>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Store
// ============================================================================

export class StateStore {
  private state: OrchestratorState = createDefaultState();
  private readonly deps: StateStoreDeps;
  private readonly logger?: Logger;
  private dirEnsured = false;

  constructor(
    private readonly filePath: string,
    options: StateStoreOptions = {},
  ) {
    this.deps = { ...defaultDeps, ...options.deps };
    this.logger = options.logger;
  }

  /**
   * Create a store and load its persisted state.
   */
  static async open(filePath: string, options: StateStoreOptions = {}): Promise<StateStore> {
    const store = new StateStore(filePath, options);
    await store.load();
    return store;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Load persisted state, replacing what is held in memory.
   */
  async load(): Promise<OrchestratorState> {
    let content: string;
    try {
      content = await this.deps.readFile(this.filePath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        this.state = createDefaultState();
        return this.snapshot();
      }
      throw new StateStoreError(
        `Cannot read state file ${this.filePath}: ${errorMessage(err)}`,
        this.filePath,
        { cause: err },
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      this.logger?.warn(`State file ${this.filePath} is not valid JSON; starting fresh`);
      this.state = createDefaultState();
      return this.snapshot();
    }

    const result = OrchestratorStateSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      this.logger?.warn(
        `State file ${this.filePath} failed validation (${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}); starting fresh`,
      );
      this.state = createDefaultState();
      return this.snapshot();
    }

    this.state = result.data;
    return this.snapshot();
  }

  /**
   * Persist the full record with a temp-file-then-rename write.
   */
  async save(state: OrchestratorState = this.state): Promise<void> {
    this.state = state;
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      if (!this.dirEnsured) {
        await this.deps.mkdir(dirname(this.filePath), { recursive: true });
        this.dirEnsured = true;
      }
      await this.deps.writeFile(tempPath, JSON.stringify(state, null, 2) + '\n');
      await this.deps.rename(tempPath, this.filePath);
    } catch (err) {
      throw new StateStoreError(
        `Cannot write state file ${this.filePath}: ${errorMessage(err)}`,
        this.filePath,
        { cause: err },
      );
    }
  }

  /**
   * Deep copy of the in-memory state.
   */
  snapshot(): OrchestratorState {
    return {
      lastSubmissionTime: this.state.lastSubmissionTime,
      submissionTimes: [...this.state.submissionTimes],
      completedItems: [...this.state.completedItems],
      currentItem: this.state.currentItem,
    };
  }

  isCompleted(name: string): boolean {
    return this.state.completedItems.includes(name);
  }

  completedItems(): ReadonlySet<string> {
    return new Set(this.state.completedItems);
  }

  // --------------------------------------------------------------------------
  // Mutators: each one persists before returning
  // --------------------------------------------------------------------------

  /**
   * Record a batch submission, pruning the window in the same write.
   */
  async recordSubmission(at: Date): Promise<void> {
    const timestamp = at.toISOString();
    this.state = {
      ...this.state,
      lastSubmissionTime: timestamp,
      submissionTimes: [...pruneSubmissionTimes(this.state.submissionTimes, at), timestamp],
    };
    this.logger?.debug(
      `Recorded submission at ${timestamp} (${this.state.submissionTimes.length} in last hour)`,
    );
    await this.save();
  }

  async markCurrent(name: string | null): Promise<void> {
    this.state = { ...this.state, currentItem: name };
    await this.save();
  }

  /**
   * Add an item to the completed set (once) and clear the current item.
   */
  async markCompleted(name: string): Promise<void> {
    const completedItems = this.state.completedItems.includes(name)
      ? this.state.completedItems
      : [...this.state.completedItems, name];
    this.state = { ...this.state, completedItems, currentItem: null };
    this.logger?.debug(`Marked ${name} completed`);
    await this.save();
  }
}
