/**
 * Orchestrator config reader with Zod validation.
 *
 * Reads `orchestrator.config.json` from the project root (missing file =
 * all defaults), overlays environment variables, and parses the result
 * through the schema. Invalid input produces a ConfigError naming the
 * offending field.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import { OrchestratorConfigSchema } from './schema.js';
import type { OrchestratorConfig } from './schema.js';

// ============================================================================
// Constants
// ============================================================================

/** Default config file name, resolved against the project root. */
export const DEFAULT_CONFIG_FILE = 'orchestrator.config.json';

/**
 * Environment variables that override file values.
 * Numeric variables must parse as finite numbers.
 */
const ENV_OVERRIDES: ReadonlyArray<{
  env: string;
  section?: string;
  key: string;
  kind: 'string' | 'number';
}> = [
  { env: 'BATCH_API_KEY', key: 'api_key', kind: 'string' },
  { env: 'ORCHESTRATOR_ENV', key: 'environment', kind: 'string' },
  { env: 'MAX_BATCHES_PER_HOUR', section: 'rate_limit', key: 'max_batches_per_hour', kind: 'number' },
  { env: 'MIN_BATCH_INTERVAL_MINUTES', section: 'rate_limit', key: 'min_batch_interval_minutes', kind: 'number' },
  { env: 'QUEUE_CHECK_INTERVAL_SECONDS', section: 'polling', key: 'queue_check_interval_seconds', kind: 'number' },
  { env: 'BATCH_POLL_INTERVAL_SECONDS', section: 'polling', key: 'batch_poll_interval_seconds', kind: 'number' },
  { env: 'BATCH_TIMEOUT_HOURS', section: 'polling', key: 'batch_timeout_hours', kind: 'number' },
];

// ============================================================================
// Error type
// ============================================================================

/**
 * Error thrown when the config cannot be read, parsed or validated.
 * Always fatal: the CLI exits non-zero before entering the run loop.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Types
// ============================================================================

/** Absolute locations of every directory and file the orchestrator touches. */
export interface DirectoryLayout {
  root: string;
  queueDir: string;
  failedDir: string;
  stagingDir: string;
  draftsDir: string;
  activeDir: string;
  completedDir: string;
  logsDir: string;
  logFile: string;
  stateFile: string;
  scriptsDir: string;
}

export interface ReadConfigOptions {
  /** Config file path; relative paths resolve against the root. */
  configPath?: string;
  /** Environment to overlay (default: process.env). */
  env?: NodeJS.ProcessEnv;
  /** Project root (default: ORCHESTRATOR_ROOT or the working directory). */
  root?: string;
}

export interface LoadedConfig {
  config: OrchestratorConfig;
  layout: DirectoryLayout;
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  for (const override of ENV_OVERRIDES) {
    const value = env[override.env];
    if (value === undefined || value.trim() === '') continue;

    let parsed: string | number = value.trim();
    if (override.kind === 'number') {
      parsed = Number(parsed);
      if (!Number.isFinite(parsed)) {
        throw new ConfigError(
          `${override.env} must be a number, got "${value}"`,
          override.section ? `${override.section}.${override.key}` : override.key,
        );
      }
    }

    if (!override.section) {
      raw[override.key] = parsed;
      continue;
    }

    const existing = raw[override.section];
    if (existing === undefined) {
      raw[override.section] = { [override.key]: parsed };
    } else if (isRecord(existing)) {
      raw[override.section] = { ...existing, [override.key]: parsed };
    }
    // Anything else is left for the schema to report.
  }
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Resolve configured paths against the project root.
 */
export function resolveLayout(config: OrchestratorConfig, root: string): DirectoryLayout {
  const abs = (p: string): string => (isAbsolute(p) ? p : join(root, p));
  const logsDir = abs(config.paths.logs_dir);

  return {
    root,
    queueDir: abs(config.paths.queue_dir),
    failedDir: abs(config.paths.failed_dir),
    stagingDir: abs(config.paths.staging_dir),
    draftsDir: abs(config.paths.drafts_dir),
    activeDir: abs(config.paths.active_dir),
    completedDir: abs(config.paths.completed_dir),
    logsDir,
    logFile: join(logsDir, `orchestrator-${config.environment}.log`),
    stateFile: abs(config.paths.state_file),
    scriptsDir: abs(config.paths.scripts_dir),
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read, overlay and validate the orchestrator config.
 *
 * @throws {ConfigError} On invalid JSON, a non-object document, a
 *   non-numeric environment value, or a schema violation
 */
export async function readOrchestratorConfig(
  options: ReadConfigOptions = {},
): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const root = resolve(options.root ?? env.ORCHESTRATOR_ROOT ?? process.cwd());
  const configPath = resolve(root, options.configPath ?? DEFAULT_CONFIG_FILE);

  let raw: Record<string, unknown> = {};
  let content: string | undefined;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw err;
    }
  }

  if (content !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a JSON object: ${configPath}`);
    }
    raw = parsed;
  }

  applyEnvOverrides(raw, env);

  const result = OrchestratorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return { config: result.data, layout: resolveLayout(result.data, root) };
}

/**
 * Check the settings that only matter once batches are submitted.
 *
 * @throws {ConfigError} When no API key is configured
 */
export function assertRunnable(config: OrchestratorConfig): asserts config is OrchestratorConfig & { api_key: string } {
  if (!config.api_key) {
    throw new ConfigError(
      'BATCH_API_KEY not set. Export it or add "api_key" to orchestrator.config.json.',
      'api_key',
    );
  }
}
