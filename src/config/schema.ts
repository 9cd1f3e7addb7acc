/**
 * Zod schema for the orchestrator configuration.
 *
 * Every field has a `.default()` so that `OrchestratorConfigSchema.parse({})`
 * returns a complete config. The only value without a usable default is
 * `api_key`, which is checked separately by `assertRunnable` so that a
 * read-only caller can still parse a config that lacks it.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Directory layout
// ============================================================================

/**
 * Directory layout, relative to the project root unless absolute.
 * The failed directory lives inside the queue so the scanner's
 * "regular files only" rule keeps it out of the pending list.
 */
const PathsSchema = z.object({
  queue_dir: z.string().min(1).default('queue'),
  failed_dir: z.string().min(1).default('queue/failed'),
  staging_dir: z.string().min(1).default('staging'),
  drafts_dir: z.string().min(1).default('drafts'),
  active_dir: z.string().min(1).default('active'),
  completed_dir: z.string().min(1).default('completed'),
  logs_dir: z.string().min(1).default('logs'),
  state_file: z.string().min(1).default('logs/orchestrator-state.json'),
  scripts_dir: z.string().min(1).default('scripts'),
});

// ============================================================================
// Rate limiting
// ============================================================================

/**
 * A cap of zero would deny every submission forever, so it is rejected
 * here rather than inside the limiter.
 */
const RateLimitSchema = z.object({
  max_batches_per_hour: z.number().int().min(1).default(1),
  min_batch_interval_minutes: z.number().int().min(0).default(60),
});

// ============================================================================
// Polling and timeouts
// ============================================================================

const PollingSchema = z.object({
  queue_check_interval_seconds: z.number().int().min(1).default(300),
  batch_poll_interval_seconds: z.number().int().min(1).default(60),
  batch_timeout_hours: z.number().positive().max(48).default(3),
  /** Limit for the context and request scripts. */
  step_timeout_seconds: z.number().int().min(1).default(600),
});

// ============================================================================
// Queue file matching
// ============================================================================

const extension = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, 'must look like ".md"');

const QueueSchema = z.object({
  definition_extension: extension.default('.md'),
  artifact_extension: extension.default('.md'),
});

// ============================================================================
// Collaborator scripts
// ============================================================================

/** Script file names, resolved against `paths.scripts_dir`. */
const ScriptsSchema = z.object({
  collect_context: z.string().min(1).default('collect-context.sh'),
  build_request: z.string().min(1).default('create-batch-request.sh'),
  submit_batch: z.string().min(1).default('submit-batch.sh'),
});

// ============================================================================
// Composite schema
// ============================================================================

export const OrchestratorConfigSchema = z.object({
  environment: z.string().min(1).default('dev'),
  api_key: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
  paths: PathsSchema.default(() => ({
    queue_dir: 'queue',
    failed_dir: 'queue/failed',
    staging_dir: 'staging',
    drafts_dir: 'drafts',
    active_dir: 'active',
    completed_dir: 'completed',
    logs_dir: 'logs',
    state_file: 'logs/orchestrator-state.json',
    scripts_dir: 'scripts',
  })),
  rate_limit: RateLimitSchema.default(() => ({
    max_batches_per_hour: 1,
    min_batch_interval_minutes: 60,
  })),
  polling: PollingSchema.default(() => ({
    queue_check_interval_seconds: 300,
    batch_poll_interval_seconds: 60,
    batch_timeout_hours: 3,
    step_timeout_seconds: 600,
  })),
  queue: QueueSchema.default(() => ({
    definition_extension: '.md',
    artifact_extension: '.md',
  })),
  scripts: ScriptsSchema.default(() => ({
    collect_context: 'collect-context.sh',
    build_request: 'create-batch-request.sh',
    submit_batch: 'submit-batch.sh',
  })),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

/** Config produced by parsing an empty object. */
export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = OrchestratorConfigSchema.parse({});
