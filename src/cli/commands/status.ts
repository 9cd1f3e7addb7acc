/**
 * Status command - read-only view of the queue and rate limiter.
 *
 * Usage:
 *   queue-orchestrator --status          Formatted status
 *   queue-orchestrator --status --json   Machine-readable output
 */

import pc from 'picocolors';
import { createLogger } from '../../logging/logger.js';
import type { OrchestratorStatus } from '../../orchestrator/types.js';
import { hasFlag, loadConfigOrReport, openOrchestratorOrReport } from '../setup.js';
import type { CommandOptions } from '../setup.js';

const HELP_TEXT = `
Usage: queue-orchestrator --status [options]

Show queued and processed counts, the item in progress, the last
submission and whether a batch may be submitted now.

Options:
  --json           Output as JSON
  --config=<path>  Config file (default: orchestrator.config.json)
  --help, -h       Show this help message
`;

/**
 * Render the status as plain lines.
 */
export function formatStatus(status: OrchestratorStatus): string[] {
  const { decision } = status;
  const canSubmit = decision.allowed ? pc.green('true') : pc.yellow('false');
  return [
    pc.bold('=== Queue Orchestrator Status ==='),
    `Queue directory: ${status.queueDir}`,
    `Queued: ${status.queued.length} files`,
    `Processed: ${status.processed} files`,
    `Current: ${status.currentItem ?? 'None'}`,
    `Last batch: ${status.lastSubmissionTime ?? 'Never'}`,
    `Batches (1h): ${status.submissionsInLastHour}`,
    `Can submit: ${canSubmit} (${decision.reason})`,
  ];
}

/**
 * Print the status.
 *
 * @returns Exit code (0 for success, 1 for configuration errors)
 */
export async function statusCommand(args: string[], options: CommandOptions = {}): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const loaded = await loadConfigOrReport(args, options, false);
  if (!loaded) return 1;

  // Status never writes: log to the console only.
  const logger = options.orchestrator?.logger ?? createLogger({ verbose: loaded.config.verbose });
  const handle = await openOrchestratorOrReport(loaded, { ...options.orchestrator, logger });
  if (!handle) return 1;

  const status = await handle.orchestrator.status();

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(status, null, 2));
    return 0;
  }

  console.log('');
  for (const line of formatStatus(status)) {
    console.log(line);
  }
  console.log('');
  return 0;
}
