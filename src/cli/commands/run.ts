/**
 * Run command - process the queue once and exit.
 *
 * Usage:
 *   queue-orchestrator [run]                 Process every queued definition once
 *   queue-orchestrator run --config=<path>   Use another config file
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { ItemOutcome, RunSummary } from '../../orchestrator/types.js';
import { StateStoreError } from '../../state/state-store.js';
import { hasFlag, loadConfigOrReport, openOrchestratorOrReport } from '../setup.js';
import type { CommandOptions } from '../setup.js';

const HELP_TEXT = `
Usage: queue-orchestrator [run] [options]

Process every definition in the queue once, then exit.

Options:
  --config=<path>  Config file (default: orchestrator.config.json)
  --help, -h       Show this help message
`;

function formatOutcome(outcome: ItemOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return `  ${pc.green('✓')} ${outcome.item} ${pc.dim(`(${outcome.artifacts.length} artifacts)`)}`;
    case 'short-circuited':
      return `  ${pc.green('✓')} ${outcome.item} ${pc.dim('(already published)')}`;
    case 'deferred':
      return `  ${pc.yellow('…')} ${outcome.item} ${pc.dim('(deferred by rate limit)')}`;
    case 'failed':
      return `  ${pc.red('✗')} ${outcome.item} ${pc.dim(`(${outcome.phase ?? 'unknown phase'}: ${outcome.error ?? 'error'})`)}`;
  }
}

/**
 * Render a pass summary: one line per item, then the totals.
 */
export function formatSummary(summary: RunSummary): string[] {
  const lines = summary.outcomes.map(formatOutcome);
  const done = summary.completed + summary.shortCircuited;
  lines.push(
    `${done} completed, ${summary.deferred} deferred, ${summary.failed} failed (of ${summary.scanned} queued)`,
  );
  return lines;
}

/**
 * Process the queue once.
 *
 * @param args - Command-line arguments
 * @returns Exit code (0 on success, 1 on configuration or state errors)
 */
export async function runCommand(args: string[], options: CommandOptions = {}): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const loaded = await loadConfigOrReport(args, options, true);
  if (!loaded) return 1;

  const handle = await openOrchestratorOrReport(loaded, options.orchestrator);
  if (!handle) return 1;

  const { orchestrator, logger } = handle;
  try {
    await orchestrator.ensureLayout();
    logger.info('=== Starting batch processing (run once) ===');
    const summary = await orchestrator.runOnce();
    logger.info('=== Batch processing complete ===');

    if (summary.scanned > 0) {
      p.intro(pc.bgCyan(pc.black(' queue-orchestrator ')));
      for (const line of formatSummary(summary)) {
        console.log(line);
      }
      p.outro(summary.failed > 0 ? pc.yellow('Finished with failures') : pc.green('Done'));
    }
    return 0;
  } catch (err) {
    if (err instanceof StateStoreError) {
      logger.error(err.message);
      p.log.error(err.message);
      return 1;
    }
    throw err;
  } finally {
    await logger.flush();
  }
}
