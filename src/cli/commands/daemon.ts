/**
 * Daemon command - watch the queue until interrupted.
 *
 * SIGINT and SIGTERM stop the loop between items; an item already in
 * progress runs to completion or to its next rate gate first.
 */

import * as p from '@clack/prompts';
import { StateStoreError } from '../../state/state-store.js';
import { hasFlag, loadConfigOrReport, openOrchestratorOrReport } from '../setup.js';
import type { CommandOptions } from '../setup.js';

const HELP_TEXT = `
Usage: queue-orchestrator --daemon [options]

Process the queue continuously, checking it every
polling.queue_check_interval_seconds (QUEUE_CHECK_INTERVAL_SECONDS).
Stops cleanly on SIGINT or SIGTERM.

Options:
  --config=<path>  Config file (default: orchestrator.config.json)
  --help, -h       Show this help message
`;

export interface DaemonCommandOptions extends CommandOptions {
  /** Stop signal; defaults to one wired to SIGINT and SIGTERM. */
  signal?: AbortSignal;
}

/**
 * Run the daemon loop.
 *
 * @returns Exit code (0 after a clean shutdown, 1 on configuration or state errors)
 */
export async function daemonCommand(args: string[], options: DaemonCommandOptions = {}): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const loaded = await loadConfigOrReport(args, options, true);
  if (!loaded) return 1;

  const handle = await openOrchestratorOrReport(loaded, options.orchestrator);
  if (!handle) return 1;

  const controller = new AbortController();
  const stop = (): void => controller.abort();
  const signal = options.signal ?? controller.signal;
  if (!options.signal) {
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  }

  const { orchestrator, logger } = handle;
  try {
    await orchestrator.ensureLayout();
    logger.info('=== Starting orchestrator in daemon mode ===');
    const cycles = await orchestrator.runDaemon(signal);
    logger.debug(`Daemon stopped after ${cycles} cycles`);
    return 0;
  } catch (err) {
    if (err instanceof StateStoreError) {
      logger.error(err.message);
      p.log.error(err.message);
      return 1;
    }
    throw err;
  } finally {
    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);
    await logger.flush();
  }
}
