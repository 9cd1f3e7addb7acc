#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { z } from 'zod';
import { runCommand } from './cli/commands/run.js';
import { daemonCommand } from './cli/commands/daemon.js';
import { statusCommand } from './cli/commands/status.js';

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

async function printVersion(): Promise<void> {
  const raw: unknown = JSON.parse(await readFile(new URL('../package.json', import.meta.url), 'utf-8'));
  const pkg = PackageInfoSchema.parse(raw);

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js             ${process.version}`);
  console.log(`Platform            ${process.platform} ${process.arch}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('queue-orchestrator')} - Rate-limited two-phase batch processing of a definition queue

Usage:
  queue-orchestrator [run]      Process the queue once and exit (default)
  queue-orchestrator --daemon   Watch the queue until interrupted
  queue-orchestrator --status   Show queue and rate-limit status

Options:
  --config=<path>   Config file (default: orchestrator.config.json)
  --json            JSON output (with --status)
  --help, -h        Show this help message
  --version, -V     Show version information

Environment:
  BATCH_API_KEY                  Batch API key (required to run)
  ORCHESTRATOR_ENV               Environment name, used in the log file name (default: dev)
  ORCHESTRATOR_ROOT              Project root (default: working directory)
  MAX_BATCHES_PER_HOUR           Hourly submission cap (default: 1)
  MIN_BATCH_INTERVAL_MINUTES     Minimum minutes between submissions (default: 60)
  QUEUE_CHECK_INTERVAL_SECONDS   Daemon poll interval (default: 300)
  BATCH_POLL_INTERVAL_SECONDS    Batch status poll interval (default: 60)
  BATCH_TIMEOUT_HOURS            Batch completion timeout (default: 3)

Layout (relative to the project root):
  queue/          Definitions waiting to be processed
  queue/failed/   Failed definitions with <name>-error.txt diagnostics
  staging/        Context, request and batch result files
  drafts/         Relocated drafts
  active/         Final artifacts, one directory per definition
  completed/      Archived definitions
  logs/           Log file and orchestrator-state.json

Examples:
  queue-orchestrator                     # Process queue once and exit
  queue-orchestrator --daemon            # Run continuously
  queue-orchestrator --status --json     # Machine-readable status
`);
}

async function main() {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-V')) {
    await printVersion();
    return;
  }

  let exitCode: number;
  if (args.includes('--status')) {
    exitCode = await statusCommand(args);
  } else if (args.includes('--daemon')) {
    exitCode = await daemonCommand(args);
  } else if (args[0] === undefined || args[0] === 'run' || args[0].startsWith('-')) {
    if (args[0] !== 'run' && (args.includes('--help') || args.includes('-h'))) {
      showHelp();
      return;
    }
    exitCode = await runCommand(args);
  } else {
    p.log.error(`Unknown command: ${args[0]}`);
    showHelp();
    exitCode = 1;
  }

  process.exit(exitCode);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
