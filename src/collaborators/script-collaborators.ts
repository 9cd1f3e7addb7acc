/**
 * Script-backed collaborators.
 *
 * Each step runs one script from the configured scripts directory with
 * `--flag value` arguments, from the project root. The API key reaches
 * the submit script through its environment, never its argument list.
 *
 * @module collaborators/script-collaborators
 */

import { access, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { OrchestratorConfig } from '../config/schema.js';
import type { DirectoryLayout } from '../config/reader.js';
import type { Logger } from '../logging/logger.js';
import { runScript as defaultRunScript } from './script-runner.js';
import type { ScriptInvocation, ScriptResult } from './script-runner.js';
import {
  CollectorError,
  RequestBuildError,
  SubmissionError,
} from './types.js';
import type {
  BuildRequestArgs,
  CollaboratorFailure,
  Collaborators,
  CollectContextArgs,
  SubmitBatchArgs,
} from './types.js';

/** Extra time the submit script gets beyond its own polling timeout. */
const SUBMIT_GRACE_MS = 60000;

export interface ScriptCollaboratorOptions {
  config: OrchestratorConfig;
  layout: DirectoryLayout;
  logger: Logger;
  runScript?: (invocation: ScriptInvocation) => Promise<ScriptResult>;
}

type FailureFactory = (message: string, failure?: CollaboratorFailure) => Error;

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1]?.trim() ?? '';
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build collaborators that shell out to the configured scripts.
 */
export function createScriptCollaborators(options: ScriptCollaboratorOptions): Collaborators {
  const { config, layout, logger } = options;
  const run = options.runScript ?? defaultRunScript;
  const stepTimeoutMs = config.polling.step_timeout_seconds * 1000;

  async function invoke(
    scriptName: string,
    args: string[],
    timeoutMs: number,
    fail: FailureFactory,
    env?: Record<string, string>,
  ): Promise<void> {
    const scriptPath = join(layout.scriptsDir, scriptName);
    if (!(await fileExists(scriptPath))) {
      throw fail(`Script not found: ${scriptPath}`);
    }

    logger.info(`Running: ${scriptName} ${args.join(' ')}`);
    const result = await run({ scriptPath, args, cwd: layout.root, env, timeoutMs });
    if (result.stdout.trim()) {
      logger.debug(`${scriptName} output:\n${result.stdout.trimEnd()}`);
    }

    if (result.timedOut) {
      throw fail(`${scriptName} timed out after ${Math.round(timeoutMs / 1000)}s`, {
        exitCode: result.exitCode,
        stderr: result.stderr,
        timedOut: true,
      });
    }
    if (result.exitCode !== 0) {
      const detail = lastLine(result.stderr);
      logger.error(`Script failed: ${scriptName} (exit ${result.exitCode})${detail ? `: ${detail}` : ''}`);
      throw fail(
        `${scriptName} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        { exitCode: result.exitCode, stderr: result.stderr },
      );
    }
  }

  async function requireOutput(path: string, scriptName: string, fail: FailureFactory): Promise<string> {
    if (!(await fileExists(path))) {
      throw fail(`${scriptName} did not write ${basename(path)}`);
    }
    return path;
  }

  return {
    collector: {
      async collect({ definitionPath, outputPath }: CollectContextArgs): Promise<string> {
        const fail: FailureFactory = (m, f) => new CollectorError(m, f);
        await invoke(
          config.scripts.collect_context,
          ['--definition', definitionPath, '--output', outputPath],
          stepTimeoutMs,
          fail,
        );
        return requireOutput(outputPath, config.scripts.collect_context, fail);
      },
    },

    builder: {
      async build({ contextPath, phase, outputPath }: BuildRequestArgs): Promise<string> {
        const fail: FailureFactory = (m, f) => new RequestBuildError(m, f);
        await invoke(
          config.scripts.build_request,
          ['--context', contextPath, '--phase', phase, '--output', outputPath],
          stepTimeoutMs,
          fail,
        );
        return requireOutput(outputPath, config.scripts.build_request, fail);
      },
    },

    submitter: {
      async submit({ requestPath, outputDir, timeoutMs }: SubmitBatchArgs): Promise<string[]> {
        const fail: FailureFactory = (m, f) => new SubmissionError(m, f);
        await invoke(
          config.scripts.submit_batch,
          [
            '--request', requestPath,
            '--output-dir', outputDir,
            '--poll-interval', String(config.polling.batch_poll_interval_seconds),
            '--timeout', String(Math.round(timeoutMs / 1000)),
          ],
          timeoutMs + SUBMIT_GRACE_MS,
          fail,
          config.api_key ? { BATCH_API_KEY: config.api_key } : undefined,
        );

        let entries;
        try {
          entries = await readdir(outputDir, { withFileTypes: true });
        } catch (err) {
          throw fail(`${config.scripts.submit_batch} produced no output directory`, { cause: err });
        }
        return entries
          .filter((e) => e.isFile())
          .map((e) => join(outputDir, e.name))
          .sort();
      },
    },
  };
}
