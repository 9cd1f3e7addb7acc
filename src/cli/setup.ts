/**
 * Config loading and orchestrator setup shared by the CLI commands.
 * Configuration and state errors are reported here and turned into a
 * null result; the command then exits with code 1.
 *
 * @module cli/setup
 */

import * as p from '@clack/prompts';
import { ConfigError, assertRunnable, readOrchestratorConfig } from '../config/reader.js';
import type { LoadedConfig } from '../config/reader.js';
import { createOrchestrator } from '../orchestrator/create.js';
import type { CreateOrchestratorOptions, OrchestratorHandle } from '../orchestrator/create.js';
import { StateStoreError } from '../state/state-store.js';

/** Options every command accepts, mainly for tests. */
export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
  root?: string;
  /** Passed through to createOrchestrator. */
  orchestrator?: CreateOrchestratorOptions;
}

/**
 * Extract the value of `--config=<path>`, if given.
 */
export function parseConfigPath(args: string[]): string | undefined {
  const arg = args.find((a) => a.startsWith('--config='));
  if (!arg) return undefined;
  const value = arg.slice('--config='.length);
  return value === '' ? undefined : value;
}

export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some((flag) => args.includes(flag));
}

/**
 * Load the config, reporting a ConfigError instead of throwing it.
 *
 * @param requireApiKey - Also check the settings needed to submit batches
 * @returns The loaded config, or null after reporting the error
 */
export async function loadConfigOrReport(
  args: string[],
  options: CommandOptions,
  requireApiKey: boolean,
): Promise<LoadedConfig | null> {
  try {
    const loaded = await readOrchestratorConfig({
      configPath: parseConfigPath(args),
      env: options.env,
      root: options.root,
    });
    if (requireApiKey) {
      assertRunnable(loaded.config);
    }
    return loaded;
  } catch (err) {
    if (err instanceof ConfigError) {
      p.log.error(`Configuration Error: ${err.message}`);
      return null;
    }
    throw err;
  }
}

/**
 * Build the orchestrator, reporting an unreadable state file.
 *
 * @returns The handle, or null after reporting the error
 */
export async function openOrchestratorOrReport(
  loaded: LoadedConfig,
  options: CreateOrchestratorOptions = {},
): Promise<OrchestratorHandle | null> {
  try {
    return await createOrchestrator(loaded, options);
  } catch (err) {
    if (err instanceof StateStoreError) {
      p.log.error(err.message);
      return null;
    }
    throw err;
  }
}
