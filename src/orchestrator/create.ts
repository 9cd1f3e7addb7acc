/**
 * Wire an orchestrator from a loaded config.
 *
 * @module orchestrator/create
 */

import type { LoadedConfig } from '../config/reader.js';
import { createScriptCollaborators } from '../collaborators/script-collaborators.js';
import type { Collaborators } from '../collaborators/types.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { StateStore } from '../state/state-store.js';
import { QueueOrchestrator } from './queue-orchestrator.js';
import type { Sleep } from './queue-orchestrator.js';

export interface CreateOrchestratorOptions {
  /** Defaults to a console + file logger at the layout's log file. */
  logger?: Logger;
  /** Defaults to the script-backed collaborators. */
  collaborators?: Collaborators;
  clock?: () => Date;
  sleep?: Sleep;
}

export interface OrchestratorHandle {
  orchestrator: QueueOrchestrator;
  store: StateStore;
  logger: Logger;
}

/**
 * Open the state store and build the run loop around it.
 *
 * @throws {StateStoreError} When the state file exists but cannot be read
 */
export async function createOrchestrator(
  loaded: LoadedConfig,
  options: CreateOrchestratorOptions = {},
): Promise<OrchestratorHandle> {
  const { config, layout } = loaded;
  const logger = options.logger ?? createLogger({
    logFile: layout.logFile,
    verbose: config.verbose,
    clock: options.clock,
  });
  const store = await StateStore.open(layout.stateFile, { logger });
  const collaborators = options.collaborators ?? createScriptCollaborators({ config, layout, logger });

  const orchestrator = new QueueOrchestrator({
    config,
    layout,
    store,
    collaborators,
    logger,
    clock: options.clock,
    sleep: options.sleep,
  });

  return { orchestrator, store, logger };
}
