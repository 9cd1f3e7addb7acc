/**
 * Config module barrel exports.
 *
 * @module config
 */

export {
  OrchestratorConfigSchema,
  DEFAULT_ORCHESTRATOR_CONFIG,
} from './schema.js';
export type { OrchestratorConfig } from './schema.js';

export {
  readOrchestratorConfig,
  resolveLayout,
  assertRunnable,
  ConfigError,
  DEFAULT_CONFIG_FILE,
} from './reader.js';
export type { DirectoryLayout, LoadedConfig, ReadConfigOptions } from './reader.js';
