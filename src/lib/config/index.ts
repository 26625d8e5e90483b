/**
 * Config Module
 *
 * Provides:
 * - Zod-validated runner settings
 * - Default browser, timeout and output directories
 */

export {
  RunnerConfigSchema,
  BrowserEngineSchema,
  WaitUntilSchema,
  DEFAULT_CONFIG,
  resolveRunnerConfig,
  type BrowserEngine,
  type WaitUntil,
  type RunnerConfig,
  type RunnerConfigInput,
} from './schema.js';
