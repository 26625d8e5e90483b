/**
 * Runner Configuration
 *
 * Zod-validated settings for a screenshot run. The CLI exposes none of these;
 * they are fixed defaults that library callers and tests may override.
 */

import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

export const BrowserEngineSchema = z.enum(['firefox', 'chromium', 'webkit']);

export const WaitUntilSchema = z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']);

export const RunnerConfigSchema = z.object({
  /** Playwright engine to launch */
  browser: BrowserEngineSchema.default('firefox'),
  headless: z.boolean().default(true),
  /** Per-navigation timeout in ms (20 minutes) */
  navigationTimeoutMs: z.number().int().nonnegative().default(1_200_000),
  waitUntil: WaitUntilSchema.default('load'),
  fullPage: z.boolean().default(true),
  reachableDir: z.string().min(1).default('Reachable'),
  notReachableDir: z.string().min(1).default('Not Reachable'),
});

// ============================================================================
// Types
// ============================================================================

export type BrowserEngine = z.infer<typeof BrowserEngineSchema>;
export type WaitUntil = z.infer<typeof WaitUntilSchema>;
export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof RunnerConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: RunnerConfig = RunnerConfigSchema.parse({});

/**
 * Merge overrides into the defaults. Throws a ZodError on invalid values.
 */
export function resolveRunnerConfig(overrides: RunnerConfigInput = {}): RunnerConfig {
  return RunnerConfigSchema.parse(overrides);
}
