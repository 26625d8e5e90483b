/**
 * Reachability classification and output paths.
 */

import { join } from 'path';
import type { RunnerConfig } from '../config/index.js';
import { sanitizeFilename } from '../sanitize/index.js';

export type Reachability = 'reachable' | 'not-reachable';

export const NOT_REACHABLE_SUFFIX = '_not_reachable';

export function classifyStatus(status: number): Reachability {
  return status >= 400 ? 'not-reachable' : 'reachable';
}

/**
 * `<reachableDir>/<name>.png` or `<notReachableDir>/<name>_not_reachable.png`
 */
export function screenshotPath(
  config: Pick<RunnerConfig, 'reachableDir' | 'notReachableDir'>,
  url: string,
  reachability: Reachability
): string {
  const name = sanitizeFilename(url);

  return reachability === 'reachable'
    ? join(config.reachableDir, `${name}.png`)
    : join(config.notReachableDir, `${name}${NOT_REACHABLE_SUFFIX}.png`);
}
