/**
 * URL List Reader
 *
 * Plain text input, one URL per line. Blank lines are skipped; there is no
 * comment syntax and no validation, so whatever the browser rejects is
 * reported when it is visited.
 */

import { readFile } from 'fs/promises';

export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Read URLs from a file. Read errors propagate to the caller.
 */
export async function readUrlFile(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return parseUrlList(content);
}
