/**
 * Screenshot CLI body, kept apart from the entry point so exit codes can be
 * checked without spawning a process.
 */

import type { RunnerConfigInput } from '../lib/config/index.js';
import { createConsoleReporter, type Reporter } from '../lib/console/index.js';
import { createScreenshotRunner, type BrowserLauncher } from '../lib/screenshot/index.js';
import { readUrlFile } from '../lib/urls/index.js';
import { parseArgs } from './args.js';

export const USAGE = `
ScreenSweep - Take full-page screenshots of every URL in a file

Usage:
  npx tsx src/cli/screenshot.ts --urls <file>

Options:
  -u, --urls  Path to a text file with one URL per line (required)
  -h, --help  Show this help

Screenshots are written to ./Reachable and ./Not Reachable.
`;

export interface CliDeps {
  reporter?: Reporter;
  /** Error sink (default: console.error) */
  error?: (line: string) => void;
  launch?: BrowserLauncher;
  config?: RunnerConfigInput;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const reporter = deps.reporter ?? createConsoleReporter();
  const error = deps.error ?? (line => console.error(line));
  const { help, urlsPath } = parseArgs(argv);

  reporter.banner();

  if (help) {
    reporter.info(USAGE);
    return 0;
  }

  if (!urlsPath) {
    error('❌ Missing required option --urls <file>');
    error(USAGE);
    return 1;
  }

  try {
    const urls = await readUrlFile(urlsPath);
    reporter.info(`Loaded ${urls.length} URLs from ${urlsPath}\n`);

    const runner = createScreenshotRunner({
      config: deps.config,
      reporter,
      launch: deps.launch,
    });
    await runner.run(urls);
  } catch (err) {
    error(`❌ Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  return 0;
}
