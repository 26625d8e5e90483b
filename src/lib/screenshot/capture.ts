/**
 * Screenshot Runner
 *
 * Drives one shared browser through a list of URLs, one page at a time:
 * navigate, classify, overlay the URL, capture a full-page PNG, close.
 * A failure on one URL is logged and the run moves on; failing to set up
 * the output directories or the browser is fatal.
 */

import { chromium, firefox, webkit, type BrowserType } from 'playwright';
import { mkdir } from 'fs/promises';
import {
  resolveRunnerConfig,
  type BrowserEngine,
  type RunnerConfig,
  type RunnerConfigInput,
  type WaitUntil,
} from '../config/index.js';
import { createConsoleReporter, type Reporter } from '../console/index.js';
import { classifyStatus, screenshotPath, type Reachability } from './classify.js';
import { addUrlOverlay } from './overlay.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The slice of a Playwright page the runner uses.
 */
export interface BrowserPage {
  goto(
    url: string,
    options: { timeout: number; waitUntil: WaitUntil }
  ): Promise<{ status(): number } | null>;
  evaluate(script: string): Promise<unknown>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = (config: RunnerConfig) => Promise<BrowserSession>;

export interface CaptureOutcome {
  url: string;
  reachability: Reachability;
  /** Status of the main navigation response, when one arrived */
  httpStatus?: number;
  /** Null when not even the fallback capture succeeded */
  screenshotPath: string | null;
  error?: string;
}

export interface RunnerOptions {
  config?: RunnerConfigInput;
  reporter?: Reporter;
  launch?: BrowserLauncher;
}

// ============================================================================
// Playwright launcher
// ============================================================================

const ENGINES: Record<BrowserEngine, BrowserType> = { chromium, firefox, webkit };

export const launchPlaywright: BrowserLauncher = (config) =>
  ENGINES[config.browser].launch({ headless: config.headless });

// ============================================================================
// Screenshot Runner
// ============================================================================

export class ScreenshotRunner {
  private config: RunnerConfig;
  private reporter: Reporter;
  private launch: BrowserLauncher;

  constructor(options: RunnerOptions = {}) {
    this.config = resolveRunnerConfig(options.config);
    this.reporter = options.reporter ?? createConsoleReporter();
    this.launch = options.launch ?? launchPlaywright;
  }

  /**
   * Visit every URL in order with a single browser, closed when done.
   */
  async run(urls: string[]): Promise<CaptureOutcome[]> {
    await this.ensureOutputDirs();

    this.reporter.info(`[Screenshot] Launching ${this.config.browser}...`);
    const browser = await this.launch(this.config);

    const outcomes: CaptureOutcome[] = [];
    try {
      for (const url of urls) {
        outcomes.push(await this.visitAndCapture(browser, url));
      }
    } finally {
      await browser.close();
    }

    return outcomes;
  }

  /**
   * Capture a single URL in a fresh page. Navigation and capture errors are
   * folded into the outcome; failing to open the page is not.
   */
  async visitAndCapture(browser: BrowserSession, url: string): Promise<CaptureOutcome> {
    const page = await browser.newPage();
    try {
      return await this.capturePage(page, url);
    } finally {
      await page.close();
    }
  }

  async ensureOutputDirs(): Promise<void> {
    await mkdir(this.config.reachableDir, { recursive: true });
    await mkdir(this.config.notReachableDir, { recursive: true });
  }

  getConfig(): RunnerConfig {
    return { ...this.config };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async capturePage(page: BrowserPage, url: string): Promise<CaptureOutcome> {
    let httpStatus: number | undefined;
    let overlaid = false;

    try {
      const response = await page.goto(url, {
        timeout: this.config.navigationTimeoutMs,
        waitUntil: this.config.waitUntil,
      });
      if (!response) {
        throw new Error('navigation returned no response');
      }

      httpStatus = response.status();
      const reachability = classifyStatus(httpStatus);

      if (reachability === 'reachable') {
        this.reporter.success(`[Screenshot] URL reachable: ${url}`);
      } else {
        this.reporter.failure(`[Screenshot] URL not reachable: ${url} (HTTP ${httpStatus})`);
      }

      await addUrlOverlay(page, url);
      overlaid = true;

      const path = screenshotPath(this.config, url, reachability);
      await page.screenshot({ path, fullPage: this.config.fullPage });
      this.reporter.info(`[Screenshot] Screenshot saved as ${path}`);

      return { url, reachability, httpStatus, screenshotPath: path };
    } catch (error) {
      const message = errorMessage(error);
      this.reporter.failure(`[Screenshot] Error visiting ${url}: ${message}`);

      return {
        url,
        reachability: 'not-reachable',
        httpStatus,
        screenshotPath: await this.captureAfterFailure(page, url, overlaid),
        error: message,
      };
    }
  }

  /**
   * Best-effort capture of whatever the page currently shows.
   */
  private async captureAfterFailure(
    page: BrowserPage,
    url: string,
    overlaid: boolean
  ): Promise<string | null> {
    if (!overlaid) {
      try {
        await addUrlOverlay(page, url);
      } catch (error) {
        this.reporter.info(`[Screenshot] Overlay skipped for ${url}: ${errorMessage(error)}`);
      }
    }

    const path = screenshotPath(this.config, url, 'not-reachable');
    try {
      await page.screenshot({ path, fullPage: this.config.fullPage });
      this.reporter.info(`[Screenshot] Screenshot saved as ${path}`);
      return path;
    } catch (error) {
      this.reporter.failure(`[Screenshot] Could not capture ${url}: ${errorMessage(error)}`);
      return null;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Factory
// ============================================================================

export function createScreenshotRunner(options?: RunnerOptions): ScreenshotRunner {
  return new ScreenshotRunner(options);
}
