/**
 * Screenshot Module
 *
 * Provides:
 * - Playwright-based sequential capture of a URL list
 * - Reachable / Not Reachable classification by HTTP status
 * - URL overlay injected into every capture
 */

export {
  ScreenshotRunner,
  createScreenshotRunner,
  launchPlaywright,
  type BrowserPage,
  type BrowserSession,
  type BrowserLauncher,
  type CaptureOutcome,
  type RunnerOptions,
} from './capture.js';

export {
  classifyStatus,
  screenshotPath,
  NOT_REACHABLE_SUFFIX,
  type Reachability,
} from './classify.js';

export {
  addUrlOverlay,
  buildOverlayScript,
  OVERLAY_STYLE,
  type ScriptEvaluator,
} from './overlay.js';
