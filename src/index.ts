/**
 * ScreenSweep - Bulk website screenshots
 *
 * Visit every URL in a list with one headless browser and file a full-page
 * capture under Reachable/ or Not Reachable/.
 */

export * from './lib/sanitize/index.js';

export * from './lib/urls/index.js';

export * from './lib/config/index.js';

export * from './lib/console/index.js';

export * from './lib/screenshot/index.js';

// Version
export const VERSION = '0.1.0';
