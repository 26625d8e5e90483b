/**
 * Console Module
 *
 * Startup banner and success/failure progress lines.
 */

export {
  ConsoleReporter,
  createConsoleReporter,
  PRODUCT_NAME,
  type Reporter,
  type ConsoleReporterOptions,
} from './reporter.js';
