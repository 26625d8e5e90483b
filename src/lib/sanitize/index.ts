/**
 * Sanitize Module
 *
 * Turns URLs into stable, filesystem-safe screenshot names.
 */

export {
  sanitizeFilename,
  splitUrl,
  MAX_FILENAME_LENGTH,
  type UrlParts,
} from './filename.js';
