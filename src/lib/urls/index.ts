/**
 * URLs Module
 *
 * Loads the ordered list of URLs to visit.
 */

export { parseUrlList, readUrlFile } from './reader.js';
