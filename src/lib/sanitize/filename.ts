/**
 * URL to Filename Sanitizer
 *
 * Derives a filesystem-safe screenshot name from a URL's authority, port and
 * path. The authority is kept whole (userinfo and `:port` included) and the
 * port is appended again after it.
 * Distinct URLs can map to the same name; the later capture then overwrites
 * the earlier one.
 */

// ============================================================================
// Constants
// ============================================================================

export const MAX_FILENAME_LENGTH = 150;

// Generic URI split: scheme, authority, path, query, fragment
const URI_PATTERN = /^(?:([A-Za-z][A-Za-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?[^#]*)?(?:#.*)?$/;

const UNSAFE_CHARS = /[^A-Za-z0-9_.-]/gu;

// ============================================================================
// Types
// ============================================================================

export interface UrlParts {
  /** Everything between `//` and the path, as written */
  authority: string;
  port: number | null;
  path: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split a raw URL string without requiring it to be a valid WHATWG URL.
 * Input the pattern cannot split is treated as a bare path.
 */
export function splitUrl(url: string): UrlParts {
  const match = URI_PATTERN.exec(url);
  if (!match) {
    return { authority: '', port: null, path: url };
  }

  const authority = match[2] ?? '';
  const path = match[3] ?? '';

  return { authority, port: portOf(authority), path };
}

function portOf(authority: string): number | null {
  // Userinfo may contain ':' too
  const hostPort = authority.slice(authority.lastIndexOf('@') + 1);

  if (hostPort.startsWith('[')) {
    // IPv6 literal
    const rest = hostPort.slice(hostPort.indexOf(']') + 1);
    return rest.startsWith(':') ? parsePort(rest.slice(1)) : null;
  }

  const colon = hostPort.lastIndexOf(':');
  return colon !== -1 ? parsePort(hostPort.slice(colon + 1)) : null;
}

function parsePort(text: string): number | null {
  if (!/^\d+$/.test(text)) return null;
  const port = Number(text);
  return port > 0 && port <= 65535 ? port : null;
}

// ============================================================================
// Sanitizer
// ============================================================================

/**
 * Build the screenshot base name for a URL (no extension, no suffix).
 *
 * @example
 * sanitizeFilename('http://localhost:8080/a/b'); // 'localhost_8080_8080_a_b'
 */
export function sanitizeFilename(url: string): string {
  const { authority, port, path } = splitUrl(url);
  const portPart = port !== null ? `_${port}` : '';
  const raw = `${authority}${portPart}${path.replace(/\//g, '_')}`;

  return raw.replace(UNSAFE_CHARS, '_').slice(0, MAX_FILENAME_LENGTH);
}
