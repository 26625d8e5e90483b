/**
 * Filename Sanitizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  sanitizeFilename,
  splitUrl,
  MAX_FILENAME_LENGTH,
} from '../src/lib/sanitize/index.js';

describe('sanitizeFilename', () => {
  it('should use the host for a bare origin', () => {
    expect(sanitizeFilename('https://example.com')).toBe('example.com');
  });

  it('should turn path slashes into underscores', () => {
    expect(sanitizeFilename('https://example.com/')).toBe('example.com_');
    expect(sanitizeFilename('https://example.com/docs/intro')).toBe('example.com_docs_intro');
  });

  it('should append the port after the full authority', () => {
    expect(sanitizeFilename('http://localhost:8080/a/b')).toBe('localhost_8080_8080_a_b');
  });

  it('should not append a zero or non-numeric port', () => {
    expect(sanitizeFilename('http://host:0/x')).toBe('host_0_x');
    expect(sanitizeFilename('http://host:abc/x')).toBe('host_abc_x');
  });

  it('should keep userinfo and drop query and fragment', () => {
    expect(sanitizeFilename('https://user:pw@example.com/x?q=1#top')).toBe('user_pw_example.com_x');
  });

  it('should read the port after userinfo', () => {
    expect(sanitizeFilename('https://user:pw@example.com:8443/')).toBe(
      'user_pw_example.com_8443_8443_'
    );
  });

  it('should replace unsafe characters with underscores', () => {
    expect(sanitizeFilename('https://example.com/a b/ü')).toBe('example.com_a_b__');
    expect(sanitizeFilename('http://[::1]:3000/')).toBe('___1__3000_3000_');
  });

  it('should treat input without a scheme as a path', () => {
    expect(sanitizeFilename('example.com/a')).toBe('example.com_a');
  });

  it('should truncate to the maximum length', () => {
    const name = sanitizeFilename(`https://example.com/${'a'.repeat(300)}`);

    expect(name).toHaveLength(MAX_FILENAME_LENGTH);
    expect(name.startsWith('example.com_aaa')).toBe(true);
  });

  it('should only emit safe characters', () => {
    const inputs = [
      'https://exa$mple.com/%20/~user/(1)',
      'ftp://files.example.net:21/pub/💾.iso',
      'https://example.com/"quoted"/<tag>',
    ];

    for (const url of inputs) {
      const name = sanitizeFilename(url);
      expect(name).toMatch(/^[A-Za-z0-9_.-]*$/);
      expect(name.length).toBeLessThanOrEqual(MAX_FILENAME_LENGTH);
    }
  });

  it('should be deterministic', () => {
    const url = 'https://example.com:8443/a/b?c=d';
    expect(sanitizeFilename(url)).toBe(sanitizeFilename(url));
    expect(sanitizeFilename(url)).toBe('example.com_8443_8443_a_b');
  });

  it('should map distinct URLs that differ only in query to the same name', () => {
    expect(sanitizeFilename('https://example.com/p?id=1'))
      .toBe(sanitizeFilename('https://example.com/p?id=2'));
  });
});

describe('splitUrl', () => {
  it('should split authority, port and path', () => {
    expect(splitUrl('https://example.com:8443/a/b')).toEqual({
      authority: 'example.com:8443',
      port: 8443,
      path: '/a/b',
    });
  });

  it('should keep an empty path for a bare origin', () => {
    expect(splitUrl('https://example.com')).toEqual({
      authority: 'example.com',
      port: null,
      path: '',
    });
  });

  it('should keep IPv6 literals intact', () => {
    expect(splitUrl('http://[::1]:3000/x')).toEqual({
      authority: '[::1]:3000',
      port: 3000,
      path: '/x',
    });
  });
});
