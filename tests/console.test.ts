/**
 * Console Reporter Tests
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import figlet from 'figlet';
import { createConsoleReporter, PRODUCT_NAME } from '../src/lib/console/index.js';

function recordingReporter(level: 0 | 1) {
  const lines: string[] = [];
  const reporter = createConsoleReporter({
    colors: new Chalk({ level }),
    write: line => {
      lines.push(line);
    },
  });
  return { lines, reporter };
}

describe('ConsoleReporter', () => {
  it('should write plain lines when colours are off', () => {
    const { lines, reporter } = recordingReporter(0);

    reporter.info('loading');
    reporter.success('URL reachable: https://example.com');
    reporter.failure('URL not reachable: https://example.org');

    expect(lines).toEqual([
      'loading',
      'URL reachable: https://example.com',
      'URL not reachable: https://example.org',
    ]);
  });

  it('should colour success green and failure red', () => {
    const { lines, reporter } = recordingReporter(1);

    reporter.success('ok');
    reporter.failure('bad');
    reporter.info('plain');

    expect(lines).toEqual(['\u001b[32mok\u001b[39m', '\u001b[31mbad\u001b[39m', 'plain']);
  });

  it('should print the product banner once', () => {
    const { lines, reporter } = recordingReporter(0);

    reporter.banner();

    expect(lines).toEqual([figlet.textSync(PRODUCT_NAME)]);
    expect(lines[0].split('\n').length).toBeGreaterThan(1);
  });

  it('should render a custom banner title', () => {
    const lines: string[] = [];
    const reporter = createConsoleReporter({
      colors: new Chalk({ level: 0 }),
      write: line => {
        lines.push(line);
      },
      title: 'Sweep',
    });

    reporter.banner();

    expect(lines).toEqual([figlet.textSync('Sweep')]);
  });
});
