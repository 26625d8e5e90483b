/**
 * Console Reporter
 *
 * Human-readable, colour-coded progress lines. Not machine-parseable.
 */

import chalk, { type ChalkInstance } from 'chalk';
import figlet from 'figlet';

export const PRODUCT_NAME = 'ScreenSweep';

export interface Reporter {
  banner(): void;
  info(message: string): void;
  success(message: string): void;
  failure(message: string): void;
}

export interface ConsoleReporterOptions {
  /** Chalk instance, e.g. `new Chalk({ level: 0 })` for plain output */
  colors?: ChalkInstance;
  /** Line sink (default: console.log) */
  write?: (line: string) => void;
  /** Banner text */
  title?: string;
}

export class ConsoleReporter implements Reporter {
  private colors: ChalkInstance;
  private write: (line: string) => void;
  private title: string;

  constructor(options: ConsoleReporterOptions = {}) {
    this.colors = options.colors ?? chalk;
    this.write = options.write ?? (line => console.log(line));
    this.title = options.title ?? PRODUCT_NAME;
  }

  banner(): void {
    this.write(this.colors.cyan(figlet.textSync(this.title)));
  }

  info(message: string): void {
    this.write(message);
  }

  success(message: string): void {
    this.write(this.colors.green(message));
  }

  failure(message: string): void {
    this.write(this.colors.red(message));
  }
}

export function createConsoleReporter(options?: ConsoleReporterOptions): ConsoleReporter {
  return new ConsoleReporter(options);
}
