/**
 * Console logger used by the command line front end
 *
 * @packageDocumentation
 */

import type { LogSink } from '../types/config.js';

export interface LoggerOptions {
  /** Suppress everything except errors */
  quiet?: boolean;
  /** Also print debug messages */
  verbose?: boolean;
  /** One JSON object per line instead of plain text */
  json?: boolean;
}

export class Logger implements LogSink {
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet || !this.options.verbose) return;
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.options.quiet) return;
    this.write('warn', message, data);
  }

  /**
   * Log an error message. Errors are printed even in quiet mode.
   */
  error(message: string, error?: unknown): void {
    if (this.options.json) {
      const errorData = error instanceof Error ? { error: error.message, code: codeOf(error) } : { error };
      console.error(JSON.stringify({ level: 'error', message, ...errorData }));
      return;
    }
    console.error(message);
    if (error instanceof Error) {
      console.error(`  ${error.message}`);
    } else if (error !== undefined) {
      console.dir(error, { depth: null });
    }
  }

  private write(level: 'debug' | 'info' | 'warn', message: string, data?: Record<string, unknown>): void {
    const out = level === 'warn' ? console.warn : console.log;
    if (this.options.json) {
      out(JSON.stringify({ level, message, ...data }));
      return;
    }
    out(message);
    if (data && this.options.verbose) {
      console.dir(data, { depth: null });
    }
  }
}

/**
 * Sink that drops everything; the pipeline default
 */
export const silentLogger: LogSink = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function codeOf(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
