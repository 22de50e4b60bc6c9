/**
 * Append-only, human-readable trace of one discovery pipeline.
 * Entries are kept for display or bug reports and forwarded to pino.
 */
import type { Logger } from '../config/logger.js';

type Level = 'debug' | 'info' | 'warn' | 'error';

export class DiagnosticLog {
  private readonly entries: string[] = [];

  constructor(private readonly logger?: Logger) {}

  debug(message: string, error?: unknown): void {
    this.append('debug', message, error);
  }

  info(message: string, error?: unknown): void {
    this.append('info', message, error);
  }

  warn(message: string, error?: unknown): void {
    this.append('warn', message, error);
  }

  error(message: string, error?: unknown): void {
    this.append('error', message, error);
  }

  /** Entries so far, oldest first */
  lines(): readonly string[] {
    return [...this.entries];
  }

  toString(): string {
    return this.entries.join('\n');
  }

  private append(level: Level, message: string, error: unknown): void {
    const reason = error === undefined ? '' : `: ${error instanceof Error ? error.message : String(error)}`;
    this.entries.push(`${level.toUpperCase()} ${message}${reason}`);

    if (!this.logger) return;
    if (error === undefined) {
      this.logger[level](message);
    } else {
      this.logger[level]({ err: error }, message);
    }
  }
}
