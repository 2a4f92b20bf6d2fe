import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export function formatPreview(text: string, limit: number = 1000): string {
  if (!text) return '[empty]';
  if (text.length <= limit) return text;
  const truncated = text.slice(0, limit);
  const remaining = text.length - limit;
  return `${truncated}\n... [truncated ${remaining} characters]`;
}

export interface DebugLoggerOptions {
  enabled: boolean;
  directory?: string;
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * `--debug` output: a block on stderr per event plus a JSON entry in debug-<epoch>.log.
 */
export class DebugLogger {
  readonly enabled: boolean;
  readonly file: string | null;
  private write: (line: string) => void;
  private now: () => Date;

  constructor(options: DebugLoggerOptions) {
    this.enabled = options.enabled;
    this.now = options.now ?? (() => new Date());
    this.write = options.write ?? (line => console.error(line));
    this.file = options.enabled
      ? path.join(options.directory ?? process.cwd(), `debug-${this.now().getTime()}.log`)
      : null;
  }

  log(title: string, display: string | Record<string, unknown>, details?: unknown): void {
    if (!this.enabled) return;

    const timestamp = this.now().toISOString();
    const printable = typeof display === 'string' ? display : JSON.stringify(display, null, 2);
    this.write(chalk.dim(`\n=== DEBUG: ${title} @ ${timestamp} ===`));
    this.write(printable);
    this.write(chalk.dim(`=== END DEBUG: ${title} ===`));

    if (this.file) {
      const entry = { event: title, timestamp, details: details ?? display };
      fs.appendFileSync(this.file, `${JSON.stringify(entry)}\n`);
    }
  }
}
