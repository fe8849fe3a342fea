/**
 * CLI Output Layer
 *
 * Every command reports through one OutputFormatter. In human mode lines are
 * written as they are reported; with --json nothing is printed until flush,
 * which writes a single CommandResult object to stdout.
 */

import type { ErrorCode, QlaunchError } from '../core/errors.js';
import type { OutputSink } from '../core/types.js';

/**
 * The object printed in --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  data?: Record<string, unknown>;
  warnings?: string[];
  error?: ErrorOutput;
}

/**
 * Error entry of a CommandResult
 */
export interface ErrorOutput {
  code: ErrorCode | 'UNKNOWN';
  message: string;
  suggestion?: string;
  details?: { lines: string[] };
}

export type OutputMode = 'human' | 'json';

type Channel = 'stdout' | 'stderr';

/**
 * Line writers used by the formatter (console by default).
 */
export type OutputWriters = Record<Channel, (line: string) => void>;

const consoleWriters: OutputWriters = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const SYMBOLS = {
  success: '✓',
  warning: '⚠',
  error: '✗',
} as const;

/**
 * Human/JSON output for a single command invocation.
 */
export class OutputFormatter implements OutputSink {
  private readonly mode: OutputMode;
  private readonly result: CommandResult;
  private readonly writers: OutputWriters;
  private depth = 0;

  constructor(command: string, options: { json?: boolean } = {}, writers: OutputWriters = consoleWriters) {
    this.mode = options.json ? 'json' : 'human';
    this.writers = writers;
    this.result = { success: true, command };
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  indent(): void {
    this.depth++;
  }

  dedent(): void {
    this.depth = Math.max(0, this.depth - 1);
  }

  /**
   * Write one line in human mode, prefixed by the current indentation.
   */
  private emit(channel: Channel, text: string, indented: boolean = true): void {
    if (this.mode === 'json') return;
    const prefix = indented ? '  '.repeat(this.depth) : '';
    this.writers[channel](`${prefix}${text}`);
  }

  success(message: string): void {
    this.emit('stdout', `${SYMBOLS.success} ${message}`);
  }

  info(message: string): void {
    this.emit('stdout', message);
  }

  newline(): void {
    this.emit('stdout', '', false);
  }

  /**
   * Write text as is, e.g. a completion script or a bare name for `list --names`.
   */
  raw(text: string): void {
    this.emit('stdout', text, false);
  }

  /**
   * Report a warning. Warnings go to stderr and are kept in the JSON result.
   */
  warning(message: string): void {
    this.emit('stderr', `${SYMBOLS.warning} ${message}`);
    if (!this.result.warnings) {
      this.result.warnings = [];
    }
    this.result.warnings.push(message);
  }

  /**
   * Report the command's failure. Marks the result unsuccessful.
   */
  error(message: string, error?: QlaunchError): void {
    this.result.success = false;
    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };

    this.emit('stderr', `${SYMBOLS.error} ${message}`);
    if (error?.suggestion) {
      this.emit('stderr', `  Fix: ${error.suggestion}`);
    }
  }

  /**
   * Attach detail lines (e.g. schema violations) to the last error.
   */
  errorDetails(lines: string[]): void {
    for (const line of lines) {
      this.emit('stderr', `  ${line}`);
    }
    if (this.result.error) {
      this.result.error.details = { lines };
    }
  }

  /**
   * Add a value to the JSON result's `data` object.
   */
  setData(key: string, value: unknown): void {
    if (!this.result.data) {
      this.result.data = {};
    }
    this.result.data[key] = value;
  }

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Print the collected result in JSON mode. No-op in human mode.
   */
  flush(): void {
    if (this.mode === 'json') {
      this.writers.stdout(JSON.stringify(this.result, null, 2));
    }
  }

  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter writing to the console.
 */
export function createOutput(command: string, options: { json?: boolean }): OutputFormatter {
  return new OutputFormatter(command, options);
}
