import chalk from 'chalk';
import ora from 'ora';
import { ConfigError } from '../config.js';
import { CredentialError } from '../lib/credentials.js';
import type { GlobalFlags } from './flags.js';

/**
 * Column definition for table output.
 */
export interface TableColumn {
  key: string;
  header: string;
  width?: number;
}

type Row = Record<string, unknown>;

/**
 * Output helper for text, json and table modes.
 * Status messages go to stderr so stdout stays clean for piping.
 */
export class Output {
  private readonly flags: GlobalFlags;
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(flags: GlobalFlags) {
    this.flags = flags;
  }

  private get interactive(): boolean {
    return this.flags.output === 'text' && !this.flags.quiet;
  }

  /**
   * Start a spinner (text mode, non-quiet, TTY only).
   */
  startSpinner(message: string): void {
    if (this.interactive && process.stderr.isTTY) {
      this.spinner = ora({ text: message, stream: process.stderr }).start();
    }
  }

  /**
   * Replace the spinner text, e.g. with the current sync phase.
   */
  updateSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.text = message;
    }
  }

  /**
   * Stop the spinner with a success message.
   */
  succeedSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else if (this.interactive) {
      process.stderr.write(chalk.green('✓') + ' ' + message + '\n');
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  failSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      process.stderr.write(chalk.red('✖') + ' ' + message + '\n');
    }
  }

  /**
   * Print a status/info message to stderr (never captured by piping).
   */
  status(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(message + '\n');
    }
  }

  /**
   * Print an error message to stderr.
   */
  error(message: string): void {
    process.stderr.write(chalk.red(message) + '\n');
  }

  /**
   * Print a warning message to stderr.
   */
  warn(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(chalk.yellow(message) + '\n');
    }
  }

  /**
   * Output a single record based on the format.
   * - text: prints key-value lines
   * - json: prints a single JSON object
   * - table: prints a single-row table
   */
  record(data: Row, columns?: TableColumn[]): void {
    switch (this.flags.output) {
      case 'json':
        process.stdout.write(JSON.stringify(data) + '\n');
        break;
      case 'table':
        this.table([data], columns);
        break;
      case 'text':
        this.printKeyValue(data);
        break;
    }
  }

  /**
   * Output a list of records based on the format.
   * - text: prints each item using textFn, or key-value pairs
   * - json: prints one JSON object per line (JSON Lines)
   * - table: prints a box-drawn table
   */
  list(data: Row[], options: { columns?: TableColumn[]; textFn?: (item: Row) => string; emptyMessage?: string } = {}): void {
    if (data.length === 0) {
      if (this.flags.output !== 'json' && options.emptyMessage) {
        this.status(options.emptyMessage);
      }
      return;
    }

    switch (this.flags.output) {
      case 'json':
        for (const item of data) {
          process.stdout.write(JSON.stringify(item) + '\n');
        }
        break;
      case 'table':
        this.table(data, options.columns);
        break;
      case 'text':
        for (const item of data) {
          if (options.textFn) {
            process.stdout.write(options.textFn(item) + '\n');
          } else {
            this.printKeyValue(item);
            process.stdout.write('\n');
          }
        }
        break;
    }
  }

  /**
   * Report a completed operation, with its result data in json/text modes.
   */
  success(message: string, data?: Row): void {
    if (this.flags.output === 'json' && data) {
      process.stdout.write(JSON.stringify(data) + '\n');
      return;
    }
    if (this.flags.quiet) return;
    this.succeedSpinner(message);
    if (data && this.flags.output === 'text') {
      this.printKeyValue(data);
    }
  }

  private printKeyValue(data: Row): void {
    const maxKeyLen = Math.max(...Object.keys(data).map(k => k.length));
    for (const [key, value] of Object.entries(data)) {
      const label = key.charAt(0).toUpperCase() + key.slice(1);
      const padding = ' '.repeat(Math.max(0, maxKeyLen - key.length + 1));
      const displayValue = value === null || value === undefined ? chalk.dim('none') : String(value);
      process.stdout.write(`${label}:${padding}${displayValue}\n`);
    }
  }

  private table(data: Row[], columns?: TableColumn[]): void {
    if (data.length === 0) return;

    const cols: TableColumn[] = columns ?? Object.keys(data[0]).map(key => ({
      key,
      header: key.charAt(0).toUpperCase() + key.slice(1),
    }));
    const cell = (row: Row, key: string) => String(row[key] ?? '');
    // Calculate column widths
    const widths = cols.map(col =>
      col.width ?? data.reduce((max, row) => Math.max(max, cell(row, col.key).length), col.header.length));

    const border = (left: string, mid: string, right: string) =>
      left + widths.map(w => '─'.repeat(w + 2)).join(mid) + right;
    const line = (values: string[]) =>
      '│' + values.map((v, i) => ' ' + v.padEnd(widths[i]) + ' ').join('│') + '│';

    const lines = [
      border('┌', '┬', '┐'),
      line(cols.map(col => col.header)),
      border('├', '┼', '┤'),
      ...data.map(row => line(cols.map(col => cell(row, col.key)))),
      border('└', '┴', '┘'),
    ];
    process.stdout.write(lines.join('\n') + '\n');
  }
}

/**
 * Create an Output instance from global flags.
 */
export function createOutput(flags: GlobalFlags): Output {
  return new Output(flags);
}

/**
 * Standard error handler for commands.
 * Prints the error (with a hint for setup problems) and sets the exit code.
 */
export function handleError(out: Output, err: unknown, spinnerMessage?: string): void {
  if (spinnerMessage) {
    out.failSpinner(spinnerMessage);
  }
  const message = err instanceof Error ? err.message : String(err);
  out.error(message);
  if (err instanceof ConfigError) {
    out.status('Required: DRIVE_FOLDER_ID, GIT_REPO_URL, GIT_BRANCH. Run `drivegit --help` for the full list.');
  } else if (err instanceof CredentialError) {
    out.status('Set GIT_TOKEN, or GIT_TOKEN_FILE to a file containing the token.');
  }
  process.exitCode = 1;
}
