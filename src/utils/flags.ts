import type { Command } from 'commander';
import chalk from 'chalk';

export type OutputFormat = 'text' | 'json' | 'table';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'table'];

export interface GlobalFlags {
  output: OutputFormat;
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
}

/**
 * Add universal flags to a command.
 * Call this on each leaf command (action command) to register the flags.
 */
export function addGlobalFlags(cmd: Command): Command {
  return cmd
    .option('-o, --output <format>', 'Output format: text, json, table (default: auto)')
    .option('-v, --verbose', 'Verbose output (debug logging)')
    .option('-q, --quiet', 'Minimal output (errors only)')
    .option('--no-color', 'Disable colored output');
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Resolve global flags from parsed options, applying TTY detection defaults.
 * Unknown output formats fall back to the default.
 */
export function resolveFlags(opts: Record<string, unknown>): GlobalFlags {
  const isTTY = process.stdout.isTTY ?? false;
  const noColor = opts.noColor === true || opts.color === false;
  const output = isOutputFormat(opts.output) ? opts.output : (isTTY ? 'text' : 'json');

  if (noColor) {
    chalk.level = 0;
  }

  return {
    output,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    noColor,
  };
}
