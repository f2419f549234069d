import { vi } from 'vitest';
import { logger } from '../logger.js';

// Log lines would interleave with asserted output
logger.silent = true;

/**
 * Spy helpers for process.stdout.write/process.stderr.write that capture output.
 * Use this for commands that use the Output utility (write to process streams).
 */
export function spyOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];

  // Force TTY mode so resolveFlags() defaults to 'text' output (not 'json')
  const prevIsTTY = process.stdout.isTTY;
  Object.defineProperty(process.stdout, 'isTTY', { value: true, writable: true, configurable: true });
  // No spinner: status lines are written to stderr as plain text
  const prevErrIsTTY = process.stderr.isTTY;
  Object.defineProperty(process.stderr, 'isTTY', { value: false, writable: true, configurable: true });

  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });

  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });

  return {
    stdout,
    stderr,
    restore() {
      stdoutSpy.mockRestore();
      stderrSpy.mockRestore();
      Object.defineProperty(process.stdout, 'isTTY', { value: prevIsTTY, writable: true, configurable: true });
      Object.defineProperty(process.stderr, 'isTTY', { value: prevErrIsTTY, writable: true, configurable: true });
    },
  };
}
