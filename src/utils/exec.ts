import { execFile } from 'node:child_process';

const DEFAULT_TIMEOUT_MS = 300_000;
const MAX_BUFFER = 256 * 1024 * 1024;

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Strings replaced by `***` in error messages (tokens, authenticated URLs) */
  secrets?: string[];
}

export interface RunResult {
  stdout: Buffer;
  stderr: string;
}

/**
 * Runs an external program. Resolves on exit code 0, rejects with
 * CommandError otherwise.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string) {
    super(message);
    this.name = 'CommandError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function maskSecrets(text: string, secrets: string[] = []): string {
  let masked = text;
  for (const secret of secrets) {
    if (secret) masked = masked.split(secret).join('***');
  }
  return masked;
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd, env, timeoutMs = DEFAULT_TIMEOUT_MS, secrets = [] } = options;

  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd,
        env: { ...process.env, ...env },
        timeout: timeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: 'buffer',
      },
      (error, stdout, stderr) => {
        const stderrText = stderr.toString('utf-8');
        if (error) {
          const exitCode = typeof error.code === 'number' ? error.code : null;
          const reason = error.killed ? `timed out after ${timeoutMs}ms` : `exited with ${exitCode ?? error.code ?? 'error'}`;
          const commandLine = maskSecrets([command, ...args].join(' '), secrets);
          reject(new CommandError(
            `${commandLine} ${reason}: ${maskSecrets(stderrText.trim(), secrets)}`,
            exitCode,
            maskSecrets(stderrText, secrets),
          ));
          return;
        }
        resolve({ stdout, stderr: stderrText });
      },
    );
  });
};
