/**
 * Git working copy for one branch of one remote, driven through the git CLI.
 * Clones are partial (`--filter=blob:none`) into a fresh temp directory and
 * authenticate over HTTPS with a token.
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { logger } from '../logger.js';
import type { CommitIdentity } from '../config.js';
import { CommandError, runCommand, type CommandRunner } from '../utils/exec.js';

/**
 * Operations the sync cycle performs on its checkout. Paths are relative to
 * the repository root, with forward slashes.
 */
export interface WorkingCopy {
  clone(): Promise<void>;
  /** Write a file and stage it */
  write(relPath: string, content: Buffer | string): Promise<void>;
  /** Move a tracked file (staged) */
  rename(oldPath: string, newPath: string): Promise<void>;
  /** Remove a tracked file (staged); resolves false when it did not exist */
  remove(relPath: string): Promise<boolean>;
  /** Stage the current state of the given paths, including deletions */
  stage(paths: string[]): Promise<void>;
  unstageAll(): Promise<void>;
  hasStagedChanges(): Promise<boolean>;
  commit(message: string, author: CommitIdentity): Promise<void>;
  push(): Promise<void>;
  /** Discard the checkout */
  cleanup(): Promise<void>;
}

export interface GitRepoOptions {
  repoUrl: string;
  branch: string;
  /** Committer identity for every commit */
  committer: CommitIdentity;
  /** Resolves the access token at first use */
  getToken: () => string;
  runner?: CommandRunner;
  /** Parent directory for the temporary checkout */
  tmpRoot?: string;
}

/**
 * Embed a token into an HTTPS remote URL (`https://oauth2:<token>@host/...`).
 */
export function authenticatedUrl(repoUrl: string, token: string): string {
  if (!repoUrl.startsWith('https://')) {
    throw new Error(`Unsupported git URL scheme: ${repoUrl}`);
  }
  return repoUrl.replace('https://', `https://oauth2:${encodeURIComponent(token)}@`);
}

export class GitRepo implements WorkingCopy {
  private readonly options: GitRepoOptions;
  private readonly runner: CommandRunner;
  private workDir: string | null = null;
  private token: string | null = null;

  constructor(options: GitRepoOptions) {
    this.options = options;
    this.runner = options.runner ?? runCommand;
  }

  /** Absolute path of the checkout; throws before clone() */
  get repoPath(): string {
    if (!this.workDir) {
      throw new Error('Repository has not been cloned');
    }
    return path.join(this.workDir, 'repo');
  }

  async clone(): Promise<void> {
    const token = this.options.getToken();
    this.token = token;
    this.workDir = fs.mkdtempSync(path.join(this.options.tmpRoot ?? os.tmpdir(), 'drivegit-'));

    await this.git(
      ['clone', '--filter=blob:none', '--branch', this.options.branch, authenticatedUrl(this.options.repoUrl, token), this.repoPath],
      this.workDir,
    );
    logger.info(`Cloned ${this.options.repoUrl} (${this.options.branch}) to ${this.repoPath}`);
  }

  async write(relPath: string, content: Buffer | string): Promise<void> {
    const fullPath = this.resolve(relPath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    await this.git(['add', '--', relPath]);
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    this.resolve(oldPath);
    fs.mkdirSync(path.dirname(this.resolve(newPath)), { recursive: true });
    await this.git(['mv', '--', oldPath, newPath]);
  }

  async remove(relPath: string): Promise<boolean> {
    if (!fs.existsSync(this.resolve(relPath))) return false;
    await this.git(['rm', '-f', '--', relPath]);
    return true;
  }

  async stage(paths: string[]): Promise<void> {
    if (paths.length === 0) return;
    for (const p of paths) this.resolve(p);
    await this.git(['add', '-A', '--', ...paths]);
  }

  async unstageAll(): Promise<void> {
    try {
      await this.git(['reset', '-q', 'HEAD']);
    } catch (err) {
      // An empty branch has no HEAD to reset to
      const message = err instanceof Error ? err.message : String(err);
      logger.debug(`git reset failed: ${message}`);
    }
  }

  async hasStagedChanges(): Promise<boolean> {
    try {
      await this.git(['diff', '--cached', '--quiet']);
      return false;
    } catch (err) {
      if (err instanceof CommandError && err.exitCode === 1) {
        return true;
      }
      throw err;
    }
  }

  async commit(message: string, author: CommitIdentity): Promise<void> {
    const { committer } = this.options;
    await this.git([
      '-c', `user.name=${committer.name}`,
      '-c', `user.email=${committer.email}`,
      'commit', '-q', '-m', message,
      `--author=${author.name} <${author.email}>`,
    ]);
    logger.info(`Committed as ${author.name} <${author.email}>: ${message.split('\n')[0]}`);
  }

  async push(): Promise<void> {
    await this.git(['push', 'origin', this.options.branch]);
    logger.info(`Pushed ${this.options.branch}`);
  }

  async cleanup(): Promise<void> {
    if (!this.workDir) return;
    fs.rmSync(this.workDir, { recursive: true, force: true });
    logger.debug(`Removed ${this.workDir}`);
    this.workDir = null;
  }

  /**
   * Absolute path for a repository-relative path, refusing paths that
   * escape the checkout.
   */
  private resolve(relPath: string): string {
    const root = this.repoPath;
    const fullPath = path.resolve(root, relPath);
    if (fullPath !== root && !fullPath.startsWith(root + path.sep)) {
      throw new Error(`Path escapes the repository: ${relPath}`);
    }
    return fullPath;
  }

  private async git(args: string[], cwd?: string): Promise<string> {
    const secrets = this.token ? [this.token, encodeURIComponent(this.token)] : [];
    const { stdout } = await this.runner('git', args, {
      cwd: cwd ?? this.repoPath,
      env: { GIT_TERMINAL_PROMPT: '0' },
      secrets,
    });
    return stdout.toString('utf-8');
  }
}
