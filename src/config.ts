import path from 'node:path';
import os from 'node:os';

const DEFAULT_STATE_DIR = path.join(os.homedir(), '.drivegit', 'state');
const DEFAULT_SKIP_EXTENSIONS = '.zip,.exe,.dmg,.iso';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface CommitIdentity {
  name: string;
  email: string;
}

/**
 * Deployment configuration. Built once at process start by {@link loadConfig}
 * and handed to every component that needs it.
 */
export interface AppConfig {
  /** Drive folder that is mirrored; the root of every relative path */
  driveFolderId: string;
  /** HTTPS URL of the target repository */
  gitRepoUrl: string;
  gitBranch: string;
  /** Glob patterns (relative to the Drive folder) that are never mirrored */
  excludePaths: string[];
  /** Lower-case file extensions that are never mirrored, e.g. `.zip` */
  skipExtensions: string[];
  maxFileSizeMb: number;
  /** Identity used for changes without an attributed editor, and as committer */
  commitAuthor: CommitIdentity;
  /** Repository subdirectory that receives the mirrored tree */
  docsSubdir: string;
  /** Directory holding the persisted sync state */
  stateDir: string;
  /** Public URL of the notification endpoint, needed to create subscriptions */
  webhookUrl?: string;
  /** Shared secret that authorises channel-less manual triggers */
  triggerSecret?: string;
  /** Site verification token served on GET /notify */
  verificationToken?: string;
  port: number;
  logLevel: string;
  logFile?: string;
}

function optional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = optional(env, name);
  if (!value) {
    throw new ConfigError(`Required environment variable ${name} is not set`);
  }
  return value;
}

function integer(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Environment variable ${name} must be a whole number, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Build the configuration from environment variables.
 * Throws ConfigError when a required value is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    driveFolderId: required(env, 'DRIVE_FOLDER_ID'),
    gitRepoUrl: required(env, 'GIT_REPO_URL'),
    gitBranch: required(env, 'GIT_BRANCH'),
    excludePaths: parseList(optional(env, 'EXCLUDE_PATHS')),
    skipExtensions: parseList(env.SKIP_EXTENSIONS ?? DEFAULT_SKIP_EXTENSIONS)
      .map(ext => ext.toLowerCase()),
    maxFileSizeMb: integer(env, 'MAX_FILE_SIZE_MB', 100),
    commitAuthor: {
      name: optional(env, 'COMMIT_AUTHOR_NAME') ?? 'Drive Sync Bot',
      email: optional(env, 'COMMIT_AUTHOR_EMAIL') ?? 'sync@example.com',
    },
    docsSubdir: optional(env, 'DOCS_SUBDIR') ?? 'docs',
    stateDir: optional(env, 'STATE_DIR') ?? DEFAULT_STATE_DIR,
    port: integer(env, 'PORT', 8080),
    logLevel: optional(env, 'LOG_LEVEL') ?? 'info',
  };

  const webhookUrl = optional(env, 'SYNC_HANDLER_URL');
  if (webhookUrl) config.webhookUrl = webhookUrl;
  const triggerSecret = optional(env, 'SYNC_TRIGGER_SECRET');
  if (triggerSecret) config.triggerSecret = triggerSecret;
  const verificationToken = optional(env, 'GOOGLE_VERIFICATION_TOKEN');
  if (verificationToken) config.verificationToken = verificationToken;
  const logFile = optional(env, 'LOG_FILE');
  if (logFile) config.logFile = logFile;

  return config;
}
