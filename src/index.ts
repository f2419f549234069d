#!/usr/bin/env node
import { Command } from 'commander';
import { registerSyncCommands } from './commands/sync.js';
import { registerStatusCommands } from './commands/status.js';
import { registerServeCommand } from './commands/serve.js';

const program = new Command();
program
  .name('drivegit')
  .description('Mirror a Google Drive folder into a git repository')
  .version('0.1.0')
  .addHelpText('after', `
GETTING STARTED
  drivegit setup --initial-sync              Subscribe and mirror the current folder
  drivegit serve                             Receive Drive notifications on /notify

COMMON WORKFLOWS
  drivegit sync                              Apply pending changes now
  drivegit renew                             Replace the subscription before it expires
  drivegit status                            Show cursor, subscription and lock
  drivegit files --prefix Reports/           List tracked files

CONFIGURATION (environment)
  DRIVE_FOLDER_ID, GIT_REPO_URL, GIT_BRANCH  Required
  GIT_TOKEN or GIT_TOKEN_FILE                Token for HTTPS pushes
  EXCLUDE_PATHS, SKIP_EXTENSIONS             Comma-separated lists
  MAX_FILE_SIZE_MB, DOCS_SUBDIR, STATE_DIR   Limits and locations
  COMMIT_AUTHOR_NAME, COMMIT_AUTHOR_EMAIL    Fallback author and committer
  SYNC_HANDLER_URL, SYNC_TRIGGER_SECRET      Notification endpoint settings
  GOOGLE_VERIFICATION_TOKEN, PORT            HTTP server settings
  LOG_LEVEL, LOG_FILE                        Logging`);

registerSyncCommands(program);
registerStatusCommands(program);
registerServeCommand(program);

program.parse();
