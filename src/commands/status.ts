import type { Command } from 'commander';
import chalk from 'chalk';
import { getServices } from '../client.js';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';

function isoOrNull(epochMs: number | null | undefined): string | null {
  return epochMs ? new Date(epochMs).toISOString() : null;
}

export function registerStatusCommands(program: Command): void {
  // status
  addGlobalFlags(program.command('status')
    .description('Show the persisted sync state'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const { config, store } = getServices({ verbose: flags.verbose });
        const [cursor, subscription, lock, resync, files] = await Promise.all([
          store.getCursor(),
          store.getSubscription(),
          store.getLock(),
          store.isResyncRequested(),
          store.listFiles(),
        ]);

        out.record({
          folder: config.driveFolderId,
          repository: `${config.gitRepoUrl} (${config.gitBranch})`,
          cursor,
          subscription: subscription?.id ?? null,
          expires: isoOrNull(subscription?.expiration),
          locked: lock?.locked ?? false,
          lockOwner: lock?.locked ? lock.owner : null,
          lockedSince: lock?.locked ? isoOrNull(lock.acquiredAt) : null,
          resyncRequested: resync,
          trackedFiles: files.length,
        });

        if (flags.output === 'text' && !flags.quiet && cursor === null) {
          out.status('');
          out.status(`Not initialised. Run ${chalk.cyan('drivegit setup')} first.`);
        }
      } catch (err) {
        handleError(out, err, 'Failed to read sync state');
      }
    });

  // files
  addGlobalFlags(program.command('files')
    .description('List tracked files')
    .option('--prefix <path>', 'Only files whose path starts with this prefix'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const { store } = getServices({ verbose: flags.verbose });
        const prefix = typeof _opts.prefix === 'string' ? _opts.prefix : undefined;
        const files = await store.listFiles(prefix);
        out.list(
          files.map(f => ({
            fileId: f.fileId,
            path: f.path,
            extractedPath: f.extractedPath,
            md5: f.md5,
            modifiedTime: f.modifiedTime,
            lastModifiedBy: f.lastModifiedByEmail ?? f.lastModifiedByName,
          })),
          {
            emptyMessage: 'No tracked files.',
            columns: [
              { key: 'path', header: 'Path' },
              { key: 'extractedPath', header: 'Text' },
              { key: 'lastModifiedBy', header: 'Last editor' },
              { key: 'modifiedTime', header: 'Modified' },
            ],
            textFn: (f) => {
              const text = f.extractedPath ? chalk.dim(` (+ ${String(f.extractedPath)})`) : '';
              return `${String(f.path)}${text}`;
            },
          },
        );
      } catch (err) {
        handleError(out, err, 'Failed to list files');
      }
    });
}
