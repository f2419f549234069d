import type { Command } from 'commander';
import chalk from 'chalk';
import { getServices } from '../client.js';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { renewWatch, setupWatch } from '../sync/subscription.js';

export function registerSyncCommands(program: Command): void {
  // sync
  addGlobalFlags(program.command('sync')
    .description('Run a sync cycle now (flags a resync if another cycle is running)'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      out.startSpinner('Syncing...');
      try {
        const services = getServices({
          verbose: flags.verbose,
          onPhase: phase => out.updateSpinner(`Syncing (${phase})...`),
        });
        const result = await services.coordinator.trigger();

        if (result.status === 'busy') {
          out.success('Another sync is in progress; a resync has been requested', { status: 'busy' });
          return;
        }

        out.success(`Sync complete: ${result.processed} change(s) in ${result.cycles} cycle(s)`, {
          status: result.status,
          cycles: result.cycles,
          processed: result.processed,
          failed: result.errors.length,
        });
        for (const failure of result.errors) {
          out.warn(`  ${failure.fileId}: ${failure.error}`);
        }
      } catch (err) {
        handleError(out, err, 'Sync failed');
      }
    });

  // setup
  addGlobalFlags(program.command('setup')
    .description('Initialise the change cursor and subscribe to Drive notifications')
    .option('--initial-sync', 'Also mirror every file already in the folder'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      out.startSpinner('Setting up subscription...');
      try {
        const services = getServices({ verbose: flags.verbose });
        const result = await setupWatch(services.subscriptions, { initialSync: _opts.initialSync === true });
        out.success('Subscription created', {
          subscriptionId: result.subscriptionId,
          expires: new Date(result.expiration).toISOString(),
          initialSyncCount: result.initialSyncCount,
        });
        if (flags.output === 'text' && !flags.quiet) {
          out.status('');
          out.status(`Run ${chalk.cyan('drivegit renew')} before the subscription expires.`);
        }
      } catch (err) {
        handleError(out, err, 'Setup failed');
      }
    });

  // renew
  addGlobalFlags(program.command('renew')
    .description('Replace the Drive subscription and run a catch-up sync'))
    .action(async (_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      out.startSpinner('Renewing subscription...');
      try {
        const services = getServices({ verbose: flags.verbose });
        const result = await renewWatch(services.subscriptions);
        out.success('Subscription renewed', {
          subscriptionId: result.subscriptionId,
          expires: new Date(result.expiration).toISOString(),
          catchUpCount: result.catchUpCount,
        });
      } catch (err) {
        handleError(out, err, 'Renew failed');
      }
    });
}
