import type { Command } from 'commander';
import { serve } from '@hono/node-server';
import { getServices } from '../client.js';
import { logger } from '../logger.js';
import { createApp } from '../server/app.js';
import { addGlobalFlags, resolveFlags } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';

export function registerServeCommand(program: Command): void {
  addGlobalFlags(program.command('serve')
    .description('Serve the notification, setup and renew endpoints')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8080)'))
    .action((_opts: Record<string, unknown>) => {
      const flags = resolveFlags(_opts);
      const out = createOutput(flags);
      try {
        const services = getServices({ verbose: flags.verbose });
        const port = typeof _opts.port === 'string' ? parseInt(_opts.port, 10) : services.config.port;
        if (!Number.isInteger(port) || port <= 0) {
          throw new Error(`Invalid port: ${String(_opts.port)}`);
        }

        const app = createApp(services);
        const server = serve({ fetch: app.fetch, port }, (info) => {
          logger.info(`Listening on http://localhost:${info.port}`);
        });

        server.on('error', (err: Error) => {
          handleError(out, err, 'Server failed');
        });

        const shutdown = () => {
          logger.info('Shutting down');
          server.close();
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (err) {
        handleError(out, err, 'Failed to start server');
      }
    });
}
