/**
 * Serve Command
 *
 * Starts the HTTP API:
 *   fta serve                      Listen on server.host:server.port (or PORT)
 *   fta serve --port 9000          Override the port
 *
 * Runs until SIGINT/SIGTERM, then closes the listener.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Server } from 'node:http';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createRAGEngine } from '../../agent/rag-engine.js';
import { createApp, startServer } from '../../server/app.js';
import { ServeOptionsSchema, parseInput } from '../validation.js';

interface ServeCommandOptions {
  host?: string;
  port?: string;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Create the serve command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createServeCommand(getContext: () => CommandContext): Command {
  return new Command('serve')
    .description('Start the HTTP API (POST /api/, POST /ask, GET /health)')
    .option('-H, --host <host>', 'Interface to bind (default: server.host)')
    .option('-p, --port <port>', 'Port to listen on (default: server.port or PORT)')
    .action(async (cmdOptions: ServeCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const options = parseInput(ServeOptionsSchema, cmdOptions);
      const host = options.host ?? config.server.host;
      const port = options.port ?? config.server.port;

      ctx.debug(`Models: ${config.llm.text_model} (text), ${config.llm.vision_model} (images)`);
      ctx.debug(`Index: ${config.index.backend}`);

      const engine = createRAGEngine(config, { logger: ctx });
      const app = createApp({ engine, logger: ctx, bodyLimit: config.server.body_limit });
      const server = await startServer(app, host, port);

      if (ctx.options.json) {
        console.log(JSON.stringify({ status: 'listening', host, port }));
      } else {
        ctx.log(`${chalk.green('✓')} Listening on ${chalk.cyan(`http://${host}:${port}`)}`);
        ctx.log(chalk.dim('Press Ctrl+C to stop'));
      }

      await new Promise<void>((resolve, reject) => {
        const shutdown = (signal: NodeJS.Signals): void => {
          ctx.debug(`Received ${signal}, closing server`);
          closeServer(server).then(resolve, reject);
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      });
    });
}
