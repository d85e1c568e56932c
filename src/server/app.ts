/**
 * HTTP API
 *
 * ```
 * POST /api/   { question, image? } → { answer, sources: [{ title, url }] }
 * POST /ask    { question, image? } → { answer, links: [{ url, text }] }
 * GET  /health                      → { status: "ok", message }
 * GET  /                            → HTML page naming the endpoints
 * ```
 */

import express, { type Express } from 'express';
import type { Server } from 'node:http';

import { silentLogger, type Logger } from '../utils/index.js';
import {
  createApiHandler,
  createAskHandler,
  createErrorHandler,
  createRequestLogger,
  healthHandler,
  notFoundHandler,
  rootHandler,
  type AnswerService,
} from './handlers.js';

export interface CreateAppOptions {
  engine: AnswerService;
  logger?: Logger;
  /** Max JSON body size, e.g. "10mb" (images are inlined as base64) */
  bodyLimit?: string;
}

export function createApp(options: CreateAppOptions): Express {
  const logger = options.logger ?? silentLogger;
  const app = express();

  app.disable('x-powered-by');
  app.use(createRequestLogger(logger));
  app.use(express.json({ limit: options.bodyLimit ?? '10mb' }));

  app.get('/', rootHandler);
  app.get('/health', healthHandler);
  app.post('/api/', createApiHandler(options.engine));
  app.post('/ask', createAskHandler(options.engine));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Listen on host:port; resolves once the socket is bound.
 */
export function startServer(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
