/**
 * Express Route Handlers
 *
 * Handlers are built from factories so the answer engine and logger are
 * injected; tests call them with fake request/response objects.
 */

import type { NextFunction, Request, RequestHandler, Response, ErrorRequestHandler } from 'express';
import { z, type ZodIssue } from 'zod';

import type { ForumRAGEngine } from '../agent/rag-engine.js';
import { toLinks } from '../agent/citations.js';
import type { AnswerResult, LinkResult } from '../agent/types.js';
import { errorMessage, type Logger } from '../utils/index.js';
import {
  AskRequestSchema,
  HEALTH_RESPONSE,
  INTERNAL_SERVER_ERROR,
  ROOT_PAGE,
  type ErrorResponse,
} from './schemas.js';

/** The part of the engine the HTTP layer calls */
export type AnswerService = Pick<ForumRAGEngine, 'answer'>;

function formatIssues(issues: ZodIssue[]): NonNullable<ErrorResponse['issues']> {
  return issues.map((issue) => ({ path: issue.path.join('.') || '(root)', message: issue.message }));
}

/**
 * `POST` handler that answers the question in the body and renders the
 * result with `present`.
 */
export function createAnswerHandler<T extends object>(
  engine: AnswerService,
  present: (result: AnswerResult) => T
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = AskRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorResponse = { error: 'Invalid request body', issues: formatIssues(parsed.error.issues) };
      res.status(400).json(body);
      return;
    }

    try {
      const result = await engine.answer(parsed.data);
      res.json(present(result));
    } catch (error) {
      next(error);
    }
  };
}

/** `POST /api/`: `{ answer, sources }` */
export function createApiHandler(engine: AnswerService): RequestHandler {
  return createAnswerHandler(engine, (result): AnswerResult => result);
}

/** `POST /ask`: `{ answer, links }` */
export function createAskHandler(engine: AnswerService): RequestHandler {
  return createAnswerHandler(engine, (result): LinkResult => toLinks(result));
}

/** `GET /health` */
export function healthHandler(_req: Request, res: Response): void {
  res.json(HEALTH_RESPONSE);
}

/** `GET /` */
export function rootHandler(_req: Request, res: Response): void {
  res.type('html').send(ROOT_PAGE);
}

/** Fallback for unknown routes */
export function notFoundHandler(req: Request, res: Response): void {
  const body: ErrorResponse = { error: `Not found: ${req.method} ${req.path}` };
  res.status(404).json(body);
}

/**
 * Errors raised by express middleware (body-parser) carry an HTTP status
 * and a machine-readable `type`.
 */
const HttpErrorSchema = z.object({
  status: z.number().int().min(400).max(599),
  type: z.string().optional(),
});

/**
 * Maps body-parser errors to 4xx and everything else to a generic 500.
 * Internal error details are logged, never sent.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const http = HttpErrorSchema.safeParse(error);
    if (http.success && http.data.status < 500) {
      const message =
        http.data.type === 'entity.parse.failed'
          ? 'Invalid JSON body'
          : http.data.type === 'entity.too.large'
            ? 'Request body too large'
            : errorMessage(error);
      const body: ErrorResponse = { error: message };
      res.status(http.data.status).json(body);
      return;
    }

    logger.warn(`${req.method} ${req.path} failed: ${errorMessage(error)}`);
    const body: ErrorResponse = { error: INTERNAL_SERVER_ERROR };
    res.status(500).json(body);
  };
}

/**
 * Logs method, path, status and duration of every request.
 */
export function createRequestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const started = performance.now();
    res.on('finish', () => {
      logger.debug?.(`${req.method} ${req.originalUrl} ${res.statusCode} ${Math.round(performance.now() - started)}ms`);
    });
    next();
  };
}
