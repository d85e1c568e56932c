/**
 * HTTP server module.
 */

export { createApp, startServer, type CreateAppOptions } from './app.js';
export {
  createAnswerHandler,
  createApiHandler,
  createAskHandler,
  createErrorHandler,
  createRequestLogger,
  healthHandler,
  notFoundHandler,
  rootHandler,
  type AnswerService,
} from './handlers.js';
export {
  AskRequestSchema,
  HEALTH_RESPONSE,
  INTERNAL_SERVER_ERROR,
  ROOT_PAGE,
  type AskRequest,
  type ErrorResponse,
} from './schemas.js';
