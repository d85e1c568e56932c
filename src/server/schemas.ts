/**
 * HTTP Request/Response Shapes
 *
 * Request bodies are validated with zod before they reach the pipeline.
 */

import { z } from 'zod';
import type { Query } from '../agent/types.js';

/**
 * Body of `POST /api/` and `POST /ask`.
 *
 * `image` takes one base64 string or a list of them, each with or without
 * a `data:image/...;base64,` prefix.
 */
export const AskRequestSchema = z
  .object({
    question: z.string({ required_error: 'question is required' }).trim().min(1, 'question must not be empty'),
    image: z.union([z.string(), z.array(z.string())]).nullish(),
  })
  .transform(({ question, image }): Query => {
    if (image === null || image === undefined) {
      return { question };
    }
    return { question, images: Array.isArray(image) ? image : [image] };
  });

export type AskRequest = z.input<typeof AskRequestSchema>;

export interface ErrorResponse {
  error: string;
  issues?: Array<{ path: string; message: string }>;
}

export const INTERNAL_SERVER_ERROR = 'An error occurred while processing your request.';

export const HEALTH_RESPONSE = { status: 'ok', message: 'RAG API is running' } as const;

export const ROOT_PAGE = `<!doctype html>
<html>
  <head><title>forum-ta</title></head>
  <body>
    <h2>Forum TA backend is running</h2>
    <p>
      <code>POST /api/</code> with <code>{"question": "...", "image": "base64..."}</code> for an answer with sources.<br>
      <code>POST /ask</code> with <code>{"question": "..."}</code> for an answer with links.<br>
      <code>GET /health</code> for a health check.
    </p>
  </body>
</html>
`;
