/**
 * HTTP App Tests
 *
 * Runs the assembled Express app on an ephemeral loopback port and talks to
 * it with fetch. The answer engine is a vi.fn() fake.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';

import { createApp, startServer } from '../app.js';
import type { AnswerService } from '../handlers.js';
import { HEALTH_RESPONSE, INTERNAL_SERVER_ERROR, ROOT_PAGE } from '../schemas.js';
import type { AnswerResult } from '../../agent/types.js';

const RESULT: AnswerResult = {
  answer: 'Submit GA3 by Sunday 23:59.',
  sources: [
    { title: 'GA3 deadline', url: 'https://forum.test/t/ga3/21/2' },
    { title: '', url: 'https://forum.test/t/misc/30/1' },
  ],
};

describe('createApp', () => {
  const answer = vi.fn<AnswerService['answer']>();
  const logger = { warn: vi.fn(), debug: vi.fn() };
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({ engine: { answer }, logger, bodyLimit: '1kb' });
    server = await startServer(app, '127.0.0.1', 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  beforeEach(() => {
    answer.mockReset();
    answer.mockResolvedValue(RESULT);
    logger.warn.mockClear();
  });

  function postJSON(path: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    });
  }

  it('answers POST /api/ with answer and sources', async () => {
    const response = await postJSON('/api/', JSON.stringify({ question: ' When is GA3 due? ' }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(RESULT);
    expect(answer).toHaveBeenCalledWith({ question: 'When is GA3 due?' });
  });

  it('routes /api without the trailing slash to the same handler', async () => {
    const response = await postJSON('/api', JSON.stringify({ question: 'q', image: 'aW1n' }));

    expect(response.status).toBe(200);
    expect(answer).toHaveBeenCalledWith({ question: 'q', images: ['aW1n'] });
  });

  it('answers POST /ask with answer and links', async () => {
    const response = await postJSON('/ask', JSON.stringify({ question: 'When is GA3 due?' }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      answer: 'Submit GA3 by Sunday 23:59.',
      links: [
        { url: 'https://forum.test/t/ga3/21/2', text: 'GA3 deadline' },
        { url: 'https://forum.test/t/misc/30/1', text: 'https://forum.test/t/misc/30/1' },
      ],
    });
  });

  it('rejects invalid JSON with 400', async () => {
    const response = await postJSON('/api/', '{"question": ');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid JSON body' });
    expect(answer).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('rejects a body without a question with 400 and the issues', async () => {
    const response = await postJSON('/ask', JSON.stringify({ image: 'aW1n' }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid request body',
      issues: [{ path: 'question', message: 'question is required' }],
    });
  });

  it('rejects a body over the size limit with 413', async () => {
    const response = await postJSON('/api/', JSON.stringify({ question: 'q', image: 'A'.repeat(2048) }));

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: 'Request body too large' });
  });

  it('hides engine failures behind a generic 500', async () => {
    answer.mockRejectedValue(new Error('socket hang up'));

    const response = await postJSON('/api/', JSON.stringify({ question: 'q' }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: INTERNAL_SERVER_ERROR });
    expect(logger.warn).toHaveBeenCalledWith('POST /api/ failed: socket hang up');
  });

  it('serves GET /health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(HEALTH_RESPONSE);
  });

  it('serves the HTML page at GET /', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toBe(ROOT_PAGE);
  });

  it('returns 404 for unknown routes and methods', async () => {
    const unknownPath = await fetch(`${baseUrl}/nope`);
    const wrongMethod = await fetch(`${baseUrl}/api/`);

    expect(unknownPath.status).toBe(404);
    expect(await unknownPath.json()).toEqual({ error: 'Not found: GET /nope' });
    expect(wrongMethod.status).toBe(404);
    expect(await wrongMethod.json()).toEqual({ error: 'Not found: GET /api/' });
  });
});
