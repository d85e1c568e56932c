/**
 * OpenAI Embedder Tests
 *
 * The embeddings endpoint is a vi.fn() fake; no network.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { OpenAIEmbedder, getModelDimensions, supportsDimensionsParam } from '../provider.js';
import type { EmbeddingsAPI } from '../types.js';
import { EmbeddingError } from '../../../agent/types.js';

const CONFIG = { model: 'text-embedding-3-small', dimensions: 3, timeout_ms: 1000 };

function fakeEmbeddings(impl: EmbeddingsAPI['create']) {
  return { create: vi.fn(impl) };
}

/** Echo one 3-d vector per input, [i, i, i] */
const echo: EmbeddingsAPI['create'] = async ({ input }) => {
  const inputs = Array.isArray(input) ? input : [input];
  return { data: inputs.map((_, index) => ({ embedding: [index, index, index], index })) };
};

describe('getModelDimensions', () => {
  it('knows the OpenAI embedding models', () => {
    expect(getModelDimensions('text-embedding-3-small')).toBe(1536);
    expect(getModelDimensions('text-embedding-3-large')).toBe(3072);
    expect(getModelDimensions('openai/text-embedding-ada-002')).toBe(1536);
  });

  it('returns undefined for unknown models', () => {
    expect(getModelDimensions('my-local-model')).toBeUndefined();
  });
});

describe('supportsDimensionsParam', () => {
  it('is true only for the text-embedding-3 family', () => {
    expect(supportsDimensionsParam('text-embedding-3-large')).toBe(true);
    expect(supportsDimensionsParam('openai/text-embedding-3-small')).toBe(true);
    expect(supportsDimensionsParam('text-embedding-ada-002')).toBe(false);
  });
});

describe('OpenAIEmbedder', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends a single text as a string with the dimensions parameter', async () => {
    const api = fakeEmbeddings(echo);
    const embedder = new OpenAIEmbedder(api, CONFIG);

    const vector = await embedder.embed('When is the week 3 deadline?');

    expect(vector).toEqual([0, 0, 0]);
    expect(api.create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: 'When is the week 3 deadline?', dimensions: 3 },
      expect.objectContaining({ timeout: 1000 })
    );
  });

  it('omits the dimensions parameter for older models', async () => {
    const api = fakeEmbeddings(echo);
    const embedder = new OpenAIEmbedder(api, { ...CONFIG, model: 'text-embedding-ada-002' });

    await embedder.embed('hello');

    expect(api.create.mock.calls[0]?.[0]).toEqual({ model: 'text-embedding-ada-002', input: 'hello' });
  });

  it('returns batch vectors in input order', async () => {
    const api = fakeEmbeddings(async () => ({
      data: [
        { embedding: [2, 2, 2], index: 1 },
        { embedding: [1, 1, 1], index: 0 },
      ],
    }));
    const embedder = new OpenAIEmbedder(api, CONFIG);

    const vectors = await embedder.embedBatch(['first', 'second']);

    expect(vectors).toEqual([
      [1, 1, 1],
      [2, 2, 2],
    ]);
    expect(api.create.mock.calls[0]?.[0]).toMatchObject({ input: ['first', 'second'] });
  });

  it('returns an empty array for an empty batch without calling the API', async () => {
    const api = fakeEmbeddings(echo);
    const embedder = new OpenAIEmbedder(api, CONFIG);

    expect(await embedder.embedBatch([])).toEqual([]);
    expect(api.create).not.toHaveBeenCalled();
  });

  it('rejects whitespace-only text before calling the API', async () => {
    const api = fakeEmbeddings(echo);
    const embedder = new OpenAIEmbedder(api, CONFIG);

    await expect(embedder.embed('   ')).rejects.toThrow('Cannot embed empty text');
    await expect(embedder.embedBatch(['ok', ''])).rejects.toThrow('Cannot embed empty text (item 1)');
    expect(api.create).not.toHaveBeenCalled();
  });

  it('wraps transport failures in EmbeddingError with the cause', async () => {
    const failure = new Error('401 Incorrect API key provided');
    const embedder = new OpenAIEmbedder(
      fakeEmbeddings(async () => {
        throw failure;
      }),
      CONFIG
    );

    const error = await embedder.embed('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      stage: 'embed',
      message: 'Embedding request failed (text-embedding-3-small): 401 Incorrect API key provided',
      cause: failure,
    });
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const embedder = new OpenAIEmbedder(fakeEmbeddings(async () => ({ data: [] })), CONFIG);

    await expect(embedder.embed('hello')).rejects.toThrow('Expected 1 embeddings, received 0');
  });

  it('rejects vectors of the wrong dimensionality', async () => {
    const embedder = new OpenAIEmbedder(
      fakeEmbeddings(async () => ({ data: [{ embedding: [0.1, 0.2], index: 0 }] })),
      CONFIG
    );

    await expect(embedder.embed('hello')).rejects.toThrow(
      'Embedding has 2 dimensions, expected 3 (check embedding.dimensions)'
    );
  });

  it('times out a hung request', async () => {
    vi.useFakeTimers();
    const api = fakeEmbeddings(() => new Promise(() => {}));
    const embedder = new OpenAIEmbedder(api, CONFIG);

    const assertion = expect(embedder.embed('hello')).rejects.toThrow(
      'Embedding request timed out after 1000ms'
    );
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });
});
