/**
 * Retriever Tests
 *
 * The vector index is an in-memory fake returning canned matches.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { Retriever } from '../retriever.js';
import type { VectorIndex, VectorMatch } from '../types.js';
import { RetrievalError } from '../../agent/types.js';

function createFakeIndex(matches: VectorMatch[] = []) {
  return {
    backend: 'fake',
    query: vi.fn<VectorIndex['query']>(async () => matches),
    upsert: vi.fn<VectorIndex['upsert']>(async (passages) => passages.length),
    count: vi.fn<VectorIndex['count']>(async () => matches.length),
  } satisfies VectorIndex;
}

function match(id: string, score: number, metadata?: Record<string, unknown>): VectorMatch {
  return { id, score, metadata: metadata ?? { text: `text ${id}`, title: `Title ${id}`, url: `https://forum.test/${id}` } };
}

const VECTOR = [0.1, 0.2, 0.3];

describe('Retriever', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns passages sorted by score, keeping backend order for ties', async () => {
    const index = createFakeIndex([match('a', 0.5), match('b', 0.9), match('c', 0.5)]);
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    const passages = await retriever.retrieve(VECTOR, 5);

    expect(passages.map((p) => p.id)).toEqual(['b', 'a', 'c']);
    expect(passages[0]).toEqual({
      id: 'b',
      score: 0.9,
      text: 'text b',
      title: 'Title b',
      url: 'https://forum.test/b',
    });
    expect(index.query).toHaveBeenCalledWith(VECTOR, 5);
  });

  it('returns at most topK passages', async () => {
    const index = createFakeIndex([match('a', 0.9), match('b', 0.8), match('c', 0.7)]);
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    expect(await retriever.retrieve(VECTOR, 2)).toHaveLength(2);
  });

  it('fills in missing metadata with defaults', async () => {
    const index = createFakeIndex([
      { id: 'a', score: 0.9, metadata: undefined },
      match('b', 0.8, { title: null, text: 'only text' }),
    ]);
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    const passages = await retriever.retrieve(VECTOR, 5);

    expect(passages).toEqual([
      { id: 'a', score: 0.9, text: '', title: 'No Title', url: '#' },
      { id: 'b', score: 0.8, text: 'only text', title: 'No Title', url: '#' },
    ]);
  });

  it('rejects malformed metadata', async () => {
    const index = createFakeIndex([match('a', 0.9, { title: 42 })]);
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    await expect(retriever.retrieve(VECTOR, 5)).rejects.toThrow(
      new RetrievalError('Malformed metadata for match a: title: Expected string, received number')
    );
  });

  it('rejects matches without a usable score', async () => {
    const index = createFakeIndex([match('a', Number.NaN)]);
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    await expect(retriever.retrieve(VECTOR, 5)).rejects.toThrow('Match a has no usable score');
  });

  it('rejects a query vector of the wrong length without querying', async () => {
    const index = createFakeIndex();
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    await expect(retriever.retrieve([0.1, 0.2], 5)).rejects.toThrow(
      new RetrievalError('Query vector has 2 dimensions, index expects 3')
    );
    expect(index.query).not.toHaveBeenCalled();
  });

  it('wraps backend failures with the backend name', async () => {
    const index = createFakeIndex();
    const failure = new Error('503 Service Unavailable');
    index.query.mockRejectedValueOnce(failure);
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    const error = await retriever.retrieve(VECTOR, 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      stage: 'retrieve',
      message: 'Vector query failed (fake): 503 Service Unavailable',
      cause: failure,
    });
  });

  it('times out a hung query', async () => {
    vi.useFakeTimers();
    const index = createFakeIndex();
    index.query.mockReturnValueOnce(new Promise<VectorMatch[]>(() => {}));
    const retriever = new Retriever(index, { dimensions: 3, timeoutMs: 1000 });

    const assertion = expect(retriever.retrieve(VECTOR, 5)).rejects.toThrow('Vector query timed out after 1000ms');
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });

  it('rejects a non-positive topK', async () => {
    const retriever = new Retriever(createFakeIndex(), { dimensions: 3, timeoutMs: 1000 });

    await expect(retriever.retrieve(VECTOR, 0)).rejects.toThrow(RangeError);
  });
});
