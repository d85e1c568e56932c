/**
 * Answer Generator Tests
 *
 * Chat completions come from a vi.fn() fake; no network.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { AnswerGenerator, normalizeImages, stripDataUrlPrefix, type ChatCompletionsAPI } from '../generator.js';
import { GenerationError, type PackedContext } from '../types.js';

const SETTINGS = {
  text_model: 'gpt-3.5-turbo',
  vision_model: 'gpt-4o',
  temperature: 0.7,
  max_completion_tokens: 1000,
  timeout_ms: 60_000,
};

const PACKED: PackedContext = {
  contextText: '--- Document from Week 3 (Source: https://forum.test/t/w/3/1) ---\nDue Sunday.',
  citedSources: [{ title: 'Week 3', url: 'https://forum.test/t/w/3/1' }],
  estimatedTokens: 120,
  droppedCount: 0,
};

const EMPTY: PackedContext = { contextText: '', citedSources: [], estimatedTokens: 20, droppedCount: 0 };

function fakeCompletions(content: string | null = '  The deadline is Sunday.  ') {
  return {
    create: vi.fn<ChatCompletionsAPI['create']>(async () => ({ choices: [{ message: { content } }] })),
  };
}

describe('stripDataUrlPrefix', () => {
  it('removes a data URL prefix', () => {
    expect(stripDataUrlPrefix('data:image/png;base64,aGVsbG8=')).toBe('aGVsbG8=');
    expect(stripDataUrlPrefix('DATA:image/svg+xml;base64,PHN2Zz4=')).toBe('PHN2Zz4=');
  });

  it('leaves bare base64 unchanged', () => {
    expect(stripDataUrlPrefix('aGVsbG8=')).toBe('aGVsbG8=');
  });
});

describe('normalizeImages', () => {
  it('strips prefixes and drops empty entries', () => {
    expect(normalizeImages(['data:image/jpeg;base64,abc', '', '   ', 'def'])).toEqual(['abc', 'def']);
  });

  it('treats undefined as no images', () => {
    expect(normalizeImages(undefined)).toEqual([]);
  });
});

describe('AnswerGenerator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('selects the vision model only when an image is attached', () => {
    const generator = new AnswerGenerator(fakeCompletions(), SETTINGS);

    expect(generator.selectModel()).toBe('gpt-3.5-turbo');
    expect(generator.selectModel([''])).toBe('gpt-3.5-turbo');
    expect(generator.selectModel(['abc'])).toBe('gpt-4o');
  });

  it('sends the system context and question and returns the trimmed answer', async () => {
    const completions = fakeCompletions();
    const generator = new AnswerGenerator(completions, SETTINGS, { systemPrompt: 'Answer from the forum.' });

    const answer = await generator.generate('When is week 3 due?', PACKED);

    expect(answer).toBe('The deadline is Sunday.');
    expect(completions.create).toHaveBeenCalledWith(
      {
        model: 'gpt-3.5-turbo',
        messages: [
          { role: 'system', content: `Answer from the forum.\n\n${PACKED.contextText}` },
          { role: 'user', content: [{ type: 'text', text: 'When is week 3 due?' }] },
        ],
        temperature: 0.7,
        max_tokens: 1000,
      },
      expect.objectContaining({ timeout: 60_000 })
    );
  });

  it('uses the instructions alone when the context is empty', () => {
    const generator = new AnswerGenerator(fakeCompletions(), SETTINGS, { systemPrompt: 'Answer from the forum.' });

    const [system] = generator.buildMessages('Hi?', EMPTY);

    expect(system).toEqual({ role: 'system', content: 'Answer from the forum.' });
  });

  it('attaches each image as a JPEG data URL part', async () => {
    const completions = fakeCompletions();
    const generator = new AnswerGenerator(completions, SETTINGS);

    await generator.generate('What does this error mean?', EMPTY, ['data:image/png;base64,aW1n', 'b3Rocg==']);

    const body = completions.create.mock.calls[0]?.[0];
    expect(body?.model).toBe('gpt-4o');
    expect(body?.messages[1]).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'What does this error mean?' },
        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,aW1n', detail: 'auto' } },
        { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,b3Rocg==', detail: 'auto' } },
      ],
    });
  });

  it('rejects an empty completion', async () => {
    const generator = new AnswerGenerator(fakeCompletions('   '), SETTINGS);

    await expect(generator.generate('Hi?', EMPTY)).rejects.toThrow(
      new GenerationError('Chat completion from gpt-3.5-turbo returned no content')
    );
  });

  it('rejects a missing completion', async () => {
    const generator = new AnswerGenerator(fakeCompletions(null), SETTINGS);

    await expect(generator.generate('Hi?', EMPTY)).rejects.toBeInstanceOf(GenerationError);
  });

  it('rejects a response without choices', async () => {
    const completions = { create: vi.fn<ChatCompletionsAPI['create']>(async () => ({ choices: [] })) };
    const generator = new AnswerGenerator(completions, SETTINGS);

    await expect(generator.generate('Hi?', EMPTY)).rejects.toThrow('returned no content');
  });

  it('wraps transport failures with the model name', async () => {
    const failure = new Error('429 Rate limit reached');
    const completions = {
      create: vi.fn<ChatCompletionsAPI['create']>(async () => {
        throw failure;
      }),
    };
    const generator = new AnswerGenerator(completions, SETTINGS);

    const error = await generator.generate('Hi?', EMPTY).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({
      stage: 'generate',
      message: 'Chat completion failed (gpt-3.5-turbo): 429 Rate limit reached',
      cause: failure,
    });
  });

  it('times out a hung completion', async () => {
    vi.useFakeTimers();
    const completions = { create: vi.fn<ChatCompletionsAPI['create']>(() => new Promise(() => {})) };
    const generator = new AnswerGenerator(completions, { ...SETTINGS, timeout_ms: 5000 });

    const assertion = expect(generator.generate('Hi?', EMPTY)).rejects.toThrow(
      'Chat completion timed out after 5000ms'
    );
    await vi.advanceTimersByTimeAsync(5000);
    await assertion;
  });
});
