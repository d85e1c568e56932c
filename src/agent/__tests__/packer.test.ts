/**
 * Context Packer Tests
 *
 * Tokens are counted as '#' characters: titles, urls and block headers
 * contain none, so only question and passage text count.
 */

import { describe, it, expect } from 'vitest';

import { ContextPacker, formatPassageBlock, BLOCK_SEPARATOR } from '../packer.js';
import type { PassageRecord } from '../types.js';
import type { TokenCounter } from '../tokenizer.js';

const countHashes: TokenCounter = (text) => (text.match(/#/g) ?? []).length;

function passage(id: number, tokens: number): PassageRecord {
  return {
    id: `p${id}`,
    score: 1 - id / 100,
    text: '#'.repeat(tokens),
    title: `Post ${id}`,
    url: `https://forum.test/t/post/${id}`,
  };
}

const QUESTION = '#'.repeat(50);

describe('formatPassageBlock', () => {
  it('renders the header line followed by the text', () => {
    expect(formatPassageBlock({ title: 'Week 3', url: 'https://forum.test/t/w/3/1', text: 'Due Sunday.' })).toBe(
      '--- Document from Week 3 (Source: https://forum.test/t/w/3/1) ---\nDue Sunday.'
    );
  });
});

describe('ContextPacker', () => {
  const packer = new ContextPacker({ countTokens: countHashes, systemPrompt: '' });

  it('admits passages while the total stays under the budget', () => {
    const packed = packer.pack(QUESTION, [passage(1, 100), passage(2, 100), passage(3, 5000)], 1000, 500);

    expect(packed.citedSources).toEqual([
      { title: 'Post 1', url: 'https://forum.test/t/post/1' },
      { title: 'Post 2', url: 'https://forum.test/t/post/2' },
    ]);
    expect(packed.estimatedTokens).toBe(750);
    expect(packed.droppedCount).toBe(1);
    expect(countHashes(packed.contextText)).toBe(200);
  });

  it('joins blocks with a blank line', () => {
    const packed = packer.pack(QUESTION, [passage(1, 1), passage(2, 1)], 1000, 0);

    expect(packed.contextText).toBe(
      formatPassageBlock(passage(1, 1)) + BLOCK_SEPARATOR + formatPassageBlock(passage(2, 1))
    );
  });

  it('counts the separator with the block that follows it', () => {
    const byLength = new ContextPacker({ countTokens: (text) => text.length, systemPrompt: '' });
    const tiny = (id: number): PassageRecord => ({ id: `t${id}`, score: 1, text: 'a', title: 'T', url: 'u' });

    const packed = byLength.pack('q', [tiny(1), tiny(2)], 10_000, 0);

    // "--- Document from T (Source: u) ---\na" is 37 characters
    expect(packed.estimatedTokens).toBe(1 + 37 + 39);
  });

  it('stops at the first passage that does not fit', () => {
    const packed = packer.pack(QUESTION, [passage(1, 100), passage(2, 5000), passage(3, 10)], 1000, 500);

    expect(packed.citedSources.map((s) => s.title)).toEqual(['Post 1']);
    expect(packed.droppedCount).toBe(2);
  });

  it('rejects a block that would reach the budget exactly', () => {
    expect(packer.pack(QUESTION, [passage(1, 450)], 1000, 500).citedSources).toHaveLength(0);
    expect(packer.pack(QUESTION, [passage(1, 449)], 1000, 500).citedSources).toHaveLength(1);
  });

  it('counts the system prompt in the base cost', () => {
    const withPrompt = new ContextPacker({ countTokens: countHashes, systemPrompt: '#'.repeat(10) });
    const passages = [passage(1, 100), passage(2, 100)];

    expect(withPrompt.pack(QUESTION, passages, 755, 500).citedSources).toHaveLength(1);
    expect(packer.pack(QUESTION, passages, 755, 500).citedSources).toHaveLength(2);
  });

  it('keeps the admitted text under the budget', () => {
    const passages = [30, 80, 10, 200, 5, 60].map((tokens, i) => passage(i, tokens));
    const base = countHashes(QUESTION) + 100;

    for (const budget of [160, 200, 300, 400, 1000]) {
      const packed = packer.pack(QUESTION, passages, budget, 100);

      expect(countHashes(packed.contextText) + base).toBeLessThan(budget);
      expect(packed.citedSources).toEqual(
        passages.slice(0, packed.citedSources.length).map(({ title, url }) => ({ title, url }))
      );
    }
  });

  it('returns an empty context for no passages', () => {
    expect(packer.pack(QUESTION, [], 1000, 500)).toEqual({
      contextText: '',
      citedSources: [],
      estimatedTokens: 550,
      droppedCount: 0,
    });
  });

  it('returns an empty context when the base alone exceeds the budget', () => {
    const packed = packer.pack('#'.repeat(2000), [passage(1, 1)], 1000, 500);

    expect(packed).toEqual({ contextText: '', citedSources: [], estimatedTokens: 2500, droppedCount: 1 });
  });

  it('rejects invalid budgets', () => {
    expect(() => packer.pack(QUESTION, [], 0, 0)).toThrow(RangeError);
    expect(() => packer.pack(QUESTION, [], 1.5, 0)).toThrow(RangeError);
    expect(() => packer.pack(QUESTION, [], 1000, -1)).toThrow(RangeError);
  });
});
