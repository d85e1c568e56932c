/**
 * Passage Formatter Tests
 */

import { describe, it, expect } from 'vitest';

import { formatScore, truncateSnippet, formatPassage, formatPassages, formatPassageJSON } from '../formatter.js';
import type { PassageRecord } from '../../agent/types.js';

const PASSAGE: PassageRecord = {
  id: '12-4-0',
  score: 0.9234,
  text: 'The deadline was moved\nto Sunday.',
  title: 'Week 3 deadline',
  url: 'https://forum.test/t/week-3/12/4',
};

describe('formatScore', () => {
  it('uses two decimals', () => {
    expect(formatScore(0.9234)).toBe('0.92');
    expect(formatScore(1)).toBe('1.00');
  });
});

describe('truncateSnippet', () => {
  it('collapses whitespace', () => {
    expect(truncateSnippet('Line 1\n\n  Line 2')).toBe('Line 1 Line 2');
  });

  it('cuts long text with an ellipsis', () => {
    expect(truncateSnippet('Hello world', 5)).toBe('Hello...');
  });
});

describe('formatPassage', () => {
  it('shows score, title, url and snippet', () => {
    expect(formatPassage(PASSAGE)).toBe(
      '[0.92] Week 3 deadline\n  https://forum.test/t/week-3/12/4\n  The deadline was moved to Sunday.'
    );
  });

  it('can hide the score and skip an empty snippet', () => {
    expect(formatPassage({ ...PASSAGE, text: '' }, { showScore: false })).toBe(
      'Week 3 deadline\n  https://forum.test/t/week-3/12/4'
    );
  });

  it('separates passages with a blank line', () => {
    const two = formatPassages([PASSAGE, { ...PASSAGE, text: '' }], { showScore: false });

    expect(two.split('\n\n')).toHaveLength(2);
  });
});

describe('formatPassageJSON', () => {
  it('keeps id and score and cuts the text to a snippet', () => {
    expect(formatPassageJSON(PASSAGE, { snippetLength: 10 })).toEqual({
      id: '12-4-0',
      score: 0.9234,
      title: 'Week 3 deadline',
      url: 'https://forum.test/t/week-3/12/4',
      snippet: 'The deadli...',
    });
  });
});
