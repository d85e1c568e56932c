/**
 * Citation Formatter Tests
 */

import { describe, it, expect } from 'vitest';

import { citationLabel, toLinks, formatCitation, formatCitations, formatCitationsJSON } from '../citations.js';
import type { Citation } from '../types.js';

const SOURCES: Citation[] = [
  { title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' },
  { title: 'GA2 clarification', url: 'https://forum.test/t/ga2/15/1' },
  { title: '', url: 'https://forum.test/t/untitled/16/2' },
];

describe('citationLabel', () => {
  it('uses the title, or the url when the title is blank', () => {
    expect(citationLabel(SOURCES[0]!)).toBe('Week 3 deadline');
    expect(citationLabel({ title: '  ', url: 'https://forum.test/x' })).toBe('https://forum.test/x');
  });
});

describe('toLinks', () => {
  it('maps sources to url/text links in order', () => {
    expect(toLinks({ answer: 'Sunday.', sources: SOURCES })).toEqual({
      answer: 'Sunday.',
      links: [
        { url: 'https://forum.test/t/week-3/12/4', text: 'Week 3 deadline' },
        { url: 'https://forum.test/t/ga2/15/1', text: 'GA2 clarification' },
        { url: 'https://forum.test/t/untitled/16/2', text: 'https://forum.test/t/untitled/16/2' },
      ],
    });
  });

  it('returns an empty link list for an answer without sources', () => {
    expect(toLinks({ answer: 'Sorry.', sources: [] })).toEqual({ answer: 'Sorry.', links: [] });
  });
});

describe('formatCitation', () => {
  it('formats compact citations with title and url', () => {
    expect(formatCitation(SOURCES[0]!, 1)).toBe('[1] Week 3 deadline - https://forum.test/t/week-3/12/4');
  });

  it('does not repeat the url for untitled sources', () => {
    expect(formatCitation(SOURCES[2]!, 3)).toBe('[3] https://forum.test/t/untitled/16/2');
  });
});

describe('formatCitations', () => {
  it('numbers each source', () => {
    expect(formatCitations(SOURCES.slice(0, 2))).toBe(
      '[1] Week 3 deadline - https://forum.test/t/week-3/12/4\n[2] GA2 clarification - https://forum.test/t/ga2/15/1'
    );
  });

  it('returns an empty string for no sources', () => {
    expect(formatCitations([])).toBe('');
  });
});

describe('formatCitationsJSON', () => {
  it('includes a 1-based index', () => {
    expect(formatCitationsJSON(SOURCES.slice(0, 1))).toEqual({
      count: 1,
      citations: [{ index: 1, title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' }],
    });
  });
});
