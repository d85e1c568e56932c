/**
 * Citation Formatter
 *
 * Presentation of answer sources: numbered lists for the terminal, JSON
 * for `--json`, and the `{ url, text }` links of the `/ask` endpoint.
 *
 * @example
 * ```typescript
 * const text = formatCitations(result.sources);
 * // "[1] Week 3 deadline - https://forum.example.org/t/week-3/12/4
 * //  [2] GA2 clarification - https://forum.example.org/t/ga2/15/1"
 * ```
 *
 * @packageDocumentation
 */

import type { AnswerResult, Citation, LinkResult } from './types.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/**
 * JSON output format for a single citation.
 */
export interface CitationJSON {
  /** 1-based, matches the "[n]" of text output */
  index: number;
  title: string;
  url: string;
}

export interface CitationsOutputJSON {
  count: number;
  citations: CitationJSON[];
}

// ============================================================================
// LABELS AND LINKS
// ============================================================================

/**
 * Text shown for a citation: its title, or the url when the title is empty.
 */
export function citationLabel(citation: Citation): string {
  return citation.title.trim() || citation.url;
}

/**
 * Convert an answer to the `/ask` shape: `sources[].title` becomes
 * `links[].text`, order preserved.
 */
export function toLinks(result: AnswerResult): LinkResult {
  return {
    answer: result.answer,
    links: result.sources.map((source) => ({ url: source.url, text: citationLabel(source) })),
  };
}

// ============================================================================
// TEXT FORMATTING
// ============================================================================

/**
 * "[n] title - url", or "[n] url" when the citation has no title.
 * `index` is 1-based.
 */
export function formatCitation(citation: Citation, index: number): string {
  const label = citationLabel(citation);
  return label === citation.url ? `[${index}] ${label}` : `[${index}] ${label} - ${citation.url}`;
}

/**
 * Numbered list of citations, one per line.
 */
export function formatCitations(sources: readonly Citation[]): string {
  return sources.map((source, i) => formatCitation(source, i + 1)).join('\n');
}

// ============================================================================
// JSON FORMATTING
// ============================================================================

export function formatCitationsJSON(sources: readonly Citation[]): CitationsOutputJSON {
  return {
    count: sources.length,
    citations: sources.map((source, i) => ({ index: i + 1, title: source.title, url: source.url })),
  };
}
