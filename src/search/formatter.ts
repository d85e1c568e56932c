/**
 * Passage Formatter
 *
 * Formats retrieved passages for `fta ask --context-only`, as text with
 * scores and truncated snippets, or as JSON.
 *
 * @example
 * ```typescript
 * formatPassage(passage);
 * // [0.92] Week 3 assignment deadline
 * //   https://forum.example.org/t/week-3-deadline/1234/5
 * //   The deadline was moved to Sunday because the portal...
 * ```
 */

import type { PassageRecord } from '../agent/types.js';

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

const INDENT = '  ';

export interface PassageFormatOptions {
  /** Maximum snippet length (default: 200) */
  snippetLength?: number;
  /** Show the similarity score (default: true) */
  showScore?: boolean;
}

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength` characters with an ellipsis.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)   // "Hello..."
 * truncateSnippet("Line 1\nLine 2")   // "Line 1 Line 2"
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return normalized.slice(0, maxLength) + '...';
}

/**
 * Format one passage: score and title, then the url and a snippet, indented.
 */
export function formatPassage(passage: PassageRecord, options: PassageFormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const header = showScore ? `[${formatScore(passage.score)}] ${passage.title}` : passage.title;
  const lines = [header, INDENT + passage.url];
  const snippet = truncateSnippet(passage.text, snippetLength);
  if (snippet) {
    lines.push(INDENT + snippet);
  }
  return lines.join('\n');
}

/**
 * Format passages separated by blank lines.
 */
export function formatPassages(passages: readonly PassageRecord[], options: PassageFormatOptions = {}): string {
  return passages.map((passage) => formatPassage(passage, options)).join('\n\n');
}

/**
 * JSON form of a passage, with the text cut to a snippet.
 */
export function formatPassageJSON(
  passage: PassageRecord,
  options: Pick<PassageFormatOptions, 'snippetLength'> = {}
): { id: string; score: number; title: string; url: string; snippet: string } {
  return {
    id: passage.id,
    score: passage.score,
    title: passage.title,
    url: passage.url,
    snippet: truncateSnippet(passage.text, options.snippetLength),
  };
}
