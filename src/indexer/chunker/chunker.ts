/**
 * Chunker
 *
 * Splits post text into passages of at most `maxTokens` tokens.
 *
 * Splitting falls back through three levels:
 * 1. Paragraphs (blank-line separated) are packed together while they fit
 * 2. A paragraph too long on its own is split into sentences
 * 3. A sentence too long on its own is split into words
 *
 * A single word longer than the limit is kept whole.
 */

import type { TokenCounter } from '../../agent/tokenizer.js';
import type { ForumPassage, ForumPost } from '../types.js';

/**
 * Options for splitting text.
 */
export interface ChunkOptions {
  /** Upper bound per chunk */
  maxTokens: number;
  countTokens: TokenCounter;
}

const PARAGRAPH_BREAK = /\n{2,}/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const WORD_BREAK = /\s+/;

/**
 * Greedily join pieces with `joiner` while the joined text fits.
 * Pieces that do not fit alone are handed to `split`.
 */
function pack(
  pieces: string[],
  joiner: string,
  options: ChunkOptions,
  split?: (piece: string) => string[]
): string[] {
  const { maxTokens, countTokens } = options;
  const chunks: string[] = [];
  let current = '';

  const flush = (): void => {
    if (current) {
      chunks.push(current);
      current = '';
    }
  };

  for (const piece of pieces) {
    const candidate = current ? `${current}${joiner}${piece}` : piece;
    if (countTokens(candidate) <= maxTokens) {
      current = candidate;
      continue;
    }

    flush();
    if (countTokens(piece) <= maxTokens) {
      current = piece;
    } else if (split) {
      chunks.push(...split(piece));
    } else {
      chunks.push(piece);
    }
  }

  flush();
  return chunks;
}

function nonEmpty(parts: string[]): string[] {
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Split text into chunks of at most `maxTokens` tokens (see module doc).
 *
 * @throws RangeError if maxTokens is not a positive integer
 */
export function splitText(text: string, options: ChunkOptions): string[] {
  if (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0) {
    throw new RangeError(`maxTokens must be a positive integer, got ${options.maxTokens}`);
  }

  const byWords = (sentence: string): string[] => pack(nonEmpty(sentence.split(WORD_BREAK)), ' ', options);
  const bySentences = (paragraph: string): string[] =>
    pack(nonEmpty(paragraph.split(SENTENCE_BREAK)), ' ', options, byWords);

  return pack(nonEmpty(text.split(PARAGRAPH_BREAK)), '\n\n', options, bySentences);
}

/**
 * Passage id for chunk `chunk` of a post.
 */
export function passageId(topicId: number, postNumber: number, chunk: number): string {
  return `${topicId}-${postNumber}-${chunk}`;
}

/**
 * Turn posts into passages. Every passage of a post carries the topic
 * title and the post's permalink.
 */
export function chunkPosts(posts: readonly ForumPost[], options: ChunkOptions): ForumPassage[] {
  return posts.flatMap((post) =>
    splitText(post.text, options).map((text, chunk) => ({
      id: passageId(post.topicId, post.postNumber, chunk),
      text,
      title: post.topicTitle,
      url: post.url,
    }))
  );
}
