/**
 * Discourse Topic Loader
 *
 * Reads `topic_{id}.json` files written by the forum scraper and turns
 * their posts into plain text with permalinks.
 *
 * Post URL: `{base_url}/t/{slug}/{topic_id}/{post_number}`
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';
import { safeJsonParse, errorMessage } from '../utils/index.js';
import {
  DiscourseTopicSchema,
  SMALL_ACTION_POST_TYPE,
  type DiscourseTopic,
  type ForumPost,
  type LoadedTopic,
} from './types.js';

export const TOPIC_FILE_PATTERN = /^topic_\d+\.json$/;

// ============================================================================
// HTML → TEXT
// ============================================================================

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript']);

const BLOCK_TAGS = new Set([
  'p', 'div', 'ul', 'ol', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'blockquote', 'pre', 'tr', 'table', 'aside',
]);

function renderNode(node: Node, out: string[]): void {
  if (node instanceof TextNode) {
    // `text` decodes entities; `rawText` would not
    out.push(node.text);
    return;
  }
  if (!(node instanceof HTMLElement)) return;

  const tag = node.rawTagName.toLowerCase();
  if (SKIPPED_TAGS.has(tag)) return;
  // Image lightbox caption: "image.png 800×600 20 KB"
  if (tag === 'div' && node.classList.contains('meta')) return;

  if (tag === 'br') {
    out.push('\n');
    return;
  }
  if (tag === 'li') out.push('\n- ');

  for (const child of node.childNodes) {
    renderNode(child, out);
  }

  if (BLOCK_TAGS.has(tag)) out.push('\n\n');
}

/**
 * Reduce Discourse "cooked" HTML to readable plain text.
 * Block elements become line breaks, list items get a "- " marker, and
 * comments and image lightbox captions are dropped.
 */
export function htmlToText(html: string): string {
  // `pre` is parsed as markup so the <code> inside it is unwrapped
  const root = parse(html, { comment: false, blockTextElements: { script: false, noscript: false, style: false } });

  const out: string[] = [];
  for (const node of root.childNodes) {
    renderNode(node, out);
  }

  return out
    .join('')
    .split('\n')
    .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// ============================================================================
// TOPICS → POSTS
// ============================================================================

/**
 * Permalink of a post.
 */
export function postUrl(baseUrl: string, slug: string, topicId: number, postNumber: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/t/${slug}/${topicId}/${postNumber}`;
}

/**
 * Posts of a topic as plain text. Hidden posts, small-action posts
 * ("closed this topic") and posts with no text are skipped.
 */
export function topicToPosts(topic: DiscourseTopic, baseUrl: string): ForumPost[] {
  const posts: ForumPost[] = [];

  for (const post of topic.post_stream.posts) {
    if (post.hidden || post.post_type === SMALL_ACTION_POST_TYPE) continue;

    const text = htmlToText(post.cooked);
    if (!text) continue;

    posts.push({
      topicId: topic.id,
      topicTitle: topic.title,
      postNumber: post.post_number,
      author: post.username,
      createdAt: post.created_at,
      text,
      url: postUrl(baseUrl, topic.slug, topic.id, post.post_number),
    });
  }

  return posts;
}

// ============================================================================
// FILES
// ============================================================================

export interface TopicLoadResult {
  /** Matching files found in the directory */
  files: string[];
  topics: LoadedTopic[];
  /** Files that could not be read, parsed or validated */
  errors: Array<{ file: string; message: string }>;
}

/**
 * Parse one topic file's content.
 *
 * @returns the topic, or an error message
 */
export function parseTopic(json: string): { topic: DiscourseTopic } | { error: string } {
  let error = 'Invalid topic file';
  const topic = safeJsonParse(json, DiscourseTopicSchema, (parseError) => {
    error = parseError.message;
  });
  return topic ? { topic } : { error };
}

/**
 * Load every `topic_{id}.json` in `dir` (non-recursive), in file name order.
 * Bad files are collected in `errors` and do not stop the load.
 *
 * @throws if `dir` itself cannot be read
 */
export async function loadTopicFiles(
  dir: string,
  onFile?: (file: string, index: number, total: number) => void
): Promise<TopicLoadResult> {
  const entries = await readdir(dir);
  const files = entries
    .filter((name) => TOPIC_FILE_PATTERN.test(name))
    .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }))
    .map((name) => join(dir, name));

  const result: TopicLoadResult = { files, topics: [], errors: [] };

  for (const [index, file] of files.entries()) {
    onFile?.(file, index + 1, files.length);

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      result.errors.push({ file, message: errorMessage(error) });
      continue;
    }

    const parsed = parseTopic(content);
    if ('topic' in parsed) {
      result.topics.push({ file, topic: parsed.topic });
    } else {
      result.errors.push({ file, message: parsed.error });
    }
  }

  return result;
}
