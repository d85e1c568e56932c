/**
 * Context Packer
 *
 * Fits ranked passages into a token budget by greedy prefix:
 *
 * ```
 * base  = count(systemPrompt + question) + reservedTokens
 * block = "--- Document from {title} (Source: {url}) ---\n{text}"
 * admit block i  iff  running + count(block i) < tokenBudget
 * ```
 *
 * Blocks after the first carry a leading blank line, counted with the
 * block. Packing stops at the first block that does not fit, so a short
 * passage ranked below a long one is never admitted ahead of it.
 */

import type { Citation, PackedContext, PassageRecord } from './types.js';
import type { TokenCounter } from './tokenizer.js';
import { SYSTEM_PROMPT } from './prompts.js';

export const BLOCK_SEPARATOR = '\n\n';

export interface ContextPackerOptions {
  countTokens: TokenCounter;
  /** Instructions counted in the base cost (default: SYSTEM_PROMPT) */
  systemPrompt?: string;
}

/**
 * Render one passage as it appears in the prompt.
 */
export function formatPassageBlock(passage: Pick<PassageRecord, 'title' | 'url' | 'text'>): string {
  return `--- Document from ${passage.title} (Source: ${passage.url}) ---\n${passage.text}`;
}

export class ContextPacker {
  private readonly countTokens: TokenCounter;
  private readonly systemPrompt: string;

  constructor(options: ContextPackerOptions) {
    this.countTokens = options.countTokens;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  /**
   * Pack passages (already ranked) for a question.
   *
   * Never fails for budget reasons: when the base cost alone reaches the
   * budget the result is empty but well-formed.
   *
   * @throws RangeError if tokenBudget is not a positive integer or
   *   reservedTokens is negative
   */
  pack(
    question: string,
    passages: readonly PassageRecord[],
    tokenBudget: number,
    reservedTokens: number
  ): PackedContext {
    if (!Number.isInteger(tokenBudget) || tokenBudget <= 0) {
      throw new RangeError(`tokenBudget must be a positive integer, got ${tokenBudget}`);
    }
    if (!Number.isInteger(reservedTokens) || reservedTokens < 0) {
      throw new RangeError(`reservedTokens must be a non-negative integer, got ${reservedTokens}`);
    }

    let running = this.countTokens(this.systemPrompt + question) + reservedTokens;
    const blocks: string[] = [];
    const citedSources: Citation[] = [];

    for (const passage of passages) {
      const block = (blocks.length > 0 ? BLOCK_SEPARATOR : '') + formatPassageBlock(passage);
      const blockTokens = this.countTokens(block);

      if (running + blockTokens >= tokenBudget) {
        break;
      }

      blocks.push(block);
      citedSources.push({ title: passage.title, url: passage.url });
      running += blockTokens;
    }

    return {
      contextText: blocks.join(''),
      citedSources,
      estimatedTokens: running,
      droppedCount: passages.length - citedSources.length,
    };
  }
}
