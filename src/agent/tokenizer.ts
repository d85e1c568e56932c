/**
 * Token Counting
 *
 * Model-specific token counts using the tiktoken encodings shipped with
 * js-tiktoken. Encoders are built lazily and cached per encoding.
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';

/** Counts tokens in a string. Injected into the packer. */
export type TokenCounter = (text: string) => number;

const O200K_MODEL_PREFIXES = ['gpt-4o', 'chatgpt-4o', 'gpt-4.1', 'o1', 'o3', 'o4'];

const encoders = new Map<TiktokenEncoding, Tiktoken>();

/**
 * Pick the encoding for a chat model.
 * Unknown models (including proxy-specific names) fall back to cl100k_base.
 */
export function encodingForModel(model: string): TiktokenEncoding {
  // Proxies often prefix the vendor: "openai/gpt-4o-mini"
  const name = model.slice(model.lastIndexOf('/') + 1).toLowerCase();
  return O200K_MODEL_PREFIXES.some((prefix) => name.startsWith(prefix)) ? 'o200k_base' : 'cl100k_base';
}

function getEncoder(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/**
 * Count tokens in `text` with the encoding for `model`.
 * Special-token markers in forum text are counted as ordinary text.
 */
export function countTokens(text: string, model: string): number {
  if (text.length === 0) return 0;
  return getEncoder(encodingForModel(model)).encode(text, [], []).length;
}

/**
 * Bind a counter to one model.
 */
export function createTokenCounter(model: string): TokenCounter {
  return (text) => countTokens(text, model);
}
