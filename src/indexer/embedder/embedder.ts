/**
 * Embedder Orchestration
 *
 * Embeds many passages for the indexer:
 * 1. Batch texts per request (default: 32 per batch)
 * 2. When a batch fails, retry its items one by one so a single bad
 *    passage does not lose the whole batch
 * 3. Report progress and per-item failures through callbacks
 */

import { toError } from '../../utils/index.js';
import type { EmbeddableItem, Embedded, Embedder, EmbedderOptions } from './types.js';

/** Default batch size */
const DEFAULT_BATCH_SIZE = 32;

/**
 * Embed items in batches; items that fail are reported through onError
 * and left out of the result.
 *
 * @example
 * ```typescript
 * const embedded = await embedPassages(passages, embedder, {
 *   batchSize: config.embedding.batch_size,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * await index.upsert(embedded);
 * ```
 */
export async function embedPassages<T extends EmbeddableItem>(
  items: readonly T[],
  embedder: Embedder,
  options: EmbedderOptions = {}
): Promise<Array<Embedded<T>>> {
  const { batchSize = DEFAULT_BATCH_SIZE, signal, onProgress, onError } = options;

  if (items.length === 0) {
    return [];
  }

  const embedded: Array<Embedded<T>> = [];
  let processed = 0;

  for (let i = 0; i < items.length; i += batchSize) {
    if (signal?.aborted) {
      break;
    }

    const batch = items.slice(i, i + batchSize);

    try {
      const vectors = await embedder.embedBatch(batch.map((item) => item.text));
      batch.forEach((item, j) => {
        const embedding = vectors[j];
        if (embedding) {
          embedded.push({ ...item, embedding });
        } else {
          onError?.(new Error('No embedding returned'), item.id);
        }
      });
      processed += batch.length;
      onProgress?.(processed, items.length);
    } catch {
      // Batch failed - isolate the bad item(s)
      for (const item of batch) {
        if (signal?.aborted) {
          break;
        }

        try {
          embedded.push({ ...item, embedding: await embedder.embed(item.text) });
        } catch (itemError) {
          onError?.(toError(itemError), item.id);
        }

        processed++;
        onProgress?.(processed, items.length);
      }
    }
  }

  return embedded;
}
