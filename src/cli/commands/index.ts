/**
 * Index Command
 *
 * Indexes scraped forum topics into the vector index.
 *
 * Usage:
 *   fta index <dir>              Index every topic_*.json file in <dir>
 *   fta index ./topics --dry-run Load and chunk only, nothing is embedded
 *   fta index ./topics --json    Output progress as NDJSON
 *   fta index ./topics --verbose Show per-file progress and stage timings
 *
 * The indexing pipeline:
 * 1. Loading - Parse and validate topic files (bad files become warnings)
 * 2. Chunking - Reduce posts to text and split them into passages
 * 3. Embedding - Compute vectors in batches of embedding.batch_size
 * 4. Storing - Upsert passages into the configured backend
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createIndexReporter, type IndexPipelineResult } from '../utils/progress.js';
import { runIndexPipeline, IndexingCancelledError, type IndexTarget } from '../../indexer/pipeline.js';
import { OpenAIEmbedder } from '../../indexer/embedder/index.js';
import { createTokenCounter } from '../../agent/tokenizer.js';
import { createOpenAIClient } from '../../providers/openai.js';
import { createVectorIndex } from '../../search/factory.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { errorMessage } from '../../utils/index.js';

/**
 * Command-specific options.
 */
interface IndexCommandOptions {
  dryRun?: boolean;
}

function createTarget(config: Config): IndexTarget {
  const { client } = createOpenAIClient(config.llm);
  return {
    embedder: new OpenAIEmbedder(client.embeddings, config.embedding),
    index: createVectorIndex(config),
  };
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('<dir>', 'Directory of scraped topic_*.json files')
    .description('Embed scraped forum topics and store them in the vector index')
    .option('--dry-run', 'Load and chunk topics without embedding or storing', false)
    .action(async (dir: string, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();

      const topicsDir = resolve(dir);
      if (!existsSync(topicsDir)) {
        throw new FileNotFoundError(topicsDir);
      }
      if (!statSync(topicsDir).isDirectory()) {
        throw new CLIError(
          `Path is not a directory: ${topicsDir}`,
          'fta index takes the directory the scraper wrote topic files to'
        );
      }

      const config = loadConfig();
      const dryRun = cmdOptions.dryRun ?? false;

      ctx.debug(`Topics directory: ${topicsDir}`);
      ctx.debug(`Forum: ${config.forum.base_url}`);
      ctx.debug(`Embedding model: ${config.embedding.model} (${config.embedding.dimensions}d)`);
      ctx.debug(dryRun ? 'Dry run: nothing will be embedded or stored' : `Index backend: ${config.index.backend}`);

      const reporter = createIndexReporter(ctx.options);

      // Ctrl+C stops at the next batch boundary instead of killing mid-write
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      let result: IndexPipelineResult;
      try {
        result = await runIndexPipeline({
          dir: topicsDir,
          forumBaseUrl: config.forum.base_url,
          chunkTokens: config.forum.chunk_tokens,
          countTokens: createTokenCounter(config.embedding.model),
          target: dryRun ? undefined : createTarget(config),
          embeddingBatchSize: config.embedding.batch_size,
          signal: controller.signal,
          ...reporter.callbacks,
        });
      } catch (error) {
        if (error instanceof CLIError) {
          throw error;
        }
        if (error instanceof IndexingCancelledError) {
          throw new CLIError('Indexing cancelled', 'Passages stored before the interrupt are kept; re-run to finish');
        }
        throw new CLIError(`Indexing failed: ${errorMessage(error)}`, 'Check the error details above and try again');
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }

      reporter.summary(result);

      if (result.errors.length > 0) {
        process.exitCode = 1;
      }
    });
}
