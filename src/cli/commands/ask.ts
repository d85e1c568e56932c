/**
 * Ask Command
 *
 * Answers a question from the indexed forum, with numbered sources:
 *
 *   fta ask "When is the week 3 assignment due?"
 *   fta ask "What does this error mean?" --image screenshot.png
 *   fta ask "Is GA2 graded?" --top-k 10 --json
 *   fta ask "Is GA2 graded?" --context-only
 *
 * The answer comes from the same engine the HTTP API uses, so a pipeline
 * failure prints the apology answer rather than an error. `--context-only`
 * stops before generation and shows the retrieved passages.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createRAGEngine } from '../../agent/rag-engine.js';
import { formatCitations, formatCitationsJSON, type CitationJSON } from '../../agent/citations.js';
import type { AnswerTrace, Query } from '../../agent/types.js';
import { formatPassages, formatPassageJSON } from '../../search/formatter.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { AskArgsSchema, AskOptionsSchema, parseInput } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface AskCommandOptions {
  /** Image files attached to the question */
  image?: string[];
  /** Passages to retrieve (default: rag.top_k) */
  topK?: string;
  /** Return retrieved context without LLM generation */
  contextOnly?: boolean;
}

/**
 * JSON output format for the ask command.
 */
interface AskOutputJSON {
  question: string;
  answer: string;
  sources: CitationJSON[];
  metadata: AnswerTrace;
}

/**
 * JSON output format for --context-only mode.
 */
interface AskContextOnlyJSON {
  question: string;
  model: string;
  estimatedTokens: number;
  droppedCount: number;
  passages: Array<ReturnType<typeof formatPassageJSON>>;
  sources: CitationJSON[];
}

// ============================================================================
// Constants
// ============================================================================

/** Image extensions accepted by --image */
const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.webp']);

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Read image files as base64 strings.
 *
 * @throws FileNotFoundError for a missing file
 * @throws CLIError for a file that is not an image
 */
export function readImages(paths: readonly string[]): string[] {
  return paths.map((path) => {
    const absolute = resolve(path);
    if (!existsSync(absolute)) {
      throw new FileNotFoundError(absolute);
    }
    if (!IMAGE_EXTENSIONS.has(extname(absolute).toLowerCase())) {
      throw new CLIError(`Not an image: ${path}`, `Supported: ${[...IMAGE_EXTENSIONS].join(', ')}`);
    }
    return readFileSync(absolute).toString('base64');
  });
}

/**
 * Print timing and packing details under the answer.
 */
function displayTrace(ctx: CommandContext, trace: AnswerTrace): void {
  const { timings } = trace;
  ctx.log('');
  ctx.log(chalk.dim('─'.repeat(50)));
  ctx.log(chalk.dim(`Model: ${trace.model}`));
  ctx.log(
    chalk.dim(
      `Passages: ${trace.retrievedCount} retrieved, ${trace.admittedCount} packed, ${trace.droppedCount} dropped (~${trace.estimatedTokens} tokens)`
    )
  );
  ctx.log(
    chalk.dim(
      `Embed: ${timings.embedMs.toFixed(0)}ms  Retrieval: ${timings.retrievalMs.toFixed(0)}ms  Generation: ${timings.generationMs.toFixed(0)}ms  Total: ${timings.totalMs.toFixed(0)}ms`
    )
  );
  if (trace.degraded) {
    ctx.log(chalk.dim('Retrieval failed; answered without forum context'));
  }
  if (trace.error) {
    ctx.log(chalk.dim(`Failed at ${trace.outcome}: ${trace.error}`));
  }
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer from the forum')
    .description('Answer a question from the indexed forum posts')
    .option('-i, --image <file...>', 'Attach image files to the question')
    .option('-k, --top-k <number>', 'Number of passages to retrieve (default: rag.top_k)')
    .option('--context-only', 'Show the retrieved passages without generating an answer')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const { question: trimmedQuestion } = parseInput(
        AskArgsSchema,
        { question },
        'Provide a question, e.g.: fta ask "When is the week 3 assignment due?"'
      );
      const options = parseInput(AskOptionsSchema, cmdOptions);

      const config = loadConfig();
      const topK = options.topK ?? config.rag.top_k;
      const images = readImages(options.image ?? []);
      const query: Query = images.length > 0 ? { question: trimmedQuestion, images } : { question: trimmedQuestion };

      ctx.debug(`Top-K: ${topK}, images: ${images.length}`);
      ctx.debug(`Index: ${config.index.backend}, embedding: ${config.embedding.model}`);

      const engine = createRAGEngine(config, { logger: ctx });

      // ─────────────────────────────────────────────────────────────────────
      // Context-only mode: embed, retrieve and pack, no generation
      // ─────────────────────────────────────────────────────────────────────
      if (options.contextOnly) {
        const { passages, packed, model } = await engine.prepareContext(query, { topK });

        if (ctx.options.json) {
          const output: AskContextOnlyJSON = {
            question: trimmedQuestion,
            model,
            estimatedTokens: packed.estimatedTokens,
            droppedCount: packed.droppedCount,
            passages: passages.map((passage) => formatPassageJSON(passage)),
            sources: formatCitationsJSON(packed.citedSources).citations,
          };
          console.log(JSON.stringify(output, null, 2));
          return;
        }

        if (passages.length === 0) {
          ctx.log(chalk.yellow(`No forum posts found for: "${trimmedQuestion}"`));
          ctx.log(chalk.dim('Run: fta index <dir>  to index scraped topics first'));
          return;
        }

        ctx.log(chalk.bold('Passages:'));
        ctx.log(formatPassages(passages));
        ctx.log('');
        ctx.log(
          chalk.dim(
            `${packed.citedSources.length} of ${passages.length} passages fit the ${model} prompt (~${packed.estimatedTokens} tokens)`
          )
        );
        return;
      }

      // ─────────────────────────────────────────────────────────────────────
      // Full answer
      // ─────────────────────────────────────────────────────────────────────
      if (!ctx.options.json) {
        ctx.log(chalk.dim('Searching the forum...'));
        ctx.log('');
      }

      const { result, trace } = await engine.answerWithTrace(query, { topK });

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question: trimmedQuestion,
          answer: result.answer,
          sources: formatCitationsJSON(result.sources).citations,
          metadata: trace,
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(result.answer);

      if (result.sources.length > 0) {
        ctx.log('');
        ctx.log(chalk.bold('Sources:'));
        ctx.log(formatCitations(result.sources));
      }

      if (ctx.options.verbose) {
        displayTrace(ctx, trace);
      }

      if (trace.outcome !== 'done') {
        process.exitCode = 1;
      }
    });
}
