/**
 * Index Progress
 *
 * Renders `fta index` as it runs. Two reporters share one interface:
 * - NDJSON events on stdout for `--json`
 * - Terminal lines, with an ora spinner while a stage runs on a TTY
 *
 * Both plug into runIndexPipeline through `callbacks`.
 */

import { basename } from 'node:path';
import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IndexPipelineOptions } from '../../indexer/pipeline.js';
import type { IndexingStage, IndexPipelineResult, StageStats } from '../../indexer/types.js';

export type { IndexPipelineResult };

type PipelineCallbacks = Pick<
  IndexPipelineOptions,
  'onStageStart' | 'onProgress' | 'onStageComplete' | 'onWarning' | 'onError'
>;

export interface IndexReporter {
  /** Pipeline callbacks bound to this reporter */
  readonly callbacks: PipelineCallbacks;
  summary(result: IndexPipelineResult): void;
}

/** Where reporter lines go; defaults to the console */
export interface ReporterOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleOutput: ReporterOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ============================================================================
// TEXT
// ============================================================================

const STAGE_START: Record<IndexingStage, string> = {
  loading: 'Loading topic files',
  chunking: 'Chunking posts',
  embedding: 'Embedding passages',
  storing: 'Storing passages',
};

const STAGE_ORDER: readonly IndexingStage[] = ['loading', 'chunking', 'embedding', 'storing'];

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
}

function plural(count: number, noun: string): string {
  return `${count.toLocaleString('en-US')} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One line describing a finished stage.
 */
export function describeStage(stats: StageStats): string {
  switch (stats.stage) {
    case 'loading':
      return `Loaded ${stats.processed} of ${plural(stats.total, 'topic file')}`;
    case 'chunking':
      return `Chunked posts into ${plural(stats.processed, 'passage')}`;
    case 'embedding':
      return `Embedded ${stats.processed} of ${plural(stats.total, 'passage')}`;
    case 'storing':
      return `Stored ${plural(stats.processed, 'passage')}`;
  }
}

/**
 * Closing lines: counts, skipped files, failed passages and, when
 * verbose, time per stage.
 */
export function summarize(result: IndexPipelineResult, verbose = false): string[] {
  const source = `${plural(result.topicsLoaded, 'topic file')} (${plural(result.postsFound, 'post')})`;
  const lines = [
    result.dryRun
      ? `Dry run: ${plural(result.passagesCreated, 'passage')} from ${source}, nothing embedded`
      : `Indexed ${plural(result.passagesStored, 'passage')} from ${source} in ${formatDuration(result.totalDurationMs)}`,
  ];

  const skipped = result.filesFound - result.topicsLoaded;
  if (skipped > 0) {
    lines.push(`  ${plural(skipped, 'topic file')} skipped`);
  }
  if (result.errors.length > 0) {
    lines.push(`  ${plural(result.errors.length, 'passage')} failed to embed`);
  }
  if (verbose) {
    const timings = STAGE_ORDER.flatMap((stage) => {
      const ms = result.stageDurations[stage];
      return ms === undefined ? [] : [`${stage} ${formatDuration(ms)}`];
    });
    if (timings.length > 0) lines.push(`  ${timings.join(' · ')}`);
  }
  return lines;
}

// ============================================================================
// NDJSON
// ============================================================================

export type ProgressEvent =
  | { type: 'stage_start'; stage: IndexingStage; total: number }
  | { type: 'stage_complete'; stage: IndexingStage; processed: number; total: number; durationMs: number }
  | { type: 'warning'; file?: string; message: string }
  | { type: 'error'; passageId?: string; message: string }
  | { type: 'complete'; data: { result: IndexPipelineResult } };

/**
 * One JSON object per line. Per-item progress is not emitted.
 */
export class JsonIndexReporter implements IndexReporter {
  readonly callbacks: PipelineCallbacks;

  constructor(private readonly output: ReporterOutput = consoleOutput) {
    this.callbacks = {
      onStageStart: (stage, total) => this.emit({ type: 'stage_start', stage, total }),
      onStageComplete: (stage, stats) =>
        this.emit({
          type: 'stage_complete',
          stage,
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
        }),
      onWarning: (message, file) => this.emit({ type: 'warning', file, message }),
      onError: (error, passageId) => this.emit({ type: 'error', passageId, message: error.message }),
    };
  }

  summary(result: IndexPipelineResult): void {
    this.emit({ type: 'complete', data: { result } });
  }

  private emit(event: ProgressEvent): void {
    this.output.out(JSON.stringify(event));
  }
}

// ============================================================================
// TERMINAL
// ============================================================================

export interface TerminalReporterOptions {
  verbose: boolean;
  /** Animate a spinner (TTY only) */
  interactive: boolean;
}

export class TerminalIndexReporter implements IndexReporter {
  readonly callbacks: PipelineCallbacks;
  private spinner: Ora | null = null;

  constructor(
    private readonly options: TerminalReporterOptions,
    private readonly output: ReporterOutput = consoleOutput
  ) {
    this.callbacks = {
      onStageStart: (stage) => this.start(stage),
      onProgress: (stage, processed, total, current) => this.progress(stage, processed, total, current),
      onStageComplete: (_stage, stats) => this.complete(stats),
      onWarning: (message, file) => this.interrupt(chalk.yellow(`Skipped ${file ? basename(file) : 'file'}: ${message}`)),
      onError: (error, passageId) =>
        this.interrupt(chalk.red(`Failed to embed ${passageId ?? 'passage'}: ${error.message}`)),
    };
  }

  summary(result: IndexPipelineResult): void {
    const [headline = '', ...details] = summarize(result, this.options.verbose);
    this.output.out('');
    this.output.out(result.dryRun ? chalk.cyan(headline) : chalk.green(`✓ ${headline}`));
    for (const line of details) {
      this.output.out(chalk.dim(line));
    }
  }

  private start(stage: IndexingStage): void {
    const text = `${STAGE_START[stage]}...`;
    if (this.options.interactive) {
      this.spinner = ora(text).start();
    } else {
      this.output.out(text);
    }
  }

  private progress(stage: IndexingStage, processed: number, total: number, current?: string): void {
    if (!this.spinner) return;
    const count = total > 0 ? `${processed}/${total}` : `${processed}`;
    const file = this.options.verbose && current ? ` ${chalk.dim(basename(current))}` : '';
    this.spinner.text = `${STAGE_START[stage]} ${count}${file}`;
  }

  private complete(stats: StageStats): void {
    const line = `${describeStage(stats)} (${formatDuration(stats.durationMs)})`;
    if (this.spinner) {
      this.spinner.succeed(line);
      this.spinner = null;
    } else {
      this.output.out(line);
    }
  }

  /** Print above the spinner without breaking it */
  private interrupt(line: string): void {
    this.spinner?.clear();
    this.output.err(line);
    this.spinner?.render();
  }
}

/**
 * Reporter for the CLI's global options.
 */
export function createIndexReporter(
  options: { json: boolean; verbose: boolean },
  output: ReporterOutput = consoleOutput
): IndexReporter {
  if (options.json) {
    return new JsonIndexReporter(output);
  }
  return new TerminalIndexReporter(
    { verbose: options.verbose, interactive: output === consoleOutput && process.stdout.isTTY === true },
    output
  );
}
