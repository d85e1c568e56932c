/**
 * Tests for the ask command
 *
 * The engine factory and config loader are mocked; image files are real
 * files in a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createAskCommand, readImages } from '../ask.js';
import type { CommandContext } from '../../types.js';
import { createRAGEngine, type ForumRAGEngine } from '../../../agent/rag-engine.js';
import type { AnswerTrace, TracedAnswer } from '../../../agent/index.js';
import { GENERATION_ERROR_ANSWER } from '../../../agent/types.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { loadConfig } from '../../../config/loader.js';
import { CLIError, FileNotFoundError } from '../../../errors/index.js';

vi.mock('../../../agent/rag-engine.js', () => ({
  createRAGEngine: vi.fn(),
}));

vi.mock('../../../config/loader.js', () => ({
  loadConfig: vi.fn(),
}));

const TRACE: AnswerTrace = {
  outcome: 'done',
  model: 'gpt-3.5-turbo',
  retrievedCount: 2,
  admittedCount: 1,
  droppedCount: 1,
  estimatedTokens: 640,
  degraded: false,
  timings: { embedMs: 10, retrievalMs: 20, packMs: 1, generationMs: 300, totalMs: 331 },
};

const ANSWER: TracedAnswer = {
  result: {
    answer: 'The deadline is Sunday.',
    sources: [{ title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' }],
  },
  trace: TRACE,
};

describe('ask command', () => {
  let dir: string;
  let lines: string[];
  let engine: {
    answerWithTrace: Mock<ForumRAGEngine['answerWithTrace']>;
    prepareContext: Mock<ForumRAGEngine['prepareContext']>;
  };

  function createContext(json = false): CommandContext {
    return {
      options: { verbose: false, json },
      log: (message: string) => lines.push(message),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  }

  async function runAsk(args: string[], context = createContext()): Promise<void> {
    const program = new Command();
    program.addCommand(createAskCommand(() => context));
    await program.parseAsync(['node', 'fta', 'ask', ...args]);
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadConfig).mockReturnValue(DEFAULT_CONFIG);
    dir = mkdtempSync(join(tmpdir(), 'fta-ask-'));
    lines = [];
    engine = {
      answerWithTrace: vi.fn<ForumRAGEngine['answerWithTrace']>(async () => ANSWER),
      prepareContext: vi.fn<ForumRAGEngine['prepareContext']>(),
    };
    vi.mocked(createRAGEngine).mockReturnValue(engine as unknown as ForumRAGEngine);
    process.exitCode = undefined;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('readImages', () => {
    it('reads files as base64', () => {
      const path = join(dir, 'shot.png');
      writeFileSync(path, 'png-bytes');

      expect(readImages([path])).toEqual([Buffer.from('png-bytes').toString('base64')]);
    });

    it('throws FileNotFoundError for a missing file', () => {
      expect(() => readImages([join(dir, 'missing.png')])).toThrow(FileNotFoundError);
    });

    it('rejects files that are not images', () => {
      const path = join(dir, 'notes.txt');
      writeFileSync(path, 'text');

      expect(() => readImages([path])).toThrow(CLIError);
    });
  });

  it('prints the answer and numbered sources', async () => {
    await runAsk(['When is week 3 due?']);

    expect(engine.answerWithTrace).toHaveBeenCalledWith({ question: 'When is week 3 due?' }, { topK: 7 });
    expect(lines).toContain('The deadline is Sunday.');
    expect(lines).toContain('[1] Week 3 deadline - https://forum.test/t/week-3/12/4');
    expect(process.exitCode).toBeUndefined();
  });

  it('passes --top-k and attached images to the engine', async () => {
    const path = join(dir, 'shot.jpg');
    writeFileSync(path, 'jpg-bytes');

    await runAsk(['What is this?', '-k', '3', '--image', path]);

    expect(engine.answerWithTrace).toHaveBeenCalledWith(
      { question: 'What is this?', images: [Buffer.from('jpg-bytes').toString('base64')] },
      { topK: 3 }
    );
  });

  it('prints JSON with the trace as metadata', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runAsk(['When is week 3 due?'], createContext(true));

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({
      question: 'When is week 3 due?',
      answer: 'The deadline is Sunday.',
      sources: [{ index: 1, title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' }],
      metadata: TRACE,
    });
  });

  it('prints the fallback answer and exits non-zero when generation failed', async () => {
    engine.answerWithTrace.mockResolvedValue({
      result: { answer: GENERATION_ERROR_ANSWER, sources: [] },
      trace: { ...TRACE, outcome: 'generate', error: 'model unavailable' },
    });

    await runAsk(['When is week 3 due?']);

    // Progress line, blank line, answer; no sources block
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe(GENERATION_ERROR_ANSWER);
    expect(process.exitCode).toBe(1);
  });

  it('shows packed passages with --context-only and never generates', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    engine.prepareContext.mockResolvedValue({
      passages: [
        { id: '12-4-0', score: 0.91, text: 'Moved to Sunday.', title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' },
      ],
      packed: {
        contextText: '--- Document from Week 3 deadline (Source: https://forum.test/t/week-3/12/4) ---\nMoved to Sunday.',
        citedSources: [{ title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' }],
        estimatedTokens: 120,
        droppedCount: 0,
      },
      model: 'gpt-3.5-turbo',
    });

    await runAsk(['When is week 3 due?', '--context-only'], createContext(true));

    expect(engine.answerWithTrace).not.toHaveBeenCalled();
    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({
      question: 'When is week 3 due?',
      model: 'gpt-3.5-turbo',
      estimatedTokens: 120,
      droppedCount: 0,
      passages: [
        {
          id: '12-4-0',
          score: 0.91,
          title: 'Week 3 deadline',
          url: 'https://forum.test/t/week-3/12/4',
          snippet: 'Moved to Sunday.',
        },
      ],
      sources: [{ index: 1, title: 'Week 3 deadline', url: 'https://forum.test/t/week-3/12/4' }],
    });
  });

  it('rejects an invalid --top-k before building the engine', async () => {
    await expect(runAsk(['q', '--top-k', '0'])).rejects.toThrow(CLIError);
    expect(createRAGEngine).not.toHaveBeenCalled();
  });
});
