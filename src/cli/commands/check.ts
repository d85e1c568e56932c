/**
 * Check Command
 *
 * Pre-flight check before `fta ask` / `fta serve`:
 *   fta check           - Show check results
 *   fta check --json    - Output as JSON
 *
 * Checks performed:
 * 1. Config file loads and validates
 * 2. OPENAI_API_KEY is set (and well-formed for api.openai.com)
 * 3. PINECONE_API_KEY is set when the Pinecone backend is selected
 * 4. The local SQLite index exists and holds passages (sqlite backend)
 *
 * Nothing here calls a remote API.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import type { CommandContext } from '../types.js';
import { loadConfig, resolveIndexPath } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { Config } from '../../config/schema.js';
import { validateOpenAIKey, validatePineconeKey } from '../../providers/validation.js';
import { SqliteVectorIndex } from '../../search/sqlite-store.js';
import { errorMessage } from '../../utils/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckIssue {
  severity: 'error' | 'warning';
  message: string;
  hint: string;
}

export interface CheckReport {
  ready: boolean;
  configPath: string;
  backend: Config['index']['backend'] | null;
  textModel: string | null;
  visionModel: string | null;
  /** Stored passages (sqlite backend only) */
  passageCount: number | null;
  issues: CheckIssue[];
}

// ============================================================================
// Checks
// ============================================================================

/**
 * Count passages in the local index without creating the file.
 */
async function countLocalPassages(config: Config, issues: CheckIssue[]): Promise<number | null> {
  const path = resolveIndexPath(config);
  if (!existsSync(path)) {
    issues.push({
      severity: 'error',
      message: `Local index not found: ${path}`,
      hint: 'Run: fta index <dir>  to index scraped topics',
    });
    return null;
  }

  try {
    const index = SqliteVectorIndex.open(path, { embeddingModel: config.embedding.model });
    const count = await index.count();
    if (count === 0) {
      issues.push({
        severity: 'error',
        message: 'Local index holds no passages',
        hint: 'Run: fta index <dir>  to index scraped topics',
      });
    }
    return count;
  } catch (error) {
    issues.push({
      severity: 'error',
      message: `Local index could not be opened: ${errorMessage(error)}`,
      hint: 'Delete the file and re-run fta index, or set index.sqlite_path',
    });
    return null;
  }
}

/**
 * Run every check. `load` is injectable for tests.
 */
export async function runChecks(load: () => Config = () => loadConfig(false)): Promise<CheckReport> {
  const issues: CheckIssue[] = [];

  let config: Config | null = null;
  try {
    config = load();
  } catch (error) {
    issues.push({
      severity: 'error',
      message: errorMessage(error),
      hint: `Fix ${getConfigPath()} or run: fta config reset --force`,
    });
  }

  const openai = validateOpenAIKey(config?.llm.base_url);
  if (!openai.valid) {
    issues.push({ severity: 'error', message: openai.error, hint: 'Set OPENAI_API_KEY in the environment or a .env file' });
  }

  let passageCount: number | null = null;
  if (config?.index.backend === 'pinecone') {
    const pinecone = validatePineconeKey();
    if (!pinecone.valid) {
      issues.push({
        severity: 'error',
        message: pinecone.error,
        hint: 'Set PINECONE_API_KEY, or run: fta config set index.backend sqlite',
      });
    }
  } else if (config?.index.backend === 'sqlite') {
    passageCount = await countLocalPassages(config, issues);
  }

  if (config && config.llm.temperature > 1) {
    issues.push({
      severity: 'warning',
      message: `llm.temperature is ${config.llm.temperature}; answers may drift from the forum context`,
      hint: 'Run: fta config set llm.temperature 0.7',
    });
  }

  return {
    ready: !issues.some((issue) => issue.severity === 'error'),
    configPath: getConfigPath(),
    backend: config?.index.backend ?? null,
    textModel: config?.llm.text_model ?? null,
    visionModel: config?.llm.vision_model ?? null,
    passageCount,
    issues,
  };
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the check command
 */
export function createCheckCommand(getContext: () => CommandContext): Command {
  return new Command('check')
    .description('Check configuration, API keys and index readiness')
    .action(async () => {
      const ctx = getContext();
      const report = await runChecks();

      if (!report.ready) {
        process.exitCode = 1;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      const lines: string[] = [];

      lines.push(chalk.bold('forum-ta') + (report.ready ? chalk.green(' (ready)') : chalk.red(' (not ready)')));
      lines.push(chalk.dim('─'.repeat(40)));
      lines.push(`${chalk.cyan('Config:')}      ${report.configPath}`);
      lines.push(`${chalk.cyan('Backend:')}     ${report.backend ?? 'unknown'}`);
      lines.push(`${chalk.cyan('Models:')}      ${report.textModel ?? '?'} / ${report.visionModel ?? '?'} (images)`);
      if (report.passageCount !== null) {
        lines.push(`${chalk.cyan('Passages:')}    ${report.passageCount.toLocaleString()}`);
      }

      if (report.issues.length > 0) {
        lines.push('');
        lines.push(chalk.bold('Issues:'));
        for (const issue of report.issues) {
          const icon = issue.severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
          lines.push(`  ${icon} ${issue.message}`);
          lines.push(chalk.dim(`    ${issue.hint}`));
        }
      } else {
        lines.push('');
        lines.push(chalk.green('No issues found. Ready to answer questions.'));
      }

      ctx.log(lines.join('\n'));
    });
}
