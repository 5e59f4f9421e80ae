/**
 * Linter - runs the enabled rules over parsed files
 *
 * Analysis is pure per file, so directories are processed in parallel batches
 * sized to the machine and merged once each batch settles. A file that does not
 * parse is reported and skipped; the rest of the run carries on.
 */

import { readFile, stat } from 'fs/promises';
import { availableParallelism } from 'os';
import { resolve } from 'path';
import chalk from 'chalk';
import {
  isAtLeast,
  LintConfig,
  type FileFailure,
  type Issue,
  type LintResult,
  type LintRun,
  type Rule,
} from '../types.js';
import { createRegistry, type RuleRegistry } from '../rules/index.js';
import { discoverFiles, type DiscoverOptions } from './discover.js';
import { KubeweaveError, errorMessage } from './errors.js';
import { parseSource, type ParsedFile } from './tree.js';

export interface LinterOptions {
  registry?: RuleRegistry;
  discover?: DiscoverOptions;
  /** Files processed concurrently; defaults to the available parallelism */
  concurrency?: number;
  onProgress?: (message: string) => void;
  onWarning?: (message: string) => void;
}

export function defaultWarning(message: string): void {
  console.error(chalk.yellow('Warning:'), message);
}

export function sortIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort(
    (a, b) => a.file.localeCompare(b.file) || a.line - b.line || a.column - b.column
  );
}

/**
 * Run `task` over `items` in batches of `size`, keeping the settled results in order.
 */
export async function inBatches<T, R>(
  items: readonly T[],
  size: number,
  task: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const settled: PromiseSettledResult<R>[] = [];
  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    settled.push(...(await Promise.allSettled(batch.map(task))));
  }
  return settled;
}

export class Linter {
  readonly config: LintConfig;
  readonly registry: RuleRegistry;
  private readonly rules: readonly Rule[];
  private readonly options: LinterOptions;

  constructor(config: Partial<LintConfig> = {}, options: LinterOptions = {}) {
    this.config = LintConfig.parse(config);
    this.registry = options.registry ?? createRegistry();
    this.rules = this.registry.enabled(this.config);
    this.options = options;
  }

  get enabledRules(): readonly Rule[] {
    return this.rules;
  }

  /**
   * Issues of every enabled rule at or above the severity threshold.
   * Order follows the rules, not the source.
   */
  checkFile(parsed: ParsedFile): Issue[] {
    const tree = parsed.tree;
    const issues: Issue[] = [];
    for (const rule of this.rules) {
      issues.push(...rule.check(tree));
    }
    return issues.filter((issue) => isAtLeast(issue.severity, this.config.minSeverity));
  }

  lintSource(path: string, text: string): Issue[] {
    return this.checkFile(parseSource(path, text));
  }

  async lintFile(path: string): Promise<Issue[]> {
    const text = await readFile(path, 'utf-8');
    return this.lintSource(path, text);
  }

  /**
   * Lint a file or every matching file under a directory.
   */
  async lint(target: string): Promise<LintRun> {
    const root = resolve(target);
    const info = await stat(root).catch((error: unknown) => {
      throw new KubeweaveError(`Path not found: ${target} (${errorMessage(error)})`, 'PATH_NOT_FOUND', target);
    });

    const files = info.isDirectory() ? await discoverFiles(root, this.options.discover) : [root];
    this.report(`Linting ${files.length} file(s) with ${this.rules.length} rule(s)`);

    const issues: Issue[] = [];
    const failures: FileFailure[] = [];
    const size = Math.max(1, this.options.concurrency ?? availableParallelism());

    const settled = await inBatches(files, size, (file) => this.lintFile(file));
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        issues.push(...result.value);
        return;
      }
      const failure = { file: files[index], error: errorMessage(result.reason) };
      failures.push(failure);
      this.warn(`Skipping ${failure.file}: ${failure.error}`);
    });

    return { issues, files, failures };
  }

  async lintWithResult(target: string): Promise<LintResult> {
    const run = await this.lint(target);
    return summarize(run);
  }

  private report(message: string): void {
    this.options.onProgress?.(message);
  }

  private warn(message: string): void {
    (this.options.onWarning ?? defaultWarning)(message);
  }
}

/**
 * Counts of a run. Issues come back sorted by file and line.
 */
export function summarize(run: LintRun): LintResult {
  const issues = sortIssues(run.issues);
  return {
    issues,
    totalFiles: run.files.length,
    filesWithIssues: new Set(issues.map((issue) => issue.file)).size,
    errorCount: issues.filter((issue) => issue.severity === 'error').length,
    warningCount: issues.filter((issue) => issue.severity === 'warning').length,
    infoCount: issues.filter((issue) => issue.severity === 'info').length,
  };
}
