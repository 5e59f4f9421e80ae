/**
 * Fixer - applies the fix passes of enabled rules
 *
 * A fix pass owns its file from parse to write: the parsed tree is taken over,
 * each fixable rule runs against a tree rebuilt from the current source, and the
 * file is written back only when a pass changed something.
 */

import { readFile, writeFile } from 'fs/promises';
import { availableParallelism } from 'os';
import { LintConfig, type FixResult, type Rule } from '../types.js';
import { createRegistry, type RuleRegistry } from '../rules/index.js';
import { errorMessage } from './errors.js';
import { Linter, inBatches, type LinterOptions } from './linter.js';
import { buildModuleTree, parseSource, type ParsedFile } from './tree.js';

export type FixerOptions = LinterOptions;

export interface FixOutcome {
  results: FixResult[];
  /** Source after all passes; the original text when nothing changed */
  text: string;
  changed: boolean;
}

function failure(file: string, ruleId: string, error: unknown): FixResult {
  return {
    file,
    ruleId,
    fixed: false,
    description: ruleId ? `Fix for ${ruleId} failed` : 'Fix failed',
    error: errorMessage(error),
  };
}

export class Fixer {
  readonly config: LintConfig;
  readonly registry: RuleRegistry;
  private readonly rules: readonly Rule[];
  private readonly options: FixerOptions;

  constructor(config: Partial<LintConfig> = {}, options: FixerOptions = {}) {
    this.config = LintConfig.parse(config);
    this.registry = options.registry ?? createRegistry();
    this.rules = this.registry.enabled(this.config).filter((rule) => rule.fix !== undefined);
    this.options = options;
  }

  /**
   * Run every fix pass over a parsed file. The file is consumed.
   */
  fixParsedFile(parsed: ParsedFile): FixOutcome {
    const sourceFile = parsed.take();
    const results: FixResult[] = [];

    for (const rule of this.rules) {
      if (!rule.fix) continue;
      const before = sourceFile.getFullText();
      try {
        const tree = buildModuleTree(parsed.path, sourceFile);
        results.push(...rule.fix({ path: parsed.path, sourceFile, tree }));
      } catch (error) {
        // Drop whatever the failed pass had already edited
        sourceFile.replaceText([0, sourceFile.getEnd()], before);
        results.push(failure(parsed.path, rule.id, error));
      }
    }

    const text = sourceFile.getFullText();
    const changed = results.some((result) => result.fixed) && text !== parsed.originalText;
    return { results, text: changed ? text : parsed.originalText, changed };
  }

  fixSource(path: string, text: string): FixOutcome {
    return this.fixParsedFile(parseSource(path, text));
  }

  /**
   * Fix one file in place. Read, parse and write failures come back as results.
   */
  async fixFile(path: string): Promise<FixResult[]> {
    try {
      const outcome = this.fixSource(path, await readFile(path, 'utf-8'));
      if (outcome.changed) {
        await writeFile(path, outcome.text, 'utf-8');
      }
      return outcome.results;
    } catch (error) {
      return [failure(path, '', error)];
    }
  }

  /**
   * Lint `target`, then fix only the files reporting issues from fixable rules.
   */
  async fixPath(target: string): Promise<FixResult[]> {
    const linter = new Linter(this.config, this.options);
    const run = await linter.lint(target);

    const fixable = new Set(this.rules.map((rule) => rule.id));
    const files = [...new Set(run.issues.filter((issue) => fixable.has(issue.ruleId)).map((issue) => issue.file))].sort();

    this.options.onProgress?.(`Fixing ${files.length} file(s)`);

    const size = Math.max(1, this.options.concurrency ?? availableParallelism());
    const settled = await inBatches(files, size, (file) => this.fixFile(file));

    return settled.flatMap((result, index) =>
      result.status === 'fulfilled' ? result.value : [failure(files[index], '', result.reason)]
    );
  }
}
