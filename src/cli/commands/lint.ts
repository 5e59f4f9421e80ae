import * as p from '@clack/prompts';
import chalk from 'chalk';
import { resolve } from 'path';
import { OutputFormat, type FixResult, type LintConfig } from '../../types.js';
import { loadConfig, parseDisabledRules, parseSeverity, toLintConfig } from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';
import { Fixer } from '../../core/fixer.js';
import { Linter, defaultWarning, type LinterOptions } from '../../core/linter.js';
import { formatResult } from '../../output/formatters.js';

export interface LintOptions {
  format?: string;
  severity?: string;
  disable?: string;
  fix?: boolean;
}

function resolveFormat(value: string): OutputFormat {
  const parsed = OutputFormat.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Unknown format "${value}" (expected one of: ${OutputFormat.options.join(', ')})`);
  }
  return parsed.data;
}

function reportFixes(results: FixResult[]): void {
  const applied = results.filter((result) => result.fixed);
  const failed = results.filter((result) => !result.fixed && result.error);

  for (const result of applied) {
    p.log.success(`${chalk.dim(result.file)} ${result.description}`);
  }
  for (const result of failed) {
    p.log.error(`${result.file}: ${result.error}`);
  }
  p.log.info(`Applied ${applied.length} fix(es)${failed.length > 0 ? `, ${failed.length} failed` : ''}`);
}

/**
 * Lint (and optionally fix) a file or directory. Resolves to the exit code:
 * 1 when errors remain, 0 otherwise.
 */
export async function lintCommand(
  target: string | undefined,
  options: LintOptions,
  cwd: string = process.cwd()
): Promise<number> {
  const config = loadConfig(cwd);
  const format = resolveFormat(options.format ?? config.format);
  const quiet = format !== 'text';

  const base = toLintConfig(config);
  const lintConfig: LintConfig = {
    disabledRules: [...base.disabledRules, ...parseDisabledRules(options.disable)],
    minSeverity: options.severity ? parseSeverity(options.severity) : base.minSeverity,
  };

  const runOptions: LinterOptions = {
    discover: { include: config.include, exclude: config.exclude },
    onProgress: quiet ? undefined : (message) => p.log.step(message),
    onWarning: quiet ? defaultWarning : (message) => p.log.warn(message),
  };

  const path = resolve(cwd, target ?? '.');

  if (!quiet) {
    p.intro(chalk.cyan('kubeweave') + chalk.dim(options.fix ? ' - lint & fix' : ' - lint'));
  }

  if (options.fix) {
    const results = await new Fixer(lintConfig, runOptions).fixPath(path);
    if (!quiet) reportFixes(results);
  }

  const result = await new Linter(lintConfig, runOptions).lintWithResult(path);
  process.stdout.write(formatResult(result, format));

  if (!quiet) {
    p.outro(
      result.errorCount > 0
        ? chalk.red(`${result.errorCount} error(s) in ${result.totalFiles} file(s)`)
        : chalk.green(`Checked ${result.totalFiles} file(s)`)
    );
  }

  return result.errorCount > 0 ? 1 : 0;
}
