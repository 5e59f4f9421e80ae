#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import * as p from '@clack/prompts';
import { lintCommand, type LintOptions } from './commands/lint.js';
import { rulesCommand, type RulesOptions } from './commands/rules.js';
import { initCommand, type InitOptions } from './commands/init.js';
import { errorMessage } from '../core/errors.js';

const program = new Command();

program
  .name('kubeweave')
  .description('Lint and fix Kubernetes resources declared in TypeScript')
  .version('0.1.0');

function exitWith(code: number): void {
  process.exitCode = code;
}

function fail(error: unknown): void {
  p.log.error(chalk.red(errorMessage(error)));
  process.exitCode = 1;
}

// ─────────────────────────────────────────────────────────────
// lint - Report (and optionally fix) policy violations
// ─────────────────────────────────────────────────────────────
program
  .command('lint [path]')
  .description('Lint a file or directory of resource declarations')
  .option('-f, --format <format>', 'Output format (text, json, github)')
  .option('-s, --severity <level>', 'Minimum severity to report (error, warning, info)')
  .option('-d, --disable <ids>', 'Comma-separated rule IDs to disable')
  .option('--fix', 'Apply automatic fixes before reporting')
  .action((path: string | undefined, options: LintOptions) => lintCommand(path, options).then(exitWith, fail));

// ─────────────────────────────────────────────────────────────
// rules - List the rule catalog
// ─────────────────────────────────────────────────────────────
program
  .command('rules')
  .description('List available rules')
  .option('--json', 'Output as JSON')
  .action((options: RulesOptions) => exitWith(rulesCommand(options)));

// ─────────────────────────────────────────────────────────────
// init - Write a default config
// ─────────────────────────────────────────────────────────────
program
  .command('init')
  .description('Create .kubeweave/config.yml with default settings')
  .option('--force', 'Overwrite an existing config')
  .action((options: InitOptions) => {
    try {
      exitWith(initCommand(options));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
