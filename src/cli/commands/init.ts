import * as p from '@clack/prompts';
import chalk from 'chalk';
import { existsSync } from 'fs';
import { relative } from 'path';
import { KubeweaveConfig } from '../../types.js';
import { configPath, saveConfig } from '../../core/config.js';

export interface InitOptions {
  force?: boolean;
}

/**
 * Write a default `.kubeweave/config.yml`.
 */
export function initCommand(options: InitOptions, cwd: string = process.cwd()): number {
  const path = configPath(cwd);

  if (existsSync(path) && !options.force) {
    p.log.error('kubeweave is already initialized in this directory.');
    p.log.info('Use --force to overwrite the existing config.');
    return 1;
  }

  p.intro(chalk.cyan('kubeweave') + chalk.dim(' - initialization'));
  saveConfig(cwd, KubeweaveConfig.parse({}));
  p.log.success(`Wrote ${relative(cwd, path)}`);
  p.outro('Run "kubeweave lint" to check your resources.');
  return 0;
}
