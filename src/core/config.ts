import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import YAML from 'yaml';
import { KubeweaveConfig, Severity, type LintConfig } from '../types.js';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_DIR = '.kubeweave';
export const CONFIG_FILE = 'config.yml';

export function configPath(cwd: string): string {
  return join(cwd, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Project configuration; defaults when no config file exists.
 */
export function loadConfig(cwd: string = process.cwd()): KubeweaveConfig {
  const path = configPath(cwd);
  if (!existsSync(path)) {
    return KubeweaveConfig.parse({});
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(path, 'utf-8')) ?? {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}: ${errorMessage(error)}`, path);
  }

  const parsed = KubeweaveConfig.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${path}: ${details}`, path);
  }
  return parsed.data;
}

export function saveConfig(cwd: string, config: KubeweaveConfig): string {
  const dir = join(cwd, CONFIG_DIR);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const path = configPath(cwd);
  writeFileSync(path, YAML.stringify(config), 'utf-8');
  return path;
}

export function toLintConfig(config: KubeweaveConfig): LintConfig {
  return {
    disabledRules: [...config.disabledRules],
    minSeverity: config.minSeverity,
  };
}

export function parseSeverity(text: string): Severity {
  const parsed = Severity.safeParse(text.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`Unknown severity "${text}" (expected one of: ${Severity.options.join(', ')})`);
  }
  return parsed.data;
}

/**
 * Rule IDs from a comma-separated list. Unknown IDs are kept; disabling them does nothing.
 */
export function parseDisabledRules(csv: string | undefined): string[] {
  if (!csv) return [];
  return csv
    .split(',')
    .map((id) => id.trim().toUpperCase())
    .filter((id) => id.length > 0);
}
