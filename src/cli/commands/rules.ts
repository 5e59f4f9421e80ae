import chalk from 'chalk';
import type { Severity } from '../../types.js';
import { createRegistry, type RuleRegistry } from '../../rules/index.js';

export interface RulesOptions {
  json?: boolean;
}

const SEVERITY_COLOR: Record<Severity, (text: string) => string> = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
};

export function rulesCommand(options: RulesOptions, registry: RuleRegistry = createRegistry()): number {
  const fixable = new Set(registry.fixableRuleIds());
  const rules = registry.all().map((rule) => ({
    id: rule.id,
    name: rule.name,
    description: rule.description,
    severity: rule.severity,
    fixable: fixable.has(rule.id),
  }));

  if (options.json) {
    process.stdout.write(JSON.stringify(rules, null, 2) + '\n');
    return 0;
  }

  for (const rule of rules) {
    const tag = rule.fixable ? chalk.green(' (fixable)') : '';
    console.log(`${chalk.bold(rule.id)}  ${SEVERITY_COLOR[rule.severity](rule.severity.padEnd(7))}  ${rule.name}${tag}`);
    console.log(chalk.dim(`         ${rule.description}`));
  }
  console.log();
  console.log(chalk.dim(`${rules.length} rules, ${fixable.size} fixable`));
  return 0;
}
