// kubeweave - lint and fix Kubernetes resources declared in TypeScript

export * from './types.js';
export { KubeweaveError, ParseError, FixError, ConfigError } from './core/errors.js';
export {
  parseSource,
  buildModuleTree,
  walk,
  walkTree,
  childrenOf,
  ParsedFile,
} from './core/tree.js';
export type {
  ValueNode,
  RecordNode,
  ListNode,
  FieldNode,
  ModuleTree,
  Declaration,
  FixContext,
  Position,
  ValueVisitor,
} from './core/tree.js';
export * from './core/matchers.js';
export { FIELD_SCHEMA, fieldType } from './core/schema.js';
export { Linter, sortIssues, summarize } from './core/linter.js';
export type { LinterOptions } from './core/linter.js';
export { Fixer } from './core/fixer.js';
export type { FixOutcome, FixerOptions } from './core/fixer.js';
export { discoverFiles } from './core/discover.js';
export { loadConfig, saveConfig, toLintConfig, parseSeverity, parseDisabledRules } from './core/config.js';
export { createRegistry, builtinRules, allRules, fixableRules } from './rules/index.js';
export type { RuleRegistry } from './rules/index.js';
export { formatText, formatJson, formatGitHub, formatResult, summarizeByRule } from './output/formatters.js';
