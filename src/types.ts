import { z } from 'zod';
import type { ModuleTree, FixContext } from './core/tree.js';

// ─────────────────────────────────────────────────────────────
// Severity
// ─────────────────────────────────────────────────────────────

// Ordered: error is the most severe. A threshold of 'info' reports everything.
export const Severity = z.enum(['error', 'warning', 'info']);
export type Severity = z.infer<typeof Severity>;

export const SEVERITY_RANK: Record<Severity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

/**
 * True when `severity` is at or above the `min` threshold.
 */
export function isAtLeast(severity: Severity, min: Severity): boolean {
  return SEVERITY_RANK[severity] <= SEVERITY_RANK[min];
}

// ─────────────────────────────────────────────────────────────
// Issues & Rules
// ─────────────────────────────────────────────────────────────

export const Issue = z.object({
  ruleId: z.string(),
  message: z.string(),
  file: z.string(),
  line: z.number().int(),
  column: z.number().int(),
  severity: Severity,
});
export type Issue = Readonly<z.infer<typeof Issue>>;

export const FixResult = z.object({
  file: z.string(),
  ruleId: z.string(),
  fixed: z.boolean(),
  description: z.string(),
  error: z.string().optional(),
});
export type FixResult = z.infer<typeof FixResult>;

export interface Rule {
  /** Stable identifier, e.g. "WK8105" */
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  check(tree: ModuleTree): Issue[];
  fix?(context: FixContext): FixResult[];
}

// ─────────────────────────────────────────────────────────────
// Config Types
// ─────────────────────────────────────────────────────────────

export const LintConfig = z.object({
  disabledRules: z.array(z.string()).default([]),
  minSeverity: Severity.default('info'),
});
export type LintConfig = z.infer<typeof LintConfig>;

export const OutputFormat = z.enum(['text', 'json', 'github']);
export type OutputFormat = z.infer<typeof OutputFormat>;

export const KubeweaveConfig = z.object({
  version: z.string().default('1'),

  // Discovery
  include: z.array(z.string()).default(['**/*.ts']),
  exclude: z
    .array(z.string())
    .default(['**/node_modules/**', '**/dist/**', '**/*.d.ts', '**/*.test.ts', '**/*.spec.ts']),

  // Rule selection
  disabledRules: z.array(z.string()).default([]),
  minSeverity: Severity.default('info'),

  // Output
  format: OutputFormat.default('text'),
});
export type KubeweaveConfig = z.infer<typeof KubeweaveConfig>;

// ─────────────────────────────────────────────────────────────
// Run Result Types
// ─────────────────────────────────────────────────────────────

export interface FileFailure {
  file: string;
  error: string;
}

export interface LintResult {
  issues: Issue[];
  totalFiles: number;
  filesWithIssues: number;
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

export interface LintRun {
  issues: Issue[];
  files: string[];
  failures: FileFailure[];
}
