/**
 * Report Formatters
 *
 * Plain text for terminals, JSON for tooling, and workflow-command annotations
 * for CI. Each returns the full report as a string ending in a newline.
 */

import type { Issue, LintResult, OutputFormat, Rule, Severity } from '../types.js';
import { sortIssues } from '../core/linter.js';

const GITHUB_LEVEL: Record<Severity, string> = {
  error: 'error',
  warning: 'warning',
  info: 'notice',
};

function summaryHeader(result: LintResult): string {
  return `Found ${result.issues.length} issue(s) in ${result.filesWithIssues} file(s)`;
}

export function formatText(result: LintResult): string {
  if (result.issues.length === 0) {
    return 'No issues found.\n';
  }

  const lines = sortIssues(result.issues).map(
    (issue) => `${issue.file}:${issue.line}:${issue.column}: ${issue.severity} [${issue.ruleId}] ${issue.message}`
  );

  lines.push('', `${summaryHeader(result)}:`);
  if (result.errorCount > 0) lines.push(`  - ${result.errorCount} error(s)`);
  if (result.warningCount > 0) lines.push(`  - ${result.warningCount} warning(s)`);
  if (result.infoCount > 0) lines.push(`  - ${result.infoCount} info`);

  return lines.join('\n') + '\n';
}

export function formatJson(result: LintResult): string {
  const output = {
    issues: sortIssues(result.issues).map((issue) => ({
      rule: issue.ruleId,
      message: issue.message,
      file: issue.file,
      line: issue.line,
      column: issue.column,
      severity: issue.severity,
    })),
    total_files: result.totalFiles,
    files_with_issues: result.filesWithIssues,
    error_count: result.errorCount,
    warning_count: result.warningCount,
    info_count: result.infoCount,
  };
  return JSON.stringify(output, null, 2) + '\n';
}

export function formatGitHub(result: LintResult): string {
  if (result.issues.length === 0) {
    return 'No issues found.\n';
  }

  const lines = sortIssues(result.issues).map(
    (issue) =>
      `::${GITHUB_LEVEL[issue.severity]} file=${issue.file},line=${issue.line},col=${issue.column},title=${issue.ruleId}::${issue.message}`
  );
  lines.push('', summaryHeader(result));
  return lines.join('\n') + '\n';
}

export function formatResult(result: LintResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(result);
    case 'github':
      return formatGitHub(result);
    case 'text':
      return formatText(result);
  }
}

export interface RuleSummary {
  ruleId: string;
  count: number;
  severity: Severity | undefined;
  description: string;
}

/**
 * Issue counts per rule, sorted by rule ID.
 */
export function summarizeByRule(issues: readonly Issue[], rules: readonly Rule[]): RuleSummary[] {
  const byId = new Map(rules.map((rule): [string, Rule] => [rule.id, rule]));
  const counts = new Map<string, number>();
  for (const issue of issues) {
    counts.set(issue.ruleId, (counts.get(issue.ruleId) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([ruleId, count]) => ({
      ruleId,
      count,
      severity: byId.get(ruleId)?.severity,
      description: byId.get(ruleId)?.description ?? '',
    }))
    .sort((a, b) => a.ruleId.localeCompare(b.ruleId));
}
