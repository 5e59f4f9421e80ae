import { describe, it, expect } from 'vitest';
import {
  formatGitHub,
  formatJson,
  formatResult,
  formatText,
  summarizeByRule,
} from '../../../src/output/formatters.js';
import { allRules } from '../../../src/rules/index.js';
import type { Issue, LintResult } from '../../../src/types.js';

const ISSUES: Issue[] = [
  {
    ruleId: 'WK8105',
    message: 'Container with image "nginx:1.21" should have explicit imagePullPolicy',
    file: 'b.ts',
    line: 3,
    column: 7,
    severity: 'warning',
  },
  {
    ruleId: 'WK8006',
    message: 'Image "nginx" uses :latest tag or no tag (defaults to :latest), specify a version tag',
    file: 'a.ts',
    line: 5,
    column: 9,
    severity: 'error',
  },
];

const RESULT: LintResult = {
  issues: ISSUES,
  totalFiles: 4,
  filesWithIssues: 2,
  errorCount: 1,
  warningCount: 1,
  infoCount: 0,
};

const EMPTY: LintResult = {
  issues: [],
  totalFiles: 4,
  filesWithIssues: 0,
  errorCount: 0,
  warningCount: 0,
  infoCount: 0,
};

describe('output/formatters', () => {
  describe('formatText', () => {
    it('should list sorted issues and a summary', () => {
      expect(formatText(RESULT)).toBe(
        [
          'a.ts:5:9: error [WK8006] Image "nginx" uses :latest tag or no tag (defaults to :latest), specify a version tag',
          'b.ts:3:7: warning [WK8105] Container with image "nginx:1.21" should have explicit imagePullPolicy',
          '',
          'Found 2 issue(s) in 2 file(s):',
          '  - 1 error(s)',
          '  - 1 warning(s)',
          '',
        ].join('\n')
      );
    });

    it('should say so when there is nothing to report', () => {
      expect(formatText(EMPTY)).toBe('No issues found.\n');
    });
  });

  describe('formatJson', () => {
    it('should emit issues and counts', () => {
      const parsed: unknown = JSON.parse(formatJson(RESULT));

      expect(parsed).toEqual({
        issues: [
          {
            rule: 'WK8006',
            message: 'Image "nginx" uses :latest tag or no tag (defaults to :latest), specify a version tag',
            file: 'a.ts',
            line: 5,
            column: 9,
            severity: 'error',
          },
          {
            rule: 'WK8105',
            message: 'Container with image "nginx:1.21" should have explicit imagePullPolicy',
            file: 'b.ts',
            line: 3,
            column: 7,
            severity: 'warning',
          },
        ],
        total_files: 4,
        files_with_issues: 2,
        error_count: 1,
        warning_count: 1,
        info_count: 0,
      });
    });

    it('should emit an empty issue list', () => {
      expect(formatJson(EMPTY)).toContain('"issues": []');
    });
  });

  describe('formatGitHub', () => {
    it('should emit workflow annotations', () => {
      const lines = formatGitHub(RESULT).split('\n');

      expect(lines[0]).toBe(
        '::error file=a.ts,line=5,col=9,title=WK8006::Image "nginx" uses :latest tag or no tag (defaults to :latest), specify a version tag'
      );
      expect(lines[1]).toBe(
        '::warning file=b.ts,line=3,col=7,title=WK8105::Container with image "nginx:1.21" should have explicit imagePullPolicy'
      );
      expect(lines.slice(2)).toEqual(['', 'Found 2 issue(s) in 2 file(s)', '']);
    });

    it('should map info to notice', () => {
      const info: LintResult = {
        ...EMPTY,
        issues: [{ ...ISSUES[0], severity: 'info' }],
        filesWithIssues: 1,
        infoCount: 1,
      };
      expect(formatGitHub(info).startsWith('::notice file=b.ts')).toBe(true);
    });
  });

  describe('formatResult', () => {
    it('should dispatch on the format', () => {
      expect(formatResult(RESULT, 'text')).toBe(formatText(RESULT));
      expect(formatResult(RESULT, 'json')).toBe(formatJson(RESULT));
      expect(formatResult(RESULT, 'github')).toBe(formatGitHub(RESULT));
    });
  });

  describe('summarizeByRule', () => {
    it('should count issues per rule in id order', () => {
      const summary = summarizeByRule([...ISSUES, ISSUES[0]], allRules());

      expect(summary.map(({ ruleId, count, severity }) => ({ ruleId, count, severity }))).toEqual([
        { ruleId: 'WK8006', count: 1, severity: 'error' },
        { ruleId: 'WK8105', count: 2, severity: 'warning' },
      ]);
      expect(summary[1].description).toBe('Containers should set imagePullPolicy explicitly');
    });
  });
});
