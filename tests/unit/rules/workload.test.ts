import { describe, it, expect } from 'vitest';
import { missingLabels, selectorMismatch } from '../../../src/rules/workload.js';
import { check } from '../../helpers.js';

function deployment(selector: string, templateLabels: string): string {
  return `export const web = new apps.Deployment({
  metadata: { name: "web", labels: { app: "web" } },
  spec: {
    selector: { matchLabels: ${selector} },
    template: { metadata: { labels: ${templateLabels} }, spec: { containers: [] } },
  },
});
`;
}

describe('rules/workload', () => {
  describe('WK8101 selector-label-mismatch', () => {
    it('should report differing and missing selector labels', () => {
      const source = deployment('{ app: "web", tier: "frontend" }', '{ app: "api" }');

      const issues = check(selectorMismatch, source);

      expect(issues.map((issue) => issue.message)).toEqual([
        'Selector label "app" has value "web" but template has "api"',
        'Selector label "tier" not found in template labels',
      ]);
      expect(issues[0]).toMatchObject({ line: 1, column: 20, severity: 'error' });
    });

    it('should accept a selector contained in the template labels', () => {
      expect(check(selectorMismatch, deployment('{ app: "web" }', '{ app: "web", tier: "frontend" }'))).toEqual([]);
    });

    it('should skip workloads whose labels are not literals', () => {
      expect(check(selectorMismatch, deployment('{ app: "web" }', 'podLabels'))).toEqual([]);
    });
  });

  describe('WK8102 missing-labels', () => {
    it('should flag labelled kinds without labels', () => {
      const source = 'export const settings = new core.ConfigMap({ metadata: { name: "settings" } });\n';

      expect(check(missingLabels, source)).toEqual([
        {
          ruleId: 'WK8102',
          message: 'ConfigMap should have metadata labels for better organization',
          file: 'resources.ts',
          line: 1,
          column: 25,
          severity: 'warning',
        },
      ]);
    });

    it('should flag an empty label map', () => {
      const source = 'export const secret = new core.Secret({ metadata: { name: "db", labels: {} } });\n';
      expect(check(missingLabels, source)).toHaveLength(1);
    });

    it('should accept literal or computed labels', () => {
      const source = `export const a = new core.ConfigMap({ metadata: { name: "a", labels: { app: "a" } } });
export const b = new core.ConfigMap({ metadata: { name: "b", labels: sharedLabels } });
`;
      expect(check(missingLabels, source)).toEqual([]);
    });

    it('should flag a label literal whose values are all computed', () => {
      const source = 'export const c = new core.ConfigMap({ metadata: { name: "c", labels: { app } } });\n';
      expect(check(missingLabels, source)).toHaveLength(1);
    });

    it('should ignore kinds that are not labelled', () => {
      const source = 'export const ns = new core.Namespace({ metadata: { name: "apps" } });\n';
      expect(check(missingLabels, source)).toEqual([]);
    });
  });
});
