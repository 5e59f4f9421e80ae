import { describe, it, expect } from 'vitest';
import { duplicateNames, resourceIdentity } from '../../../src/rules/naming.js';
import { parseSource } from '../../../src/core/tree.js';
import { check } from '../../helpers.js';

describe('rules/naming', () => {
  describe('resourceIdentity', () => {
    it('should default the namespace', () => {
      const tree = parseSource('resources.ts', 'const a = new core.Pod({ metadata: { name: "api" } });').tree;
      expect(resourceIdentity(tree.declarations[0])).toEqual({ namespace: 'default', name: 'api' });
    });

    it('should return undefined without a literal name', () => {
      const tree = parseSource('resources.ts', 'const a = new core.Pod({ metadata: { name: appName } });').tree;
      expect(resourceIdentity(tree.declarations[0])).toBeUndefined();
    });
  });

  describe('WK8003 duplicate-resource-names', () => {
    it('should flag the second declaration with the same name and namespace', () => {
      const source = `export const first = new core.Pod({ metadata: { name: "my-app" } });
export const second = new core.Service({ metadata: { name: "my-app", namespace: "default" } });
`;
      expect(check(duplicateNames, source)).toEqual([
        {
          ruleId: 'WK8003',
          message: 'Duplicate resource name "my-app" in namespace "default", already declared as first at line 1',
          file: 'resources.ts',
          line: 2,
          column: 14,
          severity: 'error',
        },
      ]);
    });

    it('should accept the same name in different namespaces', () => {
      const source = `export const a = new core.Pod({ metadata: { name: "my-app", namespace: "team-a" } });
export const b = new core.Pod({ metadata: { name: "my-app", namespace: "team-b" } });
`;
      expect(check(duplicateNames, source)).toEqual([]);
    });
  });
});
