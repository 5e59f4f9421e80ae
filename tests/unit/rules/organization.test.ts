import { describe, it, expect } from 'vitest';
import { countResources, fileSizeLimit } from '../../../src/rules/organization.js';
import { parseSource } from '../../../src/core/tree.js';
import { check } from '../../helpers.js';

function configMaps(count: number): string {
  return Array.from(
    { length: count },
    (_, i) => `export const cm${i} = new core.ConfigMap({ metadata: { name: "cm-${i}" } });`
  ).join('\n');
}

describe('rules/organization', () => {
  it('should count only declarations of resource kinds', () => {
    const source = `${configMaps(2)}
const labels = { app: "web" };
const probe = new core.Probe({ periodSeconds: 10 });
`;
    expect(countResources(parseSource('resources.ts', source).tree)).toBe(2);
  });

  it('should flag a file with more than 20 resources at its first line', () => {
    expect(check(fileSizeLimit, configMaps(21))).toEqual([
      {
        ruleId: 'WK8401',
        message: 'File contains 21 resources (max 20), consider splitting into smaller files',
        file: 'resources.ts',
        line: 1,
        column: 1,
        severity: 'warning',
      },
    ]);
  });

  it('should accept exactly 20 resources', () => {
    expect(check(fileSizeLimit, configMaps(20))).toEqual([]);
  });
});
