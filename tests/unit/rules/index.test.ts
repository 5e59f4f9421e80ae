import { describe, it, expect } from 'vitest';
import { builtinRules, createRegistry, fixableRules } from '../../../src/rules/index.js';
import { latestImageTag } from '../../../src/rules/container.js';

describe('rules/index', () => {
  it('should register every built-in rule once', () => {
    const ids = builtinRules().map((rule) => rule.id);

    expect(ids).toHaveLength(26);
    expect(new Set(ids).size).toBe(26);
    expect(ids[0]).toBe('WK8001');
    expect(ids[ids.length - 1]).toBe('WK8401');
  });

  it('should list the fixable rules', () => {
    expect(fixableRules()).toEqual(['WK8002', 'WK8105']);
  });

  it('should look rules up by id', () => {
    const registry = createRegistry();

    expect(registry.get('WK8105')?.severity).toBe('warning');
    expect(registry.get('WK9999')).toBeUndefined();
  });

  it('should drop disabled rules and ignore unknown ids', () => {
    const registry = createRegistry();
    const enabled = registry.enabled({ disabledRules: ['WK8001', 'WK9999'] });

    expect(enabled).toHaveLength(25);
    expect(enabled.some((rule) => rule.id === 'WK8001')).toBe(false);
  });

  it('should build a registry from a custom rule list', () => {
    const registry = createRegistry([latestImageTag]);

    expect(registry.all()).toEqual([latestImageTag]);
    expect(registry.fixableRuleIds()).toEqual([]);
  });
});
