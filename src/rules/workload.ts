/**
 * Workload wiring: selectors and labels.
 */

import type { Issue, Rule } from '../types.js';
import type { ModuleTree } from '../core/tree.js';
import { createIssue, recordsOfKind } from './helpers.js';
import {
  LABELLED_KINDS,
  WORKLOAD_KINDS,
  fieldValue,
  mapLiteral,
  nestedRecord,
  typeNameOf,
  valueAtPath,
} from '../core/matchers.js';

export const selectorMismatch: Rule = {
  id: 'WK8101',
  name: 'selector-label-mismatch',
  description: 'Workload selector labels must match template labels',
  severity: 'error',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];

    for (const workload of recordsOfKind(tree, WORKLOAD_KINDS)) {
      const selector = mapLiteral(valueAtPath(workload, ['spec', 'selector', 'matchLabels']));
      const template = mapLiteral(valueAtPath(workload, ['spec', 'template', 'metadata', 'labels']));
      if (selector.size === 0 || template.size === 0) continue;

      for (const [key, selectorValue] of selector) {
        const templateValue = template.get(key);
        if (templateValue === undefined) {
          issues.push(
            createIssue(this, tree, workload.position, `Selector label "${key}" not found in template labels`)
          );
        } else if (templateValue !== selectorValue) {
          issues.push(
            createIssue(
              this,
              tree,
              workload.position,
              `Selector label "${key}" has value "${selectorValue}" but template has "${templateValue}"`
            )
          );
        }
      }
    }

    return issues;
  },
};

export const missingLabels: Rule = {
  id: 'WK8102',
  name: 'missing-labels',
  description: 'Resources should have metadata labels',
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];

    for (const resource of recordsOfKind(tree, LABELLED_KINDS)) {
      const labels = fieldValue(fieldValue(resource, 'metadata'), 'labels');
      // A computed label map counts as set
      const hasLabels = labels !== undefined && (!nestedRecord(labels) || mapLiteral(labels).size > 0);
      if (hasLabels) continue;

      issues.push(
        createIssue(
          this,
          tree,
          resource.position,
          `${typeNameOf(resource) ?? 'Resource'} should have metadata labels for better organization`
        )
      );
    }

    return issues;
  },
};
