/**
 * High-availability heuristics for Deployments.
 *
 * These are info-level: replica counts and disruption budgets need operational
 * judgment, so the rules only point at the gap.
 */

import type { Issue, Rule } from '../types.js';
import type { ModuleTree, RecordNode } from '../core/tree.js';
import { createIssue, recordsOfKind } from './helpers.js';
import { followPath, intLiteral, mapLiteral, valueAtPath } from '../core/matchers.js';

const DEPLOYMENT = new Set(['Deployment']);
const PDB = new Set(['PodDisruptionBudget']);

/**
 * Literal replica count; -1 when set to something that is not a literal.
 * An absent field defaults to 1.
 */
function replicasOf(deployment: RecordNode): number {
  const replicas = valueAtPath(deployment, ['spec', 'replicas']);
  return replicas === undefined ? 1 : intLiteral(replicas);
}

function selectorOf(record: RecordNode): Map<string, string> {
  return mapLiteral(valueAtPath(record, ['spec', 'selector', 'matchLabels']));
}

function haDeployments(tree: ModuleTree): RecordNode[] {
  return recordsOfKind(tree, DEPLOYMENT).filter((deployment) => replicasOf(deployment) >= 2);
}

function isSubset(subset: Map<string, string>, superset: Map<string, string>): boolean {
  for (const [key, value] of subset) {
    if (superset.get(key) !== value) return false;
  }
  return true;
}

export const minimumReplicas: Rule = {
  id: 'WK8302',
  name: 'replicas-minimum',
  description: 'Deployments should run at least 2 replicas',
  severity: 'info',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];

    for (const deployment of recordsOfKind(tree, DEPLOYMENT)) {
      const replicas = intLiteral(valueAtPath(deployment, ['spec', 'replicas']));
      if (replicas >= 2) continue;

      const message =
        replicas === -1
          ? 'Deployment should explicitly set replicas >= 2 for high availability'
          : 'Deployment should have at least 2 replicas for high availability';
      issues.push(createIssue(this, tree, deployment.position, message));
    }

    return issues;
  },
};

export const podDisruptionBudget: Rule = {
  id: 'WK8303',
  name: 'pod-disruption-budget',
  description: 'HA deployments should have a PodDisruptionBudget',
  severity: 'info',

  check(tree: ModuleTree): Issue[] {
    const budgets = recordsOfKind(tree, PDB)
      .map(selectorOf)
      .filter((selector) => selector.size > 0);

    const issues: Issue[] = [];
    for (const deployment of haDeployments(tree)) {
      const selector = selectorOf(deployment);
      if (selector.size === 0) continue;
      if (budgets.some((budget) => isSubset(budget, selector))) continue;

      issues.push(
        createIssue(this, tree, deployment.position, 'HA deployment (replicas >= 2) should have a PodDisruptionBudget')
      );
    }
    return issues;
  },
};

export const antiAffinity: Rule = {
  id: 'WK8304',
  name: 'anti-affinity-recommended',
  description: 'HA deployments should use pod anti-affinity',
  severity: 'info',

  check(tree: ModuleTree): Issue[] {
    return haDeployments(tree)
      .filter((deployment) => !followPath(deployment, ['spec', 'template', 'spec', 'affinity', 'podAntiAffinity']))
      .map((deployment) =>
        createIssue(
          this,
          tree,
          deployment.position,
          'HA deployment (replicas >= 2) should use pod anti-affinity to spread across nodes'
        )
      );
  },
};
