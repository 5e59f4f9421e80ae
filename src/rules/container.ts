/**
 * Container rules: image tags, names, pull policy, limits and probes.
 */

import { Node } from 'ts-morph';
import type { FixResult, Issue, Rule } from '../types.js';
import type { FieldNode, ModuleTree, RecordNode, ValueNode } from '../core/tree.js';
import { collectRecords, containersIn, createIssue } from './helpers.js';
import {
  determineImagePullPolicy,
  fieldValue,
  hasField,
  nestedRecord,
  portTypeOf,
  stringLiteral,
  usesLatestTag,
} from '../core/matchers.js';

function imageOf(container: RecordNode): string | undefined {
  const image = stringLiteral(fieldValue(container, 'image'));
  return image === '' ? undefined : image;
}

/**
 * A name is missing when absent or an empty literal; a computed name counts as set.
 */
function lacksName(record: RecordNode): boolean {
  const name = fieldValue(record, 'name');
  if (name === undefined) return true;
  return stringLiteral(name) === '';
}

export const latestImageTag: Rule = {
  id: 'WK8006',
  name: 'latest-image-tag',
  description: 'Flag :latest image tags and untagged images',
  severity: 'error',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];
    for (const container of containersIn(tree)) {
      const image = imageOf(container);
      if (image !== undefined && usesLatestTag(image)) {
        issues.push(
          createIssue(
            this,
            tree,
            container.position,
            `Image "${image}" uses :latest tag or no tag (defaults to :latest), specify a version tag`
          )
        );
      }
    }
    return issues;
  },
};

export const containerName: Rule = {
  id: 'WK8103',
  name: 'container-name-required',
  description: 'Containers must have a name',
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    return containersIn(tree)
      .filter(lacksName)
      .map((container) => createIssue(this, tree, container.position, 'Container must have a name'));
  },
};

export const portName: Rule = {
  id: 'WK8104',
  name: 'port-name-recommended',
  description: 'Container and service ports should be named',
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];
    for (const port of collectRecords(tree, (record) => portTypeOf(record) !== undefined)) {
      if (!lacksName(port)) continue;
      issues.push(
        createIssue(
          this,
          tree,
          port.position,
          `${portTypeOf(port)} should have a name for better documentation and service mesh support`
        )
      );
    }
    return issues;
  },
};

// ─────────────────────────────────────────────────────────────
// Image Pull Policy (fixable)
// ─────────────────────────────────────────────────────────────

interface PullPolicyTarget {
  container: RecordNode;
  image: string;
  imageField: FieldNode | undefined;
}

function pullPolicyTargets(tree: ModuleTree): PullPolicyTarget[] {
  const targets: PullPolicyTarget[] = [];
  for (const container of containersIn(tree)) {
    const image = imageOf(container);
    if (image === undefined || hasField(container, 'imagePullPolicy')) continue;
    targets.push({
      container,
      image,
      imageField: container.fields.find((field) => field.name === 'image'),
    });
  }
  return targets;
}

/**
 * Quote character of the image literal, looking through a helper call.
 */
function quoteOf(value: ValueNode | undefined): string {
  const literal = value?.kind === 'call' && value.args.length === 1 ? value.args[0] : value;
  if (literal && Node.isStringLiteral(literal.syntax)) {
    return literal.syntax.getQuoteKind();
  }
  return '"';
}

export const imagePullPolicy: Rule = {
  id: 'WK8105',
  name: 'image-pull-policy-explicit',
  description: 'Containers should set imagePullPolicy explicitly',
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    return pullPolicyTargets(tree).map(({ container, image }) =>
      createIssue(this, tree, container.position, `Container with image "${image}" should have explicit imagePullPolicy`)
    );
  },

  fix({ path, tree }): FixResult[] {
    const results: FixResult[] = [];

    for (const { container, image, imageField } of pullPolicyTargets(tree)) {
      const policy = determineImagePullPolicy(image);
      const quote = quoteOf(imageField?.value);
      const properties = container.literal.getProperties();
      const imageIndex = imageField ? properties.findIndex((property) => property === imageField.syntax) : -1;

      container.literal.insertPropertyAssignment(imageIndex >= 0 ? imageIndex + 1 : properties.length, {
        name: 'imagePullPolicy',
        initializer: `${quote}${policy}${quote}`,
      });

      results.push({
        file: path,
        ruleId: this.id,
        fixed: true,
        description: `Added imagePullPolicy: "${policy}" for image "${image}" at line ${container.position.line}`,
      });
    }

    return results;
  },
};

// ─────────────────────────────────────────────────────────────
// Limits & Probes
// ─────────────────────────────────────────────────────────────

export const resourceLimits: Rule = {
  id: 'WK8201',
  name: 'resource-limits',
  description: 'Containers should have resource limits',
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];
    for (const container of containersIn(tree)) {
      const limits = nestedRecord(fieldValue(fieldValue(container, 'resources'), 'limits'));
      if (limits && limits.fields.length > 0) continue;
      issues.push(
        createIssue(
          this,
          tree,
          container.position,
          'Container should have resource limits (cpu, memory) to prevent resource exhaustion'
        )
      );
    }
    return issues;
  },
};

export const healthProbes: Rule = {
  id: 'WK8301',
  name: 'health-probes',
  description: 'Containers should have liveness and readiness probes',
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];
    for (const container of containersIn(tree)) {
      const missing: string[] = [];
      if (!hasField(container, 'livenessProbe')) missing.push('liveness');
      if (!hasField(container, 'readinessProbe')) missing.push('readiness');
      if (missing.length === 0) continue;
      issues.push(
        createIssue(
          this,
          tree,
          container.position,
          `Container should have ${missing.join(' and ')} probe(s) for automatic failure detection`
        )
      );
    }
    return issues;
  },
};
