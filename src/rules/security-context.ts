/**
 * Security context hardening for containers and pods.
 */

import type { Issue, Rule, Severity } from '../types.js';
import type { ModuleTree, RecordNode } from '../core/tree.js';
import { containersIn, createIssue, podSpecsIn } from './helpers.js';
import { fieldValue, isTrue, listItems } from '../core/matchers.js';

function securityContextOf(container: RecordNode) {
  return fieldValue(container, 'securityContext');
}

interface ContainerCheck {
  id: string;
  name: string;
  description: string;
  severity: Severity;
  message: string;
  /** True when the container violates the rule */
  violates(container: RecordNode): boolean;
}

function containerRule(definition: ContainerCheck): Rule {
  return {
    id: definition.id,
    name: definition.name,
    description: definition.description,
    severity: definition.severity,

    check(tree: ModuleTree): Issue[] {
      return containersIn(tree)
        .filter((container) => definition.violates(container))
        .map((container) => createIssue(definition, tree, container.position, definition.message));
    },
  };
}

export const privilegedContainer = containerRule({
  id: 'WK8202',
  name: 'privileged-container',
  description: 'Containers should not run privileged',
  severity: 'error',
  message: 'Container should not run in privileged mode, it has full access to the host',
  violates: (container) => isTrue(fieldValue(securityContextOf(container), 'privileged')),
});

export const readOnlyRootFilesystem = containerRule({
  id: 'WK8203',
  name: 'read-only-root-filesystem',
  description: 'Containers should use a read-only root filesystem',
  severity: 'warning',
  message: 'Container should set readOnlyRootFilesystem: true to reduce attack surface',
  violates: (container) => !isTrue(fieldValue(securityContextOf(container), 'readOnlyRootFilesystem')),
});

export const runAsNonRoot = containerRule({
  id: 'WK8204',
  name: 'run-as-non-root',
  description: 'Containers should run as a non-root user',
  severity: 'warning',
  message: 'Container should set runAsNonRoot: true to limit security risks',
  violates: (container) => !isTrue(fieldValue(securityContextOf(container), 'runAsNonRoot')),
});

export const dropCapabilities = containerRule({
  id: 'WK8205',
  name: 'drop-capabilities',
  description: 'Containers should drop unneeded capabilities',
  severity: 'warning',
  message: 'Container should drop unnecessary capabilities (e.g., drop: ["ALL"])',
  violates: (container) =>
    listItems(fieldValue(fieldValue(securityContextOf(container), 'capabilities'), 'drop')).length === 0,
});

// ─────────────────────────────────────────────────────────────
// Host Namespaces
// ─────────────────────────────────────────────────────────────

function hostNamespaceRule(id: string, field: string, consequence: string): Rule {
  return {
    id,
    name: `no-${field.replace(/[A-Z]+/g, (upper) => `-${upper.toLowerCase()}`)}`,
    description: `Pods should not use ${field}: true`,
    severity: 'warning',

    check(tree: ModuleTree): Issue[] {
      const issues: Issue[] = [];
      for (const podSpec of podSpecsIn(tree)) {
        for (const entry of podSpec.fields) {
          if (entry.name !== field || !isTrue(entry.value)) continue;
          issues.push(
            createIssue(this, tree, entry.position, `Pod should not use ${field}: true, it ${consequence}`)
          );
        }
      }
      return issues;
    },
  };
}

export const hostNetwork = hostNamespaceRule('WK8207', 'hostNetwork', 'bypasses network policies');
export const hostPID = hostNamespaceRule('WK8208', 'hostPID', 'allows viewing host processes');
export const hostIPC = hostNamespaceRule('WK8209', 'hostIPC', 'enables IPC with host processes');
