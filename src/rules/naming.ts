import type { Issue, Rule } from '../types.js';
import type { Declaration, ModuleTree } from '../core/tree.js';
import { createIssue } from './helpers.js';
import { fieldValue, nestedRecord, stringLiteral } from '../core/matchers.js';

const DEFAULT_NAMESPACE = 'default';

/**
 * (namespace, name) of a declared resource, or undefined without a literal name.
 */
export function resourceIdentity(declaration: Declaration): { namespace: string; name: string } | undefined {
  const metadata = fieldValue(nestedRecord(declaration.value), 'metadata');
  const name = stringLiteral(fieldValue(metadata, 'name'));
  if (!name) return undefined;
  const namespace = stringLiteral(fieldValue(metadata, 'namespace')) || DEFAULT_NAMESPACE;
  return { namespace, name };
}

export const duplicateNames: Rule = {
  id: 'WK8003',
  name: 'duplicate-resource-names',
  description: 'No duplicate resource names in the same namespace',
  severity: 'error',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];
    const seen = new Map<string, Declaration>();

    for (const declaration of tree.declarations) {
      const identity = resourceIdentity(declaration);
      if (!identity) continue;

      const key = `${identity.namespace}/${identity.name}`;
      const first = seen.get(key);
      if (!first) {
        seen.set(key, declaration);
        continue;
      }

      issues.push(
        createIssue(
          this,
          tree,
          declaration.position,
          `Duplicate resource name "${identity.name}" in namespace "${identity.namespace}", already declared as ${first.name} at line ${first.position.line}`
        )
      );
    }

    return issues;
  },
};
