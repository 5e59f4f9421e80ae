import type { Issue, Rule } from '../types.js';
import type { ModuleTree } from '../core/tree.js';
import { createIssue } from './helpers.js';
import { isResourceKind, typeNameOf } from '../core/matchers.js';

export const MAX_RESOURCES_PER_FILE = 20;

export function countResources(tree: ModuleTree): number {
  return tree.declarations.filter((declaration) => isResourceKind(typeNameOf(declaration.value))).length;
}

export const fileSizeLimit: Rule = {
  id: 'WK8401',
  name: 'file-size-limit',
  description: `Files should not declare more than ${MAX_RESOURCES_PER_FILE} resources`,
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    const count = countResources(tree);
    if (count <= MAX_RESOURCES_PER_FILE) return [];
    return [
      createIssue(
        this,
        tree,
        { line: 1, column: 1 },
        `File contains ${count} resources (max ${MAX_RESOURCES_PER_FILE}), consider splitting into smaller files`
      ),
    ];
  },
};
