import type { Issue, Rule } from '../types.js';
import { walkTree, type ModuleTree, type Position, type RecordNode } from '../core/tree.js';
import { isContainer, isPodSpec, typeNameOf } from '../core/matchers.js';

type RuleIdentity = Pick<Rule, 'id' | 'severity'>;

export function createIssue(rule: RuleIdentity, tree: ModuleTree, position: Position, message: string): Issue {
  return {
    ruleId: rule.id,
    message,
    file: tree.path,
    line: position.line,
    column: position.column,
    severity: rule.severity,
  };
}

/**
 * Every record in the file matching `predicate`, in traversal order.
 */
export function collectRecords(tree: ModuleTree, predicate: (record: RecordNode) => boolean): RecordNode[] {
  const records: RecordNode[] = [];
  walkTree(tree, {
    record(node) {
      if (predicate(node)) records.push(node);
    },
  });
  return records;
}

export function containersIn(tree: ModuleTree): RecordNode[] {
  return collectRecords(tree, isContainer);
}

export function podSpecsIn(tree: ModuleTree): RecordNode[] {
  return collectRecords(tree, isPodSpec);
}

export function recordsOfKind(tree: ModuleTree, kinds: ReadonlySet<string>): RecordNode[] {
  return collectRecords(tree, (record) => {
    const typeName = typeNameOf(record);
    return typeName !== undefined && kinds.has(typeName);
  });
}
