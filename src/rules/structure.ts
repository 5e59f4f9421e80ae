/**
 * Structural integrity: declarations must be literal, and shallow enough to read.
 */

import { VariableDeclarationKind } from 'ts-morph';
import type { FixResult, Issue, Rule } from '../types.js';
import { topLevelNames, type Declaration, type FixContext, type ModuleTree, type ValueNode } from '../core/tree.js';
import { createIssue } from './helpers.js';
import { nestingDepth } from '../core/matchers.js';

export const MAX_NESTING_DEPTH = 5;

/** Records at this depth or deeper are hoisted by the fix */
const EXTRACTION_DEPTH = 4;

export const topLevelLiterals: Rule = {
  id: 'WK8001',
  name: 'top-level-resource-declarations',
  description: 'Resources must be declared as top-level literals, not built by function calls',
  severity: 'error',

  check(tree: ModuleTree): Issue[] {
    const issues: Issue[] = [];
    for (const declaration of tree.declarations) {
      const value = declaration.value;
      if (value?.kind !== 'call' || value.isNew) continue;
      issues.push(
        createIssue(
          this,
          tree,
          declaration.position,
          `Resource "${declaration.name}" is built by a function call (${value.callee}), declare it as a top-level literal`
        )
      );
    }
    return issues;
  },
};

// ─────────────────────────────────────────────────────────────
// Nesting Depth (fixable)
// ─────────────────────────────────────────────────────────────

function deepDeclarations(tree: ModuleTree): Array<{ declaration: Declaration; depth: number }> {
  const deep: Array<{ declaration: Declaration; depth: number }> = [];
  for (const declaration of tree.declarations) {
    const depth = nestingDepth(declaration.value);
    if (depth > MAX_NESTING_DEPTH) deep.push({ declaration, depth });
  }
  return deep;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

interface Extraction {
  name: string;
  text: string;
}

/**
 * Hoists deep records out of one declaration, innermost first.
 * `taken` holds every top-level name in use and grows as names are handed out.
 */
function extractNested(declaration: Declaration, taken: Set<string>): Extraction[] {
  const extracted: Extraction[] = [];
  let counter = 0;

  const nextName = (field: string | undefined): string => {
    const label = field ? capitalize(field) : 'Nested';
    let name: string;
    do {
      counter++;
      name = `${declaration.name}${label}${counter}`;
    } while (taken.has(name));
    taken.add(name);
    return name;
  };

  const visit = (node: ValueNode, depth: number, field: string | undefined): void => {
    if (node.kind === 'list') {
      for (const item of node.items) visit(item, depth, field);
      return;
    }
    if (node.kind !== 'record') return;

    for (const child of node.fields) {
      visit(child.value, depth + 1, child.name);
    }

    if (depth >= EXTRACTION_DEPTH && node.fields.length > 0) {
      const name = nextName(field);
      extracted.push({ name, text: node.syntax.getText() });
      node.syntax.replaceWithText(name);
    }
  };

  if (declaration.value) visit(declaration.value, 0, undefined);
  return extracted;
}

function extractDeepDeclarations({ path, sourceFile, tree }: FixContext): FixResult[] {
  const deep = deepDeclarations(tree);
  if (deep.length === 0) return [];

  const taken = topLevelNames(sourceFile);
  const results: FixResult[] = [];
  // statement index -> hoisted records, in extraction order
  const hoisted = new Map<number, Extraction[]>();

  for (const { declaration } of deep) {
    const extracted = extractNested(declaration, taken);
    if (extracted.length === 0) continue;
    hoisted.set(declaration.statementIndex, [...(hoisted.get(declaration.statementIndex) ?? []), ...extracted]);
    results.push({
      file: path,
      ruleId: 'WK8002',
      fixed: true,
      description: `Extracted ${extracted.length} nested structure(s) from ${declaration.name} at line ${declaration.position.line}`,
    });
  }

  // Bottom-up, so earlier statement indexes stay valid
  const indexes = [...hoisted.keys()].sort((a, b) => b - a);
  for (const index of indexes) {
    sourceFile.insertVariableStatements(
      index,
      (hoisted.get(index) ?? []).map(({ name, text }) => ({
        declarationKind: VariableDeclarationKind.Const,
        declarations: [{ name, initializer: text }],
      }))
    );
  }

  return results;
}

export const nestingDepthRule: Rule = {
  id: 'WK8002',
  name: 'nesting-depth',
  description: `Avoid deeply nested structures (depth > ${MAX_NESTING_DEPTH})`,
  severity: 'warning',

  check(tree: ModuleTree): Issue[] {
    return deepDeclarations(tree).map(({ declaration, depth }) =>
      createIssue(
        this,
        tree,
        declaration.position,
        `"${declaration.name}" has nesting depth ${depth} (max ${MAX_NESTING_DEPTH}), extract nested structures into named declarations`
      )
    );
  },

  fix: extractDeepDeclarations,
};
