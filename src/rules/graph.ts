/**
 * Reference graph between top-level declarations and cycle detection.
 */

import type { Issue, Rule } from '../types.js';
import { walk, type Declaration, type ModuleTree, type Position } from '../core/tree.js';
import { createIssue } from './helpers.js';

export type ReferenceGraph = Map<string, string[]>;

/**
 * Edge A -> B when B's name roots a reference inside A's initializer.
 * Neighbours keep first-reference order.
 */
export function buildReferenceGraph(declarations: readonly Declaration[]): ReferenceGraph {
  const names = new Set(declarations.map((declaration) => declaration.name));
  const graph: ReferenceGraph = new Map();

  for (const declaration of declarations) {
    const edges: string[] = [];
    if (declaration.value) {
      walk(declaration.value, {
        reference(node) {
          const target = node.path[0];
          if (names.has(target) && !edges.includes(target)) edges.push(target);
        },
      });
    }
    graph.set(declaration.name, [...(graph.get(declaration.name) ?? []), ...edges]);
  }

  return graph;
}

type Color = 'white' | 'gray' | 'black';

/**
 * Depth-first search with an explicit path stack. Each cycle is returned once,
 * starting at the node the search reached first, and closed by repeating it.
 */
export function findCycles(graph: ReferenceGraph): string[][] {
  const color = new Map<string, Color>();
  const path: string[] = [];
  const cycles: string[][] = [];
  const reported = new Set<string>();

  const visit = (node: string): void => {
    color.set(node, 'gray');
    path.push(node);

    for (const next of graph.get(node) ?? []) {
      const state = color.get(next) ?? 'white';
      if (state === 'white') {
        visit(next);
      } else if (state === 'gray') {
        const cycle = [...path.slice(path.indexOf(next)), next];
        const key = cycle.slice(0, -1).sort().join('\u0000');
        if (!reported.has(key)) {
          reported.add(key);
          cycles.push(cycle);
        }
      }
    }

    path.pop();
    color.set(node, 'black');
  };

  for (const node of graph.keys()) {
    if ((color.get(node) ?? 'white') === 'white') visit(node);
  }

  return cycles;
}

export const circularDependency: Rule = {
  id: 'WK8004',
  name: 'circular-dependency',
  description: 'Declarations must not reference each other in a cycle',
  severity: 'error',

  check(tree: ModuleTree): Issue[] {
    const positions = new Map<string, Position>();
    for (const declaration of tree.declarations) {
      if (!positions.has(declaration.name)) positions.set(declaration.name, declaration.position);
    }

    return findCycles(buildReferenceGraph(tree.declarations)).map((cycle) => {
      const position = positions.get(cycle[0]) ?? { line: 1, column: 1 };
      return createIssue(this, tree, position, `Circular dependency detected: ${cycle.join(' -> ')}`);
    });
  },
};
