import { describe, it, expect } from 'vitest';
import { buildReferenceGraph, circularDependency, findCycles } from '../../../src/rules/graph.js';
import { parseSource } from '../../../src/core/tree.js';
import { check } from '../../helpers.js';

const THREE_CYCLE = `const configA = { metadata: { name: configC.metadata.name } };
const configB = { metadata: { name: configA.metadata.name } };
const configC = { metadata: { name: configB.metadata.name } };
`;

describe('rules/graph', () => {
  describe('buildReferenceGraph', () => {
    it('should link declarations to the declarations they reference', () => {
      const tree = parseSource('resources.ts', THREE_CYCLE).tree;

      expect(buildReferenceGraph(tree.declarations)).toEqual(
        new Map([
          ['configA', ['configC']],
          ['configB', ['configA']],
          ['configC', ['configB']],
        ])
      );
    });

    it('should ignore names that are not top-level declarations', () => {
      const tree = parseSource('resources.ts', 'const a = { name: external.name, other: b };\nconst b = 1;\n').tree;
      expect(buildReferenceGraph(tree.declarations).get('a')).toEqual(['b']);
    });
    it('should not treat a member name as a reference', () => {
      const tree = parseSource('resources.ts', 'const b = { x: a };\nconst a = { y: lookup().b };\n').tree;
      expect(buildReferenceGraph(tree.declarations).get('a')).toEqual([]);
    });
  });

  describe('findCycles', () => {
    it('should report each cycle once', () => {
      const graph = new Map([
        ['a', ['b']],
        ['b', ['a']],
      ]);
      expect(findCycles(graph)).toEqual([['a', 'b', 'a']]);
    });

    it('should return no cycles for an acyclic graph', () => {
      const graph = new Map([
        ['a', ['b', 'c']],
        ['b', ['c']],
        ['c', []],
      ]);
      expect(findCycles(graph)).toEqual([]);
    });
  });

  describe('WK8004 circular-dependency', () => {
    it('should report a three-declaration cycle from where the search started', () => {
      expect(check(circularDependency, THREE_CYCLE)).toEqual([
        {
          ruleId: 'WK8004',
          message: 'Circular dependency detected: configA -> configC -> configB -> configA',
          file: 'resources.ts',
          line: 1,
          column: 7,
          severity: 'error',
        },
      ]);
    });

    it('should report a declaration referencing itself', () => {
      const source = 'const selfRef = { metadata: { name: selfRef.metadata.name } };\n';
      expect(check(circularDependency, source).map((issue) => issue.message)).toEqual([
        'Circular dependency detected: selfRef -> selfRef',
      ]);
    });

    it('should accept a property read off a call that shares a declaration name', () => {
      expect(check(circularDependency, 'const b = { x: a };\nconst a = { y: lookup().b };\n')).toEqual([]);
    });

    it('should accept one-way references', () => {
      const source = `const base = { app: "web" };
const web = new apps.Deployment({ metadata: { name: "web", labels: base } });
`;
      expect(check(circularDependency, source)).toEqual([]);
    });
  });
});
