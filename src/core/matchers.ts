/**
 * Structural matchers over value nodes.
 *
 * Every helper is null-safe: an absent or unrecognised shape is "no match",
 * never an exception.
 */

import type { RecordNode, ValueNode } from './tree.js';

// ─────────────────────────────────────────────────────────────
// Resource Kinds
// ─────────────────────────────────────────────────────────────

export const WORKLOAD_KINDS: ReadonlySet<string> = new Set(['Deployment', 'StatefulSet', 'DaemonSet']);

export const LABELLED_KINDS: ReadonlySet<string> = new Set([
  'Deployment',
  'Service',
  'Pod',
  'ConfigMap',
  'Secret',
  'StatefulSet',
  'DaemonSet',
  'Ingress',
  'Job',
  'CronJob',
]);

export const RESOURCE_KINDS: ReadonlySet<string> = new Set([
  ...LABELLED_KINDS,
  'ReplicaSet',
  'PodDisruptionBudget',
  'Namespace',
  'ServiceAccount',
  'NetworkPolicy',
  'HorizontalPodAutoscaler',
  'PersistentVolumeClaim',
  'PersistentVolume',
  'Role',
  'RoleBinding',
  'ClusterRole',
  'ClusterRoleBinding',
  'StorageClass',
]);

export function isResourceKind(typeName: string | undefined): boolean {
  return typeName !== undefined && RESOURCE_KINDS.has(typeName);
}

// ─────────────────────────────────────────────────────────────
// Records & Fields
// ─────────────────────────────────────────────────────────────

export function nestedRecord(node: ValueNode | undefined): RecordNode | undefined {
  return node?.kind === 'record' ? node : undefined;
}

export function typeNameOf(node: ValueNode | undefined): string | undefined {
  return nestedRecord(node)?.typeName;
}

export function fieldValue(node: ValueNode | undefined, name: string): ValueNode | undefined {
  const record = nestedRecord(node);
  if (!record) return undefined;
  // Last assignment wins, as at run time
  for (let i = record.fields.length - 1; i >= 0; i--) {
    if (record.fields[i].name === name) return record.fields[i].value;
  }
  return undefined;
}

export function hasField(node: ValueNode | undefined, name: string): boolean {
  return fieldValue(node, name) !== undefined;
}

export function valueAtPath(node: ValueNode | undefined, path: readonly string[]): ValueNode | undefined {
  let current = node;
  for (const name of path) {
    current = fieldValue(current, name);
    if (current === undefined) return undefined;
  }
  return current;
}

export function followPath(node: ValueNode | undefined, path: readonly string[]): RecordNode | undefined {
  return nestedRecord(valueAtPath(node, path));
}

// ─────────────────────────────────────────────────────────────
// Scalars
// ─────────────────────────────────────────────────────────────

/**
 * Looks through a single-argument helper call such as `ptr(true)`.
 */
function unwrapHelper(node: ValueNode | undefined): ValueNode | undefined {
  if (node?.kind === 'call' && node.args.length === 1) return node.args[0];
  return node;
}

export function stringLiteral(node: ValueNode | undefined): string | undefined {
  const value = unwrapHelper(node);
  return value?.kind === 'string' ? value.value : undefined;
}

/**
 * Integer value of a literal, or -1 when absent or not a literal.
 */
export function intLiteral(node: ValueNode | undefined): number {
  const value = unwrapHelper(node);
  return value?.kind === 'number' && Number.isInteger(value.value) ? value.value : -1;
}

export function boolLiteral(node: ValueNode | undefined): boolean | undefined {
  const value = unwrapHelper(node);
  return value?.kind === 'boolean' ? value.value : undefined;
}

export function isTrue(node: ValueNode | undefined): boolean {
  return boolLiteral(node) === true;
}

/**
 * String pairs of a record literal. Non-literal values are skipped and a
 * reference to another variable yields an empty map.
 */
export function mapLiteral(node: ValueNode | undefined): Map<string, string> {
  const pairs = new Map<string, string>();
  const record = nestedRecord(node);
  if (!record) return pairs;

  for (const field of record.fields) {
    const value = stringLiteral(field.value);
    if (value !== undefined) pairs.set(field.name, value);
  }
  return pairs;
}

export function listItems(node: ValueNode | undefined): readonly ValueNode[] {
  return node?.kind === 'list' ? node.items : [];
}

// ─────────────────────────────────────────────────────────────
// Pod Shapes
// ─────────────────────────────────────────────────────────────

export function isContainer(node: ValueNode | undefined): node is RecordNode {
  return typeNameOf(node) === 'Container';
}

export function isPodSpec(node: ValueNode | undefined): node is RecordNode {
  return typeNameOf(node) === 'PodSpec';
}

export function isEnvVar(node: ValueNode | undefined): node is RecordNode {
  return typeNameOf(node) === 'EnvVar';
}

export type PortType = 'ContainerPort' | 'ServicePort';

export function portTypeOf(node: ValueNode | undefined): PortType | undefined {
  const typeName = typeNameOf(node);
  return typeName === 'ContainerPort' || typeName === 'ServicePort' ? typeName : undefined;
}

// ─────────────────────────────────────────────────────────────
// Image References
// ─────────────────────────────────────────────────────────────

export interface ImageReference {
  name: string;
  tag?: string;
  digest?: string;
}

export type ImagePullPolicy = 'Always' | 'IfNotPresent';

/**
 * Split `registry:5000/app:1.2@sha256:...` into name, tag and digest.
 * A colon before the last slash belongs to the registry host.
 */
export function parseImageReference(image: string): ImageReference {
  let rest = image;
  let digest: string | undefined;

  const at = rest.indexOf('@');
  if (at >= 0) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  const colon = rest.lastIndexOf(':');
  const slash = rest.lastIndexOf('/');
  if (colon > slash) {
    return { name: rest.slice(0, colon), tag: rest.slice(colon + 1), digest };
  }
  return { name: rest, digest };
}

export function usesLatestTag(image: string): boolean {
  const { tag, digest } = parseImageReference(image);
  if (tag === 'latest') return true;
  return tag === undefined && digest === undefined;
}

export function determineImagePullPolicy(image: string): ImagePullPolicy {
  return usesLatestTag(image) ? 'Always' : 'IfNotPresent';
}

// ─────────────────────────────────────────────────────────────
// Depth
// ─────────────────────────────────────────────────────────────

/**
 * Record nesting depth. Lists are transparent; scalars and references are 0.
 */
export function nestingDepth(node: ValueNode | undefined): number {
  if (!node) return 0;
  switch (node.kind) {
    case 'record':
      return 1 + Math.max(0, ...node.fields.map((field) => nestingDepth(field.value)));
    case 'list':
      return Math.max(0, ...node.items.map(nestingDepth));
    default:
      return 0;
  }
}
