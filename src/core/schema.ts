/**
 * Field Schema - Contextual typing for plain object literals
 *
 * Maps a parent type and field name to the type of the value held there.
 * For array fields the entry names the element type, so
 * `containers: [{ ... }]` inside a PodSpec types each element as Container.
 *
 * Only the shapes the rules care about are listed; anything else stays untyped.
 */

const METADATA = { metadata: 'ObjectMeta' } as const;

const WORKLOAD_SPEC = {
  selector: 'LabelSelector',
  template: 'PodTemplateSpec',
} as const;

export const FIELD_SCHEMA: Readonly<Record<string, Readonly<Record<string, string>>>> = {
  // Workloads
  Deployment: { ...METADATA, spec: 'DeploymentSpec' },
  StatefulSet: { ...METADATA, spec: 'StatefulSetSpec' },
  DaemonSet: { ...METADATA, spec: 'DaemonSetSpec' },
  ReplicaSet: { ...METADATA, spec: 'ReplicaSetSpec' },
  DeploymentSpec: WORKLOAD_SPEC,
  StatefulSetSpec: WORKLOAD_SPEC,
  DaemonSetSpec: WORKLOAD_SPEC,
  ReplicaSetSpec: WORKLOAD_SPEC,
  Job: { ...METADATA, spec: 'JobSpec' },
  JobSpec: { template: 'PodTemplateSpec', selector: 'LabelSelector' },
  CronJob: { ...METADATA, spec: 'CronJobSpec' },
  CronJobSpec: { jobTemplate: 'JobTemplateSpec' },
  JobTemplateSpec: { ...METADATA, spec: 'JobSpec' },

  // Pods
  Pod: { ...METADATA, spec: 'PodSpec' },
  PodTemplateSpec: { ...METADATA, spec: 'PodSpec' },
  PodSpec: {
    containers: 'Container',
    initContainers: 'Container',
    ephemeralContainers: 'Container',
    affinity: 'Affinity',
    securityContext: 'PodSecurityContext',
  },
  Container: {
    env: 'EnvVar',
    ports: 'ContainerPort',
    securityContext: 'SecurityContext',
    resources: 'ResourceRequirements',
    livenessProbe: 'Probe',
    readinessProbe: 'Probe',
    startupProbe: 'Probe',
  },
  EnvVar: { valueFrom: 'EnvVarSource' },
  SecurityContext: { capabilities: 'Capabilities' },
  Affinity: {
    nodeAffinity: 'NodeAffinity',
    podAffinity: 'PodAffinity',
    podAntiAffinity: 'PodAntiAffinity',
  },

  // Services & policy
  Service: { ...METADATA, spec: 'ServiceSpec' },
  ServiceSpec: { ports: 'ServicePort' },
  PodDisruptionBudget: { ...METADATA, spec: 'PodDisruptionBudgetSpec' },
  PodDisruptionBudgetSpec: { selector: 'LabelSelector' },

  // Metadata-only kinds
  ConfigMap: METADATA,
  Secret: METADATA,
  Ingress: METADATA,
  Namespace: METADATA,
  ServiceAccount: METADATA,
  NetworkPolicy: METADATA,
  HorizontalPodAutoscaler: METADATA,
};

/**
 * Type of the value held by `field` of a record typed `parentType`.
 */
export function fieldType(parentType: string | undefined, field: string): string | undefined {
  if (parentType === undefined || !Object.hasOwn(FIELD_SCHEMA, parentType)) return undefined;
  const fields = FIELD_SCHEMA[parentType];
  return Object.hasOwn(fields, field) ? fields[field] : undefined;
}
