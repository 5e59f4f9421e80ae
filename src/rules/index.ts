/**
 * Rule Registry
 *
 * The built-in catalog, in reporting order. A registry is a plain value built
 * once and handed to the linter and fixer; tests build their own.
 */

import type { LintConfig, Rule } from '../types.js';
import { nestingDepthRule, topLevelLiterals } from './structure.js';
import { duplicateNames } from './naming.js';
import { circularDependency } from './graph.js';
import { hardcodedEnvSecret, hardcodedToken, privateKeyHeader } from './security.js';
import {
  containerName,
  healthProbes,
  imagePullPolicy,
  latestImageTag,
  portName,
  resourceLimits,
} from './container.js';
import { missingLabels, selectorMismatch } from './workload.js';
import {
  dropCapabilities,
  hostIPC,
  hostNetwork,
  hostPID,
  privilegedContainer,
  readOnlyRootFilesystem,
  runAsNonRoot,
} from './security-context.js';
import { antiAffinity, minimumReplicas, podDisruptionBudget } from './ha.js';
import { fileSizeLimit } from './organization.js';

export function builtinRules(): Rule[] {
  return [
    // Structure
    topLevelLiterals,
    nestingDepthRule,
    duplicateNames,
    circularDependency,

    // Security
    hardcodedEnvSecret,
    latestImageTag,
    hardcodedToken,
    privateKeyHeader,

    // Best practice
    selectorMismatch,
    missingLabels,
    containerName,
    portName,
    imagePullPolicy,
    resourceLimits,

    // Security context
    privilegedContainer,
    readOnlyRootFilesystem,
    runAsNonRoot,
    dropCapabilities,
    hostNetwork,
    hostPID,
    hostIPC,

    // Reliability & availability
    healthProbes,
    minimumReplicas,
    podDisruptionBudget,
    antiAffinity,

    // Organization
    fileSizeLimit,
  ];
}

export interface RuleRegistry {
  all(): readonly Rule[];
  get(id: string): Rule | undefined;
  /** Rules left after removing disabled IDs; unknown IDs are ignored */
  enabled(config: Pick<LintConfig, 'disabledRules'>): Rule[];
  fixableRuleIds(): string[];
}

export function createRegistry(rules: readonly Rule[] = builtinRules()): RuleRegistry {
  const byId = new Map(rules.map((rule): [string, Rule] => [rule.id, rule]));

  return {
    all: () => rules,
    get: (id) => byId.get(id),
    enabled: ({ disabledRules }) => {
      const disabled = new Set(disabledRules);
      return rules.filter((rule) => !disabled.has(rule.id));
    },
    fixableRuleIds: () => rules.filter((rule) => rule.fix !== undefined).map((rule) => rule.id),
  };
}

const defaultRegistry = createRegistry();

export function allRules(): readonly Rule[] {
  return defaultRegistry.all();
}

/**
 * IDs of the rules that can be fixed automatically.
 */
export function fixableRules(): string[] {
  return defaultRegistry.fixableRuleIds();
}
