import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Issue, Rule } from '../src/types.js';
import { parseSource } from '../src/core/tree.js';

export function check(rule: Rule, source: string, path = 'resources.ts'): Issue[] {
  return rule.check(parseSource(path, source).tree);
}

export function makeTempDir(prefix = 'kubeweave-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Deployment nested six records deep:
 * Deployment > spec > template > spec > containers[] > env[].
 */
export const DEEP_DEPLOYMENT = `import { apps } from "k8s-types";

export const web = new apps.Deployment({
  metadata: { name: "web", labels: { app: "web" } },
  spec: {
    replicas: 2,
    selector: { matchLabels: { app: "web" } },
    template: {
      metadata: { labels: { app: "web" } },
      spec: {
        containers: [
          {
            name: "web",
            image: "nginx:1.25",
            env: [{ name: "MODE", value: "prod" }],
          },
        ],
      },
    },
  },
});
`;

/**
 * The same Deployment with each inner level declared on its own.
 */
export const FLAT_DEPLOYMENT = `import { apps } from "k8s-types";

const env = [{ name: "MODE", value: "prod" }];

const container = { name: "web", image: "nginx:1.25", env };

const podSpec = { containers: [container] };

export const web = new apps.Deployment({
  metadata: { name: "web", labels: { app: "web" } },
  spec: {
    replicas: 2,
    selector: { matchLabels: { app: "web" } },
    template: {
      metadata: { labels: { app: "web" } },
      spec: podSpec,
    },
  },
});
`;
