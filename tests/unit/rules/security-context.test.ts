import { describe, it, expect } from 'vitest';
import {
  dropCapabilities,
  hostIPC,
  hostNetwork,
  hostPID,
  privilegedContainer,
  readOnlyRootFilesystem,
  runAsNonRoot,
} from '../../../src/rules/security-context.js';
import { check } from '../../helpers.js';

const BARE = `export const pod = new core.Pod({
  spec: { containers: [{ name: "app", image: "nginx:1.25" }] },
});
`;

const HARDENED = `export const pod = new core.Pod({
  spec: {
    containers: [
      {
        name: "app",
        image: "nginx:1.25",
        securityContext: {
          privileged: false,
          readOnlyRootFilesystem: true,
          runAsNonRoot: ptr(true),
          capabilities: { drop: ["ALL"] },
        },
      },
    ],
  },
});
`;

const CONTAINER_RULES = [privilegedContainer, readOnlyRootFilesystem, runAsNonRoot, dropCapabilities];

describe('rules/security-context', () => {
  describe('container rules', () => {
    it('should flag a container without a security context', () => {
      const ids = CONTAINER_RULES.flatMap((rule) => check(rule, BARE)).map((issue) => issue.ruleId);
      expect(ids).toEqual(['WK8203', 'WK8204', 'WK8205']);
    });

    it('should accept a hardened container', () => {
      expect(CONTAINER_RULES.flatMap((rule) => check(rule, HARDENED))).toEqual([]);
    });

    it('should flag a privileged container at the container', () => {
      const source = `export const pod = new core.Pod({
  spec: { containers: [{ name: "app", securityContext: { privileged: true } }] },
});
`;
      expect(check(privilegedContainer, source)).toEqual([
        {
          ruleId: 'WK8202',
          message: 'Container should not run in privileged mode, it has full access to the host',
          file: 'resources.ts',
          line: 2,
          column: 24,
          severity: 'error',
        },
      ]);
    });

    it('should treat an empty drop list as no capabilities dropped', () => {
      const source = 'const app = new core.Container({ securityContext: { capabilities: { drop: [] } } });';
      expect(check(dropCapabilities, source)).toHaveLength(1);
    });
  });

  describe('host namespaces', () => {
    const source = `export const pod = new core.Pod({
  spec: {
    hostNetwork: true,
    hostPID: false,
    hostIPC: true,
    containers: [],
  },
});
`;

    it('should flag hostNetwork at the field', () => {
      expect(check(hostNetwork, source)).toEqual([
        {
          ruleId: 'WK8207',
          message: 'Pod should not use hostNetwork: true, it bypasses network policies',
          file: 'resources.ts',
          line: 3,
          column: 5,
          severity: 'warning',
        },
      ]);
    });

    it('should ignore a host namespace set to false', () => {
      expect(check(hostPID, source)).toEqual([]);
    });

    it('should flag hostPID set to true', () => {
      const issues = check(
        hostPID,
        `export const pod = new core.Pod({
  spec: {
    hostPID: true,
    containers: [],
  },
});
`
      );
      expect(issues.map(({ line, column, message }) => ({ line, column, message }))).toEqual([
        { line: 3, column: 5, message: 'Pod should not use hostPID: true, it allows viewing host processes' },
      ]);
    });

    it('should flag hostIPC', () => {
      const issues = check(hostIPC, source);
      expect(issues.map((issue) => issue.message)).toEqual([
        'Pod should not use hostIPC: true, it enables IPC with host processes',
      ]);
    });

    it('should derive kebab-case rule names', () => {
      expect([hostNetwork.name, hostPID.name, hostIPC.name]).toEqual(['no-host-network', 'no-host-pid', 'no-host-ipc']);
    });
  });
});
