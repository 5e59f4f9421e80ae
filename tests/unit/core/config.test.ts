import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  configPath,
  loadConfig,
  parseDisabledRules,
  parseSeverity,
  saveConfig,
  toLintConfig,
} from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { KubeweaveConfig } from '../../../src/types.js';
import { makeTempDir } from '../../helpers.js';

describe('core/config', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(text: string): void {
    mkdirSync(join(dir, '.kubeweave'), { recursive: true });
    writeFileSync(configPath(dir), text);
  }

  describe('loadConfig', () => {
    it('should return defaults without a config file', () => {
      const config = loadConfig(dir);

      expect(config.include).toEqual(['**/*.ts']);
      expect(config.disabledRules).toEqual([]);
      expect(config.minSeverity).toBe('info');
      expect(config.format).toBe('text');
    });

    it('should read values and fill in defaults', () => {
      writeConfig('minSeverity: warning\ndisabledRules:\n  - WK8401\n');
      const config = loadConfig(dir);

      expect(config.minSeverity).toBe('warning');
      expect(config.disabledRules).toEqual(['WK8401']);
      expect(config.format).toBe('text');
    });

    it('should treat an empty file as defaults', () => {
      writeConfig('');
      expect(loadConfig(dir)).toEqual(KubeweaveConfig.parse({}));
    });

    it('should reject an unknown severity', () => {
      writeConfig('minSeverity: fatal\n');
      expect(() => loadConfig(dir)).toThrow(ConfigError);
      expect(() => loadConfig(dir)).toThrow(/minSeverity/);
    });

    it('should reject invalid YAML', () => {
      writeConfig('include: [unclosed\n');
      expect(() => loadConfig(dir)).toThrow(/Invalid YAML/);
    });
  });

  describe('saveConfig', () => {
    it('should write a config that loads back unchanged', () => {
      const config = KubeweaveConfig.parse({ disabledRules: ['WK8002'], format: 'json' });

      expect(saveConfig(dir, config)).toBe(configPath(dir));
      expect(loadConfig(dir)).toEqual(config);
    });
  });

  describe('toLintConfig', () => {
    it('should keep only rule selection', () => {
      const config = KubeweaveConfig.parse({ disabledRules: ['WK8002'], minSeverity: 'error' });
      expect(toLintConfig(config)).toEqual({ disabledRules: ['WK8002'], minSeverity: 'error' });
    });
  });

  describe('parseSeverity', () => {
    it('should accept any case and surrounding spaces', () => {
      expect(parseSeverity(' WARNING ')).toBe('warning');
    });

    it('should reject unknown levels', () => {
      expect(() => parseSeverity('fatal')).toThrow('Unknown severity "fatal" (expected one of: error, warning, info)');
    });
  });

  describe('parseDisabledRules', () => {
    it('should split, trim and uppercase ids', () => {
      expect(parseDisabledRules(' wk8001, WK8105 ,')).toEqual(['WK8001', 'WK8105']);
    });

    it('should return nothing for an absent list', () => {
      expect(parseDisabledRules(undefined)).toEqual([]);
    });
  });
});
