import fg from 'fast-glob';
import { statSync } from 'fs';
import { resolve } from 'path';
import { KubeweaveConfig } from '../types.js';

export interface DiscoverOptions {
  include?: string[];
  exclude?: string[];
}

const DEFAULTS = KubeweaveConfig.parse({});

/**
 * Source files under `root`, sorted, as absolute paths. A file path is
 * returned on its own without matching it against the patterns.
 */
export async function discoverFiles(root: string, options: DiscoverOptions = {}): Promise<string[]> {
  const absolute = resolve(root);
  if (statSync(absolute).isFile()) {
    return [absolute];
  }

  const files = await fg(options.include ?? DEFAULTS.include, {
    cwd: absolute,
    ignore: options.exclude ?? DEFAULTS.exclude,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });

  return files.sort();
}
