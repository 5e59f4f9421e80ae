/**
 * Error codes for kubeweave operations.
 */
export type KubeweaveErrorCode =
  | 'PARSE_ERROR'
  | 'FIX_ERROR'
  | 'CONFIG_ERROR'
  | 'PATH_NOT_FOUND';

export class KubeweaveError extends Error {
  constructor(
    message: string,
    public readonly code: KubeweaveErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'KubeweaveError';
  }
}

/**
 * Thrown when a source file cannot be turned into a syntax tree.
 * Fatal for that file only.
 */
export class ParseError extends KubeweaveError {
  constructor(
    filePath: string,
    public readonly diagnostics: string[]
  ) {
    super(`Failed to parse ${filePath}: ${diagnostics.join('; ')}`, 'PARSE_ERROR', filePath);
    this.name = 'ParseError';
  }
}

export class FixError extends KubeweaveError {
  constructor(message: string, filePath?: string) {
    super(message, 'FIX_ERROR', filePath);
    this.name = 'FixError';
  }
}

export class ConfigError extends KubeweaveError {
  constructor(message: string, filePath?: string) {
    super(message, 'CONFIG_ERROR', filePath);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
