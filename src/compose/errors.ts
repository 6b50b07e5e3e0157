/**
 * Errors raised while indexing, resolving and composing components
 */

export type TexweaveErrorKind =
  | 'duplicate-filename'
  | 'not-found'
  | 'circular-include'
  | 'missing-configuration'
  | 'configuration';

/**
 * Base class; `kind` lets callers branch without instanceof chains
 */
export class TexweaveError extends Error {
  constructor(public readonly kind: TexweaveErrorKind, message: string) {
    super(message);
    this.name = 'TexweaveError';
  }
}

/**
 * Two components share a filename somewhere under the components root
 */
export class DuplicateFilenameError extends TexweaveError {
  constructor(
    public readonly filename: string,
    public readonly firstPath: string,
    public readonly secondPath: string
  ) {
    super(
      'duplicate-filename',
      `Duplicate filename '${filename}': ${firstPath} and ${secondPath}`
    );
    this.name = 'DuplicateFilenameError';
  }
}

export class ComponentNotFoundError extends TexweaveError {
  constructor(public readonly ref: string, detail: string) {
    super('not-found', `Component '${ref}' ${detail}`);
    this.name = 'ComponentNotFoundError';
  }
}

/**
 * A component includes itself along one expansion branch
 */
export class CircularIncludeError extends TexweaveError {
  constructor(public readonly filePath: string, public readonly chain: string[]) {
    super(
      'circular-include',
      `Circular include detected with file: ${filePath} (chain: ${[...chain, filePath].join(' -> ')})`
    );
    this.name = 'CircularIncludeError';
  }
}

/**
 * A target build was requested without the configuration it needs
 */
export class MissingConfigurationError extends TexweaveError {
  constructor(message: string) {
    super('missing-configuration', message);
    this.name = 'MissingConfigurationError';
  }
}

/**
 * The workspace or pointer file is missing or malformed
 */
export class ConfigurationError extends TexweaveError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Check whether an unknown thrown value is one of ours
 */
export function isTexweaveError(error: unknown): error is TexweaveError {
  return error instanceof TexweaveError;
}
