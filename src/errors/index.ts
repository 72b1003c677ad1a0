// Base error class for all sectionconf errors
export class SectionconfError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'SectionconfError';
  }
}

export type ConfigErrorKind =
  | 'grammar'
  | 'duplicate-section'
  | 'duplicate-subsection'
  | 'schema'
  | 'conversion'
  | 'domain'
  | 'invariant'
  | 'environment';

// Configuration error for anything wrong with the configuration document
export class ConfigError extends SectionconfError {
  constructor(message: string, public readonly kind: ConfigErrorKind) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Validation error for CLI option failures
export class ValidationError extends SectionconfError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export function isConfigError(e: unknown, kind?: ConfigErrorKind): e is ConfigError {
  return e instanceof ConfigError && (kind === undefined || e.kind === kind);
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
