/**
 * Typed errors. Callers branch on `code` rather than on message text.
 */

export type WindfieldErrorCode = 'CONFIGURATION' | 'INDEX_NOT_BUILT' | 'INDEX_STALE';

export class WindfieldError extends Error {
  readonly code: WindfieldErrorCode;

  constructor(code: WindfieldErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid construction parameters: LOD tables, index options, bounds. */
export class ConfigurationError extends WindfieldError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('CONFIGURATION', `${field}: ${message}`);
    this.field = field;
  }
}

/** A query reached an index that was never built. */
export class IndexNotBuiltError extends WindfieldError {
  readonly index: string;

  constructor(index: string) {
    super('INDEX_NOT_BUILT', `${index} was queried before build()`);
    this.index = index;
  }
}

/** A query reached an invalidated index that has nothing to rebuild from. */
export class IndexStaleError extends WindfieldError {
  readonly index: string;

  constructor(index: string) {
    super('INDEX_STALE', `${index} was invalidated and has no source to rebuild from`);
    this.index = index;
  }
}

export function isWindfieldError(value: unknown): value is WindfieldError {
  return value instanceof WindfieldError;
}
