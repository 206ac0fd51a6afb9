/**
 * RAG Error System
 *
 * Every failure the engine reports is a RagError subclass carrying a
 * category, so callers can tell input problems from transient provider
 * trouble and from storage faults without parsing messages.
 */

// ============================================================================
// ERROR CATEGORIES
// ============================================================================

export enum ErrorCategory {
  /** The caller sent something unusable: format, config, unknown session */
  INPUT = 'input',
  /** A provider was slow or failed; the same call may succeed later */
  TRANSIENT = 'transient',
  /** Storage or index state is broken */
  SYSTEM = 'system',
}

export type RagErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'INVALID_CONFIGURATION'
  | 'SESSION_NOT_FOUND'
  | 'INDEX_NOT_FOUND'
  | 'INDEX_CORRUPT'
  | 'EMBEDDING_MODEL_MISMATCH'
  | 'INDEX_PERSISTENCE_FAILED'
  | 'STORAGE_FAILED'
  | 'EMBEDDING_FAILED'
  | 'PROVIDER_TIMEOUT'
  | 'GENERATION_FAILED';

export interface SerializedRagError {
  name: string;
  code: RagErrorCode;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  details: Record<string, unknown>;
  timestamp: number;
}

interface RagErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

// ============================================================================
// BASE CLASS
// ============================================================================

export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;
  abstract readonly category: ErrorCategory;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details ?? {};
    this.timestamp = Date.now();

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get retryable(): boolean {
    return this.category === ErrorCategory.TRANSIENT;
  }

  serialize(): SerializedRagError {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class UnsupportedFormatError extends RagError {
  readonly code = 'UNSUPPORTED_FORMAT';
  readonly category = ErrorCategory.INPUT;

  constructor(
    public readonly filename: string,
    public readonly extension: string,
    supported: readonly string[]
  ) {
    super(
      `Unsupported file format "${extension || '(none)'}" for ${filename}. Supported: ${supported.join(', ')}`,
      { details: { filename, extension } }
    );
  }
}

export class ExtractionError extends RagError {
  readonly code = 'EXTRACTION_FAILED';
  readonly category = ErrorCategory.INPUT;

  constructor(
    public readonly filename: string,
    cause: unknown
  ) {
    super(`Could not extract text from ${filename}: ${describeCause(cause)}`, {
      details: { filename },
      cause,
    });
  }
}

export class InvalidConfigurationError extends RagError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly category = ErrorCategory.INPUT;

  constructor(
    public readonly field: string,
    reason: string
  ) {
    super(`Invalid configuration for "${field}": ${reason}`, {
      details: { field },
    });
  }
}

export class SessionNotFoundError extends RagError {
  readonly code: RagErrorCode = 'SESSION_NOT_FOUND';
  readonly category = ErrorCategory.INPUT;

  constructor(
    public readonly sessionId: string,
    message = `Session "${sessionId}" not found`
  ) {
    super(message, { details: { sessionId } });
  }
}

/**
 * The session exists but nothing was ingested into it yet. Subclasses
 * SessionNotFoundError so "query before indexing" is handled as one case.
 */
export class IndexNotFoundError extends SessionNotFoundError {
  override readonly code: RagErrorCode = 'INDEX_NOT_FOUND';

  constructor(sessionId: string) {
    super(sessionId, `Session "${sessionId}" has no index yet; ingest documents first`);
  }
}

export class EmbeddingModelMismatchError extends RagError {
  readonly code = 'EMBEDDING_MODEL_MISMATCH';
  readonly category = ErrorCategory.INPUT;

  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      `Index was built with embedding model "${expected}" but "${actual}" is configured`,
      { details: { expected, actual } }
    );
  }
}

// ============================================================================
// SYSTEM ERRORS
// ============================================================================

export class IndexCorruptError extends RagError {
  readonly code = 'INDEX_CORRUPT';
  readonly category = ErrorCategory.SYSTEM;

  constructor(
    public readonly indexPath: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Index at ${indexPath} is corrupt: ${reason}`, {
      details: { indexPath },
      cause,
    });
  }
}

export class IndexPersistenceError extends RagError {
  readonly code = 'INDEX_PERSISTENCE_FAILED';
  readonly category = ErrorCategory.SYSTEM;

  constructor(
    public readonly indexPath: string,
    cause: unknown
  ) {
    super(`Failed to persist index at ${indexPath}: ${describeCause(cause)}`, {
      details: { indexPath },
      cause,
    });
  }
}

export class StorageError extends RagError {
  readonly code = 'STORAGE_FAILED';
  readonly category = ErrorCategory.SYSTEM;

  constructor(
    public readonly storagePath: string,
    cause: unknown
  ) {
    super(`Storage operation failed at ${storagePath}: ${describeCause(cause)}`, {
      details: { storagePath },
      cause,
    });
  }
}

// ============================================================================
// TRANSIENT (PROVIDER) ERRORS
// ============================================================================

export class EmbeddingError extends RagError {
  readonly code = 'EMBEDDING_FAILED';
  readonly category = ErrorCategory.TRANSIENT;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class ProviderTimeoutError extends RagError {
  readonly code = 'PROVIDER_TIMEOUT';
  readonly category = ErrorCategory.TRANSIENT;

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, {
      details: { operation, timeoutMs },
    });
  }
}

export class GenerationError extends RagError {
  readonly code = 'GENERATION_FAILED';
  readonly category = ErrorCategory.TRANSIENT;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isRagError(value: unknown): value is RagError {
  return value instanceof RagError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Pass RagErrors through untouched, wrap anything else with the factory.
 */
export function toRagError(
  value: unknown,
  wrap: (cause: unknown) => RagError
): RagError {
  return isRagError(value) ? value : wrap(value);
}

/**
 * Node system errors carry a string code (ENOENT, EEXIST, ...).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
