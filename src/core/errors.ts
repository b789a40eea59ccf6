/**
 * @fileoverview Repository Error Classes
 *
 * Every failure raised by the engine is a {@link RepositoryError} carrying one
 * of a closed set of codes. Lower layers (object store, ref resolver) raise the
 * narrow subclasses directly; operation layers (merge, checkout, log) re-raise
 * them through {@link withContext} so the message says what was being done
 * while the class and `cause` still identify what actually failed.
 *
 * @module core/errors
 *
 * @example
 * ```typescript
 * try {
 *   await repo.checkout('feature')
 * } catch (err) {
 *   if (err instanceof ConflictError) {
 *     console.error('Refusing to discard work in:', err.paths)
 *   }
 * }
 * ```
 */

/**
 * Error codes of the repository error taxonomy.
 */
export type RepositoryErrorCode =
  | 'NOT_FOUND'
  | 'CORRUPT'
  | 'INVALID_REFERENCE'
  | 'CONFLICT'
  | 'INVALID_ARGUMENT'
  | 'ALREADY_IN_PROGRESS'

/**
 * Base class for all repository errors.
 */
export class RepositoryError extends Error {
  public readonly code: RepositoryErrorCode

  constructor(code: RepositoryErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RepositoryError'
    this.code = code
    // Maintains proper stack trace for where the error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * A ref, object, branch or repository is absent.
 */
export class NotFoundError extends RepositoryError {
  constructor(message: string, options?: ErrorOptions) {
    super('NOT_FOUND', message, options)
    this.name = 'NotFoundError'
  }
}

/**
 * Error thrown when no object is stored under a hash.
 */
export class ObjectNotFoundError extends NotFoundError {
  public readonly hash: string

  constructor(hash: string, options?: ErrorOptions) {
    super(`Object not found: ${hash}`, options)
    this.name = 'ObjectNotFoundError'
    this.hash = hash
  }
}

/**
 * Error thrown when a named ref file does not exist.
 */
export class RefNotFoundError extends NotFoundError {
  public readonly refName: string

  constructor(refName: string, options?: ErrorOptions) {
    super(`Reference not found: ${refName}`, options)
    this.name = 'RefNotFoundError'
    this.refName = refName
  }
}

/**
 * Error thrown by any operation that needs an initialized repository.
 */
export class RepositoryNotFoundError extends NotFoundError {
  public readonly repoPath: string

  constructor(repoPath: string) {
    super(`Repository not initialized at ${repoPath}`)
    this.name = 'RepositoryNotFoundError'
    this.repoPath = repoPath
  }
}

/**
 * Error thrown when stored bytes fail to decode as the claimed kind.
 */
export class CorruptObjectError extends RepositoryError {
  public readonly hash?: string
  public readonly objectKind?: string

  constructor(message: string, details: { hash?: string; objectKind?: string } = {}, options?: ErrorOptions) {
    super('CORRUPT', message, options)
    this.name = 'CorruptObjectError'
    this.hash = details.hash
    this.objectKind = details.objectKind
  }
}

/**
 * Error thrown when a string is neither a known ref nor a well-formed hash.
 */
export class InvalidReferenceError extends RepositoryError {
  public readonly reference?: string

  constructor(message: string, reference?: string, options?: ErrorOptions) {
    super('INVALID_REFERENCE', message, options)
    this.name = 'InvalidReferenceError'
    this.reference = reference
  }
}

/**
 * Error thrown when an operation would discard uncommitted or untracked work,
 * or when a name collides with an existing branch or tag.
 */
export class ConflictError extends RepositoryError {
  public readonly paths: readonly string[]

  constructor(message: string, paths: readonly string[] = [], options?: ErrorOptions) {
    super('CONFLICT', message, options)
    this.name = 'ConflictError'
    this.paths = paths
  }
}

/**
 * Error thrown for an empty required string, a non-directory path, or an
 * attempt to delete the last remaining branch.
 */
export class InvalidArgumentError extends RepositoryError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_ARGUMENT', message, options)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Error thrown when a merge is started while another one is in progress.
 */
export class MergeInProgressError extends RepositoryError {
  constructor(message: string = 'Merge already in progress', options?: ErrorOptions) {
    super('ALREADY_IN_PROGRESS', message, options)
    this.name = 'MergeInProgressError'
  }
}

/**
 * Type guard for Node.js system errors such as ENOENT.
 */
export function isSystemError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) {
    return false
  }
  return code === undefined || error.code === code
}

/**
 * Re-raise a failure with operation-level context.
 *
 * The returned error has the same class as `error` (so `instanceof` checks
 * still work), a message of the form `<context>: <original message>`, and the
 * original error as its `cause`. A missing file surfaces as
 * {@link NotFoundError}; any other foreign error keeps its own class.
 *
 * @param error - The underlying failure
 * @param context - What the operation was doing when it failed
 */
export function withContext(error: unknown, context: string): Error {
  const cause = error instanceof Error ? error : new Error(String(error))
  const message = `${context}: ${cause.message}`

  if (cause instanceof RepositoryError) {
    switch (cause.code) {
      case 'NOT_FOUND':
        return new NotFoundError(message, { cause })
      case 'CORRUPT':
        return cause instanceof CorruptObjectError
          ? new CorruptObjectError(message, { hash: cause.hash, objectKind: cause.objectKind }, { cause })
          : new CorruptObjectError(message, {}, { cause })
      case 'INVALID_REFERENCE':
        return new InvalidReferenceError(
          message,
          cause instanceof InvalidReferenceError ? cause.reference : undefined,
          { cause }
        )
      case 'CONFLICT':
        return new ConflictError(message, cause instanceof ConflictError ? cause.paths : [], { cause })
      case 'INVALID_ARGUMENT':
        return new InvalidArgumentError(message, { cause })
      case 'ALREADY_IN_PROGRESS':
        return new MergeInProgressError(message, { cause })
    }
  }

  if (isSystemError(cause, 'ENOENT')) {
    return new NotFoundError(message, { cause })
  }

  const wrapped = new Error(message, { cause })
  wrapped.name = cause.name
  return wrapped
}
