import { describe, it, expect } from 'vitest'
import {
  ConflictError,
  CorruptObjectError,
  InvalidArgumentError,
  InvalidReferenceError,
  MergeInProgressError,
  NotFoundError,
  ObjectNotFoundError,
  RefNotFoundError,
  RepositoryError,
  RepositoryNotFoundError,
  isSystemError,
  withContext,
} from '../../src/core/errors'

// ============================================================================
// Test Helpers
// ============================================================================

function systemError(code: string, message: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message)
  err.code = code
  return err
}

describe('error hierarchy', () => {
  it('gives every subclass its code and name', () => {
    const cases: Array<[RepositoryError, string, string]> = [
      [new NotFoundError('gone'), 'NOT_FOUND', 'NotFoundError'],
      [new CorruptObjectError('bad'), 'CORRUPT', 'CorruptObjectError'],
      [new InvalidReferenceError('nope'), 'INVALID_REFERENCE', 'InvalidReferenceError'],
      [new ConflictError('clash'), 'CONFLICT', 'ConflictError'],
      [new InvalidArgumentError('empty'), 'INVALID_ARGUMENT', 'InvalidArgumentError'],
      [new MergeInProgressError(), 'ALREADY_IN_PROGRESS', 'MergeInProgressError'],
    ]

    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(RepositoryError)
      expect(error.code).toBe(code)
      expect(error.name).toBe(name)
    }
  })

  it('makes the specific not-found errors NotFoundErrors', () => {
    const objectError = new ObjectNotFoundError('ab'.repeat(20))
    expect(objectError).toBeInstanceOf(NotFoundError)
    expect(objectError.message).toBe(`Object not found: ${'ab'.repeat(20)}`)
    expect(objectError.hash).toBe('ab'.repeat(20))

    const refError = new RefNotFoundError('refs/heads/main')
    expect(refError).toBeInstanceOf(NotFoundError)
    expect(refError.message).toBe('Reference not found: refs/heads/main')

    const repoError = new RepositoryNotFoundError('/work/.arbor')
    expect(repoError).toBeInstanceOf(NotFoundError)
    expect(repoError.message).toBe('Repository not initialized at /work/.arbor')
  })

  it('defaults the merge-in-progress message', () => {
    expect(new MergeInProgressError().message).toBe('Merge already in progress')
  })
})

describe('isSystemError', () => {
  it('matches errors carrying a code', () => {
    const err = systemError('ENOENT', 'no such file')
    expect(isSystemError(err)).toBe(true)
    expect(isSystemError(err, 'ENOENT')).toBe(true)
    expect(isSystemError(err, 'EEXIST')).toBe(false)
  })

  it('rejects plain errors and non-errors', () => {
    expect(isSystemError(new Error('plain'))).toBe(false)
    expect(isSystemError('ENOENT')).toBe(false)
    expect(isSystemError(null)).toBe(false)
  })
})

describe('withContext', () => {
  it('keeps the class and prefixes the message', () => {
    const cause = new ConflictError('two files', ['a.txt', 'b.txt'])
    const wrapped = withContext(cause, 'Cannot checkout')

    expect(wrapped).toBeInstanceOf(ConflictError)
    expect(wrapped.message).toBe('Cannot checkout: two files')
    expect(wrapped.cause).toBe(cause)
    expect(wrapped instanceof ConflictError && wrapped.paths).toEqual(['a.txt', 'b.txt'])
  })

  it('keeps corrupt-object details', () => {
    const cause = new CorruptObjectError('bad header', { hash: 'f'.repeat(40), objectKind: 'tree' })
    const wrapped = withContext(cause, 'Error loading subtree')

    expect(wrapped).toBeInstanceOf(CorruptObjectError)
    expect(wrapped instanceof CorruptObjectError && wrapped.hash).toBe('f'.repeat(40))
    expect(wrapped instanceof CorruptObjectError && wrapped.objectKind).toBe('tree')
  })

  it('turns a specific not-found error into a NotFoundError', () => {
    const wrapped = withContext(new ObjectNotFoundError('a'.repeat(40)), 'Error loading commit')

    expect(wrapped).toBeInstanceOf(NotFoundError)
    expect(wrapped).not.toBeInstanceOf(ObjectNotFoundError)
    expect(wrapped.message).toBe(`Error loading commit: Object not found: ${'a'.repeat(40)}`)
  })

  it('maps a missing file to NotFoundError', () => {
    const wrapped = withContext(systemError('ENOENT', 'no such file'), 'Reading ref')

    expect(wrapped).toBeInstanceOf(NotFoundError)
    expect(wrapped.message).toBe('Reading ref: no such file')
  })

  it('keeps the name of a foreign error', () => {
    const wrapped = withContext(new TypeError('oops'), 'Parsing')

    expect(wrapped).not.toBeInstanceOf(RepositoryError)
    expect(wrapped.name).toBe('TypeError')
    expect(wrapped.message).toBe('Parsing: oops')
  })

  it('wraps non-error values', () => {
    const wrapped = withContext('boom', 'Walking')
    expect(wrapped.message).toBe('Walking: boom')
    expect(wrapped.cause).toBeInstanceOf(Error)
  })
})
