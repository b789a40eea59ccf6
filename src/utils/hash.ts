/**
 * @fileoverview Content Hashing Utilities
 *
 * Content addresses are lowercase hex digests of the bytes being stored. The
 * digest itself comes from Node's `crypto` module; this module only fixes the
 * output format and exposes the length so callers can validate addresses.
 *
 * @module utils/hash
 *
 * @example
 * ```typescript
 * import { createHasher } from './utils/hash'
 *
 * const hasher = createHasher('sha1')
 * hasher.hash(new TextEncoder().encode('hello'))
 * // 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d'
 * ```
 */

import * as crypto from 'crypto'

/**
 * Supported digest algorithms.
 */
export type HashAlgorithm = 'sha1' | 'sha256'

/**
 * A fixed-length content hashing function.
 */
export interface Hasher {
  /** Digest algorithm name */
  readonly algorithm: HashAlgorithm
  /** Length of every produced hash in hex characters */
  readonly length: number
  /** Hash raw bytes to a lowercase hex string */
  hash(data: Uint8Array): string
}

const HASH_LENGTHS: Record<HashAlgorithm, number> = {
  sha1: 40,
  sha256: 64,
}

/**
 * Hash bytes with the given algorithm.
 */
export function hashBytes(algorithm: HashAlgorithm, data: Uint8Array): string {
  return crypto.createHash(algorithm).update(data).digest('hex')
}

/**
 * Create a {@link Hasher} for an algorithm.
 */
export function createHasher(algorithm: HashAlgorithm): Hasher {
  return {
    algorithm,
    length: HASH_LENGTHS[algorithm],
    hash: (data) => hashBytes(algorithm, data),
  }
}

/**
 * Check that a string is a well-formed content address.
 *
 * @param value - Candidate hash
 * @param length - Required length
 * @param charset - Allowed characters
 */
export function isValidHash(value: string, length: number, charset: string): boolean {
  if (value.length !== length) {
    return false
  }
  for (const char of value) {
    if (!charset.includes(char)) {
      return false
    }
  }
  return true
}
