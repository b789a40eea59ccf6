/**
 * @fileoverview Repository Configuration
 *
 * Layout names and the hash algorithm are resolved once, when a repository
 * is opened, and the resulting {@link ResolvedConfig} is passed explicitly to
 * every component that needs it.
 *
 * @module core/config
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ repoDirName: '.vault', hashAlgorithm: 'sha256' })
 * config.hashLength // 64
 * ```
 */

import { InvalidArgumentError } from './errors'
import { createHasher, type HashAlgorithm, type Hasher } from '../utils/hash'

// ============================================================================
// Types
// ============================================================================

/**
 * User-facing configuration. Every field is optional and falls back to
 * {@link DEFAULT_CONFIG}.
 */
export interface RepositoryConfig {
  /** Name of the metadata directory inside the working directory */
  repoDirName?: string
  /** Object store directory, relative to the metadata directory */
  objectsDir?: string
  /** Ref root directory, relative to the metadata directory */
  refsDir?: string
  /** Branch directory, relative to the ref root */
  headsDir?: string
  /** Tag directory, relative to the ref root */
  tagsDir?: string
  /** HEAD pointer file name */
  headFile?: string
  /** Merge-in-progress marker directory name */
  mergeDir?: string
  /** Branch created by `init` */
  defaultBranch?: string
  /** Content hash algorithm */
  hashAlgorithm?: HashAlgorithm
}

/**
 * Fully resolved configuration with derived hash parameters.
 */
export interface ResolvedConfig extends Required<RepositoryConfig> {
  /** Length of every content address (hex characters) */
  hashLength: number
  /** Characters allowed in a content address */
  hashCharset: string
  /** Hash function used for content addressing */
  hasher: Hasher
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: Readonly<Required<RepositoryConfig>> = {
  repoDirName: '.arbor',
  objectsDir: 'objects',
  refsDir: 'refs',
  headsDir: 'heads',
  tagsDir: 'tags',
  headFile: 'HEAD',
  mergeDir: 'merge',
  defaultBranch: 'main',
  hashAlgorithm: 'sha1',
}

export const HASH_CHARSET = '0123456789abcdef'

const DIRECTORY_KEYS = [
  'repoDirName',
  'objectsDir',
  'refsDir',
  'headsDir',
  'tagsDir',
  'headFile',
  'mergeDir',
] as const

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge overrides onto the defaults and derive the hash parameters.
 *
 * @throws InvalidArgumentError if a layout name is empty or contains a path separator
 */
export function resolveConfig(overrides: RepositoryConfig = {}): ResolvedConfig {
  const merged: Required<RepositoryConfig> = { ...DEFAULT_CONFIG }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && key in merged) {
      Object.assign(merged, { [key]: value })
    }
  }

  for (const key of DIRECTORY_KEYS) {
    const value = merged[key]
    if (!value || value.includes('/') || value.includes('\\') || value === '.' || value === '..') {
      throw new InvalidArgumentError(`Invalid ${key}: "${value}"`)
    }
  }

  if (!merged.defaultBranch) {
    throw new InvalidArgumentError('Default branch name is required')
  }

  if (merged.hashAlgorithm !== 'sha1' && merged.hashAlgorithm !== 'sha256') {
    throw new InvalidArgumentError(`Unsupported hash algorithm: ${String(merged.hashAlgorithm)}`)
  }

  const hasher = createHasher(merged.hashAlgorithm)

  return {
    ...merged,
    hashLength: hasher.length,
    hashCharset: HASH_CHARSET,
    hasher,
  }
}
