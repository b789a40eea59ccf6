/**
 * @fileoverview Ref Records
 *
 * A ref is either a literal content address ({@link HashRef}, "detached") or
 * a named indirection ({@link SymRef}) such as `HEAD` or `refs/heads/main`.
 *
 * On disk a ref record is a single line:
 *
 * ```
 * ref: refs/heads/main      symbolic
 * 3b18e512dba79e4c8300dd08aeb37f8e728b8dad   direct
 * ```
 *
 * An empty file is an unborn branch and reads as `null`.
 *
 * @module refs/ref
 */

import type { ResolvedConfig } from '../core/config'

// ============================================================================
// Types
// ============================================================================

/**
 * A literal content address.
 */
export interface HashRef {
  readonly type: 'hash'
  readonly hash: string
}

/**
 * A named indirection resolved by reading the record it names.
 */
export interface SymRef {
  readonly type: 'symbolic'
  /** Full ref name relative to the metadata directory, e.g. `refs/heads/main` */
  readonly target: string
}

export type Ref = HashRef | SymRef

// ============================================================================
// Constructors
// ============================================================================

export function hashRef(hash: string): HashRef {
  return { type: 'hash', hash }
}

export function symRef(target: string): SymRef {
  return { type: 'symbolic', target }
}

/**
 * Full ref name of a branch, e.g. `refs/heads/main`.
 */
export function branchRefName(config: ResolvedConfig, name: string): string {
  return `${config.refsDir}/${config.headsDir}/${name}`
}

/**
 * Full ref name of a tag, e.g. `refs/tags/v1`.
 */
export function tagRefName(config: ResolvedConfig, name: string): string {
  return `${config.refsDir}/${config.tagsDir}/${name}`
}

export function branchRef(config: ResolvedConfig, name: string): SymRef {
  return symRef(branchRefName(config, name))
}

export function tagRef(config: ResolvedConfig, name: string): SymRef {
  return symRef(tagRefName(config, name))
}

/**
 * Short branch name of a full ref name, or null if it is not a branch ref.
 */
export function shortBranchName(config: ResolvedConfig, refName: string): string | null {
  const prefix = `${config.refsDir}/${config.headsDir}/`
  return refName.startsWith(prefix) ? refName.slice(prefix.length) : null
}

/**
 * Human-readable form of a ref.
 */
export function formatRef(ref: Ref | null): string {
  if (ref === null) return '(unborn)'
  return ref.type === 'hash' ? ref.hash : ref.target
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Parse ref file content. Returns null for an empty (unborn) record.
 *
 * @example
 * ```typescript
 * parseRefContent('ref: refs/heads/main\n')  // { type: 'symbolic', target: 'refs/heads/main' }
 * parseRefContent('')                        // null
 * ```
 */
export function parseRefContent(content: string): Ref | null {
  const trimmed = content.trim()
  if (!trimmed) {
    return null
  }
  if (trimmed.startsWith('ref:')) {
    return symRef(trimmed.slice(4).trim())
  }
  return hashRef(trimmed)
}

/**
 * Serialize a ref to file content. `null` serializes to an empty record.
 */
export function serializeRefContent(ref: Ref | null): string {
  if (ref === null) {
    return ''
  }
  if (ref.type === 'symbolic') {
    return `ref: ${ref.target}\n`
  }
  return `${ref.hash}\n`
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a ref name (a branch or tag name, or a full ref path).
 *
 * Names must be non-empty and may not contain `..`, `@{`, control
 * characters, space or any of `~^:?*[]\`. No path component may be empty,
 * start or end with `.`, and the name may not end with `/` or `.lock`.
 */
export function isValidRefName(name: string): boolean {
  if (!name || name === '@') {
    return false
  }
  if (name.endsWith('/') || name.endsWith('.lock')) {
    return false
  }
  if (name.includes('..') || name.includes('@{')) {
    return false
  }
  if (/[\x00-\x1f\x7f ~^:?*[\]\\]/.test(name)) {
    return false
  }

  for (const component of name.split('/')) {
    if (component.length === 0 || component.startsWith('.') || component.endsWith('.')) {
      return false
    }
  }

  return true
}
