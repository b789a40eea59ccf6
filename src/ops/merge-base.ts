/**
 * @fileoverview Merge Base Finding Operations
 *
 * Finds the lowest common ancestor of two commits in the parent graph.
 *
 * ## Algorithm
 *
 * 1. If both commits are the same, that commit is the answer.
 * 2. Collect every ancestor of `a` (itself included) with an explicit stack,
 *    following all parent edges and visiting each commit once.
 * 3. Walk outward from `b` breadth-first; the first commit reached that is
 *    in `a`'s ancestor set is the merge base. Ties are broken by closeness
 *    to `b`.
 *
 * Every commit visited must load. A missing or corrupt commit fails the
 * whole search rather than yielding an answer computed from a partial graph.
 *
 * ## Usage Example
 *
 * ```typescript
 * import { findCommonAncestor } from './ops/merge-base'
 *
 * const base = await findCommonAncestor(store, headHash, targetHash)
 * if (base === null) {
 *   console.log('Unrelated histories')
 * }
 * ```
 *
 * @module ops/merge-base
 */

import { withContext } from '../core/errors'
import type { Commit } from '../types/objects'
import type { CommitProvider } from '../types/storage'

export type { CommitProvider }

// ============================================================================
// Helper Functions
// ============================================================================

async function loadCommit(provider: CommitProvider, hash: string): Promise<Commit> {
  try {
    return await provider.getCommit(hash)
  } catch (err) {
    throw withContext(err, `Failed while walking ancestors at commit ${hash}`)
  }
}

/**
 * Gets all ancestors of a commit (including itself).
 *
 * Uses an explicit stack so deep histories cannot overflow the call stack.
 *
 * @throws the underlying load failure, with context, if any commit fails to load
 */
export async function getAncestors(provider: CommitProvider, hash: string): Promise<Set<string>> {
  const visited = new Set<string>()
  const stack: string[] = [hash]

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break
    if (visited.has(current)) {
      continue
    }
    visited.add(current)

    const commit = await loadCommit(provider, current)
    for (const parent of commit.parents) {
      if (!visited.has(parent)) {
        stack.push(parent)
      }
    }
  }

  return visited
}

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Find the lowest common ancestor of two commits, or null when their
 * histories are disjoint.
 *
 * @example
 * ```ts
 * // A <- B <- C
 * await findCommonAncestor(provider, B, C) // B
 * ```
 */
export async function findCommonAncestor(provider: CommitProvider, a: string, b: string): Promise<string | null> {
  if (a === b) {
    return a
  }

  const ancestorsOfA = await getAncestors(provider, a)

  const visited = new Set<string>([b])
  const queue: string[] = [b]
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head]
    if (ancestorsOfA.has(current)) {
      return current
    }

    const commit = await loadCommit(provider, current)
    for (const parent of commit.parents) {
      if (!visited.has(parent)) {
        visited.add(parent)
        queue.push(parent)
      }
    }
  }

  return null
}
