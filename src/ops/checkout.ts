/**
 * @fileoverview Working Directory Reconciliation
 *
 * Moves the working directory from the current HEAD tree to a target tree
 * without destroying work that exists only on disk.
 *
 * ## Phases
 *
 * 1. **Plan** (read-only): diff the HEAD tree against the working directory
 *    to find dirty tracked paths, compare the HEAD and target file sets to
 *    find removals and writes, and find untracked entries a write would
 *    clobber or follow (including symlinks and empty directories). Every blob the target needs is loaded here.
 * 2. **Check**: refuse with a {@link ConflictError} if anything is dirty or
 *    any untracked file is in the way. Nothing on disk has changed yet.
 * 3. **Apply**: remove tracked files the target lacks (pruning directories
 *    left empty), then write every target file whose content differs.
 *
 * Moving HEAD is the caller's job and happens after apply succeeds.
 *
 * @module ops/checkout
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { ConflictError, withContext } from '../core/errors'
import { EMPTY_TREE, type Tree } from '../types/objects'
import type { ObjectStore } from '../types/storage'
import { noopLogger, type Logger } from '../utils/logger'
import { flattenTree, type FsTreeSnapshot } from './tree-builder'
import { createTreeLookup, diffTrees } from './tree-diff'

// ============================================================================
// Types
// ============================================================================

export interface CheckoutInput {
  /** Working directory root */
  workingDir: string
  store: ObjectStore
  /** Snapshot of the working directory, taken before planning */
  worktree: FsTreeSnapshot
  /** Tree of the current HEAD commit, null when HEAD is unborn */
  currentTree: string | null
  /** Tree to check out, null for an unborn target */
  targetTree: string | null
  logger?: Logger
}

export interface CheckoutPlan {
  /** Tracked paths modified or deleted on disk since HEAD */
  dirty: string[]
  /** Untracked paths a write would overwrite or displace */
  collisions: string[]
  /** Tracked paths absent from the target, in removal order */
  removals: string[]
  /** Target files to write, path to blob hash, sorted by path */
  writes: Map<string, string>
  /** Content of every blob in `writes` */
  contents: Map<string, Uint8Array>
}

export interface CheckoutResult {
  written: string[]
  removed: string[]
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Tracked paths changed on disk relative to `currentTree`. Files that only
 * exist on disk are untracked and do not count.
 */
export async function findDirtyPaths(
  store: ObjectStore,
  worktree: FsTreeSnapshot,
  currentTree: string | null
): Promise<string[]> {
  const head: Tree = currentTree === null ? EMPTY_TREE : await store.getTree(currentTree)
  const diff = await diffTrees(head, worktree.tree, createTreeLookup(store), createTreeLookup(store, worktree.subtrees))

  return diff
    .leaves()
    .filter(({ node }) => node.change === 'modified' || node.change === 'removed' || node.change === 'movedTo')
    .map(({ path: nodePath }) => nodePath)
}

function ancestorsOf(relPath: string): string[] {
  const parts = relPath.split('/')
  const result: string[] = []
  for (let i = 1; i < parts.length; i++) {
    result.push(parts.slice(0, i).join('/'))
  }
  return result
}

/**
 * Untracked working files that writing `writes` would overwrite with other
 * content, or that sit where a target file needs a directory (and vice
 * versa).
 *
 * Entries in `special` (symlinks, sockets) have no content and collide with
 * any write at, above or beneath them. Entries in `emptyDirs` collide only
 * with a write at or above them, where a file would replace the directory.
 */
export function findUntrackedCollisions(
  working: ReadonlyMap<string, string>,
  tracked: ReadonlyMap<string, string>,
  writes: ReadonlyMap<string, string>,
  special: ReadonlySet<string> = new Set(),
  emptyDirs: ReadonlySet<string> = new Set()
): string[] {
  const untracked = new Map<string, string | null>()
  for (const [relPath, hash] of working) {
    if (!tracked.has(relPath)) {
      untracked.set(relPath, hash)
    }
  }
  for (const relPath of special) {
    if (!tracked.has(relPath)) {
      untracked.set(relPath, null)
    }
  }
  if (untracked.size === 0 && emptyDirs.size === 0) {
    return []
  }

  const collisions = new Set<string>()
  const targetDirs = new Set<string>()

  for (const [relPath, hash] of writes) {
    const existing = untracked.get(relPath)
    if (existing !== undefined && existing !== hash) {
      collisions.add(relPath)
    }
    for (const dir of ancestorsOf(relPath)) {
      targetDirs.add(dir)
      if (untracked.has(dir)) {
        collisions.add(dir)
      }
    }
  }

  for (const relPath of untracked.keys()) {
    if (targetDirs.has(relPath)) {
      collisions.add(relPath)
      continue
    }
    for (const dir of ancestorsOf(relPath)) {
      if (writes.has(dir)) {
        collisions.add(relPath)
        break
      }
    }
  }

  for (const relPath of emptyDirs) {
    if (writes.has(relPath) || ancestorsOf(relPath).some((dir) => writes.has(dir))) {
      collisions.add(relPath)
    }
  }

  return [...collisions].sort()
}

/**
 * Work out everything a checkout would do, without touching the disk.
 */
export async function planCheckout(input: CheckoutInput): Promise<CheckoutPlan> {
  const { store, worktree, currentTree, targetTree } = input

  try {
    const dirty = await findDirtyPaths(store, worktree, currentTree)
    const tracked = await flattenTree(store, currentTree)
    const target = await flattenTree(store, targetTree)

    const removals = [...tracked.keys()].filter((relPath) => !target.has(relPath)).sort()

    const writes = new Map<string, string>()
    for (const relPath of [...target.keys()].sort()) {
      const hash = target.get(relPath)
      if (hash !== undefined && worktree.files.get(relPath) !== hash) {
        writes.set(relPath, hash)
      }
    }

    const collisions = findUntrackedCollisions(worktree.files, tracked, writes, worktree.special, worktree.emptyDirs)

    const contents = new Map<string, Uint8Array>()
    for (const hash of writes.values()) {
      if (!contents.has(hash)) {
        contents.set(hash, await store.getBlob(hash))
      }
    }

    return { dirty, collisions, removals, writes, contents }
  } catch (err) {
    throw withContext(err, 'Cannot plan checkout')
  }
}

/**
 * Refuse a plan that would lose local work.
 *
 * @throws ConflictError listing the offending paths
 */
export function assertCheckoutSafe(plan: CheckoutPlan): void {
  if (plan.dirty.length > 0) {
    throw new ConflictError(
      `Your local changes to tracked files would be overwritten: ${plan.dirty.join(', ')}`,
      plan.dirty
    )
  }
  if (plan.collisions.length > 0) {
    throw new ConflictError(
      `Untracked working tree files would be overwritten: ${plan.collisions.join(', ')}`,
      plan.collisions
    )
  }
}

// ============================================================================
// Applying
// ============================================================================

async function pruneEmptyParents(workingDir: string, relPath: string): Promise<void> {
  let dir = path.dirname(relPath)
  while (dir !== '.' && dir !== '') {
    const absDir = path.join(workingDir, dir)
    try {
      const entries = await fs.readdir(absDir)
      if (entries.length > 0) {
        return
      }
      await fs.rmdir(absDir)
    } catch (err) {
      throw withContext(err, `Cannot remove directory ${dir}`)
    }
    dir = path.dirname(dir)
  }
}

/**
 * Carry out a checked plan.
 */
export async function applyCheckout(
  workingDir: string,
  plan: CheckoutPlan,
  logger: Logger = noopLogger
): Promise<CheckoutResult> {
  for (const relPath of plan.removals) {
    await fs.rm(path.join(workingDir, relPath), { force: true })
    logger.debug('Removed file', { path: relPath })
    await pruneEmptyParents(workingDir, relPath)
  }

  const written: string[] = []
  for (const [relPath, hash] of plan.writes) {
    const content = plan.contents.get(hash)
    if (content === undefined) {
      throw new Error(`Blob ${hash} for ${relPath} was not loaded`)
    }
    const absPath = path.join(workingDir, relPath)
    await fs.mkdir(path.dirname(absPath), { recursive: true })
    await fs.writeFile(absPath, content)
    written.push(relPath)
    logger.debug('Wrote file', { path: relPath, hash })
  }

  return { written, removed: [...plan.removals] }
}

/**
 * Plan, check and apply a checkout.
 *
 * @throws ConflictError if local work would be lost (nothing is changed)
 */
export async function reconcileWorkingDir(input: CheckoutInput): Promise<CheckoutResult> {
  const logger = (input.logger ?? noopLogger).child({ component: 'checkout' })
  const plan = await planCheckout(input)

  try {
    assertCheckoutSafe(plan)
  } catch (err) {
    if (err instanceof ConflictError) {
      logger.warn('Checkout refused', { paths: [...err.paths] })
    }
    throw err
  }

  const result = await applyCheckout(input.workingDir, plan, logger)
  logger.info('Reconciled working directory', {
    written: result.written.length,
    removed: result.removed.length,
  })
  return result
}
