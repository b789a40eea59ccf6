/**
 * @fileoverview Merge Classification and Merge State
 *
 * Decides what merging a target commit into HEAD requires, and keeps the
 * persistent merge-in-progress marker.
 *
 * ## Outcomes
 *
 * | Status         | Condition                                   | Action                         |
 * |----------------|---------------------------------------------|--------------------------------|
 * | `UP_TO_DATE`   | merge base is the target                    | none                           |
 * | `FAST_FORWARD` | merge base is HEAD (or HEAD is unborn)      | move the branch to the target  |
 * | `THREE_WAY`    | merge base is neither                       | enter the merge marker state   |
 * | `DISCONNECTED` | no common ancestor                          | none                           |
 *
 * Content-level merging of file bodies is not performed. A three-way merge
 * only records the marker; the next commit concludes it with two parents.
 *
 * The marker is a directory (`<repo>/merge` by default) whose presence means
 * a merge is in progress. It holds a `target` file naming the commit being
 * merged.
 *
 * @module ops/merge
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import type { ResolvedConfig } from '../core/config'
import { MergeInProgressError, NotFoundError, isSystemError, withContext } from '../core/errors'
import type { CommitProvider } from '../types/storage'
import { noopLogger, type Logger } from '../utils/logger'
import { findCommonAncestor } from './merge-base'

// ============================================================================
// Classification
// ============================================================================

export enum MergeStatus {
  UP_TO_DATE = 'up-to-date',
  FAST_FORWARD = 'fast-forward',
  THREE_WAY = 'three-way',
  DISCONNECTED = 'disconnected',
}

/**
 * What merging `target` into `head` requires.
 */
export interface MergeClassification {
  status: MergeStatus
  /** HEAD commit, or null when HEAD is unborn */
  head: string | null
  target: string
  /** Lowest common ancestor, or null when there is none */
  base: string | null
}

/**
 * Classify a merge of `target` into `head`.
 *
 * @throws the commit load failure, with context, if the history cannot be walked
 */
export async function classifyMerge(
  provider: CommitProvider,
  head: string | null,
  target: string
): Promise<MergeClassification> {
  if (head === null) {
    return { status: MergeStatus.FAST_FORWARD, head, target, base: null }
  }

  let base: string | null
  try {
    base = await findCommonAncestor(provider, head, target)
  } catch (err) {
    throw withContext(err, 'Cannot merge')
  }

  let status: MergeStatus
  if (base === null) {
    status = MergeStatus.DISCONNECTED
  } else if (base === target) {
    status = MergeStatus.UP_TO_DATE
  } else if (base === head) {
    status = MergeStatus.FAST_FORWARD
  } else {
    status = MergeStatus.THREE_WAY
  }

  return { status, head, target, base }
}

// ============================================================================
// Merge State
// ============================================================================

const TARGET_FILE = 'target'

export interface MergeStateOptions {
  logger?: Logger
}

/**
 * The merge-in-progress marker of one repository.
 */
export class MergeState {
  private readonly logger: Logger
  readonly markerPath: string

  constructor(repoPath: string, config: ResolvedConfig, options: MergeStateOptions = {}) {
    this.markerPath = path.join(repoPath, config.mergeDir)
    this.logger = (options.logger ?? noopLogger).child({ component: 'merge' })
  }

  async isActive(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.markerPath)
      return stat.isDirectory()
    } catch (err) {
      if (isSystemError(err, 'ENOENT')) {
        return false
      }
      throw err
    }
  }

  /**
   * Enter the merge state, recording the target commit when given.
   *
   * @throws MergeInProgressError if the marker already exists
   */
  async start(target: string | null): Promise<void> {
    try {
      await fs.mkdir(this.markerPath)
    } catch (err) {
      if (isSystemError(err, 'EEXIST')) {
        throw new MergeInProgressError('Merge already in progress', { cause: err })
      }
      throw err
    }

    if (target !== null) {
      await fs.writeFile(path.join(this.markerPath, TARGET_FILE), `${target}\n`, 'utf8')
    }
    this.logger.info('Entered merge state', { target })
  }

  /**
   * Commit being merged, or null when none is recorded.
   */
  async target(): Promise<string | null> {
    try {
      const content = await fs.readFile(path.join(this.markerPath, TARGET_FILE), 'utf8')
      return content.trim() || null
    } catch (err) {
      if (isSystemError(err, 'ENOENT')) {
        return null
      }
      throw err
    }
  }

  /**
   * Leave the merge state. Refs are not touched.
   *
   * @throws NotFoundError if no merge is in progress
   */
  async abort(): Promise<void> {
    if (!(await this.isActive())) {
      throw new NotFoundError('No merge in progress')
    }
    await this.clear()
    this.logger.info('Aborted merge')
  }

  /**
   * Remove the marker if present.
   */
  async clear(): Promise<void> {
    await fs.rm(this.markerPath, { recursive: true, force: true })
  }
}
