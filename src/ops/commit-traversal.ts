/**
 * @fileoverview Commit Log Traversal
 *
 * A lazy, restartable walk of first-parent history. The walker holds only
 * the hash of the next commit to load; each `next()` loads one commit and
 * advances to its first parent, stopping after a root commit.
 *
 * ## Usage Example
 *
 * ```typescript
 * import { CommitLog } from './ops/commit-traversal'
 *
 * const log = new CommitLog(store, headHash)
 * while (log.hasNext()) {
 *   const entry = await log.next()
 *   console.log(entry?.hash, entry?.commit.message)
 * }
 *
 * // Or use async iteration (restarts from the tip)
 * for await (const entry of log) {
 *   console.log(entry.hash)
 * }
 * ```
 *
 * @module ops/commit-traversal
 */

import { withContext } from '../core/errors'
import type { Commit } from '../types/objects'
import type { CommitProvider } from '../types/storage'

/**
 * One commit in a log walk.
 */
export interface LogEntry {
  hash: string
  commit: Commit
}

export class CommitLog implements AsyncIterable<LogEntry> {
  private current: string | null

  /**
   * @param provider - Source of commits
   * @param tip - Commit to start from; null yields an empty log
   */
  constructor(
    private readonly provider: CommitProvider,
    public readonly tip: string | null
  ) {
    this.current = tip
  }

  /**
   * Whether another entry remains.
   */
  hasNext(): boolean {
    return this.current !== null
  }

  /**
   * Load the next entry, or null once the walk has passed a root commit.
   *
   * @throws the load failure, wrapped with "Error loading commit <hash>"
   */
  async next(): Promise<LogEntry | null> {
    const hash = this.current
    if (hash === null) {
      return null
    }

    let commit: Commit
    try {
      commit = await this.provider.getCommit(hash)
    } catch (err) {
      throw withContext(err, `Error loading commit ${hash}`)
    }

    this.current = commit.parents.length > 0 ? commit.parents[0] : null
    return { hash, commit }
  }

  /**
   * Restart the walk from the tip.
   */
  reset(): void {
    this.current = this.tip
  }

  /**
   * Collect up to `limit` entries from the current position.
   */
  async take(limit: number = Infinity): Promise<LogEntry[]> {
    const entries: LogEntry[] = []
    while (entries.length < limit) {
      const entry = await this.next()
      if (entry === null) break
      entries.push(entry)
    }
    return entries
  }

  /**
   * Iterate from the tip with a fresh walk, leaving this one's position alone.
   */
  [Symbol.asyncIterator](): AsyncIterator<LogEntry> {
    const walk = new CommitLog(this.provider, this.tip)
    return {
      next: async (): Promise<IteratorResult<LogEntry>> => {
        const entry = await walk.next()
        return entry === null ? { done: true, value: undefined } : { done: false, value: entry }
      },
    }
  }
}
