import { describe, it, expect } from 'vitest'
import { NotFoundError, ObjectNotFoundError } from '../../src/core/errors'
import { CommitLog, type LogEntry } from '../../src/ops/commit-traversal'
import type { Commit } from '../../src/types/objects'
import type { CommitProvider } from '../../src/types/storage'

// ============================================================================
// Test Helpers
// ============================================================================

function makeSha(prefix: string): string {
  return (prefix + '_').padEnd(40, '0')
}

function createMockCommit(message: string, parents: string[] = []): Commit {
  return { treeHash: makeSha('tree'), author: 'Test User', message, timestamp: 1704067200, parents }
}

function createMockProvider(commits: Map<string, Commit>): CommitProvider & { loads: number } {
  const provider: CommitProvider & { loads: number } = {
    loads: 0,
    async getCommit(sha: string): Promise<Commit> {
      provider.loads++
      const commit = commits.get(sha)
      if (!commit) throw new ObjectNotFoundError(sha)
      return commit
    },
  }
  return provider
}

/**
 *   M (merge of B and S)
 *   |\
 *   B S
 *   |/
 *   A
 */
function buildHistory(): { commits: Map<string, Commit>; A: string; B: string; S: string; M: string } {
  const commits = new Map<string, Commit>()
  const A = makeSha('A')
  const B = makeSha('B')
  const S = makeSha('S')
  const M = makeSha('M')
  commits.set(A, createMockCommit('Root'))
  commits.set(B, createMockCommit('Second', [A]))
  commits.set(S, createMockCommit('Side', [A]))
  commits.set(M, createMockCommit('Merge', [B, S]))
  return { commits, A, B, S, M }
}

describe('CommitLog', () => {
  it('walks first parents from the tip to the root', async () => {
    const { commits, A, B, M } = buildHistory()
    const log = new CommitLog(createMockProvider(commits), M)

    const entries = await log.take()

    expect(entries.map((entry) => entry.hash)).toEqual([M, B, A])
    expect(entries.map((entry) => entry.commit.message)).toEqual(['Merge', 'Second', 'Root'])
    expect(log.hasNext()).toBe(false)
    expect(await log.next()).toBeNull()
  })

  it('loads one commit per step', async () => {
    const { commits, M } = buildHistory()
    const provider = createMockProvider(commits)
    const log = new CommitLog(provider, M)

    expect(provider.loads).toBe(0)
    await log.next()
    expect(provider.loads).toBe(1)
    expect(log.hasNext()).toBe(true)
  })

  it('stops at the limit and resumes from there', async () => {
    const { commits, A, B, M } = buildHistory()
    const log = new CommitLog(createMockProvider(commits), M)

    expect((await log.take(2)).map((entry) => entry.hash)).toEqual([M, B])
    expect((await log.take(2)).map((entry) => entry.hash)).toEqual([A])
  })

  it('restarts after reset', async () => {
    const { commits, M } = buildHistory()
    const log = new CommitLog(createMockProvider(commits), M)

    await log.take()
    log.reset()
    expect((await log.next())?.hash).toBe(M)
  })

  it('is empty for an unborn tip', async () => {
    const log = new CommitLog(createMockProvider(new Map()), null)
    expect(log.hasNext()).toBe(false)
    expect(await log.take()).toEqual([])
  })

  it('iterates with for await from the tip, independently of next()', async () => {
    const { commits, A, B, M } = buildHistory()
    const log = new CommitLog(createMockProvider(commits), M)
    await log.next()

    const seen: LogEntry[] = []
    for await (const entry of log) {
      seen.push(entry)
    }

    expect(seen.map((entry) => entry.hash)).toEqual([M, B, A])
    expect((await log.next())?.hash).toBe(B)
  })

  it('names the commit that failed to load', async () => {
    const { commits, A, M } = buildHistory()
    commits.delete(A)
    const log = new CommitLog(createMockProvider(commits), M)

    const error = await log.take().catch((err: unknown) => err)

    expect(error).toBeInstanceOf(NotFoundError)
    expect(error instanceof NotFoundError && error.message).toBe(
      `Error loading commit ${A}: Object not found: ${A}`
    )
  })
})
