import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Repository } from '../../src/core/repository'
import { createTempWorkspace, type TempWorkspace } from '../helpers/cli'

describe('CLI Merge Command', () => {
  let ws: TempWorkspace
  let first: string
  let second: string

  beforeEach(async () => {
    ws = await createTempWorkspace('merge-cmd-')
    await ws.run('init')
    await ws.write('a.txt', 'alpha')
    first = await ws.commit('First')
    await ws.run('branch', 'feature', 'HEAD')
    await ws.run('checkout', 'feature')
    await ws.write('b.txt', 'beta')
    second = await ws.commit('Second')
    await ws.run('checkout', 'main')
  })

  afterEach(async () => {
    await ws.cleanup()
  })

  it('fast-forwards', async () => {
    const { result, stdout } = await ws.run('merge', 'feature')

    expect(result.exitCode).toBe(0)
    expect(stdout).toEqual([`Fast-forward to ${second}`])
    expect(await ws.read('b.txt')).toBe('beta')
  })

  it('reports an up-to-date branch', async () => {
    await ws.run('checkout', 'feature')

    expect((await ws.run('merge', 'main')).stdout).toEqual(['Already up to date.'])
  })

  it('starts a three-way merge that the next commit concludes', async () => {
    await ws.write('c.txt', 'gamma')
    const third = await ws.commit('Third')

    expect((await ws.run('merge', 'feature')).stdout).toEqual([
      `Merging ${second} (base ${first}); commit to conclude the merge.`,
    ])

    const merged = await ws.commit('Merge feature')
    const commit = await new Repository(ws.dir).getCommit(merged)
    expect(commit.parents).toEqual([third, second])
  })

  it('aborts a merge', async () => {
    await ws.write('c.txt', 'gamma')
    await ws.commit('Third')
    await ws.run('merge', 'feature')

    expect((await ws.run('merge', '--abort')).stdout).toEqual(['Merge aborted.'])
    expect((await ws.run('status')).stdout).toEqual(['On branch main', 'Working directory clean'])
  })

  it('has nothing to abort without a merge', async () => {
    expect((await ws.run('merge', '--abort')).stderr).toEqual(['Error: No merge in progress'])
  })

  it('refuses a second merge', async () => {
    await ws.write('c.txt', 'gamma')
    await ws.commit('Third')
    await ws.run('merge', 'feature')

    expect((await ws.run('merge', 'feature')).stderr).toEqual(['Error: Merge already in progress'])
  })

  it('refuses unrelated history', async () => {
    await ws.run('branch', 'orphan')
    await ws.run('checkout', 'orphan')
    await ws.write('z.txt', 'zeta')
    await ws.commit('Orphan')
    await ws.run('checkout', 'main')

    expect((await ws.run('merge', 'orphan')).stdout).toEqual(['Refusing to merge orphan: no common history with HEAD.'])
  })

  it('needs a target', async () => {
    expect((await ws.run('merge')).stderr).toEqual(['Error: Usage: arbor merge <target> | --abort'])
  })
})
