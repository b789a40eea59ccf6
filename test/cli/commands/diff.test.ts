import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { formatDiff } from '../../../src/cli/commands/diff'
import { resolveConfig } from '../../../src/core/config'
import { ObjectNotFoundError } from '../../../src/core/errors'
import { hashTree } from '../../../src/core/objects'
import { diffTrees, type TreeLookup } from '../../../src/ops/tree-diff'
import { createTree, type Tree, type TreeRecord } from '../../../src/types/objects'
import { createTempWorkspace, type TempWorkspace } from '../../helpers/cli'

// ============================================================================
// Test Helpers
// ============================================================================

const config = resolveConfig()
const H1 = '1'.repeat(40)
const H2 = '2'.repeat(40)

function blob(name: string, hash: string): TreeRecord {
  return { kind: 'blob', hash, name }
}

function createGraph(): { dir: (name: string, records: TreeRecord[]) => TreeRecord; lookup: TreeLookup } {
  const trees = new Map<string, Tree>()
  return {
    dir(name, records) {
      const tree = createTree(records)
      const hash = hashTree(tree, config.hasher)
      trees.set(hash, tree)
      return { kind: 'tree', hash, name }
    },
    async lookup(hash) {
      const tree = trees.get(hash)
      if (!tree) throw new ObjectNotFoundError(hash)
      return tree
    },
  }
}

describe('diff command', () => {
  describe('formatDiff', () => {
    it('indents nested changes under their directory', async () => {
      const graph = createGraph()
      const a = createTree([graph.dir('src', [blob('a.ts', H1)])])
      const b = createTree([graph.dir('src', [blob('a.ts', H1), blob('util.ts', H2)])])

      expect(formatDiff(await diffTrees(a, b, graph.lookup, graph.lookup))).toEqual([
        'Modified: src',
        '   Added: util.ts',
      ])
    })

    it('prints a move once, from its old location', async () => {
      const graph = createGraph()
      const a = createTree([graph.dir('sub', [blob('f.txt', H1)])])
      const b = createTree([blob('f.txt', H1), graph.dir('sub', [blob('g.txt', H2)])])

      expect(formatDiff(await diffTrees(a, b, graph.lookup, graph.lookup))).toEqual([
        'Modified: sub',
        '   Moved: f.txt -> f.txt',
        '   Added: g.txt',
      ])
    })

    it('prints removals', async () => {
      const graph = createGraph()
      const a = createTree([blob('old.txt', H1)])
      const b = createTree([])

      expect(formatDiff(await diffTrees(a, b, graph.lookup, graph.lookup))).toEqual(['Removed: old.txt'])
    })
  })

  describe('running', () => {
    let ws: TempWorkspace

    beforeEach(async () => {
      ws = await createTempWorkspace('diff-cmd-')
      await ws.run('init')
      await ws.write('a.txt', 'alpha')
    })

    afterEach(async () => {
      await ws.cleanup()
    })

    it('compares HEAD with the working directory by default', async () => {
      await ws.commit('First')
      await ws.write('a.txt', 'edited')

      const { result, stdout } = await ws.run('diff')

      expect(result.exitCode).toBe(0)
      expect(stdout).toEqual(['Modified: a.txt'])
    })

    it('reports a clean working directory', async () => {
      await ws.commit('First')

      expect((await ws.run('diff')).stdout).toEqual(['No changes.'])
    })

    it('compares two commits', async () => {
      const first = await ws.commit('First')
      await ws.write('b.txt', 'beta')
      const second = await ws.commit('Second')

      expect((await ws.run('diff', first, second)).stdout).toEqual(['Added: b.txt'])
      expect((await ws.run('diff', second, first)).stdout).toEqual(['Removed: b.txt'])
    })

    it('compares a ref with the working directory', async () => {
      await ws.commit('First')
      await ws.run('tag', 'v1')
      await ws.write('b.txt', 'beta')
      await ws.commit('Second')

      expect((await ws.run('diff', 'v1')).stdout).toEqual(['Added: b.txt'])
    })

    it('shows a rename as a move', async () => {
      await ws.commit('First')
      await fs.rename(path.join(ws.dir, 'a.txt'), path.join(ws.dir, 'z.txt'))

      expect((await ws.run('diff')).stdout).toEqual(['Moved: a.txt -> z.txt'])
    })
  })
})
