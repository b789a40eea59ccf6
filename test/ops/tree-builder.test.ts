import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fc from 'fast-check'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { resolveConfig } from '../../src/core/config'
import { InvalidArgumentError } from '../../src/core/errors'
import { hashTree } from '../../src/core/objects'
import { buildTreeFromFs, flattenTree, joinRelative } from '../../src/ops/tree-builder'
import { FileObjectStore } from '../../src/storage/object-store'
import { createTree } from '../../src/types/objects'

// ============================================================================
// Test Helpers
// ============================================================================

const config = resolveConfig()
const options = { hasher: config.hasher, ignore: ['.arbor'] }

const HELLO_HASH = 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d'

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const absPath = path.join(root, ...relPath.split('/'))
    await fs.mkdir(path.dirname(absPath), { recursive: true })
    await fs.writeFile(absPath, content)
  }
}

describe('buildTreeFromFs', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tree-builder-test-'))
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('records a file under the hash of its content', async () => {
    await writeFiles(tempDir, { 'hello.txt': 'hello' })

    const snapshot = await buildTreeFromFs(tempDir, options)

    const expected = createTree([{ kind: 'blob', hash: HELLO_HASH, name: 'hello.txt' }])
    expect(snapshot.tree).toEqual(expected)
    expect(snapshot.hash).toBe(hashTree(expected, config.hasher))
    expect([...snapshot.files]).toEqual([['hello.txt', HELLO_HASH]])
    expect(snapshot.blobs.get(HELLO_HASH)).toBe(path.join(tempDir, 'hello.txt'))
  })

  it('builds nested directories bottom-up', async () => {
    await writeFiles(tempDir, { 'a.txt': 'hello', 'src/lib/util.ts': 'hello' })

    const snapshot = await buildTreeFromFs(tempDir, options)

    const lib = createTree([{ kind: 'blob', hash: HELLO_HASH, name: 'util.ts' }])
    const src = createTree([{ kind: 'tree', hash: hashTree(lib, config.hasher), name: 'lib' }])
    const root = createTree([
      { kind: 'blob', hash: HELLO_HASH, name: 'a.txt' },
      { kind: 'tree', hash: hashTree(src, config.hasher), name: 'src' },
    ])

    expect(snapshot.hash).toBe(hashTree(root, config.hasher))
    expect(snapshot.subtrees.size).toBe(3)
    expect(snapshot.subtrees.get(hashTree(lib, config.hasher))).toEqual(lib)
    expect([...snapshot.files.keys()].sort()).toEqual(['a.txt', 'src/lib/util.ts'])
    expect(snapshot.blobs.size).toBe(1)
  })

  it('leaves out empty directories', async () => {
    await writeFiles(tempDir, { 'a.txt': 'hello' })
    const before = await buildTreeFromFs(tempDir, options)

    await fs.mkdir(path.join(tempDir, 'empty', 'deeper'), { recursive: true })
    const after = await buildTreeFromFs(tempDir, options)

    expect(after.hash).toBe(before.hash)
    expect([...after.tree.records.keys()]).toEqual(['a.txt'])
    expect([...after.emptyDirs].sort()).toEqual(['empty', 'empty/deeper'])
  })

  it('keeps an empty root', async () => {
    const snapshot = await buildTreeFromFs(tempDir, options)

    expect(snapshot.tree.records.size).toBe(0)
    expect(snapshot.hash).toBe(hashTree(createTree([]), config.hasher))
  })

  it('skips ignored names at every level', async () => {
    await writeFiles(tempDir, {
      'a.txt': 'hello',
      '.arbor/HEAD': 'ref: refs/heads/main\n',
      'sub/.arbor/x': 'nested',
      'sub/b.txt': 'hello',
    })

    const snapshot = await buildTreeFromFs(tempDir, options)

    expect([...snapshot.files.keys()].sort()).toEqual(['a.txt', 'sub/b.txt'])
  })

  it('skips symbolic links', async () => {
    await writeFiles(tempDir, { 'a.txt': 'hello' })
    await fs.symlink(path.join(tempDir, 'a.txt'), path.join(tempDir, 'link.txt'))

    const snapshot = await buildTreeFromFs(tempDir, options)

    expect([...snapshot.tree.records.keys()]).toEqual(['a.txt'])
    expect([...snapshot.special]).toEqual(['link.txt'])
  })

  it('rejects a path that is not a directory', async () => {
    await writeFiles(tempDir, { 'a.txt': 'hello' })
    const filePath = path.join(tempDir, 'a.txt')
    const missing = path.join(tempDir, 'missing')

    await expect(buildTreeFromFs(filePath, options)).rejects.toThrow(`Not a directory: ${filePath}`)
    await expect(buildTreeFromFs(missing, options)).rejects.toThrow(InvalidArgumentError)
  })

  it('produces the same hash whatever order files were created in', async () => {
    const fileSet = fc.uniqueArray(
      fc.record({
        name: fc.stringMatching(/^[a-z]{1,6}\.txt$/),
        dir: fc.constantFrom('', 'docs', 'src/lib'),
        content: fc.string({ maxLength: 20 }),
      }),
      { selector: (file) => `${file.dir}/${file.name}`, minLength: 1, maxLength: 6 }
    )

    let run = 0
    await fc.assert(
      fc.asyncProperty(fileSet, async (files) => {
        run++
        const first = path.join(tempDir, `first-${run}`)
        const second = path.join(tempDir, `second-${run}`)
        const entries = files.map((file): [string, string] => [joinRelative(file.dir, file.name), file.content])

        await writeFiles(first, Object.fromEntries(entries))
        await writeFiles(second, Object.fromEntries([...entries].reverse()))
        await fs.mkdir(first, { recursive: true })
        await fs.mkdir(second, { recursive: true })

        const a = await buildTreeFromFs(first, options)
        const b = await buildTreeFromFs(second, options)
        expect(a.hash).toBe(b.hash)
      }),
      { numRuns: 20 }
    )
  })
})

describe('flattenTree', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flatten-test-'))
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('maps every stored file path to its blob', async () => {
    const work = path.join(tempDir, 'work')
    await writeFiles(work, { 'a.txt': 'hello', 'src/b.txt': 'world' })
    const store = new FileObjectStore(path.join(tempDir, 'objects'), config)

    const snapshot = await buildTreeFromFs(work, options)
    for (const tree of snapshot.subtrees.values()) {
      await store.saveTree(tree)
    }

    expect(await flattenTree(store, snapshot.hash)).toEqual(snapshot.files)
  })

  it('returns nothing for an unborn tree', async () => {
    const store = new FileObjectStore(path.join(tempDir, 'objects'), config)
    expect((await flattenTree(store, null)).size).toBe(0)
  })
})
