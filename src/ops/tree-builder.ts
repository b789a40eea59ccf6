/**
 * @fileoverview Tree Builder - builds tree snapshots from the filesystem
 *
 * Walks a directory depth-first with an explicit work list and produces the
 * tree graph describing it. Entries are sorted by name before a directory is
 * hashed, so identical contents always produce the identical hash whatever
 * order the filesystem returns them in.
 *
 * ## Rules
 *
 * - Regular files become blob records (hash of the raw content)
 * - Subdirectories are built first and referenced by their tree hash
 * - Directories whose snapshot would be empty are left out
 * - Entries named in `ignore` (the metadata directory) are skipped at every level
 * - Symlinks, sockets and other special files are skipped
 *
 * Skipped entries and left-out directories are still reported (`special`,
 * `emptyDirs`), since a checkout must not write through or over them.
 *
 * Building never writes to the object store. The caller persists the result
 * explicitly (see `Repository.saveDir`).
 *
 * ## Usage Example
 *
 * ```typescript
 * import { buildTreeFromFs } from './ops/tree-builder'
 *
 * const snapshot = await buildTreeFromFs('/work/project', {
 *   hasher: config.hasher,
 *   ignore: ['.arbor'],
 * })
 * console.log('Root tree:', snapshot.hash)
 * console.log('Files:', [...snapshot.files.keys()])
 * ```
 *
 * @module ops/tree-builder
 */

import type { Dirent, Stats } from 'fs'
import * as fs from 'fs/promises'
import * as path from 'path'
import { InvalidArgumentError, isSystemError } from '../core/errors'
import { hashTree } from '../core/objects'
import { compareNames, createTree, type Tree, type TreeRecord } from '../types/objects'
import type { TreeProvider } from '../types/storage'
import type { Hasher } from '../utils/hash'

/**
 * Options for {@link buildTreeFromFs}.
 */
export interface BuildTreeOptions {
  hasher: Hasher
  /** Entry names to skip at every level */
  ignore?: readonly string[]
}

/**
 * Everything learned while building a tree from a directory.
 */
export interface FsTreeSnapshot {
  /** Root tree */
  tree: Tree
  /** Root tree hash */
  hash: string
  /** Every tree built, root included, keyed by hash */
  subtrees: Map<string, Tree>
  /** Blob hash of every file, keyed by `/`-separated path relative to the root */
  files: Map<string, string>
  /** One absolute path holding each blob's content, keyed by blob hash */
  blobs: Map<string, string>
  /** Symlinks, sockets and other entries that are neither file nor directory */
  special: Set<string>
  /** Directories left out of the tree for having no files */
  emptyDirs: Set<string>
}

/**
 * Work item: a directory, visited twice. The first visit reads and queues
 * its subdirectories; the second, after they are all built, builds it.
 */
interface DirectoryFrame {
  absPath: string
  relPath: string
  entries?: Dirent[]
}

/**
 * Join relative path segments with `/`.
 */
export function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name
}

/**
 * Build the tree graph of a live directory.
 *
 * @throws InvalidArgumentError if `rootPath` is not a directory
 */
export async function buildTreeFromFs(rootPath: string, options: BuildTreeOptions): Promise<FsTreeSnapshot> {
  const { hasher } = options
  const ignore = new Set(options.ignore ?? [])

  let rootStat: Stats
  try {
    rootStat = await fs.stat(rootPath)
  } catch (err) {
    if (isSystemError(err, 'ENOENT')) {
      throw new InvalidArgumentError(`Not a directory: ${rootPath}`, { cause: err })
    }
    throw err
  }
  if (!rootStat.isDirectory()) {
    throw new InvalidArgumentError(`Not a directory: ${rootPath}`)
  }

  const subtrees = new Map<string, Tree>()
  const files = new Map<string, string>()
  const blobs = new Map<string, string>()
  const special = new Set<string>()
  const emptyDirs = new Set<string>()
  // Hash of each built directory by relative path; absent for empty ones
  const dirHashes = new Map<string, string | null>()

  const stack: DirectoryFrame[] = [{ absPath: rootPath, relPath: '' }]

  while (stack.length > 0) {
    const frame = stack.pop()
    if (frame === undefined) break

    if (frame.entries === undefined) {
      const entries = (await fs.readdir(frame.absPath, { withFileTypes: true }))
        .filter((entry) => !ignore.has(entry.name))
        .sort((a, b) => compareNames(a.name, b.name))

      stack.push({ ...frame, entries })
      for (const entry of entries) {
        if (entry.isDirectory()) {
          stack.push({
            absPath: path.join(frame.absPath, entry.name),
            relPath: joinRelative(frame.relPath, entry.name),
          })
        }
      }
      continue
    }

    const records: TreeRecord[] = []
    for (const entry of frame.entries) {
      const relPath = joinRelative(frame.relPath, entry.name)

      if (entry.isDirectory()) {
        const hash = dirHashes.get(relPath)
        if (hash) {
          records.push({ kind: 'tree', hash, name: entry.name })
        } else {
          emptyDirs.add(relPath)
        }
      } else if (entry.isFile()) {
        const absPath = path.join(frame.absPath, entry.name)
        const content = await fs.readFile(absPath)
        const hash = hasher.hash(content)
        records.push({ kind: 'blob', hash, name: entry.name })
        files.set(relPath, hash)
        if (!blobs.has(hash)) {
          blobs.set(hash, absPath)
        }
      } else {
        special.add(relPath)
      }
    }

    const tree = createTree(records)
    const hash = hashTree(tree, hasher)
    if (records.length > 0 || frame.relPath === '') {
      subtrees.set(hash, tree)
      dirHashes.set(frame.relPath, hash)
    } else {
      dirHashes.set(frame.relPath, null)
    }
  }

  const rootHash = dirHashes.get('')
  const rootTree = rootHash ? subtrees.get(rootHash) : undefined
  if (!rootHash || !rootTree) {
    throw new InvalidArgumentError(`Failed to build tree for ${rootPath}`)
  }

  return { tree: rootTree, hash: rootHash, subtrees, files, blobs, special, emptyDirs }
}

/**
 * Flatten a stored tree into a map of file path to blob hash.
 */
export async function flattenTree(provider: TreeProvider, rootHash: string | null): Promise<Map<string, string>> {
  const files = new Map<string, string>()
  if (rootHash === null) {
    return files
  }

  const stack: Array<{ hash: string; prefix: string }> = [{ hash: rootHash, prefix: '' }]
  while (stack.length > 0) {
    const item = stack.pop()
    if (item === undefined) break

    const tree = await provider.getTree(item.hash)
    for (const record of tree.records.values()) {
      const relPath = joinRelative(item.prefix, record.name)
      if (record.kind === 'tree') {
        stack.push({ hash: record.hash, prefix: relPath })
      } else {
        files.set(relPath, record.hash)
      }
    }
  }

  return files
}
