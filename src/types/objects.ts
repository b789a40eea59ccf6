/**
 * @fileoverview Object Model Types
 *
 * The three persisted object kinds: blobs (file content), trees (directory
 * snapshots) and commits (history nodes). All of them are immutable once
 * created and are identified by the hash of their encoded form.
 *
 * @module types/objects
 */

/**
 * Kinds of objects kept in the object store.
 */
export type ObjectKind = 'blob' | 'tree' | 'commit'

/**
 * Kind of a directory entry.
 */
export type RecordKind = 'blob' | 'tree'

/**
 * Reference to file content already persisted in the store.
 */
export interface Blob {
  readonly hash: string
}

/**
 * One directory entry. `name` is unique within its owning tree.
 */
export interface TreeRecord {
  readonly kind: RecordKind
  readonly hash: string
  readonly name: string
}

/**
 * Directory snapshot: records keyed by name, iterated in name order.
 */
export interface Tree {
  readonly records: ReadonlyMap<string, TreeRecord>
}

/**
 * History node. Zero parents marks a root commit; more than one a merge.
 */
export interface Commit {
  readonly treeHash: string
  readonly author: string
  readonly message: string
  /** Seconds since the Unix epoch */
  readonly timestamp: number
  readonly parents: readonly string[]
}

/**
 * Object payload by kind. A blob is stored as its raw content bytes.
 */
export interface ObjectByKind {
  blob: Uint8Array
  tree: Tree
  commit: Commit
}

/**
 * A decoded object tagged with its kind.
 */
export type StoredObject =
  | { kind: 'blob'; value: Uint8Array }
  | { kind: 'tree'; value: Tree }
  | { kind: 'commit'; value: Commit }

/**
 * Compare two names by UTF-16 code units, the canonical record order.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Create a tree from records in any order. Records are re-keyed in name
 * order so two trees with the same entries always iterate (and encode)
 * identically.
 *
 * @throws Error if two records share a name
 */
export function createTree(records: Iterable<TreeRecord>): Tree {
  const list = [...records]
  list.sort((a, b) => compareNames(a.name, b.name))

  const sorted = new Map<string, TreeRecord>()
  for (const record of list) {
    if (sorted.has(record.name)) {
      throw new Error(`Duplicate tree record name: ${record.name}`)
    }
    sorted.set(record.name, record)
  }
  return { records: sorted }
}

/**
 * The tree with no records.
 */
export const EMPTY_TREE: Tree = createTree([])
