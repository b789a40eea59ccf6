/**
 * @fileoverview Tree Diff Operations
 *
 * Structural, move-aware comparison of two tree graphs. The result is a
 * hierarchy of diff nodes mirroring the directories that differ; identical
 * subtrees are pruned and produce no nodes.
 *
 * ## Change kinds
 *
 * - `added`: record only in the new tree
 * - `removed`: record only in the old tree
 * - `modified`: same name, different hash (directories get children)
 * - `movedTo`: old location of a record whose content reappears elsewhere
 * - `movedFrom`: new location of such a record
 *
 * Moves are detected globally within one diff: a record that disappears and
 * a record that appears with the same content hash form a linked pair, in
 * whichever directories they live.
 *
 * ## Storage
 *
 * Nodes live in an arena ({@link TreeDiff}) and refer to each other by
 * {@link DiffNodeId}: `parent`, `children` and the moved-pair links are
 * index lookups, never object references.
 *
 * ## Usage Example
 *
 * ```typescript
 * import { diffTrees } from './ops/tree-diff'
 *
 * const diff = await diffTrees(oldTree, newTree, lookupOld, lookupNew)
 * for (const { path, node } of diff.entries()) {
 *   console.log(node.change, path)
 * }
 * ```
 *
 * @module ops/tree-diff
 */

import { withContext } from '../core/errors'
import type { Tree, TreeRecord } from '../types/objects'
import type { TreeProvider } from '../types/storage'
import { joinRelative } from './tree-builder'

// ============================================================================
// Types
// ============================================================================

/**
 * Stable index of a node in its {@link TreeDiff}.
 */
export type DiffNodeId = number

/**
 * Loads a subtree by hash for one side of a diff.
 */
export type TreeLookup = (hash: string) => Promise<Tree>

export interface DiffNodeBase {
  readonly id: DiffNodeId
  /** The record this node describes (the old record for `modified`) */
  readonly record: TreeRecord
  readonly parent: DiffNodeId | null
  readonly children: readonly DiffNodeId[]
}

export interface AddedNode extends DiffNodeBase {
  readonly change: 'added'
}

export interface RemovedNode extends DiffNodeBase {
  readonly change: 'removed'
}

export interface ModifiedNode extends DiffNodeBase {
  readonly change: 'modified'
  /** The record on the new side */
  readonly current: TreeRecord
}

/**
 * Old location of a moved record.
 */
export interface MovedToNode extends DiffNodeBase {
  readonly change: 'movedTo'
  /** The paired {@link MovedFromNode} */
  readonly movedTo: DiffNodeId
}

/**
 * New location of a moved record.
 */
export interface MovedFromNode extends DiffNodeBase {
  readonly change: 'movedFrom'
  /** The paired {@link MovedToNode} */
  readonly movedFrom: DiffNodeId
}

export type DiffNode = AddedNode | RemovedNode | ModifiedNode | MovedToNode | MovedFromNode

export type DiffChange = DiffNode['change']

/**
 * A node together with its path from the diff root.
 */
export interface DiffEntry {
  path: string
  node: DiffNode
}

// ============================================================================
// Arena
// ============================================================================

/**
 * Arena of diff nodes with the top-level nodes in visit order.
 */
export class TreeDiff {
  private readonly arena: DiffNode[] = []
  private readonly childLists: DiffNodeId[][] = []
  private readonly rootIds: DiffNodeId[] = []

  /** Total number of nodes, at every depth */
  get size(): number {
    return this.arena.length
  }

  get isEmpty(): boolean {
    return this.arena.length === 0
  }

  /** Top-level nodes in output order */
  get roots(): DiffNode[] {
    return this.rootIds.map((id) => this.node(id))
  }

  /**
   * @throws RangeError if no node has this id
   */
  node(id: DiffNodeId): DiffNode {
    const node = this.arena[id]
    if (node === undefined) {
      throw new RangeError(`No diff node with id ${id}`)
    }
    return node
  }

  children(id: DiffNodeId): DiffNode[] {
    return this.node(id).children.map((child) => this.node(child))
  }

  parent(id: DiffNodeId): DiffNode | null {
    const parent = this.node(id).parent
    return parent === null ? null : this.node(parent)
  }

  /**
   * The other half of a moved pair, or null for any other change.
   */
  pair(id: DiffNodeId): DiffNode | null {
    const node = this.node(id)
    switch (node.change) {
      case 'movedTo':
        return this.node(node.movedTo)
      case 'movedFrom':
        return this.node(node.movedFrom)
      default:
        return null
    }
  }

  /**
   * `/`-separated path of a node from the diff root.
   */
  path(id: DiffNodeId): string {
    const names: string[] = []
    let current: DiffNode | null = this.node(id)
    while (current !== null) {
      names.push(current.record.name)
      current = current.parent === null ? null : this.node(current.parent)
    }
    return names.reverse().join('/')
  }

  /**
   * Every node in depth-first pre-order, children in output order.
   */
  entries(): DiffEntry[] {
    const result: DiffEntry[] = []
    const stack: Array<{ id: DiffNodeId; prefix: string }> = []
    for (let i = this.rootIds.length - 1; i >= 0; i--) {
      stack.push({ id: this.rootIds[i], prefix: '' })
    }

    while (stack.length > 0) {
      const item = stack.pop()
      if (item === undefined) break
      const node = this.node(item.id)
      const nodePath = joinRelative(item.prefix, node.record.name)
      result.push({ path: nodePath, node })
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ id: node.children[i], prefix: nodePath })
      }
    }

    return result
  }

  /**
   * Nodes with no children: file-level changes and whole-directory changes.
   */
  leaves(): DiffEntry[] {
    return this.entries().filter((entry) => entry.node.children.length === 0)
  }

  /** @internal */
  append(build: (id: DiffNodeId, children: DiffNodeId[]) => DiffNode): DiffNodeId {
    const id = this.arena.length
    const children: DiffNodeId[] = []
    const node = build(id, children)
    this.arena.push(node)
    this.childLists.push(children)

    if (node.parent === null) {
      this.rootIds.push(id)
    } else {
      this.childListOf(node.parent).push(id)
    }
    return id
  }

  /**
   * Swap the variant of an existing node, keeping its id and position.
   * @internal
   */
  replace(id: DiffNodeId, build: (base: DiffNodeBase) => DiffNode): void {
    const existing = this.node(id)
    this.arena[id] = build({
      id,
      record: existing.record,
      parent: existing.parent,
      children: existing.children,
    })
  }

  private childListOf(id: DiffNodeId): DiffNodeId[] {
    const list = this.childLists[id]
    if (list === undefined) {
      throw new RangeError(`No diff node with id ${id}`)
    }
    return list
  }
}

// ============================================================================
// Lookups
// ============================================================================

/**
 * Subtree lookup that serves trees already in memory (e.g. built from the
 * working directory) and loads the rest from the store on demand.
 */
export function createTreeLookup(provider: TreeProvider, inMemory?: ReadonlyMap<string, Tree>): TreeLookup {
  const loaded = new Map<string, Tree>()
  return async (hash) => {
    const cached = inMemory?.get(hash) ?? loaded.get(hash)
    if (cached) {
      return cached
    }
    const tree = await provider.getTree(hash)
    loaded.set(hash, tree)
    return tree
  }
}

// ============================================================================
// Diff
// ============================================================================

interface WorkItem {
  a: Tree
  b: Tree
  parent: DiffNodeId | null
}

/**
 * Compare two tree graphs.
 *
 * Pairs of directories are compared from an explicit work list. Within a
 * pair, the old side's records are visited first, then the new side's
 * additions; nodes are appended in that order.
 *
 * @param treeA - Old root tree
 * @param treeB - New root tree
 * @param lookupA - Loads subtrees of the old side
 * @param lookupB - Loads subtrees of the new side
 * @throws Error wrapping the load failure if a subtree cannot be loaded
 */
export async function diffTrees(
  treeA: Tree,
  treeB: Tree,
  lookupA: TreeLookup,
  lookupB: TreeLookup
): Promise<TreeDiff> {
  const diff = new TreeDiff()
  const potentiallyAdded = new Map<string, DiffNodeId>()
  const potentiallyRemoved = new Map<string, DiffNodeId>()
  const stack: WorkItem[] = [{ a: treeA, b: treeB, parent: null }]

  while (stack.length > 0) {
    const item = stack.pop()
    if (item === undefined) break
    const { a, b, parent } = item

    for (const [name, recordA] of a.records) {
      const recordB = b.records.get(name)

      if (recordB === undefined) {
        const addedId = potentiallyAdded.get(recordA.hash)
        if (addedId !== undefined) {
          potentiallyAdded.delete(recordA.hash)
          const movedToId = diff.append((id, children) => ({
            change: 'movedTo',
            id,
            record: recordA,
            parent,
            children,
            movedTo: addedId,
          }))
          diff.replace(addedId, (base) => ({ ...base, change: 'movedFrom', movedFrom: movedToId }))
        } else {
          const removedId = diff.append((id, children) => ({ change: 'removed', id, record: recordA, parent, children }))
          potentiallyRemoved.set(recordA.hash, removedId)
        }
        continue
      }

      if (recordA.hash === recordB.hash) {
        continue
      }

      const modifiedId = diff.append((id, children) => ({
        change: 'modified',
        id,
        record: recordA,
        current: recordB,
        parent,
        children,
      }))

      if (recordA.kind === 'tree' && recordB.kind === 'tree') {
        let subtreeA: Tree
        let subtreeB: Tree
        try {
          subtreeA = await lookupA(recordA.hash)
          subtreeB = await lookupB(recordB.hash)
        } catch (err) {
          throw withContext(err, `Error loading subtree '${diff.path(modifiedId)}' for diff`)
        }
        stack.push({ a: subtreeA, b: subtreeB, parent: modifiedId })
      }
    }

    for (const [name, recordB] of b.records) {
      if (a.records.has(name)) {
        continue
      }

      const removedId = potentiallyRemoved.get(recordB.hash)
      if (removedId !== undefined) {
        potentiallyRemoved.delete(recordB.hash)
        const movedFromId = diff.append((id, children) => ({
          change: 'movedFrom',
          id,
          record: recordB,
          parent,
          children,
          movedFrom: removedId,
        }))
        diff.replace(removedId, (base) => ({ ...base, change: 'movedTo', movedTo: movedFromId }))
      } else {
        const addedId = diff.append((id, children) => ({ change: 'added', id, record: recordB, parent, children }))
        potentiallyAdded.set(recordB.hash, addedId)
      }
    }
  }

  return diff
}
