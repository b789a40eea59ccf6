/**
 * @fileoverview Storage Interfaces
 *
 * Narrow read-side views of the object store. Algorithms depend on these
 * rather than on the concrete store so tests can supply in-memory graphs.
 *
 * @module types/storage
 */

import type { Commit, Tree } from './objects'

/**
 * Loads commits by hash. Implementations throw when a commit is missing or
 * corrupt; they never return a placeholder.
 */
export interface CommitProvider {
  getCommit(hash: string): Promise<Commit>
}

/**
 * Loads trees by hash, throwing on missing or corrupt objects.
 */
export interface TreeProvider {
  getTree(hash: string): Promise<Tree>
}

/**
 * Full read/write object store contract.
 */
export interface ObjectStore extends CommitProvider, TreeProvider {
  saveBlob(content: Uint8Array): Promise<string>
  saveTree(tree: Tree): Promise<string>
  saveCommit(commit: Commit): Promise<string>
  getBlob(hash: string): Promise<Uint8Array>
  hasObject(hash: string): Promise<boolean>
}
