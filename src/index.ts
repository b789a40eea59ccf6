/**
 * @fileoverview arbor-vcs - Content-Addressed Version Control Engine
 *
 * Main entry point. Re-exports the repository facade and the engines it is
 * built from, so each can be used on its own.
 *
 * **Architecture Overview**:
 * - **Types**: Blob, tree and commit objects
 * - **Storage**: Deflated, content-addressed object files
 * - **Refs**: Branches, tags, HEAD and the reference resolver
 * - **Operations**: Tree builder, move-aware diff, merge base, merge, checkout
 * - **Repository**: The facade tying them to one working directory
 *
 * @module arbor-vcs
 *
 * @example
 * ```typescript
 * import { Repository, MergeStatus } from 'arbor-vcs'
 *
 * const repo = new Repository('/work/project')
 * await repo.init()
 * await repo.commitWorkingDir('Ada', 'Initial import')
 *
 * const result = await repo.merge('feature')
 * if (result.status === MergeStatus.THREE_WAY) {
 *   await repo.commitWorkingDir('Ada', 'Merge feature')
 * }
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export {
  EMPTY_TREE,
  compareNames,
  createTree,
  type Blob,
  type Commit,
  type ObjectByKind,
  type ObjectKind,
  type RecordKind,
  type StoredObject,
  type Tree,
  type TreeRecord,
} from './types/objects'

export type { CommitProvider, ObjectStore, TreeProvider } from './types/storage'

// ============================================================================
// Core
// ============================================================================

export {
  ConflictError,
  CorruptObjectError,
  InvalidArgumentError,
  InvalidReferenceError,
  MergeInProgressError,
  NotFoundError,
  ObjectNotFoundError,
  RefNotFoundError,
  RepositoryError,
  RepositoryNotFoundError,
  isSystemError,
  withContext,
  type RepositoryErrorCode,
} from './core/errors'

export {
  DEFAULT_CONFIG,
  HASH_CHARSET,
  resolveConfig,
  type RepositoryConfig,
  type ResolvedConfig,
} from './core/config'

export {
  decodeObject,
  encodeObject,
  hashCommit,
  hashObject,
  hashTree,
  type HashFormat,
} from './core/objects'

export {
  Repository,
  type CheckoutSummary,
  type DiffSource,
  type DirectorySource,
  type MergeResult,
  type RepositoryOptions,
} from './core/repository'

// ============================================================================
// Storage
// ============================================================================

export { FileObjectStore, type ObjectStoreOptions } from './storage/object-store'

// ============================================================================
// Refs
// ============================================================================

export {
  branchRef,
  branchRefName,
  formatRef,
  hashRef,
  isValidRefName,
  shortBranchName,
  symRef,
  tagRef,
  tagRefName,
  type HashRef,
  type Ref,
  type SymRef,
} from './refs/ref'
export { RefStore } from './refs/storage'
export { RefResolver, type RefInput } from './refs/resolver'
export { BranchManager } from './refs/branch'
export { TagManager } from './refs/tag'

// ============================================================================
// Operations
// ============================================================================

export { buildTreeFromFs, flattenTree, type BuildTreeOptions, type FsTreeSnapshot } from './ops/tree-builder'

export {
  TreeDiff,
  createTreeLookup,
  diffTrees,
  type DiffChange,
  type DiffEntry,
  type DiffNode,
  type DiffNodeId,
  type TreeLookup,
} from './ops/tree-diff'

export { findCommonAncestor, getAncestors } from './ops/merge-base'
export { CommitLog, type LogEntry } from './ops/commit-traversal'
export { MergeState, MergeStatus, classifyMerge, type MergeClassification } from './ops/merge'

export {
  applyCheckout,
  assertCheckoutSafe,
  planCheckout,
  reconcileWorkingDir,
  type CheckoutInput,
  type CheckoutPlan,
  type CheckoutResult,
} from './ops/checkout'

// ============================================================================
// Utilities
// ============================================================================

export { createHasher, isValidHash, type HashAlgorithm, type Hasher } from './utils/hash'
export {
  LogLevel,
  createLineHandler,
  createLogger,
  formatLogLine,
  noopLogger,
  type Logger,
  type LoggerOptions,
} from './utils/logger'
