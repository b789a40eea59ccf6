/**
 * @fileoverview Repository Abstraction
 *
 * The {@link Repository} facade ties the object store, refs, tree builder,
 * diff, merge and checkout engines to one working directory. Its metadata
 * lives in a directory inside the working directory (`.arbor` by default):
 *
 * ```
 * .arbor/
 *   HEAD                  ref: refs/heads/main
 *   objects/ab/ab12...    deflated objects
 *   refs/heads/<branch>   branch tips (empty when unborn)
 *   refs/tags/<tag>       tag targets
 *   merge/                present while a merge is in progress
 * ```
 *
 * Every operation except {@link Repository.init} and
 * {@link Repository.exists} starts with {@link Repository.requireRepository}.
 * Operations run to completion one at a time; callers serialize access.
 *
 * Objects are always written before the ref that names them is moved.
 *
 * @module core/repository
 *
 * @example
 * ```typescript
 * import { Repository } from './core/repository'
 *
 * const repo = new Repository('/work/project')
 * await repo.init()
 * const first = await repo.commitWorkingDir('Ada', 'Initial import')
 *
 * await repo.addBranch('feature', 'HEAD')
 * await repo.checkout('feature')
 * const diff = await repo.diff('main', { type: 'directory', path: repo.workingDir })
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { resolveConfig, type RepositoryConfig, type ResolvedConfig } from './config'
import {
  ConflictError,
  InvalidArgumentError,
  InvalidReferenceError,
  MergeInProgressError,
  NotFoundError,
  RepositoryNotFoundError,
  isSystemError,
  withContext,
} from './errors'
import { hashTree } from './objects'
import { BranchManager, assertRefName } from '../refs/branch'
import { branchRef, branchRefName, formatRef, hashRef, shortBranchName, symRef, type Ref } from '../refs/ref'
import { RefResolver, type RefInput } from '../refs/resolver'
import { RefStore } from '../refs/storage'
import { TagManager } from '../refs/tag'
import { FileObjectStore } from '../storage/object-store'
import { reconcileWorkingDir, type CheckoutResult } from '../ops/checkout'
import { CommitLog } from '../ops/commit-traversal'
import { MergeState, MergeStatus, classifyMerge, type MergeClassification } from '../ops/merge'
import { buildTreeFromFs, type FsTreeSnapshot } from '../ops/tree-builder'
import { TreeDiff, createTreeLookup, diffTrees, type TreeLookup } from '../ops/tree-diff'
import { EMPTY_TREE, type Blob, type Commit, type Tree } from '../types/objects'
import { noopLogger, type Logger } from '../utils/logger'

// ============================================================================
// Types
// ============================================================================

export interface RepositoryOptions extends RepositoryConfig {
  logger?: Logger
  /** Clock used for commit timestamps, in seconds (default: wall clock) */
  now?: () => number
}

/**
 * A live directory as one side of a diff.
 */
export interface DirectorySource {
  type: 'directory'
  path: string
}

/**
 * One side of a diff: a ref, ref name or hash (resolved to its commit's
 * tree), or a live directory.
 */
export type DiffSource = RefInput | DirectorySource

export interface CheckoutSummary extends CheckoutResult {
  /** HEAD after the checkout */
  head: Ref
  /** Commit checked out, null for an unborn branch */
  commit: string | null
}

export interface MergeResult extends MergeClassification {
  /** Files changed on disk by a fast-forward */
  written: string[]
  removed: string[]
}

interface ResolvedSource {
  tree: Tree
  lookup: TreeLookup
}

function isDirectorySource(source: DiffSource): source is DirectorySource {
  return typeof source === 'object' && source !== null && source.type === 'directory'
}

// ============================================================================
// Repository
// ============================================================================

export class Repository {
  readonly workingDir: string
  readonly repoPath: string
  readonly config: ResolvedConfig
  readonly objects: FileObjectStore
  readonly refStore: RefStore
  readonly resolver: RefResolver
  readonly branchManager: BranchManager
  readonly tagManager: TagManager

  private readonly mergeState: MergeState
  private readonly logger: Logger
  private readonly now: () => number

  constructor(workingDir: string, options: RepositoryOptions = {}) {
    const { logger, now, ...config } = options
    this.workingDir = path.resolve(workingDir)
    this.config = resolveConfig(config)
    this.repoPath = path.join(this.workingDir, this.config.repoDirName)
    this.logger = (logger ?? noopLogger).child({ workingDir: this.workingDir })
    this.now = now ?? (() => Math.floor(Date.now() / 1000))

    this.objects = new FileObjectStore(path.join(this.repoPath, this.config.objectsDir), this.config, {
      logger: this.logger,
    })
    this.refStore = new RefStore(this.repoPath, this.config, { logger: this.logger })
    this.resolver = new RefResolver(this.refStore, this.config)
    this.branchManager = new BranchManager(this.refStore, this.resolver, this.objects, this.config, {
      logger: this.logger,
    })
    this.tagManager = new TagManager(this.refStore, this.resolver, this.objects, this.config, {
      logger: this.logger,
    })
    this.mergeState = new MergeState(this.repoPath, this.config, { logger: this.logger })
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Whether the metadata directory and its HEAD record exist.
   */
  async exists(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.repoPath)
      return stat.isDirectory() && (await this.refStore.exists(this.config.headFile))
    } catch (err) {
      if (isSystemError(err, 'ENOENT') || isSystemError(err, 'ENOTDIR')) {
        return false
      }
      throw err
    }
  }

  /**
   * @throws RepositoryNotFoundError if the repository is not initialized
   */
  async requireRepository(): Promise<void> {
    if (!(await this.exists())) {
      throw new RepositoryNotFoundError(this.repoPath)
    }
  }

  /**
   * Create the metadata directory with an unborn default branch checked out.
   *
   * @throws ConflictError if a repository already exists here
   */
  async init(defaultBranch: string = this.config.defaultBranch): Promise<void> {
    assertRefName(defaultBranch, 'Branch', this.config.headFile)
    if (await this.exists()) {
      throw new ConflictError(`Repository already exists at ${this.repoPath}`)
    }

    await fs.mkdir(path.join(this.repoPath, this.config.objectsDir), { recursive: true })
    await fs.mkdir(path.join(this.repoPath, this.config.refsDir, this.config.headsDir), { recursive: true })
    await fs.mkdir(path.join(this.repoPath, this.config.refsDir, this.config.tagsDir), { recursive: true })

    await this.refStore.write(branchRefName(this.config, defaultBranch), null)
    await this.refStore.writeHead(branchRef(this.config, defaultBranch))

    this.logger.info('Initialized repository', { repoPath: this.repoPath, branch: defaultBranch })
  }

  /**
   * Remove the metadata directory. The working files are left alone.
   */
  async delete(): Promise<void> {
    await this.requireRepository()
    await fs.rm(this.repoPath, { recursive: true, force: true })
    this.logger.info('Deleted repository', { repoPath: this.repoPath })
  }

  // ==========================================================================
  // Refs
  // ==========================================================================

  /**
   * The HEAD record itself, unresolved.
   */
  async headRef(): Promise<Ref> {
    await this.requireRepository()
    const head = await this.refStore.readHead()
    if (head === null) {
      throw new InvalidReferenceError('HEAD is empty', this.config.headFile)
    }
    return head
  }

  /**
   * Commit HEAD resolves to, or null when the current branch is unborn.
   */
  async headCommit(): Promise<string | null> {
    await this.requireRepository()
    return this.resolver.resolve(symRef(this.config.headFile))
  }

  /**
   * Branch HEAD points to, or null when detached.
   */
  async currentBranch(): Promise<string | null> {
    await this.requireRepository()
    return this.branchManager.current()
  }

  /**
   * Full names of every branch and tag ref, sorted.
   */
  async refs(): Promise<string[]> {
    await this.requireRepository()
    return this.refStore.list()
  }

  async resolveRef(input: RefInput): Promise<string | null> {
    await this.requireRepository()
    return this.resolver.resolve(input)
  }

  /**
   * Point an existing ref at a new value.
   *
   * @param name - Full ref name (`refs/heads/main`) or `HEAD`
   * @throws RefNotFoundError if the ref does not exist
   */
  async updateRef(name: string, ref: Ref | null): Promise<void> {
    await this.requireRepository()
    const refName = name.toUpperCase() === this.config.headFile.toUpperCase() ? this.config.headFile : name
    if (!(await this.refStore.exists(refName))) {
      throw new NotFoundError(`Reference not found: ${name}`)
    }
    await this.refStore.write(refName, ref)
  }

  // ==========================================================================
  // Branches and tags
  // ==========================================================================

  async branches(): Promise<string[]> {
    await this.requireRepository()
    return this.branchManager.list()
  }

  async branchExists(name: string): Promise<boolean> {
    await this.requireRepository()
    return this.branchManager.exists(name)
  }

  /**
   * Create a branch, unborn unless a start point is given.
   */
  async addBranch(name: string, startPoint?: RefInput): Promise<string | null> {
    await this.requireRepository()
    return this.branchManager.create(name, startPoint)
  }

  async deleteBranch(name: string): Promise<void> {
    await this.requireRepository()
    await this.branchManager.delete(name)
  }

  async tags(): Promise<string[]> {
    await this.requireRepository()
    return this.tagManager.list()
  }

  async tagExists(name: string): Promise<boolean> {
    await this.requireRepository()
    return this.tagManager.exists(name)
  }

  async createTag(name: string, target: RefInput = symRef(this.config.headFile)): Promise<string> {
    await this.requireRepository()
    return this.tagManager.create(name, target)
  }

  async deleteTag(name: string): Promise<void> {
    await this.requireRepository()
    await this.tagManager.delete(name)
  }

  // ==========================================================================
  // Content
  // ==========================================================================

  /**
   * Store the content of one file as a blob.
   *
   * @param filePath - Absolute, or relative to the working directory
   * @throws InvalidArgumentError if the path is not a regular file
   */
  async saveFileContent(filePath: string): Promise<Blob> {
    await this.requireRepository()
    const absPath = path.resolve(this.workingDir, filePath)

    let content: Uint8Array
    try {
      const stat = await fs.stat(absPath)
      if (!stat.isFile()) {
        throw new InvalidArgumentError(`Not a file: ${filePath}`)
      }
      content = await fs.readFile(absPath)
    } catch (err) {
      if (isSystemError(err, 'ENOENT')) {
        throw new InvalidArgumentError(`Not a file: ${filePath}`, { cause: err })
      }
      throw err
    }

    const hash = await this.objects.saveBlob(content)
    return { hash }
  }

  /**
   * Store a directory's tree graph, every blob first and then every tree.
   *
   * @returns Root tree hash
   * @throws ConflictError if a file changes between hashing and saving
   */
  async saveDir(dirPath: string = this.workingDir): Promise<string> {
    await this.requireRepository()
    const snapshot = await this.snapshot(path.resolve(this.workingDir, dirPath))
    await this.persistSnapshot(snapshot)
    return snapshot.hash
  }

  /**
   * Map of every working file's `/`-separated relative path to its content
   * hash.
   */
  async workingDirSnapshot(): Promise<Map<string, string>> {
    await this.requireRepository()
    const snapshot = await this.snapshot(this.workingDir)
    return snapshot.files
  }

  async getCommit(hash: string): Promise<Commit> {
    await this.requireRepository()
    return this.objects.getCommit(hash)
  }

  private snapshot(dirPath: string): Promise<FsTreeSnapshot> {
    return buildTreeFromFs(dirPath, { hasher: this.config.hasher, ignore: [this.config.repoDirName] })
  }

  private async persistSnapshot(snapshot: FsTreeSnapshot): Promise<void> {
    for (const [hash, absPath] of snapshot.blobs) {
      const content = await fs.readFile(absPath)
      const saved = await this.objects.saveBlob(content)
      if (saved !== hash) {
        throw new ConflictError(`File changed while saving: ${absPath}`, [absPath])
      }
    }
    for (const tree of snapshot.subtrees.values()) {
      await this.objects.saveTree(tree)
    }
  }

  // ==========================================================================
  // History
  // ==========================================================================

  /**
   * Snapshot the working directory as a new commit on the current branch
   * (or on the detached HEAD). While a merge is in progress the merged
   * commit becomes the second parent and the merge state is cleared.
   *
   * @returns The new commit hash
   * @throws InvalidArgumentError if author or message is empty
   */
  async commitWorkingDir(author: string, message: string): Promise<string> {
    await this.requireRepository()
    if (!author) {
      throw new InvalidArgumentError('Author is required')
    }
    if (author.includes('\n')) {
      throw new InvalidArgumentError('Author must be a single line')
    }
    if (!message) {
      throw new InvalidArgumentError('Commit message is required')
    }

    const head = await this.headRef()
    const parent = await this.resolver.resolveRef(head)
    const parents = parent === null ? [] : [parent]

    const merging = await this.mergeState.isActive()
    if (merging) {
      const target = await this.mergeState.target()
      if (target !== null && !parents.includes(target)) {
        parents.push(target)
      }
    }

    const snapshot = await this.snapshot(this.workingDir)
    await this.persistSnapshot(snapshot)

    const commit: Commit = {
      treeHash: snapshot.hash,
      author,
      message,
      timestamp: this.now(),
      parents,
    }
    const hash = await this.objects.saveCommit(commit)

    await this.moveHead(head, hash)
    if (merging) {
      await this.mergeState.clear()
    }

    this.logger.info('Created commit', { hash, parents, tree: snapshot.hash })
    return hash
  }

  /**
   * First-parent history from `tip` (default: HEAD).
   */
  async log(tip: RefInput = symRef(this.config.headFile)): Promise<CommitLog> {
    await this.requireRepository()
    const hash = await this.resolver.resolve(tip)
    return new CommitLog(this.objects, hash)
  }

  /**
   * Move whatever HEAD names to `hash`: the branch it points to, or HEAD
   * itself when detached.
   */
  private async moveHead(head: Ref, hash: string): Promise<void> {
    if (head.type === 'symbolic') {
      await this.refStore.write(head.target, hashRef(hash))
    } else {
      await this.refStore.writeHead(hashRef(hash))
    }
  }

  // ==========================================================================
  // Diff
  // ==========================================================================

  /**
   * Compare two sources. Either side defaults to HEAD; an unborn ref is the
   * empty tree.
   */
  async diff(source1?: DiffSource, source2?: DiffSource): Promise<TreeDiff> {
    await this.requireRepository()
    const head = symRef(this.config.headFile)

    let side1: ResolvedSource
    let side2: ResolvedSource
    try {
      side1 = await this.resolveSource(source1 ?? head)
      side2 = await this.resolveSource(source2 ?? head)
    } catch (err) {
      throw withContext(err, 'Error loading commit or tree')
    }

    if (hashTree(side1.tree, this.config.hasher) === hashTree(side2.tree, this.config.hasher)) {
      return new TreeDiff()
    }
    return diffTrees(side1.tree, side2.tree, side1.lookup, side2.lookup)
  }

  /**
   * Changes in the working directory relative to HEAD.
   */
  async status(): Promise<TreeDiff> {
    return this.diff(symRef(this.config.headFile), { type: 'directory', path: this.workingDir })
  }

  private async resolveSource(source: DiffSource): Promise<ResolvedSource> {
    if (source !== null && source !== undefined && isDirectorySource(source)) {
      const snapshot = await this.snapshot(path.resolve(this.workingDir, source.path))
      return { tree: snapshot.tree, lookup: createTreeLookup(this.objects, snapshot.subtrees) }
    }

    const lookup = createTreeLookup(this.objects)
    const commitHash = await this.resolver.resolve(source)
    if (commitHash === null) {
      return { tree: EMPTY_TREE, lookup }
    }
    const commit = await this.objects.getCommit(commitHash)
    return { tree: await lookup(commit.treeHash), lookup }
  }

  // ==========================================================================
  // Checkout
  // ==========================================================================

  /**
   * Make the working directory match `target` and move HEAD.
   *
   * A branch name leaves HEAD attached to that branch; a hash or tag
   * detaches it; `HEAD` leaves it as it is.
   *
   * @throws InvalidReferenceError if the target cannot be resolved
   * @throws ConflictError if local changes or untracked files would be lost
   */
  async checkout(target: RefInput): Promise<CheckoutSummary> {
    await this.requireRepository()
    if (target === null || target === undefined) {
      throw new InvalidReferenceError('Checkout target is required')
    }

    const ref = typeof target === 'string' ? await this.resolver.classify(target) : target
    let commitHash: string | null
    let targetTree: string | null
    try {
      commitHash = await this.resolver.resolveRef(ref)
      targetTree = commitHash === null ? null : (await this.objects.getCommit(commitHash)).treeHash
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new InvalidReferenceError(`Invalid reference: ${formatRef(ref)}`, formatRef(ref), { cause: err })
      }
      throw withContext(err, 'Cannot checkout')
    }

    const currentHead = await this.headRef()
    let newHead: Ref
    if (ref.type === 'symbolic' && ref.target.toUpperCase() === this.config.headFile.toUpperCase()) {
      newHead = currentHead
    } else if (ref.type === 'symbolic' && shortBranchName(this.config, ref.target) !== null) {
      newHead = ref
    } else if (commitHash !== null) {
      newHead = hashRef(commitHash)
    } else {
      throw new InvalidReferenceError(`Reference has no commit: ${formatRef(ref)}`, formatRef(ref))
    }

    const currentTree = await this.commitTree(await this.resolver.resolveRef(currentHead), 'Cannot checkout')

    const result = await reconcileWorkingDir({
      workingDir: this.workingDir,
      store: this.objects,
      worktree: await this.snapshot(this.workingDir),
      currentTree,
      targetTree,
      logger: this.logger,
    })

    await this.refStore.writeHead(newHead)
    this.logger.info('Checked out', { head: formatRef(newHead), commit: commitHash })
    return { ...result, head: newHead, commit: commitHash }
  }

  private async commitTree(commitHash: string | null, context: string): Promise<string | null> {
    if (commitHash === null) {
      return null
    }
    try {
      const commit = await this.objects.getCommit(commitHash)
      return commit.treeHash
    } catch (err) {
      throw withContext(err, context)
    }
  }

  // ==========================================================================
  // Merge
  // ==========================================================================

  /**
   * Merge `target` into HEAD.
   *
   * Fast-forwards update the working directory (with the checkout safety
   * checks) and then move the branch. Three-way merges only enter the merge
   * state. Up-to-date and disconnected merges change nothing.
   *
   * @throws MergeInProgressError if a merge is already in progress
   * @throws InvalidReferenceError if the target does not resolve to a commit
   */
  async merge(target: RefInput): Promise<MergeResult> {
    await this.requireRepository()
    if (await this.mergeState.isActive()) {
      throw new MergeInProgressError()
    }

    const targetHash = await this.resolver.resolve(target)
    if (targetHash === null) {
      throw new InvalidReferenceError('Merge target has no commits')
    }
    const targetTree = await this.commitTree(targetHash, 'Cannot merge')

    const head = await this.headRef()
    const headHash = await this.resolver.resolveRef(head)
    const classification = await classifyMerge(this.objects, headHash, targetHash)
    this.logger.info('Classified merge', { ...classification })

    let written: string[] = []
    let removed: string[] = []

    switch (classification.status) {
      case MergeStatus.FAST_FORWARD: {
        const result = await reconcileWorkingDir({
          workingDir: this.workingDir,
          store: this.objects,
          worktree: await this.snapshot(this.workingDir),
          currentTree: await this.commitTree(headHash, 'Cannot merge'),
          targetTree,
          logger: this.logger,
        })
        written = result.written
        removed = result.removed
        await this.moveHead(head, targetHash)
        break
      }
      case MergeStatus.THREE_WAY:
        await this.mergeState.start(targetHash)
        break
      case MergeStatus.UP_TO_DATE:
      case MergeStatus.DISCONNECTED:
        break
    }

    return { ...classification, written, removed }
  }

  /**
   * Enter the merge state directly.
   *
   * @throws MergeInProgressError if a merge is already in progress
   */
  async startMerge(target: RefInput = null): Promise<void> {
    await this.requireRepository()
    const hash = await this.resolver.resolve(target)
    await this.mergeState.start(hash)
  }

  async isMerging(): Promise<boolean> {
    await this.requireRepository()
    return this.mergeState.isActive()
  }

  /**
   * Commit being merged, or null when none is recorded.
   */
  async mergeTarget(): Promise<string | null> {
    await this.requireRepository()
    return this.mergeState.target()
  }

  /**
   * Leave the merge state without touching HEAD or any branch.
   *
   * @throws NotFoundError if no merge is in progress
   */
  async abortMerge(): Promise<void> {
    await this.requireRepository()
    await this.mergeState.abort()
  }
}
