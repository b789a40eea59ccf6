/**
 * @fileoverview Branch Management
 *
 * Branches are mutable ref records under `refs/heads/`. A new branch is
 * either unborn (empty record) or points at the commit its start point
 * resolves to. HEAD normally names a branch symbolically.
 *
 * @module refs/branch
 *
 * @example
 * ```typescript
 * const branches = new BranchManager(refStore, resolver, store, config)
 * await branches.create('feature', 'HEAD')
 * await branches.list()   // ['feature', 'main']
 * await branches.delete('feature')
 * ```
 */

import type { ResolvedConfig } from '../core/config'
import { ConflictError, InvalidArgumentError, NotFoundError, RefNotFoundError, withContext } from '../core/errors'
import type { CommitProvider } from '../types/storage'
import { noopLogger, type Logger } from '../utils/logger'
import { branchRefName, hashRef, isValidRefName, shortBranchName, tagRefName } from './ref'
import type { RefInput, RefResolver } from './resolver'
import type { RefStore } from './storage'

export interface BranchManagerOptions {
  logger?: Logger
}

/**
 * Validate a short branch or tag name. The HEAD file name is reserved in any
 * case, since the resolver always reads it as HEAD.
 *
 * @throws InvalidArgumentError if the name is empty, reserved or not a valid ref name
 */
export function assertRefName(name: string, what: 'Branch' | 'Tag', headFile: string): void {
  if (!name) {
    throw new InvalidArgumentError(`${what} name is required`)
  }
  if (!isValidRefName(name) || name.toUpperCase() === headFile.toUpperCase()) {
    throw new InvalidArgumentError(`Invalid ${what.toLowerCase()} name: "${name}"`)
  }
}

export class BranchManager {
  private readonly logger: Logger

  constructor(
    private readonly refs: RefStore,
    private readonly resolver: RefResolver,
    private readonly commits: CommitProvider,
    private readonly config: ResolvedConfig,
    options: BranchManagerOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ component: 'branch' })
  }

  /**
   * Short names of all branches, sorted.
   */
  async list(): Promise<string[]> {
    const prefix = `${this.config.refsDir}/${this.config.headsDir}`
    const names = await this.refs.list(prefix)
    return names.map((name) => name.slice(prefix.length + 1))
  }

  async exists(name: string): Promise<boolean> {
    return this.refs.exists(branchRefName(this.config, name))
  }

  /**
   * Branch HEAD names, or null when HEAD is detached.
   */
  async current(): Promise<string | null> {
    const head = await this.refs.readHead()
    if (head === null || head.type !== 'symbolic') {
      return null
    }
    return shortBranchName(this.config, head.target)
  }

  /**
   * Create a branch. Without a start point (or when it resolves to nothing)
   * the branch is unborn.
   *
   * @throws InvalidArgumentError for an empty or invalid name
   * @throws ConflictError if a branch or tag of that name exists
   * @throws NotFoundError if the start point names a missing commit
   */
  async create(name: string, startPoint?: RefInput): Promise<string | null> {
    assertRefName(name, 'Branch', this.config.headFile)

    if (await this.exists(name)) {
      throw new ConflictError(`Branch '${name}' already exists`, [name])
    }
    if (await this.refs.exists(tagRefName(this.config, name))) {
      throw new ConflictError(`A tag named '${name}' already exists`, [name])
    }

    const target = await this.resolver.resolve(startPoint)
    if (target !== null) {
      try {
        await this.commits.getCommit(target)
      } catch (err) {
        if (err instanceof NotFoundError) {
          throw new NotFoundError(`Commit ${target} does not exist`, { cause: err })
        }
        throw withContext(err, `Cannot create branch '${name}'`)
      }
    }

    await this.refs.write(branchRefName(this.config, name), target === null ? null : hashRef(target))
    this.logger.info('Created branch', { branch: name, target })
    return target
  }

  /**
   * Delete a branch.
   *
   * @throws RefNotFoundError if the branch does not exist
   * @throws InvalidArgumentError if it is the only branch
   * @throws ConflictError if HEAD points to it
   */
  async delete(name: string): Promise<void> {
    assertRefName(name, 'Branch', this.config.headFile)

    if (!(await this.exists(name))) {
      throw new RefNotFoundError(branchRefName(this.config, name))
    }

    const all = await this.list()
    if (all.length <= 1) {
      throw new InvalidArgumentError(`Cannot delete the last branch '${name}'`)
    }

    if ((await this.current()) === name) {
      throw new ConflictError(`Cannot delete the checked out branch '${name}'`, [name])
    }

    await this.refs.delete(branchRefName(this.config, name))
    this.logger.info('Deleted branch', { branch: name })
  }
}
