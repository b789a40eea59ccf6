/**
 * @fileoverview Tag Management
 *
 * Tags are immutable names for commits. A tag record always holds a literal
 * hash, never a symbolic ref, and is never rewritten in place: moving a tag
 * means deleting and recreating it.
 *
 * @module refs/tag
 */

import type { ResolvedConfig } from '../core/config'
import { ConflictError, NotFoundError, RefNotFoundError, withContext } from '../core/errors'
import type { CommitProvider } from '../types/storage'
import { noopLogger, type Logger } from '../utils/logger'
import { assertRefName } from './branch'
import { branchRefName, hashRef, tagRefName } from './ref'
import type { RefInput, RefResolver } from './resolver'
import type { RefStore } from './storage'

export interface TagManagerOptions {
  logger?: Logger
}

export class TagManager {
  private readonly logger: Logger

  constructor(
    private readonly refs: RefStore,
    private readonly resolver: RefResolver,
    private readonly commits: CommitProvider,
    private readonly config: ResolvedConfig,
    options: TagManagerOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ component: 'tag' })
  }

  /**
   * Short names of all tags, sorted.
   */
  async list(): Promise<string[]> {
    const prefix = `${this.config.refsDir}/${this.config.tagsDir}`
    const names = await this.refs.list(prefix)
    return names.map((name) => name.slice(prefix.length + 1))
  }

  async exists(name: string): Promise<boolean> {
    return this.refs.exists(tagRefName(this.config, name))
  }

  /**
   * Commit a tag points to.
   *
   * @throws RefNotFoundError if the tag does not exist
   */
  async get(name: string): Promise<string> {
    const refName = tagRefName(this.config, name)
    const ref = await this.refs.read(refName)
    if (ref === null || ref.type !== 'hash') {
      throw new NotFoundError(`Tag '${name}' does not point to a commit`)
    }
    return ref.hash
  }

  /**
   * Create a tag pointing at the commit `target` resolves to.
   *
   * @throws InvalidArgumentError for an empty or invalid name
   * @throws ConflictError if the tag (or a branch of that name) exists
   * @throws NotFoundError if the target does not name a stored commit
   */
  async create(name: string, target: RefInput): Promise<string> {
    assertRefName(name, 'Tag', this.config.headFile)

    if (await this.exists(name)) {
      throw new ConflictError(`Tag '${name}' already exists`, [name])
    }
    if (await this.refs.exists(branchRefName(this.config, name))) {
      throw new ConflictError(`A branch named '${name}' already exists`, [name])
    }

    const hash = await this.resolver.resolve(target)
    if (hash === null) {
      throw new NotFoundError(`Cannot tag '${name}': target commit does not exist`)
    }

    try {
      await this.commits.getCommit(hash)
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`Commit ${hash} does not exist`, { cause: err })
      }
      throw withContext(err, `Cannot create tag '${name}'`)
    }

    await this.refs.write(tagRefName(this.config, name), hashRef(hash))
    this.logger.info('Created tag', { tag: name, target: hash })
    return hash
  }

  /**
   * Delete a tag.
   *
   * @throws RefNotFoundError if the tag does not exist
   */
  async delete(name: string): Promise<void> {
    assertRefName(name, 'Tag', this.config.headFile)
    if (!(await this.exists(name))) {
      throw new RefNotFoundError(tagRefName(this.config, name))
    }
    await this.refs.delete(tagRefName(this.config, name))
    this.logger.info('Deleted tag', { tag: name })
  }
}
