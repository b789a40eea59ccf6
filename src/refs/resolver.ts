/**
 * @fileoverview Reference Resolver
 *
 * Turns user input (a {@link Ref}, a ref name, or a raw hash string) into a
 * concrete commit hash, following symbolic indirection.
 *
 * Strings are classified by probing, in this order:
 * 1. `HEAD` (any case)
 * 2. A full ref path that exists, e.g. `refs/heads/main`
 * 3. A short branch or tag name that exists (a name that is both is a
 *    {@link ConflictError})
 * 4. A well-formed hash
 *
 * Ref names are always probed before hashes, so a branch whose name looks
 * like a hash still resolves as a branch.
 *
 * @module refs/resolver
 *
 * @example
 * ```typescript
 * const resolver = new RefResolver(refStore, config)
 * await resolver.resolve('HEAD')        // '3b18e5...' or null when unborn
 * await resolver.resolve('feature')     // tip of refs/heads/feature
 * await resolver.resolve(hashRef(hash)) // hash
 * ```
 */

import type { ResolvedConfig } from '../core/config'
import { ConflictError, InvalidReferenceError } from '../core/errors'
import { isValidHash } from '../utils/hash'
import { branchRefName, formatRef, hashRef, symRef, tagRefName, type Ref } from './ref'
import type { RefStore } from './storage'

/**
 * Anything the resolver accepts. `null` and `undefined` resolve to `null`.
 */
export type RefInput = Ref | string | null | undefined

export interface RefResolverOptions {
  /** Maximum symbolic indirections to follow (default: 10) */
  maxDepth?: number
}

export class RefResolver {
  private readonly maxDepth: number

  constructor(
    private readonly refs: RefStore,
    private readonly config: ResolvedConfig,
    options: RefResolverOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? 10
  }

  /**
   * Resolve input to a commit hash, or `null` for an unborn branch or absent
   * input.
   *
   * @throws InvalidReferenceError if a string is neither a ref nor a hash
   * @throws RefNotFoundError if a symbolic ref names a missing record
   * @throws ConflictError if a short name matches both a branch and a tag
   */
  async resolve(input: RefInput): Promise<string | null> {
    if (input === null || input === undefined) {
      return null
    }
    const ref = typeof input === 'string' ? await this.classify(input) : input
    return this.resolveRef(ref)
  }

  /**
   * Classify a string as a symbolic ref or a hash without following it.
   */
  async classify(input: string): Promise<Ref> {
    if (!input) {
      throw new InvalidReferenceError('Reference is empty', input)
    }

    if (this.isHead(input)) {
      return symRef(this.config.headFile)
    }

    if (input.startsWith(`${this.config.refsDir}/`) && (await this.refs.exists(input))) {
      return symRef(input)
    }

    const branch = branchRefName(this.config, input)
    const tag = tagRefName(this.config, input)
    const [isBranch, isTag] = await Promise.all([this.refs.exists(branch), this.refs.exists(tag)])

    if (isBranch && isTag) {
      throw new ConflictError(`Reference "${input}" is ambiguous: both a branch and a tag`, [branch, tag])
    }
    if (isBranch) return symRef(branch)
    if (isTag) return symRef(tag)

    if (this.isHash(input)) {
      return hashRef(input)
    }

    throw new InvalidReferenceError(`Invalid reference: ${input}`, input)
  }

  /**
   * Follow a ref to the hash it ultimately names.
   */
  async resolveRef(ref: Ref): Promise<string | null> {
    const visited = new Set<string>()
    let current: Ref | null = ref

    for (let depth = 0; depth <= this.maxDepth; depth++) {
      if (current === null) {
        return null
      }

      if (current.type === 'hash') {
        if (!this.isHash(current.hash)) {
          throw new InvalidReferenceError(`Invalid hash: ${current.hash}`, current.hash)
        }
        return current.hash
      }

      const name = this.isHead(current.target) ? this.config.headFile : current.target
      if (visited.has(name)) {
        throw new InvalidReferenceError(`Circular reference detected: ${name}`, name)
      }
      visited.add(name)

      current = await this.refs.read(name)
    }

    throw new InvalidReferenceError(`Max ref resolution depth exceeded: ${this.maxDepth}`, formatRef(ref))
  }

  isHash(value: string): boolean {
    return isValidHash(value, this.config.hashLength, this.config.hashCharset)
  }

  private isHead(name: string): boolean {
    return name.toUpperCase() === this.config.headFile.toUpperCase()
  }
}
