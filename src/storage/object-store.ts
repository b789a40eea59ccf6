/**
 * @fileoverview Filesystem Object Store
 *
 * Content-addressed, append-only persistence for blobs, trees and commits.
 * Each object lives in its own deflated file under a two-character shard
 * directory:
 *
 * ```
 * <repo>/objects/<hash[0:2]>/<hash>
 * ```
 *
 * Saving is idempotent: an object whose file already exists is not written
 * again. Objects are written to a temporary file and renamed into place, so
 * a reader never observes a partially written object.
 *
 * @module storage/object-store
 *
 * @example
 * ```typescript
 * const store = new FileObjectStore('/work/project/.arbor/objects', config)
 * const hash = await store.saveBlob(new TextEncoder().encode('hello'))
 * const bytes = await store.getBlob(hash)
 * ```
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import pako from 'pako'
import type { ResolvedConfig } from '../core/config'
import { CorruptObjectError, ObjectNotFoundError, isSystemError } from '../core/errors'
import { decodeObject, encodeObject, hashObject } from '../core/objects'
import type { Commit, ObjectKind, StoredObject, Tree } from '../types/objects'
import type { ObjectStore } from '../types/storage'
import { isValidHash } from '../utils/hash'
import { noopLogger, type Logger } from '../utils/logger'

/**
 * Options for {@link FileObjectStore}.
 */
export interface ObjectStoreOptions {
  logger?: Logger
}

let tempCounter = 0

/**
 * Object store backed by one file per object.
 */
export class FileObjectStore implements ObjectStore {
  private readonly logger: Logger

  constructor(
    public readonly objectsPath: string,
    private readonly config: ResolvedConfig,
    options: ObjectStoreOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ component: 'object-store' })
  }

  /**
   * Absolute path of the file holding `hash`.
   */
  objectPath(hash: string): string {
    return path.join(this.objectsPath, hash.slice(0, 2), hash)
  }

  // ==========================================================================
  // Write
  // ==========================================================================

  /**
   * Persist an object and return its content address. Saving an object that
   * is already stored is a no-op that returns the same hash.
   */
  async save(object: StoredObject): Promise<string> {
    const hash = hashObject(object, this.config.hasher)
    const objectPath = this.objectPath(hash)

    if (await this.fileExists(objectPath)) {
      return hash
    }

    const compressed = pako.deflate(encodeObject(object))
    await fs.mkdir(path.dirname(objectPath), { recursive: true })

    const tempPath = `${objectPath}.tmp-${process.pid}-${tempCounter++}`
    await fs.writeFile(tempPath, compressed)
    await fs.rename(tempPath, objectPath)

    this.logger.debug('Stored object', { kind: object.kind, hash })
    return hash
  }

  saveBlob(content: Uint8Array): Promise<string> {
    return this.save({ kind: 'blob', value: content })
  }

  saveTree(tree: Tree): Promise<string> {
    return this.save({ kind: 'tree', value: tree })
  }

  saveCommit(commit: Commit): Promise<string> {
    return this.save({ kind: 'commit', value: commit })
  }

  // ==========================================================================
  // Read
  // ==========================================================================

  /**
   * Load and decode an object of the given kind.
   *
   * @throws ObjectNotFoundError if nothing is stored under `hash`
   * @throws CorruptObjectError if the stored bytes do not decode as `kind`
   */
  async load(kind: ObjectKind, hash: string): Promise<StoredObject> {
    if (!isValidHash(hash, this.config.hashLength, this.config.hashCharset)) {
      throw new ObjectNotFoundError(hash)
    }

    let compressed: Uint8Array
    try {
      compressed = await fs.readFile(this.objectPath(hash))
    } catch (err) {
      if (isSystemError(err, 'ENOENT')) {
        throw new ObjectNotFoundError(hash, { cause: err })
      }
      throw err
    }

    let inflated: Uint8Array
    try {
      inflated = pako.inflate(compressed)
    } catch (err) {
      throw new CorruptObjectError(`Failed to inflate object ${hash}`, { hash, objectKind: kind }, { cause: err })
    }

    let object: StoredObject
    try {
      object = decodeObject(inflated, kind, this.config)
    } catch (err) {
      if (err instanceof CorruptObjectError) {
        throw new CorruptObjectError(
          `Corrupt ${kind} ${hash}: ${err.message}`,
          { hash, objectKind: kind },
          { cause: err }
        )
      }
      throw err
    }

    if (hashObject(object, this.config.hasher) !== hash) {
      throw new CorruptObjectError(`Content of ${kind} ${hash} does not match its hash`, {
        hash,
        objectKind: kind,
      })
    }

    return object
  }

  async getBlob(hash: string): Promise<Uint8Array> {
    const object = await this.load('blob', hash)
    if (object.kind !== 'blob') {
      throw new CorruptObjectError(`Expected blob ${hash}`, { hash, objectKind: object.kind })
    }
    return object.value
  }

  async getTree(hash: string): Promise<Tree> {
    const object = await this.load('tree', hash)
    if (object.kind !== 'tree') {
      throw new CorruptObjectError(`Expected tree ${hash}`, { hash, objectKind: object.kind })
    }
    return object.value
  }

  async getCommit(hash: string): Promise<Commit> {
    const object = await this.load('commit', hash)
    if (object.kind !== 'commit') {
      throw new CorruptObjectError(`Expected commit ${hash}`, { hash, objectKind: object.kind })
    }
    return object.value
  }

  async hasObject(hash: string): Promise<boolean> {
    if (!isValidHash(hash, this.config.hashLength, this.config.hashCharset)) {
      return false
    }
    return this.fileExists(this.objectPath(hash))
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath)
      return true
    } catch (err) {
      if (isSystemError(err, 'ENOENT')) {
        return false
      }
      throw err
    }
  }
}
