/**
 * @fileoverview Ref Storage
 *
 * Reads and writes ref records under the repository metadata directory. Ref
 * names are paths relative to that directory: the HEAD pointer is `HEAD`,
 * branches are `refs/heads/<name>` and tags `refs/tags/<name>` (directory
 * names come from {@link ResolvedConfig}).
 *
 * Writes go to a temporary file that is renamed over the record, so a ref is
 * always either its old or its new value. There is no compare-and-swap:
 * concurrent writers race and the last one wins.
 *
 * @module refs/storage
 */

import type { Dirent } from 'fs'
import * as fs from 'fs/promises'
import * as path from 'path'
import type { ResolvedConfig } from '../core/config'
import { InvalidArgumentError, RefNotFoundError, isSystemError } from '../core/errors'
import { noopLogger, type Logger } from '../utils/logger'
import { formatRef, isValidRefName, parseRefContent, serializeRefContent, type Ref } from './ref'

export interface RefStoreOptions {
  logger?: Logger
}

/**
 * Filesystem-backed ref records.
 */
export class RefStore {
  private readonly logger: Logger

  constructor(
    public readonly repoPath: string,
    private readonly config: ResolvedConfig,
    options: RefStoreOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ component: 'refs' })
  }

  /**
   * Name of the HEAD record.
   */
  get headName(): string {
    return this.config.headFile
  }

  /**
   * Absolute path of a ref record.
   *
   * @throws InvalidArgumentError if the name is neither HEAD nor a valid ref path
   */
  refPath(name: string): string {
    if (name !== this.config.headFile && !isValidRefName(name)) {
      throw new InvalidArgumentError(`Invalid ref name: "${name}"`)
    }
    return path.join(this.repoPath, ...name.split('/'))
  }

  /**
   * Check whether a record exists as a regular file.
   */
  async exists(name: string): Promise<boolean> {
    if (name !== this.config.headFile && !isValidRefName(name)) {
      return false
    }
    try {
      const stat = await fs.stat(this.refPath(name))
      return stat.isFile()
    } catch (err) {
      if (isSystemError(err, 'ENOENT') || isSystemError(err, 'ENOTDIR')) {
        return false
      }
      throw err
    }
  }

  /**
   * Read a record. An empty record (unborn branch) reads as `null`.
   *
   * @throws RefNotFoundError if the record does not exist
   */
  async read(name: string): Promise<Ref | null> {
    let content: string
    try {
      content = await fs.readFile(this.refPath(name), 'utf8')
    } catch (err) {
      if (isSystemError(err, 'ENOENT') || isSystemError(err, 'ENOTDIR') || isSystemError(err, 'EISDIR')) {
        throw new RefNotFoundError(name, { cause: err })
      }
      throw err
    }
    return parseRefContent(content)
  }

  /**
   * Create or overwrite a record. `null` writes an unborn (empty) record.
   */
  async write(name: string, ref: Ref | null): Promise<void> {
    const refPath = this.refPath(name)
    await fs.mkdir(path.dirname(refPath), { recursive: true })

    const tempPath = `${refPath}.lock`
    await fs.writeFile(tempPath, serializeRefContent(ref), 'utf8')
    await fs.rename(tempPath, refPath)

    this.logger.debug('Updated ref', { ref: name, value: formatRef(ref) })
  }

  /**
   * Remove a record.
   *
   * @throws RefNotFoundError if the record does not exist
   */
  async delete(name: string): Promise<void> {
    try {
      await fs.unlink(this.refPath(name))
    } catch (err) {
      if (isSystemError(err, 'ENOENT')) {
        throw new RefNotFoundError(name, { cause: err })
      }
      throw err
    }
    this.logger.debug('Deleted ref', { ref: name })
  }

  /**
   * List full names of every record below a ref directory, sorted.
   *
   * @param prefix - Directory relative to the metadata root, e.g. `refs/heads`
   */
  async list(prefix: string = this.config.refsDir): Promise<string[]> {
    const names: string[] = []
    const stack: string[] = [prefix]

    while (stack.length > 0) {
      const current = stack.pop()
      if (current === undefined) break

      let entries: Dirent[]
      try {
        entries = await fs.readdir(path.join(this.repoPath, ...current.split('/')), { withFileTypes: true })
      } catch (err) {
        if (isSystemError(err, 'ENOENT')) continue
        throw err
      }

      for (const entry of entries) {
        const name = `${current}/${entry.name}`
        if (entry.isDirectory()) {
          stack.push(name)
        } else if (entry.isFile() && !entry.name.endsWith('.lock')) {
          names.push(name)
        }
      }
    }

    return names.sort()
  }

  async readHead(): Promise<Ref | null> {
    return this.read(this.config.headFile)
  }

  async writeHead(ref: Ref): Promise<void> {
    await this.write(this.config.headFile, ref)
  }
}
