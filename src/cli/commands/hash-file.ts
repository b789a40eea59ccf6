/**
 * @fileoverview `hash-file` command
 *
 * Prints the content address a file would be stored under. With `--write`
 * the content is also saved to the object store.
 *
 * @module cli/commands/hash-file
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { InvalidArgumentError, isSystemError } from '../../core/errors'
import type { CommandContext } from '../index'
import { flagOption } from '../options'

/**
 * @example
 * // arbor hash-file notes.txt
 * // Hash: 5e1c309dae7f45e0f39b1bf3ac3cd9db12e7d689
 */
export async function hashFileCommand(ctx: CommandContext): Promise<void> {
  const { cwd, args, options, repo, stdout } = ctx
  if (args.length < 1) {
    throw new InvalidArgumentError('Usage: arbor hash-file <path> [--write]')
  }
  const filePath = args[0]
  const absPath = path.resolve(cwd, filePath)

  let content: Uint8Array
  try {
    content = await fs.readFile(absPath)
  } catch (err) {
    if (isSystemError(err, 'ENOENT') || isSystemError(err, 'EISDIR')) {
      throw new InvalidArgumentError(`File ${filePath} does not exist`, { cause: err })
    }
    throw err
  }

  stdout(`Hash: ${repo.config.hasher.hash(content)}`)

  if (flagOption(options, 'write')) {
    await repo.saveFileContent(absPath)
    stdout(`Saved file ${filePath}`)
  }
}
