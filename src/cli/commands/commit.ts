/**
 * @fileoverview `commit` command
 *
 * @module cli/commands/commit
 */

import { InvalidArgumentError } from '../../core/errors'
import type { CommandContext } from '../index'
import { stringOption } from '../options'

/**
 * Snapshot the working directory as a commit on the current branch.
 *
 * @example
 * // arbor commit -m "Initial import" --author Ada
 */
export async function commitCommand(ctx: CommandContext): Promise<void> {
  const { options, repo, stdout } = ctx
  const message = stringOption(options, 'message')
  const author = stringOption(options, 'author')

  if (!author) {
    throw new InvalidArgumentError('Author name is required (--author <name>)')
  }
  if (!message) {
    throw new InvalidArgumentError('Commit message is required (-m <message>)')
  }

  const hash = await repo.commitWorkingDir(author, message)
  stdout(`Commit created: ${hash}`)
  stdout(`Author: ${author}`)
  stdout(`Message: ${message}`)
}
