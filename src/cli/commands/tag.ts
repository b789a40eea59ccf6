/**
 * @fileoverview `tag` command
 *
 * @module cli/commands/tag
 */

import { InvalidArgumentError } from '../../core/errors'
import type { CommandContext } from '../index'
import { flagOption } from '../options'

/**
 * List, create, or delete tags. A new tag points at HEAD unless a commit
 * is given.
 *
 * @example
 * // arbor tag                 - List tags
 * // arbor tag v1.0            - Tag HEAD
 * // arbor tag v0.9 3b18e5...  - Tag a commit
 * // arbor tag -d v1.0         - Delete a tag
 */
export async function tagCommand(ctx: CommandContext): Promise<void> {
  const { args, options, repo, stdout } = ctx

  if (flagOption(options, 'delete')) {
    if (args.length < 1) {
      throw new InvalidArgumentError('Usage: arbor tag -d <name>')
    }
    await repo.deleteTag(args[0])
    stdout(`Tag "${args[0]}" deleted.`)
    return
  }

  if (args.length > 0) {
    const [name, target] = args
    const hash = target === undefined ? await repo.createTag(name) : await repo.createTag(name, target)
    stdout(`Tag "${name}" created at ${hash}.`)
    return
  }

  const tags = await repo.tags()
  if (tags.length === 0) {
    stdout('No tags found.')
    return
  }
  for (const tag of tags) {
    stdout(tag)
  }
}
