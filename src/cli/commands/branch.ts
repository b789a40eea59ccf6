/**
 * @fileoverview `branch` command
 *
 * @module cli/commands/branch
 */

import { InvalidArgumentError } from '../../core/errors'
import type { CommandContext } from '../index'
import { flagOption } from '../options'

/**
 * List, create, or delete branches.
 *
 * @example
 * // arbor branch                  - List branches, current one starred
 * // arbor branch feature          - Create an unborn branch
 * // arbor branch feature main     - Create a branch at main's tip
 * // arbor branch -d feature       - Delete a branch
 */
export async function branchCommand(ctx: CommandContext): Promise<void> {
  const { args, options, repo, stdout } = ctx

  if (flagOption(options, 'delete')) {
    if (args.length < 1) {
      throw new InvalidArgumentError('Usage: arbor branch -d <name>')
    }
    await repo.deleteBranch(args[0])
    stdout(`Branch "${args[0]}" deleted.`)
    return
  }

  if (args.length > 0) {
    const [name, startPoint] = args
    const tip = await repo.addBranch(name, startPoint)
    stdout(tip === null ? `Branch "${name}" created.` : `Branch "${name}" created at ${tip}.`)
    return
  }

  const branches = await repo.branches()
  if (branches.length === 0) {
    stdout('No branches found.')
    return
  }

  const current = await repo.currentBranch()
  for (const branch of branches) {
    stdout(branch === current ? `* ${branch}` : `  ${branch}`)
  }
}
