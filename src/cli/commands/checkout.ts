/**
 * @fileoverview `checkout` command
 *
 * @module cli/commands/checkout
 */

import { InvalidArgumentError } from '../../core/errors'
import { shortBranchName } from '../../refs/ref'
import type { CommandContext } from '../index'

/**
 * Switch to a branch, or detach HEAD at a tag or commit. Refuses without
 * touching anything when local work would be lost.
 *
 * @example
 * // arbor checkout feature
 * // arbor checkout v1.0
 */
export async function checkoutCommand(ctx: CommandContext): Promise<void> {
  const { args, repo, stdout } = ctx
  if (args.length < 1) {
    throw new InvalidArgumentError('Usage: arbor checkout <target>')
  }

  const summary = await repo.checkout(args[0])
  const branch = summary.head.type === 'symbolic' ? shortBranchName(repo.config, summary.head.target) : null

  if (branch !== null) {
    stdout(`Switched to branch '${branch}'`)
  } else {
    stdout(`HEAD is now at ${summary.commit ?? '(unborn)'}`)
  }
  if (summary.written.length > 0 || summary.removed.length > 0) {
    stdout(`Updated ${summary.written.length} file(s), removed ${summary.removed.length} file(s)`)
  }
}
