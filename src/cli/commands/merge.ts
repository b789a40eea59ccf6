/**
 * @fileoverview `merge` command
 *
 * @module cli/commands/merge
 */

import { InvalidArgumentError } from '../../core/errors'
import { MergeStatus } from '../../ops/merge'
import type { CommandContext } from '../index'
import { flagOption } from '../options'

/**
 * Merge a commit into HEAD, or abort the merge in progress.
 *
 * @example
 * // arbor merge feature
 * // arbor merge --abort
 */
export async function mergeCommand(ctx: CommandContext): Promise<void> {
  const { args, options, repo, stdout } = ctx

  if (flagOption(options, 'abort')) {
    await repo.abortMerge()
    stdout('Merge aborted.')
    return
  }

  if (args.length < 1) {
    throw new InvalidArgumentError('Usage: arbor merge <target> | --abort')
  }

  const result = await repo.merge(args[0])
  switch (result.status) {
    case MergeStatus.UP_TO_DATE:
      stdout('Already up to date.')
      break
    case MergeStatus.FAST_FORWARD:
      stdout(`Fast-forward to ${result.target}`)
      break
    case MergeStatus.THREE_WAY:
      stdout(`Merging ${result.target} (base ${result.base ?? 'none'}); commit to conclude the merge.`)
      break
    case MergeStatus.DISCONNECTED:
      stdout(`Refusing to merge ${args[0]}: no common history with HEAD.`)
      break
  }
}
