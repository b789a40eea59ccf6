/**
 * @fileoverview `status` command
 *
 * @module cli/commands/status
 */

import { formatRef } from '../../refs/ref'
import type { CommandContext } from '../index'
import { formatDiff } from './diff'

/**
 * Show where HEAD is, any merge in progress, and working directory changes
 * relative to HEAD.
 */
export async function statusCommand(ctx: CommandContext): Promise<void> {
  const { repo, stdout } = ctx

  const branch = await repo.currentBranch()
  if (branch !== null) {
    stdout(`On branch ${branch}`)
  } else {
    stdout(`HEAD detached at ${formatRef(await repo.headRef())}`)
  }

  if (await repo.isMerging()) {
    const target = await repo.mergeTarget()
    stdout(target === null ? 'Merge in progress' : `Merging ${target}`)
  }

  const diff = await repo.status()
  if (diff.isEmpty) {
    stdout('Working directory clean')
    return
  }
  stdout('Changes:')
  for (const line of formatDiff(diff)) {
    stdout('   ' + line)
  }
}
