/**
 * @fileoverview `init` command
 *
 * @module cli/commands/init
 */

import type { CommandContext } from '../index'
import { stringOption } from '../options'

/**
 * Create an empty repository in the working directory.
 *
 * @example
 * // arbor init
 * // arbor init --default-branch trunk
 */
export async function initCommand(ctx: CommandContext): Promise<void> {
  const { repo, options, stdout } = ctx
  const branch = stringOption(options, 'defaultBranch') ?? repo.config.defaultBranch

  await repo.init(branch)
  stdout(`Initialized empty repository in ${repo.repoPath} on branch ${branch}`)
}
