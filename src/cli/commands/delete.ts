/**
 * @fileoverview `delete` command
 *
 * @module cli/commands/delete
 */

import type { CommandContext } from '../index'

/**
 * Remove the metadata directory. Working files stay where they are.
 */
export async function deleteCommand(ctx: CommandContext): Promise<void> {
  const { repo, stdout } = ctx
  await repo.delete()
  stdout(`Deleted repository at ${repo.repoPath}`)
}
