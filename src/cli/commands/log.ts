/**
 * @fileoverview `log` command
 *
 * Shows first-parent history, newest first.
 *
 * @module cli/commands/log
 */

import { InvalidArgumentError } from '../../core/errors'
import type { LogEntry } from '../../ops/commit-traversal'
import type { CommandContext } from '../index'
import { stringOption } from '../options'

/**
 * Render one log entry. Timestamps print as UTC ISO-8601.
 */
export function formatLogEntry(entry: LogEntry): string[] {
  const { hash, commit } = entry
  const lines = [
    `Commit: ${hash}`,
    `Author: ${commit.author}`,
    `Date: ${new Date(commit.timestamp * 1000).toISOString()}`,
    '',
  ]
  for (const line of commit.message.split('\n')) {
    lines.push(`    ${line}`)
  }
  return lines
}

/**
 * @example
 * // arbor log
 * // arbor log feature -n 5
 */
export async function logCommand(ctx: CommandContext): Promise<void> {
  const { args, options, repo, stdout } = ctx

  let limit = Infinity
  const count = stringOption(options, 'maxCount')
  if (count !== undefined) {
    limit = Number.parseInt(count, 10)
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError(`Invalid commit count: ${count}`)
    }
  }

  const log = await repo.log(args[0])
  const entries = await log.take(limit)
  if (entries.length === 0) {
    stdout('No commits in the repository.')
    return
  }

  entries.forEach((entry, index) => {
    if (index > 0) {
      stdout('')
    }
    for (const line of formatLogEntry(entry)) {
      stdout(line)
    }
  })
}
