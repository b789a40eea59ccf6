/**
 * @fileoverview `diff` command
 *
 * Prints a move-aware tree diff, one line per changed node, nested
 * entries indented three spaces per level:
 *
 * ```
 * Modified: src
 *    Added: src/util.ts
 * Moved: notes.txt -> docs/notes.txt
 * ```
 *
 * @module cli/commands/diff
 */

import type { DirectorySource } from '../../core/repository'
import type { TreeDiff } from '../../ops/tree-diff'
import type { CommandContext } from '../index'

const INDENT = '   '

/**
 * Render a diff. The destination half of a move is folded into the
 * `Moved:` line of its source.
 */
export function formatDiff(diff: TreeDiff): string[] {
  const lines: string[] = []

  for (const { path, node } of diff.entries()) {
    const indent = INDENT.repeat(path.split('/').length - 1)
    const name = node.record.name

    switch (node.change) {
      case 'added':
        lines.push(`${indent}Added: ${name}`)
        break
      case 'removed':
        lines.push(`${indent}Removed: ${name}`)
        break
      case 'modified':
        lines.push(`${indent}Modified: ${name}`)
        break
      case 'movedTo':
        lines.push(`${indent}Moved: ${name} -> ${diff.path(node.movedTo)}`)
        break
      case 'movedFrom':
        break
    }
  }

  return lines
}

/**
 * Compare two commits, or a commit and the working directory.
 *
 * @example
 * // arbor diff              - HEAD against the working directory
 * // arbor diff main         - main against the working directory
 * // arbor diff main feature - main against feature
 */
export async function diffCommand(ctx: CommandContext): Promise<void> {
  const { args, repo, stdout } = ctx
  const workingDir: DirectorySource = { type: 'directory', path: repo.workingDir }

  const diff =
    args.length >= 2 ? await repo.diff(args[0], args[1]) : await repo.diff(args[0] ?? 'HEAD', workingDir)

  if (diff.isEmpty) {
    stdout('No changes.')
    return
  }
  for (const line of formatDiff(diff)) {
    stdout(line)
  }
}
