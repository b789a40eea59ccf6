/**
 * @fileoverview CLI Entry Point
 *
 * Command-line interface for the repository engine. Arguments are parsed
 * with cac, the first positional argument selects a registered command,
 * and every failure is reported through the result instead of thrown.
 *
 * @module cli/index
 *
 * @example
 * // Run a command with captured output
 * import { runCLI } from './cli'
 *
 * const output: string[] = []
 * const result = await runCLI(['status', '-C', '/work/project'], {
 *   stdout: (msg) => output.push(msg),
 * })
 * console.log(result.exitCode) // 0 or 1
 *
 * @example
 * // Parse arguments without running
 * import { parseArgs } from './cli'
 *
 * const parsed = parseArgs(['commit', '-m', 'Initial import', '--author', 'Ada'])
 * console.log(parsed.command) // 'commit'
 * console.log(parsed.options.message) // 'Initial import'
 */

import cac from 'cac'
import { resolve } from 'path'
import { Repository } from '../core/repository'
import { LogLevel, createLineHandler, createLogger, type Logger } from '../utils/logger'
import { flagOption, restoreNumericValues, stringOption, type ValueOption } from './options'
import { branchCommand } from './commands/branch'
import { checkoutCommand } from './commands/checkout'
import { commitCommand } from './commands/commit'
import { deleteCommand } from './commands/delete'
import { diffCommand } from './commands/diff'
import { hashFileCommand } from './commands/hash-file'
import { initCommand } from './commands/init'
import { logCommand } from './commands/log'
import { mergeCommand } from './commands/merge'
import { statusCommand } from './commands/status'
import { tagCommand } from './commands/tag'

export { flagOption, stringOption }

// ============================================================================
// Types
// ============================================================================

/**
 * Output sinks for CLI execution. Both default to the console.
 */
export interface CLIOptions {
  /** Custom function for standard output */
  stdout?: (msg: string) => void
  /** Custom function for error output */
  stderr?: (msg: string) => void
}

/**
 * Result returned from CLI command execution.
 *
 * @example
 * const result = await cli.run(['status'])
 * if (result.exitCode !== 0) {
 *   console.error(`Command ${result.command} failed:`, result.error?.message)
 * }
 */
export interface CLIResult {
  /** Exit code (0 for success, non-zero for failure) */
  exitCode: number
  /** The command that was executed, if any */
  command?: string
  /** Error object if command failed */
  error?: Error
}

/**
 * Parsed command-line arguments.
 */
export interface ParsedArgs {
  /** The subcommand to execute (e.g., 'status', 'diff') */
  command?: string
  /** Positional arguments after the command */
  args: string[]
  /** Options keyed by their camel-cased long name */
  options: Record<string, unknown>
  /** Arguments after the '--' separator */
  rawArgs: string[]
  /** Working directory for command execution */
  cwd: string
}

/**
 * Context object passed to command handlers.
 */
export interface CommandContext {
  cwd: string
  args: string[]
  options: Record<string, unknown>
  /** Repository rooted at `cwd`, built from the global options */
  repo: Repository
  logger: Logger
  stdout: (msg: string) => void
  stderr: (msg: string) => void
}

/**
 * Command handlers throw to signal failure.
 */
export type CommandHandler = (ctx: CommandContext) => void | Promise<void>

/**
 * A registered command.
 */
export interface CommandDefinition {
  name: string
  /** One-line summary shown in help */
  description: string
  /** Argument synopsis, e.g. `<target> | --abort` */
  usage?: string
  handler: CommandHandler
}

// ============================================================================
// Constants
// ============================================================================

/** Current CLI version */
const VERSION = '0.1.0'

/** CLI name */
const NAME = 'arbor'

// ============================================================================
// CLI Class
// ============================================================================

/**
 * Command registry, dispatch and help.
 *
 * @example
 * const output: string[] = []
 * const cli = new CLI({ stdout: (msg) => output.push(msg) })
 * cli.registerCommand({ name: 'hello', description: 'Say hello', handler: (ctx) => ctx.stdout('hi') })
 * await cli.run(['hello'])
 */
export class CLI {
  /** The name of the CLI tool */
  public name: string

  /** The version of the CLI tool */
  public version: string

  /** Registered commands, in registration order */
  private commands: Map<string, CommandDefinition> = new Map()

  private stdout: (msg: string) => void

  private stderr: (msg: string) => void

  constructor(options: { name?: string; version?: string } & CLIOptions = {}) {
    this.name = options.name ?? NAME
    this.version = options.version ?? VERSION
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
  }

  registerCommand(definition: CommandDefinition): void {
    this.commands.set(definition.name, definition)
  }

  /**
   * Parse and dispatch.
   *
   * @param args - Command-line arguments (excluding 'node' and script name)
   * @throws Never throws directly - errors are captured in CLIResult.error
   */
  async run(args: string[]): Promise<CLIResult> {
    let parsed: ParsedArgs
    try {
      parsed = parseArgs(args)
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`Error: ${error.message}`)
      return { exitCode: 1, error }
    }
    const { command, options } = parsed

    if (flagOption(options, 'help')) {
      if (command !== undefined && this.commands.has(command)) {
        this.stdout(this.getSubcommandHelp(command))
      } else {
        this.stdout(this.getHelp())
      }
      return { exitCode: 0, command }
    }

    if (command === undefined) {
      if (flagOption(options, 'version')) {
        this.stdout(`${this.name} ${this.version}`)
      } else {
        this.stdout(this.getHelp())
      }
      return { exitCode: 0 }
    }

    const definition = this.commands.get(command)
    if (definition === undefined) {
      const suggestion = this.suggestCommand(command)
      let errorMsg = `Unknown command: ${command}`
      if (suggestion) {
        errorMsg += `\nDid you mean '${suggestion}'?`
      }
      errorMsg += `\nRun '${this.name} --help' for available commands.`
      this.stderr(errorMsg)
      return { exitCode: 1, command, error: new Error(`Unknown command: ${command}`) }
    }

    try {
      const logger = createLogger({
        component: 'cli',
        minLevel: flagOption(options, 'verbose') ? LogLevel.DEBUG : LogLevel.WARN,
        handler: createLineHandler(this.stderr),
      })
      const repoDirName = stringOption(options, 'repoDir')
      const repo = new Repository(parsed.cwd, {
        ...(repoDirName !== undefined && { repoDirName }),
        logger,
      })

      await definition.handler({
        cwd: parsed.cwd,
        args: parsed.args,
        options,
        repo,
        logger,
        stdout: this.stdout,
        stderr: this.stderr,
      })
      return { exitCode: 0, command }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`Error: ${error.message}`)
      return { exitCode: 1, command, error }
    }
  }

  private getHelp(): string {
    const width = Math.max(...[...this.commands.keys()].map((name) => name.length), 0) + 2
    const commandLines = [...this.commands.values()].map(
      (definition) => `  ${definition.name.padEnd(width)}${definition.description}`
    )

    return `${this.name} v${this.version}

Usage: ${this.name} [options] <command> [args...]

Commands:
${commandLines.join('\n')}

Options:
  -h, --help          Show help
  --version           Show version
  -C, --cwd <path>    Set the working directory
  --repo-dir <name>   Metadata directory name
  --verbose           Log debug output to stderr`
  }

  private getSubcommandHelp(command: string): string {
    const definition = this.commands.get(command)
    const usage = definition?.usage ? ` ${definition.usage}` : ''

    return `${this.name} ${command}

${definition?.description ?? 'Command help'}

Usage: ${this.name} ${command}${usage}`
  }

  /**
   * Closest registered command within 3 edits, or null.
   */
  private suggestCommand(input: string): string | null {
    let minDistance = Infinity
    let suggestion: string | null = null

    for (const cmd of this.commands.keys()) {
      const distance = levenshteinDistance(input, cmd)
      if (distance < minDistance && distance <= 3) {
        minDistance = distance
        suggestion = cmd
      }
    }

    return suggestion
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Minimum number of single-character insertions, deletions or
 * substitutions turning `a` into `b`.
 *
 * @example
 * levenshteinDistance('status', 'staus') // Returns 1
 * levenshteinDistance('commit', 'comit') // Returns 1
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous: number[] = Array.from({ length: a.length + 1 }, (_, j) => j)

  for (let i = 1; i <= b.length; i++) {
    const current: number[] = [i]
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        current[j] = previous[j - 1]
      } else {
        current[j] = Math.min(previous[j - 1] + 1, current[j - 1] + 1, previous[j] + 1)
      }
    }
    previous = current
  }

  return previous[a.length]
}

// ============================================================================
// Exported Functions
// ============================================================================

/**
 * Create a CLI with every built-in command registered.
 */
export function createCLI(options: { name?: string; version?: string } & CLIOptions = {}): CLI {
  const cli = new CLI(options)

  cli.registerCommand({ name: 'init', description: 'Create an empty repository', usage: '[--default-branch <name>]', handler: initCommand })
  cli.registerCommand({ name: 'delete', description: 'Remove the repository metadata', handler: deleteCommand })
  cli.registerCommand({ name: 'hash-file', description: 'Print the content hash of a file', usage: '<path> [--write]', handler: hashFileCommand })
  cli.registerCommand({ name: 'branch', description: 'List, create, or delete branches', usage: '[name [start]] | -d <name>', handler: branchCommand })
  cli.registerCommand({ name: 'tag', description: 'List, create, or delete tags', usage: '[name [commit]] | -d <name>', handler: tagCommand })
  cli.registerCommand({ name: 'commit', description: 'Record the working directory', usage: '-m <message> --author <name>', handler: commitCommand })
  cli.registerCommand({ name: 'log', description: 'Show commit logs', usage: '[ref] [-n <count>]', handler: logCommand })
  cli.registerCommand({ name: 'diff', description: 'Show changes between commits or the working directory', usage: '[a] [b]', handler: diffCommand })
  cli.registerCommand({ name: 'status', description: 'Show the working tree status', handler: statusCommand })
  cli.registerCommand({ name: 'checkout', description: 'Switch branches or check out a commit', usage: '<target>', handler: checkoutCommand })
  cli.registerCommand({ name: 'merge', description: 'Merge a commit into HEAD', usage: '<target> | --abort', handler: mergeCommand })

  return cli
}

const VALUE_OPTIONS: readonly ValueOption[] = [
  { key: 'cwd', flags: ['-C', '--cwd'] },
  { key: 'repoDir', flags: ['--repo-dir'] },
  { key: 'defaultBranch', flags: ['--default-branch'] },
  { key: 'message', flags: ['-m', '--message'] },
  { key: 'author', flags: ['--author'] },
  { key: 'maxCount', flags: ['-n', '--max-count'] },
]

/**
 * Parse arguments with cac. The first positional argument is the command.
 *
 * @example
 * const parsed = parseArgs(['-C', '/repo', 'diff', 'main'])
 * // Returns: {
 * //   command: 'diff',
 * //   args: ['main'],
 * //   options: { C: '/repo', cwd: '/repo', ... },
 * //   rawArgs: [],
 * //   cwd: '/repo'
 * // }
 */
export function parseArgs(args: string[]): ParsedArgs {
  const cli = cac(NAME)

  // Global options
  cli.option('-C, --cwd <path>', 'Set the working directory')
  cli.option('--repo-dir <name>', 'Metadata directory name')
  cli.option('--verbose', 'Log debug output')
  cli.option('-h, --help', 'Show help')
  cli.option('--version', 'Show version')

  // Command options
  cli.option('--default-branch <name>', 'Branch created by init')
  cli.option('--write', 'Store the hashed file')
  cli.option('-d, --delete', 'Delete the named branch or tag')
  cli.option('-m, --message <message>', 'Commit message')
  cli.option('--author <name>', 'Commit author')
  cli.option('-n, --max-count <count>', 'Limit the number of commits')
  cli.option('--abort', 'Abort the current in-progress merge')

  const parsed = cli.parse(['node', NAME, ...args], { run: false })

  const options: Record<string, unknown> = { ...parsed.options }
  let rawArgs: string[] = []
  const separated: unknown = options['--']
  if (Array.isArray(separated)) {
    rawArgs = separated.map((arg) => String(arg))
  }
  delete options['--']
  restoreNumericValues(args, options, VALUE_OPTIONS)

  const [command, ...commandArgs] = parsed.args.map((arg) => String(arg))

  const cwdOption = stringOption(options, 'cwd')
  const cwd = cwdOption !== undefined ? resolve(process.cwd(), cwdOption) : process.cwd()

  return {
    command,
    args: commandArgs,
    options,
    rawArgs,
    cwd,
  }
}

/**
 * Create a CLI with the built-in commands and run it.
 *
 * @example
 * const result = await runCLI(['log', '-n', '5'])
 * console.log(result.exitCode) // 0 or 1
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const cli = createCLI({
    stdout: options.stdout,
    stderr: options.stderr,
  })
  return cli.run(args)
}
