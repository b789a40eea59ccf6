/**
 * @fileoverview Shared helpers for CLI tests.
 *
 * Each test gets a scratch working directory; commands run against it
 * through `-C` with their output captured.
 *
 * @module test/helpers/cli
 */

import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { runCLI, type CLIResult } from '../../src/cli/index'

export interface CapturedRun {
  result: CLIResult
  stdout: string[]
  stderr: string[]
}

/**
 * Run the CLI with arguments and capture output
 */
export async function runCLIWithCapture(args: string[]): Promise<CapturedRun> {
  const stdout: string[] = []
  const stderr: string[] = []
  const result = await runCLI(args, {
    stdout: (msg) => stdout.push(msg),
    stderr: (msg) => stderr.push(msg),
  })
  return { result, stdout, stderr }
}

/**
 * A scratch working directory with a CLI bound to it.
 */
export interface TempWorkspace {
  dir: string
  run(...args: string[]): Promise<CapturedRun>
  write(relPath: string, content: string): Promise<void>
  read(relPath: string): Promise<string>
  exists(relPath: string): Promise<boolean>
  /** Commit the working directory and return the new hash */
  commit(message: string): Promise<string>
  cleanup(): Promise<void>
}

export async function createTempWorkspace(prefix: string = 'cli-test-'): Promise<TempWorkspace> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix))

  const workspace: TempWorkspace = {
    dir,
    run: (...args) => runCLIWithCapture(['-C', dir, ...args]),
    async write(relPath, content) {
      const absPath = path.join(dir, relPath)
      await fs.mkdir(path.dirname(absPath), { recursive: true })
      await fs.writeFile(absPath, content)
    },
    read: (relPath) => fs.readFile(path.join(dir, relPath), 'utf8'),
    exists: (relPath) =>
      fs.stat(path.join(dir, relPath)).then(
        () => true,
        () => false
      ),
    async commit(message) {
      const { result, stdout, stderr } = await workspace.run('commit', '-m', message, '--author', 'Test User')
      if (result.exitCode !== 0) {
        throw new Error(`commit failed: ${stderr.join('\n')}`)
      }
      return stdout[0].slice('Commit created: '.length)
    },
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  }

  return workspace
}
