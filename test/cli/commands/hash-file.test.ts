import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as path from 'path'
import { createTempWorkspace, type TempWorkspace } from '../../helpers/cli'

const ALPHA_HASH = 'be76331b95dfc399cd776d2fc68021e0db03cc4f'

describe('hash-file command', () => {
  let ws: TempWorkspace

  beforeEach(async () => {
    ws = await createTempWorkspace('hash-file-cmd-')
    await ws.write('a.txt', 'alpha')
  })

  afterEach(async () => {
    await ws.cleanup()
  })

  it('prints the content hash without a repository', async () => {
    const { result, stdout } = await ws.run('hash-file', 'a.txt')

    expect(result.exitCode).toBe(0)
    expect(stdout).toEqual([`Hash: ${ALPHA_HASH}`])
  })

  it('stores the blob with --write', async () => {
    await ws.run('init')

    const { stdout } = await ws.run('hash-file', 'a.txt', '--write')

    expect(stdout).toEqual([`Hash: ${ALPHA_HASH}`, 'Saved file a.txt'])
    expect(await ws.exists(path.join('.arbor', 'objects', ALPHA_HASH.slice(0, 2), ALPHA_HASH))).toBe(true)
  })

  it('needs a repository to store the blob', async () => {
    const { result, stderr } = await ws.run('hash-file', 'a.txt', '--write')

    expect(result.exitCode).toBe(1)
    expect(stderr).toEqual([`Error: Repository not initialized at ${path.join(ws.dir, '.arbor')}`])
  })

  it('reports a missing file', async () => {
    expect((await ws.run('hash-file', 'nope.txt')).stderr).toEqual(['Error: File nope.txt does not exist'])
  })

  it('needs a path', async () => {
    expect((await ws.run('hash-file')).stderr).toEqual(['Error: Usage: arbor hash-file <path> [--write]'])
  })
})
