import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { resolveConfig } from '../../src/core/config'
import { InvalidArgumentError, RefNotFoundError } from '../../src/core/errors'
import {
  branchRef,
  formatRef,
  hashRef,
  isValidRefName,
  parseRefContent,
  serializeRefContent,
  shortBranchName,
  symRef,
} from '../../src/refs/ref'
import { RefStore } from '../../src/refs/storage'

const config = resolveConfig()
const SHA = 'a'.repeat(40)

describe('ref records', () => {
  it('serializes symbolic, hash and unborn records', () => {
    expect(serializeRefContent(symRef('refs/heads/main'))).toBe('ref: refs/heads/main\n')
    expect(serializeRefContent(hashRef(SHA))).toBe(`${SHA}\n`)
    expect(serializeRefContent(null)).toBe('')
  })

  it('parses what it serializes', () => {
    expect(parseRefContent('ref: refs/heads/main\n')).toEqual({ type: 'symbolic', target: 'refs/heads/main' })
    expect(parseRefContent(`${SHA}\n`)).toEqual({ type: 'hash', hash: SHA })
    expect(parseRefContent('')).toBeNull()
    expect(parseRefContent('  \n')).toBeNull()
  })

  it('formats refs for messages', () => {
    expect(formatRef(hashRef(SHA))).toBe(SHA)
    expect(formatRef(branchRef(config, 'main'))).toBe('refs/heads/main')
    expect(formatRef(null)).toBe('(unborn)')
  })

  it('extracts short branch names', () => {
    expect(shortBranchName(config, 'refs/heads/feature/login')).toBe('feature/login')
    expect(shortBranchName(config, 'refs/tags/v1')).toBeNull()
  })

  it.each(['main', 'feature/login', 'v1.0', 'release-2024'])('accepts %j', (name) => {
    expect(isValidRefName(name)).toBe(true)
  })

  it.each(['', '@', 'a..b', 'a b', 'a~1', 'a^', 'a:b', 'a?', 'a*', 'a[', 'a\\b', '.hidden', 'a/', 'a//b', 'x.lock', 'a@{1}', 'end.'])(
    'rejects %j',
    (name) => {
      expect(isValidRefName(name)).toBe(false)
    }
  )
})

describe('RefStore', () => {
  let tempDir: string
  let refs: RefStore

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ref-store-test-'))
    refs = new RefStore(tempDir, config)
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('writes and reads records', async () => {
    await refs.write('refs/heads/main', hashRef(SHA))
    await refs.writeHead(symRef('refs/heads/main'))

    expect(await refs.read('refs/heads/main')).toEqual(hashRef(SHA))
    expect(await refs.readHead()).toEqual(symRef('refs/heads/main'))
    expect(await fs.readFile(path.join(tempDir, 'HEAD'), 'utf8')).toBe('ref: refs/heads/main\n')
  })

  it('reads an empty record as unborn', async () => {
    await refs.write('refs/heads/main', null)

    expect(await refs.exists('refs/heads/main')).toBe(true)
    expect(await refs.read('refs/heads/main')).toBeNull()
  })

  it('reports a missing record', async () => {
    await expect(refs.read('refs/heads/nope')).rejects.toThrow(RefNotFoundError)
    await expect(refs.delete('refs/heads/nope')).rejects.toThrow('Reference not found: refs/heads/nope')
    expect(await refs.exists('refs/heads/nope')).toBe(false)
  })

  it('refuses invalid names', () => {
    expect(() => refs.refPath('refs/heads/../escape')).toThrow(InvalidArgumentError)
  })

  it('lists nested records sorted, skipping lock files', async () => {
    await refs.write('refs/tags/v1', hashRef(SHA))
    await refs.write('refs/heads/main', hashRef(SHA))
    await refs.write('refs/heads/feature/login', null)
    await fs.writeFile(path.join(tempDir, 'refs', 'heads', 'main.lock'), '')

    expect(await refs.list()).toEqual(['refs/heads/feature/login', 'refs/heads/main', 'refs/tags/v1'])
    expect(await refs.list('refs/heads')).toEqual(['refs/heads/feature/login', 'refs/heads/main'])
  })

  it('lists nothing when the directory is missing', async () => {
    expect(await refs.list()).toEqual([])
  })

  it('deletes a record', async () => {
    await refs.write('refs/tags/v1', hashRef(SHA))
    await refs.delete('refs/tags/v1')
    expect(await refs.exists('refs/tags/v1')).toBe(false)
  })
})
