import { describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG, HASH_CHARSET, resolveConfig } from '../../src/core/config'
import { InvalidArgumentError } from '../../src/core/errors'

describe('resolveConfig', () => {
  it('returns the defaults with sha1 hash parameters', () => {
    const config = resolveConfig()

    expect(config.repoDirName).toBe('.arbor')
    expect(config.headFile).toBe('HEAD')
    expect(config.defaultBranch).toBe('main')
    expect(config.hashAlgorithm).toBe('sha1')
    expect(config.hashLength).toBe(40)
    expect(config.hashCharset).toBe(HASH_CHARSET)
    expect(config.hasher.hash(new TextEncoder().encode('abc'))).toBe('a9993e364706816aba3e25717850c26c9cd0d89d')
  })

  it('applies overrides and derives sha256 parameters', () => {
    const config = resolveConfig({ repoDirName: '.vcs', defaultBranch: 'trunk', hashAlgorithm: 'sha256' })

    expect(config.repoDirName).toBe('.vcs')
    expect(config.defaultBranch).toBe('trunk')
    expect(config.objectsDir).toBe(DEFAULT_CONFIG.objectsDir)
    expect(config.hashLength).toBe(64)
    expect(config.hasher.hash(new TextEncoder().encode('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    )
  })

  it('ignores undefined overrides', () => {
    expect(resolveConfig({ repoDirName: undefined }).repoDirName).toBe('.arbor')
  })

  it.each([[''], ['a/b'], ['a\\b'], ['.'], ['..']])('rejects layout name %j', (name) => {
    expect(() => resolveConfig({ objectsDir: name })).toThrow(InvalidArgumentError)
  })

  it('names the offending key', () => {
    expect(() => resolveConfig({ mergeDir: 'x/y' })).toThrow('Invalid mergeDir: "x/y"')
  })

  it('requires a default branch', () => {
    expect(() => resolveConfig({ defaultBranch: '' })).toThrow('Default branch name is required')
  })
})
