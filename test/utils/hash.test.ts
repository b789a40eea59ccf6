import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { createHasher, hashBytes, isValidHash } from '../../src/utils/hash'

const encoder = new TextEncoder()

describe('content hashing', () => {
  describe('hashBytes', () => {
    it('returns the lowercase hex SHA-1 digest', () => {
      expect(hashBytes('sha1', encoder.encode('hello'))).toBe('aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d')
      expect(hashBytes('sha1', new Uint8Array(0))).toBe('da39a3ee5e6b4b0d3255bfef95601890afd80709')
    })

    it('returns the lowercase hex SHA-256 digest', () => {
      expect(hashBytes('sha256', encoder.encode('hello'))).toBe(
        '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
      )
    })
  })

  describe('createHasher', () => {
    it('reports the digest length', () => {
      expect(createHasher('sha1').length).toBe(40)
      expect(createHasher('sha256').length).toBe(64)
      expect(createHasher('sha256').algorithm).toBe('sha256')
    })

    it('always produces a valid address of its own length', () => {
      const hasher = createHasher('sha1')
      fc.assert(
        fc.property(fc.uint8Array({ maxLength: 256 }), (data) => {
          expect(isValidHash(hasher.hash(data), hasher.length, '0123456789abcdef')).toBe(true)
        })
      )
    })
  })

  describe('isValidHash', () => {
    const charset = '0123456789abcdef'

    it('accepts an address of the right length and charset', () => {
      expect(isValidHash('a'.repeat(40), 40, charset)).toBe(true)
    })

    it('rejects the wrong length', () => {
      expect(isValidHash('a'.repeat(39), 40, charset)).toBe(false)
      expect(isValidHash('a'.repeat(64), 40, charset)).toBe(false)
    })

    it('rejects characters outside the charset', () => {
      expect(isValidHash('A'.repeat(40), 40, charset)).toBe(false)
      expect(isValidHash('g'.repeat(40), 40, charset)).toBe(false)
    })
  })
})
