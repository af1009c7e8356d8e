import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../src/errors.js'
import { copyTokenSpec, createTokenSpec, parseTokenOptions } from '../src/token-spec.js'

describe('token-spec', () => {
  describe('parseTokenOptions', () => {
    it('should parse every recognised key', () => {
      expect(
        parseTokenOptions(
          'CSRF_TOKEN length=32 format=hex header=X-CSRF-Token timestamp=on prefix=p_ suffix=_s ttl=0',
        ),
      ).toEqual({
        name: 'CSRF_TOKEN',
        length: 32,
        format: 'hex',
        header: 'X-CSRF-Token',
        timestamp: true,
        prefix: 'p_',
        suffix: '_s',
        ttl: 0,
      })
    })

    it('should return just the name when no options are given', () => {
      expect(parseTokenOptions('  NONCE  ')).toEqual({ name: 'NONCE' })
    })

    it('should accept keys case-insensitively and 0 as timestamp off', () => {
      expect(parseTokenOptions('ID LENGTH=8 Timestamp=0')).toEqual({
        name: 'ID',
        length: 8,
        timestamp: false,
      })
    })

    it('should reject an argument without =', () => {
      expect(() => parseTokenOptions('ID length')).toThrow(
        "ID: invalid argument 'length' (expected key=value)",
      )
    })

    it('should reject unknown keys', () => {
      expect(() => parseTokenOptions('ID colour=blue')).toThrow("ID: unknown parameter 'colour'")
    })

    it('should reject non-integer numbers', () => {
      expect(() => parseTokenOptions('ID length=abc')).toThrow(
        "ID: invalid length 'abc' (expected an integer)",
      )
    })

    it('should reject bad timestamp values', () => {
      expect(() => parseTokenOptions('ID timestamp=yes')).toThrow(
        "ID: invalid timestamp value 'yes' (must be on/off)",
      )
    })

    it('should reject a blank string', () => {
      expect(() => parseTokenOptions('   ')).toThrow(ConfigurationError)
    })
  })

  describe('createTokenSpec', () => {
    it('should keep unset fields undefined', () => {
      const spec = createTokenSpec({ name: 'ID' })
      expect(spec.name).toBe('ID')
      expect(spec.length).toBeUndefined()
      expect(spec.format).toBeUndefined()
      expect(spec.ttl).toBeUndefined()
      expect(spec.cache).toBeDefined()
    })

    it('should keep explicit zero and empty values', () => {
      const spec = createTokenSpec({ name: 'ID', ttl: 0, prefix: '', timestamp: false })
      expect(spec.ttl).toBe(0)
      expect(spec.prefix).toBe('')
      expect(spec.timestamp).toBe(false)
    })

    it('should normalize the format name', () => {
      expect(createTokenSpec('ID format=HEX').format).toBe('hex')
    })

    it('should reject an invalid format with the field path', () => {
      expect(() => createTokenSpec({ name: 'ID', format: 'base32' }, undefined, 'tokens[1]')).toThrow(
        "tokens[1].format: invalid format 'base32' (must be base64, hex, base64url, or custom)",
      )
    })

    it('should reject out-of-range length', () => {
      try {
        createTokenSpec({ name: 'ID', length: 2048 })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError)
        if (error instanceof ConfigurationError) {
          expect(error.field).toBe('token.length')
          expect(error.message).toBe('token.length: length must be between 1 and 1024')
        }
      }
    })

    it('should reject an empty header name', () => {
      expect(() => createTokenSpec({ name: 'ID', header: '' })).toThrow(
        'token.header: header name cannot be empty',
      )
    })

    it('should leave the cache undefined when the lock cannot be created', () => {
      const spec = createTokenSpec({ name: 'ID' }, {
        lockFactory: () => {
          throw new Error('out of locks')
        },
      })
      expect(spec.cache).toBeUndefined()
    })

    it('should be frozen', () => {
      expect(Object.isFrozen(createTokenSpec({ name: 'ID' }))).toBe(true)
    })
  })

  describe('copyTokenSpec', () => {
    it('should give the copy its own empty cache', () => {
      const spec = createTokenSpec({ name: 'ID', ttl: 60 })
      spec.cache?.write('cached', 1000)

      const copy = copyTokenSpec(spec)
      expect(copy.ttl).toBe(60)
      expect(copy.cache).not.toBe(spec.cache)
      expect(copy.cache?.hasValue).toBe(false)
      expect(spec.cache?.hasValue).toBe(true)
    })
  })
})
