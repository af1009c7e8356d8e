import { describe, it, expect } from 'vitest'
import { WebCryptoCryptoProvider } from '../src/web-crypto-provider.js'
import type { CryptoProvider } from '../src/crypto-provider.js'
import { encodeBytes, generateBytes, generateTokenString } from '../src/generate.js'

/** Provider whose CSPRNG is unavailable */
function failingProvider(): CryptoProvider {
  const real = new WebCryptoCryptoProvider()
  return {
    randomBytes(): Uint8Array {
      throw new Error('entropy source unavailable')
    },
    importHmacKey: (secret) => real.importHmacKey(secret),
    sign: (key, data) => real.sign(key, data),
    verify: (key, signature, data) => real.verify(key, signature, data),
  }
}

/** Provider that returns fixed bytes (repeated / truncated to length) */
function fixedProvider(pattern: number[]): CryptoProvider {
  const real = new WebCryptoCryptoProvider()
  return {
    randomBytes(length: number): Uint8Array {
      const out = new Uint8Array(length)
      for (let i = 0; i < length; i++) {
        out[i] = pattern[i % pattern.length] ?? 0
      }
      return out
    },
    importHmacKey: (secret) => real.importHmacKey(secret),
    sign: (key, data) => real.sign(key, data),
    verify: (key, signature, data) => real.verify(key, signature, data),
  }
}

describe('generate', () => {
  const provider = new WebCryptoCryptoProvider()

  describe('generateBytes', () => {
    it('should return the requested number of bytes', () => {
      const result = generateBytes(provider, 32)
      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.bytes.length).toBe(32)
      }
    })

    it('should report csprng_unavailable when the provider throws', () => {
      expect(generateBytes(failingProvider(), 16)).toEqual({
        success: false,
        reason: 'csprng_unavailable',
      })
    })

    it('should report csprng_unavailable on a short buffer', () => {
      const short: CryptoProvider = {
        randomBytes: () => new Uint8Array(4),
        importHmacKey: (secret) => provider.importHmacKey(secret),
        sign: (key, data) => provider.sign(key, data),
        verify: (key, signature, data) => provider.verify(key, signature, data),
      }
      expect(generateBytes(short, 16)).toEqual({ success: false, reason: 'csprng_unavailable' })
    })
  })

  describe('encodeBytes', () => {
    const bytes = new Uint8Array([0xfb, 0xff, 0xfe])

    it('should dispatch on format', () => {
      expect(encodeBytes(bytes, 'hex')).toBe('fbfffe')
      expect(encodeBytes(bytes, 'base64')).toBe('+//+')
      expect(encodeBytes(bytes, 'base64url')).toBe('-__-')
      expect(encodeBytes(new Uint8Array([0x1b]), 'custom', 'ABCD')).toBe('ABCD')
    })

    it('should fall back to hex for custom without alphabet', () => {
      expect(encodeBytes(bytes, 'custom')).toBe('fbfffe')
    })
  })

  describe('generateTokenString', () => {
    it('should generate 32 lowercase hex chars for 16 bytes', () => {
      const result = generateTokenString(provider, 16, 'hex')
      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.token).toMatch(/^[0-9a-f]{32}$/)
      }
    })

    it('should generate padded standard base64', () => {
      const result = generateTokenString(provider, 16, 'base64')
      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.token).toMatch(/^[A-Za-z0-9+/]{22}==$/)
      }
    })

    it('should generate url-safe base64url', () => {
      const result = generateTokenString(provider, 16, 'base64url')
      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.token).toMatch(/^[A-Za-z0-9_-]{22}$/)
      }
    })

    it('should encode with a custom alphabet and grouping', () => {
      const result = generateTokenString(fixedProvider([0x00, 0x01, 0x02, 0x03]), 4, 'custom', 'ABCD', 4)
      expect(result).toEqual({ success: true, token: 'AAAA-AAAB-AAAC-AAAD' })
    })

    it('should handle minimum and maximum lengths', () => {
      const min = generateTokenString(provider, 1, 'hex')
      const max = generateTokenString(provider, 1024, 'hex')
      expect(min.success && min.token.length).toBe(2)
      expect(max.success && max.token.length).toBe(2048)
    })

    it('should propagate csprng_unavailable unchanged', () => {
      expect(generateTokenString(failingProvider(), 16, 'base64')).toEqual({
        success: false,
        reason: 'csprng_unavailable',
      })
    })
  })
})
