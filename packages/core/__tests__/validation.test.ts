import { describe, it, expect, vi } from 'vitest'
import { WebCryptoCryptoProvider } from '../src/web-crypto-provider.js'
import { encodeWithMetadata } from '../src/signing.js'
import { parseMetadataToken, stripAffixes, verifyMetadataToken } from '../src/validation.js'

const SIG = 'ab'.repeat(32)

describe('validation', () => {
  const provider = new WebCryptoCryptoProvider()
  const now = 1_700_000_000_000

  async function signed(payload: string, key = 'test-secret'): Promise<string> {
    const result = await encodeWithMetadata(provider, payload, 60, key, now)
    if (!result.success) throw new Error('signing failed')
    return result.token
  }

  describe('parseMetadataToken', () => {
    it('should parse an unsigned token', () => {
      expect(parseMetadataToken('1700000060:abc')).toEqual({
        expiresAt: 1_700_000_060,
        payload: 'abc',
        signature: undefined,
      })
    })

    it('should parse a signed token', () => {
      expect(parseMetadataToken(`1700000060:abc:${SIG}`)).toEqual({
        expiresAt: 1_700_000_060,
        payload: 'abc',
        signature: SIG,
      })
    })

    it('should keep colons inside the payload', () => {
      expect(parseMetadataToken(`5:a:b:c:${SIG}`)?.payload).toBe('a:b:c')
      expect(parseMetadataToken('5:a:b:c')).toEqual({
        expiresAt: 5,
        payload: 'a:b:c',
        signature: undefined,
      })
    })

    it('should not take a short hex tail as a signature', () => {
      expect(parseMetadataToken('5:abc:ff')?.signature).toBeUndefined()
    })

    it('should reject tokens without a decimal expiry', () => {
      expect(parseMetadataToken('abc')).toBeNull()
      expect(parseMetadataToken(':abc')).toBeNull()
      expect(parseMetadataToken('12a:abc')).toBeNull()
      expect(parseMetadataToken('-5:abc')).toBeNull()
    })
  })

  describe('stripAffixes', () => {
    it('should remove a matching prefix and suffix', () => {
      expect(stripAffixes('pre-5:abc-suf', 'pre-', '-suf')).toBe('5:abc')
    })

    it('should return null when an affix is missing', () => {
      expect(stripAffixes('5:abc-suf', 'pre-', '-suf')).toBeNull()
      expect(stripAffixes('pre-', 'pre-', '-')).toBeNull()
    })
  })

  describe('verifyMetadataToken', () => {
    it('should accept a fresh signed token', async () => {
      const token = await signed('payload')
      const result = await verifyMetadataToken(provider, token, {
        signingKey: 'test-secret',
        now: now + 59_000,
      })
      expect(result).toEqual({
        valid: true,
        payload: 'payload',
        expiresAt: 1_700_000_060,
        verified: true,
      })
    })

    it('should reject at the expiry second', async () => {
      const token = await signed('payload')
      const result = await verifyMetadataToken(provider, token, {
        signingKey: 'test-secret',
        now: now + 60_000,
      })
      expect(result).toEqual({ valid: false, reason: 'expired' })
    })

    it('should reject a tampered payload', async () => {
      const token = (await signed('payload')).replace(':payload:', ':payloaD:')
      const result = await verifyMetadataToken(provider, token, { signingKey: 'test-secret', now })
      expect(result).toEqual({ valid: false, reason: 'invalid_signature' })
    })

    it('should reject a tampered expiry', async () => {
      const token = (await signed('payload')).replace(/^\d+/, '1800000000')
      const result = await verifyMetadataToken(provider, token, { signingKey: 'test-secret', now })
      expect(result).toEqual({ valid: false, reason: 'invalid_signature' })
    })

    it('should reject a token signed with another key', async () => {
      const token = await signed('payload', 'other-secret')
      const result = await verifyMetadataToken(provider, token, { signingKey: 'test-secret', now })
      expect(result).toEqual({ valid: false, reason: 'invalid_signature' })
    })

    it('should require a signature when a key is given', async () => {
      const result = await verifyMetadataToken(provider, '1700000060:payload', {
        signingKey: 'test-secret',
        now,
      })
      expect(result).toEqual({ valid: false, reason: 'missing_signature' })
    })

    it('should check only the expiry without a key', async () => {
      const result = await verifyMetadataToken(provider, '1700000060:payload', { now })
      expect(result).toEqual({
        valid: true,
        payload: 'payload',
        expiresAt: 1_700_000_060,
        verified: false,
      })
    })

    it('should strip prefix and suffix before verifying', async () => {
      const token = `tok_${await signed('payload')}_end`
      const result = await verifyMetadataToken(provider, token, {
        signingKey: 'test-secret',
        prefix: 'tok_',
        suffix: '_end',
        now,
      })
      expect(result.valid).toBe(true)
    })

    it('should report a missing prefix first', async () => {
      const result = await verifyMetadataToken(provider, await signed('payload'), {
        signingKey: 'test-secret',
        prefix: 'tok_',
        now,
      })
      expect(result).toEqual({ valid: false, reason: 'affix_mismatch' })
    })

    it('should report unparseable tokens', async () => {
      const result = await verifyMetadataToken(provider, 'garbage', { now })
      expect(result).toEqual({ valid: false, reason: 'parse_failed' })
    })

    it('should run the HMAC check even when parsing failed', async () => {
      const verify = vi.spyOn(provider, 'verify')
      await verifyMetadataToken(provider, 'garbage', { signingKey: 'test-secret', now })
      expect(verify).toHaveBeenCalledTimes(1)
      verify.mockRestore()
    })
  })
})
