import { describe, it, expect } from 'vitest'
import { collectChannels } from '../src/outputs.js'
import type { TokenOutput } from '../src/types.js'

function ok(name: string, token: string, header?: string): TokenOutput {
  return { name, header, result: { success: true, token, cached: false } }
}

describe('outputs', () => {
  describe('collectChannels', () => {
    it('should publish every successful token under its name', () => {
      const channels = collectChannels([ok('A', 'aa'), ok('B', 'bb')])

      expect(channels.tokens).toEqual({ A: 'aa', B: 'bb' })
      expect(channels.headers).toEqual({})
    })

    it('should lowercase header names', () => {
      const channels = collectChannels([ok('CSRF', 'tok', 'X-CSRF-Token')])

      expect(channels.tokens).toEqual({ CSRF: 'tok' })
      expect(channels.headers).toEqual({ 'x-csrf-token': 'tok' })
    })

    it('should omit failed tokens from both channels', () => {
      const failed: TokenOutput = {
        name: 'BROKEN',
        header: 'X-Broken',
        result: { success: false, reason: 'csprng_unavailable' },
      }

      const channels = collectChannels([failed, ok('A', 'aa')])

      expect(channels.tokens).toEqual({ A: 'aa' })
      expect(channels.headers).toEqual({})
    })

    it('should let a later output replace an earlier one with the same name', () => {
      const channels = collectChannels([ok('A', 'first', 'X-A'), ok('A', 'second', 'x-a')])

      expect(channels.tokens).toEqual({ A: 'second' })
      expect(channels.headers).toEqual({ 'x-a': 'second' })
    })

    it('should keep a token named __proto__ as an own key', () => {
      const channels = collectChannels([ok('__proto__', 'pp'), ok('A', 'aa')])

      expect(Object.keys(channels.tokens)).toEqual(['__proto__', 'A'])
      expect(Object.entries(channels.tokens)).toEqual([
        ['__proto__', 'pp'],
        ['A', 'aa'],
      ])
      expect(Object.getPrototypeOf(channels.tokens)).toBe(Object.prototype)
    })

    it('should return empty channels for no outputs', () => {
      expect(collectChannels([])).toEqual({ tokens: {}, headers: {} })
    })
  })
})
