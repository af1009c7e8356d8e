import { describe, it, expect } from 'vitest'
import { createScopeTree, normalizeScopePath } from '../src/scope-tree.js'

describe('scope-tree', () => {
  describe('normalizeScopePath', () => {
    it('should normalize slashes, query and fragment', () => {
      expect(normalizeScopePath('')).toBe('/')
      expect(normalizeScopePath('api/')).toBe('/api')
      expect(normalizeScopePath('//api///v1/')).toBe('/api/v1')
      expect(normalizeScopePath('/api/v1?x=1#top')).toBe('/api/v1')
    })
  })

  describe('createScopeTree', () => {
    const tree = createScopeTree({
      root: { format: 'hex', ttl: 300, tokens: ['REQUEST_ID'] },
      scopes: {
        '/api': { length: 32, tokens: ['CSRF_TOKEN'] },
        '/api/public/': { ttl: 0, tokens: ['NONCE'] },
        '/static': { format: 'base64url' },
      },
    })

    it('should list scopes parents first', () => {
      expect(tree.scopes).toEqual(['/api', '/static', '/api/public'])
    })

    it('should merge each scope over its nearest ancestor', () => {
      const context = tree.lookup('/api/public/items')
      expect(context.format).toBe('hex')
      expect(context.length).toBe(32)
      expect(context.ttl).toBe(0)
      expect(context.tokens.map((spec) => spec.name)).toEqual(['REQUEST_ID', 'CSRF_TOKEN', 'NONCE'])
    })

    it('should match whole segments only', () => {
      expect(tree.lookup('/apis').tokens.map((spec) => spec.name)).toEqual(['REQUEST_ID'])
      expect(tree.lookup('/api').length).toBe(32)
    })

    it('should fall back to the root', () => {
      expect(tree.lookup('/other/path')).toBe(tree.root)
      expect(tree.lookup('/')).toBe(tree.root)
    })

    it('should return the same context object for every lookup in a scope', () => {
      expect(tree.lookup('/api/a')).toBe(tree.lookup('/api/b'))
    })

    it('should get configured scopes only', () => {
      expect(tree.get('/api/')?.length).toBe(32)
      expect(tree.get('/api/v2')).toBeUndefined()
    })

    it('should give each scope its own cache slots', () => {
      const rootSpec = tree.root.tokens[0]
      const apiSpec = tree.lookup('/api').tokens[0]
      expect(rootSpec?.name).toBe('REQUEST_ID')
      expect(apiSpec?.name).toBe('REQUEST_ID')
      expect(apiSpec?.cache).not.toBe(rootSpec?.cache)
    })

    it('should skip unconfigured intermediate paths', () => {
      const deep = createScopeTree({
        root: { length: 8 },
        scopes: { '/a/b/c': { ttl: 5 } },
      })
      const context = deep.lookup('/a/b/c/d')
      expect(context.length).toBe(8)
      expect(context.ttl).toBe(5)
      expect(deep.lookup('/a/b').ttl).toBeUndefined()
    })

    it('should merge a "/" scope over the root input', () => {
      const withSlash = createScopeTree({ root: { length: 8 }, scopes: { '/': { ttl: 5 } } })
      expect(withSlash.root.length).toBe(8)
      expect(withSlash.root.ttl).toBe(5)
      expect(withSlash.lookup('/x')).toBe(withSlash.root)
    })

    it('should reject duplicate scopes after normalization', () => {
      expect(() => createScopeTree({ scopes: { '/api': {}, '/api/': {} } })).toThrow(
        "scopes: duplicate scope '/api'",
      )
    })

    it('should prefix scope errors with the scope path', () => {
      expect(() => createScopeTree({ scopes: { '/api': { length: 0 } } })).toThrow(
        '/api: length must be between 1 and 1024',
      )
    })
  })
})
