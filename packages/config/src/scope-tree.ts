// @tokensmith/config - Scope tree: effective contexts per path prefix

import { ConfigurationError } from './errors.js'
import { createContext, mergeContexts } from './context.js'
import type { Context, ContextInput, SpecOptions } from './types.js'

// ============================================================
// Types
// ============================================================

/**
 * Scoped configuration, keyed by path prefix.
 *
 * @example
 * ```typescript
 * const tree = createScopeTree({
 *   root: { format: 'base64url', tokens: ['REQUEST_ID format=hex'] },
 *   scopes: {
 *     '/api': { ttl: 60, tokens: ['CSRF_TOKEN header=X-CSRF-Token'] },
 *     '/api/public': { ttl: 0 },
 *   },
 * })
 * tree.lookup('/api/public/items') // root <- /api <- /api/public
 * ```
 */
export interface ScopeTreeInput {
  readonly root?: ContextInput | undefined
  readonly scopes?: Readonly<Record<string, ContextInput>> | undefined
}

export interface ScopeTree {
  /** Effective context for a subject path (longest matching scope prefix) */
  lookup(path: string): Context
  /** Effective context of one configured scope, if any */
  get(scope: string): Context | undefined
  /** The root scope's effective context */
  readonly root: Context
  /** Normalized scope paths, parents before children */
  readonly scopes: readonly string[]
}

// ============================================================
// Paths
// ============================================================

/**
 * Normalizes a scope or subject path: leading `/`, no repeated or trailing
 * `/`, query and fragment removed.
 */
export function normalizeScopePath(path: string): string {
  const bare = path.split(/[?#]/, 1)[0] ?? ''
  const segments = bare.split('/').filter((segment) => segment !== '')
  return `/${segments.join('/')}`
}

function parentPath(path: string): string {
  const index = path.lastIndexOf('/')
  return index <= 0 ? '/' : path.slice(0, index)
}

function depth(path: string): number {
  return path === '/' ? 0 : path.split('/').length - 1
}

// ============================================================
// Tree
// ============================================================

/**
 * Builds every scope's effective context once, at load time.
 *
 * A scope nests inside another when the other's path is a whole-segment
 * prefix of it (`/api` contains `/api/v1` but not `/apiv2`). Each scope's
 * context is merged over its nearest configured ancestor, ending at the root.
 *
 * @throws {ConfigurationError} On invalid scope configuration or two scope
 *   keys that normalize to the same path
 */
export function createScopeTree(input: ScopeTreeInput = {}, options?: SpecOptions): ScopeTree {
  const entries = new Map<string, ContextInput>()
  for (const [scope, context] of Object.entries(input.scopes ?? {})) {
    const path = normalizeScopePath(scope)
    if (entries.has(path)) {
      throw new ConfigurationError('scopes', `scopes: duplicate scope '${path}'`)
    }
    entries.set(path, context)
  }

  const base = createContext(input.root ?? {}, options)
  const contexts = new Map<string, Context>()

  const ordered = [...entries.keys()].sort((a, b) => depth(a) - depth(b) || a.localeCompare(b))

  for (const path of ordered) {
    const scopeInput = entries.get(path) ?? {}
    let child: Context
    try {
      child = createContext(scopeInput, options)
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(error.field, `${path}: ${error.message}`)
      }
      throw error
    }
    contexts.set(path, mergeContexts(nearest(path), child, options))
  }

  function nearest(path: string): Context {
    if (path === '/') return base
    let candidate = parentPath(path)
    for (;;) {
      const context = contexts.get(candidate)
      if (context !== undefined) return context
      if (candidate === '/') return base
      candidate = parentPath(candidate)
    }
  }

  const root = contexts.get('/') ?? base

  return {
    root,
    scopes: Object.freeze(ordered),

    lookup(path: string): Context {
      let candidate = normalizeScopePath(path)
      for (;;) {
        const context = contexts.get(candidate)
        if (context !== undefined) return context
        if (candidate === '/') return root
        candidate = parentPath(candidate)
      }
    },

    get(scope: string): Context | undefined {
      const path = normalizeScopePath(scope)
      return path === '/' ? root : contexts.get(path)
    },
  }
}
