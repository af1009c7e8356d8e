// @tokensmith/config - Context construction and pure hierarchical merge

import { MAX_TOKENS } from '@tokensmith/core'
import { ConfigurationError } from './errors.js'
import { copyTokenSpec, createTokenSpec, requireFormat } from './token-spec.js'
import type { Context, ContextInput, SpecOptions, TokenSpec, ValidationResult } from './types.js'
import {
  validateAlphabet,
  validateExpiry,
  validateGrouping,
  validateLength,
  validateTtl,
} from './validation.js'

function check(field: string, result: ValidationResult): void {
  if (!result.valid) {
    throw new ConfigurationError(field, result.reason)
  }
}

/**
 * Compiles the subject filter. A RegExp is recompiled without the `g` and `y`
 * flags so that `test()` carries no `lastIndex` state between requests.
 */
function compileUrlPattern(pattern: string | RegExp | undefined): RegExp | undefined {
  if (pattern === undefined) return undefined

  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
  }

  try {
    return new RegExp(pattern)
  } catch {
    throw new ConfigurationError('urlPattern', `urlPattern: invalid regex pattern '${pattern}'`)
  }
}

/**
 * Builds a validated, frozen context for one scope.
 *
 * Fields left `undefined` stay unset so that a parent scope (or the system
 * default) can supply them later.
 *
 * @throws {ConfigurationError} On any out-of-range value, invalid alphabet,
 *   invalid regex, empty signing key or more than 50 tokens
 */
export function createContext(input: ContextInput = {}, options?: SpecOptions): Context {
  if (input.length !== undefined) check('length', validateLength(input.length))
  if (input.ttl !== undefined) check('ttl', validateTtl(input.ttl))
  if (input.expiry !== undefined) check('expiry', validateExpiry(input.expiry))
  if (input.alphabetGrouping !== undefined) {
    check('alphabetGrouping', validateGrouping(input.alphabetGrouping))
  }
  if (input.alphabet !== undefined) check('alphabet', validateAlphabet(input.alphabet))
  if (input.signingKey === '') {
    throw new ConfigurationError('signingKey', 'signingKey cannot be empty')
  }

  const tokenInputs = input.tokens ?? []
  if (tokenInputs.length > MAX_TOKENS) {
    throw new ConfigurationError(
      'tokens',
      `maximum number of tokens (${String(MAX_TOKENS)}) exceeded`,
    )
  }

  const tokens = tokenInputs.map((token, index) =>
    createTokenSpec(token, options, `tokens[${String(index)}]`),
  )

  return Object.freeze({
    length: input.length,
    format: requireFormat('format', input.format),
    timestamp: input.timestamp,
    prefix: input.prefix,
    suffix: input.suffix,
    ttl: input.ttl,
    urlPattern: compileUrlPattern(input.urlPattern),
    alphabet: input.alphabet,
    alphabetGrouping: input.alphabetGrouping,
    expiry: input.expiry,
    encodeMetadata: input.encodeMetadata,
    signingKey: input.signingKey,
    tokens: Object.freeze(tokens),
  })
}

/**
 * Merges a child scope over its parent, returning a new context.
 *
 * - Each field: the child's value if set, else the parent's
 * - Tokens: the parent's first, then the child's, capped at 50
 * - Every merged token gets a fresh cache slot; neither input is modified
 */
export function mergeContexts(parent: Context, child: Context, options?: SpecOptions): Context {
  const tokens: TokenSpec[] = [...parent.tokens, ...child.tokens]
    .slice(0, MAX_TOKENS)
    .map((spec) => copyTokenSpec(spec, options))

  return Object.freeze({
    length: child.length ?? parent.length,
    format: child.format ?? parent.format,
    timestamp: child.timestamp ?? parent.timestamp,
    prefix: child.prefix ?? parent.prefix,
    suffix: child.suffix ?? parent.suffix,
    ttl: child.ttl ?? parent.ttl,
    urlPattern: child.urlPattern ?? parent.urlPattern,
    alphabet: child.alphabet ?? parent.alphabet,
    alphabetGrouping: child.alphabetGrouping ?? parent.alphabetGrouping,
    expiry: child.expiry ?? parent.expiry,
    encodeMetadata: child.encodeMetadata ?? parent.encodeMetadata,
    signingKey: child.signingKey ?? parent.signingKey,
    tokens: Object.freeze(tokens),
  })
}
