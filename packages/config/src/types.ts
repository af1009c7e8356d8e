// @tokensmith/config - Context and token spec model

import type { CacheLockFactory, TokenCache, TokenFormat } from '@tokensmith/core'

// ============================================================
// Inputs (as written by the host configuration layer)
// ============================================================

/**
 * One named token, as configured in a scope.
 *
 * Every optional field is either absent (inherit from the context, then from
 * the system default) or explicitly set. `0`, `false` and `''` are explicit
 * values, never "unset".
 */
export interface TokenSpecInput {
  /** Output name: the env-style key the token is published under (required) */
  readonly name: string
  /** Random bytes to generate (1..1024) */
  readonly length?: number | undefined
  /** Output format, case-insensitive: base64, hex, base64url or custom */
  readonly format?: string | undefined
  /** Optional header name the token is also published under */
  readonly header?: string | undefined
  /** Prepend `"{unix seconds}-"` to the random part */
  readonly timestamp?: boolean | undefined
  readonly prefix?: string | undefined
  readonly suffix?: string | undefined
  /** Cache TTL in seconds (0 = no caching, max 86400) */
  readonly ttl?: number | undefined
}

/**
 * Configuration for one scope (a path prefix), before validation.
 *
 * @example
 * ```typescript
 * const context = createContext({
 *   format: 'base64url',
 *   ttl: 300,
 *   tokens: ['CSRF_TOKEN header=X-CSRF-Token', { name: 'REQUEST_ID', format: 'hex', ttl: 0 }],
 * })
 * ```
 */
export interface ContextInput {
  // ---- Token defaults ----

  /** Default token length in bytes (system default: 16) */
  readonly length?: number | undefined
  /** Default output format (system default: base64) */
  readonly format?: string | undefined
  /** Default timestamp inclusion (system default: off) */
  readonly timestamp?: boolean | undefined
  /** Default prefix for every token */
  readonly prefix?: string | undefined
  /** Default suffix for every token */
  readonly suffix?: string | undefined
  /** Default cache TTL in seconds (system default: 0 = no caching) */
  readonly ttl?: number | undefined

  // ---- Scope ----

  /** Only generate tokens for subjects (request paths) matching this pattern */
  readonly urlPattern?: string | RegExp | undefined

  // ---- Custom alphabet ----

  /** Symbols for the `custom` format (2..256 unique characters) */
  readonly alphabet?: string | undefined
  /** Insert `-` every N custom-alphabet symbols (0 = no grouping, max 128) */
  readonly alphabetGrouping?: number | undefined

  // ---- Metadata ----

  /** Seconds until an encoded token expires (0..31536000) */
  readonly expiry?: number | undefined
  /** Wrap tokens as `expiry:token[:signature]` (requires expiry > 0) */
  readonly encodeMetadata?: boolean | undefined
  /** HMAC-SHA256 key for signed metadata tokens */
  readonly signingKey?: string | undefined

  // ---- Tokens ----

  /** Token specs: objects, or `"NAME key=value ..."` option strings */
  readonly tokens?: readonly (TokenSpecInput | string)[] | undefined
}

// ============================================================
// Validated model
// ============================================================

/**
 * A validated token spec. Immutable except for its cache slot.
 *
 * `cache` is `undefined` when no cache slot could be created; such a spec
 * always generates a fresh value.
 */
export interface TokenSpec {
  readonly name: string
  readonly length?: number | undefined
  readonly format?: TokenFormat | undefined
  readonly header?: string | undefined
  readonly timestamp?: boolean | undefined
  readonly prefix?: string | undefined
  readonly suffix?: string | undefined
  readonly ttl?: number | undefined
  readonly cache: TokenCache | undefined
}

/**
 * The effective configuration of one scope. Built once at load time and
 * shared, read-only, by every unit of work in that scope.
 */
export interface Context {
  readonly length?: number | undefined
  readonly format?: TokenFormat | undefined
  readonly timestamp?: boolean | undefined
  readonly prefix?: string | undefined
  readonly suffix?: string | undefined
  readonly ttl?: number | undefined
  readonly urlPattern?: RegExp | undefined
  readonly alphabet?: string | undefined
  readonly alphabetGrouping?: number | undefined
  readonly expiry?: number | undefined
  readonly encodeMetadata?: boolean | undefined
  readonly signingKey?: string | undefined
  readonly tokens: readonly TokenSpec[]
}

/** Options shared by everything that creates cache slots */
export interface SpecOptions {
  /** Lock factory for new cache slots (default: core `createCacheLock`) */
  readonly lockFactory?: CacheLockFactory | undefined
}

// ============================================================
// Resolution
// ============================================================

/** Metadata wrapping applied to a token */
export interface MetadataParameters {
  /** Seconds until expiry (> 0) */
  readonly expiry: number
  /** Signing key; `undefined` produces unsigned metadata tokens */
  readonly signingKey: string | undefined
}

/**
 * Effective parameters for generating one token: every field is concrete.
 */
export interface ResolvedTokenParameters {
  readonly name: string
  readonly header: string | undefined
  readonly length: number
  readonly format: TokenFormat
  readonly alphabet: string | undefined
  readonly grouping: number
  readonly timestamp: boolean
  readonly prefix: string
  readonly suffix: string
  /** Cache TTL in seconds; 0 disables caching */
  readonly ttl: number
  readonly metadata: MetadataParameters | undefined
}

/** Why a configured value was clamped or demoted at resolution time */
export type ResolutionWarningReason =
  | 'length_out_of_range'
  | 'format_invalid'
  | 'ttl_negative'
  | 'ttl_above_max'
  | 'ttl_not_integer'
  | 'ttl_exceeds_expiry'
  | 'grouping_out_of_range'
  | 'alphabet_missing'
  | 'alphabet_invalid'
  | 'expiry_out_of_range'
  | 'metadata_without_expiry'
  | 'metadata_unsigned'

/** A non-fatal resolution condition, reported as a warning */
export interface ResolutionWarning {
  readonly reason: ResolutionWarningReason
  readonly field: string
  readonly message: string
}

/** Resolver output: concrete parameters plus any warnings raised on the way */
export interface Resolution {
  readonly params: ResolvedTokenParameters
  readonly warnings: readonly ResolutionWarning[]
}

/** Validation result (never throws) */
export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string }
