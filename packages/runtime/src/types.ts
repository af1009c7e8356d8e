// @tokensmith/runtime - Types and configuration interfaces

import type {
  CacheLockFactory,
  Clock,
  CryptoProvider,
  MetadataVerificationResult,
} from '@tokensmith/core'
import type { Context, ScopeTree, ScopeTreeInput } from '@tokensmith/config'
import type { Logger } from './logger.js'

// ============================================================
// Configuration
// ============================================================

/**
 * Main configuration for a Tokensmith instance.
 *
 * @example
 * ```typescript
 * const tokensmith = createTokensmith({
 *   root: { tokens: ['REQUEST_ID format=hex'] },
 *   scopes: {
 *     '/forms': {
 *       ttl: 300,
 *       tokens: [{ name: 'CSRF_TOKEN', header: 'X-CSRF-Token', format: 'base64url' }],
 *     },
 *   },
 * })
 * ```
 */
export interface TokensmithConfig extends ScopeTreeInput {
  /** Custom CryptoProvider implementation (default: WebCryptoCryptoProvider) */
  readonly cryptoProvider?: CryptoProvider | undefined

  /** Time source (default: `Date.now()`) */
  readonly clock?: Clock | undefined

  /** Diagnostics (default: winston logger from `createLogger()`) */
  readonly logger?: Logger | undefined

  /** Lock factory for every cache slot (default: core `createCacheLock`) */
  readonly lockFactory?: CacheLockFactory | undefined
}

/**
 * Collaborators every generation runs against.
 * Exposed as `tokensmith.environment`.
 */
export interface GenerationEnvironment {
  readonly cryptoProvider: CryptoProvider
  readonly clock: Clock
  readonly logger: Logger
}

// ============================================================
// Output
// ============================================================

/** Outcome for one token: a value, or why none was produced */
export type TokenResult =
  | { readonly success: true; readonly token: string; readonly cached: boolean }
  | { readonly success: false; readonly reason: 'csprng_unavailable' }

/**
 * One token's output, labelled with its channels: the env-style `name`, and
 * the header it should also be published under, if any.
 */
export interface TokenOutput {
  readonly name: string
  readonly header: string | undefined
  readonly result: TokenResult
}

// ============================================================
// Instance
// ============================================================

export interface VerifyOptions {
  /** Subject whose scope supplies the signing key (default: the root scope) */
  readonly subject?: string | undefined
  /** Overrides the scope's signing key */
  readonly signingKey?: string | undefined
  readonly prefix?: string | undefined
  readonly suffix?: string | undefined
}

/**
 * The Tokensmith runtime instance.
 *
 * Created by `createTokensmith(config)`. Holds the scope tree (and with it
 * every cache slot) for its whole lifetime.
 */
export interface TokensmithInstance {
  /** Effective contexts for every configured scope */
  readonly scopes: ScopeTree

  readonly environment: GenerationEnvironment

  /**
   * Generates every token configured for `subject` (a request path).
   * Returns an empty list when the scope's subject filter does not match.
   */
  generate(subject?: string): Promise<readonly TokenOutput[]>

  /** Generates every token of an already-resolved context, in list order */
  resolveAndGenerate(context: Context): Promise<readonly TokenOutput[]>

  /** Verifies a metadata token against a scope's signing key */
  verify(token: string, options?: VerifyOptions): Promise<MetadataVerificationResult>
}

// ============================================================
// Adapters
// ============================================================

/** Default `res.locals` key the Express adapter writes tokens to */
export const DEFAULT_LOCALS_KEY = 'tokens'

/** Options shared by the framework adapters */
export interface MiddlewareOptions {
  /** Paths that skip token generation entirely (exact match after normalization) */
  readonly excludePaths?: readonly string[] | undefined

  /** `res.locals` key for the token map (Express only, default: `tokens`) */
  readonly localsKey?: string | undefined
}
