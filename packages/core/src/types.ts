// @tokensmith/core - Types, constants and result unions

// ============================================================
// Output Formats
// ============================================================

/** Output format of a generated token string */
export type TokenFormat = 'base64' | 'hex' | 'base64url' | 'custom'

/** All supported output formats, in declaration order */
export const TOKEN_FORMATS: readonly TokenFormat[] = ['base64', 'hex', 'base64url', 'custom']

// ============================================================
// Limits
// ============================================================

/** Default token length in bytes (128 bits of entropy) */
export const DEFAULT_LENGTH = 16

/** Minimum token length in bytes */
export const MIN_LENGTH = 1

/** Maximum token length in bytes */
export const MAX_LENGTH = 1024

/** Maximum number of token specs in one context */
export const MAX_TOKENS = 50

/** Maximum cache TTL in seconds (24 hours) */
export const MAX_TTL_SECONDS = 86_400

/** Maximum metadata expiry in seconds (1 year) */
export const MAX_EXPIRY_SECONDS = 31_536_000

/** Minimum number of symbols in a custom alphabet */
export const ALPHABET_MIN_SIZE = 2

/** Maximum number of symbols in a custom alphabet */
export const ALPHABET_MAX_SIZE = 256

/** Maximum custom alphabet group size (0 = no grouping) */
export const GROUPING_MAX = 128

/** Separator inserted between custom alphabet groups */
export const GROUP_SEPARATOR = '-'

/** HMAC-SHA256 digest size in bytes */
export const HMAC_SHA256_SIZE = 32

// ============================================================
// Clock
// ============================================================

/**
 * Wall-clock source in milliseconds since the Unix epoch.
 *
 * Injected everywhere time matters so that cache expiry, timestamp prefixes
 * and metadata expiry all read the same sample.
 */
export interface Clock {
  now(): number
}

/** Clock backed by `Date.now()` */
export const systemClock: Clock = {
  now: () => Date.now(),
}

/** Converts a millisecond instant to whole Unix seconds */
export function toUnixSeconds(ms: number): number {
  return Math.floor(ms / 1000)
}

// ============================================================
// Result Types (never throw for generation)
// ============================================================

/** Random byte generation result */
export type ByteGenerationResult =
  | { readonly success: true; readonly bytes: Uint8Array }
  | { readonly success: false; readonly reason: 'csprng_unavailable' }

/** Encoded token string generation result */
export type TokenStringResult =
  | { readonly success: true; readonly token: string }
  | { readonly success: false; readonly reason: 'csprng_unavailable' }

/** Metadata encoding result */
export type MetadataResult =
  | {
      readonly success: true
      readonly token: string
      readonly expiresAt: number
      readonly signed: boolean
    }
  | { readonly success: false; readonly reason: 'signing_failed'; readonly expiresAt: number }
