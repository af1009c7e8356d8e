// @tokensmith/core - Metadata token parsing and constant-time verification

import type { CryptoProvider } from './crypto-provider.js'
import { HMAC_SHA256_SIZE, toUnixSeconds } from './types.js'
import { decodeHex } from './encoding.js'
import { signingInput } from './signing.js'

const encoder = new TextEncoder()

/** Trailing 64 lowercase hex chars after the last `:` mark a signed token */
const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/

/** Stand-in MAC so that HMAC verification runs even when parsing failed */
const DUMMY_SIGNATURE = new Uint8Array(HMAC_SHA256_SIZE)

// ============================================================
// Types
// ============================================================

/** The fields of a `expiry:payload[:signature]` token */
export interface ParsedMetadataToken {
  /** Expiry instant in Unix seconds */
  readonly expiresAt: number
  readonly payload: string
  /** 64-char lowercase hex HMAC, when present */
  readonly signature: string | undefined
}

export type MetadataVerificationFailure =
  | 'affix_mismatch'
  | 'parse_failed'
  | 'expired'
  | 'missing_signature'
  | 'invalid_signature'

/** Verification result. `verified` is true when an HMAC was checked. */
export type MetadataVerificationResult =
  | {
      readonly valid: true
      readonly payload: string
      readonly expiresAt: number
      readonly verified: boolean
    }
  | { readonly valid: false; readonly reason: MetadataVerificationFailure }

export interface VerifyMetadataOptions {
  /** HMAC key; without one only the expiry is checked */
  readonly signingKey?: string | undefined
  /** Prefix added after metadata encoding, stripped before parsing */
  readonly prefix?: string | undefined
  /** Suffix added after metadata encoding, stripped before parsing */
  readonly suffix?: string | undefined
  /** Current instant in milliseconds (default: `Date.now()`) */
  readonly now?: number | undefined
}

// ============================================================
// Parsing
// ============================================================

/**
 * Splits a metadata token into expiry, payload and optional signature.
 *
 * The wire format does not escape `:` inside payloads. The first `:` ends
 * the expiry; the last `:` starts the signature only if everything after it
 * is exactly 64 lowercase hex chars. An unsigned payload that itself ends in
 * `:` plus 64 hex chars is therefore indistinguishable from a signed token.
 *
 * @returns The parsed fields, or null if there is no decimal expiry
 */
export function parseMetadataToken(token: string): ParsedMetadataToken | null {
  const first = token.indexOf(':')
  if (first <= 0) return null

  const expiryText = token.slice(0, first)
  if (!/^\d+$/.test(expiryText)) return null

  const expiresAt = Number(expiryText)
  if (!Number.isSafeInteger(expiresAt)) return null

  const rest = token.slice(first + 1)
  const last = rest.lastIndexOf(':')
  if (last !== -1) {
    const tail = rest.slice(last + 1)
    if (SIGNATURE_PATTERN.test(tail)) {
      return { expiresAt, payload: rest.slice(0, last), signature: tail }
    }
  }

  return { expiresAt, payload: rest, signature: undefined }
}

/**
 * Removes a known prefix and suffix.
 *
 * @returns The inner token, or null if either affix is absent
 */
export function stripAffixes(token: string, prefix = '', suffix = ''): string | null {
  if (token.length < prefix.length + suffix.length) return null
  if (!token.startsWith(prefix) || !token.endsWith(suffix)) return null
  return token.slice(prefix.length, token.length - suffix.length)
}

// ============================================================
// Verification
// ============================================================

/**
 * Verifies a metadata token: affixes, expiry and (with a key) its HMAC.
 *
 * Every step runs whatever failed before it, and the HMAC check always goes
 * through the provider's constant-time `verify`, using a dummy MAC when the
 * token carries none. `reason` is the first failing step.
 *
 * @example
 * ```typescript
 * const result = await verifyMetadataToken(provider, token, { signingKey: 'test-secret' })
 * if (result.valid) console.log(result.payload)
 * ```
 */
export async function verifyMetadataToken(
  cryptoProvider: CryptoProvider,
  token: string,
  options: VerifyMetadataOptions = {},
): Promise<MetadataVerificationResult> {
  const now = options.now ?? Date.now()
  let reason: MetadataVerificationFailure | undefined

  // Step 1: Affixes
  const inner = stripAffixes(token, options.prefix, options.suffix)
  if (inner === null) reason ??= 'affix_mismatch'

  // Step 2: Parse
  const parsed = parseMetadataToken(inner ?? '')
  if (parsed === null) reason ??= 'parse_failed'

  // Step 3: Expiry (a token is valid strictly before its expiry second)
  const expiryOk = parsed !== null && toUnixSeconds(now) < parsed.expiresAt
  if (!expiryOk) reason ??= 'expired'

  // Step 4: Signature
  const signingKey = options.signingKey ?? ''
  const verified = signingKey !== ''
  if (verified) {
    const signature = parsed?.signature
    if (signature === undefined) reason ??= 'missing_signature'

    const key = await cryptoProvider.importHmacKey(encoder.encode(signingKey))
    const data = encoder.encode(parsed === null ? '' : signingInput(parsed.expiresAt, parsed.payload))
    const mac = (signature === undefined ? null : decodeHex(signature)) ?? DUMMY_SIGNATURE
    const macOk = await cryptoProvider.verify(key, mac, data)
    if (!macOk) reason ??= 'invalid_signature'
  }

  if (reason !== undefined || parsed === null) {
    return { valid: false, reason: reason ?? 'parse_failed' }
  }
  return { valid: true, payload: parsed.payload, expiresAt: parsed.expiresAt, verified }
}
