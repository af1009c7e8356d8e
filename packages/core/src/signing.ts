// @tokensmith/core - HMAC-SHA256 signing and metadata encoding

import type { CryptoProvider } from './crypto-provider.js'
import type { MetadataResult } from './types.js'
import { toUnixSeconds } from './types.js'
import { encodeHex } from './encoding.js'

const encoder = new TextEncoder()

/**
 * Computes HMAC-SHA256 of a UTF-8 message under a UTF-8 key.
 *
 * @returns The 32-byte digest
 */
export async function signHmacSha256(
  cryptoProvider: CryptoProvider,
  key: string,
  message: string,
): Promise<Uint8Array> {
  const cryptoKey = await cryptoProvider.importHmacKey(encoder.encode(key))
  const mac = await cryptoProvider.sign(cryptoKey, encoder.encode(message))
  return new Uint8Array(mac)
}

/**
 * The string an expiry signature covers: `"{expiresAt}:{payload}"`.
 */
export function signingInput(expiresAt: number, payload: string): string {
  return `${String(expiresAt)}:${payload}`
}

/**
 * Formats a metadata token.
 *
 * - Plain: `"<expiresAt>:<payload>"`
 * - Signed: `"<expiresAt>:<payload>:<64 hex chars>"`
 */
export function formatMetadataToken(
  expiresAt: number,
  payload: string,
  signatureHex?: string,
): string {
  const base = signingInput(expiresAt, payload)
  return signatureHex === undefined ? base : `${base}:${signatureHex}`
}

/**
 * Wraps a payload with an expiry timestamp and, when a non-empty signing key
 * is given, an HMAC-SHA256 signature over `"{expiresAt}:{payload}"`.
 *
 * An unsigned token protects against guessing but not against forgery.
 *
 * Signing failures are returned, not thrown; the caller decides whether to
 * fall back to `formatMetadataToken(expiresAt, payload)`.
 *
 * @param payload - The token to wrap (already encoded, possibly timestamped)
 * @param expirySeconds - Seconds from `now` until the token expires
 * @param signingKey - Optional HMAC key; empty string means unsigned
 * @param now - Current instant in milliseconds
 */
export async function encodeWithMetadata(
  cryptoProvider: CryptoProvider,
  payload: string,
  expirySeconds: number,
  signingKey?: string,
  now: number = Date.now(),
): Promise<MetadataResult> {
  const expiresAt = toUnixSeconds(now) + expirySeconds

  if (signingKey === undefined || signingKey === '') {
    return {
      success: true,
      token: formatMetadataToken(expiresAt, payload),
      expiresAt,
      signed: false,
    }
  }

  try {
    const digest = await signHmacSha256(cryptoProvider, signingKey, signingInput(expiresAt, payload))
    return {
      success: true,
      token: formatMetadataToken(expiresAt, payload, encodeHex(digest)),
      expiresAt,
      signed: true,
    }
  } catch {
    return { success: false, reason: 'signing_failed', expiresAt }
  }
}
