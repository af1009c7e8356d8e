// @tokensmith/core - Secure byte generation and token string encoding

import type { CryptoProvider } from './crypto-provider.js'
import type { ByteGenerationResult, TokenFormat, TokenStringResult } from './types.js'
import { encodeBase64, encodeBase64Url, encodeCustomAlphabet, encodeHex } from './encoding.js'

/**
 * Generates `length` bytes from the provider's CSPRNG.
 *
 * A provider that throws, or hands back a buffer of the wrong size, is
 * reported as `csprng_unavailable`. No substitute bytes are ever produced.
 */
export function generateBytes(cryptoProvider: CryptoProvider, length: number): ByteGenerationResult {
  let bytes: Uint8Array
  try {
    bytes = cryptoProvider.randomBytes(length)
  } catch {
    return { success: false, reason: 'csprng_unavailable' }
  }

  if (bytes.length !== length) {
    return { success: false, reason: 'csprng_unavailable' }
  }

  return { success: true, bytes }
}

/**
 * Encodes bytes in the requested format.
 *
 * `custom` uses `alphabet` and `grouping`; without an alphabet it falls back
 * to hex.
 */
export function encodeBytes(
  bytes: Uint8Array,
  format: TokenFormat,
  alphabet?: string,
  grouping = 0,
): string {
  switch (format) {
    case 'hex':
      return encodeHex(bytes)
    case 'base64url':
      return encodeBase64Url(bytes)
    case 'custom':
      return encodeCustomAlphabet(bytes, alphabet, grouping)
    case 'base64':
      return encodeBase64(bytes)
  }
}

/**
 * Generates a random token string: `length` CSPRNG bytes in `format`.
 *
 * Propagates `csprng_unavailable` unchanged; nothing downstream (timestamp,
 * signing, caching) may run on failure.
 *
 * @example
 * ```typescript
 * const result = generateTokenString(provider, 16, 'hex')
 * if (result.success) console.log(result.token) // 32 hex chars
 * ```
 */
export function generateTokenString(
  cryptoProvider: CryptoProvider,
  length: number,
  format: TokenFormat,
  alphabet?: string,
  grouping = 0,
): TokenStringResult {
  const generated = generateBytes(cryptoProvider, length)
  if (!generated.success) {
    return generated
  }
  return { success: true, token: encodeBytes(generated.bytes, format, alphabet, grouping) }
}
