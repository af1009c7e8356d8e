// @tokensmith/core - WebCrypto-based CryptoProvider implementation

import type { CryptoProvider } from './crypto-provider.js'
import { toArrayBuffer } from './encoding.js'

/**
 * Default CryptoProvider implementation using the WebCrypto API.
 *
 * - crypto.getRandomValues for secure randomness
 * - HMAC-SHA256 for sign/verify (full 256-bit)
 */
export class WebCryptoCryptoProvider implements CryptoProvider {
  /**
   * Generates cryptographically secure random bytes via crypto.getRandomValues.
   * NEVER uses Math.random.
   */
  randomBytes(length: number): Uint8Array {
    const buffer = new Uint8Array(length)
    crypto.getRandomValues(buffer)
    return buffer
  }

  async importHmacKey(secret: Uint8Array): Promise<CryptoKey> {
    return crypto.subtle.importKey(
      'raw',
      toArrayBuffer(secret),
      { name: 'HMAC', hash: 'SHA-256' },
      false,
      ['sign', 'verify'],
    )
  }

  async sign(key: CryptoKey, data: Uint8Array): Promise<ArrayBuffer> {
    return crypto.subtle.sign('HMAC', key, toArrayBuffer(data))
  }

  /**
   * Verifies an HMAC-SHA256 signature using WebCrypto.
   * Inherently constant-time via crypto.subtle.verify.
   */
  async verify(key: CryptoKey, signature: Uint8Array, data: Uint8Array): Promise<boolean> {
    return crypto.subtle.verify('HMAC', key, toArrayBuffer(signature), toArrayBuffer(data))
  }
}
