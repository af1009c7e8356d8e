// @tokensmith/core - CryptoProvider abstraction

/**
 * CryptoProvider abstraction for all cryptographic operations.
 *
 * Token generation and signing code goes through this interface and never
 * touches `crypto` directly, so tests can substitute a failing or
 * deterministic source.
 *
 * Default implementation: WebCryptoCryptoProvider.
 */
export interface CryptoProvider {
  /**
   * Returns `length` cryptographically secure random bytes.
   *
   * Throws when the underlying CSPRNG is unavailable. Callers must check:
   * a zero-filled or partially filled buffer is never an acceptable fallback.
   */
  randomBytes(length: number): Uint8Array

  /** Imports raw secret bytes as an HMAC-SHA256 key. */
  importHmacKey(secret: Uint8Array): Promise<CryptoKey>

  /**
   * Signs data with HMAC-SHA256.
   * Returns the full 256-bit MAC (no truncation).
   */
  sign(key: CryptoKey, data: Uint8Array): Promise<ArrayBuffer>

  /**
   * Verifies an HMAC-SHA256 signature.
   * MUST be constant-time.
   */
  verify(key: CryptoKey, signature: Uint8Array, data: Uint8Array): Promise<boolean>
}
