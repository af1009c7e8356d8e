// @tokensmith/core - Public API surface
// Random token generation primitives: byte source, encoders, signing, cache slot

// ============================================================
// Types
// ============================================================

export type { CryptoProvider } from './crypto-provider.js'

export type {
  TokenFormat,
  Clock,
  ByteGenerationResult,
  TokenStringResult,
  MetadataResult,
} from './types.js'

export type {
  ParsedMetadataToken,
  MetadataVerificationFailure,
  MetadataVerificationResult,
  VerifyMetadataOptions,
} from './validation.js'

export type {
  TokenCache,
  CacheLock,
  CacheLockFactory,
  CacheReadResult,
} from './token-cache.js'

// ============================================================
// CryptoProvider
// ============================================================

export { WebCryptoCryptoProvider } from './web-crypto-provider.js'

// ============================================================
// Encoders
// ============================================================

export {
  encodeHex,
  decodeHex,
  encodeBase64,
  encodeBase64Url,
  decodeBase64Url,
  encodeCustomAlphabet,
  bitsPerSymbol,
  toArrayBuffer,
} from './encoding.js'

// ============================================================
// Generation
// ============================================================

export { generateBytes, generateTokenString, encodeBytes } from './generate.js'

// ============================================================
// Signing & Metadata
// ============================================================

export {
  signHmacSha256,
  signingInput,
  formatMetadataToken,
  encodeWithMetadata,
} from './signing.js'

export { parseMetadataToken, stripAffixes, verifyMetadataToken } from './validation.js'

// ============================================================
// Cache
// ============================================================

export { createTokenCache, createCacheLock } from './token-cache.js'

// ============================================================
// Constants & Clock
// ============================================================

export {
  TOKEN_FORMATS,
  DEFAULT_LENGTH,
  MIN_LENGTH,
  MAX_LENGTH,
  MAX_TOKENS,
  MAX_TTL_SECONDS,
  MAX_EXPIRY_SECONDS,
  ALPHABET_MIN_SIZE,
  ALPHABET_MAX_SIZE,
  GROUPING_MAX,
  GROUP_SEPARATOR,
  HMAC_SHA256_SIZE,
  systemClock,
  toUnixSeconds,
} from './types.js'
