// @tokensmith/runtime - Public API surface
// Per-request orchestration, logging and verification
// Framework adapters are published as subpaths: @tokensmith/runtime/express, /fetch

// ============================================================
// Types
// ============================================================

export type {
  TokensmithConfig,
  TokensmithInstance,
  GenerationEnvironment,
  TokenResult,
  TokenOutput,
  VerifyOptions,
  MiddlewareOptions,
} from './types.js'

export type { Logger, LoggerOptions, LogMeta } from './logger.js'
export type { TokenChannels } from './outputs.js'

export type {
  MetadataVerificationResult,
  MetadataVerificationFailure,
  ParsedMetadataToken,
} from '@tokensmith/core'

// ============================================================
// Constants
// ============================================================

export { DEFAULT_LOCALS_KEY } from './types.js'

// ============================================================
// Core Orchestration
// ============================================================

export { createTokensmith } from './tokensmith.js'
export { generateTokenForSpec, resolveAndGenerate } from './generator.js'
export { collectChannels } from './outputs.js'

// ============================================================
// Verification
// ============================================================

export { parseMetadataToken, verifyMetadataToken } from '@tokensmith/core'

// ============================================================
// Logging
// ============================================================

export { createLogger, fromWinston, noopLogger } from './logger.js'
