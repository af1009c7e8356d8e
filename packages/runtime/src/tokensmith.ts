// @tokensmith/runtime - Tokensmith instance (orchestration layer)

import { WebCryptoCryptoProvider, systemClock, verifyMetadataToken } from '@tokensmith/core'
import type { MetadataVerificationResult } from '@tokensmith/core'
import { createScopeTree, matchesSubject } from '@tokensmith/config'
import type { Context } from '@tokensmith/config'
import { resolveAndGenerate } from './generator.js'
import { createLogger } from './logger.js'
import type {
  GenerationEnvironment,
  TokenOutput,
  TokensmithConfig,
  TokensmithInstance,
  VerifyOptions,
} from './types.js'

/**
 * Creates a Tokensmith runtime instance.
 *
 * Builds every scope's effective context up front, so configuration errors
 * surface here as a `ConfigurationError` and never at request time.
 *
 * @example
 * ```typescript
 * const tokensmith = createTokensmith({
 *   root: { encodeMetadata: true, expiry: 3600, signingKey: 'test-secret', tokens: ['SESSION_NONCE'] },
 * })
 *
 * const [nonce] = await tokensmith.generate('/checkout')
 * if (nonce?.result.success) {
 *   const check = await tokensmith.verify(nonce.result.token)
 * }
 * ```
 */
export function createTokensmith(config: TokensmithConfig = {}): TokensmithInstance {
  const environment: GenerationEnvironment = Object.freeze({
    cryptoProvider: config.cryptoProvider ?? new WebCryptoCryptoProvider(),
    clock: config.clock ?? systemClock,
    logger: config.logger ?? createLogger(),
  })

  const scopes = createScopeTree(
    { root: config.root, scopes: config.scopes },
    { lockFactory: config.lockFactory },
  )

  return {
    scopes,
    environment,

    async generate(subject?: string): Promise<readonly TokenOutput[]> {
      const context = subject === undefined ? scopes.root : scopes.lookup(subject)
      if (!matchesSubject(context, subject)) {
        environment.logger.debug('subject does not match urlPattern, no tokens generated', {
          subject,
        })
        return []
      }
      return resolveAndGenerate(context, environment)
    },

    resolveAndGenerate(context: Context): Promise<readonly TokenOutput[]> {
      return resolveAndGenerate(context, environment)
    },

    verify(token: string, options: VerifyOptions = {}): Promise<MetadataVerificationResult> {
      const context = options.subject === undefined ? scopes.root : scopes.lookup(options.subject)
      return verifyMetadataToken(environment.cryptoProvider, token, {
        signingKey: options.signingKey ?? context.signingKey,
        prefix: options.prefix,
        suffix: options.suffix,
        now: environment.clock.now(),
      })
    },
  }
}
