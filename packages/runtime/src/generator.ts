// @tokensmith/runtime - Generation orchestrator
//
// Per token, in list order:
//   resolve -> cache read -> bytes + encode -> timestamp -> metadata
//   -> prefix/suffix -> cache write
// A failure in one token never stops the others.

import {
  encodeWithMetadata,
  formatMetadataToken,
  generateTokenString,
  toUnixSeconds,
} from '@tokensmith/core'
import { resolveTokenParameters } from '@tokensmith/config'
import type { Context, ResolvedTokenParameters, TokenSpec } from '@tokensmith/config'
import type { GenerationEnvironment, TokenOutput, TokenResult } from './types.js'

function output(params: ResolvedTokenParameters, result: TokenResult): TokenOutput {
  return { name: params.name, header: params.header, result }
}

/**
 * Produces the token for one spec.
 *
 * Only a CSPRNG failure yields no value. Everything else degrades: an
 * unusable cache slot means no caching, failed signing means an unsigned
 * metadata token.
 *
 * The timestamp prefix, the metadata expiry and the cache write all share
 * one clock sample taken after the random bytes are drawn.
 */
export async function generateTokenForSpec(
  spec: TokenSpec,
  context: Context,
  env: GenerationEnvironment,
): Promise<TokenOutput> {
  const { logger } = env
  const { params, warnings } = resolveTokenParameters(spec, context)

  for (const warning of warnings) {
    logger.warn(warning.message, { token: spec.name, reason: warning.reason, field: warning.field })
  }

  // ---- Cache read ----
  let cache = params.ttl > 0 ? spec.cache : undefined
  if (params.ttl > 0 && spec.cache === undefined) {
    logger.warn(`${spec.name}: no cache slot, caching disabled`, {
      token: spec.name,
      reason: 'cache_lock_unavailable',
    })
  }

  if (cache !== undefined) {
    const read = cache.read(params.ttl, env.clock.now())
    switch (read.status) {
      case 'hit':
        logger.debug(`${spec.name}: cache hit`, { token: spec.name })
        return output(params, { success: true, token: read.value, cached: true })
      case 'unavailable':
        logger.warn(`${spec.name}: cache lock unavailable, generating without cache`, {
          token: spec.name,
          reason: 'cache_lock_unavailable',
        })
        cache = undefined
        break
      case 'clock_skew':
        logger.warn(`${spec.name}: clock moved backward, cached value dropped`, {
          token: spec.name,
          reason: 'cache_clock_skew',
        })
        break
      case 'miss':
      case 'expired':
        break
    }
  }

  // ---- Fresh value ----
  const generated = generateTokenString(
    env.cryptoProvider,
    params.length,
    params.format,
    params.alphabet,
    params.grouping,
  )
  if (!generated.success) {
    logger.error(`${spec.name}: CSPRNG unavailable, token not generated`, {
      token: spec.name,
      reason: generated.reason,
    })
    return output(params, generated)
  }

  const now = env.clock.now()
  let token = params.timestamp
    ? `${String(toUnixSeconds(now))}-${generated.token}`
    : generated.token

  if (params.metadata !== undefined) {
    const { expiry, signingKey } = params.metadata
    const wrapped = await encodeWithMetadata(env.cryptoProvider, token, expiry, signingKey, now)
    if (wrapped.success) {
      token = wrapped.token
    } else {
      logger.warn(`${spec.name}: signing failed, emitting unsigned metadata token`, {
        token: spec.name,
        reason: wrapped.reason,
      })
      token = formatMetadataToken(wrapped.expiresAt, token)
    }
  }

  token = `${params.prefix}${token}${params.suffix}`

  // ---- Cache write ----
  if (cache !== undefined && !cache.write(token, now)) {
    logger.warn(`${spec.name}: cache lock unavailable, value not cached`, {
      token: spec.name,
      reason: 'cache_lock_unavailable',
    })
  }

  return output(params, { success: true, token, cached: false })
}

/**
 * Generates every token of `context`, in list order.
 *
 * Subject filtering is the caller's concern; see `TokensmithInstance.generate`.
 */
export async function resolveAndGenerate(
  context: Context,
  env: GenerationEnvironment,
): Promise<readonly TokenOutput[]> {
  const outputs: TokenOutput[] = []
  for (const spec of context.tokens) {
    outputs.push(await generateTokenForSpec(spec, context, env))
  }
  return outputs
}
