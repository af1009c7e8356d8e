// @tokensmith/config - Effective token parameter resolution
//
// Override rule for every field: the spec's own value if set, else the
// context default, else the system default. Values are re-validated here
// because a Context can be built by hand without createContext; anything out
// of range is clamped or demoted and reported as a warning, never thrown.

import {
  DEFAULT_LENGTH,
  GROUPING_MAX,
  MAX_EXPIRY_SECONDS,
  MAX_LENGTH,
  MAX_TTL_SECONDS,
  MIN_LENGTH,
} from '@tokensmith/core'
import type { TokenFormat } from '@tokensmith/core'
import type {
  Context,
  MetadataParameters,
  Resolution,
  ResolutionWarning,
  ResolutionWarningReason,
  TokenSpec,
} from './types.js'
import { isTokenFormat, validateAlphabet } from './validation.js'

/** System defaults applied when neither the spec nor the context sets a field */
export const SYSTEM_DEFAULTS = Object.freeze({
  length: DEFAULT_LENGTH,
  format: 'base64' satisfies TokenFormat,
  timestamp: false,
  ttl: 0,
  grouping: 0,
  prefix: '',
  suffix: '',
})

/**
 * Computes the concrete parameters for one spec within its context.
 *
 * @example
 * ```typescript
 * const context = createContext({ ttl: 300, tokens: ['CSRF ttl=0'] })
 * resolveTokenParameters(context.tokens[0], context).params.ttl // 0, not 300
 * ```
 */
export function resolveTokenParameters(spec: TokenSpec, context: Context): Resolution {
  const warnings: ResolutionWarning[] = []
  const warn = (reason: ResolutionWarningReason, field: string, message: string): void => {
    warnings.push({ reason, field, message: `${spec.name}: ${message}` })
  }

  // ---- length ----
  let length = spec.length ?? context.length ?? SYSTEM_DEFAULTS.length
  if (!Number.isSafeInteger(length) || length < MIN_LENGTH || length > MAX_LENGTH) {
    warn(
      'length_out_of_range',
      'length',
      `length ${String(length)} out of range, using default ${String(DEFAULT_LENGTH)}`,
    )
    length = SYSTEM_DEFAULTS.length
  }

  // ---- format ----
  const configuredFormat: unknown = spec.format ?? context.format ?? SYSTEM_DEFAULTS.format
  let format: TokenFormat = SYSTEM_DEFAULTS.format
  if (isTokenFormat(configuredFormat)) {
    format = configuredFormat
  } else {
    warn('format_invalid', 'format', `invalid format '${String(configuredFormat)}', using base64`)
  }

  // ---- ttl ----
  let ttl = spec.ttl ?? context.ttl ?? SYSTEM_DEFAULTS.ttl
  if (Number.isNaN(ttl) || ttl < 0) {
    warn('ttl_negative', 'ttl', `ttl ${String(ttl)} is negative, caching disabled`)
    ttl = 0
  } else if (ttl > MAX_TTL_SECONDS) {
    warn(
      'ttl_above_max',
      'ttl',
      `ttl ${String(ttl)} exceeds maximum, clamped to ${String(MAX_TTL_SECONDS)}`,
    )
    ttl = MAX_TTL_SECONDS
  } else if (!Number.isInteger(ttl)) {
    const truncated = Math.trunc(ttl)
    warn(
      'ttl_not_integer',
      'ttl',
      `ttl ${String(ttl)} is not an integer, truncated to ${String(truncated)}`,
    )
    ttl = truncated
  }

  // ---- custom alphabet ----
  let grouping = context.alphabetGrouping ?? SYSTEM_DEFAULTS.grouping
  if (!Number.isSafeInteger(grouping) || grouping < 0 || grouping > GROUPING_MAX) {
    const clamped = Number.isNaN(grouping)
      ? 0
      : Math.min(Math.max(Math.trunc(grouping), 0), GROUPING_MAX)
    warn(
      'grouping_out_of_range',
      'alphabetGrouping',
      `alphabetGrouping ${String(grouping)} out of range, clamped to ${String(clamped)}`,
    )
    grouping = clamped
  }

  let alphabet: string | undefined
  if (format === 'custom') {
    if (context.alphabet === undefined) {
      warn('alphabet_missing', 'alphabet', 'custom format without an alphabet, using base64')
      format = 'base64'
    } else {
      const result = validateAlphabet(context.alphabet)
      if (result.valid) {
        alphabet = context.alphabet
      } else {
        warn('alphabet_invalid', 'alphabet', `${result.reason}, using base64`)
        format = 'base64'
      }
    }
  }

  const metadata = resolveMetadata(context, warn)
  // ttl > expiry lets the cache serve tokens past their embedded expiry
  if (metadata !== undefined && ttl > metadata.expiry) {
    warn(
      'ttl_exceeds_expiry',
      'ttl',
      `ttl ${String(ttl)} exceeds expiry ${String(metadata.expiry)}, cached tokens may be served after they expire`,
    )
  }

  return {
    params: {
      name: spec.name,
      header: spec.header,
      length,
      format,
      alphabet,
      grouping,
      timestamp: spec.timestamp ?? context.timestamp ?? SYSTEM_DEFAULTS.timestamp,
      prefix: spec.prefix ?? context.prefix ?? SYSTEM_DEFAULTS.prefix,
      suffix: spec.suffix ?? context.suffix ?? SYSTEM_DEFAULTS.suffix,
      ttl,
      metadata,
    },
    warnings,
  }
}

function resolveMetadata(
  context: Context,
  warn: (reason: ResolutionWarningReason, field: string, message: string) => void,
): MetadataParameters | undefined {
  if (context.encodeMetadata !== true) {
    return undefined
  }

  let expiry = context.expiry ?? 0
  if (Number.isNaN(expiry) || expiry < 0) {
    warn('expiry_out_of_range', 'expiry', `expiry ${String(expiry)} is negative, metadata disabled`)
    return undefined
  }
  if (expiry > MAX_EXPIRY_SECONDS) {
    warn(
      'expiry_out_of_range',
      'expiry',
      `expiry ${String(expiry)} exceeds maximum, clamped to ${String(MAX_EXPIRY_SECONDS)}`,
    )
    expiry = MAX_EXPIRY_SECONDS
  } else if (!Number.isInteger(expiry)) {
    const truncated = Math.trunc(expiry)
    warn(
      'expiry_out_of_range',
      'expiry',
      `expiry ${String(expiry)} is not an integer, truncated to ${String(truncated)}`,
    )
    expiry = truncated
  }
  if (expiry === 0) {
    warn('metadata_without_expiry', 'expiry', 'encodeMetadata requires expiry > 0, metadata disabled')
    return undefined
  }

  const signingKey = context.signingKey === '' ? undefined : context.signingKey
  if (signingKey === undefined) {
    warn('metadata_unsigned', 'signingKey', 'no signingKey, metadata tokens are unsigned')
  }

  return { expiry, signingKey }
}
