// @tokensmith/config - Field validators (pure, never throw)

import type { TokenFormat } from '@tokensmith/core'
import {
  ALPHABET_MAX_SIZE,
  ALPHABET_MIN_SIZE,
  GROUPING_MAX,
  MAX_EXPIRY_SECONDS,
  MAX_LENGTH,
  MAX_TTL_SECONDS,
  MIN_LENGTH,
  TOKEN_FORMATS,
} from '@tokensmith/core'
import type { ValidationResult } from './types.js'

const VALID: ValidationResult = { valid: true }

/**
 * Checks that `value` is an integer in `[min, max]`.
 */
function validateIntegerRange(
  value: number,
  min: number,
  max: number,
  message: string,
): ValidationResult {
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    return { valid: false, reason: message }
  }
  return VALID
}

export function validateLength(value: number): ValidationResult {
  return validateIntegerRange(
    value,
    MIN_LENGTH,
    MAX_LENGTH,
    `length must be between ${String(MIN_LENGTH)} and ${String(MAX_LENGTH)}`,
  )
}

export function validateTtl(value: number): ValidationResult {
  return validateIntegerRange(
    value,
    0,
    MAX_TTL_SECONDS,
    `ttl must be between 0 and ${String(MAX_TTL_SECONDS)} seconds (24 hours)`,
  )
}

export function validateExpiry(value: number): ValidationResult {
  return validateIntegerRange(
    value,
    0,
    MAX_EXPIRY_SECONDS,
    `expiry must be between 0 and ${String(MAX_EXPIRY_SECONDS)} seconds (1 year)`,
  )
}

export function validateGrouping(value: number): ValidationResult {
  return validateIntegerRange(
    value,
    0,
    GROUPING_MAX,
    `alphabetGrouping must be between 0 and ${String(GROUPING_MAX)} (0 = no grouping)`,
  )
}

/**
 * Validates a custom alphabet: 2..256 symbols, no symbol repeated.
 *
 * Symbols are Unicode code points, so `'αβγ'` is a 3-symbol alphabet.
 */
export function validateAlphabet(alphabet: string): ValidationResult {
  if (alphabet === '') {
    return { valid: false, reason: 'alphabet cannot be empty' }
  }

  const symbols = Array.from(alphabet)
  if (symbols.length < ALPHABET_MIN_SIZE) {
    return {
      valid: false,
      reason: `alphabet must contain at least ${String(ALPHABET_MIN_SIZE)} characters`,
    }
  }
  if (symbols.length > ALPHABET_MAX_SIZE) {
    return {
      valid: false,
      reason: `alphabet too long (max ${String(ALPHABET_MAX_SIZE)} characters)`,
    }
  }

  const seen = new Set<string>()
  for (const [position, symbol] of symbols.entries()) {
    if (seen.has(symbol)) {
      return {
        valid: false,
        reason: `alphabet has duplicate character '${symbol}' at position ${String(position)}`,
      }
    }
    seen.add(symbol)
  }

  return VALID
}

/**
 * Token names become env-style keys: non-empty, no whitespace.
 */
export function validateTokenName(name: string): ValidationResult {
  if (name === '') {
    return { valid: false, reason: 'token name is required' }
  }
  if (/\s/.test(name)) {
    return { valid: false, reason: `token name '${name}' must not contain whitespace` }
  }
  return VALID
}

/** Narrows a value to a supported output format (exact, lowercase) */
export function isTokenFormat(value: unknown): value is TokenFormat {
  return typeof value === 'string' && TOKEN_FORMATS.some((format) => format === value)
}

/**
 * Parses a format name case-insensitively.
 *
 * @returns The format, or null if the name is not recognised
 */
export function parseFormat(value: string): TokenFormat | null {
  const normalized = value.toLowerCase()
  return isTokenFormat(normalized) ? normalized : null
}
