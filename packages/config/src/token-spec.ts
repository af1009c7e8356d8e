// @tokensmith/config - Token spec construction and option-string parsing

import { createTokenCache } from '@tokensmith/core'
import type { TokenFormat } from '@tokensmith/core'
import { ConfigurationError } from './errors.js'
import type { SpecOptions, TokenSpec, TokenSpecInput, ValidationResult } from './types.js'
import { parseFormat, validateLength, validateTokenName, validateTtl } from './validation.js'

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

function check(field: string, result: ValidationResult): void {
  if (!result.valid) {
    throw new ConfigurationError(field, `${field}: ${result.reason}`)
  }
}

/**
 * Parses an optional format name, throwing on anything unrecognised.
 */
export function requireFormat(field: string, value: string | undefined): TokenFormat | undefined {
  if (value === undefined) return undefined
  const format = parseFormat(value)
  if (format === null) {
    throw new ConfigurationError(
      field,
      `${field}: invalid format '${value}' (must be base64, hex, base64url, or custom)`,
    )
  }
  return format
}

/**
 * Parses the `NAME key=value ...` option form into a TokenSpecInput.
 *
 * Keys (case-insensitive): `length`, `format`, `header`, `timestamp`
 * (`on`/`off`/`1`/`0`), `prefix`, `suffix`, `ttl`. Values cannot contain
 * whitespace.
 *
 * @example
 * ```typescript
 * parseTokenOptions('CSRF_TOKEN length=32 format=hex header=X-CSRF-Token ttl=0')
 * // { name: 'CSRF_TOKEN', length: 32, format: 'hex', header: 'X-CSRF-Token', ttl: 0 }
 * ```
 *
 * @throws {ConfigurationError} On a missing name, an argument without `=`,
 *   an unknown key or a non-numeric number
 */
export function parseTokenOptions(args: string): TokenSpecInput {
  const [name, ...options] = args.trim().split(/\s+/)
  if (name === undefined || name === '') {
    throw new ConfigurationError('name', 'token name is required')
  }

  const spec: Mutable<TokenSpecInput> = { name }

  for (const option of options) {
    const eq = option.indexOf('=')
    if (eq === -1) {
      throw new ConfigurationError(
        name,
        `${name}: invalid argument '${option}' (expected key=value)`,
      )
    }
    const key = option.slice(0, eq).toLowerCase()
    const value = option.slice(eq + 1)

    switch (key) {
      case 'length':
        spec.length = parseInteger(name, key, value)
        break
      case 'format':
        spec.format = value
        break
      case 'header':
        spec.header = value
        break
      case 'timestamp':
        spec.timestamp = parseSwitch(name, value)
        break
      case 'prefix':
        spec.prefix = value
        break
      case 'suffix':
        spec.suffix = value
        break
      case 'ttl':
        spec.ttl = parseInteger(name, key, value)
        break
      default:
        throw new ConfigurationError(name, `${name}: unknown parameter '${key}'`)
    }
  }

  return spec
}

function parseInteger(name: string, key: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigurationError(name, `${name}: invalid ${key} '${value}' (expected an integer)`)
  }
  return Number.parseInt(value, 10)
}

function parseSwitch(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case '1':
      return true
    case 'off':
    case '0':
      return false
    default:
      throw new ConfigurationError(
        name,
        `${name}: invalid timestamp value '${value}' (must be on/off)`,
      )
  }
}

/**
 * Validates a token spec input and gives it its own empty cache slot.
 *
 * @param input - Spec object, or a `"NAME key=value ..."` option string
 * @param options - Cache slot options
 * @param field - Field path used in error messages
 * @throws {ConfigurationError} If any explicitly set field is out of range
 */
export function createTokenSpec(
  input: TokenSpecInput | string,
  options?: SpecOptions,
  field = 'token',
): TokenSpec {
  const spec = typeof input === 'string' ? parseTokenOptions(input) : input

  check(`${field}.name`, validateTokenName(spec.name))
  if (spec.length !== undefined) check(`${field}.length`, validateLength(spec.length))
  if (spec.ttl !== undefined) check(`${field}.ttl`, validateTtl(spec.ttl))
  if (spec.header === '') {
    throw new ConfigurationError(`${field}.header`, `${field}.header: header name cannot be empty`)
  }

  return Object.freeze({
    name: spec.name,
    length: spec.length,
    format: requireFormat(`${field}.format`, spec.format),
    header: spec.header,
    timestamp: spec.timestamp,
    prefix: spec.prefix,
    suffix: spec.suffix,
    ttl: spec.ttl,
    cache: createTokenCache(options?.lockFactory),
  })
}

/**
 * Copies a validated spec with a fresh, empty cache slot.
 * Caches are never shared between scopes.
 */
export function copyTokenSpec(spec: TokenSpec, options?: SpecOptions): TokenSpec {
  return Object.freeze({ ...spec, cache: createTokenCache(options?.lockFactory) })
}
