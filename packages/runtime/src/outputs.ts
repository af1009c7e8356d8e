// @tokensmith/runtime - Output channel mapping shared by the adapters

import type { TokenOutput } from './types.js'

/** Successful tokens split by channel */
export interface TokenChannels {
  /** Env-style sink: token name -> value */
  readonly tokens: Readonly<Record<string, string>>
  /** Header sink: lowercase header name -> value */
  readonly headers: Readonly<Record<string, string>>
}

/**
 * Maps outputs to their channels. Failed outputs are omitted; a later
 * output with the same name or header replaces an earlier one.
 *
 * Names are collected in Maps and copied out with `Object.fromEntries`, which
 * defines own properties, so a name such as `__proto__` is kept as a key.
 */
export function collectChannels(outputs: readonly TokenOutput[]): TokenChannels {
  const tokens = new Map<string, string>()
  const headers = new Map<string, string>()

  for (const { name, header, result } of outputs) {
    if (!result.success) continue
    tokens.set(name, result.token)
    if (header !== undefined) {
      headers.set(header.toLowerCase(), result.token)
    }
  }

  return { tokens: Object.fromEntries(tokens), headers: Object.fromEntries(headers) }
}
