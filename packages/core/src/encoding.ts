// @tokensmith/core - Encoders (hex, base64, base64url, custom alphabet)

import { GROUP_SEPARATOR } from './types.js'

const HEX_CHARS = '0123456789abcdef'

/**
 * Encodes bytes as lowercase hexadecimal, two digits per byte.
 * Pure function, zero dependencies.
 */
export function encodeHex(bytes: Uint8Array): string {
  let hex = ''
  for (const byte of bytes) {
    hex += HEX_CHARS.charAt(byte >>> 4)
    hex += HEX_CHARS.charAt(byte & 0x0f)
  }
  return hex
}

/**
 * Decodes a hexadecimal string (either case).
 *
 * @returns The decoded bytes, or null if the input is not valid hex
 */
export function decodeHex(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    return null
  }
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

/**
 * Encodes bytes as standard base64 (RFC 4648, `+` `/` alphabet, `=` padded).
 */
export function encodeBase64(bytes: Uint8Array): string {
  let binary = ''
  for (const byte of bytes) {
    binary += String.fromCharCode(byte)
  }
  return btoa(binary)
}

/**
 * Encodes bytes as base64url (RFC 4648 §5): `+` becomes `-`, `/` becomes `_`,
 * and the output is truncated at the first `=`.
 */
export function encodeBase64Url(bytes: Uint8Array): string {
  const base64 = encodeBase64(bytes)
  const padAt = base64.indexOf('=')
  const unpadded = padAt === -1 ? base64 : base64.slice(0, padAt)
  return unpadded.replace(/\+/g, '-').replace(/\//g, '_')
}

/**
 * Decodes a base64url string (no padding) to bytes.
 *
 * @throws {Error} If the input is not valid base64url
 */
export function decodeBase64Url(encoded: string): Uint8Array {
  // Restore standard base64 characters
  let base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')

  const padLength = (4 - (base64.length % 4)) % 4
  base64 += '='.repeat(padLength)

  const binary = atob(base64)
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }
  return bytes
}

/**
 * Number of bits needed to index an alphabet of `size` symbols: ceil(log2(size)).
 */
export function bitsPerSymbol(size: number): number {
  let bits = 0
  while (1 << bits < size) {
    bits++
  }
  return bits
}

/**
 * Encodes bytes with a caller-supplied alphabet.
 *
 * The input is read as a big-endian bitstream, `ceil(log2(K))` bits at a time,
 * each chunk indexing into the alphabet (`K` = number of symbols). Chunks whose
 * value is `>= K` are skipped, which only happens for alphabets whose size is
 * not a power of two. Bits left over after the last byte are shifted left to
 * fill one final symbol.
 *
 * With `grouping > 0`, `-` is inserted after every `grouping` symbols, never
 * after the last one.
 *
 * Precondition: the alphabet has already been validated (2..256 unique
 * symbols). An empty or single-symbol alphabet falls back to hex.
 *
 * @example
 * ```typescript
 * encodeCustomAlphabet(new Uint8Array([0, 1, 2, 3]), 'ABCD', 4)
 * // 'AAAA-AAAB-AAAC-AAAD'
 * ```
 */
export function encodeCustomAlphabet(
  bytes: Uint8Array,
  alphabet: string | undefined,
  grouping = 0,
): string {
  const symbols = alphabet === undefined ? [] : Array.from(alphabet)
  if (symbols.length < 2) {
    return encodeHex(bytes)
  }

  const size = symbols.length
  const width = bitsPerSymbol(size)
  const mask = (1 << width) - 1

  // Never more than one symbol per `width` input bits, plus the flush symbol
  const capacity = Math.ceil((bytes.length * 8) / width)
  const output: string[] = []

  let buffer = 0
  let available = 0
  for (const byte of bytes) {
    // At most 7 + 8 bits are ever pending, so 16 bits of buffer suffice
    buffer = ((buffer << 8) | byte) & 0xffff
    available += 8

    while (available >= width && output.length < capacity) {
      available -= width
      const index = (buffer >>> available) & mask
      const symbol = symbols[index]
      if (index < size && symbol !== undefined) {
        output.push(symbol)
      }
    }
  }

  // Flush: left-align the remaining bits into one last symbol
  if (available > 0 && output.length < capacity) {
    const index = (buffer << (width - available)) & mask
    const symbol = symbols[index]
    if (index < size && symbol !== undefined) {
      output.push(symbol)
    }
  }

  return groupSymbols(output, grouping)
}

/**
 * Joins symbols, inserting the group separator every `grouping` symbols.
 */
function groupSymbols(symbols: readonly string[], grouping: number): string {
  if (grouping <= 0 || symbols.length <= grouping) {
    return symbols.join('')
  }

  const groups: string[] = []
  for (let i = 0; i < symbols.length; i += grouping) {
    groups.push(symbols.slice(i, i + grouping).join(''))
  }
  return groups.join(GROUP_SEPARATOR)
}

/**
 * Copies a Uint8Array into a fresh, exactly sized ArrayBuffer.
 * WebCrypto accepts this regardless of what backs the source view.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buffer).set(bytes)
  return buffer
}
