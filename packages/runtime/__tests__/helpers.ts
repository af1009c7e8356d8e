import { WebCryptoCryptoProvider } from '@tokensmith/core'
import type { Clock } from '@tokensmith/core'
import type { LogMeta, Logger } from '../src/logger.js'

/**
 * Deterministic byte source: call n returns `length` bytes of value n.
 * HMAC operations use WebCrypto.
 */
export class CountingCryptoProvider extends WebCryptoCryptoProvider {
  calls = 0

  constructor(private readonly failLength?: number) {
    super()
  }

  override randomBytes(length: number): Uint8Array {
    if (length === this.failLength) {
      throw new Error('entropy source unavailable')
    }
    this.calls++
    return new Uint8Array(length).fill(this.calls)
  }
}

/** CryptoProvider whose HMAC key import always fails */
export class FailingSignerProvider extends CountingCryptoProvider {
  override importHmacKey(): Promise<CryptoKey> {
    return Promise.reject(new Error('key import failed'))
  }
}

export interface ManualClock extends Clock {
  time: number
  advance(ms: number): void
}

export function manualClock(time: number): ManualClock {
  return {
    time,
    now() {
      return this.time
    },
    advance(ms: number) {
      this.time += ms
    },
  }
}

export interface LogEntry {
  readonly level: 'debug' | 'info' | 'warn' | 'error'
  readonly message: string
  readonly meta: LogMeta | undefined
}

export interface RecordingLogger extends Logger {
  readonly entries: LogEntry[]
  reasons(level: LogEntry['level']): unknown[]
}

export function recordingLogger(): RecordingLogger {
  const entries: LogEntry[] = []
  return {
    entries,
    debug: (message, meta) => entries.push({ level: 'debug', message, meta }),
    info: (message, meta) => entries.push({ level: 'info', message, meta }),
    warn: (message, meta) => entries.push({ level: 'warn', message, meta }),
    error: (message, meta) => entries.push({ level: 'error', message, meta }),
    reasons(level) {
      return entries.filter((entry) => entry.level === level).map((entry) => entry.meta?.['reason'])
    },
  }
}
