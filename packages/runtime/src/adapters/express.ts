// @tokensmith/runtime - Express middleware adapter

import { normalizeScopePath } from '@tokensmith/config'
import { collectChannels } from '../outputs.js'
import type { MiddlewareOptions, TokensmithInstance } from '../types.js'
import { DEFAULT_LOCALS_KEY } from '../types.js'

// ============================================================
// Minimal Express-Compatible Types
// ============================================================

/**
 * Minimal Express-compatible request interface.
 * Structurally compatible with `express.Request`.
 */
export interface ExpressLikeRequest {
  readonly path: string
  headers: Record<string, string | string[] | undefined>
}

/**
 * Minimal Express-compatible response interface.
 * Structurally compatible with `express.Response`.
 */
export interface ExpressLikeResponse {
  locals: Record<string, unknown>
}

/** Express-compatible next function */
export type ExpressNextFunction = (err?: unknown) => void

/** Express middleware signature */
export type ExpressMiddleware = (
  req: ExpressLikeRequest,
  res: ExpressLikeResponse,
  next: ExpressNextFunction,
) => void

// ============================================================
// Express Middleware Factory
// ============================================================

/**
 * Creates Express middleware that generates the tokens configured for each
 * request's path.
 *
 * - Every successful token lands in `res.locals.tokens[name]`
 * - A token whose spec names a header is also set as that request header,
 *   for downstream handlers and proxies
 * - Failed tokens are omitted (the failure is logged by the instance)
 *
 * @example
 * ```typescript
 * import express from 'express'
 * import { createTokensmith } from '@tokensmith/runtime'
 * import { createExpressMiddleware } from '@tokensmith/runtime/express'
 *
 * const app = express()
 * app.use(createExpressMiddleware(createTokensmith({ root: { tokens: ['REQUEST_ID'] } })))
 * app.get('/', (req, res) => res.send(res.locals.tokens.REQUEST_ID))
 * ```
 */
export function createExpressMiddleware(
  tokensmith: TokensmithInstance,
  options?: MiddlewareOptions,
): ExpressMiddleware {
  const excludePaths = new Set((options?.excludePaths ?? []).map(normalizeScopePath))
  const localsKey = options?.localsKey ?? DEFAULT_LOCALS_KEY

  // Express middleware must NOT be async: errors are forwarded to next()
  return (req, res, next) => {
    if (excludePaths.has(normalizeScopePath(req.path))) {
      next()
      return
    }

    handleRequest(tokensmith, req, res, next, localsKey).catch(next)
  }
}

async function handleRequest(
  tokensmith: TokensmithInstance,
  req: ExpressLikeRequest,
  res: ExpressLikeResponse,
  next: ExpressNextFunction,
  localsKey: string,
): Promise<void> {
  const { tokens, headers } = collectChannels(await tokensmith.generate(req.path))

  res.locals[localsKey] = tokens
  for (const [name, value] of Object.entries(headers)) {
    req.headers[name] = value
  }

  next()
}
