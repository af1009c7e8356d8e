// @tokensmith/runtime - Native Fetch adapter (Node 18+ Request/Response)

import { normalizeScopePath } from '@tokensmith/config'
import { collectChannels } from '../outputs.js'
import type { MiddlewareOptions, TokensmithInstance } from '../types.js'

// ============================================================
// Types
// ============================================================

/** Tokens generated for one request, by name */
export type RequestTokens = Readonly<Record<string, string>>

/** A handler that receives the request (with token headers) and its tokens */
export type TokenAwareFetchHandler = (
  request: Request,
  tokens: RequestTokens,
) => Promise<Response> | Response

/** A plain Fetch API handler */
export type FetchHandler = (request: Request) => Promise<Response>

/**
 * Extracts the pathname from a Request URL.
 */
function extractPathname(request: Request): string {
  try {
    return new URL(request.url).pathname
  } catch {
    // Relative URL: drop the query string by hand
    const qIndex = request.url.indexOf('?')
    return qIndex >= 0 ? request.url.slice(0, qIndex) : request.url
  }
}

// ============================================================
// Per-request generation
// ============================================================

/**
 * Generates the tokens for a Fetch API request.
 *
 * @returns The tokens by name, and a copy of the request carrying every
 *   header-bound token
 */
export async function generateForRequest(
  tokensmith: TokensmithInstance,
  request: Request,
): Promise<{ readonly tokens: RequestTokens; readonly request: Request }> {
  const { tokens, headers } = collectChannels(await tokensmith.generate(extractPathname(request)))

  if (Object.keys(headers).length === 0) {
    return { tokens, request }
  }

  const merged = new Headers(request.headers)
  for (const [name, value] of Object.entries(headers)) {
    merged.set(name, value)
  }
  return { tokens, request: new Request(request, { headers: merged }) }
}

/**
 * Wraps a handler so that it runs with the request's tokens.
 *
 * @example
 * ```typescript
 * const handler = createFetchMiddleware(tokensmith, (request, tokens) =>
 *   new Response(`<input type="hidden" name="csrf" value="${tokens.CSRF_TOKEN ?? ''}">`),
 * )
 * ```
 */
export function createFetchMiddleware(
  tokensmith: TokensmithInstance,
  handler: TokenAwareFetchHandler,
  options?: MiddlewareOptions,
): FetchHandler {
  const excludePaths = new Set((options?.excludePaths ?? []).map(normalizeScopePath))

  return async (request: Request): Promise<Response> => {
    if (excludePaths.has(normalizeScopePath(extractPathname(request)))) {
      return handler(request, {})
    }

    const generated = await generateForRequest(tokensmith, request)
    return handler(generated.request, generated.tokens)
  }
}
