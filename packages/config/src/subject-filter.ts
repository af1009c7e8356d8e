// @tokensmith/config - Subject (URL) filter

import type { Context } from './types.js'

/**
 * Whether tokens should be generated for `subject` in this context.
 *
 * - No pattern configured: always true
 * - Pattern configured: true only if the subject is known and matches
 *   (search semantics, not anchored)
 */
export function matchesSubject(context: Context, subject: string | undefined): boolean {
  if (context.urlPattern === undefined) {
    return true
  }
  if (subject === undefined) {
    return false
  }
  return context.urlPattern.test(subject)
}
