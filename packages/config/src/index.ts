// @tokensmith/config - Public API surface
// Scoped configuration model: contexts, token specs, pure merge, resolution

// ============================================================
// Types
// ============================================================

export type {
  TokenSpecInput,
  ContextInput,
  TokenSpec,
  Context,
  SpecOptions,
  MetadataParameters,
  ResolvedTokenParameters,
  ResolutionWarningReason,
  ResolutionWarning,
  Resolution,
  ValidationResult,
} from './types.js'

export type { ScopeTree, ScopeTreeInput } from './scope-tree.js'

// ============================================================
// Errors
// ============================================================

export { ConfigurationError } from './errors.js'

// ============================================================
// Validation
// ============================================================

export {
  validateLength,
  validateTtl,
  validateExpiry,
  validateGrouping,
  validateAlphabet,
  validateTokenName,
  isTokenFormat,
  parseFormat,
} from './validation.js'

// ============================================================
// Construction & Merge
// ============================================================

export { createTokenSpec, copyTokenSpec, parseTokenOptions } from './token-spec.js'

export { createContext, mergeContexts } from './context.js'

export { createScopeTree, normalizeScopePath } from './scope-tree.js'

// ============================================================
// Resolution
// ============================================================

export { matchesSubject } from './subject-filter.js'

export { resolveTokenParameters, SYSTEM_DEFAULTS } from './resolver.js'
