/**
 * State-Machine Regex Library
 *
 * Compiles a restricted regular-expression syntax (literals, `.`, bracketed
 * character classes, postfix `*` and `+`) into an explicit state graph and
 * matches whole input strings by simulating every active state at once.
 * No native regex facility is used.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // State graph types
  StateGraph,
  State,
  StateType,
  StateBase,
  StartState,
  TerminationState,
  WildcardState,
  LiteralState,
  CharClassState,
  CodePointRange,
  RepeatState,
  // Compiled pattern types
  CompiledPattern,
  QuickRejectFilter,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { InvalidPatternError, InputRequiredError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parseCharClass, type CharClassSpec } from './parse'
export { validatePattern, isValidPattern } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compilePattern, matchPattern } from './compile'
export { buildStateGraph, constructChain, getMinLength, getMaxLength, isUnbounded } from './compile'
export { buildQuickRejectFilter, applyQuickReject } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { matchInput, simulateStateGraph } from './match'
export { acceptsChar, zeroWidthClosure, canTerminate } from './match'
