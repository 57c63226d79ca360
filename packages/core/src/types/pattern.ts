import type { StateGraph } from './state'

// =============================================================================
// COMPILED PATTERN
// =============================================================================

/**
 * A compiled pattern ready for matching.
 *
 * Compile once, then call {@link CompiledPattern.match} for as many inputs
 * as needed; nothing is mutated between calls.
 *
 * @public
 */
export interface CompiledPattern {
  /** Original source pattern */
  readonly source: string

  /** The state graph the matcher simulates */
  readonly graph: StateGraph

  /**
   * Quick-reject filters applied before simulation.
   * If any filter fails, the input definitely doesn't match.
   */
  readonly quickReject: QuickRejectFilter

  /** Whether the pattern can match inputs of any length (contains * or +) */
  readonly isUnbounded: boolean

  /** Fewest characters a matching input has */
  readonly minLength: number

  /** Most characters a matching input has (undefined if unbounded) */
  readonly maxLength?: number

  /**
   * Test whether the whole input matches.
   *
   * @throws {@link InputRequiredError} if `input` is undefined or null
   */
  match(input?: string | null): boolean
}

/**
 * Quick rejection filters for fast input elimination.
 *
 * Lengths count code points.
 *
 * @public
 */
export interface QuickRejectFilter {
  /** Minimum input length */
  readonly minLength?: number

  /** Maximum input length */
  readonly maxLength?: number

  /** Literal characters every match starts with */
  readonly requiredPrefix?: string

  /** Literal characters every match ends with */
  readonly requiredSuffix?: string
}
