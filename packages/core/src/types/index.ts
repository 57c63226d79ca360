/**
 * Type definitions for the state-machine regex engine.
 * @packageDocumentation
 */

// State graph types
export type {
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
} from './state'

// Compiled pattern types
export type { CompiledPattern, QuickRejectFilter } from './pattern'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { InvalidPatternError, InputRequiredError } from './errors'
