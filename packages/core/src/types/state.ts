// =============================================================================
// STATE GRAPH
// =============================================================================

/**
 * The state graph produced by the compiler.
 *
 * States live in a flat arena and refer to each other by index, so the
 * self-loop of a repeat is just an index in its own successor list.
 * The graph is never modified after compilation.
 *
 * @public
 */
export interface StateGraph {
  /** All states, including repeat inner states that no edge reaches */
  readonly states: readonly State[]

  /** Index of the single start state */
  readonly start: number

  /** Index of the single termination state */
  readonly termination: number
}

/**
 * A node in the state graph.
 * @public
 */
export type State = StartState | TerminationState | WildcardState | LiteralState | CharClassState | RepeatState

/**
 * Discriminant of {@link State}.
 * @public
 */
export type StateType = State['type']

/**
 * Fields shared by every state.
 * @public
 */
export interface StateBase {
  /** Index of this state in {@link StateGraph.states} */
  readonly id: number

  /** Successor indices, in insertion order */
  readonly next: readonly number[]
}

/**
 * Entry point of the graph. Accepts no character.
 * @public
 */
export interface StartState extends StateBase {
  readonly type: 'start'
}

/**
 * Marks a successful match. Accepts no character and has no successors.
 * @public
 */
export interface TerminationState extends StateBase {
  readonly type: 'termination'
}

/**
 * The `.` construct: accepts any single character.
 * @public
 */
export interface WildcardState extends StateBase {
  readonly type: 'wildcard'
}

/**
 * A literal character.
 *
 * @example "a" accepts only "a"
 *
 * @public
 */
export interface LiteralState extends StateBase {
  readonly type: 'literal'

  /** A single code point */
  readonly symbol: string
}

/**
 * A bracketed character class like `[a-z0-9_]` or `[^0-9]`.
 * @public
 */
export interface CharClassState extends StateBase {
  readonly type: 'charclass'

  /** Code-point ranges, in the order they were written */
  readonly ranges: readonly CodePointRange[]

  /** Individual characters */
  readonly singles: ReadonlySet<string>

  /** Whether the class was written with a leading ^ */
  readonly negated: boolean
}

/**
 * An inclusive code-point range with `low <= high`.
 * @public
 */
export interface CodePointRange {
  readonly low: number
  readonly high: number
}

/**
 * A `*` (minimum 0) or `+` (minimum 1) applied to the preceding construct.
 *
 * Accepts whatever its inner state accepts. Its first successor is itself.
 *
 * @public
 */
export interface RepeatState extends StateBase {
  readonly type: 'repeat'

  /** Index of the quantified state */
  readonly inner: number

  /** Fewest repetitions the quantifier allows */
  readonly minimum: 0 | 1
}
