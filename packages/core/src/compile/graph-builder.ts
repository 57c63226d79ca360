/**
 * State graph builder - scans a pattern and wires its states together.
 * @packageDocumentation
 */

import type { State, StateGraph } from '../types'
import { InvalidPatternError } from '../types'
import { parseCharClass, findClassEnd } from '../parse/char-class'
import { emptyPatternError, missingOperandError, unclosedBracketError } from '../parse/validator'

/**
 * Arena of states under construction.
 *
 * States are replaced, never edited: adding an edge swaps in a copy of the
 * state with a new successor list.
 */
interface GraphBuilder {
  states: State[]
}

/**
 * Build the state graph for a pattern.
 *
 * The pattern is scanned once, left to right. Each construct (literal,
 * `.` or `[...]`) becomes a state linked from the construct before it.
 * A quantifier swaps the most recent construct for a repeat state that
 * wraps it and loops back to itself.
 *
 * @example
 * "ab*c" becomes:
 *   Start -> Literal(a) -> Repeat(Literal(b), 0) -> Literal(c) -> Termination
 *   with Repeat -> Repeat as a self-loop
 *
 * @param source - Pattern source string
 * @returns The state graph
 * @throws {@link InvalidPatternError} for an empty pattern, a leading
 *   quantifier or an unclosed character class
 *
 * @public
 */
export function buildStateGraph(source: string): StateGraph {
  const chars = Array.from(source)
  if (chars.length === 0) {
    throw new InvalidPatternError(source, emptyPatternError())
  }

  const builder: GraphBuilder = { states: [] }
  const start = addState(builder, (id) => ({ type: 'start', id, next: [] }))

  let constructs: readonly number[] = []
  let i = 0

  while (i < chars.length) {
    const char = chars[i]

    if (char === '*' || char === '+') {
      if (constructs.length === 0) {
        throw new InvalidPatternError(source, missingOperandError(char, i))
      }
      constructs = applyQuantifier(builder, start, constructs, char === '*' ? 0 : 1)
      i++
    } else if (char === '[') {
      const close = findClassEnd(chars, i)
      if (close === -1) {
        throw new InvalidPatternError(source, unclosedBracketError(i, chars.length))
      }
      const spec = parseCharClass(chars.slice(i + 1, close).join(''))
      constructs = appendConstruct(builder, start, constructs, (id) => ({ type: 'charclass', id, next: [], ...spec }))
      i = close + 1
    } else if (char === '.') {
      constructs = appendConstruct(builder, start, constructs, (id) => ({ type: 'wildcard', id, next: [] }))
      i++
    } else {
      constructs = appendConstruct(builder, start, constructs, (id) => ({ type: 'literal', id, next: [], symbol: char }))
      i++
    }
  }

  const termination = addState(builder, (id) => ({ type: 'termination', id, next: [] }))
  addEdge(builder, lastOf(constructs) ?? start, termination)

  return {
    states: builder.states,
    start,
    termination,
  }
}

/**
 * Create a new state in the arena.
 */
function addState(builder: GraphBuilder, create: (id: number) => State): number {
  const id = builder.states.length
  builder.states.push(create(id))
  return id
}

/**
 * Add an edge from one state to another.
 */
function addEdge(builder: GraphBuilder, from: number, to: number): void {
  const state = builder.states[from]
  builder.states[from] = withNext(state, [...state.next, to])
}

/**
 * Swap every edge from `from` to `previous` for a single edge to `replacement`.
 */
function replaceEdge(builder: GraphBuilder, from: number, previous: number, replacement: number): void {
  const state = builder.states[from]
  builder.states[from] = withNext(state, [...state.next.filter((id) => id !== previous), replacement])
}

function withNext(state: State, next: readonly number[]): State {
  return { ...state, next }
}

/**
 * Append a construct after the most recent one (or after start).
 */
function appendConstruct(
  builder: GraphBuilder,
  start: number,
  constructs: readonly number[],
  create: (id: number) => State,
): readonly number[] {
  const parent = lastOf(constructs) ?? start
  const id = addState(builder, create)
  addEdge(builder, parent, id)
  return [...constructs, id]
}

/**
 * Wrap the most recent construct in a repeat state.
 *
 * The wrapped state keeps its place in the arena but is only reachable
 * through the repeat's `inner` index afterwards.
 */
function applyQuantifier(
  builder: GraphBuilder,
  start: number,
  constructs: readonly number[],
  minimum: 0 | 1,
): readonly number[] {
  const previous = constructs[constructs.length - 1]
  const parent = constructs.length >= 2 ? constructs[constructs.length - 2] : start

  const repeat = addState(builder, (id) => ({ type: 'repeat', id, next: [id], inner: previous, minimum }))
  replaceEdge(builder, parent, previous, repeat)

  return [...constructs.slice(0, -1), repeat]
}

function lastOf(constructs: readonly number[]): number | undefined {
  return constructs.length > 0 ? constructs[constructs.length - 1] : undefined
}

/**
 * List the top-level constructs of a graph in pattern order.
 *
 * Follows the first non-self edge from start until termination. Repeat
 * inner states are not included; their repeat state is.
 *
 * @param graph - A graph built by {@link buildStateGraph}
 * @returns Construct states between start and termination
 *
 * @public
 */
export function constructChain(graph: StateGraph): readonly State[] {
  const chain: State[] = []
  let currentId = graph.start

  for (;;) {
    const selfId = currentId
    const nextId = graph.states[selfId].next.find((id) => id !== selfId)
    if (nextId === undefined || nextId === graph.termination) {
      return chain
    }
    chain.push(graph.states[nextId])
    currentId = nextId
  }
}

/**
 * Get the minimum number of characters a pattern can match.
 *
 * @param graph - Compiled state graph
 * @returns Minimum input length in code points
 *
 * @public
 */
export function getMinLength(graph: StateGraph): number {
  let count = 0
  for (const state of constructChain(graph)) {
    if (state.type !== 'repeat' || state.minimum > 0) {
      count++
    }
    // A * contributes 0 to minimum
  }
  return count
}

/**
 * Get the maximum number of characters a pattern can match.
 *
 * @param graph - Compiled state graph
 * @returns Maximum input length, or undefined if unbounded (contains * or +)
 *
 * @public
 */
export function getMaxLength(graph: StateGraph): number | undefined {
  const chain = constructChain(graph)
  if (chain.some((state) => state.type === 'repeat')) {
    return undefined
  }
  return chain.length
}

/**
 * Check if a pattern contains a quantifier.
 *
 * @param graph - Compiled state graph
 * @returns true if matching inputs have no length limit
 *
 * @public
 */
export function isUnbounded(graph: StateGraph): boolean {
  return getMaxLength(graph) === undefined
}
