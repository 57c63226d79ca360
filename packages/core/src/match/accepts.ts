/**
 * Character acceptance for each state variant.
 * @packageDocumentation
 */

import type { CharClassState, State, StateGraph } from '../types'
import { codePointOf } from '../parse/char-class'

/**
 * Test if a state accepts a character.
 *
 * @param graph - Graph the state belongs to
 * @param stateId - Index of the state
 * @param char - A single code point
 * @returns true if consuming `char` may move into this state
 *
 * @public
 */
export function acceptsChar(graph: StateGraph, stateId: number, char: string): boolean {
  return acceptsState(graph, graph.states[stateId], char)
}

function acceptsState(graph: StateGraph, state: State, char: string): boolean {
  switch (state.type) {
    case 'start':
    case 'termination':
      return false

    case 'wildcard':
      return true

    case 'literal':
      return state.symbol === char

    case 'charclass':
      return charClassAccepts(state, char)

    case 'repeat':
      // Each repetition consumes what the wrapped construct consumes
      return acceptsChar(graph, state.inner, char)
  }
}

/**
 * Membership test for a character class, flipped when negated.
 */
function charClassAccepts(state: CharClassState, char: string): boolean {
  const code = codePointOf(char)
  const inClass = state.ranges.some((range) => range.low <= code && code <= range.high) || state.singles.has(char)
  return state.negated ? !inClass : inClass
}
