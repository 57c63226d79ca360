/**
 * Input matching - runs a compiled state graph over an input string.
 * @packageDocumentation
 */

import type { CompiledPattern, StateGraph } from '../types'
import { InputRequiredError } from '../types'
import { applyQuickReject } from '../compile/quick-reject'
import { acceptsChar } from './accepts'
import { zeroWidthClosure, canTerminate } from './closure'

/**
 * Test if an input matches a compiled pattern.
 *
 * The whole input must match; there is no search for a substring.
 *
 * @param input - Input string; an empty string is a valid input
 * @param pattern - Compiled pattern
 * @returns true if input matches
 * @throws {@link InputRequiredError} if `input` is undefined or null
 *
 * @public
 */
export function matchInput(input: string | null | undefined, pattern: CompiledPattern): boolean {
  if (input === undefined || input === null) {
    throw new InputRequiredError()
  }

  // Quick-reject filter
  if (!applyQuickReject(input, pattern.quickReject)) {
    return false
  }

  return simulateStateGraph(pattern.graph, Array.from(input))
}

/**
 * Simulate the state graph on the input characters.
 *
 * Uses set-based simulation: every state the input could be in is active
 * at once, so nothing is ever retried.
 *
 * @param graph - Compiled state graph
 * @param chars - Input split into code points
 * @returns true if the graph accepts the input
 *
 * @public
 */
export function simulateStateGraph(graph: StateGraph, chars: readonly string[]): boolean {
  // Start with zero-width closure of the start state
  let currentStates = zeroWidthClosure(graph, [graph.start])

  for (const char of chars) {
    const nextStates = new Set<number>()

    for (const stateId of currentStates) {
      for (const nextId of graph.states[stateId].next) {
        if (acceptsChar(graph, nextId, char)) {
          nextStates.add(nextId)
        }
      }
    }

    if (nextStates.size === 0) {
      return false // No state accepts this character - input rejected
    }

    currentStates = zeroWidthClosure(graph, nextStates)
  }

  return canTerminate(graph, currentStates)
}
