/**
 * Zero-width searches over the state graph.
 *
 * Only a `*` repeat (minimum 0) can be passed without consuming input, so
 * both searches extend only through those states. A `+` repeat never does,
 * even after its first repetition has been consumed.
 *
 * @packageDocumentation
 */

import type { RepeatState, State, StateGraph } from '../types'

/**
 * Compute the zero-width closure of a set of states.
 *
 * Breadth-first from `states`. Every `*` repeat that is a successor of a
 * state in the result joins the result, and its own successors are then
 * examined. Any other state is a boundary: the search does not look past it.
 * Each state is expanded at most once, which stops the self-loops.
 *
 * @param graph - Compiled state graph
 * @param states - Indices of the active states
 * @returns Active states plus everything reachable without consuming input
 *
 * @public
 */
export function zeroWidthClosure(graph: StateGraph, states: Iterable<number>): Set<number> {
  const closure = new Set(states)
  const queue = [...closure]
  const visited = new Set<number>()

  for (let head = 0; head < queue.length; head++) {
    const stateId = queue[head]
    if (visited.has(stateId)) continue
    visited.add(stateId)

    // A * repeat's self-loop lands on a state already in the closure,
    // so the visited check covers it
    for (const nextId of graph.states[stateId].next) {
      if (!visited.has(nextId) && isZeroWidthRepeat(graph.states[nextId])) {
        closure.add(nextId)
        queue.push(nextId)
      }
    }
  }

  return closure
}

/**
 * Check if termination is reachable without consuming more input.
 *
 * Breadth-first from `states`; succeeds as soon as a visited state has the
 * termination state as a direct successor. The search continues only
 * through `*` repeats.
 *
 * @param graph - Compiled state graph
 * @param states - Indices of the active states
 * @returns true if the input consumed so far is a complete match
 *
 * @public
 */
export function canTerminate(graph: StateGraph, states: Iterable<number>): boolean {
  const queue = [...states]
  const visited = new Set<number>()

  for (let head = 0; head < queue.length; head++) {
    const stateId = queue[head]
    if (visited.has(stateId)) continue
    visited.add(stateId)

    const next = graph.states[stateId].next
    if (next.some((id) => graph.states[id].type === 'termination')) {
      return true
    }

    for (const nextId of next) {
      if (!visited.has(nextId) && isZeroWidthRepeat(graph.states[nextId])) {
        queue.push(nextId)
      }
    }
  }

  return false
}

/**
 * Whether a state can be skipped without consuming input.
 */
function isZeroWidthRepeat(state: State): state is RepeatState & { readonly minimum: 0 } {
  return state.type === 'repeat' && state.minimum === 0
}
