/**
 * Pattern compiler - compiles a pattern string to a matchable state graph.
 * @packageDocumentation
 */

import type { CompiledPattern } from '../types'
import { buildStateGraph, getMinLength, getMaxLength } from './graph-builder'
import { buildQuickRejectFilter } from './quick-reject'
import { matchInput } from '../match/matcher'

/**
 * Compile a pattern to a matchable form.
 *
 * The compiled pattern includes:
 * - Original source for debugging
 * - The state graph the matcher simulates
 * - Quick-reject filters for fast input elimination
 * - Length bounds
 *
 * @param source - Pattern source string
 * @returns Compiled pattern ready for matching
 * @throws {@link InvalidPatternError} if the pattern is invalid
 *
 * @public
 */
export function compilePattern(source: string): CompiledPattern {
  const graph = buildStateGraph(source)
  const maxLength = getMaxLength(graph)

  const compiled: CompiledPattern = {
    source,
    graph,
    quickReject: buildQuickRejectFilter(graph),
    isUnbounded: maxLength === undefined,
    minLength: getMinLength(graph),
    maxLength,
    match: (input) => matchInput(input, compiled),
  }

  return compiled
}

/**
 * Compile a pattern and test one input against it.
 *
 * Convenience function for one-off matching; compile once with
 * {@link compilePattern} to test many inputs.
 *
 * @param input - Input string
 * @param source - Pattern source string
 * @returns true if the whole input matches
 *
 * @public
 */
export function matchPattern(input: string | null | undefined, source: string): boolean {
  return matchInput(input, compilePattern(source))
}
