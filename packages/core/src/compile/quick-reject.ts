/**
 * Quick-reject filter construction.
 * @packageDocumentation
 */

import type { State, StateGraph, QuickRejectFilter } from '../types'
import { constructChain, getMinLength, getMaxLength } from './graph-builder'

/**
 * Build quick-reject filters for a state graph.
 *
 * Quick-reject filters enable fast elimination of non-matching inputs
 * before the state simulation runs.
 *
 * @param graph - Compiled state graph
 * @returns Quick-reject filter configuration
 *
 * @public
 */
export function buildQuickRejectFilter(graph: StateGraph): QuickRejectFilter {
  const chain = constructChain(graph)

  // Required prefix: leading literals before anything else
  const prefixParts: string[] = []
  for (const state of chain) {
    if (state.type !== 'literal') break
    prefixParts.push(state.symbol)
  }
  const requiredPrefix = prefixParts.length > 0 ? prefixParts.join('') : undefined

  // Required suffix: trailing literals after the last non-literal
  const suffixParts: string[] = []
  for (let i = chain.length - 1; i >= 0; i--) {
    const state: State = chain[i]
    if (state.type !== 'literal') break
    suffixParts.unshift(state.symbol)
  }
  // Only use suffix if it doesn't overlap with prefix
  const requiredSuffix = suffixParts.length > 0 && suffixParts.length < chain.length ? suffixParts.join('') : undefined

  const minLength = getMinLength(graph)

  return {
    requiredPrefix,
    requiredSuffix,
    minLength: minLength > 0 ? minLength : undefined,
    maxLength: getMaxLength(graph),
  }
}

/**
 * Apply quick-reject filter to an input.
 *
 * @param input - Input string to check
 * @param filter - Quick-reject filter
 * @returns false if input definitely doesn't match, true if it might match
 *
 * @public
 */
export function applyQuickReject(input: string, filter: QuickRejectFilter): boolean {
  // Check length bounds (in code points)
  if (filter.minLength !== undefined || filter.maxLength !== undefined) {
    const length = Array.from(input).length
    if (filter.minLength !== undefined && length < filter.minLength) {
      return false
    }
    if (filter.maxLength !== undefined && length > filter.maxLength) {
      return false
    }
  }

  // Check required prefix
  if (filter.requiredPrefix !== undefined && !input.startsWith(filter.requiredPrefix)) {
    return false
  }

  // Check required suffix
  if (filter.requiredSuffix !== undefined && !input.endsWith(filter.requiredSuffix)) {
    return false
  }

  return true
}
