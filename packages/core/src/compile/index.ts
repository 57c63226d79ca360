/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compilePattern, matchPattern } from './compiler'
export { buildStateGraph, constructChain, getMinLength, getMaxLength, isUnbounded } from './graph-builder'
export { buildQuickRejectFilter, applyQuickReject } from './quick-reject'
