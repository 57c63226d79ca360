/**
 * Input matching utilities.
 * @packageDocumentation
 */

export { matchInput, simulateStateGraph } from './matcher'
export { acceptsChar } from './accepts'
export { zeroWidthClosure, canTerminate } from './closure'
