/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parseCharClass, findClassEnd, codePointOf, type CharClassSpec } from './char-class'
export { validatePattern, isValidPattern } from './validator'
