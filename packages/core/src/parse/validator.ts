/**
 * Pattern validation - reports every structural problem without throwing.
 * @packageDocumentation
 */

import type { PatternError } from '../types'
import { findClassEnd } from './char-class'

/**
 * Validate a pattern source.
 *
 * Returns errors for:
 * - Empty patterns
 * - A `*` or `+` with no construct before it
 * - A `[` with no `]` after it (scanning stops there)
 *
 * The first error is the one the compiler throws.
 *
 * @param source - Pattern source string
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string): readonly PatternError[] {
  const chars = Array.from(source)
  const errors: PatternError[] = []

  if (chars.length === 0) {
    errors.push(emptyPatternError())
    return errors
  }

  let constructs = 0
  let i = 0
  while (i < chars.length) {
    const char = chars[i]

    if (char === '*' || char === '+') {
      if (constructs === 0) {
        errors.push(missingOperandError(char, i))
      }
      i++
    } else if (char === '[') {
      const close = findClassEnd(chars, i)
      if (close === -1) {
        errors.push(unclosedBracketError(i, chars.length))
        break
      }
      constructs++
      i = close + 1
    } else {
      constructs++
      i++
    }
  }

  return errors
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param source - The pattern to check
 * @returns true if the pattern would compile
 *
 * @public
 */
export function isValidPattern(source: string): boolean {
  return validatePattern(source).length === 0
}

/** @internal */
export function emptyPatternError(): PatternError {
  return {
    code: 'EMPTY_PATTERN',
    message: 'Empty regex pattern',
    position: 0,
    length: 0,
  }
}

/** @internal */
export function missingOperandError(quantifier: string, position: number): PatternError {
  return {
    code: 'MISSING_OPERAND',
    message: `'${quantifier}' cannot be used without a preceding character`,
    position,
    length: 1,
  }
}

/** @internal */
export function unclosedBracketError(position: number, sourceLength: number): PatternError {
  return {
    code: 'UNCLOSED_BRACKET',
    message: 'Unclosed character class',
    position,
    length: sourceLength - position,
  }
}
