/**
 * Character-class parsing - turns a bracket body into ranges and singles.
 * @packageDocumentation
 */

import type { CharClassState, CodePointRange } from '../types'

/**
 * The matching data of a character class, without graph wiring.
 * @public
 */
export type CharClassSpec = Pick<CharClassState, 'ranges' | 'singles' | 'negated'>

/**
 * Parse the body of a character class (the text between `[` and `]`).
 *
 * A leading `^` negates the class. After that, `x-y` becomes a range when
 * there is a character after the `-`; any other character, including a
 * trailing `-`, is a single. Nothing can be escaped.
 *
 * Reversed ranges like `z-a` contain no characters and are left out.
 *
 * @param body - Bracket body, e.g. `a-z0-9_` or `^0-9`
 * @returns Ranges, singles and negation flag
 *
 * @public
 */
export function parseCharClass(body: string): CharClassSpec {
  let chars = Array.from(body)
  let negated = false

  if (chars[0] === '^') {
    negated = true
    chars = chars.slice(1)
  }

  const ranges: CodePointRange[] = []
  const singles = new Set<string>()

  let i = 0
  while (i < chars.length) {
    if (i + 2 < chars.length && chars[i + 1] === '-') {
      const low = codePointOf(chars[i])
      const high = codePointOf(chars[i + 2])
      if (low <= high) {
        ranges.push({ low, high })
      }
      i += 3
    } else {
      singles.add(chars[i])
      i++
    }
  }

  return { ranges, singles, negated }
}

/**
 * Find the `]` closing a class opened at `open`.
 *
 * @param chars - Pattern split into code points
 * @param open - Index of the opening `[`
 * @returns Index of the closing `]`, or -1 if the class is never closed
 *
 * @public
 */
export function findClassEnd(chars: readonly string[], open: number): number {
  return chars.indexOf(']', open + 1)
}

/**
 * Code point of a single character, or -1 for an empty string.
 * @public
 */
export function codePointOf(char: string): number {
  return char.codePointAt(0) ?? -1
}
