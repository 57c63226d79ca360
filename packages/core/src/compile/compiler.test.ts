import { describe, it, expect } from 'vitest'
import fc from 'fast-check'

import { compilePattern, matchPattern } from './compiler'
import { InvalidPatternError } from '../types'

/** Fixed seed for deterministic property runs */
const SEED = 424242

/** Patterns built from every construct and quantifier the engine supports */
const patternArbitrary = fc
  .array(
    fc.record({
      atom: fc.constantFrom('a', 'b', '.', '[ab]', '[^a]', '[a-b]'),
      quantifier: fc.constantFrom('', '*', '+'),
    }),
    { minLength: 1, maxLength: 5 },
  )
  .map((parts) => parts.map((p) => p.atom + p.quantifier).join(''))

const inputArbitrary = fc.stringOf(fc.constantFrom('a', 'b', 'c'), { maxLength: 8 })

describe('compilePattern', () => {
  it('records source and length bounds', () => {
    const pattern = compilePattern('a.c')

    expect(pattern.source).toBe('a.c')
    expect(pattern.isUnbounded).toBe(false)
    expect(pattern.minLength).toBe(3)
    expect(pattern.maxLength).toBe(3)
    expect(pattern.graph.states).toHaveLength(5)
  })

  it('marks quantified patterns unbounded', () => {
    const pattern = compilePattern('[a-z0-9]+')

    expect(pattern.isUnbounded).toBe(true)
    expect(pattern.minLength).toBe(1)
    expect(pattern.maxLength).toBeUndefined()
  })

  describe('invalid patterns', () => {
    it('throws InvalidPatternError', () => {
      expect(() => compilePattern('')).toThrow(InvalidPatternError)
      expect(() => compilePattern('*abc')).toThrow(InvalidPatternError)
      expect(() => compilePattern('+x')).toThrow(InvalidPatternError)
      expect(() => compilePattern('[abc')).toThrow(InvalidPatternError)
    })

    it('carries the error code', () => {
      const codes = ['', '*abc', '[abc'].map((src) => {
        try {
          compilePattern(src)
          return undefined
        } catch (e) {
          return e instanceof InvalidPatternError ? e.code : undefined
        }
      })

      expect(codes).toEqual(['EMPTY_PATTERN', 'MISSING_OPERAND', 'UNCLOSED_BRACKET'])
    })
  })

  it('produces reusable patterns', () => {
    const pattern = compilePattern('ab*c')
    const inputs = ['ac', 'abc', 'abbbc', 'ab', 'abd', 'ac']

    expect(inputs.map((input) => pattern.match(input))).toEqual([true, true, true, false, false, true])
  })

  it('compiles the same source to equivalent patterns', () => {
    fc.assert(
      fc.property(patternArbitrary, fc.array(inputArbitrary, { maxLength: 10 }), (source, inputs) => {
        const first = compilePattern(source)
        const second = compilePattern(source)

        for (const input of inputs) {
          expect(second.match(input)).toBe(first.match(input))
        }
      }),
      { seed: SEED },
    )
  })

  it('agrees with an anchored RegExp on the shared syntax', () => {
    fc.assert(
      fc.property(patternArbitrary, inputArbitrary, (source, input) => {
        const oracle = new RegExp(`^(?:${source})$`)

        expect(compilePattern(source).match(input)).toBe(oracle.test(input))
      }),
      { seed: SEED, numRuns: 500 },
    )
  })
})

describe('matchPattern', () => {
  it('compiles and matches in one step', () => {
    expect(matchPattern('abc', 'a.c')).toBe(true)
    expect(matchPattern('ac', 'a.c')).toBe(false)
  })

  it('throws for invalid patterns', () => {
    expect(() => matchPattern('abc', '[abc')).toThrow(InvalidPatternError)
  })
})
