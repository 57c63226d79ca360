import { describe, it, expect } from 'vitest'

import { parseCharClass, findClassEnd } from './char-class'

describe('parseCharClass', () => {
  it('parses ranges', () => {
    const spec = parseCharClass('a-z0-9')

    expect(spec.negated).toBe(false)
    expect(spec.ranges).toEqual([
      { low: 97, high: 122 },
      { low: 48, high: 57 },
    ])
    expect(spec.singles.size).toBe(0)
  })

  it('parses singles', () => {
    const spec = parseCharClass('abc')

    expect(spec.ranges).toEqual([])
    expect([...spec.singles]).toEqual(['a', 'b', 'c'])
  })

  it('parses negation', () => {
    const spec = parseCharClass('^0-9')

    expect(spec.negated).toBe(true)
    expect(spec.ranges).toEqual([{ low: 48, high: 57 }])
  })

  it('mixes ranges and singles', () => {
    const spec = parseCharClass('a-f_x')

    expect(spec.ranges).toEqual([{ low: 97, high: 102 }])
    expect([...spec.singles]).toEqual(['_', 'x'])
  })

  describe('dashes', () => {
    it('treats a trailing dash as a single', () => {
      const spec = parseCharClass('a-')

      expect(spec.ranges).toEqual([])
      expect([...spec.singles]).toEqual(['a', '-'])
    })

    it('treats a leading dash as a single', () => {
      const spec = parseCharClass('-a')

      expect(spec.ranges).toEqual([])
      expect([...spec.singles]).toEqual(['-', 'a'])
    })

    it('treats a dash after a range as a single', () => {
      const spec = parseCharClass('a-z-')

      expect(spec.ranges).toEqual([{ low: 97, high: 122 }])
      expect([...spec.singles]).toEqual(['-'])
    })
  })

  it('drops reversed ranges', () => {
    const spec = parseCharClass('z-a')

    expect(spec.ranges).toEqual([])
    expect(spec.singles.size).toBe(0)
  })

  it('handles empty bodies', () => {
    expect(parseCharClass('')).toEqual({ ranges: [], singles: new Set(), negated: false })
    expect(parseCharClass('^')).toEqual({ ranges: [], singles: new Set(), negated: true })
  })

  it('reads ranges by code point', () => {
    const spec = parseCharClass('😀-😂')

    expect(spec.ranges).toEqual([{ low: 0x1f600, high: 0x1f602 }])
  })
})

describe('findClassEnd', () => {
  it('finds the closing bracket', () => {
    expect(findClassEnd(Array.from('[ab]c'), 0)).toBe(3)
    expect(findClassEnd(Array.from('x[]'), 1)).toBe(2)
  })

  it('returns -1 for an unclosed class', () => {
    expect(findClassEnd(Array.from('[ab'), 0)).toBe(-1)
  })
})
