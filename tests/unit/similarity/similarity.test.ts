import { describe, it, expect } from 'vitest'
import {
  AbsoluteNumericalSimilarity,
  DateSimilarity,
  JaroWinklerSimilarity,
  PhoneSimilarity,
  RelativeNumericalSimilarity,
  StringSimilarity,
  computeSimilarity,
} from '../../../src/core/similarity'
import { InvalidParameterError } from '../../../src/utils/errors'

describe('StringSimilarity', () => {
  const sim = new StringSimilarity()

  it('scores by indel ratio', () => {
    expect(sim.sim('abce', 'abcd')).toBe(0.75)
    expect(sim.sim('abc', '123')).toBe(0)
  })

  it('ignores diacritics', () => {
    expect(sim.sim('thang', 'thăng')).toBe(1)
  })
})

describe('JaroWinklerSimilarity', () => {
  it('uses the given prefix weight', () => {
    const sim = new JaroWinklerSimilarity(0.2)
    expect(sim.sim('abce', 'abcd')).toBeCloseTo(0.9333, 4)
    expect(sim.sim('wbcd', 'abcd')).toBeCloseTo(0.8333, 4)
  })

  it('defaults to a prefix weight of 0.1', () => {
    expect(new JaroWinklerSimilarity().sim('john', 'jim')).toBeCloseTo(0.575, 10)
  })

  it('ignores diacritics', () => {
    expect(new JaroWinklerSimilarity().sim('thăng', 'thang')).toBe(1)
  })
})

describe('DateSimilarity', () => {
  const sim = new DateSimilarity()

  it('decays linearly within the day window', () => {
    expect(sim.sim('2000-10-11', '2000-10-05')).toBeCloseTo(0.8, 10)
    expect(sim.sim('2000-10-11', '2000-11-05')).toBeCloseTo(0.1667, 4)
  })

  it('returns 1 for the same day', () => {
    expect(sim.sim(new Date('2000-10-11'), '2000-10-11')).toBe(1)
  })

  it('returns 0 for unrelated dates', () => {
    expect(sim.sim('2000-10-11', '2001-03-15')).toBe(0)
  })

  it('scores swapped month and day as 0.5', () => {
    expect(sim.sim('2000-09-11', '2000-11-09')).toBe(0.5)
  })

  it('compares digits when only the month differs', () => {
    expect(sim.sim('2000-03-20', '2000-08-20')).toBe(0.875)
  })

  it('honours a custom window', () => {
    expect(new DateSimilarity(10).sim('2000-10-11', '2000-10-05')).toBeCloseTo(
      0.4,
      10
    )
  })

  it('returns 0 for unparseable values', () => {
    expect(sim.sim('not a date', '2000-10-11')).toBe(0)
  })
})

describe('AbsoluteNumericalSimilarity', () => {
  const sim = new AbsoluteNumericalSimilarity(10)

  it('scores by absolute difference', () => {
    expect(sim.sim(10, 5)).toBe(0.5)
    expect(sim.sim(8.2, 3.1)).toBeCloseTo(0.49, 10)
  })

  it('bottoms out at 0', () => {
    expect(sim.sim(40, 10)).toBe(0)
  })

  it('parses numeric strings', () => {
    expect(sim.sim('10', 5)).toBe(0.5)
  })

  it('rejects a non-positive maximum difference', () => {
    expect(() => new AbsoluteNumericalSimilarity(0)).toThrow(InvalidParameterError)
  })
})

describe('RelativeNumericalSimilarity', () => {
  const sim = new RelativeNumericalSimilarity(30)

  it('scores by percentage difference', () => {
    expect(sim.sim(10000, 8500)).toBeCloseTo(0.5, 10)
  })

  it('bottoms out at 0', () => {
    expect(sim.sim(8.2, 3.1)).toBe(0)
    expect(sim.sim(10000, 7000)).toBeCloseTo(0, 10)
  })

  it('returns 1 for equal numbers, including zero', () => {
    expect(sim.sim(0, 0)).toBe(1)
    expect(sim.sim(42, 42)).toBe(1)
  })

  it('rejects a non-positive maximum percentage', () => {
    expect(() => new RelativeNumericalSimilarity(-5)).toThrow(InvalidParameterError)
  })
})

describe('PhoneSimilarity', () => {
  const sim = new PhoneSimilarity({ defaultCountry: 'US' })

  it('returns 1 for the same number written differently', () => {
    expect(sim.sim('(213) 373-4253', '+1 213 373 4253')).toBe(1)
  })

  it('scores different numbers by their digits', () => {
    // 12133734253 vs 12133734254: 10 digits in common out of 22
    expect(sim.sim('+1 213 373 4253', '+1 213 373 4254')).toBeCloseTo(20 / 22, 10)
  })

  it('normalizes to E.164 digits', () => {
    expect(sim.normalize('(213) 373-4253')).toBe('12133734253')
  })

  it('returns 0 when a value holds no digits', () => {
    expect(sim.sim('', '213 373 4253')).toBe(0)
  })
})

describe('computeSimilarity', () => {
  it('accepts a similarity object', () => {
    expect(computeSimilarity(new StringSimilarity(), 'abce', 'abcd')).toBe(0.75)
  })

  it('accepts a bare callback', () => {
    const exact = (a: unknown, b: unknown) => (a === b ? 1 : 0)
    expect(computeSimilarity(exact, 'x', 'x')).toBe(1)
    expect(computeSimilarity(exact, 'x', 'y')).toBe(0)
  })
})
