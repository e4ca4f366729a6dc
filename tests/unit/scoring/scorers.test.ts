import { describe, it, expect } from 'vitest'
import { AbsoluteScorer } from '../../../src/core/scoring/absolute-scorer'
import { CallbackScorer } from '../../../src/core/scoring/callback-scorer'
import { MaxScorer, MinScorer } from '../../../src/core/scoring/combinator-scorers'
import { OverrideScorer } from '../../../src/core/scoring/override-scorer'
import { isScorer, toScorer } from '../../../src/core/scoring/to-scorer'
import { refused, scored } from '../../../src/core/scoring/types'
import { WeightedSumScorer } from '../../../src/core/scoring/weighted-sum-scorer'
import {
  AbsoluteNumericalSimilarity,
  JaroWinklerSimilarity,
} from '../../../src/core/similarity'
import type { Row, RowData, RowKey } from '../../../src/types/table'
import {
  ConfigurationError,
  InvalidParameterError,
  MissingFieldError,
} from '../../../src/utils/errors'

function row(data: RowData, key: RowKey = 0): Row {
  return { key, data }
}

describe('WeightedSumScorer', () => {
  const scorer = new WeightedSumScorer({
    first_name: new JaroWinklerSimilarity(),
    age: new AbsoluteNumericalSimilarity(10),
  })

  it('returns 1 for identical rows', () => {
    expect(
      scorer.score(row({ first_name: 'john', age: 41 }), row({ first_name: 'john', age: 41 }))
    ).toEqual(scored(1))
  })

  it('returns the root-mean-square of the field similarities', () => {
    const result = scorer.score(
      row({ first_name: 'jim', age: 41 }),
      row({ first_name: 'jimm', age: 43 })
    )
    expect(result.kind).toBe('score')
    if (result.kind === 'score') {
      expect(result.value).toBeCloseTo(0.8737093656105305, 10)
    }
  })

  it('treats a null value as similarity 0', () => {
    const result = scorer.score(
      row({ first_name: 'john', age: null }),
      row({ first_name: 'john', age: 41 })
    )
    expect(result).toEqual(scored(Math.sqrt(0.5)))
  })

  it('weights fields', () => {
    const weighted = new WeightedSumScorer({
      last: { similarity: (a, b) => (a === b ? 1 : 0), weight: 3 },
      first: (a, b) => (a === b ? 1 : 0),
    })
    expect(
      weighted.score(row({ last: 'x', first: 'a' }), row({ last: 'x', first: 'b' }))
    ).toEqual(scored(Math.sqrt(3 / 4)))
  })

  it('explains the per-field breakdown', () => {
    const exact = (a: unknown, b: unknown) => (a === b ? 1 : 0)
    const explained = new WeightedSumScorer({
      last: exact,
      first: { similarity: exact, weight: 2 },
    }).explain(row({ last: 'x', first: 'a' }), row({ last: 'x', first: null }))

    expect(explained).toEqual([
      { field: 'last', similarity: 1, weight: 1, leftValue: 'x', rightValue: 'x' },
      { field: 'first', similarity: 0, weight: 2, leftValue: 'a', rightValue: null },
    ])
  })

  it('requires at least one field', () => {
    expect(() => new WeightedSumScorer({})).toThrow(ConfigurationError)
  })

  it('rejects non-positive weights', () => {
    expect(
      () =>
        new WeightedSumScorer({
          last: { similarity: new JaroWinklerSimilarity(), weight: 0 },
        })
    ).toThrow(InvalidParameterError)
  })
})

describe('AbsoluteScorer', () => {
  const scorer = new AbsoluteScorer({ field: 'attract_id', score: 1 })

  it('returns its score when the values are equal', () => {
    expect(scorer.score(row({ attract_id: 1234 }), row({ attract_id: 1234 }))).toEqual(
      scored(1)
    )
  })

  it('refuses when the values differ', () => {
    expect(scorer.score(row({ attract_id: 1234 }), row({ attract_id: 2345 }))).toEqual(
      refused("field 'attract_id' differs")
    )
  })

  it('refuses when either value is null', () => {
    expect(scorer.score(row({ attract_id: 1234 }), row({ attract_id: NaN })).kind).toBe(
      'refusal'
    )
    expect(scorer.score(row({ attract_id: null }), row({ attract_id: 1234 })).kind).toBe(
      'refusal'
    )
  })

  it('fails on an absent field unless told to ignore it', () => {
    expect(() => scorer.score(row({}), row({ attract_id: 1 }))).toThrow(
      MissingFieldError
    )
    const lenient = new AbsoluteScorer({
      field: 'attract_id',
      score: 1,
      ignoreMissing: true,
    })
    expect(lenient.score(row({}), row({ attract_id: 1 }))).toEqual(
      refused("field 'attract_id' is absent")
    )
  })

  it('requires a score in [0, 1]', () => {
    expect(() => new AbsoluteScorer({ field: 'id', score: 2 })).toThrow(
      InvalidParameterError
    )
  })
})

describe('MaxScorer', () => {
  const scorer = new MaxScorer([
    new AbsoluteScorer({ field: 'attract_id', score: 1 }),
    new WeightedSumScorer({ first_name: new JaroWinklerSimilarity() }),
  ])

  it('forces a match when the absolute scorer agrees', () => {
    expect(
      scorer.score(
        row({ first_name: 'john', attract_id: 5 }),
        row({ first_name: 'jim', attract_id: 5 })
      )
    ).toEqual(scored(1))
  })

  it('falls back to the other scorers on refusal', () => {
    const result = scorer.score(
      row({ first_name: 'john', attract_id: 5 }),
      row({ first_name: 'jim', attract_id: 4 })
    )
    expect(result.kind === 'score' && result.value).toBeCloseTo(0.575, 10)
  })

  it('refuses only when every child refuses', () => {
    const vetoes = new MaxScorer([
      new AbsoluteScorer({ field: 'a', score: 1 }),
      new AbsoluteScorer({ field: 'b', score: 1 }),
    ])
    expect(vetoes.score(row({ a: 1, b: 1 }), row({ a: 2, b: 2 }))).toEqual(
      refused("every scorer refused: field 'a' differs; field 'b' differs")
    )
  })

  it('requires at least one scorer', () => {
    expect(() => new MaxScorer([])).toThrow(ConfigurationError)
  })

  it('names its children', () => {
    expect(scorer.name).toBe('max(absolute:attract_id, weighted-sum:first_name)')
  })
})

describe('MinScorer', () => {
  const scorer = new MinScorer([
    new AbsoluteScorer({ field: 'repell_id', score: 0 }),
    new WeightedSumScorer({ first_name: new JaroWinklerSimilarity() }),
  ])

  it('forbids a match when the absolute scorer agrees', () => {
    expect(
      scorer.score(
        row({ first_name: 'john', repell_id: 5 }),
        row({ first_name: 'jim', repell_id: 5 })
      )
    ).toEqual(scored(0))
  })

  it('falls back to the other scorers on refusal', () => {
    const result = scorer.score(
      row({ first_name: 'john', repell_id: 5 }),
      row({ first_name: 'jim', repell_id: 4 })
    )
    expect(result.kind === 'score' && result.value).toBeCloseTo(0.575, 10)
  })
})

describe('OverrideScorer', () => {
  const base = new CallbackScorer(() => 0.5)
  const boost = (score: number) => Math.min(1, score + 0.3)

  it('transforms the score of rows sharing a group', () => {
    const scorer = new OverrideScorer({
      scorer: base,
      groups: new Map<RowKey, unknown>([
        [1, 'household-a'],
        [2, 'household-a'],
        [3, 'household-b'],
      ]),
      transform: boost,
    })

    expect(scorer.score(row({}, 1), row({}, 2))).toEqual(scored(0.8))
    expect(scorer.score(row({}, 1), row({}, 3))).toEqual(scored(0.5))
    expect(scorer.score(row({}, 1), row({}, 4))).toEqual(scored(0.5))
  })

  it('reads groups from a plain object', () => {
    const scorer = new OverrideScorer({
      scorer: base,
      groups: { a: 'g1', b: 'g1', c: null },
      transform: () => 0,
    })

    expect(scorer.score(row({}, 'a'), row({}, 'b'))).toEqual(scored(0))
    expect(scorer.score(row({}, 'c'), row({}, 'c'))).toEqual(scored(0.5))
  })

  it('passes refusals through', () => {
    const scorer = new OverrideScorer({
      scorer: new AbsoluteScorer({ field: 'id', score: 1 }),
      groups: { a: 'g1', b: 'g1' },
      transform: () => 0,
    })
    expect(scorer.score(row({ id: 1 }, 'a'), row({ id: 2 }, 'b')).kind).toBe('refusal')
  })
})

describe('toScorer', () => {
  it('keeps scorer instances', () => {
    const scorer = new CallbackScorer(() => 1)
    expect(toScorer(scorer)).toBe(scorer)
  })

  it('wraps callbacks', () => {
    const scorer = toScorer((a, b) => (a.data.x === b.data.x ? 1 : 0))
    expect(scorer).toBeInstanceOf(CallbackScorer)
    expect(scorer.score(row({ x: 1 }), row({ x: 1 }))).toEqual(scored(1))
  })

  it('turns field maps into a weighted-sum scorer', () => {
    const scorer = toScorer({ first: new JaroWinklerSimilarity() })
    expect(scorer).toBeInstanceOf(WeightedSumScorer)
    expect(scorer.name).toBe('weighted-sum:first')
  })

  it('keeps plain objects implementing the scorer interface', () => {
    const scorer = { name: 'always', score: () => scored(0.9) }
    expect(isScorer(scorer)).toBe(true)
    expect(toScorer(scorer)).toBe(scorer)
  })

  it('treats fields called name and score as a field map', () => {
    const fields = {
      name: new JaroWinklerSimilarity(),
      score: new JaroWinklerSimilarity(),
    }
    expect(isScorer(fields)).toBe(false)
    expect(toScorer(fields).name).toBe('weighted-sum:name+score')
  })
})
