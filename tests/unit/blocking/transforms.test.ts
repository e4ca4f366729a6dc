import { describe, it, expect } from 'vitest'
import {
  applyTransform,
  firstLetter,
  firstN,
  soundexTransform,
  yearTransform,
} from '../../../src/core/blocking/transforms'

describe('blocking transforms', () => {
  describe('applyTransform', () => {
    it('applies identity transform', () => {
      expect(applyTransform('hello', 'identity')).toBe('hello')
      expect(applyTransform(123, 'identity')).toBe('123')
    })

    it('applies soundex transform', () => {
      expect(applyTransform('Smith', 'soundex')).toBe('S530')
      expect(applyTransform('Smyth', 'soundex')).toBe('S530')
    })

    it('applies year transform', () => {
      expect(applyTransform(new Date('2023-05-15'), 'year')).toBe('2023')
      expect(applyTransform('1990-12-31', 'year')).toBe('1990')
    })

    it('applies firstN transform with options', () => {
      expect(applyTransform('Johnson', 'firstN', { n: 3 })).toBe('JOH')
    })

    it('returns null for firstN without options', () => {
      expect(applyTransform('Johnson', 'firstN')).toBeNull()
    })

    it('handles null values', () => {
      expect(applyTransform(null, 'identity')).toBeNull()
      expect(applyTransform(undefined, 'soundex')).toBeNull()
    })

    it('handles custom transform functions', () => {
      const domain = (value: unknown) => String(value).split('@')[1] ?? null
      expect(applyTransform('ann@example.com', domain)).toBe('example.com')
    })

    it('propagates errors from custom transform functions', () => {
      const failing = () => {
        throw new Error('bad value')
      }
      expect(() => applyTransform('x', failing)).toThrow('bad value')
    })
  })

  describe('firstLetter', () => {
    it('extracts the first character in uppercase', () => {
      expect(firstLetter('smith')).toBe('S')
      expect(firstLetter('  jones')).toBe('J')
    })

    it('returns null for empty values', () => {
      expect(firstLetter('')).toBeNull()
      expect(firstLetter(null)).toBeNull()
    })
  })

  describe('firstN', () => {
    it('extracts the first N characters in uppercase', () => {
      expect(firstN('smithson', 5)).toBe('SMITH')
      expect(firstN('ab', 5)).toBe('AB')
    })

    it('returns null for non-positive N', () => {
      expect(firstN('smith', 0)).toBeNull()
      expect(firstN('smith', -1)).toBeNull()
    })
  })

  describe('soundexTransform', () => {
    it('returns null without letters', () => {
      expect(soundexTransform('123')).toBeNull()
      expect(soundexTransform('   ')).toBeNull()
    })
  })

  describe('yearTransform', () => {
    it('extracts the UTC year from timestamps', () => {
      expect(yearTransform(Date.UTC(1985, 6, 4))).toBe('1985')
    })

    it('returns null for invalid dates', () => {
      expect(yearTransform('not a date')).toBeNull()
      expect(yearTransform({})).toBeNull()
    })
  })
})
