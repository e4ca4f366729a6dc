import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js'
import type { SimilarityFunction } from './types'
import { indelRatio } from '../comparators'

/**
 * Options for phone number similarity.
 */
export interface PhoneSimilarityOptions {
  /** Country assumed for numbers written without an international prefix */
  defaultCountry?: CountryCode
}

/**
 * Compares phone numbers after parsing them with libphonenumber-js.
 *
 * Two numbers that resolve to the same E.164 form score 1 regardless of how
 * they were written. Otherwise the score is the string ratio of their digits
 * (E.164 digits where parsing succeeded), so a single mistyped digit still
 * scores high.
 *
 * @example
 * ```typescript
 * const phone = new PhoneSimilarity({ defaultCountry: 'US' })
 * phone.sim('(213) 373-4253', '+1 213 373 4253') // 1
 * ```
 */
export class PhoneSimilarity implements SimilarityFunction {
  constructor(private readonly options: PhoneSimilarityOptions = {}) {}

  sim(a: unknown, b: unknown): number {
    const digitsA = this.normalize(a)
    const digitsB = this.normalize(b)
    if (digitsA.length === 0 || digitsB.length === 0) return 0
    if (digitsA === digitsB) return 1
    return indelRatio(digitsA, digitsB)
  }

  /**
   * Returns the E.164 number without the leading '+', or the raw digits when
   * the value cannot be parsed as a phone number.
   */
  normalize(value: unknown): string {
    const text = String(value)
    const parsed = parsePhoneNumberFromString(text, this.options.defaultCountry)
    if (parsed) {
      return parsed.number.replace(/\D/g, '')
    }
    return text.replace(/\D/g, '')
  }
}
