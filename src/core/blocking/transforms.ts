import { soundexEncode } from '../comparators'

/**
 * Block transformations applied to field values before they become bucket key parts.
 * These transforms make buckets broader than exact equality.
 */
export type BlockTransform =
  | 'identity' // Use value as-is
  | 'firstLetter' // Extract first character
  | 'soundex' // Phonetic encoding via Soundex
  | 'year' // Extract year from date
  | 'firstN' // First N characters (requires parameter)
  | ((value: unknown) => string | null) // Custom transform function

/**
 * Options for the firstN transform.
 */
export interface FirstNOptions {
  /** Number of characters to extract */
  n: number
}

/**
 * Applies a transformation to a value to generate a bucket key part.
 *
 * @param value - The value to transform
 * @param transform - The transformation to apply
 * @param options - Optional transform-specific options
 * @returns Transformed string, or null if the value cannot be transformed
 */
export function applyTransform(
  value: unknown,
  transform: BlockTransform,
  options?: FirstNOptions
): string | null {
  if (value == null) {
    return null
  }

  if (typeof transform === 'function') {
    return transform(value)
  }

  switch (transform) {
    case 'identity':
      return String(value)

    case 'firstLetter':
      return firstLetter(value)

    case 'soundex':
      return soundexTransform(value)

    case 'year':
      return yearTransform(value)

    case 'firstN':
      return options ? firstN(value, options.n) : null

    default: {
      const _exhaustive: never = transform
      return _exhaustive
    }
  }
}

/**
 * Extracts the first letter from a value.
 * Converts to uppercase for case-insensitive blocking.
 *
 * @param value - The value to extract from
 * @returns First letter in uppercase, or null if not possible
 */
export function firstLetter(value: unknown): string | null {
  if (value == null) return null

  const str = String(value).trim()
  if (str.length === 0) return null

  return str[0].toUpperCase()
}

/**
 * Extracts the first N characters from a value, in uppercase.
 */
export function firstN(value: unknown, n: number): string | null {
  if (value == null) return null
  if (n <= 0) return null

  const str = String(value).trim()
  if (str.length === 0) return null

  return str.substring(0, n).toUpperCase()
}

/**
 * Encodes a value using the Soundex phonetic algorithm.
 * Groups similar-sounding names together.
 */
export function soundexTransform(value: unknown): string | null {
  if (value == null) return null

  const str = String(value).trim()
  if (str.length === 0) return null

  const code = soundexEncode(str)
  return code || null
}

/**
 * Extracts the UTC year from a date value.
 * Supports Date objects, ISO strings, and timestamps.
 *
 * @param value - The date value to extract from
 * @returns Year as string, or null if not a valid date
 */
export function yearTransform(value: unknown): string | null {
  if (value == null) return null

  let date: Date | null = null

  if (value instanceof Date) {
    date = value
  } else if (typeof value === 'string' || typeof value === 'number') {
    date = new Date(value)
  }

  if (!date || isNaN(date.getTime())) {
    return null
  }

  return String(date.getUTCFullYear())
}
