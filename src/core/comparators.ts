/**
 * Options shared by the string comparators.
 */
export interface StringComparatorOptions {
  /** Whether string comparison should be case-sensitive (default: true) */
  caseSensitive?: boolean
  /** Whether accents and other combining marks are stripped first (default: true) */
  foldDiacritics?: boolean
}

/**
 * Strips combining marks so that accented letters compare equal to their base letter.
 *
 * @example
 * ```typescript
 * foldDiacritics('thăng') // 'thang'
 * ```
 */
export function foldDiacritics(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '')
}

function prepare(value: unknown, options: StringComparatorOptions): string {
  const { caseSensitive = true, foldDiacritics: fold = true } = options
  let str = String(value)
  if (fold) str = foldDiacritics(str)
  if (!caseSensitive) str = str.toLowerCase()
  return str
}

/**
 * Calculates the indel similarity ratio between two values.
 *
 * The ratio is `2 * LCS / (|a| + |b|)` where LCS is the length of the longest
 * common subsequence, i.e. one minus the insert/delete edit distance divided by
 * the combined length. A substitution therefore costs two edits.
 *
 * @param a - First value to compare
 * @param b - Second value to compare
 * @param options - Comparison options
 * @returns Similarity score from 0 to 1
 *
 * @example
 * ```typescript
 * indelRatio('abce', 'abcd')  // 0.75
 * indelRatio('abc', '123')    // 0
 * indelRatio('thang', 'thăng') // 1 (diacritics folded)
 * ```
 */
export function indelRatio(
  a: unknown,
  b: unknown,
  options: StringComparatorOptions = {}
): number {
  const strA = prepare(a, options)
  const strB = prepare(b, options)

  const total = strA.length + strB.length
  if (total === 0) return 1
  if (strA === strB) return 1

  // Rolling-row LCS
  let previous = new Array<number>(strB.length + 1).fill(0)
  for (let i = 1; i <= strA.length; i++) {
    const current = new Array<number>(strB.length + 1).fill(0)
    for (let j = 1; j <= strB.length; j++) {
      current[j] =
        strA[i - 1] === strB[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1])
    }
    previous = current
  }

  return (2 * previous[strB.length]) / total
}

/**
 * Options for Jaro-Winkler similarity comparison.
 */
export interface JaroWinklerOptions extends StringComparatorOptions {
  /** Prefix scaling factor (default: 0.1, range: 0-0.25) */
  prefixScale?: number
  /** Maximum prefix length to consider (default: 4) */
  maxPrefixLength?: number
}

/**
 * Calculates Jaro-Winkler similarity between two values.
 *
 * Jaro-Winkler is optimized for short strings like names. It rewards common
 * prefixes and allows for character transpositions. The algorithm considers
 * matching characters within a search window and applies a bonus for common
 * prefixes up to 4 characters.
 *
 * @param a - First value to compare
 * @param b - Second value to compare
 * @param options - Comparison options
 * @returns Similarity score from 0 to 1
 *
 * @example
 * ```typescript
 * jaroWinkler('MARTHA', 'MARTHA')                    // 1.0 (identical)
 * jaroWinkler('abce', 'abcd', { prefixScale: 0.2 })  // ~0.933
 * jaroWinkler('john', 'jim')                         // 0.575
 * ```
 */
export function jaroWinkler(
  a: unknown,
  b: unknown,
  options: JaroWinklerOptions = {}
): number {
  const { prefixScale = 0.1, maxPrefixLength = 4 } = options

  const strA = prepare(a, options)
  const strB = prepare(b, options)

  // Handle empty strings
  if (strA.length === 0 && strB.length === 0) return 1
  if (strA.length === 0 || strB.length === 0) return 0

  // Handle identical strings
  if (strA === strB) return 1

  const jaro = calculateJaro(strA, strB)

  // Calculate common prefix length (up to maxPrefixLength)
  let prefixLength = 0
  for (let i = 0; i < Math.min(strA.length, strB.length, maxPrefixLength); i++) {
    if (strA[i] === strB[i]) {
      prefixLength++
    } else {
      break
    }
  }

  // Apply Winkler prefix bonus
  return jaro + prefixLength * prefixScale * (1 - jaro)
}

/**
 * Calculates base Jaro similarity between two strings.
 * @internal
 */
function calculateJaro(strA: string, strB: string): number {
  const lenA = strA.length
  const lenB = strB.length

  // Calculate matching window: max(len(a), len(b)) / 2 - 1
  const matchWindow = Math.floor(Math.max(lenA, lenB) / 2) - 1
  if (matchWindow < 0) return 0

  // Track which characters have been matched
  const matchedA = new Array<boolean>(lenA).fill(false)
  const matchedB = new Array<boolean>(lenB).fill(false)

  let matches = 0
  let transpositions = 0

  // Find matching characters within the window
  for (let i = 0; i < lenA; i++) {
    const start = Math.max(0, i - matchWindow)
    const end = Math.min(i + matchWindow + 1, lenB)

    for (let j = start; j < end; j++) {
      if (!matchedB[j] && strA[i] === strB[j]) {
        matchedA[i] = true
        matchedB[j] = true
        matches++
        break
      }
    }
  }

  if (matches === 0) return 0

  // Count transpositions
  let k = 0
  for (let i = 0; i < lenA; i++) {
    if (matchedA[i]) {
      while (!matchedB[k]) k++
      if (strA[i] !== strB[k]) transpositions++
      k++
    }
  }

  // Jaro = (m/|a| + m/|b| + (m-t/2)/m) / 3
  return (
    (matches / lenA + matches / lenB + (matches - transpositions / 2) / matches) /
    3
  )
}

/**
 * Encodes a name into its Soundex code.
 *
 * Soundex is a phonetic algorithm that encodes names by sound, grouping
 * similar-sounding names together. The algorithm produces a 4-character
 * code consisting of a letter followed by three digits.
 *
 * @param name - The name to encode
 * @returns 4-character Soundex code, or '' when the name has no letters
 *
 * @example
 * ```typescript
 * soundexEncode('Robert')   // 'R163'
 * soundexEncode('Rupert')   // 'R163'
 * soundexEncode('Smith')    // 'S530'
 * ```
 */
export function soundexEncode(name: string): string {
  if (!name) return ''

  // Normalize: uppercase and keep only alphabetic characters
  const normalized = foldDiacritics(name).toUpperCase().replace(/[^A-Z]/g, '')
  if (normalized.length === 0) return ''

  const firstLetter = normalized[0]

  const soundexMap: Record<string, string> = {
    B: '1',
    F: '1',
    P: '1',
    V: '1',
    C: '2',
    G: '2',
    J: '2',
    K: '2',
    Q: '2',
    S: '2',
    X: '2',
    Z: '2',
    D: '3',
    T: '3',
    L: '4',
    M: '5',
    N: '5',
    R: '6',
  }

  let code = firstLetter
  let prevDigit = soundexMap[firstLetter] || ''

  for (let i = 1; i < normalized.length; i++) {
    const char = normalized[i]
    const digit = soundexMap[char]

    if (digit) {
      if (digit !== prevDigit) {
        code += digit
      }
      prevDigit = digit
    } else {
      // Vowels and h, w, y break the sequence
      prevDigit = ''
    }

    if (code.length >= 4) break
  }

  // Pad with zeros or truncate to 4 characters
  return (code + '000').substring(0, 4)
}
