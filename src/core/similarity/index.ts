export type {
  SimilarityFunction,
  SimilarityCallback,
  Similarity,
} from './types'
export { computeSimilarity } from './types'
export { StringSimilarity, JaroWinklerSimilarity } from './string-similarity'
export { DateSimilarity } from './date-similarity'
export {
  AbsoluteNumericalSimilarity,
  RelativeNumericalSimilarity,
} from './numeric-similarity'
export { PhoneSimilarity } from './phone-similarity'
export type { PhoneSimilarityOptions } from './phone-similarity'
