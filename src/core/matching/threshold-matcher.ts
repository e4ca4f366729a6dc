import type {
  Cluster,
  ClusterReportRow,
  MatchDecision,
  MatchStats,
  PairReportRow,
  QueryOptions,
  SampleReportRow,
  ScoredPair,
} from '../../types/match'
import type { MatchMode, Row, RowKey, TableSide } from '../../types/table'
import { ConfigurationError, requireInRange } from '../../utils/errors'
import type { Logger } from '../../utils/logger'
import {
  consoleLogger,
  createPrefixedLogger,
  createSilentLogger,
} from '../../utils/logger'
import { buildClusters } from '../clustering/cluster-builder'
import type { FilterInput } from '../filters/types'
import { applyFilter } from '../filters/types'
import { CrossPairGenerator } from '../pairing/cross-pair-generator'
import { DedupPairGenerator } from '../pairing/dedup-pair-generator'
import type { PairGenerator } from '../pairing/types'
import type { Scorer } from '../scoring/types'
import { toScorer } from '../scoring/to-scorer'
import type { Table } from '../table'
import { IdentityVariator } from '../variators/identity-variator'
import type { Variator } from '../variators/types'
import { MatcherBuilder } from '../../builder/matcher-builder'
import { reduceOneToOne } from './one-to-one'
import { PairCollection } from './pair-collection'
import { resolveQueryOptions, sampleBoundaries } from './query-options'
import type { MatcherConfig } from './types'

/**
 * Scores every candidate pair once, at construction, and answers score-range
 * queries over the result.
 *
 * With two tables the matcher cross-matches them and keeps at most one pair
 * per row of each table (greedy, best score first). With one table it
 * deduplicates: every pair is kept and related rows are grouped into
 * clusters.
 *
 * @example
 * ```typescript
 * const matcher = new Matcher({
 *   index: new FieldIndex({ fields: 'lastName', transforms: ['soundex'] }),
 *   scorer: {
 *     lastName: new JaroWinklerSimilarity(),
 *     firstName: new JaroWinklerSimilarity(),
 *   },
 *   left: people,
 * })
 *
 * for (const cluster of matcher.getClusters({ lowerBound: 0.8 })) {
 *   console.log(cluster.members, cluster.topScore)
 * }
 * ```
 */
export class Matcher {
  readonly mode: MatchMode
  readonly left: Table
  readonly right: Table
  private readonly scorer: Scorer
  private readonly variator: Variator
  private readonly filters: readonly FilterInput[]
  private readonly logger: Logger
  private readonly decisionLogger: Logger
  private readonly collection: PairCollection
  private readonly counters: MatchStats

  constructor(config: MatcherConfig) {
    const generator: PairGenerator = config.right
      ? new CrossPairGenerator(config.left, config.right, config.index)
      : new DedupPairGenerator(config.left, config.index)

    this.mode = generator.mode
    this.left = generator.left
    this.right = generator.right
    this.scorer = toScorer(config.scorer)
    this.variator = config.variator ?? new IdentityVariator()
    this.filters = config.filters ?? []
    this.logger = createPrefixedLogger(
      'matcher',
      config.logger ?? createSilentLogger()
    )
    this.decisionLogger = createPrefixedLogger(
      'matcher',
      config.logger ?? consoleLogger
    )

    let candidatePairs = 0
    let filteredPairs = 0
    const scoredPairs: ScoredPair[] = []

    for (const { left, right } of generator.pairs()) {
      candidatePairs++
      if (!this.filters.every((filter) => applyFilter(filter, left, right))) {
        filteredPairs++
        continue
      }
      scoredPairs.push({
        score: this.scorePair(left, right),
        left: left.key,
        right: right.key,
      })
    }

    this.logger.debug('Generated candidate pairs', {
      index: config.index.name,
      candidatePairs,
    })
    this.logger.debug('Filtered candidate pairs', { filteredPairs })
    this.logger.debug('Scored pairs', {
      scorer: this.scorer.name,
      scoredPairs: scoredPairs.length,
    })

    let collection = new PairCollection(scoredPairs)
    if (this.mode === 'match') {
      collection = new PairCollection(reduceOneToOne(collection.pairs), true)
      this.logger.debug('Reduced pairs to one-to-one matches', {
        removedPairs: scoredPairs.length - collection.size,
      })
    }
    this.collection = collection

    this.counters = {
      mode: this.mode,
      candidatePairs,
      filteredPairs,
      scoredPairs: scoredPairs.length,
      keptPairs: collection.size,
    }
  }

  /**
   * Starts a fluent {@link MatcherBuilder}.
   */
  static builder(): MatcherBuilder {
    return new MatcherBuilder()
  }

  /**
   * Counters collected while scoring.
   */
  get stats(): MatchStats {
    return { ...this.counters }
  }

  /**
   * Returns the pairs scoring within `[lowerBound, upperBound]`, lowest score first.
   */
  getPairs(options?: Partial<QueryOptions>): ScoredPair[] {
    const resolved = resolveQueryOptions(options)
    return this.excludeExact(
      this.collection.between(resolved.lowerBound, resolved.upperBound),
      resolved
    )
  }

  /**
   * Groups the pairs scoring within `[lowerBound, upperBound]` into clusters
   * whose members are all linked to each other. Clusters come highest top
   * score first. Without `includeExactMatches`, clusters made only of pairs
   * scoring exactly 1 are dropped.
   */
  getClusters(options?: Partial<QueryOptions>): Cluster[] {
    const resolved = resolveQueryOptions(options)
    const { components, clusters } = buildClusters(
      this.collection.between(resolved.lowerBound, resolved.upperBound),
      this.mode
    )
    this.logger.debug('Built clusters', {
      lowerBound: resolved.lowerBound,
      upperBound: resolved.upperBound,
      components,
      clusters: clusters.length,
    })

    if (resolved.includeExactMatches) {
      return clusters
    }
    return clusters.filter(
      (cluster) => !cluster.pairs.every((pair) => pair.score === 1)
    )
  }

  /**
   * Returns the row keys of each cluster from {@link getClusters}.
   */
  getClusterKeys(options?: Partial<QueryOptions>): RowKey[][] {
    return this.getClusters(options).map((cluster) =>
      cluster.members.map((member) => member.key)
    )
  }

  /**
   * Flattens {@link getClusters} into report rows: two rows per pair, one for
   * each member, carrying the member's field values.
   */
  clusterReport(options?: Partial<QueryOptions>): ClusterReportRow[] {
    const rows: ClusterReportRow[] = []
    this.getClusters(options).forEach((cluster, clusterIndex) => {
      cluster.pairs.forEach((pair, pairIndex) => {
        for (const row of this.reportRows(pair, pairIndex)) {
          rows.push({ clusterIndex, ...row })
        }
      })
    })
    return rows
  }

  /**
   * Report rows for every pair within `[lowerBound, upperBound]`, highest score first.
   * Exact matches are left out before numbering, so `pairIndex` has no gaps
   * when `includeExactMatches` is false.
   */
  pairReport(options?: Partial<QueryOptions>): PairReportRow[] {
    return this.getPairs(options)
      .reverse()
      .flatMap((pair, pairIndex) => this.reportRows(pair, pairIndex))
  }

  /**
   * Samples pairs from each score range of width `step`, walking down from
   * `upperBound` to `lowerBound`. A range `upper-lower` holds the scores in
   * `(lower, upper]`; up to `sampleCount` of its lowest-scoring pairs are
   * reported, highest first. Exact matches are left out before the sample is
   * taken, so a range still yields `sampleCount` pairs when it has enough
   * inexact ones.
   */
  sampleReport(options?: Partial<QueryOptions>): SampleReportRow[] {
    const resolved = resolveQueryOptions(options)
    const boundaries = sampleBoundaries(resolved)
    const rows: SampleReportRow[] = []

    for (let i = 0; i < boundaries.length - 1; i++) {
      const upper = boundaries[i]
      const lower = boundaries[i + 1]
      const scoreRange = `${upper.toFixed(2)}-${lower.toFixed(2)}`
      const sample = this.excludeExact(
        this.collection.aboveUpTo(lower, upper),
        resolved
      )
        .slice(0, resolved.sampleCount)
        .reverse()

      sample.forEach((pair, pairIndex) => {
        for (const row of this.reportRows(pair, pairIndex)) {
          rows.push({ scoreRange, ...row })
        }
      })
    }

    return rows
  }

  /**
   * Summarizes how many pairs score at least `threshold`.
   */
  decision(threshold: number): MatchDecision {
    requireInRange(threshold, 0, 1, 'threshold')
    const matchedPairs = this.collection.countAtLeast(threshold)
    return {
      threshold,
      matchedPairs,
      leftPercentage: percentage(matchedPairs, this.left.size),
      rightPercentage: percentage(matchedPairs, this.right.size),
    }
  }

  /**
   * Logs {@link decision} at info level and returns it. Without a configured
   * logger the summary goes to {@link consoleLogger}.
   */
  printDecision(threshold: number): MatchDecision {
    const result = this.decision(threshold)
    this.decisionLogger.info(
      `${result.matchedPairs} pairs score at least ${threshold}`,
      { ...result }
    )
    return result
  }

  private scorePair(a: Row, b: Row): number {
    let best = -Infinity
    for (const variantA of this.variator.variants(a)) {
      for (const variantB of this.variator.variants(b)) {
        const result = this.scorer.score(variantA, variantB)
        if (result.kind === 'refusal') {
          throw new ConfigurationError(
            `Scorer '${this.scorer.name}' refused to score rows ${String(a.key)} and ${String(b.key)} (${result.reason}). Wrap absolute scorers in MaxScorer or MinScorer.`,
            'scorer',
            { left: a.key, right: b.key }
          )
        }
        if (!(result.value >= 0 && result.value <= 1)) {
          throw new ConfigurationError(
            `Scorer '${this.scorer.name}' returned ${result.value} for rows ${String(a.key)} and ${String(b.key)}; scores must lie in [0, 1]`,
            'scorer',
            { left: a.key, right: b.key, score: result.value }
          )
        }
        best = Math.max(best, result.value)
      }
    }
    if (best === -Infinity) {
      throw new ConfigurationError(
        `Variator produced no variants for rows ${String(a.key)} and ${String(b.key)}`,
        'variator'
      )
    }
    return best
  }

  private excludeExact(
    pairs: ScoredPair[],
    options: QueryOptions
  ): ScoredPair[] {
    return options.includeExactMatches
      ? pairs
      : pairs.filter((pair) => pair.score !== 1)
  }

  private reportRows(
    pair: ScoredPair,
    pairIndex: number
  ): [PairReportRow, PairReportRow] {
    const rightSide: TableSide = this.mode === 'match' ? 'right' : 'left'
    return [
      {
        pairIndex,
        score: pair.score,
        side: 'left',
        rowKey: pair.left,
        values: this.left.get(pair.left).data,
      },
      {
        pairIndex,
        score: pair.score,
        side: rightSide,
        rowKey: pair.right,
        values: this.right.get(pair.right).data,
      },
    ]
  }
}

function percentage(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0
}
