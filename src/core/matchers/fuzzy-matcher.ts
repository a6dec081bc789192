import type { FuzzyMatchConfig } from '../../types/config'
import type { FieldMapping, SourceRecord } from '../../types/record'
import { RecordBatch } from '../batch'
import type { Claim } from '../claim-ledger'
import {
  quickRatio,
  realQuickRatio,
  similarity,
  type SimilarityScorer,
} from '../comparators'
import type { DuplicateMatcher, MatchContext, PassReport } from './types'
import { requireInRange, requireNonEmptyString } from '../../utils/errors'

/**
 * Default fuzzy matching configuration.
 */
export const DEFAULT_FUZZY_CONFIG: FuzzyMatchConfig = {
  titleField: 'title',
  authorField: 'author',
  titleThreshold: 0.95,
  authorThreshold: 0.8,
  prefilter: true,
}

/**
 * Outcome of comparing two records.
 */
export interface FuzzyComparison {
  titleSimilarity: number
  /** Only computed when the title similarity passed its threshold */
  authorSimilarity?: number
  isMatch: boolean
}

/**
 * Validates a partial fuzzy configuration and fills in defaults.
 */
export function resolveFuzzyConfig(
  config: Partial<FuzzyMatchConfig> = {}
): FuzzyMatchConfig {
  const resolved: FuzzyMatchConfig = {
    titleField: config.titleField ?? DEFAULT_FUZZY_CONFIG.titleField,
    authorField: config.authorField ?? DEFAULT_FUZZY_CONFIG.authorField,
    titleThreshold: config.titleThreshold ?? DEFAULT_FUZZY_CONFIG.titleThreshold,
    authorThreshold: config.authorThreshold ?? DEFAULT_FUZZY_CONFIG.authorThreshold,
    prefilter: config.prefilter ?? DEFAULT_FUZZY_CONFIG.prefilter,
  }
  requireNonEmptyString(resolved.titleField, 'fuzzy.titleField')
  requireNonEmptyString(resolved.authorField, 'fuzzy.authorField')
  requireInRange(resolved.titleThreshold, 0, 1, 'fuzzy.titleThreshold')
  requireInRange(resolved.authorThreshold, 0, 1, 'fuzzy.authorThreshold')
  return resolved
}

/**
 * Flags records whose titles and authors are both similar enough.
 *
 * Title similarity must exceed `titleThreshold`; only then is author
 * similarity computed, and it must exceed `authorThreshold` too. Records are
 * visited in batch order: every unclaimed record is compared with each later
 * claimable record, and a match claims the later one for good. Matches are not
 * merged transitively.
 *
 * With `prefilter` on, a pair whose title similarity cannot exceed the
 * threshold by the length bound or the shared-character bound is rejected
 * before the full comparison. Both are upper bounds of the Ratcliff/Obershelp
 * ratio only, so the prefilter is applied with the default scorer alone and
 * never changes an outcome.
 */
export class FuzzyMatcher implements DuplicateMatcher {
  readonly method = 'fuzzy' as const
  readonly config: FuzzyMatchConfig
  private readonly scorer: SimilarityScorer
  /** Whether `run` rejects pairs by the upper bounds */
  readonly prefilterActive: boolean

  constructor(
    config: Partial<FuzzyMatchConfig> = {},
    scorer: SimilarityScorer = similarity
  ) {
    this.config = resolveFuzzyConfig(config)
    this.scorer = scorer
    this.prefilterActive = this.config.prefilter && scorer === similarity
  }

  run({ batch, ledger }: MatchContext): PassReport {
    const claims: Claim[] = []
    let comparisonsMade = 0
    let comparisonsSkipped = 0

    for (let i = 0; i < batch.size; i++) {
      if (ledger.isClaimed(i)) continue

      for (let j = i + 1; j < batch.size; j++) {
        if (!ledger.isClaimable(j)) continue

        if (this.prefilterActive && !this.titleMayMatch(batch, i, j)) {
          comparisonsSkipped++
          continue
        }

        comparisonsMade++
        if (this.comparePair(batch, i, j).isMatch) {
          claims.push(ledger.claim(j, i, this.method))
        }
      }
    }

    return { method: this.method, claims, comparisonsMade, comparisonsSkipped }
  }

  /**
   * Compares two records of a batch by title, then author.
   */
  comparePair(batch: RecordBatch, i: number, j: number): FuzzyComparison {
    const { titleField, authorField, titleThreshold, authorThreshold } = this.config

    const titleSimilarity = this.scorer(
      batch.text(i, titleField),
      batch.text(j, titleField)
    )
    if (!(titleSimilarity > titleThreshold)) {
      return { titleSimilarity, isMatch: false }
    }

    const authorSimilarity = this.scorer(
      batch.text(i, authorField),
      batch.text(j, authorField)
    )
    return {
      titleSimilarity,
      authorSimilarity,
      isMatch: authorSimilarity > authorThreshold,
    }
  }

  /**
   * Compares two standalone records.
   *
   * @example
   * ```typescript
   * const matcher = new FuzzyMatcher()
   * matcher.compareRecords(left, right).isMatch
   * ```
   */
  compareRecords(
    left: SourceRecord,
    right: SourceRecord,
    fieldMapping?: FieldMapping
  ): FuzzyComparison {
    return this.comparePair(new RecordBatch([left, right], fieldMapping), 0, 1)
  }

  private titleMayMatch(batch: RecordBatch, i: number, j: number): boolean {
    const { titleField, titleThreshold } = this.config
    const left = batch.text(i, titleField)
    const right = batch.text(j, titleField)
    return (
      realQuickRatio(left, right) > titleThreshold &&
      quickRatio(left, right) > titleThreshold
    )
  }
}
