import type { IncompleteKeyPolicy } from '../../types/config'
import type { RecordBatch } from '../batch'
import type { Claim } from '../claim-ledger'
import type { DuplicateMatcher, MatchContext, PassReport } from './types'
import {
  requireNonEmptyArray,
  requireNonEmptyString,
  requireOneOf,
} from '../../utils/errors'

/**
 * Joins key segments. Normalized text never contains it.
 */
export const GROUP_KEY_SEPARATOR = '|'

/**
 * Options for {@link GroupKeyMatcher}.
 */
export interface GroupKeyMatcherOptions {
  /** Default: 'group' */
  incompleteKeys?: IncompleteKeyPolicy
}

/**
 * Flags records sharing a composite key of normalized field values.
 *
 * Records are grouped by key in first-seen order; the first record of each
 * group is the original and the rest are its duplicates. A missing field
 * contributes an empty segment, so under the default `'group'` policy records
 * missing the same fields can become key-equal.
 *
 * @example
 * ```typescript
 * const matcher = new GroupKeyMatcher(['title', 'author', 'year'])
 * matcher.keyOf(batch, 0) // 'web testing survey|doe j|2020'
 * ```
 */
export class GroupKeyMatcher implements DuplicateMatcher {
  readonly method = 'group-key' as const
  readonly fields: readonly string[]
  readonly incompleteKeys: IncompleteKeyPolicy

  constructor(fields: readonly string[], options: GroupKeyMatcherOptions = {}) {
    requireNonEmptyArray(fields, 'groupKey.fields')
    fields.forEach((field, i) => requireNonEmptyString(field, `groupKey.fields[${i}]`))
    this.fields = [...fields]
    this.incompleteKeys = requireOneOf(
      options.incompleteKeys ?? 'group',
      ['group', 'skip'] as const,
      'groupKey.incompleteKeys'
    )
  }

  /**
   * Composite key of the record at `index`.
   */
  keyOf(batch: RecordBatch, index: number): string {
    return this.segmentsOf(batch, index).join(GROUP_KEY_SEPARATOR)
  }

  run({ batch, ledger, logger }: MatchContext): PassReport {
    this.warnMissingFields(batch, logger)

    const groups = new Map<string, number[]>()
    for (let index = 0; index < batch.size; index++) {
      if (ledger.isClaimed(index)) continue

      const segments = this.segmentsOf(batch, index)
      if (this.incompleteKeys === 'skip' && segments.some((s) => s === '')) {
        continue
      }

      const key = segments.join(GROUP_KEY_SEPARATOR)
      const members = groups.get(key)
      if (members) {
        members.push(index)
      } else {
        groups.set(key, [index])
      }
    }

    const claims: Claim[] = []
    for (const [originalIndex, ...rest] of groups.values()) {
      for (const index of rest) {
        if (ledger.isClaimable(index)) {
          claims.push(ledger.claim(index, originalIndex, this.method))
        }
      }
    }

    return {
      method: this.method,
      claims,
      comparisonsMade: 0,
      comparisonsSkipped: 0,
    }
  }

  private segmentsOf(batch: RecordBatch, index: number): string[] {
    return this.fields.map((field) => batch.text(index, field))
  }

  private warnMissingFields(
    batch: RecordBatch,
    logger: MatchContext['logger']
  ): void {
    for (const field of this.fields) {
      let missing = 0
      for (let index = 0; index < batch.size; index++) {
        if (!batch.has(index, field)) missing++
      }
      if (missing > 0) {
        logger.warn(`Column ${field} not found in ${missing} of ${batch.size} records`, {
          field,
          missing,
        })
      }
    }
  }
}
