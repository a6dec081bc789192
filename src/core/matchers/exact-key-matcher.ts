import type { Claim } from '../claim-ledger'
import type { DuplicateMatcher, MatchContext, PassReport } from './types'
import { requireNonEmptyString } from '../../utils/errors'

/**
 * Flags records sharing an identifier (a DOI, typically) as duplicates of the
 * first record seen with that identifier.
 *
 * Identifiers are lowercased and trimmed only. Records with an empty or
 * missing identifier are never matched by this pass.
 *
 * @example
 * ```typescript
 * const matcher = new ExactKeyMatcher('identifier')
 * const report = matcher.run({ batch, ledger, logger })
 * ```
 */
export class ExactKeyMatcher implements DuplicateMatcher {
  readonly method = 'exact-key' as const

  constructor(readonly field: string) {
    requireNonEmptyString(field, 'exactKey.field')
  }

  run({ batch, ledger }: MatchContext): PassReport {
    const firstSeen = new Map<string, number>()
    const claims: Claim[] = []

    for (let index = 0; index < batch.size; index++) {
      if (ledger.isClaimed(index)) continue

      const key = batch.identifier(index, this.field)
      if (key === '') continue

      const originalIndex = firstSeen.get(key)
      if (originalIndex === undefined) {
        firstSeen.set(key, index)
      } else if (ledger.isClaimable(index)) {
        claims.push(ledger.claim(index, originalIndex, this.method))
      }
    }

    return {
      method: this.method,
      claims,
      comparisonsMade: 0,
      comparisonsSkipped: 0,
    }
  }
}
