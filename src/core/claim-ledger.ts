import type { MatchMethod } from '../types/partition'
import { DedupError } from '../utils/errors'

/**
 * A duplicate claim recorded in the ledger.
 */
export interface Claim {
  /** Index of the duplicate */
  index: number
  /** Index of the record it duplicates */
  originalIndex: number
  method: MatchMethod
}

/**
 * Tracks the terminal status of every record of one detection run by index.
 *
 * A record is claimed at most once; once claimed it takes no further part in
 * matching. Records that became originals are anchored, so a later pass may
 * still use them as originals but never claims them as duplicates.
 */
export class ClaimLedger {
  private readonly claimedBy: Int32Array
  private readonly anchored: Uint8Array
  private readonly claims: Claim[] = []

  constructor(readonly size: number) {
    this.claimedBy = new Int32Array(size).fill(-1)
    this.anchored = new Uint8Array(size)
  }

  isClaimed(index: number): boolean {
    return this.claimedBy[index] !== -1
  }

  isAnchored(index: number): boolean {
    return this.anchored[index] === 1
  }

  /**
   * Whether a record can still be claimed as a duplicate.
   */
  isClaimable(index: number): boolean {
    return !this.isClaimed(index) && !this.isAnchored(index)
  }

  /**
   * Records `index` as a duplicate of `originalIndex`.
   *
   * @throws {DedupError} If either side already has a conflicting status
   */
  claim(index: number, originalIndex: number, method: MatchMethod): Claim {
    if (!this.isClaimable(index)) {
      throw new DedupError(
        `Record at index ${index} already has a terminal status`,
        'CLAIM_CONFLICT',
        { index, originalIndex, method }
      )
    }
    if (this.isClaimed(originalIndex)) {
      throw new DedupError(
        `Record at index ${originalIndex} is a duplicate and cannot be an original`,
        'CLAIM_CONFLICT',
        { index, originalIndex, method }
      )
    }

    this.claimedBy[index] = originalIndex
    this.anchored[originalIndex] = 1
    const claim: Claim = { index, originalIndex, method }
    this.claims.push(claim)
    return claim
  }

  /**
   * Claims in the order they were made.
   */
  getClaims(): readonly Claim[] {
    return this.claims
  }

  /**
   * Indices of unclaimed records, ascending.
   */
  unclaimedIndices(): number[] {
    const indices: number[] = []
    for (let i = 0; i < this.size; i++) {
      if (!this.isClaimed(i)) indices.push(i)
    }
    return indices
  }
}
