import type { MatchMethod } from '../../types/partition'
import type { Logger } from '../../utils/logger'
import type { RecordBatch } from '../batch'
import type { Claim, ClaimLedger } from '../claim-ledger'

/**
 * State shared by the passes of one detection run.
 */
export interface MatchContext {
  batch: RecordBatch
  ledger: ClaimLedger
  logger: Logger
}

/**
 * What a pass did.
 */
export interface PassReport {
  method: MatchMethod
  /** Claims made by this pass, in claim order */
  claims: Claim[]
  /** Pairwise comparisons made (zero for key-based passes) */
  comparisonsMade: number
  /** Pairs rejected without a full comparison */
  comparisonsSkipped: number
}

/**
 * A detection pass. Passes only claim records the ledger still allows them to.
 */
export interface DuplicateMatcher {
  readonly method: MatchMethod
  run(context: MatchContext): PassReport
}
