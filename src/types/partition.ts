import type { SourceRecord } from './record'
import type { LogSinkError } from '../utils/errors'

/**
 * The pass that detected a duplicate.
 */
export type MatchMethod = 'exact-key' | 'group-key' | 'fuzzy'

/**
 * An original record and every record found to duplicate it by one method.
 */
export interface DuplicateGroup {
  /** The first-seen record of the equivalence class */
  original: SourceRecord
  /** Duplicates in the order they were claimed */
  duplicates: SourceRecord[]
  /** Which pass found them */
  method: MatchMethod
}

/**
 * Engine output: every input record appears exactly once, either in `unique`
 * or as a duplicate in one of the groups.
 */
export interface Partition {
  /** One record per equivalence class, in first-seen order */
  unique: SourceRecord[]
  /** Detected duplicate groups, pass by pass */
  duplicates: DuplicateGroup[]
}

/**
 * Statistics from a detection run.
 */
export interface DetectionStats {
  /** Total number of records processed */
  recordsProcessed: number
  /** Number of records left in the unique set */
  uniqueRecords: number
  /** Number of records claimed as duplicates */
  duplicatesFound: number
  /** Duplicates found per method */
  duplicatesByMethod: { [method in MatchMethod]: number }
  /** Title comparisons made by the fuzzy pass */
  comparisonsMade: number
  /** Pairs rejected by the fuzzy prefilter without a full comparison */
  comparisonsSkipped: number
}

/**
 * Complete result of one detection run.
 */
export interface DetectionResult {
  /** Identifier of the run, passed to the log sink when it is opened */
  runId: string
  partition: Partition
  stats: DetectionStats
  /** Log sink and logger failures; reported here, never thrown */
  sinkFailures: LogSinkError[]
}
