import { v4 as uuidv4 } from 'uuid'
import type {
  DetectorConfig,
  DetectorOptions,
  KeyStrategyConfig,
} from '../types/config'
import type {
  DetectionResult,
  DetectionStats,
  DuplicateGroup,
  MatchMethod,
  Partition,
} from '../types/partition'
import type { SourceRecord } from '../types/record'
import {
  ConfigurationError,
  LogSinkError,
  type LogSinkStage,
  requireNonNull,
} from '../utils/errors'
import {
  createGuardedLogger,
  createPrefixedLogger,
  createSilentLogger,
  type Logger,
} from '../utils/logger'
import { RecordBatch } from './batch'
import { ClaimLedger } from './claim-ledger'
import { LogicalFields } from './field-mapping'
import type { DuplicateLogEntry, LoggedRecord } from './log-sink'
import { ExactKeyMatcher } from './matchers/exact-key-matcher'
import { FuzzyMatcher, resolveFuzzyConfig } from './matchers/fuzzy-matcher'
import { GroupKeyMatcher } from './matchers/group-key-matcher'
import type { DuplicateMatcher, PassReport } from './matchers/types'

/**
 * Fields copied into log entries when no report fields are configured.
 */
export const DEFAULT_REPORT_FIELDS: readonly string[] = [
  LogicalFields.title,
  LogicalFields.author,
  LogicalFields.year,
  LogicalFields.identifier,
]

/**
 * A duplicate group addressed by batch indices.
 * @internal
 */
interface IndexedGroup {
  originalIndex: number
  indices: number[]
  method: MatchMethod
}

/**
 * Partitions a batch of records into unique records and duplicate groups.
 *
 * Runs the configured key pass (exact identifier or composite key) over the
 * whole batch, then the fuzzy title/author pass over whatever the key pass
 * left unclaimed. A record's status is final the moment a pass claims it.
 *
 * Detection is synchronous and keeps no state between runs: the same input
 * and configuration always produce the same partition.
 *
 * @example
 * ```typescript
 * const detector = new DuplicateDetector({
 *   strategy: { type: 'exact-key', field: 'identifier' },
 *   fuzzy: { titleThreshold: 0.95, authorThreshold: 0.8 },
 *   fieldMapping: FieldMappings.bibtex,
 * })
 *
 * const { partition, stats } = detector.detect(records)
 * console.log(`${stats.duplicatesFound} duplicates, ${partition.unique.length} unique`)
 * ```
 */
export class DuplicateDetector {
  readonly config: DetectorConfig
  private readonly logger: Logger
  private readonly passes: DuplicateMatcher[]
  private readonly reportFields: readonly string[]

  constructor(options: DetectorOptions) {
    requireNonNull(options, 'options')
    const strategy = requireNonNull(options.strategy, 'strategy')

    this.config = {
      ...options,
      fuzzy: options.fuzzy === false ? false : resolveFuzzyConfig(options.fuzzy),
    }
    this.logger = options.logger ?? createSilentLogger()
    this.reportFields = options.reportFields ?? DEFAULT_REPORT_FIELDS

    this.passes = [this.createKeyMatcher(strategy)]
    if (this.config.fuzzy !== false) {
      this.passes.push(new FuzzyMatcher(this.config.fuzzy))
    }
  }

  /**
   * Runs every pass over the batch and reports each duplicate to the log sink.
   * Never throws for any input; failures of the log sink or of the configured
   * logger are returned in `sinkFailures`.
   *
   * @param records - The batch, in first-seen order
   * @returns Partition, statistics and sink failures of this run
   */
  detect(records: readonly SourceRecord[]): DetectionResult {
    const runId = uuidv4()
    const batch = new RecordBatch(records, this.config.fieldMapping)
    const ledger = new ClaimLedger(batch.size)
    const sinkFailures: LogSinkError[] = []
    const sink = this.config.logSink
    const logger = createGuardedLogger(this.logger, (error, level) => {
      sinkFailures.push(new LogSinkError('log', error, { runId, level }))
    })

    logger.info(`Deduplicating ${batch.size} records`, { runId })

    const opened =
      sink === undefined ||
      this.callSink('open', () => sink.open(runId), sinkFailures, logger, { runId })

    const reports: PassReport[] = this.passes.map((pass) =>
      pass.run({
        batch,
        ledger,
        logger: createPrefixedLogger(pass.method, logger),
      })
    )
    const groups = reports.flatMap((report) => this.groupClaims(report))

    for (const group of groups) {
      for (const index of group.indices) {
        const entry = this.createEntry(runId, batch, group, index)
        logger.debug(`Duplicate found by ${group.method}`, {
          runId,
          original: entry.original,
          duplicate: entry.duplicate,
        })
        if (sink && opened) {
          this.callSink('record', () => sink.record(entry), sinkFailures, logger, {
            runId,
            method: group.method,
            originalIndex: group.originalIndex,
            duplicateIndex: index,
          })
        }
      }
    }

    if (sink) {
      this.callSink('close', () => sink.close(), sinkFailures, logger, { runId })
    }

    const partition: Partition = {
      unique: ledger.unclaimedIndices().map((index) => batch.record(index)),
      duplicates: groups.map(
        (group): DuplicateGroup => ({
          original: batch.record(group.originalIndex),
          duplicates: group.indices.map((index) => batch.record(index)),
          method: group.method,
        })
      ),
    }
    const stats = this.collectStats(batch.size, partition, reports)

    logger.info(`Found and removed ${stats.duplicatesFound} duplicate entries`, {
      runId,
      ...stats.duplicatesByMethod,
    })
    logger.info(`Retained ${stats.uniqueRecords} unique entries`, { runId })

    return { runId, partition, stats, sinkFailures }
  }

  private createKeyMatcher(strategy: KeyStrategyConfig): DuplicateMatcher {
    switch (strategy.type) {
      case 'exact-key':
        return new ExactKeyMatcher(strategy.field)
      case 'group-key':
        return new GroupKeyMatcher(strategy.fields, {
          incompleteKeys: strategy.incompleteKeys,
        })
      default:
        throw new ConfigurationError(
          `Unknown key strategy: ${JSON.stringify(strategy)}`,
          'strategy.type'
        )
    }
  }

  /**
   * Groups a pass's claims by original, ordered by the original's position.
   */
  private groupClaims(report: PassReport): IndexedGroup[] {
    const byOriginal = new Map<number, IndexedGroup>()
    for (const claim of report.claims) {
      const group = byOriginal.get(claim.originalIndex)
      if (group) {
        group.indices.push(claim.index)
      } else {
        byOriginal.set(claim.originalIndex, {
          originalIndex: claim.originalIndex,
          indices: [claim.index],
          method: report.method,
        })
      }
    }
    return [...byOriginal.values()].sort(
      (a, b) => a.originalIndex - b.originalIndex
    )
  }

  private createEntry(
    runId: string,
    batch: RecordBatch,
    group: IndexedGroup,
    index: number
  ): DuplicateLogEntry {
    return {
      runId,
      method: group.method,
      original: this.describeRecord(batch, group.originalIndex),
      duplicate: this.describeRecord(batch, index),
    }
  }

  private describeRecord(batch: RecordBatch, index: number): LoggedRecord {
    const record = batch.record(index)
    const fields: LoggedRecord['fields'] = {}
    for (const field of this.reportFields) {
      fields[field] = batch.value(index, field)
    }
    return { sourceId: record.sourceId, originIndex: record.originIndex, fields }
  }

  /**
   * Invokes the sink once. A failure is logged and collected, never rethrown.
   * `logger` must be guarded so the warning itself cannot escape.
   *
   * @returns Whether the call succeeded
   */
  private callSink(
    stage: LogSinkStage,
    call: () => void,
    failures: LogSinkError[],
    logger: Logger,
    context: Record<string, unknown>
  ): boolean {
    try {
      call()
      return true
    } catch (error) {
      const failure = new LogSinkError(stage, error, context)
      failures.push(failure)
      logger.warn(failure.message, context)
      return false
    }
  }

  private collectStats(
    recordsProcessed: number,
    partition: Partition,
    reports: PassReport[]
  ): DetectionStats {
    const duplicatesByMethod: DetectionStats['duplicatesByMethod'] = {
      'exact-key': 0,
      'group-key': 0,
      fuzzy: 0,
    }
    for (const report of reports) {
      duplicatesByMethod[report.method] += report.claims.length
    }

    return {
      recordsProcessed,
      uniqueRecords: partition.unique.length,
      duplicatesFound: recordsProcessed - partition.unique.length,
      duplicatesByMethod,
      comparisonsMade: reports.reduce((sum, r) => sum + r.comparisonsMade, 0),
      comparisonsSkipped: reports.reduce((sum, r) => sum + r.comparisonsSkipped, 0),
    }
  }
}
