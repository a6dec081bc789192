import type { MatchMethod } from '../types/partition'
import type { FieldValue } from '../types/record'
import type { Logger } from '../utils/logger'
import { DedupError } from '../utils/errors'

/**
 * A record as it appears in a duplicate log entry.
 */
export interface LoggedRecord {
  sourceId: string
  originIndex: number
  /** Selected field values, keyed by logical field name */
  fields: { [field: string]: FieldValue }
}

/**
 * One detected duplicate, as handed to a log sink.
 */
export interface DuplicateLogEntry {
  runId: string
  method: MatchMethod
  original: LoggedRecord
  duplicate: LoggedRecord
}

/**
 * Receives detected duplicates for reporting.
 *
 * The detector opens the sink before a run, records each duplicate exactly once
 * and closes it afterwards. Any of the three may throw; the detector reports
 * the failure and carries on.
 */
export interface DuplicateLogSink {
  open(runId: string): void
  record(entry: DuplicateLogEntry): void
  close(): void
}

const METHOD_LABELS: { [method in MatchMethod]: string } = {
  'exact-key': 'identifier match',
  'group-key': 'composite key match',
  fuzzy: 'title/author similarity',
}

/**
 * Renders an entry as a multi-line human readable description.
 *
 * @example
 * ```
 * Duplicate found by identifier match:
 *   Original entry from: refs/acm.bib #0
 *   title: Web Testing Survey
 *   ...
 *   Duplicate entry from: refs/ieee.bib #3
 * ```
 */
export function describeDuplicate(entry: DuplicateLogEntry): string {
  const lines = [
    `Duplicate found by ${METHOD_LABELS[entry.method]}:`,
    `  Original entry from: ${entry.original.sourceId} #${entry.original.originIndex}`,
    ...Object.entries(entry.original.fields).map(
      ([field, value]) => `  ${field}: ${value == null || value === '' ? 'Unknown' : value}`
    ),
    `  Duplicate entry from: ${entry.duplicate.sourceId} #${entry.duplicate.originIndex}`,
  ]
  return lines.join('\n')
}

/**
 * Writes each duplicate through a {@link Logger} at info level.
 */
export class LoggerLogSink implements DuplicateLogSink {
  private runId?: string
  private recorded = 0

  constructor(private readonly logger: Logger) {}

  open(runId: string): void {
    this.runId = runId
    this.recorded = 0
  }

  record(entry: DuplicateLogEntry): void {
    this.recorded++
    this.logger.info(describeDuplicate(entry), { runId: entry.runId })
  }

  close(): void {
    this.logger.debug(`Logged ${this.recorded} duplicates`, { runId: this.runId })
    this.runId = undefined
  }
}

/**
 * Keeps entries in memory, one list per opened run.
 */
export class MemoryLogSink implements DuplicateLogSink {
  private readonly runs = new Map<string, DuplicateLogEntry[]>()
  private current?: DuplicateLogEntry[]

  open(runId: string): void {
    this.current = []
    this.runs.set(runId, this.current)
  }

  record(entry: DuplicateLogEntry): void {
    if (!this.current) {
      throw new DedupError('MemoryLogSink.record called before open', 'SINK_NOT_OPEN')
    }
    this.current.push(entry)
  }

  close(): void {
    this.current = undefined
  }

  /**
   * Entries of one run, or of every run in open order.
   */
  getEntries(runId?: string): DuplicateLogEntry[] {
    if (runId !== undefined) {
      return [...(this.runs.get(runId) ?? [])]
    }
    return [...this.runs.values()].flat()
  }

  clear(): void {
    this.runs.clear()
    this.current = undefined
  }
}
