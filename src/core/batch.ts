import type { FieldMapping, FieldValue, SourceRecord } from '../types/record'
import { getFieldValue, hasField } from './field-mapping'
import { normalizeIdentifier, normalizeText } from './normalizers/text'

/**
 * An indexed view over one detection run's input.
 *
 * Records are addressed by their position in the batch. Normalized values are
 * computed on demand and cached per record and field for the life of the batch.
 */
export class RecordBatch {
  private readonly textCache: Array<Map<string, string>>
  private readonly identifierCache: Array<Map<string, string>>

  constructor(
    readonly records: readonly SourceRecord[],
    private readonly fieldMapping?: FieldMapping
  ) {
    this.textCache = records.map(() => new Map())
    this.identifierCache = records.map(() => new Map())
  }

  get size(): number {
    return this.records.length
  }

  record(index: number): SourceRecord {
    return this.records[index]
  }

  /**
   * Raw value of a logical field, `undefined` when the record lacks it.
   */
  value(index: number, field: string): FieldValue {
    return getFieldValue(this.records[index], field, this.fieldMapping)
  }

  has(index: number, field: string): boolean {
    return hasField(this.records[index], field, this.fieldMapping)
  }

  /**
   * Field value after full text normalization.
   */
  text(index: number, field: string): string {
    return this.cached(this.textCache, index, field, normalizeText)
  }

  /**
   * Field value after identifier normalization.
   */
  identifier(index: number, field: string): string {
    return this.cached(this.identifierCache, index, field, normalizeIdentifier)
  }

  private cached(
    cache: Array<Map<string, string>>,
    index: number,
    field: string,
    normalize: (value: unknown) => string
  ): string {
    const fields = cache[index]
    let normalized = fields.get(field)
    if (normalized === undefined) {
      normalized = normalize(this.value(index, field))
      fields.set(field, normalized)
    }
    return normalized
  }
}
