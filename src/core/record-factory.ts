import type {
  FieldMapping,
  FieldValue,
  RecordProvenance,
  SourceRecord,
} from '../types/record'

/**
 * Options for {@link createRecord}.
 */
export interface CreateRecordOptions extends RecordProvenance {
  fieldMapping?: FieldMapping
}

/**
 * Creates an immutable record from parsed field values.
 * The field object is copied, so later changes by the parser do not leak in.
 *
 * @example
 * ```typescript
 * const entry = createRecord(
 *   { title: 'Web Testing Survey', author: 'Doe, J.', doi: '10.1/X' },
 *   { sourceId: 'refs/acm.bib', originIndex: 0 }
 * )
 * ```
 */
export function createRecord(
  fields: { [field: string]: FieldValue },
  options: CreateRecordOptions
): SourceRecord {
  const record: SourceRecord = {
    fields: Object.freeze({ ...fields }),
    sourceId: options.sourceId,
    originIndex: options.originIndex,
    ...(options.fieldMapping && {
      fieldMapping: Object.freeze({ ...options.fieldMapping }),
    }),
  }
  return Object.freeze(record)
}

/**
 * Creates records for every row parsed from one source, numbering them by position.
 */
export function createRecords(
  rows: Array<{ [field: string]: FieldValue }>,
  sourceId: string,
  fieldMapping?: FieldMapping
): SourceRecord[] {
  return rows.map((fields, originIndex) =>
    createRecord(fields, { sourceId, originIndex, fieldMapping })
  )
}
