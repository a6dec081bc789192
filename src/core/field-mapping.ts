import type { FieldMapping, FieldValue, SourceRecord } from '../types/record'

/**
 * Logical fields understood by the default configuration.
 */
export const LogicalFields = {
  title: 'title',
  author: 'author',
  identifier: 'identifier',
  year: 'year',
} as const

/**
 * Field mappings for the source formats the parsers commonly produce.
 *
 * @example
 * ```typescript
 * const record = createRecord(row, {
 *   sourceId: 'exports/springer.csv',
 *   originIndex: 0,
 *   fieldMapping: FieldMappings.springerCsv,
 * })
 * ```
 */
export const FieldMappings = {
  /** BibTeX entries as read by a bibliography parser */
  bibtex: {
    title: 'title',
    author: 'author',
    identifier: 'doi',
    year: 'year',
  },
  /** Springer Link search-result CSV exports */
  springerCsv: {
    title: 'Item Title',
    author: 'Authors',
    identifier: 'Item DOI',
    year: 'Publication Year',
  },
  /** Web of Science spreadsheet exports */
  webOfScienceXlsx: {
    title: 'Article Title',
    author: 'Authors',
    identifier: 'DOI',
    year: 'Publication Year',
  },
} as const satisfies Record<string, FieldMapping>

/**
 * Resolves a logical field name to the source field name for a record.
 * The record's own mapping wins over the detector default; unmapped names
 * are taken as raw field names.
 */
export function resolveFieldName(
  record: SourceRecord,
  field: string,
  defaultMapping?: FieldMapping
): string {
  return record.fieldMapping?.[field] ?? defaultMapping?.[field] ?? field
}

/**
 * Reads a field from a record through its mapping.
 * A missing field reads as `undefined`.
 */
export function getFieldValue(
  record: SourceRecord,
  field: string,
  defaultMapping?: FieldMapping
): FieldValue {
  const name = resolveFieldName(record, field, defaultMapping)
  return Object.prototype.hasOwnProperty.call(record.fields, name)
    ? record.fields[name]
    : undefined
}

/**
 * Returns true when the record carries the field, whatever its value.
 */
export function hasField(
  record: SourceRecord,
  field: string,
  defaultMapping?: FieldMapping
): boolean {
  const name = resolveFieldName(record, field, defaultMapping)
  return Object.prototype.hasOwnProperty.call(record.fields, name)
}
