/**
 * A raw field value as delivered by a source parser.
 * Spreadsheet readers may hand over numbers (publication years) or nothing at all.
 */
export type FieldValue = string | number | null | undefined

/**
 * Ordered mapping from source field name to value.
 * Insertion order is the parser's column/key order, except that integer-like
 * names (a spreadsheet column headed `2020`) come first in ascending order, as
 * for any plain object.
 */
export type RecordFields = Readonly<{ [field: string]: FieldValue }>

/**
 * Maps the engine's logical field names (title, author, identifier, year, ...)
 * to the actual column or key names of a source format.
 */
export type FieldMapping = Readonly<{ [logicalField: string]: string }>

/**
 * Where a record came from.
 */
export interface RecordProvenance {
  /** Opaque origin identifier, typically the file path */
  sourceId: string
  /** Position of the record within its source */
  originIndex: number
}

/**
 * A record flowing through the detector.
 * Records are created by external parsers and are never mutated by the engine.
 */
export interface SourceRecord extends RecordProvenance {
  /** The parsed field values */
  readonly fields: RecordFields
  /** Source-specific mapping of logical fields, overriding the detector's default */
  readonly fieldMapping?: FieldMapping
}
