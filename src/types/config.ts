import type { FieldMapping } from './record'
import type { Logger } from '../utils/logger'
import type { DuplicateLogSink } from '../core/log-sink'

/**
 * How group-key matching treats records with empty key segments.
 * - `group`: empty segments take part in the key, so records missing the same
 *   fields can become key-equal
 * - `skip`: records with any empty segment are left out of the pass
 */
export type IncompleteKeyPolicy = 'group' | 'skip'

/**
 * First-pass strategy matching on a single identifier field.
 */
export interface ExactKeyStrategyConfig {
  type: 'exact-key'
  /** Logical or raw name of the identifier field */
  field: string
}

/**
 * First-pass strategy matching on a composite key of several fields.
 */
export interface GroupKeyStrategyConfig {
  type: 'group-key'
  /** Ordered logical or raw field names forming the key */
  fields: string[]
  /** Default: 'group' */
  incompleteKeys?: IncompleteKeyPolicy
}

/**
 * The mutually exclusive first-pass strategies.
 */
export type KeyStrategyConfig = ExactKeyStrategyConfig | GroupKeyStrategyConfig

/**
 * Configuration for title/author fuzzy matching.
 */
export interface FuzzyMatchConfig {
  /** Default: 'title' */
  titleField: string
  /** Default: 'author' */
  authorField: string
  /** Title similarity must be strictly greater (default: 0.95) */
  titleThreshold: number
  /** Author similarity must be strictly greater (default: 0.8) */
  authorThreshold: number
  /** Reject pairs by cheap upper bounds before the full comparison (default: true) */
  prefilter: boolean
}

/**
 * Complete detector configuration.
 */
export interface DetectorConfig {
  /** First pass */
  strategy: KeyStrategyConfig
  /** Second pass, or `false` to run the first pass only */
  fuzzy: FuzzyMatchConfig | false
  /** Default logical-to-source field mapping for records that carry none */
  fieldMapping?: FieldMapping
  /** Fields copied into log sink entries (default: title, author, year, identifier) */
  reportFields?: string[]
  /** Default: silent */
  logger?: Logger
  /** Receives one entry per detected duplicate */
  logSink?: DuplicateLogSink
}

/**
 * Configuration accepted by the detector constructor, with fuzzy defaults filled in.
 */
export interface DetectorOptions extends Omit<DetectorConfig, 'fuzzy'> {
  fuzzy?: Partial<FuzzyMatchConfig> | false
}
