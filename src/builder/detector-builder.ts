import type {
  FuzzyMatchConfig,
  IncompleteKeyPolicy,
  KeyStrategyConfig,
} from '../types/config'
import type { FieldMapping } from '../types/record'
import type { Logger } from '../utils/logger'
import type { DuplicateLogSink } from '../core/log-sink'
import { DuplicateDetector } from '../core/detector'
import { DEFAULT_FUZZY_CONFIG } from '../core/matchers/fuzzy-matcher'
import {
  BuilderSequenceError,
  requireInRange,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireNonNull,
  requireOneOf,
} from '../utils/errors'

/**
 * Configures the title/author fuzzy pass.
 */
export class FuzzyMatchBuilder {
  private config: FuzzyMatchConfig = { ...DEFAULT_FUZZY_CONFIG }

  titleField(field: string): this {
    requireNonEmptyString(field, 'fuzzy.titleField')
    this.config.titleField = field
    return this
  }

  authorField(field: string): this {
    requireNonEmptyString(field, 'fuzzy.authorField')
    this.config.authorField = field
    return this
  }

  /**
   * Title similarity must be strictly greater than this value.
   */
  titleThreshold(threshold: number): this {
    requireInRange(threshold, 0, 1, 'fuzzy.titleThreshold')
    this.config.titleThreshold = threshold
    return this
  }

  /**
   * Author similarity must be strictly greater than this value.
   */
  authorThreshold(threshold: number): this {
    requireInRange(threshold, 0, 1, 'fuzzy.authorThreshold')
    this.config.authorThreshold = threshold
    return this
  }

  prefilter(enabled: boolean): this {
    this.config.prefilter = enabled
    return this
  }

  build(): FuzzyMatchConfig {
    return { ...this.config }
  }
}

/**
 * Fluent builder for {@link DuplicateDetector}.
 *
 * @example
 * ```typescript
 * const detector = Dedup.create()
 *   .fieldMapping(FieldMappings.springerCsv)
 *   .groupKey(['title', 'author', 'year'])
 *   .fuzzy((fuzzy) => fuzzy.titleThreshold(0.95).authorThreshold(0.8))
 *   .build()
 * ```
 */
export class DetectorBuilder {
  private strategy?: KeyStrategyConfig
  private fuzzyConfig: FuzzyMatchConfig | false = { ...DEFAULT_FUZZY_CONFIG }
  private mapping?: FieldMapping
  private fieldsToReport?: string[]
  private detectorLogger?: Logger
  private sink?: DuplicateLogSink

  /**
   * Match records sharing an identifier field.
   */
  exactKey(field: string): this {
    this.assertNoStrategy('exactKey')
    requireNonEmptyString(field, 'exactKey.field')
    this.strategy = { type: 'exact-key', field }
    return this
  }

  /**
   * Match records sharing a composite key of normalized fields.
   */
  groupKey(
    fields: string[],
    options: { incompleteKeys?: IncompleteKeyPolicy } = {}
  ): this {
    this.assertNoStrategy('groupKey')
    requireNonEmptyArray(fields, 'groupKey.fields')
    if (options.incompleteKeys !== undefined) {
      requireOneOf(options.incompleteKeys, ['group', 'skip'] as const, 'groupKey.incompleteKeys')
    }
    this.strategy = {
      type: 'group-key',
      fields: [...fields],
      incompleteKeys: options.incompleteKeys,
    }
    return this
  }

  /**
   * Configure the fuzzy pass. It runs with default thresholds unless
   * {@link withoutFuzzy} is called.
   */
  fuzzy(
    configurator: (builder: FuzzyMatchBuilder) => FuzzyMatchBuilder | void
  ): this {
    const builder = new FuzzyMatchBuilder()
    const result = configurator(builder)
    this.fuzzyConfig = (result ?? builder).build()
    return this
  }

  withoutFuzzy(): this {
    this.fuzzyConfig = false
    return this
  }

  fieldMapping(mapping: FieldMapping): this {
    this.mapping = requireNonNull(mapping, 'fieldMapping')
    return this
  }

  reportFields(fields: string[]): this {
    requireNonEmptyArray(fields, 'reportFields')
    this.fieldsToReport = [...fields]
    return this
  }

  logger(logger: Logger): this {
    this.detectorLogger = requireNonNull(logger, 'logger')
    return this
  }

  logSink(sink: DuplicateLogSink): this {
    this.sink = requireNonNull(sink, 'logSink')
    return this
  }

  /**
   * Build the configured detector.
   *
   * @throws {BuilderSequenceError} If no key strategy was configured
   */
  build(): DuplicateDetector {
    if (!this.strategy) {
      throw new BuilderSequenceError(
        'build',
        'a key strategy must be configured with exactKey() or groupKey()'
      )
    }

    return new DuplicateDetector({
      strategy: this.strategy,
      fuzzy: this.fuzzyConfig,
      fieldMapping: this.mapping,
      reportFields: this.fieldsToReport,
      logger: this.detectorLogger,
      logSink: this.sink,
    })
  }

  private assertNoStrategy(method: string): void {
    if (this.strategy) {
      throw new BuilderSequenceError(
        method,
        `a ${this.strategy.type} strategy is already configured; strategies are mutually exclusive`
      )
    }
  }
}

/**
 * Main entry point for creating a detector using the fluent builder API.
 */
export const Dedup = {
  create(): DetectorBuilder {
    return new DetectorBuilder()
  },
}
