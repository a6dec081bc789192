// Main entry point
export {
  Dedup,
  DetectorBuilder,
  FuzzyMatchBuilder,
} from './builder/detector-builder'

// Core classes
export { DuplicateDetector, DEFAULT_REPORT_FIELDS } from './core/detector'
export { RecordBatch } from './core/batch'
export { ClaimLedger, type Claim } from './core/claim-ledger'

// Matchers
export {
  ExactKeyMatcher,
  GroupKeyMatcher,
  GROUP_KEY_SEPARATOR,
  type GroupKeyMatcherOptions,
  FuzzyMatcher,
  DEFAULT_FUZZY_CONFIG,
  resolveFuzzyConfig,
  type FuzzyComparison,
  type MatchContext,
  type PassReport,
  type DuplicateMatcher,
} from './core/matchers'

// Comparators
export {
  similarity,
  quickRatio,
  realQuickRatio,
  matchingBlocks,
  type MatchingBlock,
  type SimilarityScorer,
} from './core/comparators'

// Normalizers
export { normalizeText, normalizeIdentifier } from './core/normalizers/text'

// Records and field mappings
export {
  createRecord,
  createRecords,
  type CreateRecordOptions,
} from './core/record-factory'
export {
  FieldMappings,
  LogicalFields,
  resolveFieldName,
  getFieldValue,
  hasField,
} from './core/field-mapping'

// Log sinks
export {
  LoggerLogSink,
  MemoryLogSink,
  describeDuplicate,
  type DuplicateLogSink,
  type DuplicateLogEntry,
  type LoggedRecord,
} from './core/log-sink'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  createGuardedLogger,
  type LogLevel,
  type Logger,
} from './utils/logger'

// Errors
export {
  DedupError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  BuilderSequenceError,
  LogSinkError,
  type LogSinkStage,
  isDedupError,
} from './utils/errors'

// Types
export type {
  FieldValue,
  RecordFields,
  FieldMapping,
  RecordProvenance,
  SourceRecord,
  MatchMethod,
  DuplicateGroup,
  Partition,
  DetectionStats,
  DetectionResult,
  IncompleteKeyPolicy,
  ExactKeyStrategyConfig,
  GroupKeyStrategyConfig,
  KeyStrategyConfig,
  FuzzyMatchConfig,
  DetectorConfig,
  DetectorOptions,
} from './types'
