export type {
  FieldValue,
  RecordFields,
  FieldMapping,
  RecordProvenance,
  SourceRecord,
} from './record'

export type {
  MatchMethod,
  DuplicateGroup,
  Partition,
  DetectionStats,
  DetectionResult,
} from './partition'

export type {
  IncompleteKeyPolicy,
  ExactKeyStrategyConfig,
  GroupKeyStrategyConfig,
  KeyStrategyConfig,
  FuzzyMatchConfig,
  DetectorConfig,
  DetectorOptions,
} from './config'
