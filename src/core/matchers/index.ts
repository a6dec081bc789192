export type { MatchContext, PassReport, DuplicateMatcher } from './types'
export { ExactKeyMatcher } from './exact-key-matcher'
export {
  GroupKeyMatcher,
  GROUP_KEY_SEPARATOR,
  type GroupKeyMatcherOptions,
} from './group-key-matcher'
export {
  FuzzyMatcher,
  DEFAULT_FUZZY_CONFIG,
  resolveFuzzyConfig,
  type FuzzyComparison,
} from './fuzzy-matcher'
