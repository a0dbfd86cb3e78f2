export { descriptionKey, NOISE_TOKENS } from './description-key.js';
export { longestCommonSubstring, keySimilarity, type KeySimilarity } from './similarity.js';
export {
  buildCategoryRules,
  findCategoryConflicts,
  toReferenceTable,
  compareRecency,
  REFERENCE_COLUMNS,
  type CategoryConflict,
  type ReferenceRow,
} from './rules.js';
export {
  HistoryCategorizer,
  categorize,
  categorizeWithDetails,
  type CategorizerOptions,
  type CategorizationOutcome,
  type CategoryMatch,
  type MatchKind,
} from './categorizer.js';
