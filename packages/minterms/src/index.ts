/** biome-ignore-all lint/performance/noBarrelFile: Library */

export { MintermClassifier } from './classifier'

export {
  ClassifierContractError,
  ClassifierError,
  ClassifierRangeError,
} from './errors'

export { normalizeRanges, assertRangesValid } from './internal/ranges'
export { CLASSIFIER_DEFAULTS } from './internal/resolve-options'

export type {
  CharRange,
  ClassifierOptions,
  DiagnosticRecord,
  DiagnosticsSink,
  LookupTable,
  RangeConverter,
  ResolvedClassifierOptions,
  ValidationMode,
} from './types'
