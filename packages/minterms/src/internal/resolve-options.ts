import type {
  ClassifierOptions,
  Mutable,
  ResolvedClassifierOptions,
} from '../types'

export const CLASSIFIER_DEFAULTS: ResolvedClassifierOptions = {
  validation: 'strict',
  diagnostics: null,
  clock: () => Date.now(),
}

export const resolveClassifierOptions = (
  options: ClassifierOptions = {},
): ResolvedClassifierOptions => {
  const resolved: Mutable<ResolvedClassifierOptions> = { ...CLASSIFIER_DEFAULTS }

  if (options.validation !== undefined) {
    resolved.validation = options.validation
  }
  if (options.diagnostics !== undefined) {
    resolved.diagnostics = options.diagnostics
  }
  if (options.clock !== undefined) {
    resolved.clock = options.clock
  }

  return resolved
}
