import type { DiagnosticRecord, ResolvedClassifierOptions } from '../types'

export const emitDiagnostic = (
  options: ResolvedClassifierOptions,
  level: DiagnosticRecord['level'],
  code: string,
  message: string,
  detail?: unknown,
): void => {
  const sink = options.diagnostics
  if (!sink) return
  const record: DiagnosticRecord =
    detail === undefined
      ? { timestamp: options.clock(), level, code, message }
      : { timestamp: options.clock(), level, code, message, detail }
  sink.onRecord(record)
}
