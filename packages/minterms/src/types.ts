/**
 * An inclusive range of UTF-16 code units, `[start, end]`.
 */
export type CharRange = readonly [start: number, end: number]

/**
 * Converts a class descriptor into its membership as sorted, ascending,
 * mutually disjoint inclusive ranges over `0..0xFFFF`.
 */
export type RangeConverter<T> = (descriptor: T) => ReadonlyArray<CharRange>

/**
 * Dense code → class ID table. The element width is picked from the number
 * of classes when the table is allocated.
 */
export type LookupTable = Uint8Array | Uint16Array | Uint32Array

/**
 * `strict` checks every supplied range before it is written into the table.
 * `trusted` skips those checks for partitions already known to be well formed.
 */
export type ValidationMode = 'strict' | 'trusted'

export interface DiagnosticsSink {
  onRecord(record: DiagnosticRecord): void
}

export interface DiagnosticRecord {
  readonly timestamp: number
  readonly level: 'debug' | 'info' | 'warn' | 'error'
  readonly code: string
  readonly message: string
  readonly detail?: unknown
}

export interface ClassifierOptions {
  readonly validation?: ValidationMode
  readonly diagnostics?: DiagnosticsSink
  readonly clock?: () => number
}

export interface ResolvedClassifierOptions {
  readonly validation: ValidationMode
  readonly diagnostics: DiagnosticsSink | null
  readonly clock: () => number
}

export type Mutable<T> = { -readonly [K in keyof T]: T[K] }
