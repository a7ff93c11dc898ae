import { ClassifierContractError, ClassifierRangeError } from './errors'
import { emitDiagnostic } from './internal/diagnostics'
import {
  ASCII_TABLE_SIZE,
  CODE_UNIT_COUNT,
  MAX_CODE_UNIT,
  SHARED_ZERO_TABLE,
  allocateTable,
  fillRange,
  findAssigned,
} from './internal/lookup-table'
import { assertRangesValid, formatCode } from './internal/ranges'
import { resolveClassifierOptions } from './internal/resolve-options'
import type {
  CharRange,
  ClassifierOptions,
  LookupTable,
  RangeConverter,
  ResolvedClassifierOptions,
} from './types'

const NO_RANGES: ReadonlyArray<CharRange> = []

/**
 * Maps UTF-16 code units to the ID of the minterm they belong to.
 *
 * Minterms compress the input alphabet: every code unit an automaton treats
 * the same way lands in one class, so transitions can be indexed by class ID.
 * Class 0 is the default class and holds every code unit not claimed by an
 * explicit class. Lookups are a single typed array read; when no explicit
 * class reaches past ASCII the table only covers the first 128 code units.
 */
export class MintermClassifier {
  readonly #table: LookupTable
  readonly #asciiOnly: boolean
  readonly #classCount: number

  private constructor(table: LookupTable, asciiOnly: boolean, classCount: number) {
    this.#table = table
    this.#asciiOnly = asciiOnly
    this.#classCount = classCount
  }

  /**
   * Build a classifier from an ordered minterm list. The descriptor at index 0
   * is the default class and is never converted; every other descriptor is
   * passed to `toRanges` exactly once.
   */
  static build<T>(
    minterms: ReadonlyArray<T>,
    toRanges: RangeConverter<T>,
    options?: ClassifierOptions,
  ): MintermClassifier {
    if (minterms.length === 0) {
      throw new ClassifierContractError('at least one minterm is required')
    }

    const classRanges: ReadonlyArray<CharRange>[] = [NO_RANGES]
    for (let id = 1; id < minterms.length; id++) {
      classRanges.push(toRanges(minterms[id]))
    }

    return MintermClassifier.#assemble(
      classRanges,
      resolveClassifierOptions(options),
    )
  }

  /**
   * Build a classifier from ranges that are already converted. Entry 0 is the
   * default class and must be empty.
   */
  static fromRanges(
    classRanges: ReadonlyArray<ReadonlyArray<CharRange>>,
    options?: ClassifierOptions,
  ): MintermClassifier {
    if (classRanges.length === 0) {
      throw new ClassifierContractError('at least one minterm is required')
    }
    if (classRanges[0].length > 0) {
      throw new ClassifierContractError(
        'the default class (ID 0) cannot be assigned ranges',
      )
    }

    return MintermClassifier.#assemble(
      classRanges,
      resolveClassifierOptions(options),
    )
  }

  static #assemble(
    classRanges: ReadonlyArray<ReadonlyArray<CharRange>>,
    options: ResolvedClassifierOptions,
  ): MintermClassifier {
    const classCount = classRanges.length

    if (classCount === 1) {
      emitDiagnostic(
        options,
        'debug',
        'classifier.shared-table',
        'single minterm, every code unit maps to class 0',
      )
      return new MintermClassifier(SHARED_ZERO_TABLE, false, 1)
    }

    const strict = options.validation === 'strict'

    let asciiOnly = true
    for (let id = 1; id < classCount; id++) {
      const ranges = classRanges[id]
      if (strict) {
        assertRangesValid(id, ranges)
      }
      if (ranges.length === 0) {
        emitDiagnostic(
          options,
          'warn',
          'classifier.empty-class',
          `class ${id} has no ranges and can never be produced`,
          { classId: id },
        )
        continue
      }
      // Trusted ranges may arrive unsorted, so every end is inspected.
      for (const [, end] of ranges) {
        if (end >= ASCII_TABLE_SIZE) asciiOnly = false
      }
    }

    const table = allocateTable(
      asciiOnly ? ASCII_TABLE_SIZE : CODE_UNIT_COUNT,
      classCount,
    )

    for (let id = 1; id < classCount; id++) {
      for (const range of classRanges[id]) {
        if (strict) {
          const assigned = findAssigned(table, range)
          if (assigned !== -1) {
            throw new ClassifierContractError(
              `classes ${table[assigned]} and ${id} both claim ${formatCode(assigned)}`,
            )
          }
        }
        fillRange(table, id, range)
      }
    }

    emitDiagnostic(
      options,
      'debug',
      'classifier.table-built',
      `built ${asciiOnly ? 'ASCII' : 'full'} lookup table for ${classCount} minterms`,
      {
        classCount,
        tableSize: table.length,
        asciiOnly,
        elementBytes: table.BYTES_PER_ELEMENT,
      },
    )

    return new MintermClassifier(table, asciiOnly, classCount)
  }

  /** Number of minterms, including the default class. */
  get classCount(): number {
    return this.#classCount
  }

  get isAsciiOnly(): boolean {
    return this.#asciiOnly
  }

  get tableSize(): number {
    return this.#table.length
  }

  get usesSharedTable(): boolean {
    return this.#table === SHARED_ZERO_TABLE
  }

  /**
   * A copy of the backing table. Writes to it do not reach the classifier.
   */
  lookupTable(): LookupTable {
    return this.#table.slice()
  }

  /**
   * Minterm ID of a code unit. `code` must lie in `0..0xFFFF`; it is not
   * checked here.
   */
  classify(code: number): number {
    if (this.#asciiOnly && code >= ASCII_TABLE_SIZE) {
      return 0
    }
    return this.#table[code]
  }

  classifyChecked(code: number): number {
    if (!Number.isInteger(code) || code < 0 || code > MAX_CODE_UNIT) {
      throw new ClassifierRangeError(code)
    }
    return this.classify(code)
  }

  /**
   * Classify every code unit of `text`. Surrogate halves are classified on
   * their own. `target` is reused when it has room for `text.length` entries.
   */
  classifyText(text: string, target?: Uint32Array): Uint32Array {
    const length = text.length
    const out =
      target !== undefined && target.length >= length
        ? target.subarray(0, length)
        : new Uint32Array(length)
    for (let index = 0; index < length; index++) {
      out[index] = this.classify(text.charCodeAt(index))
    }
    return out
  }
}
