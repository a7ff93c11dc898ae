import { ClassifierContractError } from '../errors'
import type { CharRange } from '../types'
import { MAX_CODE_UNIT } from './lookup-table'

export const formatCode = (code: number): string =>
  `U+${code.toString(16).toUpperCase().padStart(4, '0')}`

const describeRange = (label: string, [start, end]: CharRange): string =>
  `${label} [${start}, ${end}]`

const assertRangeInDomain = (label: string, range: CharRange): void => {
  const [start, end] = range
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new ClassifierContractError(
      `${describeRange(label, range)} has non-integer bounds`,
    )
  }
  if (start < 0 || end > MAX_CODE_UNIT) {
    throw new ClassifierContractError(
      `${describeRange(label, range)} lies outside 0..${MAX_CODE_UNIT}`,
    )
  }
  if (start > end) {
    throw new ClassifierContractError(`${describeRange(label, range)} is inverted`)
  }
}

/**
 * Check that a class's ranges are in the code unit domain, ascending and
 * disjoint. Adjacent ranges are allowed.
 */
export const assertRangesValid = (
  classId: number,
  ranges: ReadonlyArray<CharRange>,
): void => {
  let previousEnd = -1
  for (const [index, range] of ranges.entries()) {
    const label = `class ${classId} range #${index}`
    assertRangeInDomain(label, range)
    if (range[0] <= previousEnd) {
      throw new ClassifierContractError(
        `${describeRange(label, range)} overlaps or precedes the previous range`,
      )
    }
    previousEnd = range[1]
  }
}

/**
 * Sort ranges by start and merge overlapping or adjacent ones. The result
 * satisfies {@link assertRangesValid}.
 */
export const normalizeRanges = (
  ranges: ReadonlyArray<CharRange>,
): CharRange[] => {
  for (const [index, range] of ranges.entries()) {
    assertRangeInDomain(`range #${index}`, range)
  }

  const sorted = [...ranges].sort((a, b) => a[0] - b[0] || a[1] - b[1])
  const merged: [number, number][] = []

  for (const [start, end] of sorted) {
    const last = merged[merged.length - 1]
    if (last !== undefined && start <= last[1] + 1) {
      last[1] = Math.max(last[1], end)
    } else {
      merged.push([start, end])
    }
  }

  return merged
}
