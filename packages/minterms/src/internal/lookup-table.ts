import type { CharRange, LookupTable } from '../types'

export const CODE_UNIT_COUNT = 0x10000
export const MAX_CODE_UNIT = CODE_UNIT_COUNT - 1
export const ASCII_TABLE_SIZE = 0x80

/**
 * Zero-filled full-size table shared by every single-class classifier.
 * Nothing writes to it after this line.
 */
export const SHARED_ZERO_TABLE: LookupTable = new Uint8Array(CODE_UNIT_COUNT)

/**
 * Allocate a zeroed table of `size` slots whose element type is the narrowest
 * one that can hold every ID below `classCount`.
 */
export const allocateTable = (size: number, classCount: number): LookupTable => {
  const maxId = classCount - 1
  if (maxId <= 0xff) return new Uint8Array(size)
  if (maxId <= 0xffff) return new Uint16Array(size)
  return new Uint32Array(size)
}

export const fillRange = (
  table: LookupTable,
  classId: number,
  [start, end]: CharRange,
): void => {
  table.fill(classId, start, end + 1)
}

/**
 * First slot in `[start, end]` already assigned to an explicit class, or -1.
 */
export const findAssigned = (
  table: LookupTable,
  [start, end]: CharRange,
): number => {
  const stop = Math.min(end, table.length - 1)
  for (let code = start; code <= stop; code++) {
    if (table[code] !== 0) return code
  }
  return -1
}
