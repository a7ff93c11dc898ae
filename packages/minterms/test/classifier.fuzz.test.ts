import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { MintermClassifier } from '../src'
import type { CharRange } from '../src'

interface Partition {
  readonly classCount: number
  readonly segments: ReadonlyArray<{ readonly range: CharRange; readonly owner: number }>
}

/**
 * Cut the code unit domain into consecutive segments and hand each one to a
 * class. Segments owned by class 0 are left implicit.
 */
const partitionArb: fc.Arbitrary<Partition> = fc
  .record({
    classCount: fc.integer({ min: 1, max: 8 }),
    cuts: fc.uniqueArray(
      fc.oneof(fc.integer({ min: 1, max: 0xff }), fc.integer({ min: 1, max: 0xffff })),
      { maxLength: 24 },
    ),
    owners: fc.array(fc.nat(), { minLength: 25, maxLength: 25 }),
  })
  .map(({ classCount, cuts, owners }) => {
    const bounds = [0, ...[...cuts].sort((a, b) => a - b), 0x10000]
    const segments = bounds.slice(0, -1).map((start, index) => ({
      range: [start, bounds[index + 1] - 1] as const,
      owner: owners[index] % classCount,
    }))
    return { classCount, segments }
  })

const toClassRanges = (partition: Partition): CharRange[][] => {
  const classRanges = Array.from(
    { length: partition.classCount },
    (): CharRange[] => [],
  )
  for (const { range, owner } of partition.segments) {
    if (owner !== 0) {
      classRanges[owner].push(range)
    }
  }
  return classRanges
}

const expectedClass = (partition: Partition, code: number): number => {
  for (const { range, owner } of partition.segments) {
    if (code >= range[0] && code <= range[1]) return owner
  }
  throw new Error(`code ${code} not covered by the partition`)
}

const probeCodes = (partition: Partition): number[] => {
  const codes = [0, 127, 128, 129, 0xffff]
  for (const { range } of partition.segments) {
    codes.push(range[0], range[1])
  }
  return codes
}

describe('MintermClassifier fuzz', () => {
  it('agrees with the partition it was built from', () => {
    fc.assert(
      fc.property(
        partitionArb,
        fc.array(fc.integer({ min: 0, max: 0xffff }), { maxLength: 64 }),
        (partition, extraCodes) => {
          const classifier = MintermClassifier.fromRanges(toClassRanges(partition))
          for (const code of [...probeCodes(partition), ...extraCodes]) {
            expect(classifier.classify(code)).toBe(expectedClass(partition, code))
          }
        },
      ),
      { numRuns: 512 },
    )
  })

  it('is total over the code unit domain', () => {
    fc.assert(
      fc.property(partitionArb, (partition) => {
        const classifier = MintermClassifier.fromRanges(toClassRanges(partition))
        const undefinedCodes: number[] = []
        for (let code = 0; code <= 0xffff; code++) {
          const id = classifier.classify(code)
          if (!Number.isInteger(id) || id < 0 || id >= partition.classCount) {
            undefinedCodes.push(code)
          }
        }
        expect(undefinedCodes).toEqual([])
      }),
      { numRuns: 16 },
    )
  })

  it('restricts the table exactly when no explicit class leaves ASCII', () => {
    fc.assert(
      fc.property(partitionArb, (partition) => {
        const classifier = MintermClassifier.fromRanges(toClassRanges(partition))
        const leavesAscii = partition.segments.some(
          ({ range, owner }) => owner !== 0 && range[1] >= 128,
        )

        if (partition.classCount === 1) {
          expect(classifier.usesSharedTable).toBe(true)
          return
        }
        expect(classifier.isAsciiOnly).toBe(!leavesAscii)
        expect(classifier.tableSize).toBe(leavesAscii ? 0x10000 : 128)
        if (!leavesAscii) {
          expect(classifier.classify(128)).toBe(0)
          expect(classifier.classify(129)).toBe(0)
          expect(classifier.classify(0xffff)).toBe(0)
        }
      }),
      { numRuns: 512 },
    )
  })

  it('returns the same class on repeated queries', () => {
    fc.assert(
      fc.property(partitionArb, fc.integer({ min: 0, max: 0xffff }), (partition, code) => {
        const classifier = MintermClassifier.fromRanges(toClassRanges(partition))
        const first = classifier.classify(code)
        expect(classifier.classify(code)).toBe(first)
        expect(classifier.classifyChecked(code)).toBe(first)
      }),
      { numRuns: 256 },
    )
  })

  it('builds the same table through a range converter', () => {
    fc.assert(
      fc.property(partitionArb, (partition) => {
        const classRanges = toClassRanges(partition)
        const ids = classRanges.map((_, id) => id)
        const built = MintermClassifier.build(ids, (id) => classRanges[id])
        const direct = MintermClassifier.fromRanges(classRanges)

        expect(built.tableSize).toBe(direct.tableSize)
        expect(built.lookupTable()).toEqual(direct.lookupTable())
      }),
      { numRuns: 64 },
    )
  })
})
