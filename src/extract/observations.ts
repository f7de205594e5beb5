/**
 * Flattens the leveled keys of a message into observations, one per leaf
 * of the hierarchy implied by the levels.
 *
 * The walk keeps the current branch as an ordered record plus a parallel
 * stack of levels. When a key arrives at a level that closes the current
 * leaf (shallower than the deepest open level, or a repeated name at the
 * same level) the leaf is emitted and the branch is unwound back to the
 * shared ancestor before the new value is added.
 *
 * Filters are checked inline: a failing value hides itself and every
 * deeper key until a key at or above its level arrives, so siblings of a
 * rejected branch still produce observations.
 */
import type { BufrKey, BufrMessage, Observation, ObservationValue } from '../types.js'
import { CODES_MISSING_DOUBLE, isBufrArray } from '../types.js'
import type { BufrFilter } from '../filters/filter.js'
import { matchFilter } from '../filters/filter.js'
import { readOptional, readRequired } from '../message/lookup.js'

/** Number of subsets to walk: the declared count for compressed messages, otherwise 1. */
export function subsetCount(message: BufrMessage): number {
  if (!isCompressed(message)) return 1
  const declared = readOptional(message, 'numberOfSubsets')
  return typeof declared === 'number' && declared > 0 ? declared : 1
}

/** Returns true if the message uses compressed (column-wise) subsets. Absent flag → false. */
export function isCompressed(message: BufrMessage): boolean {
  const flag = readOptional(message, 'compressedData')
  if (flag === undefined) return false
  if (isBufrArray(flag)) return flag.length > 0
  return Boolean(flag)
}

/** Removes the most recently inserted entry. */
function popLast(record: Map<string, ObservationValue>): void {
  let last: string | undefined
  for (const key of record.keys()) last = key
  if (last !== undefined) record.delete(last)
}

/**
 * Yields the observations of `message`.
 *
 * @param filteredKeys leveled keys as returned by `filterKeys`
 * @param filters compiled filters by attribute name; an observation is only
 *   emitted once every filtered attribute is present in it
 * @param baseObservation fields every observation starts with (e.g. `count`)
 * @throws {BufrKeyNotFoundError} if a key in `filteredKeys` cannot be read
 */
export function* extractObservations(
  message: BufrMessage,
  filteredKeys: readonly BufrKey[],
  filters: Readonly<Record<string, BufrFilter>> = {},
  baseObservation: Readonly<Observation> = {}
): Generator<Observation> {
  const valueCache = new Map<string, ObservationValue>()
  const compressed = isCompressed(message)
  const subsets = subsetCount(message)
  const filterNames = Object.keys(filters)

  for (let subset = 0; subset < subsets; subset++) {
    const current = new Map<string, ObservationValue>(Object.entries(baseObservation))
    const levels: number[] = [0]
    let failedMatchLevel: number | null = null

    const hasAllFiltered = (): boolean => filterNames.every((n) => current.has(n))
    const closesLeaf = (level: number, name: string): boolean => {
      const deepest = levels[levels.length - 1] ?? 0
      return level < deepest || (level === deepest && current.has(name))
    }

    for (const bufrKey of filteredKeys) {
      const { level, name } = bufrKey

      if (failedMatchLevel !== null && level > failedMatchLevel) continue

      if (hasAllFiltered() && closesLeaf(level, name)) {
        yield Object.fromEntries(current)
      }

      while (current.size > 0 && closesLeaf(level, name)) {
        popLast(current)
        levels.pop()
      }

      let value = valueCache.get(bufrKey.key)
      if (value === undefined) {
        value = readRequired(message, bufrKey.key)
        valueCache.set(bufrKey.key, value)
      }
      if (compressed && isBufrArray(value) && value.length === subsets) {
        value = value[subset] ?? null
      }
      if (value === CODES_MISSING_DOUBLE) {
        value = null
      }

      const filter = filters[name]
      if (filter !== undefined) {
        if (!matchFilter(filter, value)) {
          failedMatchLevel = level
          continue
        }
        failedMatchLevel = null
      }

      current.set(name, value)
      levels.push(level)
    }

    // The last leaf is never closed by a following key.
    if (hasAllFiltered()) {
      yield Object.fromEntries(current)
    }
  }
}
