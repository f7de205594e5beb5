/**
 * Level assignment: infers the hierarchy of a message from the order in
 * which coordinate keys open and reopen.
 *
 * A coordinate key (descriptor class < 10: identification, time, location,
 * vertical position...) opens a new level. When a coordinate name that is
 * already open appears again, every group opened since its previous
 * occurrence is closed and the new group starts at the same depth.
 */
import type { BufrMessage, LeveledKey } from '../types.js'
import { readDescriptorClass } from '../message/lookup.js'
import { bareName } from './bufr-key.js'

/**
 * Names whose coordinate status does not follow the descriptor class rule.
 * `subsetNumber` has no descriptor code; `operator` would be classed by its
 * operator descriptor.
 */
export const IS_KEY_COORD: Readonly<Record<string, boolean>> = Object.freeze({
  subsetNumber: true,
  operator: false,
})

/** Descriptor classes below this value are coordinates. */
const COORDINATE_CLASS_LIMIT = 10

/** Returns true if `key` opens a level. Keys without a descriptor code are not coordinates. */
export function isCoordinateKey(message: BufrMessage, key: string): boolean {
  const name = bareName(key)
  const forced = IS_KEY_COORD[name]
  if (forced !== undefined) return forced
  const descriptorClass = readDescriptorClass(message, key)
  return descriptorClass !== undefined && descriptorClass < COORDINATE_CLASS_LIMIT
}

/**
 * Yields every key of `message` in decoder order, paired with its level.
 * Never throws on missing codes; such keys simply stay at the current level.
 */
export function* messageStructure(message: BufrMessage): Generator<LeveledKey> {
  let level = 0
  // Open coordinates, most recent last.
  const coords: { name: string; level: number }[] = []

  for (const key of message) {
    const name = bareName(key)
    const isCoord = isCoordinateKey(message, key)

    if (isCoord) {
      while (coords.some((c) => c.name === name)) {
        const closed = coords.pop()
        if (closed === undefined) break
        level = closed.level
      }
    }

    yield [level, key]

    if (isCoord) {
      coords.push({ name, level })
      level += 1
    }
  }
}
