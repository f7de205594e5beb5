import type { BufrKey } from '../types.js'

const RANK_MARKER = '#'

/**
 * Returns the bare attribute name of a decoder key: everything after the
 * last `#`. E.g. "#12#pressure" → "pressure", "edition" → "edition".
 */
export function bareName(key: string): string {
  return key.slice(key.lastIndexOf(RANK_MARKER) + 1)
}

/** Renders the decoder key for a name and rank: `name`, or `#<rank>#<name>` when ranked. */
export function rankedKey(rank: number, name: string): string {
  return rank > 0 ? `${RANK_MARKER}${rank}${RANK_MARKER}${name}` : name
}

/**
 * Builds a {@link BufrKey} from a level and a decoder key.
 * "#3#temperature" at level 2 → `{ level: 2, rank: 3, name: 'temperature' }`.
 * A key without rank decoration gets rank 0.
 */
export function bufrKeyFromLevelKey(level: number, key: string): BufrKey {
  const sep = key.lastIndexOf(RANK_MARKER)
  const name = key.slice(sep + 1)
  let rank = 0
  if (sep >= 0) {
    const parsed = Number.parseInt(key.slice(1, sep), 10)
    rank = Number.isNaN(parsed) ? 0 : parsed
  }
  return Object.freeze({ level, rank, name, key: rankedKey(rank, name) })
}

/**
 * Identity of a leveled key: two keys are the same when level, rank and name
 * agree. `key` is derived from rank and name and is not compared.
 */
export function isSameBufrKey(a: BufrKey, b: BufrKey): boolean {
  return a.level === b.level && a.rank === b.rank && a.name === b.name
}
