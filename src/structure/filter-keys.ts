import type { BufrKey, BufrMessage } from '../types.js'
import { readOptional } from '../message/lookup.js'
import { bufrKeyFromLevelKey } from './bufr-key.js'
import { makeMessageFingerprint } from './fingerprint.js'
import { messageStructure } from './message-structure.js'

// ---------------------------------------------------------------------------
// filterKeys
// ---------------------------------------------------------------------------

/**
 * Levels the keys of `message` and keeps those whose bare name or full
 * ranked key is in `include`. An empty `include` keeps every key.
 * Relative order and levels are preserved.
 */
export function filterKeys(message: BufrMessage, include: Iterable<string> = []): BufrKey[] {
  const wanted = new Set(include)
  const result: BufrKey[] = []
  for (const [level, key] of messageStructure(message)) {
    const bufrKey = bufrKeyFromLevelKey(level, key)
    if (wanted.size === 0 || wanted.has(bufrKey.name) || wanted.has(bufrKey.key)) {
      result.push(bufrKey)
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// StructureCache
// ---------------------------------------------------------------------------

/**
 * Memoises {@link filterKeys} by message fingerprint and include set.
 *
 * Unbounded: a BUFR file usually has a handful of distinct layouts.
 * Not synchronised; give each stream its own instance.
 *
 * Messages without `unexpandedDescriptors` carry no layout information, so
 * their keys are computed every time and never stored.
 */
export class StructureCache {
  private readonly entries = new Map<string, readonly BufrKey[]>()

  /** Number of distinct (fingerprint, include set) pairs computed so far. */
  get size(): number {
    return this.entries.size
  }

  /**
   * Returns the filtered keys for `message`. A hit returns the stored array
   * itself; callers share it and must not mutate it.
   */
  filteredKeys(message: BufrMessage, include: Iterable<string> = []): readonly BufrKey[] {
    const includeKey = [...new Set(include)].sort()
    if (readOptional(message, 'unexpandedDescriptors') === undefined) {
      return filterKeys(message, includeKey)
    }
    const cacheKey = JSON.stringify([makeMessageFingerprint(message), includeKey])
    const cached = this.entries.get(cacheKey)
    if (cached !== undefined) return cached

    const keys = Object.freeze(filterKeys(message, includeKey))
    this.entries.set(cacheKey, keys)
    return keys
  }

  clear(): void {
    this.entries.clear()
  }
}
