/**
 * Structural fingerprint of a message, built from its header fields.
 *
 * Messages with equal fingerprints share the same key layout, so the
 * leveled and filtered key list computed for one can be reused for the
 * others. The fingerprint says nothing about the values.
 */
import type { BufrMessage, BufrValue } from '../types.js'
import { isBufrArray } from '../types.js'
import { readOptional } from '../message/lookup.js'

/**
 * `[edition, masterTableNumber, numberOfSubsets, ...descriptors, null, ...delayedFactors]`.
 * `null` stands for an absent or non-numeric header value, and terminates
 * the descriptor run so descriptors and replication factors cannot shift
 * into each other.
 */
export type MessageFingerprint = readonly (number | null)[]

const DESCRIPTORS_TERMINATOR = null

function toInt(value: BufrValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? Math.trunc(n) : null
  }
  return null
}

/** Normalises a scalar-or-array header value to a list; absent → []. */
function toIntList(value: BufrValue | undefined): (number | null)[] {
  if (value === undefined) return []
  if (isBufrArray(value)) return value.map(toInt)
  return [toInt(value)]
}

/** Builds the structural fingerprint of `message`. Pure; tolerates absent header fields. */
export function makeMessageFingerprint(message: BufrMessage): MessageFingerprint {
  return [
    toInt(readOptional(message, 'edition')),
    toInt(readOptional(message, 'masterTableNumber')),
    toInt(readOptional(message, 'numberOfSubsets')),
    ...toIntList(readOptional(message, 'unexpandedDescriptors')),
    DESCRIPTORS_TERMINATOR,
    ...toIntList(readOptional(message, 'delayedDescriptorReplicationFactor')),
  ]
}
