/**
 * Core types for the BUFR observation extraction engine.
 * All types are immutable (readonly where appropriate).
 */

// ---------------------------------------------------------------------------
// Decoded values
// ---------------------------------------------------------------------------

/** A single decoded BUFR value: numeric elements decode to numbers, CCITT IA5 elements to strings. */
export type BufrScalar = number | string

/**
 * A value as returned by the decoder. Compressed multi-subset messages return
 * one element per subset for keys whose value differs between subsets.
 */
export type BufrValue = BufrScalar | readonly BufrScalar[]

/**
 * A value stored in an observation.
 * `null` marks a value the decoder reported as missing; `Date` is only
 * produced by computed datetime keys.
 */
export type ObservationValue = BufrValue | Date | null

/** One flattened leaf record. Keys keep their insertion order. */
export type Observation = Record<string, ObservationValue>

/**
 * The decoder's "missing" value for floating point elements
 * (`CODES_MISSING_DOUBLE`).
 */
export const CODES_MISSING_DOUBLE = -1e100

/** Returns true if `v` is a scalar BUFR value. */
export function isBufrScalar(v: unknown): v is BufrScalar {
  return typeof v === 'number' || typeof v === 'string'
}

/** Returns true if `v` is an array-valued decode (one element per subset). */
export function isBufrArray(v: ObservationValue | undefined): v is readonly BufrScalar[] {
  return Array.isArray(v)
}

// ---------------------------------------------------------------------------
// Decoder interface
// ---------------------------------------------------------------------------

/**
 * A decoded BUFR message, as exposed by the decoder.
 *
 * Iteration yields the message's keys in decode emission order: header keys
 * first, then ranked data keys (`#1#pressure`, `#2#pressure`, ...).
 * Key attributes such as `#1#pressure->code` are reachable through `get`
 * but are not iterated.
 */
export interface BufrMessage extends Iterable<string> {
  /** Returns the decoded value for `key`, or undefined when the key does not exist. */
  get(key: string): BufrValue | undefined
  /** Sets a decoder control key such as `unpack`. */
  set(key: string, value: number): void
}

// ---------------------------------------------------------------------------
// Ranked keys
// ---------------------------------------------------------------------------

/**
 * A key of a message placed in the hierarchy inferred from coordinate keys.
 * Two BufrKeys are the same key iff level, rank and name all match.
 */
export interface BufrKey {
  /** Hierarchy depth inferred by the level assigner. */
  readonly level: number
  /** 0 for unranked keys, N for the N-th repetition of a replicated element. */
  readonly rank: number
  /** Bare attribute name without the rank decoration. */
  readonly name: string
  /** Full key as used by the decoder: `name`, or `#<rank>#<name>` when ranked. */
  readonly key: string
}

/** A key paired with the level assigned to it. */
export type LeveledKey = readonly [level: number, key: string]
