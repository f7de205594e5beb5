/**
 * Value filters applied to observation attributes.
 *
 * A user filter spec is one of:
 *   - a scalar           → exact match (`pressure: 50000`)
 *   - a list of scalars  → set membership (`stationNumber: [1, 2, 3]`)
 *   - `{ min?, max? }`   → inclusive range, either bound optional
 *
 * Range bounds compare against values of their own type only: a numeric
 * bound never matches a string value and vice versa. A missing value
 * (`null`) never matches.
 *
 * `Date` values (computed datetimes) compare against ISO 8601 string bounds
 * (`{ min: '2020-01-01' }`) or epoch milliseconds; a string that does not
 * parse as a date never matches.
 */
import { z } from 'zod'
import type { BufrMessage, BufrScalar, ObservationValue } from '../types.js'
import { isBufrScalar } from '../types.js'
import { readOptional } from '../message/lookup.js'

// ---------------------------------------------------------------------------
// Filter specs
// ---------------------------------------------------------------------------

const scalarField = z.union([z.number(), z.string()])

const rangeSpecSchema = z
  .object({
    min: scalarField.optional(),
    max: scalarField.optional(),
  })
  .strict()

/** Zod schema for a single user filter spec. */
export const filterSpecSchema = z.union([
  scalarField,
  z.array(scalarField).min(1, 'a list filter must have at least one value'),
  rangeSpecSchema,
])

export type FilterSpec = z.infer<typeof filterSpecSchema>

// ---------------------------------------------------------------------------
// Compiled filters
// ---------------------------------------------------------------------------

export interface SetFilter {
  readonly kind: 'set'
  readonly values: ReadonlySet<BufrScalar>
}

export interface RangeFilter {
  readonly kind: 'range'
  readonly min?: BufrScalar
  readonly max?: BufrScalar
}

/** A compiled filter predicate. */
export type BufrFilter = SetFilter | RangeFilter

/** Compiles one user filter spec. */
export function compileFilter(spec: FilterSpec): BufrFilter {
  if (isBufrScalar(spec)) {
    return { kind: 'set', values: new Set([spec]) }
  }
  if (Array.isArray(spec)) {
    return { kind: 'set', values: new Set(spec) }
  }
  return {
    kind: 'range',
    ...(spec.min !== undefined ? { min: spec.min } : {}),
    ...(spec.max !== undefined ? { max: spec.max } : {}),
  }
}

/** Compiles a record of user filter specs, keyed by attribute name. */
export function compileFilters(specs: Readonly<Record<string, FilterSpec>>): Record<string, BufrFilter> {
  const result: Record<string, BufrFilter> = {}
  for (const [name, spec] of Object.entries(specs)) {
    result[name] = compileFilter(spec)
  }
  return result
}

/** Orders two scalars of the same type; undefined when the types differ. */
function compareScalars(a: BufrScalar, b: BufrScalar): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0
  return undefined
}

/** Epoch milliseconds of a filter value used against a `Date`; NaN when unparseable. */
function boundTime(bound: BufrScalar): number {
  return typeof bound === 'number' ? bound : Date.parse(bound)
}

function matchDate(filter: BufrFilter, value: Date): boolean {
  const time = value.getTime()
  if (Number.isNaN(time)) return false

  if (filter.kind === 'set') {
    for (const member of filter.values) {
      if (boundTime(member) === time) return true
    }
    return false
  }

  if (filter.min !== undefined) {
    const min = boundTime(filter.min)
    if (Number.isNaN(min) || time < min) return false
  }
  if (filter.max !== undefined) {
    const max = boundTime(filter.max)
    if (Number.isNaN(max) || time > max) return false
  }
  return true
}

/** Returns true if `value` satisfies `filter`. */
export function matchFilter(filter: BufrFilter, value: ObservationValue | undefined): boolean {
  if (value instanceof Date) return matchDate(filter, value)
  if (!isBufrScalar(value)) return false

  if (filter.kind === 'set') {
    return filter.values.has(value)
  }

  if (filter.min !== undefined) {
    const cmp = compareScalars(value, filter.min)
    if (cmp === undefined || cmp < 0) return false
  }
  if (filter.max !== undefined) {
    const cmp = compareScalars(value, filter.max)
    if (cmp === undefined || cmp > 0) return false
  }
  return true
}

/**
 * Upper bound of the values `filter` accepts: the range's `max`, or the
 * largest member of a set. Undefined for ranges open at the top.
 */
export function filterMax(filter: BufrFilter): BufrScalar | undefined {
  if (filter.kind === 'range') return filter.max
  let max: BufrScalar | undefined
  for (const v of filter.values) {
    if (max === undefined || (compareScalars(v, max) ?? 0) > 0) max = v
  }
  return max
}

// ---------------------------------------------------------------------------
// Message-level matching
// ---------------------------------------------------------------------------

export interface IsMatchOptions {
  /** When true (default), a key absent from the message fails the match. */
  readonly required?: boolean
}

/**
 * Tests the unranked keys of `message` against `filters`.
 * Used to reject whole messages on header values before unpacking.
 */
export function isMatch(
  message: BufrMessage,
  filters: Readonly<Record<string, BufrFilter>>,
  options: IsMatchOptions = {}
): boolean {
  const required = options.required ?? true
  for (const [name, filter] of Object.entries(filters)) {
    const value = readOptional(message, name)
    if (value === undefined) {
      if (required) return false
      continue
    }
    if (!matchFilter(filter, value)) return false
  }
  return true
}
