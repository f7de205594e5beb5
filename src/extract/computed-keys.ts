/**
 * Derived attributes computed from raw observation values.
 * Only computed when requested; their input keys are added to the
 * structural include set by the stream.
 */
import type { Observation, ObservationValue } from '../types.js'

/** Computes a derived value; undefined when a required input is absent or not numeric. */
export type ComputedKeyGetter = (observation: Readonly<Observation>, keys: readonly string[]) => ObservationValue | undefined

export interface ComputedKey {
  /** Raw keys the value is computed from. */
  readonly keys: readonly string[]
  /** Name of the derived attribute. */
  readonly name: string
  readonly getter: ComputedKeyGetter
  /** False for values no filter can match (arrays). */
  readonly filterable: boolean
}

function numberAt(observation: Readonly<Observation>, key: string | undefined): number | undefined {
  if (key === undefined) return undefined
  const value = observation[key]
  return typeof value === 'number' ? value : undefined
}

function numberOr(observation: Readonly<Observation>, key: string | undefined, fallback: number): number {
  return numberAt(observation, key) ?? fallback
}

/**
 * keys: year, month, day, hour, minute, second.
 * Date parts are required; time parts default to 0. Fractional seconds
 * are kept down to the millisecond.
 */
function datetimeFromObservation(observation: Readonly<Observation>, keys: readonly string[]): Date | undefined {
  const year = numberAt(observation, keys[0])
  const month = numberAt(observation, keys[1])
  const day = numberAt(observation, keys[2])
  if (year === undefined || month === undefined || day === undefined) return undefined

  const hours = numberOr(observation, keys[3], 0)
  const minutes = numberOr(observation, keys[4], 0)
  const seconds = numberOr(observation, keys[5], 0)
  const wholeSeconds = Math.trunc(seconds)
  const milliseconds = Math.floor(((seconds * 1_000_000) % 1_000_000) / 1_000)

  return new Date(Date.UTC(year, month - 1, day, hours, minutes, wholeSeconds, milliseconds))
}

/** keys: blockNumber, stationNumber → `block * 1000 + station`. */
function wmoStationIdFromObservation(observation: Readonly<Observation>, keys: readonly string[]): number | undefined {
  const block = numberAt(observation, keys[0])
  const station = numberAt(observation, keys[1])
  if (block === undefined || station === undefined) return undefined
  return block * 1000 + station
}

/** keys: longitude, latitude, heightOfStation → `[lon, lat, height]`; height defaults to 0. */
function wmoStationPositionFromObservation(
  observation: Readonly<Observation>,
  keys: readonly string[]
): readonly number[] | undefined {
  const longitude = numberAt(observation, keys[0])
  const latitude = numberAt(observation, keys[1])
  if (longitude === undefined || latitude === undefined) return undefined
  return [longitude, latitude, numberOr(observation, keys[2], 0)]
}

export const COMPUTED_KEYS: readonly ComputedKey[] = [
  {
    keys: ['year', 'month', 'day', 'hour', 'minute', 'second'],
    name: 'data_datetime',
    getter: datetimeFromObservation,
    filterable: true,
  },
  {
    keys: ['typicalYear', 'typicalMonth', 'typicalDay', 'typicalHour', 'typicalMinute', 'typicalSecond'],
    name: 'typical_datetime',
    getter: datetimeFromObservation,
    filterable: true,
  },
  {
    keys: ['blockNumber', 'stationNumber'],
    name: 'WMO_station_id',
    getter: wmoStationIdFromObservation,
    filterable: true,
  },
  {
    keys: ['longitude', 'latitude', 'heightOfStation'],
    name: 'WMO_station_position',
    getter: wmoStationPositionFromObservation,
    filterable: false,
  },
]

/** Names of every computed key. */
export const COMPUTED_KEY_NAMES: ReadonlySet<string> = new Set(COMPUTED_KEYS.map((c) => c.name))

/** Computed keys that cannot be used as filters. */
export const UNFILTERABLE_KEY_NAMES: ReadonlySet<string> = new Set(
  COMPUTED_KEYS.filter((c) => !c.filterable).map((c) => c.name)
)

/**
 * Expands `included` with the input keys of every computed key it names.
 * Returns a new set.
 */
export function withComputedDependencies(included: Iterable<string>): Set<string> {
  const result = new Set(included)
  for (const computed of COMPUTED_KEYS) {
    if (result.has(computed.name)) {
      for (const key of computed.keys) result.add(key)
    }
  }
  return result
}

/**
 * Returns a copy of `observation` with the requested computed keys added.
 * A computed key whose inputs are missing is left out.
 */
export function addComputedKeys(observation: Readonly<Observation>, included: ReadonlySet<string>): Observation {
  const augmented: Observation = { ...observation }
  for (const computed of COMPUTED_KEYS) {
    if (!included.has(computed.name)) continue
    const value = computed.getter(observation, computed.keys)
    if (value !== undefined) {
      augmented[computed.name] = value
    }
  }
  return augmented
}
