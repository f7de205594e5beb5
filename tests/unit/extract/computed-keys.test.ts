import { describe, it, expect } from 'vitest'
import {
  COMPUTED_KEY_NAMES,
  addComputedKeys,
  withComputedDependencies,
} from '../../../src/extract/computed-keys.js'

const DATETIME_FIELDS = { year: 2024, month: 3, day: 15, hour: 6, minute: 30, second: 0 }

describe('addComputedKeys', () => {
  it('data_datetime from date and time parts (UTC)', () => {
    const res = addComputedKeys(DATETIME_FIELDS, new Set(['data_datetime']))
    expect(res['data_datetime']).toEqual(new Date(Date.UTC(2024, 2, 15, 6, 30, 0, 0)))
  })

  it('time parts default to 0', () => {
    const res = addComputedKeys({ year: 2024, month: 3, day: 15 }, new Set(['data_datetime']))
    expect(res['data_datetime']).toEqual(new Date(Date.UTC(2024, 2, 15, 0, 0, 0, 0)))
  })

  it('fractional seconds keep milliseconds', () => {
    const res = addComputedKeys({ ...DATETIME_FIELDS, second: 12.5 }, new Set(['data_datetime']))
    expect(res['data_datetime']).toEqual(new Date(Date.UTC(2024, 2, 15, 6, 30, 12, 500)))
  })

  it('typical_datetime reads the typical* keys', () => {
    const res = addComputedKeys(
      { typicalYear: 2023, typicalMonth: 12, typicalDay: 31, typicalHour: 23 },
      new Set(['typical_datetime'])
    )
    expect(res['typical_datetime']).toEqual(new Date(Date.UTC(2023, 11, 31, 23, 0, 0, 0)))
  })

  it('a missing date part leaves the key out', () => {
    const res = addComputedKeys({ year: 2024, month: 3, day: null }, new Set(['data_datetime']))
    expect(Object.hasOwn(res, 'data_datetime')).toBe(false)
  })

  it('WMO_station_id = block * 1000 + station', () => {
    const res = addComputedKeys({ blockNumber: 6, stationNumber: 260 }, new Set(['WMO_station_id']))
    expect(res['WMO_station_id']).toBe(6260)
  })

  it('WMO_station_position defaults the height to 0', () => {
    const included = new Set(['WMO_station_position'])
    expect(addComputedKeys({ longitude: 5.18, latitude: 52.1 }, included)['WMO_station_position']).toEqual([
      5.18, 52.1, 0,
    ])
    expect(
      addComputedKeys({ longitude: 5.18, latitude: 52.1, heightOfStation: 2 }, included)['WMO_station_position']
    ).toEqual([5.18, 52.1, 2])
  })

  it('keys not requested are not computed', () => {
    const observation = { blockNumber: 6, stationNumber: 260 }
    expect(addComputedKeys(observation, new Set(['stationNumber']))).toEqual(observation)
  })

  it('does not mutate its input', () => {
    const observation = { blockNumber: 6, stationNumber: 260 }
    addComputedKeys(observation, new Set(['WMO_station_id']))
    expect(observation).toEqual({ blockNumber: 6, stationNumber: 260 })
  })
})

describe('withComputedDependencies', () => {
  it('adds the inputs of requested computed keys only', () => {
    const res = withComputedDependencies(['WMO_station_id', 'pressure'])
    expect([...res].sort()).toEqual(['WMO_station_id', 'blockNumber', 'pressure', 'stationNumber'].sort())
  })

  it('leaves a set without computed keys unchanged', () => {
    expect([...withComputedDependencies(['pressure'])]).toEqual(['pressure'])
  })
})

describe('COMPUTED_KEY_NAMES', () => {
  it('lists every computed key', () => {
    expect([...COMPUTED_KEY_NAMES]).toEqual([
      'data_datetime',
      'typical_datetime',
      'WMO_station_id',
      'WMO_station_position',
    ])
  })
})
