import { describe, it, expect } from 'vitest'
import { InMemoryBufrMessage } from '../../../src/message/in-memory-message.js'
import { isCoordinateKey, messageStructure } from '../../../src/structure/message-structure.js'

/** Station with two latitude groups, then a second subset. */
function nestedMessage(latitudeCode: string | number = '005002'): InMemoryBufrMessage {
  return InMemoryBufrMessage.fromRecord({
    edition: 1,
    '#1#year': 2020,
    '#1#subsetNumber': 1,
    '#1#latitude': 43.0,
    '#1#temperature': 300.0,
    '#2#latitude': 42.0,
    '#2#temperature': 310.0,
    '#2#subsetNumber': 2,
    '#3#temperature': 300.0,
    '#1#latitude->code': latitudeCode,
    '#2#latitude->code': latitudeCode,
  })
}

const NESTED_EXPECTED = [
  [0, 'edition'],
  [0, '#1#year'],
  [0, '#1#subsetNumber'],
  [1, '#1#latitude'],
  [2, '#1#temperature'],
  [1, '#2#latitude'],
  [2, '#2#temperature'],
  [0, '#2#subsetNumber'],
  [1, '#3#temperature'],
]

describe('messageStructure', () => {
  it('single header key → level 0', () => {
    const message = InMemoryBufrMessage.fromRecord({ edition: 1 })
    expect([...messageStructure(message)]).toEqual([[0, 'edition']])
  })

  it('keys without codes all stay at level 0, in order', () => {
    const message = InMemoryBufrMessage.fromRecord({
      edition: 4,
      '#1#airTemperature': 280.0,
      '#2#airTemperature': 281.0,
      '#1#windSpeed': 3.5,
    })
    expect([...messageStructure(message)]).toEqual([
      [0, 'edition'],
      [0, '#1#airTemperature'],
      [0, '#2#airTemperature'],
      [0, '#1#windSpeed'],
    ])
  })

  it('reopening a coordinate closes the groups opened since its last occurrence', () => {
    expect([...messageStructure(nestedMessage())]).toEqual(NESTED_EXPECTED)
  })

  it('accepts numeric descriptor codes', () => {
    expect([...messageStructure(nestedMessage(5002))]).toEqual(NESTED_EXPECTED)
  })

  it('descriptor class 10 or above is not a coordinate', () => {
    const message = InMemoryBufrMessage.fromRecord({
      '#1#airTemperature': 280.0,
      '#1#windSpeed': 3.5,
      '#2#airTemperature': 281.0,
      '#1#airTemperature->code': '012101',
      '#2#airTemperature->code': '012101',
    })
    expect([...messageStructure(message)]).toEqual([
      [0, '#1#airTemperature'],
      [0, '#1#windSpeed'],
      [0, '#2#airTemperature'],
    ])
  })
})

describe('isCoordinateKey', () => {
  it('subsetNumber is always a coordinate', () => {
    const message = InMemoryBufrMessage.fromRecord({ '#1#subsetNumber': 1 })
    expect(isCoordinateKey(message, '#1#subsetNumber')).toBe(true)
  })

  it('operator is never a coordinate, whatever its code', () => {
    const message = InMemoryBufrMessage.fromRecord({ '#1#operator': 1, '#1#operator->code': '001001' })
    expect(isCoordinateKey(message, '#1#operator')).toBe(false)
  })

  it('a key without a code is not a coordinate', () => {
    const message = InMemoryBufrMessage.fromRecord({ '#1#latitude': 45.0 })
    expect(isCoordinateKey(message, '#1#latitude')).toBe(false)
  })

  it('an unparsable code is not a coordinate', () => {
    const message = InMemoryBufrMessage.fromRecord({ '#1#latitude': 45.0, '#1#latitude->code': 'n/a' })
    expect(isCoordinateKey(message, '#1#latitude')).toBe(false)
  })
})
