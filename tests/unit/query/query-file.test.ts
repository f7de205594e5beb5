import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest'
import { vol } from 'memfs'

vi.mock('node:fs/promises', async () => {
  const m = await vi.importActual<typeof import('memfs')>('memfs')
  return { default: m.fs.promises, ...m.fs.promises }
})

import { loadQuery, QueryFileNotFoundError } from '../../../src/query/query-file.js'
import { ConfigValidationError } from '../../../src/config.js'

const QUERY_DIR = '/queries'

describe('loadQuery', () => {
  beforeEach(() => {
    vol.reset()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reads a YAML query and applies defaults', async () => {
    vol.fromJSON({
      [`${QUERY_DIR}/sounding.yaml`]: [
        'columns: [stationNumber, pressure, airTemperature]',
        'filters:',
        '  stationNumber: [1, 2, 3]',
        '  pressure: { min: 50000 }',
        'requiredColumns: [stationNumber, pressure]',
        '',
      ].join('\n'),
    })

    const query = await loadQuery(`${QUERY_DIR}/sounding.yaml`)
    expect(query).toEqual({
      columns: ['stationNumber', 'pressure', 'airTemperature'],
      filters: { stationNumber: [1, 2, 3], pressure: { min: 50000 } },
      requiredColumns: ['stationNumber', 'pressure'],
      prefilterHeaders: false,
      emitMetrics: false,
    })
  })

  it('reads a JSON query', async () => {
    vol.fromJSON({
      [`${QUERY_DIR}/count.json`]: JSON.stringify({ columns: ['count'], filters: { count: { max: 10 } } }),
    })

    const query = await loadQuery(`${QUERY_DIR}/count.json`)
    expect(query.columns).toEqual(['count'])
    expect(query.filters).toEqual({ count: { max: 10 } })
  })

  it('missing file → QueryFileNotFoundError', async () => {
    await expect(loadQuery(`${QUERY_DIR}/missing.yaml`)).rejects.toThrow(QueryFileNotFoundError)
    await expect(loadQuery(`${QUERY_DIR}/missing.yaml`)).rejects.toThrow(
      'BUFR query file not found: /queries/missing.yaml'
    )
  })

  it('empty columns → ConfigValidationError', async () => {
    vol.fromJSON({ [`${QUERY_DIR}/empty.yaml`]: 'columns: []\n' })
    await expect(loadQuery(`${QUERY_DIR}/empty.yaml`)).rejects.toThrow(ConfigValidationError)
  })

  it('unknown keys are stripped and logged', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    vol.fromJSON({ [`${QUERY_DIR}/extra.yaml`]: 'columns: [pressure]\nlimit: 5\n' })

    const query = await loadQuery(`${QUERY_DIR}/extra.yaml`)
    expect(Object.hasOwn(query, 'limit')).toBe(false)
    expect(warnSpy).toHaveBeenCalledWith('[bufr] loadQuery: /queries/extra.yaml has unknown key(s): limit')
  })

  it('a caller-supplied handler replaces the warning', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const onUnknownKeys = vi.fn()
    vol.fromJSON({ [`${QUERY_DIR}/extra.yaml`]: 'columns: [pressure]\nlimit: 5\n' })

    await loadQuery(`${QUERY_DIR}/extra.yaml`, { onUnknownKeys })
    expect(onUnknownKeys).toHaveBeenCalledWith(['limit'])
    expect(warnSpy).not.toHaveBeenCalled()
  })
})
