import { describe, it, expect, vi, afterEach } from 'vitest'
import { createMetricEvent, emitMetric } from '../../../src/metrics/sink.js'
import type { StreamMetrics } from '../../../src/metrics/types.js'

function streamMetrics(): StreamMetrics {
  return {
    stage: 'stream',
    messagesRead: 3,
    messagesSkipped: 1,
    observationsYielded: 4,
    structureCacheSize: 1,
    stoppedAtCountLimit: false,
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createMetricEvent', () => {
  it('stamps the payload with stage and ISO timestamp', () => {
    const event = createMetricEvent(streamMetrics(), new Date('2026-01-01T00:00:00Z'))
    expect(event).toEqual({
      stage: 'stream',
      timestamp: '2026-01-01T00:00:00.000Z',
      data: streamMetrics(),
    })
  })
})

describe('emitMetric', () => {
  it('writes a prefixed JSON line through console.warn', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const event = createMetricEvent(streamMetrics(), new Date('2026-01-01T00:00:00Z'))

    emitMetric(event)

    expect(warnSpy).toHaveBeenCalledOnce()
    expect(warnSpy).toHaveBeenCalledWith(`[bufr:metrics] ${JSON.stringify(event)}`)
  })
})
