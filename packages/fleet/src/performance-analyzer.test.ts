import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  analyzeAggregate,
  createPerformanceAnalyzer,
  type AggregateSnapshot,
} from './performance-analyzer'

function aggregate(overrides: Partial<AggregateSnapshot> = {}): AggregateSnapshot {
  return {
    model_name: 'model-a',
    complexity_level: 'complex',
    usage_count: 100,
    success_count: 95,
    avg_response_time_ms: 800,
    ...overrides,
  }
}

describe('analyzeAggregate', () => {
  it('emits nothing for a healthy aggregate', () => {
    expect(analyzeAggregate(aggregate())).toEqual([])
  })

  it('flags a low success rate', () => {
    const [advisory] = analyzeAggregate(aggregate({ success_count: 80 }))

    expect(advisory).toEqual({
      kind: 'low_success_rate',
      modelName: 'model-a',
      complexityLevel: 'complex',
      value: 0.8,
      threshold: 0.85,
      message: 'model-a/complex success rate 80.0% below 85%',
    })
  })

  it('flags slow responses', () => {
    const advisories = analyzeAggregate(aggregate({ avg_response_time_ms: 6200 }))

    expect(advisories.map((advisory) => advisory.kind)).toEqual(['slow_response'])
    expect(advisories[0]?.message).toBe('model-a/complex average response 6200ms above 5000ms')
  })

  it('treats the thresholds themselves as healthy', () => {
    expect(
      analyzeAggregate(aggregate({ success_count: 85, avg_response_time_ms: 5000 }))
    ).toEqual([])
  })

  it('skips latency when no response time was ever reported', () => {
    expect(analyzeAggregate(aggregate({ avg_response_time_ms: null }))).toEqual([])
  })
})

describe('createPerformanceAnalyzer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('forwards advisories to the sink', async () => {
    const sink = vi.fn()
    const analyze = createPerformanceAnalyzer(sink)

    analyze(aggregate({ success_count: 50, avg_response_time_ms: 9000 }))
    await vi.waitFor(() => expect(sink).toHaveBeenCalledTimes(1))

    expect(sink.mock.calls[0]?.[0]).toHaveLength(2)
  })

  it('does not call the sink without advisories', async () => {
    const sink = vi.fn()
    createPerformanceAnalyzer(sink)(aggregate())
    await Promise.resolve()

    expect(sink).not.toHaveBeenCalled()
  })

  it('logs a failing sink instead of throwing', async () => {
    const analyze = createPerformanceAnalyzer(() => Promise.reject(new Error('sink down')))

    expect(() => analyze(aggregate({ success_count: 10 }))).not.toThrow()
    await vi.waitFor(() => expect(console.error).toHaveBeenCalled())
  })
})
