import { describe, expect, it } from 'vitest'
import { findThresholdBreaches } from './rollback-thresholds'

describe('findThresholdBreaches', () => {
  const profile = { errorThreshold: 0.05 }

  it('reports nothing for healthy metrics', () => {
    expect(
      findThresholdBreaches(
        { success_rate: 0.95, error_rate: 0.01, latency_p95_ms: 800, cost_cents: 2 },
        profile
      )
    ).toEqual([])
  })

  it('reports every breached threshold', () => {
    expect(
      findThresholdBreaches(
        { success_rate: 0.8, error_rate: 0.1, latency_p95_ms: 4500, cost_cents: 12 },
        profile
      )
    ).toEqual([
      'success_rate 0.8 < 0.9',
      'error_rate 0.1 > 0.05',
      'latency_p95_ms 4500 > 3000',
      'cost_cents 12 > 10',
    ])
  })

  it('ignores absent and non-numeric metrics', () => {
    expect(findThresholdBreaches({ error_rate: 'high', note: 'x' }, profile)).toEqual([])
  })

  it('treats values exactly at a threshold as healthy', () => {
    expect(
      findThresholdBreaches({ success_rate: 0.9, error_rate: 0.05, latency_p95_ms: 3000 }, profile)
    ).toEqual([])
  })
})
